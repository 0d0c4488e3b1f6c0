/**
 * =============================================================================
 * ENVIRONMENT CONFIGURATION
 * =============================================================================
 *
 * Centralized configuration loaded from environment variables.
 * All config access goes through this file - no direct process.env usage elsewhere.
 *
 * SECURITY:
 * - No secrets are logged or exposed in error messages
 * - Production requires a proper JWT secret (validated at startup)
 * - Development uses an auto-generated secret if not provided
 *
 * SCALABILITY:
 * - REDIS_ENABLED switches the group registry and trip lock to their
 *   distributed implementations
 * =============================================================================
 */

import dotenv from 'dotenv';
import { randomBytes } from 'crypto';

// Load .env file
dotenv.config();

// =============================================================================
// HELPER FUNCTIONS
// =============================================================================

/**
 * Get required environment variable (throws if missing in production)
 */
function getRequired(key: string, devDefault?: string): string {
  const value = process.env[key];

  if (value && value.trim() !== '') {
    return value;
  }

  if (process.env.NODE_ENV !== 'production') {
    if (devDefault) {
      console.warn(`⚠️  [CONFIG] ${key} not set, using development default`);
      return devDefault;
    }
    const generated = randomBytes(32).toString('hex');
    if (process.env.NODE_ENV !== 'test') {
      console.warn(`⚠️  [CONFIG] ${key} not set, auto-generated for development`);
    }
    return generated;
  }

  throw new Error(
    `❌ FATAL: ${key} is required in production!\n` +
    `   Set it in your environment variables or .env file.`
  );
}

/**
 * Get optional environment variable with default
 */
function getOptional(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

/**
 * Get boolean environment variable
 */
function getBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (!value) return defaultValue;
  return value.toLowerCase() === 'true';
}

/**
 * Get number environment variable
 */
function getNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Get one of a closed set of values, falling back to the default
 */
function getChoice<T extends string>(key: string, choices: readonly T[], defaultValue: T): T {
  const value = process.env[key];
  const match = choices.find(choice => choice === value);
  return match ?? defaultValue;
}

/**
 * Parse CORS origins from comma-separated string
 */
function parseCorsOrigins(value: string): string | string[] {
  if (value === '*') return '*';
  return value.split(',').map(origin => origin.trim()).filter(Boolean);
}

export const GROUP_REGISTRY_BACKENDS = ['memory', 'socket'] as const;
export type GroupRegistryBackend = typeof GROUP_REGISTRY_BACKENDS[number];

export const ADMISSION_POLICIES = ['strict', 'viewer'] as const;
export type AdmissionPolicyName = typeof ADMISSION_POLICIES[number];

const redisEnabled = getBoolean('REDIS_ENABLED', false);

// =============================================================================
// CONFIGURATION OBJECT
// =============================================================================

export const config = {
  // Server
  nodeEnv: getOptional('NODE_ENV', 'development'),
  port: getNumber('PORT', 3000),
  host: getOptional('HOST', 'localhost'),

  // Redis (cross-instance fan-out and trip locks)
  redis: {
    enabled: redisEnabled,
    url: getOptional('REDIS_URL', 'redis://localhost:6379'),
  },

  // JWT - SECURITY CRITICAL
  jwt: {
    secret: getRequired('JWT_SECRET'),
    expiresIn: getOptional('JWT_EXPIRES_IN', '7d'),
  },

  // Dispatch core
  dispatch: {
    groupRegistry: getChoice('GROUP_REGISTRY', GROUP_REGISTRY_BACKENDS, redisEnabled ? 'socket' : 'memory'),
    admission: getChoice('DISPATCH_ADMISSION', ADMISSION_POLICIES, 'strict'),
  },

  // Storage collaborator protection
  storage: {
    timeoutMs: getNumber('STORAGE_TIMEOUT_MS', 5000),
    failureThreshold: getNumber('STORAGE_FAILURE_THRESHOLD', 5),
    resetTimeoutMs: getNumber('STORAGE_RESET_TIMEOUT_MS', 10000),
    dbFile: getOptional('DB_FILE', ''),
  },

  // Per-trip mutual exclusion
  tripLock: {
    ttlMs: getNumber('TRIP_LOCK_TTL_MS', 5000),
    waitMs: getNumber('TRIP_LOCK_WAIT_MS', 3000),
  },

  // Logging
  logLevel: getOptional('LOG_LEVEL', 'debug'),

  // CORS - Parsed into array for production
  cors: {
    origin: parseCorsOrigins(getOptional('CORS_ORIGIN', '*')),
  },

  // Helpers
  isProduction: getOptional('NODE_ENV', 'development') === 'production',
  isDevelopment: getOptional('NODE_ENV', 'development') === 'development',
  isTest: getOptional('NODE_ENV', 'development') === 'test',
} as const;

export type AppConfig = typeof config;

// =============================================================================
// STARTUP VALIDATION
// =============================================================================

/**
 * Validate configuration at startup
 * Fails fast if critical config is missing
 */
function validateConfig(): void {
  const warnings: string[] = [];
  const errors: string[] = [];

  if (config.isProduction) {
    if (config.cors.origin === '*') {
      warnings.push('CORS_ORIGIN is set to "*" - this should be restricted in production');
    }

    if (!config.redis.enabled) {
      warnings.push('REDIS_ENABLED is false - group fan-out is limited to this instance');
    }

    if (config.dispatch.groupRegistry === 'memory' && config.redis.enabled) {
      warnings.push('GROUP_REGISTRY=memory ignores the Redis adapter - broadcasts stay on this instance');
    }
  }

  if (config.isProduction && config.jwt.secret.length < 32) {
    errors.push('JWT_SECRET must be at least 32 characters in production');
  }

  if (warnings.length > 0) {
    console.warn('\n⚠️  Configuration Warnings:');
    warnings.forEach(w => console.warn(`   - ${w}`));
    console.warn('');
  }

  if (errors.length > 0) {
    throw new Error(`Configuration Errors:\n${errors.map(e => `  - ${e}`).join('\n')}`);
  }
}

validateConfig();
