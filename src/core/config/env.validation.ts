/**
 * =============================================================================
 * ENVIRONMENT VALIDATION
 * =============================================================================
 *
 * Validates environment variables at startup.
 * Fails fast if configuration is invalid - better than runtime errors.
 *
 * USAGE:
 * ```typescript
 * // At application startup (server.ts)
 * validateAndLogEnvironment(); // Exits in production if invalid
 * ```
 * =============================================================================
 */

import { logger } from '../../shared/services/logger.service';

/**
 * Environment variable definition
 */
interface EnvVar {
  name: string;
  required: boolean;
  default?: string;
  validator?: (value: string) => boolean;
  description: string;
}

const isPositiveInt = (v: string): boolean => !isNaN(parseInt(v, 10)) && parseInt(v, 10) > 0;

/**
 * All environment variables with their requirements
 */
const ENV_VARS: EnvVar[] = [
  // ==========================================================================
  // SERVER
  // ==========================================================================
  {
    name: 'NODE_ENV',
    required: false,
    default: 'development',
    validator: (v) => ['development', 'staging', 'production', 'test'].includes(v),
    description: 'Application environment'
  },
  {
    name: 'PORT',
    required: false,
    default: '3000',
    validator: (v) => isPositiveInt(v) && parseInt(v, 10) < 65536,
    description: 'Server port number'
  },
  {
    name: 'HOST',
    required: false,
    default: '0.0.0.0',
    description: 'Server host address'
  },

  // ==========================================================================
  // TRUST SERVICE
  // ==========================================================================
  {
    name: 'JWT_SECRET',
    required: false, // Auto-generated outside production
    validator: (v) => v.length >= 32,
    description: 'JWT signing secret (min 32 characters)'
  },
  {
    name: 'JWT_EXPIRES_IN',
    required: false,
    default: '7d',
    description: 'JWT access token expiry'
  },

  // ==========================================================================
  // REDIS
  // ==========================================================================
  {
    name: 'REDIS_ENABLED',
    required: false,
    default: 'false',
    validator: (v) => ['true', 'false'].includes(v),
    description: 'Enable the Redis adapter and distributed trip locks'
  },
  {
    name: 'REDIS_URL',
    required: false,
    validator: (v) => v.startsWith('redis://') || v.startsWith('rediss://'),
    description: 'Redis connection URL'
  },

  // ==========================================================================
  // DISPATCH CORE
  // ==========================================================================
  {
    name: 'GROUP_REGISTRY',
    required: false,
    validator: (v) => ['memory', 'socket'].includes(v),
    description: 'Group registry backend (memory | socket)'
  },
  {
    name: 'DISPATCH_ADMISSION',
    required: false,
    default: 'strict',
    validator: (v) => ['strict', 'viewer'].includes(v),
    description: 'Admission policy for new connections (strict | viewer)'
  },
  {
    name: 'STORAGE_TIMEOUT_MS',
    required: false,
    default: '5000',
    validator: isPositiveInt,
    description: 'Timeout for a single storage call'
  },
  {
    name: 'STORAGE_FAILURE_THRESHOLD',
    required: false,
    default: '5',
    validator: isPositiveInt,
    description: 'Storage failures before the circuit opens'
  },
  {
    name: 'STORAGE_RESET_TIMEOUT_MS',
    required: false,
    default: '10000',
    validator: isPositiveInt,
    description: 'How long the storage circuit stays open'
  },
  {
    name: 'TRIP_LOCK_TTL_MS',
    required: false,
    default: '5000',
    validator: isPositiveInt,
    description: 'Expiry of a distributed trip lock'
  },
  {
    name: 'TRIP_LOCK_WAIT_MS',
    required: false,
    default: '3000',
    validator: isPositiveInt,
    description: 'Maximum wait for a trip lock'
  },

  // ==========================================================================
  // LOGGING
  // ==========================================================================
  {
    name: 'LOG_LEVEL',
    required: false,
    default: 'info',
    validator: (v) => ['error', 'warn', 'info', 'debug'].includes(v),
    description: 'Logging level'
  }
];

/**
 * Validation result
 */
export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
  loaded: Record<string, string>;
}

/**
 * Validate all environment variables
 */
export function validateEnvironment(env: NodeJS.ProcessEnv = process.env): ValidationResult {
  const result: ValidationResult = {
    valid: true,
    errors: [],
    warnings: [],
    loaded: {}
  };

  const isProduction = env.NODE_ENV === 'production';

  for (const envVar of ENV_VARS) {
    const value = env[envVar.name];

    if (envVar.required && !value) {
      result.valid = false;
      result.errors.push(`Missing required environment variable: ${envVar.name} - ${envVar.description}`);
      continue;
    }

    if (isProduction) {
      if (envVar.name === 'JWT_SECRET' && !value) {
        result.valid = false;
        result.errors.push('JWT_SECRET is required in production');
      }

      if (envVar.name === 'REDIS_ENABLED' && value !== 'true') {
        result.warnings.push('REDIS_ENABLED should be true in production for cross-instance fan-out');
      }
    }

    const finalValue = value || envVar.default;
    if (finalValue) {
      if (envVar.validator && !envVar.validator(finalValue)) {
        result.valid = false;
        result.errors.push(`Invalid value for ${envVar.name}: "${envVar.name === 'JWT_SECRET' ? '[REDACTED]' : finalValue}" - ${envVar.description}`);
        continue;
      }

      result.loaded[envVar.name] = envVar.name === 'JWT_SECRET' ? '[REDACTED]' : finalValue;
    }
  }

  if (env.GROUP_REGISTRY === 'socket' && env.REDIS_ENABLED !== 'true') {
    result.warnings.push('GROUP_REGISTRY=socket without Redis only reaches connections on this instance');
  }

  return result;
}

/**
 * Validate and log results at startup
 * Exits process if validation fails in production
 */
export function validateAndLogEnvironment(): void {
  const result = validateEnvironment();
  const isProduction = process.env.NODE_ENV === 'production';

  result.errors.forEach(error => {
    logger.error(`Environment validation error: ${error}`);
  });

  result.warnings.forEach(warning => {
    logger.warn(`Environment validation warning: ${warning}`);
  });

  if (result.valid) {
    logger.info('✅ Environment validation passed', {
      mode: process.env.NODE_ENV || 'development',
      redis: process.env.REDIS_ENABLED === 'true' ? 'enabled' : 'disabled',
      admission: result.loaded.DISPATCH_ADMISSION
    });
  }

  if (!result.valid && isProduction) {
    logger.error('Environment validation failed in production. Exiting.');
    process.exit(1);
  }
}
