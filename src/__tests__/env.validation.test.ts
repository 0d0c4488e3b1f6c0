/**
 * =============================================================================
 * ENVIRONMENT VALIDATION
 * =============================================================================
 *
 * Startup checks on the dispatch configuration.
 * =============================================================================
 */

import { validateEnvironment } from '../core/config/env.validation';

jest.mock('../shared/services/logger.service', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

describe('Environment validation', () => {
  it('should pass with defaults outside production', () => {
    const result = validateEnvironment({ NODE_ENV: 'test' });

    expect(result.valid).toBe(true);
    expect(result.errors).toEqual([]);
    expect(result.loaded.DISPATCH_ADMISSION).toBe('strict');
    expect(result.loaded.PORT).toBe('3000');
  });

  it('should require a JWT secret in production', () => {
    const result = validateEnvironment({ NODE_ENV: 'production', REDIS_ENABLED: 'true' });

    expect(result.valid).toBe(false);
    expect(result.errors).toContain('JWT_SECRET is required in production');
  });

  it('should never echo the JWT secret', () => {
    const result = validateEnvironment({ NODE_ENV: 'test', JWT_SECRET: 'short' });

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      'Invalid value for JWT_SECRET: "[REDACTED]" - JWT signing secret (min 32 characters)'
    ]);
  });

  it('should reject an unknown group registry backend', () => {
    const result = validateEnvironment({ NODE_ENV: 'test', GROUP_REGISTRY: 'kafka' });

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      'Invalid value for GROUP_REGISTRY: "kafka" - Group registry backend (memory | socket)'
    ]);
  });

  it('should warn when socket rooms run without Redis', () => {
    const result = validateEnvironment({ NODE_ENV: 'test', GROUP_REGISTRY: 'socket' });

    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual([
      'GROUP_REGISTRY=socket without Redis only reaches connections on this instance'
    ]);
  });

  it('should reject a non-numeric storage timeout', () => {
    const result = validateEnvironment({ NODE_ENV: 'test', STORAGE_TIMEOUT_MS: 'soon' });

    expect(result.errors).toEqual([
      'Invalid value for STORAGE_TIMEOUT_MS: "soon" - Timeout for a single storage call'
    ]);
  });
});
