/**
 * =============================================================================
 * CORE MODULE - Central Exports
 * =============================================================================
 *
 * Single entry point for constants, errors and environment validation.
 *
 * USAGE:
 * ```typescript
 * import { UserRole, TripStatus, AppError, TripNotFoundError } from '../../core';
 * ```
 * =============================================================================
 */

// Constants & Enums
export * from './constants';

// Error Classes
export * from './errors/AppError';

// Environment Validation
export * from './config/env.validation';
