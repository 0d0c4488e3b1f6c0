/**
 * =============================================================================
 * APPLICATION ERROR CLASSES
 * =============================================================================
 *
 * Standardized error handling for the dispatch core.
 *
 * USAGE:
 * ```typescript
 * // In service
 * throw new TripNotFoundError(tripId);
 *
 * // In a message handler
 * throw ValidationError.fromZodError(parsed.error);
 * ```
 *
 * Every error thrown inside a session handler is turned into an `error`
 * envelope for the originating connection; none of them close the connection.
 * =============================================================================
 */

import { ErrorCode, HTTP_STATUS } from '../constants';

/**
 * Base Application Error
 * All custom errors extend this class
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: ErrorCode | string;
  public readonly isOperational: boolean;
  public readonly retryable: boolean;
  public readonly details?: Record<string, unknown>;
  public readonly timestamp: string;

  constructor(
    message: string,
    statusCode: number = HTTP_STATUS.INTERNAL_ERROR,
    code: ErrorCode | string = ErrorCode.INTERNAL_ERROR,
    isOperational: boolean = true,
    details?: Record<string, unknown>,
    retryable: boolean = false
  ) {
    super(message);

    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    this.retryable = retryable;
    this.details = details;
    this.timestamp = new Date().toISOString();

    Error.captureStackTrace(this, this.constructor);

    // Set prototype explicitly (TypeScript issue with extending Error)
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Convert error to JSON response format
   */
  toJSON(): ErrorResponse {
    return {
      success: false,
      error: {
        code: this.code,
        message: this.message,
        details: this.details,
        retryable: this.retryable,
        timestamp: this.timestamp,
        ...(process.env.NODE_ENV === 'development' && { stack: this.stack })
      }
    };
  }
}

/**
 * Error response format (HTTP surface)
 */
export interface ErrorResponse {
  success: false;
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
    retryable: boolean;
    timestamp: string;
    stack?: string;
  };
}

// =============================================================================
// SPECIFIC ERROR CLASSES
// =============================================================================

/**
 * 400 Validation Error - Schema/input validation failed
 */
export class ValidationError extends AppError {
  public readonly errors: ValidationErrorDetail[];

  constructor(
    message: string = 'Validation failed',
    errors: ValidationErrorDetail[] = [],
    code: ErrorCode | string = ErrorCode.VALIDATION_ERROR
  ) {
    super(message, HTTP_STATUS.BAD_REQUEST, code, true, errors.length > 0 ? { errors } : undefined);
    this.errors = errors;
  }

  static fromZodError(
    zodError: { errors: Array<{ path: (string | number)[]; message: string }> },
    message: string = 'Validation failed'
  ): ValidationError {
    const errors = zodError.errors.map(err => ({
      field: err.path.join('.'),
      message: err.message
    }));
    return new ValidationError(message, errors);
  }
}

export interface ValidationErrorDetail {
  field: string;
  message: string;
}

/**
 * 401 Unauthorized - Authentication required or failed
 */
export class UnauthorizedError extends AppError {
  constructor(
    message: string = 'Authentication required',
    code: ErrorCode | string = ErrorCode.AUTH_REQUIRED
  ) {
    super(message, HTTP_STATUS.UNAUTHORIZED, code, true);
  }
}

/**
 * 403 Forbidden - Authenticated but not allowed
 */
export class ForbiddenError extends AppError {
  constructor(
    message: string = 'Access forbidden',
    code: ErrorCode | string = ErrorCode.FORBIDDEN,
    details?: Record<string, unknown>
  ) {
    super(message, HTTP_STATUS.FORBIDDEN, code, true, details);
  }
}

/**
 * 404 Not Found - Resource doesn't exist
 */
export class NotFoundError extends AppError {
  constructor(
    message: string = 'Resource not found',
    code: ErrorCode | string = ErrorCode.NOT_FOUND,
    details?: Record<string, unknown>
  ) {
    super(message, HTTP_STATUS.NOT_FOUND, code, true, details);
  }
}

/**
 * 409 Conflict - Resource already exists or state conflict
 */
export class ConflictError extends AppError {
  constructor(
    message: string,
    code: ErrorCode | string = ErrorCode.TRIP_COMPLETED,
    details?: Record<string, unknown>
  ) {
    super(message, HTTP_STATUS.CONFLICT, code, true, details);
  }
}

/**
 * 503 Service Unavailable - Collaborator timed out or is failing.
 * Always retryable; retry policy belongs to the caller.
 */
export class ServiceUnavailableError extends AppError {
  constructor(
    message: string = 'Service temporarily unavailable',
    code: ErrorCode | string = ErrorCode.STORAGE_UNAVAILABLE,
    details?: Record<string, unknown>
  ) {
    super(message, HTTP_STATUS.SERVICE_UNAVAILABLE, code, true, details, true);
  }
}

// =============================================================================
// DOMAIN-SPECIFIC ERRORS
// =============================================================================

export class TripNotFoundError extends NotFoundError {
  constructor(tripId: string) {
    super(`Trip not found: ${tripId}`, ErrorCode.TRIP_NOT_FOUND, { tripId });
  }
}

export class PrincipalNotFoundError extends NotFoundError {
  constructor(principalId: string) {
    super(`Principal not found: ${principalId}`, ErrorCode.PRINCIPAL_NOT_FOUND, { principalId });
  }
}

export class InvalidTransitionError extends ValidationError {
  constructor(from: string, to: string) {
    super(
      `Cannot move trip from ${from} to ${to}`,
      [{ field: 'status', message: `${from} -> ${to} is not a forward transition` }],
      ErrorCode.INVALID_STATUS_TRANSITION
    );
  }
}

// =============================================================================
// ERROR TYPE GUARDS
// =============================================================================

/**
 * Check if error is an operational (expected) error
 */
export function isOperationalError(error: unknown): error is AppError {
  return error instanceof AppError && error.isOperational;
}
