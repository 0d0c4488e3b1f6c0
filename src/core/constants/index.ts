/**
 * =============================================================================
 * CORE CONSTANTS - Single Source of Truth
 * =============================================================================
 *
 * All application-wide constants in one place.
 *
 * - No magic strings/numbers scattered in code
 * - Type safety with enums
 * =============================================================================
 */

// =============================================================================
// USER ROLES
// =============================================================================

/**
 * Principal roles in the system
 */
export enum UserRole {
  DRIVER = 'DRIVER',
  RIDER = 'RIDER',
  OWNER = 'OWNER'
}

// =============================================================================
// TRIP STATUS
// =============================================================================

/**
 * Trip lifecycle states, strictly forward
 */
export enum TripStatus {
  REQUESTED = 'REQUESTED',
  STARTED = 'STARTED',
  IN_PROGRESS = 'IN_PROGRESS',
  COMPLETED = 'COMPLETED'
}

/**
 * Lifecycle order. Index position is the rank used for transition checks.
 */
export const TRIP_STATUS_ORDER: readonly TripStatus[] = [
  TripStatus.REQUESTED,
  TripStatus.STARTED,
  TripStatus.IN_PROGRESS,
  TripStatus.COMPLETED
];

/**
 * Allowed next status for each state (single step)
 */
export const TRIP_STATUS_TRANSITIONS: Record<TripStatus, TripStatus[]> = {
  [TripStatus.REQUESTED]: [TripStatus.STARTED],
  [TripStatus.STARTED]: [TripStatus.IN_PROGRESS],
  [TripStatus.IN_PROGRESS]: [TripStatus.COMPLETED],
  [TripStatus.COMPLETED]: []
};

// =============================================================================
// DISPATCH PROTOCOL
// =============================================================================

/**
 * Message type tags carried in the `type` field of every envelope
 */
export const MessageType = {
  ECHO: 'echo.message',
  CREATE_TRIP: 'create.trip',
  UPDATE_TRIP: 'update.trip',
  ERROR: 'error'
} as const;

/**
 * socket.io event that carries envelopes in both directions
 */
export const SOCKET_MESSAGE_EVENT = 'message';

/**
 * Fixed group every driver connection joins
 */
export const DRIVER_POOL_GROUP = 'drivers';

/**
 * Group name for a trip
 */
export const tripGroup = (tripId: string): string => `trip:${tripId}`;

// =============================================================================
// HTTP STATUS CODES
// =============================================================================

export const HTTP_STATUS = {
  OK: 200,
  BAD_REQUEST: 400,
  UNAUTHORIZED: 401,
  FORBIDDEN: 403,
  NOT_FOUND: 404,
  CONFLICT: 409,
  INTERNAL_ERROR: 500,
  SERVICE_UNAVAILABLE: 503
} as const;

// =============================================================================
// ERROR CODES
// =============================================================================

export enum ErrorCode {
  // Admission
  AUTH_REQUIRED = 'AUTH_REQUIRED',
  PRINCIPAL_INACTIVE = 'PRINCIPAL_INACTIVE',
  ROLE_NOT_ALLOWED = 'ROLE_NOT_ALLOWED',
  FORBIDDEN = 'FORBIDDEN',

  // Protocol
  INVALID_MESSAGE = 'INVALID_MESSAGE',
  UNKNOWN_MESSAGE_TYPE = 'UNKNOWN_MESSAGE_TYPE',
  VALIDATION_ERROR = 'VALIDATION_ERROR',

  // Trips
  TRIP_NOT_FOUND = 'TRIP_NOT_FOUND',
  TRIP_COMPLETED = 'TRIP_COMPLETED',
  INVALID_STATUS_TRANSITION = 'INVALID_STATUS_TRANSITION',
  TRIP_LOCKED = 'TRIP_LOCKED',

  // Principals
  PRINCIPAL_NOT_FOUND = 'PRINCIPAL_NOT_FOUND',
  PHONE_ALREADY_REGISTERED = 'PHONE_ALREADY_REGISTERED',

  // Collaborators
  STORAGE_UNAVAILABLE = 'STORAGE_UNAVAILABLE',

  // General
  NOT_FOUND = 'NOT_FOUND',
  INTERNAL_ERROR = 'INTERNAL_ERROR'
}

// =============================================================================
// VALIDATION PATTERNS
// =============================================================================

export const REGEX = {
  PHONE: /^\d{10}$/
} as const;
