/**
 * =============================================================================
 * TRIP SERVICE - Trip lifecycle state machine
 * =============================================================================
 *
 * REQUESTED -> STARTED -> IN_PROGRESS -> COMPLETED
 *
 * RULES:
 * - Status only moves forward. Skipping a state is allowed but logged;
 *   moving backward is rejected.
 * - A COMPLETED trip is read-only.
 * - Only the rider, the driver, a driver claiming an unassigned trip, or an
 *   owner may update a trip. Non-owners can only assign themselves.
 * - Writes to one trip are serialized through the TripLock.
 *
 * Persistence belongs to the StorageService; every call goes through the
 * storage circuit breaker. Nothing is cached between requests.
 * =============================================================================
 */

import {
  AppError,
  ConflictError,
  ErrorCode,
  ForbiddenError,
  InvalidTransitionError,
  PrincipalNotFoundError,
  ServiceUnavailableError,
  TRIP_STATUS_ORDER,
  TRIP_STATUS_TRANSITIONS,
  TripNotFoundError,
  TripStatus,
  UserRole,
  ValidationError
} from '../../core';
import {
  StorageService,
  TripFieldChanges,
  TripRecord
} from '../../shared/database/repository.interface';
import { CircuitBreaker, CircuitBreakerOptions } from '../../shared/resilience/circuit-breaker';
import { logger } from '../../shared/services/logger.service';
import { Principal, PrincipalSummary, isStaff, toPrincipalSummary } from '../user/principal';
import { TripLock } from './trip-lock';
import { TripView } from './trip.schema';

export interface CreateTripInput {
  pickup: string;
  dropoff: string;
  /** Defaults to the acting principal */
  riderId?: string;
}

export interface UpdateTripInput {
  id: string;
  pickup?: string;
  dropoff?: string;
  status?: TripStatus;
  /** null unassigns the driver */
  driverId?: string | null;
}

export type TransitionCheck = 'unchanged' | 'next' | 'skip' | 'backward';

/**
 * Classify a status change against the forward-only lifecycle
 */
export function checkTransition(from: TripStatus, to: TripStatus): TransitionCheck {
  if (from === to) return 'unchanged';
  if (TRIP_STATUS_TRANSITIONS[from].includes(to)) return 'next';
  return TRIP_STATUS_ORDER.indexOf(to) > TRIP_STATUS_ORDER.indexOf(from) ? 'skip' : 'backward';
}

/**
 * Breaker for storage calls. Application errors are answers, not failures.
 */
export function createStorageBreaker(
  options: Omit<CircuitBreakerOptions, 'name' | 'isFailure'> = {}
): CircuitBreaker {
  return new CircuitBreaker({
    name: 'storage',
    ...options,
    isFailure: (error) => !(error instanceof AppError)
  });
}

export interface TripServiceDeps {
  storage: StorageService;
  lock: TripLock;
  breaker: CircuitBreaker;
}

export class TripService {
  constructor(private readonly deps: TripServiceDeps) { }

  async create(input: CreateTripInput, actor: Principal): Promise<TripView> {
    const riderId = input.riderId ?? actor.id;

    if (riderId !== actor.id) {
      if (!isStaff(actor)) {
        throw new ForbiddenError('Cannot request a trip for another rider');
      }
      const rider = await this.callStorage('getPrincipal', () => this.deps.storage.getPrincipal(riderId));
      if (!rider) {
        throw new PrincipalNotFoundError(riderId);
      }
    }

    const record = await this.callStorage('createTrip', () =>
      this.deps.storage.createTrip({
        pickup: input.pickup,
        dropoff: input.dropoff,
        riderId
      })
    );

    logger.info('[Trips] Trip requested', { tripId: record.id, riderId, by: actor.id });
    return this.toView(record);
  }

  async update(input: UpdateTripInput, actor: Principal): Promise<TripView> {
    return this.deps.lock.runExclusive(input.id, async () => {
      const trip = await this.callStorage('getTrip', () => this.deps.storage.getTrip(input.id));
      if (!trip) {
        throw new TripNotFoundError(input.id);
      }

      if (trip.status === TripStatus.COMPLETED) {
        throw new ConflictError('Trip is already completed', ErrorCode.TRIP_COMPLETED, { tripId: trip.id });
      }

      this.authorizeUpdate(trip, input, actor);

      const changes: TripFieldChanges = {};
      if (input.pickup !== undefined) changes.pickup = input.pickup;
      if (input.dropoff !== undefined) changes.dropoff = input.dropoff;

      if (input.status !== undefined) {
        const check = checkTransition(trip.status, input.status);
        if (check === 'backward') {
          logger.warn('[Trips] Rejected backward status transition', {
            tripId: trip.id,
            from: trip.status,
            to: input.status,
            by: actor.id
          });
          throw new InvalidTransitionError(trip.status, input.status);
        }
        if (check === 'skip') {
          logger.warn('[Trips] Status transition skipped a state', {
            tripId: trip.id,
            from: trip.status,
            to: input.status,
            by: actor.id
          });
        }
        changes.status = input.status;
      }

      if (input.driverId !== undefined) {
        if (input.driverId !== null) {
          await this.assertDriver(input.driverId);
        }
        changes.driverId = input.driverId;
      }

      const updated = await this.callStorage('updateTrip', () => this.deps.storage.updateTrip(trip.id, changes));
      if (!updated) {
        throw new TripNotFoundError(trip.id);
      }

      logger.info('[Trips] Trip updated', {
        tripId: updated.id,
        status: updated.status,
        driverId: updated.driverId,
        by: actor.id
      });
      return this.toView(updated);
    });
  }

  /**
   * Trips the principal participates in that are not completed
   */
  async findOpenTripsFor(principalId: string): Promise<TripRecord[]> {
    return this.callStorage('findOpenTripsForParticipant', () =>
      this.deps.storage.findOpenTripsForParticipant(principalId)
    );
  }

  async toView(record: TripRecord): Promise<TripView> {
    const [rider, driver] = await Promise.all([
      this.summarize(record.riderId),
      this.summarize(record.driverId)
    ]);

    return {
      id: record.id,
      pickup: record.pickup,
      dropoff: record.dropoff,
      status: record.status,
      rider,
      driver,
      createdAt: record.createdAt,
      updatedAt: record.updatedAt
    };
  }

  private authorizeUpdate(trip: TripRecord, input: UpdateTripInput, actor: Principal): void {
    if (isStaff(actor)) return;

    const isRider = trip.riderId !== null && trip.riderId === actor.id;
    const isDriver = trip.driverId !== null && trip.driverId === actor.id;
    const isClaiming = trip.driverId === null
      && actor.role === UserRole.DRIVER
      && input.driverId === actor.id;

    if (!isRider && !isDriver && !isClaiming) {
      throw new ForbiddenError('Only the rider or driver of this trip can update it', ErrorCode.FORBIDDEN, {
        tripId: trip.id
      });
    }

    if (input.driverId === undefined || input.driverId === trip.driverId) return;

    const assigningSelf = input.driverId === actor.id;
    const releasingSelf = input.driverId === null && isDriver;
    if (!assigningSelf && !releasingSelf) {
      throw new ForbiddenError('Drivers can only be assigned by themselves', ErrorCode.FORBIDDEN, {
        tripId: trip.id
      });
    }
  }

  private async assertDriver(driverId: string): Promise<void> {
    const driver = await this.callStorage('getPrincipal', () => this.deps.storage.getPrincipal(driverId));
    if (!driver || driver.role !== UserRole.DRIVER) {
      throw new ValidationError('Assigned driver is not a driver', [
        { field: 'driver', message: `${driverId} is not a registered driver` }
      ]);
    }
  }

  private async summarize(principalId: string | null): Promise<PrincipalSummary | null> {
    if (principalId === null) return null;
    const principal = await this.callStorage('getPrincipal', () => this.deps.storage.getPrincipal(principalId));
    return principal ? toPrincipalSummary(principal) : null;
  }

  /**
   * Run a storage call through the breaker. Anything that is not an
   * application error surfaces as a retryable STORAGE_UNAVAILABLE.
   */
  private async callStorage<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await this.deps.breaker.execute(fn);
    } catch (error) {
      if (error instanceof AppError) throw error;

      logger.error(`[Trips] Storage ${operation} failed`, {
        error: error instanceof Error ? error.message : String(error)
      });
      throw new ServiceUnavailableError('Storage service unavailable, try again', ErrorCode.STORAGE_UNAVAILABLE, {
        operation
      });
    }
  }
}
