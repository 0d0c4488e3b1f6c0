/**
 * =============================================================================
 * TRIP LOCK - Per-trip mutual exclusion for writes
 * =============================================================================
 *
 * Updates to one trip run one at a time; different trips never wait on each
 * other.
 *
 * - InProcessTripLock  keyed promise chain (single instance)
 * - RedisTripLock      SET NX PX lock shared by all instances
 * =============================================================================
 */

import { v4 as uuidv4 } from 'uuid';
import { ErrorCode, ServiceUnavailableError } from '../../core';
import { LockBackend } from '../../shared/services/redis.service';
import { logger } from '../../shared/services/logger.service';

export interface TripLock {
  runExclusive<T>(tripId: string, fn: () => Promise<T>): Promise<T>;
}

export class InProcessTripLock implements TripLock {
  // Tail of each trip's queue; always settles without rejecting
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(tripId: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(tripId) ?? Promise.resolve();
    const run = previous.then(fn);
    const tail = run.then(() => undefined, () => undefined);
    this.tails.set(tripId, tail);

    try {
      return await run;
    } finally {
      if (this.tails.get(tripId) === tail) {
        this.tails.delete(tripId);
      }
    }
  }

  /**
   * Trips with a write queued or running
   */
  activeCount(): number {
    return this.tails.size;
  }
}

export interface RedisTripLockOptions {
  ttlMs: number;
  waitMs: number;
  pollIntervalMs?: number;
}

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

export class RedisTripLock implements TripLock {
  private readonly pollIntervalMs: number;

  constructor(
    private readonly backend: LockBackend,
    private readonly options: RedisTripLockOptions
  ) {
    this.pollIntervalMs = options.pollIntervalMs ?? 25;
  }

  async runExclusive<T>(tripId: string, fn: () => Promise<T>): Promise<T> {
    const key = `trip:${tripId}`;
    const holderId = uuidv4();
    const deadline = Date.now() + this.options.waitMs;

    while (!(await this.acquire(tripId, key, holderId))) {
      if (Date.now() >= deadline) {
        throw new ServiceUnavailableError(
          'Trip is being updated by another request',
          ErrorCode.TRIP_LOCKED,
          { tripId }
        );
      }
      await sleep(this.pollIntervalMs);
    }

    try {
      return await fn();
    } finally {
      await this.release(tripId, key, holderId);
    }
  }

  /**
   * Backend failures surface as a retryable STORAGE_UNAVAILABLE
   */
  private async acquire(tripId: string, key: string, holderId: string): Promise<boolean> {
    try {
      return await this.backend.acquireLock(key, holderId, this.options.ttlMs);
    } catch (error) {
      logger.error('[TripLock] Acquire failed', {
        tripId,
        error: error instanceof Error ? error.message : String(error)
      });
      throw new ServiceUnavailableError('Trip lock unavailable, try again', ErrorCode.STORAGE_UNAVAILABLE, {
        tripId,
        operation: 'acquireLock'
      });
    }
  }

  /**
   * Runs after the write has committed. A lock left behind expires with its TTL.
   */
  private async release(tripId: string, key: string, holderId: string): Promise<void> {
    try {
      const released = await this.backend.releaseLock(key, holderId);
      if (!released) {
        logger.warn('[TripLock] Lock expired before release', { tripId, ttlMs: this.options.ttlMs });
      }
    } catch (error) {
      logger.error('[TripLock] Release failed, lock expires with its TTL', {
        tripId,
        ttlMs: this.options.ttlMs,
        error: error instanceof Error ? error.message : String(error)
      });
    }
  }
}
