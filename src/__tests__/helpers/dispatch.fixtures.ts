/**
 * Shared builders for dispatch tests: principals, fake connections and a
 * trip service wired to an in-memory store.
 */

import { InMemoryStore } from '../../shared/database/db';
import { CircuitBreaker } from '../../shared/resilience/circuit-breaker';
import { StorageService } from '../../shared/database/repository.interface';
import { Connection, OutboundMessage } from '../../modules/dispatch/dispatch.types';
import { InProcessTripLock, TripLock } from '../../modules/trip/trip-lock';
import { TripService, createStorageBreaker } from '../../modules/trip/trip.service';
import { Principal, createDriver, createOwner, createRider } from '../../modules/user/principal';

export const rider = (id = 'rider-1', phoneNumber = '9000000001'): Principal =>
  createRider({ id, phoneNumber, firstName: 'Riya', isActive: true });

export const driver = (id = 'driver-1', phoneNumber = '9000000002'): Principal =>
  createDriver({ id, phoneNumber, firstName: 'Dev', isActive: true });

export const owner = (id = 'owner-1', phoneNumber = '9000000003'): Principal =>
  createOwner({ id, phoneNumber, firstName: 'Omar', isActive: true });

/**
 * Connection that records what it is sent
 */
export class FakeConnection implements Connection {
  readonly groups = new Set<string>();
  readonly received: OutboundMessage[] = [];

  constructor(readonly id: string, readonly principal: Principal | null = null) { }

  deliver(message: OutboundMessage): void {
    this.received.push(message);
  }

  typesReceived(): string[] {
    return this.received.map(m => m.type);
  }
}

export interface TripHarness {
  storage: InMemoryStore;
  trips: TripService;
  breaker: CircuitBreaker;
}

export async function buildTrips(
  principals: Principal[] = [],
  options: { storage?: StorageService; lock?: TripLock; requestTimeout?: number } = {}
): Promise<TripHarness & { service: StorageService }> {
  const storage = new InMemoryStore();
  for (const p of principals) {
    await storage.savePrincipal(p);
  }

  const service = options.storage ?? storage;
  const breaker = createStorageBreaker({ requestTimeout: options.requestTimeout ?? 1000 });
  const trips = new TripService({
    storage: service,
    lock: options.lock ?? new InProcessTripLock(),
    breaker
  });

  return { storage, trips, breaker, service };
}

/**
 * Let queued promise chains run
 */
export const flush = (): Promise<void> => new Promise(resolve => setImmediate(resolve));
