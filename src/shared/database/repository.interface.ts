/**
 * =============================================================================
 * STORAGE INTERFACE - Persistence Abstraction Layer
 * =============================================================================
 *
 * The dispatch core never touches a database directly. Principals and trips
 * are read and written through this contract. Implementations can be:
 *   - InMemoryStore (bundled, optional JSON file persistence)
 *   - a SQL/HTTP backed store owned by another service
 *
 * Lookups return null for "not found"; any thrown error is treated as a
 * collaborator failure.
 * =============================================================================
 */

import { TripStatus } from '../../core/constants';
import { Principal } from '../../modules/user/principal';

/**
 * Base entity interface - trip records carry these fields
 */
export interface BaseEntity {
  id: string;
  createdAt: string;
  updatedAt: string;
}

export interface TripRecord extends BaseEntity {
  pickup: string;
  dropoff: string;
  status: TripStatus;
  riderId: string | null;
  driverId: string | null;
}

export interface NewTripFields {
  pickup: string;
  dropoff: string;
  riderId: string | null;
}

export type TripFieldChanges = Partial<Pick<TripRecord, 'pickup' | 'dropoff' | 'status' | 'driverId'>>;

export interface StorageService {
  getPrincipal(id: string): Promise<Principal | null>;

  /**
   * Insert a principal. Phone numbers are unique.
   */
  savePrincipal(principal: Principal): Promise<Principal>;

  /**
   * Allocate a trip with status REQUESTED and no driver
   */
  createTrip(fields: NewTripFields): Promise<TripRecord>;

  getTrip(id: string): Promise<TripRecord | null>;

  /**
   * Apply field changes and bump `updatedAt`; null when the trip is unknown
   */
  updateTrip(id: string, changes: TripFieldChanges): Promise<TripRecord | null>;

  /**
   * Trips the principal rides or drives that are not COMPLETED
   */
  findOpenTripsForParticipant(principalId: string): Promise<TripRecord[]>;
}
