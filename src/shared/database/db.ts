/**
 * =============================================================================
 * DATABASE SERVICE - In-process store with optional JSON file persistence
 * =============================================================================
 *
 * Bundled StorageService implementation for single-instance deployments and
 * tests. When a file path is given, the whole database is written to it after
 * every mutation and read back on startup.
 * =============================================================================
 */

import * as fs from 'fs';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { ConflictError, ErrorCode, TripStatus } from '../../core';
import { Principal, principalSchema } from '../../modules/user/principal';
import { logger } from '../services/logger.service';
import {
  NewTripFields,
  StorageService,
  TripFieldChanges,
  TripRecord
} from './repository.interface';

const tripRecordSchema = z.object({
  id: z.string(),
  pickup: z.string(),
  dropoff: z.string(),
  status: z.nativeEnum(TripStatus),
  riderId: z.string().nullable(),
  driverId: z.string().nullable(),
  createdAt: z.string(),
  updatedAt: z.string()
});

const databaseSchema = z.object({
  principals: z.array(principalSchema),
  trips: z.array(tripRecordSchema),
  _meta: z.object({
    version: z.string(),
    lastUpdated: z.string()
  })
});

export type Database = z.infer<typeof databaseSchema>;

const DB_VERSION = '1.0.0';

export interface InMemoryStoreOptions {
  /** JSON file to persist to; in-memory only when omitted */
  filePath?: string;
}

export class InMemoryStore implements StorageService {
  private readonly principals = new Map<string, Principal>();
  private readonly trips = new Map<string, TripRecord>();
  private readonly filePath?: string;

  constructor(options: InMemoryStoreOptions = {}) {
    this.filePath = options.filePath || undefined;
    if (this.filePath) {
      this.load(this.filePath);
    }
  }

  async getPrincipal(id: string): Promise<Principal | null> {
    const principal = this.principals.get(id);
    return principal ? { ...principal } : null;
  }

  async savePrincipal(principal: Principal): Promise<Principal> {
    for (const existing of this.principals.values()) {
      if (existing.phoneNumber === principal.phoneNumber && existing.id !== principal.id) {
        throw new ConflictError(
          'Phone number already registered',
          ErrorCode.PHONE_ALREADY_REGISTERED
        );
      }
    }

    this.principals.set(principal.id, { ...principal });
    this.persist();
    return { ...principal };
  }

  async createTrip(fields: NewTripFields): Promise<TripRecord> {
    const now = new Date().toISOString();
    const trip: TripRecord = {
      id: uuidv4(),
      pickup: fields.pickup,
      dropoff: fields.dropoff,
      status: TripStatus.REQUESTED,
      riderId: fields.riderId,
      driverId: null,
      createdAt: now,
      updatedAt: now
    };

    this.trips.set(trip.id, trip);
    this.persist();
    return { ...trip };
  }

  async getTrip(id: string): Promise<TripRecord | null> {
    const trip = this.trips.get(id);
    return trip ? { ...trip } : null;
  }

  async updateTrip(id: string, changes: TripFieldChanges): Promise<TripRecord | null> {
    const trip = this.trips.get(id);
    if (!trip) return null;

    const updated: TripRecord = {
      ...trip,
      ...changes,
      updatedAt: new Date().toISOString()
    };

    this.trips.set(id, updated);
    this.persist();
    return { ...updated };
  }

  async findOpenTripsForParticipant(principalId: string): Promise<TripRecord[]> {
    return Array.from(this.trips.values())
      .filter(trip =>
        trip.status !== TripStatus.COMPLETED &&
        (trip.riderId === principalId || trip.driverId === principalId)
      )
      .map(trip => ({ ...trip }));
  }

  /**
   * Snapshot of the whole database (used for persistence and diagnostics)
   */
  snapshot(): Database {
    return {
      principals: Array.from(this.principals.values()),
      trips: Array.from(this.trips.values()),
      _meta: {
        version: DB_VERSION,
        lastUpdated: new Date().toISOString()
      }
    };
  }

  private load(filePath: string): void {
    if (!fs.existsSync(filePath)) {
      logger.info(`[DB] No database file at ${filePath}, starting empty`);
      return;
    }

    const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    const parsed = databaseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new Error(`Database file ${filePath} is not a valid dispatch database: ${parsed.error.message}`);
    }

    parsed.data.principals.forEach(p => this.principals.set(p.id, p));
    parsed.data.trips.forEach(t => this.trips.set(t.id, t));
    logger.info(`[DB] Loaded ${this.principals.size} principals and ${this.trips.size} trips from ${filePath}`);
  }

  private persist(): void {
    if (!this.filePath) return;

    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    fs.writeFileSync(this.filePath, JSON.stringify(this.snapshot(), null, 2));
  }
}
