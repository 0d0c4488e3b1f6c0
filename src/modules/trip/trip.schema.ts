/**
 * =============================================================================
 * TRIP MODULE - VALIDATION SCHEMAS & VIEW TYPES
 * =============================================================================
 *
 * Payloads of the `create.trip` and `update.trip` messages, and the trip
 * view broadcast to connections.
 * =============================================================================
 */

import { z } from 'zod';
import { TripStatus } from '../../core/constants';
import { PrincipalSummary } from '../user/principal';

export const tripStatusSchema = z.nativeEnum(TripStatus);

/**
 * Free-text address; anything non-blank up to 255 characters
 */
export const addressSchema = z
  .string()
  .max(255, 'Address must be at most 255 characters')
  .refine(value => value.trim().length > 0, 'Address is required');

export const createTripSchema = z.object({
  pickup: addressSchema,
  dropoff: addressSchema,
  /** Rider id; defaults to the sender */
  rider: z.string().min(1).optional()
});

export const updateTripSchema = z.object({
  id: z.string().min(1, 'Trip id is required'),
  pickup: addressSchema.optional(),
  dropoff: addressSchema.optional(),
  status: tripStatusSchema.optional(),
  /** Driver id, or null to unassign */
  driver: z.string().min(1).nullable().optional()
});

export type CreateTripPayload = z.infer<typeof createTripSchema>;
export type UpdateTripPayload = z.infer<typeof updateTripSchema>;

/**
 * Trip as sent over the wire, with rider and driver expanded
 */
export interface TripView {
  id: string;
  pickup: string;
  dropoff: string;
  status: TripStatus;
  rider: PrincipalSummary | null;
  driver: PrincipalSummary | null;
  createdAt: string;
  updatedAt: string;
}
