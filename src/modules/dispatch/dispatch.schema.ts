/**
 * Inbound envelope: { type, data } plus optional routing fields.
 * Unknown top-level keys are kept so echo can return the message untouched.
 */

import { z } from 'zod';
import { ValidationError } from '../../core';

export const inboundEnvelopeSchema = z
  .object({
    type: z.string().min(1, 'Message type is required'),
    data: z.unknown(),
    /** Administrative echo target */
    group: z.string().min(1).optional()
  })
  .passthrough();

export type InboundMessage = z.infer<typeof inboundEnvelopeSchema>;

/**
 * Parse a message payload or throw a ValidationError naming the fields
 */
export function parsePayload<T extends z.ZodTypeAny>(schema: T, data: unknown, type: string): z.infer<T> {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    throw ValidationError.fromZodError(parsed.error, `Invalid ${type} payload`);
  }
  return parsed.data;
}
