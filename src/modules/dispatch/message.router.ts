/**
 * =============================================================================
 * MESSAGE ROUTER - Dispatch table for inbound messages
 * =============================================================================
 *
 * TYPES:
 * - echo.message  loop the message back to the sender; staff may target a
 *                 named group instead
 * - create.trip   request a trip, broadcast it to the driver pool
 * - update.trip   change a trip, broadcast it to the trip group
 *
 * Unknown types and malformed envelopes are reported back to the sender as
 * validation errors.
 * =============================================================================
 */

import {
  DRIVER_POOL_GROUP,
  ErrorCode,
  ForbiddenError,
  MessageType,
  UnauthorizedError,
  ValidationError,
  tripGroup
} from '../../core';
import { logger } from '../../shared/services/logger.service';
import { TripView, createTripSchema, updateTripSchema } from '../trip/trip.schema';
import { TripService } from '../trip/trip.service';
import { Principal, isStaff } from '../user/principal';
import { Connection, OutboundMessage } from './dispatch.types';
import { InboundMessage, inboundEnvelopeSchema, parsePayload } from './dispatch.schema';

/**
 * What a handler may do on behalf of its connection
 */
export interface SessionContext {
  readonly connection: Connection;
  readonly principal: Principal | null;
  reply(message: OutboundMessage): void;
  join(group: string): void;
  broadcast(group: string, message: OutboundMessage): void;
  /** Join every live connection of these principals to the group */
  joinParticipants(group: string, participantIds: string[]): void;
  /** Drop connections of non-staff principals that are not listed */
  leaveNonParticipants(group: string, participantIds: string[]): void;
}

export type MessageHandler = (ctx: SessionContext, message: InboundMessage) => Promise<void>;

export type AuthenticatedHandler = (
  ctx: SessionContext,
  message: InboundMessage,
  actor: Principal
) => Promise<void>;

export class MessageRouter {
  private readonly handlers = new Map<string, MessageHandler>();

  /**
   * Register a handler open to anonymous viewers
   */
  on(type: string, handler: MessageHandler): this {
    this.handlers.set(type, handler);
    return this;
  }

  /**
   * Register a handler that requires a resolved principal
   */
  onAuthenticated(type: string, handler: AuthenticatedHandler): this {
    return this.on(type, async (ctx, message) => {
      if (!ctx.principal) {
        throw new UnauthorizedError(`${type} requires an authenticated connection`);
      }
      await handler(ctx, message, ctx.principal);
    });
  }

  types(): string[] {
    return Array.from(this.handlers.keys());
  }

  async dispatch(ctx: SessionContext, raw: unknown): Promise<void> {
    const parsed = inboundEnvelopeSchema.safeParse(raw);
    if (!parsed.success) {
      const invalid = ValidationError.fromZodError(parsed.error, 'Message must be an object with a string type');
      throw new ValidationError(invalid.message, invalid.errors, ErrorCode.INVALID_MESSAGE);
    }

    const message = parsed.data;
    const handler = this.handlers.get(message.type);
    if (!handler) {
      throw new ValidationError(`Unknown message type: ${message.type}`, [], ErrorCode.UNKNOWN_MESSAGE_TYPE);
    }

    await handler(ctx, message);
  }
}

// =============================================================================
// HANDLERS
// =============================================================================

export const echoHandler: MessageHandler = async (ctx, message) => {
  if (message.group === undefined) {
    ctx.reply({ ...message, data: message.data });
    return;
  }

  if (!ctx.principal || !isStaff(ctx.principal)) {
    throw new ForbiddenError('Only staff can echo to a group');
  }

  logger.debug(`[Dispatch] Group echo to ${message.group}`, { by: ctx.principal.id });
  ctx.broadcast(message.group, { type: message.type, data: message.data });
};

export function createTripHandler(trips: TripService): AuthenticatedHandler {
  return async (ctx, message, actor) => {
    const payload = parsePayload(createTripSchema, message.data, message.type);

    const trip = await trips.create(
      { pickup: payload.pickup, dropoff: payload.dropoff, riderId: payload.rider },
      actor
    );

    const outbound: OutboundMessage = { type: MessageType.CREATE_TRIP, data: trip };
    const group = tripGroup(trip.id);
    ctx.join(group);
    ctx.joinParticipants(group, participantsOf(trip));
    ctx.broadcast(DRIVER_POOL_GROUP, outbound);
    ctx.reply(outbound);
  };
}

export function updateTripHandler(trips: TripService): AuthenticatedHandler {
  return async (ctx, message, actor) => {
    const payload = parsePayload(updateTripSchema, message.data, message.type);

    const trip = await trips.update(
      {
        id: payload.id,
        pickup: payload.pickup,
        dropoff: payload.dropoff,
        status: payload.status,
        driverId: payload.driver
      },
      actor
    );

    const group = tripGroup(trip.id);
    const participants = participantsOf(trip);
    ctx.join(group);
    ctx.joinParticipants(group, participants);
    ctx.broadcast(group, { type: MessageType.UPDATE_TRIP, data: trip });
    // A released driver still sees the update that released them
    ctx.leaveNonParticipants(group, participants);
  };
}

function participantsOf(trip: TripView): string[] {
  const ids: string[] = [];
  if (trip.rider) ids.push(trip.rider.id);
  if (trip.driver) ids.push(trip.driver.id);
  return ids;
}

export function createDispatchRouter(trips: TripService): MessageRouter {
  return new MessageRouter()
    .on(MessageType.ECHO, echoHandler)
    .onAuthenticated(MessageType.CREATE_TRIP, createTripHandler(trips))
    .onAuthenticated(MessageType.UPDATE_TRIP, updateTripHandler(trips));
}
