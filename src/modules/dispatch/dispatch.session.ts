/**
 * =============================================================================
 * DISPATCH SESSION - One per admitted connection
 * =============================================================================
 *
 * LIFECYCLE:
 * - open()     drivers join the driver pool; every participant re-joins the
 *              groups of its open trips (reconnects stay transparent)
 * - receive()  inbound messages run one at a time, in arrival order
 * - close()    leave every group; handlers still in flight can broadcast
 *              but can no longer join
 *
 * Trip groups follow participation: when a trip gains a rider or driver,
 * every live session of that principal in this process joins its group.
 * A driver who no longer takes part leaves it after the update is sent.
 *
 * Handler failures never escape the session: they are answered with an
 * `error` message to this connection.
 * =============================================================================
 */

import { DRIVER_POOL_GROUP, UserRole, isOperationalError, tripGroup } from '../../core';
import { logger } from '../../shared/services/logger.service';
import { TripService } from '../trip/trip.service';
import { Principal, isStaff } from '../user/principal';
import { toErrorMessage } from './dispatch.errors';
import { Connection, OutboundMessage } from './dispatch.types';
import { GroupRegistry } from './group-registry';
import { MessageRouter, SessionContext } from './message.router';
import { DirectoryMember, SessionDirectory } from './session.directory';

export interface DispatchSessionDeps {
  registry: GroupRegistry;
  router: MessageRouter;
  trips: TripService;
  directory: SessionDirectory;
}

export class DispatchSession implements SessionContext, DirectoryMember {
  private queue: Promise<void> = Promise.resolve();
  private closed = false;

  constructor(
    readonly connection: Connection,
    private readonly deps: DispatchSessionDeps
  ) { }

  get principal(): Principal | null {
    return this.connection.principal;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Subscribe to the groups this principal already belongs in
   */
  open(): Promise<void> {
    this.deps.directory.add(this);

    return this.enqueue(undefined, async () => {
      const principal = this.principal;
      if (!principal) return;

      if (principal.role === UserRole.DRIVER) {
        this.join(DRIVER_POOL_GROUP);
      }

      const openTrips = await this.deps.trips.findOpenTripsFor(principal.id);
      for (const trip of openTrips) {
        this.join(tripGroup(trip.id));
      }

      if (openTrips.length > 0) {
        logger.debug(`[Session] ${this.connection.id} rejoined ${openTrips.length} trip group(s)`, {
          principalId: principal.id
        });
      }
    });
  }

  /**
   * Queue an inbound message behind the ones already received
   */
  receive(raw: unknown): Promise<void> {
    return this.enqueue(requestTypeOf(raw), () => this.deps.router.dispatch(this, raw));
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.deps.directory.remove(this);

    for (const group of Array.from(this.connection.groups)) {
      this.deps.registry.leave(group, this.connection);
    }
    this.connection.groups.clear();
  }

  reply(message: OutboundMessage): void {
    this.deps.registry.sendToConnection(this.connection, message);
  }

  join(group: string): void {
    if (this.closed) {
      logger.debug(`[Session] Ignoring join of ${group} after close`, { connectionId: this.connection.id });
      return;
    }
    if (this.connection.groups.has(group)) return;

    this.deps.registry.join(group, this.connection);
    this.connection.groups.add(group);
  }

  leave(group: string): void {
    if (!this.connection.groups.has(group)) return;

    this.deps.registry.leave(group, this.connection);
    this.connection.groups.delete(group);
  }

  inGroup(group: string): boolean {
    return this.connection.groups.has(group);
  }

  broadcast(group: string, message: OutboundMessage): void {
    this.deps.registry.send(group, message);
  }

  joinParticipants(group: string, participantIds: string[]): void {
    for (const id of participantIds) {
      for (const member of this.deps.directory.sessionsOf(id)) {
        member.join(group);
      }
    }
  }

  leaveNonParticipants(group: string, participantIds: string[]): void {
    const participants = new Set(participantIds);

    for (const member of this.deps.directory.membersOf(group)) {
      const principal = member.principal;
      if (!principal || participants.has(principal.id) || isStaff(principal)) continue;

      member.leave(group);
      logger.debug(`[Session] ${principal.id} left ${group}`, { by: this.principal?.id });
    }
  }

  private enqueue(requestType: string | undefined, task: () => Promise<void>): Promise<void> {
    const run = this.queue.then(task).catch((error: unknown) => this.fail(error, requestType));
    this.queue = run;
    return run;
  }

  private fail(error: unknown, requestType: string | undefined): void {
    if (isOperationalError(error)) {
      logger.debug(`[Session] ${requestType ?? 'session'} rejected: ${error.message}`, {
        connectionId: this.connection.id,
        code: error.code
      });
    } else {
      logger.error(`[Session] ${requestType ?? 'session'} failed`, {
        connectionId: this.connection.id,
        error: error instanceof Error ? error.message : String(error)
      });
    }

    this.reply(toErrorMessage(error, requestType));
  }
}

function requestTypeOf(raw: unknown): string | undefined {
  if (typeof raw !== 'object' || raw === null || !('type' in raw)) return undefined;
  return typeof raw.type === 'string' ? raw.type : undefined;
}
