/**
 * =============================================================================
 * GROUP REGISTRY
 * =============================================================================
 *
 * Named fan-out targets. The only way a message reaches more than one
 * connection. The dispatch core depends on this interface alone; the backend
 * is picked at startup:
 *
 *   - InMemoryGroupRegistry   single process, reference-counted groups
 *   - SocketIoGroupRegistry   socket.io rooms, cross-instance with the
 *                             Redis adapter attached
 *
 * Groups exist while they have members: created on first join, gone after the
 * last leave. Keeping membership aligned with trip participation is the
 * session's job, not the registry's.
 * =============================================================================
 */

import { Connection, OutboundMessage } from './dispatch.types';

export interface GroupRegistry {
  /** Idempotent */
  join(group: string, connection: Connection): void;

  /** Idempotent; leaving a group never joined is a no-op */
  leave(group: string, connection: Connection): void;

  /**
   * Deliver to every member at the time of the call.
   * A group without members is a silent no-op.
   */
  send(group: string, message: OutboundMessage): void;

  /** Direct delivery, bypassing groups */
  sendToConnection(connection: Connection, message: OutboundMessage): void;

  /** Members known to this process */
  memberCount(group: string): number;

  /** Non-empty groups known to this process */
  groupCount(): number;
}
