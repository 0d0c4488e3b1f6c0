/**
 * =============================================================================
 * SOCKET.IO GROUP REGISTRY - Rooms as groups (Multi-Server Ready)
 * =============================================================================
 *
 * Maps every registry operation onto socket.io rooms:
 * - join/leave   -> io.in(connectionId).socketsJoin/socketsLeave(group)
 * - send         -> io.to(group).emit('message', ...)
 *
 * With @socket.io/redis-adapter attached, both membership changes and
 * emits reach sockets held by other instances. socket.io drops empty rooms
 * and removes a socket from all of its rooms on disconnect.
 * =============================================================================
 */

import { SOCKET_MESSAGE_EVENT } from '../../core/constants';
import { Connection, OutboundMessage } from './dispatch.types';
import { GroupRegistry } from './group-registry';
import { DispatchServer } from './socket.types';

export class SocketIoGroupRegistry implements GroupRegistry {
  constructor(private readonly io: DispatchServer) { }

  join(group: string, connection: Connection): void {
    this.io.in(connection.id).socketsJoin(group);
  }

  leave(group: string, connection: Connection): void {
    this.io.in(connection.id).socketsLeave(group);
  }

  send(group: string, message: OutboundMessage): void {
    this.io.to(group).emit(SOCKET_MESSAGE_EVENT, message);
  }

  sendToConnection(connection: Connection, message: OutboundMessage): void {
    // Every socket sits in a room named after its own id
    this.io.to(connection.id).emit(SOCKET_MESSAGE_EVENT, message);
  }

  memberCount(group: string): number {
    return this.io.sockets.adapter.rooms.get(group)?.size ?? 0;
  }

  groupCount(): number {
    // Exclude the per-socket rooms socket.io creates for every connection
    let count = 0;
    for (const room of this.io.sockets.adapter.rooms.keys()) {
      if (!this.io.sockets.sockets.has(room)) count++;
    }
    return count;
  }
}
