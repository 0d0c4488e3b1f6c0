/**
 * In-memory group registry: membership index + local fan-out.
 *
 * For single-instance deployments and tests. Each group maps connection ids
 * to connections; an empty group is removed so trip groups do not accumulate.
 * Fan-out iterates over a copy of the member list, so a join or leave during
 * delivery never exposes a half-updated set.
 */

import { logger } from '../../shared/services/logger.service';
import { Connection, OutboundMessage } from './dispatch.types';
import { GroupRegistry } from './group-registry';

export class InMemoryGroupRegistry implements GroupRegistry {
  private readonly groups = new Map<string, Map<string, Connection>>();

  join(group: string, connection: Connection): void {
    let members = this.groups.get(group);
    if (!members) {
      members = new Map();
      this.groups.set(group, members);
    }
    members.set(connection.id, connection);
  }

  leave(group: string, connection: Connection): void {
    const members = this.groups.get(group);
    if (!members) return;

    members.delete(connection.id);
    if (members.size === 0) {
      this.groups.delete(group);
    }
  }

  send(group: string, message: OutboundMessage): void {
    const members = this.groups.get(group);
    if (!members) return;

    for (const connection of Array.from(members.values())) {
      this.deliver(connection, message, group);
    }
  }

  sendToConnection(connection: Connection, message: OutboundMessage): void {
    this.deliver(connection, message);
  }

  memberCount(group: string): number {
    return this.groups.get(group)?.size ?? 0;
  }

  groupCount(): number {
    return this.groups.size;
  }

  /**
   * Member ids of a group (diagnostics and tests)
   */
  members(group: string): string[] {
    return Array.from(this.groups.get(group)?.keys() ?? []);
  }

  private deliver(connection: Connection, message: OutboundMessage, group?: string): void {
    // One broken connection must not stop delivery to the rest of the group
    try {
      connection.deliver(message);
    } catch (error) {
      logger.warn(`[Groups] Delivery to ${connection.id} failed`, {
        group,
        type: message.type,
        error: error instanceof Error ? error.message : String(error)
      });
    }
  }
}
