/**
 * Live sessions of this process, indexed by principal.
 *
 * Lets a handler move the connections of someone other than the sender in
 * or out of a trip group, e.g. the rider an owner booked for or the driver
 * an owner assigned. Anonymous sessions are never indexed.
 */

import { Principal } from '../user/principal';

export interface DirectoryMember {
  readonly principal: Principal | null;
  join(group: string): void;
  leave(group: string): void;
  inGroup(group: string): boolean;
}

export class SessionDirectory {
  private readonly byPrincipal = new Map<string, Set<DirectoryMember>>();

  add(member: DirectoryMember): void {
    if (!member.principal) return;
    const id = member.principal.id;

    let members = this.byPrincipal.get(id);
    if (!members) {
      members = new Set();
      this.byPrincipal.set(id, members);
    }
    members.add(member);
  }

  remove(member: DirectoryMember): void {
    if (!member.principal) return;
    const id = member.principal.id;

    const members = this.byPrincipal.get(id);
    if (!members) return;
    members.delete(member);
    if (members.size === 0) {
      this.byPrincipal.delete(id);
    }
  }

  sessionsOf(principalId: string): DirectoryMember[] {
    return Array.from(this.byPrincipal.get(principalId) ?? []);
  }

  /**
   * Indexed sessions currently in the group
   */
  membersOf(group: string): DirectoryMember[] {
    const found: DirectoryMember[] = [];
    for (const members of this.byPrincipal.values()) {
      for (const member of members) {
        if (member.inGroup(group)) found.push(member);
      }
    }
    return found;
  }
}
