import { type RoomAddress } from './room';
import {
  type BoardRepository,
  type OrganizationDirectory,
  type WithTransaction,
} from './ports';

export interface RoomAccessDeps {
  boardRepo: BoardRepository;
  organizations: OrganizationDirectory;
  withTransaction: WithTransaction;
}

/**
 * Join rules, one per room variant. Checked once when a connection joins;
 * frames inside the room are not re-authorized.
 */
export class RoomAccessPolicy {
  constructor(private readonly deps: RoomAccessDeps) {}

  async canJoin(userId: string, room: RoomAddress): Promise<boolean> {
    switch (room.kind) {
      case 'direct':
        return room.userId === userId;
      case 'board':
        return this.canJoinBoard(userId, room.boardId);
      case 'chat':
        return this.canJoinChat(userId, room);
    }
  }

  private async canJoinChat(
    userId: string,
    room: Extract<RoomAddress, { kind: 'chat' }>,
  ): Promise<boolean> {
    switch (room.scope) {
      case 'general':
        return true;
      case 'direct':
        return room.participants.includes(userId);
      case 'organization':
        return this.isMember(room.organizationId, userId);
    }
  }

  private async canJoinBoard(userId: string, boardId: string): Promise<boolean> {
    const { boardRepo, withTransaction } = this.deps;
    const organizationId = await withTransaction((tx) => boardRepo.findOrganizationId(tx, boardId));
    if (!organizationId) return false;
    return this.isMember(organizationId, userId);
  }

  private isMember(organizationId: string, userId: string): Promise<boolean> {
    return this.deps.withTransaction((tx) =>
      this.deps.organizations.isMember(tx, organizationId, userId),
    );
  }
}
