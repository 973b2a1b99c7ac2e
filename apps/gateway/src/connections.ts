import { type Session } from '@gatehouse/domain';
import { type SafeLogger } from '@gatehouse/shared';
import { type Transport } from './transport';

/**
 * connecting → admitted → joined ⇄ admitted → closed.
 * `joined` means a member of at least one room; `closed` is terminal.
 */
export type ConnectionPhase = 'connecting' | 'admitted' | 'joined' | 'closed';

export class ConnectionStateError extends Error {
  constructor(
    public readonly connectionId: string,
    public readonly phase: ConnectionPhase,
    action: string,
  ) {
    super(`Cannot ${action} connection ${connectionId} in phase ${phase}`);
    this.name = 'ConnectionStateError';
  }
}

export class Connection {
  private currentPhase: ConnectionPhase = 'connecting';
  private identity: { userId: string; sessionId: string } | null = null;
  private readonly memberOf = new Set<string>();

  /** Heartbeat flag: cleared on ping, set again by the pong. */
  alive = true;
  messageCount = 0;
  messageWindowStart: number;

  constructor(
    readonly id: string,
    readonly ip: string,
    readonly transport: Transport,
    readonly logger: SafeLogger,
    now: number = Date.now(),
  ) {
    this.messageWindowStart = now;
  }

  get phase(): ConnectionPhase {
    return this.currentPhase;
  }

  get isClosed(): boolean {
    return this.currentPhase === 'closed';
  }

  get userId(): string {
    if (!this.identity) throw new ConnectionStateError(this.id, this.currentPhase, 'read identity of');
    return this.identity.userId;
  }

  get sessionId(): string {
    if (!this.identity) throw new ConnectionStateError(this.id, this.currentPhase, 'read identity of');
    return this.identity.sessionId;
  }

  get rooms(): ReadonlySet<string> {
    return this.memberOf;
  }

  admit(session: Session): void {
    if (this.currentPhase !== 'connecting') {
      throw new ConnectionStateError(this.id, this.currentPhase, 'admit');
    }
    this.identity = { userId: session.userId, sessionId: session.id };
    this.currentPhase = 'admitted';
  }

  enterRoom(roomId: string): void {
    if (this.currentPhase !== 'admitted' && this.currentPhase !== 'joined') {
      throw new ConnectionStateError(this.id, this.currentPhase, 'join a room with');
    }
    this.memberOf.add(roomId);
    this.currentPhase = 'joined';
  }

  leaveRoom(roomId: string): void {
    if (this.currentPhase === 'closed') {
      throw new ConnectionStateError(this.id, this.currentPhase, 'leave a room with');
    }
    this.memberOf.delete(roomId);
    if (this.currentPhase === 'joined' && this.memberOf.size === 0) {
      this.currentPhase = 'admitted';
    }
  }

  /** Returns the rooms the connection was in. */
  markClosed(): string[] {
    const rooms = [...this.memberOf];
    this.memberOf.clear();
    this.currentPhase = 'closed';
    return rooms;
  }
}
