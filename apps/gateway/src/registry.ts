import { type RoomKind } from '@gatehouse/domain';
import { createLogger, errorMessage, type HistoryEntry, type SafeLogger } from '@gatehouse/shared';
import { Connection, ConnectionStateError } from './connections';
import { TransportError } from './transport';

export interface RoomHandle {
  readonly roomId: string;
  readonly connectionId: string;
}

export interface DeliveryReport {
  delivered: number;
  /** Connections that failed and were closed. */
  failed: string[];
}

export interface Departure {
  roomId: string;
  connection: Connection;
  /** The room had no members left and was destroyed. */
  roomEmpty: boolean;
  /** Another connection of the same user is still in the room. */
  userRemains: boolean;
}

export type DepartureListener = (departure: Departure) => void;

export class ConnectionClosedError extends ConnectionStateError {
  constructor(connectionId: string, action: string) {
    super(connectionId, 'closed', action);
    this.name = 'ConnectionClosedError';
  }
}

export class Room {
  readonly members = new Map<string, Connection>();
  readonly typing = new Set<string>();
  private readonly buffer: HistoryEntry[] = [];

  constructor(
    readonly id: string,
    readonly kind: RoomKind,
    private readonly historySize: number,
  ) {}

  remember(entry: HistoryEntry): void {
    this.buffer.push(entry);
    if (this.buffer.length > this.historySize) this.buffer.shift();
  }

  /** Newest first, like the durable history store. */
  recent(limit: number): HistoryEntry[] {
    if (limit <= 0) return [];
    return this.buffer.slice(-limit).reverse();
  }

  hasUser(userId: string): boolean {
    for (const member of this.members.values()) {
      if (member.userId === userId) return true;
    }
    return false;
  }

  /** Distinct user ids in join order. */
  userIds(): string[] {
    return [...new Set([...this.members.values()].map((m) => m.userId))];
  }
}

export interface RegistryOptions {
  historySize: number;
  logger?: SafeLogger;
}

/**
 * Owns every live connection and the rooms they are in. Rooms are created on
 * first join and dropped when their last member leaves. Rooms never own a
 * connection: one vanishing mid-broadcast is just a failed send.
 */
export class ConnectionRegistry {
  private readonly connections = new Map<string, Connection>();
  private readonly rooms = new Map<string, Room>();
  private readonly departureListeners = new Set<DepartureListener>();
  private readonly historySize: number;
  private readonly logger: SafeLogger;

  constructor(opts: RegistryOptions) {
    this.historySize = opts.historySize;
    this.logger = opts.logger ?? createLogger({ name: 'gateway:registry' });
  }

  /** Starts tracking a connection that has not joined a room yet. */
  track(connection: Connection): void {
    if (connection.isClosed) throw new ConnectionClosedError(connection.id, 'track');
    this.connections.set(connection.id, connection);
  }

  /** Called after every removal caused by a close, so callers can announce it and clean up shared state. */
  onDeparture(listener: DepartureListener): () => void {
    this.departureListeners.add(listener);
    return () => this.departureListeners.delete(listener);
  }

  register(connection: Connection, roomId: string, kind: RoomKind): RoomHandle {
    if (connection.isClosed) throw new ConnectionClosedError(connection.id, 'register');

    let room = this.rooms.get(roomId);
    if (!room) {
      room = new Room(roomId, kind, this.historySize);
      this.rooms.set(roomId, room);
    }
    connection.enterRoom(roomId);
    room.members.set(connection.id, connection);
    this.connections.set(connection.id, connection);
    return { roomId, connectionId: connection.id };
  }

  deregister(handle: RoomHandle): Departure | null {
    const connection = this.connections.get(handle.connectionId);
    if (!connection || connection.isClosed) {
      throw new ConnectionClosedError(handle.connectionId, 'deregister');
    }
    const room = this.rooms.get(handle.roomId);
    if (!room || !room.members.has(connection.id)) return null;
    connection.leaveRoom(room.id);
    return this.detach(room, connection);
  }

  room(roomId: string): Room | undefined {
    return this.rooms.get(roomId);
  }

  get(connectionId: string): Connection | undefined {
    return this.connections.get(connectionId);
  }

  isMember(roomId: string, connectionId: string): boolean {
    return this.rooms.get(roomId)?.members.has(connectionId) ?? false;
  }

  all(): IterableIterator<Connection> {
    return this.connections.values();
  }

  get size(): number {
    return this.connections.size;
  }

  get roomCount(): number {
    return this.rooms.size;
  }

  /**
   * One send per member in member order. A member that fails is closed and
   * removed; the others still get the frame.
   */
  async broadcast(roomId: string, frame: object, excludeConnectionId?: string): Promise<DeliveryReport> {
    const room = this.rooms.get(roomId);
    if (!room) return { delivered: 0, failed: [] };
    const targets = [...room.members.values()].filter((m) => m.id !== excludeConnectionId);
    return this.deliverAll(targets, JSON.stringify(frame));
  }

  /** Every connection `userId` has in the room. */
  async send(roomId: string, userId: string, frame: object): Promise<DeliveryReport> {
    const room = this.rooms.get(roomId);
    if (!room) return { delivered: 0, failed: [] };
    const targets = [...room.members.values()].filter((m) => m.userId === userId);
    return this.deliverAll(targets, JSON.stringify(frame));
  }

  /** Direct reply to one connection, room or not. */
  async deliver(connection: Connection, frame: object): Promise<boolean> {
    const report = await this.deliverAll([connection], JSON.stringify(frame));
    return report.delivered === 1;
  }

  async close(connection: Connection, code = 1000, reason = ''): Promise<void> {
    if (connection.isClosed) return;
    const roomIds = connection.markClosed();
    this.connections.delete(connection.id);
    connection.transport.close(code, reason);

    // Announcing the departure to the rest of the room is the listeners' job;
    // they order it with the other work in that room.
    for (const roomId of roomIds) {
      const room = this.rooms.get(roomId);
      if (room) this.emitDeparture(this.detach(room, connection));
    }
  }

  async closeAll(code: number, reason: string): Promise<void> {
    await Promise.all([...this.connections.values()].map((c) => this.close(c, code, reason)));
  }

  private detach(room: Room, connection: Connection): Departure {
    room.members.delete(connection.id);
    const userId = connection.userId;
    const userRemains = room.hasUser(userId);
    if (!userRemains) room.typing.delete(userId);
    const roomEmpty = room.members.size === 0;
    if (roomEmpty) this.rooms.delete(room.id);
    return { roomId: room.id, connection, roomEmpty, userRemains };
  }

  private emitDeparture(departure: Departure): void {
    for (const listener of this.departureListeners) {
      try {
        listener(departure);
      } catch (err) {
        this.logger.error({ roomId: departure.roomId, err: errorMessage(err) }, 'Departure listener threw');
      }
    }
  }

  private async deliverAll(targets: Connection[], data: string): Promise<DeliveryReport> {
    const failed: Connection[] = [];
    // Sends are issued in member order before any of them is awaited.
    const attempts = targets.map((target) =>
      target.transport.send(data).then(
        () => true,
        (err: unknown) => {
          failed.push(target);
          target.logger.warn(
            { reason: err instanceof TransportError ? err.reason : 'failed', err: errorMessage(err) },
            'Delivery failed, closing connection',
          );
          return false;
        },
      ),
    );
    const results = await Promise.all(attempts);

    for (const connection of failed) {
      await this.close(connection, 1011, 'Delivery failed');
    }
    return { delivered: results.filter(Boolean).length, failed: failed.map((c) => c.id) };
  }
}
