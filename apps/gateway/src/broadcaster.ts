import {
  parseRoomId,
  type BoardRepository,
  type RoomAccessPolicy,
  type RoomKind,
  type WithTransaction,
} from '@gatehouse/domain';
import {
  errorFrame,
  pong,
  roomJoined,
  roomLeft,
  userJoined,
  userLeft,
  Channels,
  FanoutEnvelopeSchema,
  JOIN_ROOM,
  LEAVE_ROOM,
  PING,
  StoreKeys,
  type ClientFrame,
  type Notification,
  type NotificationInput,
} from '@gatehouse/proto';
import {
  AppError,
  ErrorCode,
  HistoryEntrySchema,
  createLogger,
  errorMessage,
  isAppError,
  type CoordinationStore,
  type MessageHistoryStore,
  type SafeLogger,
} from '@gatehouse/shared';
import { type Connection } from './connections';
import { type SerialLanes } from './lanes';
import { NotificationPublisher } from './notifications';
import { type ConnectionRegistry, type Departure, type DeliveryReport } from './registry';
import { BoardRoom } from './rooms/board';
import { ChatRoom } from './rooms/chat';
import { DirectRoom } from './rooms/direct';
import { type IdGenerator, type RoomBehavior, type RoomContext } from './rooms/types';

export interface BroadcasterDeps {
  registry: ConnectionRegistry;
  lanes: SerialLanes;
  access: RoomAccessPolicy;
  store: CoordinationStore;
  history: MessageHistoryStore;
  boards: BoardRepository;
  withTransaction: WithTransaction;
  idGen: IdGenerator;
  /** Tags fan-out publications so an instance can skip its own. */
  instanceId: string;
  clock?: () => number;
  logger?: SafeLogger;
}

type Unsubscribe = () => Promise<void>;

/**
 * Routes client frames to room behaviors and keeps rooms in step across
 * gateway instances. Every room this instance holds is subscribed to its
 * fan-out channel; frames published here go to local members directly and to
 * other instances through the coordination store.
 */
export class RoomBroadcaster implements RoomContext {
  readonly registry: ConnectionRegistry;
  readonly history: MessageHistoryStore;
  readonly store: CoordinationStore;
  readonly boards: BoardRepository;
  readonly withTransaction: WithTransaction;
  readonly idGen: IdGenerator;
  readonly clock: () => number;
  readonly logger: SafeLogger;
  readonly notifications: NotificationPublisher;

  private readonly lanes: SerialLanes;
  private readonly access: RoomAccessPolicy;
  private readonly instanceId: string;
  private readonly behaviors: Record<RoomKind, RoomBehavior> = {
    chat: new ChatRoom(),
    board: new BoardRoom(),
    direct: new DirectRoom(),
  };
  /** Behavior picked once, when the room was created on this instance. */
  private readonly bound = new Map<string, RoomBehavior>();
  private readonly subscriptions = new Map<string, Promise<Unsubscribe>>();
  private readonly stopListening: () => void;

  constructor(deps: BroadcasterDeps) {
    this.registry = deps.registry;
    this.lanes = deps.lanes;
    this.access = deps.access;
    this.store = deps.store;
    this.history = deps.history;
    this.boards = deps.boards;
    this.withTransaction = deps.withTransaction;
    this.idGen = deps.idGen;
    this.instanceId = deps.instanceId;
    this.clock = deps.clock ?? Date.now;
    this.logger = deps.logger ?? createLogger({ name: 'gateway:broadcaster' });
    this.notifications = new NotificationPublisher({
      history: this.history,
      idGen: this.idGen,
      publish: (roomId, entry) => this.publishEntry(roomId, entry),
      logger: this.logger,
    });
    // A close can happen inside a room's lane (a failed send during a
    // broadcast), so the cleanup is queued on the lane, never awaited here.
    this.stopListening = this.registry.onDeparture((departure: Departure) => {
      const { roomId, connection } = departure;
      this.lanes
        .run(roomId, () => this.settleDeparture(roomId, connection.userId, true))
        .catch((err: unknown) => {
          this.logger.error({ roomId, err: errorMessage(err) }, 'Departure cleanup failed');
        });
    });
  }

  /** Handles one parsed client frame. Never rejects: failures become error frames. */
  async receive(connection: Connection, frame: ClientFrame): Promise<void> {
    try {
      await this.handleFrame(connection, frame);
    } catch (err) {
      await this.reportError(connection, err);
    }
  }

  async handleFrame(connection: Connection, frame: ClientFrame): Promise<void> {
    switch (frame.type) {
      case PING:
        await this.reply(connection, pong());
        return;
      case JOIN_ROOM:
        await this.join(connection, frame.room_id);
        return;
      case LEAVE_ROOM:
        await this.leave(connection, frame.room_id);
        return;
      default: {
        const roomId = frame.room_id;
        const room = this.registry.room(roomId);
        const behavior = this.bound.get(roomId);
        if (!room || !behavior || !this.registry.isMember(roomId, connection.id)) {
          throw new AppError(ErrorCode.FORBIDDEN, 'Not a member of this room', { roomId });
        }
        if (!behavior.frames.has(frame.type)) {
          throw new AppError(ErrorCode.BAD_REQUEST, `Unsupported message type for this room: ${frame.type}`);
        }
        await this.lanes.run(roomId, () => behavior.handle(this, connection, room, frame));
      }
    }
  }

  async join(connection: Connection, roomId: string): Promise<void> {
    const address = parseRoomId(roomId);
    if (!address) throw new AppError(ErrorCode.BAD_REQUEST, 'Invalid room id', { roomId });
    if (!(await this.access.canJoin(connection.userId, address))) {
      throw AppError.roomAccessDenied(roomId);
    }

    await this.lanes.run(roomId, async () => {
      if (connection.isClosed) return;
      if (this.registry.isMember(roomId, connection.id)) {
        await this.reply(connection, roomJoined(roomId, address.kind, await this.members(roomId)));
        return;
      }

      const existing = this.registry.room(roomId);
      const userWasPresent = existing?.hasUser(connection.userId) ?? false;
      this.registry.register(connection, roomId, address.kind);
      const room = this.registry.room(roomId);
      if (!room) return;

      let behavior = this.bound.get(roomId);
      if (!existing || !behavior) {
        behavior = this.behaviors[address.kind];
        this.bound.set(roomId, behavior);
        this.subscribe(roomId);
      }

      await this.bestEffort(roomId, 'presence add', () =>
        this.store.sadd(StoreKeys.roomPresence(roomId), connection.userId),
      );
      await this.reply(connection, roomJoined(roomId, address.kind, await this.members(roomId)));
      try {
        await behavior.onJoin(this, connection, room);
      } catch (err) {
        if (!connection.isClosed) this.registry.deregister({ roomId, connectionId: connection.id });
        await this.settleDeparture(roomId, connection.userId, false);
        throw err;
      }
      if (!userWasPresent) {
        await this.publish(roomId, userJoined(roomId, connection.userId), connection.id);
      }
    });
  }

  async leave(connection: Connection, roomId: string): Promise<void> {
    await this.lanes.run(roomId, async () => {
      const departure = this.registry.deregister({ roomId, connectionId: connection.id });
      if (!departure) throw new AppError(ErrorCode.BAD_REQUEST, 'Not a member of this room', { roomId });
      await this.settleDeparture(roomId, connection.userId, true);
      await this.reply(connection, roomLeft(roomId));
    });
  }

  async publish(roomId: string, frame: object, excludeConnectionId?: string): Promise<DeliveryReport> {
    const report = await this.registry.broadcast(roomId, frame, excludeConnectionId);
    await this.fanout(roomId, frame);
    return report;
  }

  reply(connection: Connection, frame: object): Promise<boolean> {
    return this.registry.deliver(connection, frame);
  }

  notify(userId: string, input: NotificationInput): Promise<Notification> {
    return this.notifications.notify(userId, input);
  }

  /** Drops every fan-out subscription. Connections are closed by the registry. */
  async close(): Promise<void> {
    this.stopListening();
    const pending = [...this.subscriptions.values()];
    this.subscriptions.clear();
    this.bound.clear();
    for (const subscription of pending) {
      const unsubscribe = await subscription;
      await unsubscribe();
    }
  }

  private async reportError(connection: Connection, err: unknown): Promise<void> {
    if (isAppError(err)) {
      connection.logger.debug({ code: err.code, ...err.safeMeta }, err.message);
      await this.reply(connection, errorFrame(err.message));
      return;
    }
    connection.logger.error({ err: errorMessage(err) }, 'Frame handling failed');
    await this.reply(connection, errorFrame('Internal server error'));
  }

  /** Local users first, then users only other instances know about. */
  private async members(roomId: string): Promise<string[]> {
    const local = this.registry.room(roomId)?.userIds() ?? [];
    let remote: string[] = [];
    try {
      remote = await this.store.smembers(StoreKeys.roomPresence(roomId));
    } catch (err) {
      this.logger.error({ roomId, err: errorMessage(err) }, 'Presence unavailable, listing local members');
    }
    return [...new Set([...local, ...remote])];
  }

  private async publishEntry(roomId: string, entry: Notification): Promise<DeliveryReport> {
    this.registry.room(roomId)?.remember(entry);
    return this.publish(roomId, entry);
  }

  /**
   * Runs in the room's lane after `userId` lost a connection there. Membership
   * is read again here: the user or the room may have come back since the
   * departure was recorded.
   */
  private async settleDeparture(roomId: string, userId: string, announce: boolean): Promise<void> {
    const room = this.registry.room(roomId);
    if (!room?.hasUser(userId)) {
      if (announce && room) await this.registry.broadcast(roomId, userLeft(roomId, userId));
      await this.bestEffort(roomId, 'presence remove', () => this.store.srem(StoreKeys.roomPresence(roomId), userId));
      if (announce) await this.fanout(roomId, userLeft(roomId, userId));
    }
    if (this.registry.room(roomId) === undefined) {
      this.bound.delete(roomId);
      await this.unsubscribe(roomId);
    }
  }

  private async fanout(roomId: string, frame: object): Promise<void> {
    const message = JSON.stringify({ origin: this.instanceId, room_id: roomId, frame });
    await this.bestEffort(roomId, 'fan-out publish', () => this.store.publish(Channels.room(roomId), message));
  }

  private subscribe(roomId: string): void {
    if (this.subscriptions.has(roomId)) return;
    const subscription = this.store
      .subscribe(Channels.room(roomId), (message) => this.onRemote(roomId, message))
      .catch((err: unknown): Unsubscribe => {
        this.logger.error({ roomId, err: errorMessage(err) }, 'Fan-out subscribe failed, room is local only');
        return async () => {};
      });
    this.subscriptions.set(roomId, subscription);
  }

  private async unsubscribe(roomId: string): Promise<void> {
    const subscription = this.subscriptions.get(roomId);
    if (!subscription) return;
    this.subscriptions.delete(roomId);
    await this.bestEffort(roomId, 'fan-out unsubscribe', async () => {
      const unsubscribe = await subscription;
      await unsubscribe();
    });
  }

  private onRemote(roomId: string, message: string): void {
    let json: unknown;
    try {
      json = JSON.parse(message);
    } catch {
      this.logger.warn({ roomId }, 'Dropping malformed fan-out message');
      return;
    }
    const envelope = FanoutEnvelopeSchema.safeParse(json);
    if (!envelope.success || envelope.data.room_id !== roomId) {
      this.logger.warn({ roomId }, 'Dropping malformed fan-out message');
      return;
    }
    if (envelope.data.origin === this.instanceId) return;

    const frame = envelope.data.frame;
    const entry = HistoryEntrySchema.safeParse(frame);
    if (entry.success) this.registry.room(roomId)?.remember(entry.data);

    this.registry.broadcast(roomId, frame).catch((err: unknown) => {
      this.logger.error({ roomId, err: errorMessage(err) }, 'Fan-out delivery failed');
    });
  }

  private async bestEffort(roomId: string, step: string, fn: () => Promise<unknown>): Promise<void> {
    try {
      await fn();
    } catch (err) {
      this.logger.error({ roomId, step, err: errorMessage(err) }, 'Coordination store step failed, continuing');
    }
  }
}
