import { type BoardRepository, type RoomKind, type WithTransaction } from '@gatehouse/domain';
import { type ClientFrame, type ClientFrameType, type Notification, type NotificationInput } from '@gatehouse/proto';
import {
  type CoordinationStore,
  type HistoryEntry,
  type MessageHistoryStore,
  type SafeLogger,
} from '@gatehouse/shared';
import { type Connection } from '../connections';
import { type ConnectionRegistry, type DeliveryReport, type Room } from '../registry';

export interface IdGenerator {
  generate(): string;
}

/** What a room behavior may use. The broadcaster provides it. */
export interface RoomContext {
  readonly registry: ConnectionRegistry;
  readonly history: MessageHistoryStore;
  readonly store: CoordinationStore;
  readonly boards: BoardRepository;
  readonly withTransaction: WithTransaction;
  readonly idGen: IdGenerator;
  readonly clock: () => number;
  readonly logger: SafeLogger;
  /** Local members, then every other gateway instance. */
  publish(roomId: string, frame: object, excludeConnectionId?: string): Promise<DeliveryReport>;
  reply(connection: Connection, frame: object): Promise<boolean>;
  notify(userId: string, input: NotificationInput): Promise<Notification>;
}

export interface RoomBehavior {
  readonly kind: RoomKind;
  /** Client frame types this kind of room accepts. */
  readonly frames: ReadonlySet<ClientFrameType>;
  onJoin(ctx: RoomContext, connection: Connection, room: Room): Promise<void>;
  handle(ctx: RoomContext, connection: Connection, room: Room, frame: ClientFrame): Promise<void>;
}

/**
 * Newest-first entries from the durable store, or from the room's in-memory
 * buffer when the store cannot be read.
 */
export async function recentEntries(ctx: RoomContext, room: Room, limit: number): Promise<HistoryEntry[]> {
  try {
    return await ctx.history.recent(room.id, limit);
  } catch (err) {
    ctx.logger.error({ roomId: room.id, err }, 'History store unavailable, using room buffer');
    return room.recent(limit);
  }
}
