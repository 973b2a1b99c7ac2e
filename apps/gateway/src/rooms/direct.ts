import {
  errorFrame,
  notificationBacklog,
  notificationMarkedRead,
  unreadCount,
  GET_UNREAD_COUNT,
  MARK_READ,
  NOTIFICATION,
  StoreKeys,
  type ClientFrame,
  type ClientFrameType,
  type Notification,
} from '@gatehouse/proto';
import { AppError, ErrorCode, HISTORY_RETENTION_SECONDS, errorMessage } from '@gatehouse/shared';
import { type Connection } from '../connections';
import { type Room } from '../registry';
import { recentEntries, type RoomBehavior, type RoomContext } from './types';

export const NOTIFICATION_BACKLOG_LIMIT = 100;

/** A user's private inbox. Only its owner can join. */
export class DirectRoom implements RoomBehavior {
  readonly kind = 'direct';
  readonly frames: ReadonlySet<ClientFrameType> = new Set([MARK_READ, GET_UNREAD_COUNT]);

  async onJoin(ctx: RoomContext, connection: Connection, room: Room): Promise<void> {
    const unread = await this.unread(ctx, room, connection.userId);
    await ctx.reply(connection, notificationBacklog(room.id, unread, unread.length));
  }

  async handle(ctx: RoomContext, connection: Connection, room: Room, frame: ClientFrame): Promise<void> {
    switch (frame.type) {
      case MARK_READ: {
        const key = StoreKeys.readNotifications(connection.userId);
        try {
          await ctx.store.sadd(key, frame.notification_id);
          await ctx.store.expire(key, HISTORY_RETENTION_SECONDS);
        } catch (err) {
          ctx.logger.error({ roomId: room.id, err: errorMessage(err) }, 'Failed to record read notification');
          await ctx.reply(connection, errorFrame('Could not mark notification as read'));
          return;
        }
        // Every tab of the user sees the change.
        await ctx.registry.send(room.id, connection.userId, notificationMarkedRead(room.id, frame.notification_id));
        return;
      }
      case GET_UNREAD_COUNT: {
        const unread = await this.unread(ctx, room, connection.userId);
        await ctx.reply(connection, unreadCount(room.id, unread.length));
        return;
      }
      default:
        throw new AppError(ErrorCode.BAD_REQUEST, `Unsupported message type for direct rooms: ${frame.type}`);
    }
  }

  /** Unread notifications, oldest first. */
  private async unread(ctx: RoomContext, room: Room, userId: string): Promise<Notification[]> {
    const entries = await recentEntries(ctx, room, NOTIFICATION_BACKLOG_LIMIT);
    let read: Set<string>;
    try {
      read = new Set(await ctx.store.smembers(StoreKeys.readNotifications(userId)));
    } catch (err) {
      ctx.logger.error({ roomId: room.id, err: errorMessage(err) }, 'Read set unavailable, treating all as unread');
      read = new Set();
    }
    return entries
      .filter((entry): entry is Notification => entry.type === NOTIFICATION && !read.has(entry.id))
      .reverse();
  }
}
