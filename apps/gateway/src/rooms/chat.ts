import {
  chatHistory,
  chatMessage,
  typingIndicator,
  DEFAULT_HISTORY_LIMIT,
  GET_HISTORY,
  MESSAGE,
  TYPING,
  type ChatMessage,
  type ClientFrame,
  type ClientFrameType,
  type SendMessageFrame,
  type TypingFrame,
} from '@gatehouse/proto';
import { AppError, ErrorCode, errorMessage } from '@gatehouse/shared';
import { type Connection } from '../connections';
import { type Room } from '../registry';
import { recentEntries, type RoomBehavior, type RoomContext } from './types';

// Mention notifications quote the start of the message.
const MENTION_PREVIEW_LENGTH = 200;

/** Broadcasts `typing` to everyone but the sender, with who is typing now. */
export async function publishTyping(
  ctx: RoomContext,
  connection: Connection,
  room: Room,
  frame: TypingFrame,
): Promise<void> {
  const userId = connection.userId;
  if (frame.is_typing) room.typing.add(userId);
  else room.typing.delete(userId);

  await ctx.publish(
    room.id,
    typingIndicator(room.id, {
      user_id: userId,
      is_typing: frame.is_typing,
      typing_users: [...room.typing],
      card_id: frame.card_id,
    }),
    connection.id,
  );
}

export class ChatRoom implements RoomBehavior {
  readonly kind = 'chat';
  readonly frames: ReadonlySet<ClientFrameType> = new Set([MESSAGE, TYPING, GET_HISTORY]);

  async onJoin(ctx: RoomContext, connection: Connection, room: Room): Promise<void> {
    await this.sendHistory(ctx, connection, room, DEFAULT_HISTORY_LIMIT);
  }

  async handle(ctx: RoomContext, connection: Connection, room: Room, frame: ClientFrame): Promise<void> {
    switch (frame.type) {
      case MESSAGE:
        return this.message(ctx, connection, room, frame);
      case TYPING:
        return publishTyping(ctx, connection, room, frame);
      case GET_HISTORY:
        return this.sendHistory(ctx, connection, room, frame.limit);
      default:
        throw new AppError(ErrorCode.BAD_REQUEST, `Unsupported message type for chat rooms: ${frame.type}`);
    }
  }

  private async message(
    ctx: RoomContext,
    connection: Connection,
    room: Room,
    frame: SendMessageFrame,
  ): Promise<void> {
    const message = chatMessage(room.id, {
      id: ctx.idGen.generate(),
      user_id: connection.userId,
      content: frame.content,
      message_type: frame.message_type,
      reply_to: frame.reply_to ?? null,
      mentions: frame.mentions,
    });

    room.remember(message);
    try {
      await ctx.history.append(room.id, message);
    } catch (err) {
      ctx.logger.error({ roomId: room.id, messageId: message.id, err: errorMessage(err) }, 'Failed to persist chat message');
    }

    // Sending a message ends the sender's typing state.
    room.typing.delete(connection.userId);
    await ctx.publish(room.id, message);
    await this.notifyMentions(ctx, message);
  }

  private async notifyMentions(ctx: RoomContext, message: ChatMessage): Promise<void> {
    const recipients = new Set(message.mentions.filter((userId) => userId !== message.user_id));
    for (const userId of recipients) {
      try {
        await ctx.notify(userId, {
          category: 'mention',
          title: 'You were mentioned',
          body: message.content.slice(0, MENTION_PREVIEW_LENGTH),
          data: { room_id: message.room_id, message_id: message.id, mentioned_by: message.user_id },
        });
      } catch (err) {
        ctx.logger.error({ roomId: message.room_id, err: errorMessage(err) }, 'Mention notification failed');
      }
    }
  }

  private async sendHistory(ctx: RoomContext, connection: Connection, room: Room, limit: number): Promise<void> {
    const entries = await recentEntries(ctx, room, limit + 1);
    const messages = entries.filter((entry): entry is ChatMessage => entry.type === MESSAGE);
    const hasMore = messages.length > limit;
    await ctx.reply(connection, chatHistory(room.id, messages.slice(0, limit).reverse(), hasMore));
  }
}
