import { z } from 'zod';
import { createFrame, type Frame } from '../frame';
import { RoomIdSchema } from './room';

export const MESSAGE = 'message' as const;
export const TYPING = 'typing' as const;
export const GET_HISTORY = 'get_history' as const;
export const CHAT_HISTORY = 'chat_history' as const;

export const MAX_MESSAGE_LENGTH = 4000;
export const DEFAULT_HISTORY_LIMIT = 50;

export const SendMessageFrameSchema = z.object({
  type: z.literal(MESSAGE),
  room_id: RoomIdSchema,
  content: z.string().trim().min(1).max(MAX_MESSAGE_LENGTH),
  message_type: z.enum(['text', 'image', 'file']).default('text'),
  reply_to: z.string().min(1).optional(),
  mentions: z.array(z.string().min(1)).max(20).default([]),
});

export const TypingFrameSchema = z.object({
  type: z.literal(TYPING),
  room_id: RoomIdSchema,
  is_typing: z.boolean().default(true),
  card_id: z.string().min(1).optional(),
});

export const GetHistoryFrameSchema = z.object({
  type: z.literal(GET_HISTORY),
  room_id: RoomIdSchema,
  limit: z.number().int().min(1).max(100).default(DEFAULT_HISTORY_LIMIT),
});

export const ChatClientFrames = [SendMessageFrameSchema, TypingFrameSchema, GetHistoryFrameSchema] as const;

export type SendMessageFrame = z.infer<typeof SendMessageFrameSchema>;
export type TypingFrame = z.infer<typeof TypingFrameSchema>;
export type GetHistoryFrame = z.infer<typeof GetHistoryFrameSchema>;

/** A chat message as broadcast and as kept in room history. */
export const ChatMessageSchema = z.object({
  type: z.literal(MESSAGE),
  room_id: z.string(),
  id: z.string(),
  user_id: z.string(),
  content: z.string(),
  message_type: z.enum(['text', 'image', 'file']),
  reply_to: z.string().nullable(),
  mentions: z.array(z.string()),
  timestamp: z.string(),
});

export type ChatMessage = z.infer<typeof ChatMessageSchema>;

export function chatMessage(
  roomId: string,
  fields: Omit<ChatMessage, 'type' | 'room_id' | 'timestamp'>,
): ChatMessage {
  return { type: MESSAGE, room_id: roomId, ...fields, timestamp: new Date().toISOString() };
}

export const typingIndicator = (
  roomId: string,
  fields: { user_id: string; is_typing: boolean; typing_users?: string[]; card_id?: string },
) => createFrame(TYPING, fields, roomId);

export type ChatHistoryFrame = Frame<typeof CHAT_HISTORY, { messages: unknown[]; has_more: boolean }>;

export const chatHistory = (roomId: string, messages: unknown[], hasMore: boolean): ChatHistoryFrame =>
  createFrame(CHAT_HISTORY, { messages, has_more: hasMore }, roomId);
