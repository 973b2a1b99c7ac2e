import { z } from 'zod';
import { createFrame } from '../frame';
import { RoomIdSchema } from './room';

export const NOTIFICATION = 'notification' as const;
export const NOTIFICATION_BACKLOG = 'notification_backlog' as const;
export const MARK_READ = 'mark_read' as const;
export const NOTIFICATION_MARKED_READ = 'notification_marked_read' as const;
export const GET_UNREAD_COUNT = 'get_unread_count' as const;
export const UNREAD_COUNT = 'unread_count' as const;

export const MarkReadFrameSchema = z.object({
  type: z.literal(MARK_READ),
  room_id: RoomIdSchema,
  notification_id: z.string().min(1),
});

export const GetUnreadCountFrameSchema = z.object({
  type: z.literal(GET_UNREAD_COUNT),
  room_id: RoomIdSchema,
});

export const NotificationClientFrames = [MarkReadFrameSchema, GetUnreadCountFrameSchema] as const;

export type MarkReadFrame = z.infer<typeof MarkReadFrameSchema>;
export type GetUnreadCountFrame = z.infer<typeof GetUnreadCountFrameSchema>;

/** What another service hands the gateway to deliver to a user's inbox. */
export const NotificationInputSchema = z.object({
  category: z.string().min(1).max(64),
  title: z.string().min(1).max(200),
  body: z.string().max(2000).default(''),
  data: z.record(z.unknown()).default({}),
});

export type NotificationInput = z.input<typeof NotificationInputSchema>;

export const NotificationSchema = z.object({
  type: z.literal(NOTIFICATION),
  room_id: z.string(),
  id: z.string(),
  category: z.string(),
  title: z.string(),
  body: z.string(),
  data: z.record(z.unknown()),
  timestamp: z.string(),
});

export type Notification = z.infer<typeof NotificationSchema>;

export function notification(
  roomId: string,
  id: string,
  input: z.infer<typeof NotificationInputSchema>,
): Notification {
  return { type: NOTIFICATION, room_id: roomId, id, ...input, timestamp: new Date().toISOString() };
}

export const notificationBacklog = (roomId: string, notifications: Notification[], unreadCount: number) =>
  createFrame(NOTIFICATION_BACKLOG, { notifications, unread_count: unreadCount }, roomId);

export const notificationMarkedRead = (roomId: string, notificationId: string) =>
  createFrame(NOTIFICATION_MARKED_READ, { notification_id: notificationId }, roomId);

export const unreadCount = (roomId: string, count: number) =>
  createFrame(UNREAD_COUNT, { count }, roomId);
