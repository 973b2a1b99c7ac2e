import { z } from 'zod';
import { createFrame } from '../frame';

export const PING = 'ping' as const;
export const PONG = 'pong' as const;
export const JOIN_ROOM = 'join_room' as const;
export const LEAVE_ROOM = 'leave_room' as const;
export const ROOM_JOINED = 'room_joined' as const;
export const ROOM_LEFT = 'room_left' as const;
export const USER_JOINED = 'user_joined' as const;
export const USER_LEFT = 'user_left' as const;
export const ERROR = 'error' as const;

export const RoomIdSchema = z.string().min(1).max(256);

export const PingFrameSchema = z.object({ type: z.literal(PING) });

export const JoinRoomFrameSchema = z.object({
  type: z.literal(JOIN_ROOM),
  room_id: RoomIdSchema,
});

export const LeaveRoomFrameSchema = z.object({
  type: z.literal(LEAVE_ROOM),
  room_id: RoomIdSchema,
});

export const RoomClientFrames = [PingFrameSchema, JoinRoomFrameSchema, LeaveRoomFrameSchema] as const;

export type PingFrame = z.infer<typeof PingFrameSchema>;
export type JoinRoomFrame = z.infer<typeof JoinRoomFrameSchema>;
export type LeaveRoomFrame = z.infer<typeof LeaveRoomFrameSchema>;

export const pong = () => createFrame(PONG, {});

export const roomJoined = (roomId: string, kind: string, members: string[]) =>
  createFrame(ROOM_JOINED, { room_kind: kind, members }, roomId);

export const roomLeft = (roomId: string) => createFrame(ROOM_LEFT, {}, roomId);

export const userJoined = (roomId: string, userId: string) =>
  createFrame(USER_JOINED, { user_id: userId }, roomId);

export const userLeft = (roomId: string, userId: string) =>
  createFrame(USER_LEFT, { user_id: userId }, roomId);

/** Error frames carry a message only: no code, no stack. */
export const errorFrame = (message: string) => createFrame(ERROR, { message });
