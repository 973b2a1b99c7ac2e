import { z } from 'zod';

export const StoreKeys = {
  roomMessages: (roomId: string) => `room:${roomId}:messages`,

  roomPresence: (roomId: string) => `presence:${roomId}`,

  readNotifications: (userId: string) => `notifications:${userId}:read`,
} as const;

export const Channels = {
  room: (roomId: string) => `gateway:room:${roomId}`,
} as const;

/**
 * What one gateway instance publishes for the others: a ready-to-send frame
 * plus enough to let receivers skip their own publications.
 */
export const FanoutEnvelopeSchema = z.object({
  origin: z.string().min(1),
  room_id: z.string().min(1),
  frame: z.record(z.unknown()),
});

export type FanoutEnvelope = z.infer<typeof FanoutEnvelopeSchema>;
