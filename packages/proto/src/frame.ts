import { z } from 'zod';

/**
 * Every frame on the wire, in both directions, is one JSON object:
 * `{ type, room_id?, ...fields, timestamp }`.
 */
export const FrameEnvelopeSchema = z
  .object({
    type: z.string().min(1),
    room_id: z.string().optional(),
    timestamp: z.string().datetime().optional(),
  })
  .passthrough();

export type FrameEnvelope = z.infer<typeof FrameEnvelopeSchema>;

export type Frame<T extends string, F extends object = Record<never, never>> = {
  type: T;
  room_id?: string;
  timestamp: string;
} & F;

export function createFrame<T extends string, F extends object>(
  type: T,
  fields: F,
  roomId?: string,
): Frame<T, F> {
  const frame = { type, ...fields, timestamp: new Date().toISOString() };
  return roomId === undefined ? frame : { ...frame, room_id: roomId };
}
