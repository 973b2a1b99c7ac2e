import { z } from 'zod';
import { RoomClientFrames } from './events/room';
import { ChatClientFrames } from './events/chat';
import { BoardClientFrames } from './events/board';
import { NotificationClientFrames } from './events/notification';
import { FrameEnvelopeSchema } from './frame';

export const ClientFrameSchema = z.discriminatedUnion('type', [
  ...RoomClientFrames,
  ...ChatClientFrames,
  ...BoardClientFrames,
  ...NotificationClientFrames,
]);

export type ClientFrame = z.infer<typeof ClientFrameSchema>;
export type ClientFrameType = ClientFrame['type'];

export type ParseResult =
  | { ok: true; frame: ClientFrame }
  | { ok: false; reason: 'invalid_json' | 'invalid_frame'; message: string };

export function parseClientFrame(raw: string): ParseResult {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return { ok: false, reason: 'invalid_json', message: 'Invalid JSON format' };
  }

  const envelope = FrameEnvelopeSchema.safeParse(json);
  if (!envelope.success) {
    return { ok: false, reason: 'invalid_frame', message: 'Frame must carry a type' };
  }

  const result = ClientFrameSchema.safeParse(json);
  if (!result.success) {
    const known = ClientFrameSchema.optionsMap.has(envelope.data.type);
    return {
      ok: false,
      reason: 'invalid_frame',
      message: known
        ? `Invalid ${envelope.data.type} frame`
        : `Unknown message type: ${envelope.data.type}`,
    };
  }
  return { ok: true, frame: result.data };
}
