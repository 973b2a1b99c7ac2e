import type Redis from 'ioredis';
import { z } from 'zod';
import { ChatMessageSchema, NotificationSchema, StoreKeys } from '@gatehouse/proto';

export const HistoryEntrySchema = z.discriminatedUnion('type', [ChatMessageSchema, NotificationSchema]);
export type HistoryEntry = z.infer<typeof HistoryEntrySchema>;

export const HISTORY_MAX_ENTRIES = 1000;
export const HISTORY_RETENTION_SECONDS = 30 * 24 * 60 * 60;

/**
 * Durable chat and notification backlog, newest first. The gateway writes on
 * publish and reads on join.
 */
export interface MessageHistoryStore {
  append(roomId: string, entry: HistoryEntry): Promise<void>;
  recent(roomId: string, limit: number): Promise<HistoryEntry[]>;
}

function decode(raw: string): HistoryEntry | null {
  try {
    const parsed = HistoryEntrySchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

export class RedisMessageHistoryStore implements MessageHistoryStore {
  constructor(private readonly redis: Redis) {}

  async append(roomId: string, entry: HistoryEntry): Promise<void> {
    const key = StoreKeys.roomMessages(roomId);
    const results = await this.redis
      .multi()
      .lpush(key, JSON.stringify(entry))
      .ltrim(key, 0, HISTORY_MAX_ENTRIES - 1)
      .expire(key, HISTORY_RETENTION_SECONDS)
      .exec();
    for (const [err] of results ?? []) {
      if (err) throw err;
    }
  }

  async recent(roomId: string, limit: number): Promise<HistoryEntry[]> {
    if (limit <= 0) return [];
    const raw = await this.redis.lrange(StoreKeys.roomMessages(roomId), 0, limit - 1);
    return raw.map(decode).filter((e): e is HistoryEntry => e !== null);
  }
}

export class InMemoryMessageHistoryStore implements MessageHistoryStore {
  private readonly lists = new Map<string, HistoryEntry[]>();

  async append(roomId: string, entry: HistoryEntry): Promise<void> {
    const list = this.lists.get(roomId) ?? [];
    list.unshift(entry);
    if (list.length > HISTORY_MAX_ENTRIES) list.length = HISTORY_MAX_ENTRIES;
    this.lists.set(roomId, list);
  }

  async recent(roomId: string, limit: number): Promise<HistoryEntry[]> {
    return (this.lists.get(roomId) ?? []).slice(0, Math.max(0, limit));
  }
}
