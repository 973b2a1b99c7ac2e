import { EventEmitter } from 'node:events';
import type Redis from 'ioredis';
import { createLogger, errorMessage } from './logger';

const logger = createLogger({ name: 'coordination-store' });

export interface SlidingWindowRequest {
  key: string;
  nowMs: number;
  windowMs: number;
  limit: number;
  /** Unique per attempt; removed again when the attempt is rejected. */
  member: string;
  ttlSeconds: number;
}

export interface SlidingWindowResult {
  admitted: boolean;
  /** Entries inside the window after this attempt. */
  count: number;
  /** Score of the oldest entry still in the window, null when it is empty. */
  oldestScore: number | null;
}

export type MessageListener = (message: string) => void;

export interface CoordinationStore {
  incr(key: string): Promise<number>;
  expire(key: string, seconds: number): Promise<void>;
  /** Remaining TTL in seconds; -1 without expiry, -2 when the key is absent. */
  ttl(key: string): Promise<number>;
  zadd(key: string, score: number, member: string): Promise<void>;
  zremRangeByScore(key: string, min: number, max: number): Promise<number>;
  zcard(key: string): Promise<number>;
  zrem(key: string, member: string): Promise<void>;
  sadd(key: string, member: string): Promise<void>;
  srem(key: string, member: string): Promise<void>;
  smembers(key: string): Promise<string[]>;
  slidingWindow(req: SlidingWindowRequest): Promise<SlidingWindowResult>;
  publish(channel: string, message: string): Promise<void>;
  subscribe(channel: string, listener: MessageListener): Promise<() => Promise<void>>;
  close(): Promise<void>;
}

export class CoordinationStoreUnavailableError extends Error {
  constructor(
    public readonly operation: string,
    cause: unknown,
  ) {
    super(`Coordination store unavailable during ${operation}: ${errorMessage(cause)}`, { cause });
    this.name = 'CoordinationStoreUnavailableError';
  }
}

// Steps run as one script so concurrent callers on a key cannot interleave.
const SLIDING_WINDOW_SCRIPT = `
local key = KEYS[1]
local now = tonumber(ARGV[1])
local window = tonumber(ARGV[2])
local limit = tonumber(ARGV[3])
local member = ARGV[4]
local ttl = tonumber(ARGV[5])

redis.call('ZREMRANGEBYSCORE', key, '-inf', '(' .. (now - window))
local count = redis.call('ZCARD', key)
redis.call('ZADD', key, now, member)
redis.call('EXPIRE', key, ttl)

local admitted = 1
if count + 1 > limit then
  redis.call('ZREM', key, member)
  admitted = 0
else
  count = count + 1
end

local oldest = redis.call('ZRANGE', key, 0, 0, 'WITHSCORES')
local oldestScore = -1
if oldest[2] then
  oldestScore = tonumber(oldest[2])
end
return {admitted, count, oldestScore}
`;

function parseSlidingWindowReply(reply: unknown): SlidingWindowResult {
  if (!Array.isArray(reply) || reply.length !== 3) {
    throw new Error('Unexpected sliding window reply');
  }
  const [admitted, count, oldest]: unknown[] = reply;
  if (typeof admitted !== 'number' || typeof count !== 'number' || typeof oldest !== 'number') {
    throw new Error('Unexpected sliding window reply');
  }
  return { admitted: admitted === 1, count, oldestScore: oldest < 0 ? null : oldest };
}

export class RedisCoordinationStore implements CoordinationStore {
  private subscriber: Redis | null = null;
  private readonly listeners = new Map<string, Set<MessageListener>>();

  constructor(private readonly redis: Redis) {}

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw new CoordinationStoreUnavailableError(operation, err);
    }
  }

  incr(key: string): Promise<number> {
    return this.run('incr', () => this.redis.incr(key));
  }

  async expire(key: string, seconds: number): Promise<void> {
    await this.run('expire', () => this.redis.expire(key, seconds));
  }

  ttl(key: string): Promise<number> {
    return this.run('ttl', () => this.redis.ttl(key));
  }

  async zadd(key: string, score: number, member: string): Promise<void> {
    await this.run('zadd', () => this.redis.zadd(key, score, member));
  }

  zremRangeByScore(key: string, min: number, max: number): Promise<number> {
    return this.run('zremrangebyscore', () => this.redis.zremrangebyscore(key, min, max));
  }

  zcard(key: string): Promise<number> {
    return this.run('zcard', () => this.redis.zcard(key));
  }

  async zrem(key: string, member: string): Promise<void> {
    await this.run('zrem', () => this.redis.zrem(key, member));
  }

  async sadd(key: string, member: string): Promise<void> {
    await this.run('sadd', () => this.redis.sadd(key, member));
  }

  async srem(key: string, member: string): Promise<void> {
    await this.run('srem', () => this.redis.srem(key, member));
  }

  smembers(key: string): Promise<string[]> {
    return this.run('smembers', () => this.redis.smembers(key));
  }

  async slidingWindow(req: SlidingWindowRequest): Promise<SlidingWindowResult> {
    const reply = await this.run('slidingWindow', () =>
      this.redis.eval(
        SLIDING_WINDOW_SCRIPT,
        1,
        req.key,
        req.nowMs,
        req.windowMs,
        req.limit,
        req.member,
        req.ttlSeconds,
      ),
    );
    return parseSlidingWindowReply(reply);
  }

  async publish(channel: string, message: string): Promise<void> {
    await this.run('publish', () => this.redis.publish(channel, message));
  }

  private getSubscriber(): Redis {
    if (this.subscriber) return this.subscriber;
    const sub = this.redis.duplicate();
    sub.on('message', (channel: string, message: string) => {
      const set = this.listeners.get(channel);
      if (!set) return;
      for (const listener of set) {
        try {
          listener(message);
        } catch (err) {
          logger.error({ channel, err: errorMessage(err) }, 'Pub/sub listener threw');
        }
      }
    });
    sub.on('error', (err: Error) => {
      logger.error({ err: err.message }, 'Subscriber connection error');
    });
    this.subscriber = sub;
    return sub;
  }

  async subscribe(channel: string, listener: MessageListener): Promise<() => Promise<void>> {
    const sub = this.getSubscriber();
    let set = this.listeners.get(channel);
    if (!set) {
      set = new Set();
      this.listeners.set(channel, set);
      await this.run('subscribe', () => sub.subscribe(channel));
    }
    set.add(listener);

    return async () => {
      const current = this.listeners.get(channel);
      if (!current) return;
      current.delete(listener);
      if (current.size === 0) {
        this.listeners.delete(channel);
        await this.run('unsubscribe', () => sub.unsubscribe(channel));
      }
    };
  }

  async close(): Promise<void> {
    this.listeners.clear();
    if (this.subscriber) {
      await this.subscriber.quit();
      this.subscriber = null;
    }
  }
}

interface Expiring<T> {
  value: T;
  expiresAt: number | null;
}

/**
 * Process-local store with the same semantics as the Redis adapter. Expiry is
 * evaluated lazily against the injected clock.
 */
export class InMemoryCoordinationStore implements CoordinationStore {
  private readonly counters = new Map<string, Expiring<number>>();
  private readonly zsets = new Map<string, Expiring<Map<string, number>>>();
  private readonly sets = new Map<string, Expiring<Set<string>>>();
  private readonly bus = new EventEmitter();

  constructor(private readonly clock: () => number = Date.now) {
    this.bus.setMaxListeners(0);
  }

  private live<T>(map: Map<string, Expiring<T>>, key: string): Expiring<T> | undefined {
    const entry = map.get(key);
    if (entry && entry.expiresAt !== null && entry.expiresAt <= this.clock()) {
      map.delete(key);
      return undefined;
    }
    return entry;
  }

  private zset(key: string): Map<string, number> {
    const entry = this.live(this.zsets, key);
    if (entry) return entry.value;
    const value = new Map<string, number>();
    this.zsets.set(key, { value, expiresAt: null });
    return value;
  }

  private findEntry(key: string): Expiring<unknown> | undefined {
    return this.live(this.counters, key) ?? this.live(this.zsets, key) ?? this.live(this.sets, key);
  }

  async incr(key: string): Promise<number> {
    const entry = this.live(this.counters, key);
    if (entry) {
      entry.value += 1;
      return entry.value;
    }
    this.counters.set(key, { value: 1, expiresAt: null });
    return 1;
  }

  async expire(key: string, seconds: number): Promise<void> {
    const entry = this.findEntry(key);
    if (entry) entry.expiresAt = this.clock() + seconds * 1000;
  }

  async ttl(key: string): Promise<number> {
    const entry = this.findEntry(key);
    if (!entry) return -2;
    if (entry.expiresAt === null) return -1;
    return Math.ceil((entry.expiresAt - this.clock()) / 1000);
  }

  async zadd(key: string, score: number, member: string): Promise<void> {
    this.zset(key).set(member, score);
  }

  async zremRangeByScore(key: string, min: number, max: number): Promise<number> {
    const entry = this.live(this.zsets, key);
    if (!entry) return 0;
    let removed = 0;
    for (const [member, score] of entry.value) {
      if (score >= min && score <= max) {
        entry.value.delete(member);
        removed++;
      }
    }
    return removed;
  }

  async zcard(key: string): Promise<number> {
    return this.live(this.zsets, key)?.value.size ?? 0;
  }

  async zrem(key: string, member: string): Promise<void> {
    this.live(this.zsets, key)?.value.delete(member);
  }

  async sadd(key: string, member: string): Promise<void> {
    const entry = this.live(this.sets, key);
    if (entry) {
      entry.value.add(member);
    } else {
      this.sets.set(key, { value: new Set([member]), expiresAt: null });
    }
  }

  async srem(key: string, member: string): Promise<void> {
    const entry = this.live(this.sets, key);
    if (!entry) return;
    entry.value.delete(member);
    if (entry.value.size === 0) this.sets.delete(key);
  }

  async smembers(key: string): Promise<string[]> {
    return [...(this.live(this.sets, key)?.value ?? [])];
  }

  async slidingWindow(req: SlidingWindowRequest): Promise<SlidingWindowResult> {
    const set = this.zset(req.key);
    const threshold = req.nowMs - req.windowMs;
    for (const [member, score] of set) {
      if (score < threshold) set.delete(member);
    }

    let count = set.size;
    set.set(req.member, req.nowMs);
    await this.expire(req.key, req.ttlSeconds);

    const admitted = count + 1 <= req.limit;
    if (admitted) {
      count += 1;
    } else {
      set.delete(req.member);
    }

    let oldestScore: number | null = null;
    for (const score of set.values()) {
      if (oldestScore === null || score < oldestScore) oldestScore = score;
    }
    return { admitted, count, oldestScore };
  }

  async publish(channel: string, message: string): Promise<void> {
    this.bus.emit(channel, message);
  }

  async subscribe(channel: string, listener: MessageListener): Promise<() => Promise<void>> {
    this.bus.on(channel, listener);
    return async () => {
      this.bus.off(channel, listener);
    };
  }

  async close(): Promise<void> {
    this.bus.removeAllListeners();
  }
}
