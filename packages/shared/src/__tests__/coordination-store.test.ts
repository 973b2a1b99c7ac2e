import { describe, it, expect, vi } from 'vitest';
import { InMemoryCoordinationStore } from '../coordination-store';

const T0 = 1_700_000_000_000;

function window(nowMs: number, member: string) {
  return { key: 'rate_limit:auth:ip:1.2.3.4:900', nowMs, windowMs: 60_000, limit: 2, member, ttlSeconds: 70 };
}

describe('InMemoryCoordinationStore', () => {
  describe('slidingWindow', () => {
    it('admits up to the limit and removes the rejected attempt', async () => {
      const store = new InMemoryCoordinationStore(() => T0);

      expect(await store.slidingWindow(window(T0, 'a'))).toEqual({ admitted: true, count: 1, oldestScore: T0 });
      expect(await store.slidingWindow(window(T0 + 10, 'b'))).toEqual({
        admitted: true,
        count: 2,
        oldestScore: T0,
      });
      expect(await store.slidingWindow(window(T0 + 20, 'c'))).toEqual({
        admitted: false,
        count: 2,
        oldestScore: T0,
      });
      expect(await store.zcard('rate_limit:auth:ip:1.2.3.4:900')).toBe(2);
    });

    it('drops entries older than the window', async () => {
      const store = new InMemoryCoordinationStore(() => T0);
      await store.slidingWindow(window(T0, 'a'));
      await store.slidingWindow(window(T0 + 30_000, 'b'));

      const result = await store.slidingWindow(window(T0 + 60_001, 'c'));

      expect(result).toEqual({ admitted: true, count: 2, oldestScore: T0 + 30_000 });
    });

    it('expires the whole key after its ttl', async () => {
      let now = T0;
      const store = new InMemoryCoordinationStore(() => now);
      await store.slidingWindow(window(T0, 'a'));

      expect(await store.ttl('rate_limit:auth:ip:1.2.3.4:900')).toBe(70);
      now += 70_000;
      expect(await store.ttl('rate_limit:auth:ip:1.2.3.4:900')).toBe(-2);
    });
  });

  it('counts with incr and reports ttl states', async () => {
    let now = T0;
    const store = new InMemoryCoordinationStore(() => now);

    expect(await store.ttl('burst_limit:ip:1.2.3.4')).toBe(-2);
    expect(await store.incr('burst_limit:ip:1.2.3.4')).toBe(1);
    expect(await store.ttl('burst_limit:ip:1.2.3.4')).toBe(-1);
    await store.expire('burst_limit:ip:1.2.3.4', 60);
    expect(await store.incr('burst_limit:ip:1.2.3.4')).toBe(2);

    now += 59_500;
    expect(await store.ttl('burst_limit:ip:1.2.3.4')).toBe(1);
    now += 500;
    expect(await store.incr('burst_limit:ip:1.2.3.4')).toBe(1);
  });

  it('supports sorted set primitives', async () => {
    const store = new InMemoryCoordinationStore();
    await store.zadd('z', 1, 'a');
    await store.zadd('z', 5, 'b');
    await store.zadd('z', 9, 'c');

    expect(await store.zremRangeByScore('z', 0, 5)).toBe(2);
    expect(await store.zcard('z')).toBe(1);
    await store.zrem('z', 'c');
    expect(await store.zcard('z')).toBe(0);
  });

  it('keeps set members', async () => {
    const store = new InMemoryCoordinationStore();
    await store.sadd('presence:chat:general:lobby', 'u1');
    await store.sadd('presence:chat:general:lobby', 'u2');
    await store.sadd('presence:chat:general:lobby', 'u1');
    await store.srem('presence:chat:general:lobby', 'u2');

    expect(await store.smembers('presence:chat:general:lobby')).toEqual(['u1']);
    expect(await store.smembers('presence:missing')).toEqual([]);
  });

  it('delivers publications to subscribers until they unsubscribe', async () => {
    const store = new InMemoryCoordinationStore();
    const listener = vi.fn();
    const unsubscribe = await store.subscribe('gateway:room:board:1', listener);

    await store.publish('gateway:room:board:1', 'first');
    await store.publish('gateway:room:board:2', 'elsewhere');
    await unsubscribe();
    await store.publish('gateway:room:board:1', 'second');

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith('first');
  });
});
