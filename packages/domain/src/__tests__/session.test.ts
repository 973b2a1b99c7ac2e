import { describe, it, expect } from 'vitest';
import { isSessionExpired, selectSessionsToEvict, type Session } from '../session';

function session(id: string, hour: number): Session {
  return {
    id,
    userId: 'u1',
    issuedAt: new Date('2026-03-01T00:00:00Z'),
    expiresAt: new Date('2026-04-01T00:00:00Z'),
    lastActivityAt: new Date(Date.UTC(2026, 2, 1, hour)),
    deviceFingerprint: null,
    userAgent: null,
    active: true,
  };
}

describe('selectSessionsToEvict', () => {
  it('returns nothing at or under the cap', () => {
    expect(selectSessionsToEvict([session('S1', 1), session('S2', 2)], 2, 'S1')).toEqual([]);
  });

  it('keeps the most recently active sessions', () => {
    const evicted = selectSessionsToEvict(
      [session('S1', 1), session('S2', 2), session('S3', 3), session('S4', 4), session('S5', 5)],
      3,
      'S5',
    );
    expect(evicted.map((s) => s.id)).toEqual(['S2', 'S1']);
  });

  it('keeps the session in use regardless of its activity time', () => {
    const evicted = selectSessionsToEvict([session('S1', 1), session('S2', 2), session('S3', 3)], 2, 'S1');
    expect(evicted.map((s) => s.id)).toEqual(['S2']);
  });
});

describe('isSessionExpired', () => {
  it('expires only after the expiry instant', () => {
    const s = session('S1', 1);
    expect(isSessionExpired(s, new Date('2026-04-01T00:00:00Z'))).toBe(false);
    expect(isSessionExpired(s, new Date('2026-04-01T00:00:00.001Z'))).toBe(true);
  });
});
