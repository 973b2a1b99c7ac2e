export interface Session {
  id: string;
  userId: string;
  issuedAt: Date;
  expiresAt: Date;
  lastActivityAt: Date;
  deviceFingerprint: string | null;
  userAgent: string | null;
  active: boolean;
}

export type DeactivationReason = 'logout' | 'evicted' | 'expired' | 'revoked';

export function isSessionExpired(session: Session, now: Date): boolean {
  return now.getTime() > session.expiresAt.getTime();
}

/**
 * Picks the active sessions to deactivate so that at most `cap` remain. The
 * most recently active sessions are kept, and `keepId` (the session being
 * used right now) is never chosen.
 */
export function selectSessionsToEvict(active: Session[], cap: number, keepId: string): Session[] {
  const limit = Math.max(1, cap);
  if (active.length <= limit) return [];

  const others = active
    .filter((s) => s.id !== keepId)
    .sort((a, b) => {
      const diff = b.lastActivityAt.getTime() - a.lastActivityAt.getTime();
      return diff !== 0 ? diff : a.id.localeCompare(b.id);
    });

  const keepOthers = active.some((s) => s.id === keepId) ? limit - 1 : limit;
  return others.slice(keepOthers);
}
