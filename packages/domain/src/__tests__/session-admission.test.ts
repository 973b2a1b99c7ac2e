import { describe, it, expect, vi } from 'vitest';
import {
  SessionAdmissionController,
  SessionAuthError,
  type SessionAdmissionDeps,
} from '../session-admission';
import { CredentialError, type SessionRepository } from '../ports';
import { type Session } from '../session';

const NOW = new Date('2026-03-01T12:00:00Z');

function makeSession(overrides: Partial<Session> = {}): Session {
  return {
    id: 'S1',
    userId: 'u1',
    issuedAt: new Date('2026-02-01T00:00:00Z'),
    expiresAt: new Date('2026-04-01T00:00:00Z'),
    lastActivityAt: new Date('2026-02-01T00:00:00Z'),
    deviceFingerprint: null,
    userAgent: null,
    active: true,
    ...overrides,
  };
}

function createRepo(initial: Session[]): SessionRepository & { rows: Map<string, Session> } {
  const rows = new Map(initial.map((s) => [s.id, { ...s }]));
  return {
    rows,
    create: vi.fn(async () => {
      throw new Error('not used');
    }),
    findById: vi.fn(async (_tx: unknown, id: string) => rows.get(id) ?? null),
    touch: vi.fn(async (_tx: unknown, id: string, at: Date) => {
      const row = rows.get(id);
      if (row) row.lastActivityAt = at;
    }),
    listActiveForUser: vi.fn(async (_tx: unknown, userId: string) =>
      [...rows.values()].filter((s) => s.userId === userId && s.active),
    ),
    deactivate: vi.fn(async (_tx: unknown, ids: string[]) => {
      for (const id of ids) {
        const row = rows.get(id);
        if (row) row.active = false;
      }
      return ids.length;
    }),
    deactivateAllForUser: vi.fn(async () => 0),
  };
}

function createDeps(repo: SessionRepository, overrides: Partial<SessionAdmissionDeps> = {}) {
  const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
  const deps: SessionAdmissionDeps = {
    sessionRepo: repo,
    tokenService: {
      signAccessToken: vi.fn(async () => 'token'),
      verifyAccessToken: vi.fn(async (token: string) => {
        const [userId = '', sessionId = ''] = token.split('/');
        return { userId, sessionId };
      }),
    },
    withTransaction: async <T>(fn: (tx: unknown) => Promise<T>) => fn({}),
    maxSessionsPerUser: 5,
    logger,
    clock: () => NOW,
    ...overrides,
  };
  return { deps, logger };
}

describe('SessionAdmissionController', () => {
  it('admits a valid session and refreshes its activity', async () => {
    const repo = createRepo([makeSession()]);
    const { deps } = createDeps(repo);
    const controller = new SessionAdmissionController(deps);

    const session = await controller.authorize('u1/S1');

    expect(session.id).toBe('S1');
    expect(session.lastActivityAt).toEqual(NOW);
    expect(repo.rows.get('S1')?.lastActivityAt).toEqual(NOW);
  });

  it('evicts the least recently active session beyond the cap', async () => {
    const repo = createRepo([
      makeSession({ id: 'S1', lastActivityAt: new Date('2026-03-01T08:00:00Z') }),
      makeSession({ id: 'S2', lastActivityAt: new Date('2026-03-01T09:00:00Z') }),
      makeSession({ id: 'S3', lastActivityAt: new Date('2026-03-01T10:00:00Z') }),
      makeSession({ id: 'S4', lastActivityAt: new Date('2026-03-01T11:00:00Z') }),
    ]);
    const { deps } = createDeps(repo, { maxSessionsPerUser: 3 });
    const controller = new SessionAdmissionController(deps);

    await controller.authorize('u1/S4');

    const active = [...repo.rows.values()].filter((s) => s.active).map((s) => s.id);
    expect(active).toEqual(['S2', 'S3', 'S4']);
    expect(repo.rows.get('S1')?.active).toBe(false);
    expect(repo.deactivate).toHaveBeenCalledWith({}, ['S1'], 'evicted');
  });

  it('never evicts the session in use, even when it was the oldest', async () => {
    const repo = createRepo([
      makeSession({ id: 'S1', lastActivityAt: new Date('2026-03-01T08:00:00Z') }),
      makeSession({ id: 'S2', lastActivityAt: new Date('2026-03-01T09:00:00Z') }),
      makeSession({ id: 'S3', lastActivityAt: new Date('2026-03-01T10:00:00Z') }),
    ]);
    const { deps } = createDeps(repo, { maxSessionsPerUser: 2 });
    const controller = new SessionAdmissionController(deps);

    await controller.authorize('u1/S1');

    const active = [...repo.rows.values()].filter((s) => s.active).map((s) => s.id);
    expect(active).toEqual(['S1', 'S3']);
  });

  it('leaves other users alone', async () => {
    const repo = createRepo([
      makeSession({ id: 'S1' }),
      makeSession({ id: 'X1', userId: 'u2' }),
      makeSession({ id: 'X2', userId: 'u2' }),
    ]);
    const { deps } = createDeps(repo, { maxSessionsPerUser: 1 });
    const controller = new SessionAdmissionController(deps);

    await controller.authorize('u1/S1');

    expect(repo.rows.get('X1')?.active).toBe(true);
    expect(repo.rows.get('X2')?.active).toBe(true);
  });

  it('rejects a missing session', async () => {
    const { deps } = createDeps(createRepo([]));
    const controller = new SessionAdmissionController(deps);

    await expect(controller.authorize('u1/S9')).rejects.toMatchObject({
      kind: 'SESSION_NOT_FOUND',
    });
  });

  it('rejects a revoked session', async () => {
    const { deps } = createDeps(createRepo([makeSession({ active: false })]));
    const controller = new SessionAdmissionController(deps);

    await expect(controller.authorize('u1/S1')).rejects.toMatchObject({ kind: 'REVOKED_SESSION' });
  });

  it('rejects an expired session and deactivates it', async () => {
    const repo = createRepo([makeSession({ expiresAt: new Date('2026-03-01T11:59:59Z') })]);
    const { deps } = createDeps(repo);
    const controller = new SessionAdmissionController(deps);

    await expect(controller.authorize('u1/S1')).rejects.toMatchObject({ kind: 'EXPIRED_SESSION' });
    expect(repo.rows.get('S1')?.active).toBe(false);
  });

  it('rejects a credential whose subject does not own the session', async () => {
    const { deps } = createDeps(createRepo([makeSession()]));
    const controller = new SessionAdmissionController(deps);

    await expect(controller.authorize('u2/S1')).rejects.toMatchObject({
      kind: 'INVALID_CREDENTIAL',
    });
  });

  it('maps an expired credential to EXPIRED_SESSION', async () => {
    const { deps } = createDeps(createRepo([makeSession()]));
    deps.tokenService.verifyAccessToken = vi.fn(async () => {
      throw new CredentialError('expired', 'jwt expired');
    });
    const controller = new SessionAdmissionController(deps);

    await expect(controller.authorize('anything')).rejects.toMatchObject({
      kind: 'EXPIRED_SESSION',
    });
  });

  it('maps any other verification failure to INVALID_CREDENTIAL', async () => {
    const { deps } = createDeps(createRepo([makeSession()]));
    deps.tokenService.verifyAccessToken = vi.fn(async () => {
      throw new Error('signature verification failed');
    });
    const controller = new SessionAdmissionController(deps);

    const err = await controller.authorize('garbage').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(SessionAuthError);
    expect(err).toMatchObject({ kind: 'INVALID_CREDENTIAL' });
  });

  it('still admits when the activity refresh fails', async () => {
    const repo = createRepo([makeSession()]);
    repo.touch = vi.fn(async () => {
      throw new Error('connection reset');
    });
    const { deps, logger } = createDeps(repo);
    const controller = new SessionAdmissionController(deps);

    const session = await controller.authorize('u1/S1');

    expect(session.id).toBe('S1');
    expect(logger.error).toHaveBeenCalledWith(
      { step: 'touch', err: 'connection reset' },
      'Session bookkeeping failed, continuing',
    );
  });
});
