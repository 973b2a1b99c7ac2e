import { type Session } from './session';
import { type SessionRepository, type TokenService, type WithTransaction } from './ports';

export interface SessionServiceDeps {
  sessionRepo: SessionRepository;
  tokenService: TokenService;
  withTransaction: WithTransaction;
  generateId: () => string;
  sessionTtlDays: number;
  clock?: () => Date;
}

export class SessionService {
  constructor(private readonly deps: SessionServiceDeps) {}

  /** Starts a session for an authenticated user and signs its access token. */
  async open(input: {
    userId: string;
    deviceFingerprint?: string | null;
    userAgent?: string | null;
  }): Promise<{ session: Session; accessToken: string }> {
    const { sessionRepo, tokenService, withTransaction, generateId } = this.deps;
    const now = this.deps.clock ? this.deps.clock() : new Date();

    const session = await withTransaction((tx) =>
      sessionRepo.create(tx, {
        id: generateId(),
        userId: input.userId,
        expiresAt: new Date(now.getTime() + this.deps.sessionTtlDays * 24 * 60 * 60 * 1000),
        deviceFingerprint: input.deviceFingerprint ?? null,
        userAgent: input.userAgent ?? null,
      }),
    );
    const accessToken = await tokenService.signAccessToken(session.userId, session.id);
    return { session, accessToken };
  }

  async listActive(userId: string): Promise<Session[]> {
    const sessions = await this.deps.withTransaction((tx) =>
      this.deps.sessionRepo.listActiveForUser(tx, userId),
    );
    return [...sessions].sort((a, b) => b.lastActivityAt.getTime() - a.lastActivityAt.getTime());
  }

  async revoke(userId: string, sessionId: string): Promise<void> {
    const { sessionRepo, withTransaction } = this.deps;
    await withTransaction(async (tx) => {
      const session = await sessionRepo.findById(tx, sessionId);
      // Someone else's session looks the same as a missing one.
      if (!session || session.userId !== userId || !session.active) {
        throw new SessionError('NOT_FOUND', 'Session not found');
      }
      await sessionRepo.deactivate(tx, [sessionId], 'logout');
    });
  }

  async revokeAll(userId: string): Promise<number> {
    return this.deps.withTransaction((tx) =>
      this.deps.sessionRepo.deactivateAllForUser(tx, userId, 'logout'),
    );
  }
}

export class SessionError extends Error {
  constructor(
    public readonly kind: 'NOT_FOUND',
    message: string,
  ) {
    super(message);
    this.name = 'SessionError';
  }
}
