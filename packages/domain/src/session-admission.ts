import { isSessionExpired, selectSessionsToEvict, type Session } from './session';
import {
  CredentialError,
  type DomainLogger,
  type SessionRepository,
  type TokenService,
  type WithTransaction,
} from './ports';

export type SessionAuthErrorKind =
  | 'INVALID_CREDENTIAL'
  | 'EXPIRED_SESSION'
  | 'SESSION_NOT_FOUND'
  | 'REVOKED_SESSION';

/**
 * All kinds surface to clients as one "unauthorized" outcome; the kind itself
 * is for logs only.
 */
export class SessionAuthError extends Error {
  constructor(
    public readonly kind: SessionAuthErrorKind,
    message: string,
  ) {
    super(message);
    this.name = 'SessionAuthError';
  }
}

export interface SessionAdmissionDeps {
  sessionRepo: SessionRepository;
  tokenService: TokenService;
  withTransaction: WithTransaction;
  maxSessionsPerUser: number;
  logger: DomainLogger;
  clock?: () => Date;
}

export class SessionAdmissionController {
  private readonly clock: () => Date;

  constructor(private readonly deps: SessionAdmissionDeps) {
    this.clock = deps.clock ?? (() => new Date());
  }

  async authorize(credential: string): Promise<Session> {
    const { userId, sessionId } = await this.verify(credential);
    const { sessionRepo, withTransaction } = this.deps;
    const now = this.clock();

    const session = await withTransaction((tx) => sessionRepo.findById(tx, sessionId));
    if (!session) {
      throw new SessionAuthError('SESSION_NOT_FOUND', 'Session not found');
    }
    if (session.userId !== userId) {
      throw new SessionAuthError('INVALID_CREDENTIAL', 'Credential does not match session');
    }
    if (!session.active) {
      throw new SessionAuthError('REVOKED_SESSION', 'Session is no longer active');
    }
    if (isSessionExpired(session, now)) {
      await this.bestEffort('expire', () =>
        withTransaction((tx) => sessionRepo.deactivate(tx, [session.id], 'expired')),
      );
      throw new SessionAuthError('EXPIRED_SESSION', 'Session has expired');
    }

    await this.bestEffort('touch', () =>
      withTransaction((tx) => sessionRepo.touch(tx, session.id, now)),
    );
    const current: Session = { ...session, lastActivityAt: now };

    await this.bestEffort('evict', () => this.enforceCap(current));
    return current;
  }

  private async verify(credential: string): Promise<{ userId: string; sessionId: string }> {
    try {
      return await this.deps.tokenService.verifyAccessToken(credential);
    } catch (err) {
      if (err instanceof CredentialError && err.reason === 'expired') {
        throw new SessionAuthError('EXPIRED_SESSION', 'Credential has expired');
      }
      throw new SessionAuthError('INVALID_CREDENTIAL', 'Credential could not be verified');
    }
  }

  private async enforceCap(current: Session): Promise<void> {
    const { sessionRepo, withTransaction, maxSessionsPerUser, logger } = this.deps;

    await withTransaction(async (tx) => {
      const active = await sessionRepo.listActiveForUser(tx, current.userId);
      // The stored row may predate the touch above, so use the refreshed copy.
      const view = active.map((s) => (s.id === current.id ? current : s));
      const evict = selectSessionsToEvict(view, maxSessionsPerUser, current.id);
      if (evict.length === 0) return;

      await sessionRepo.deactivate(
        tx,
        evict.map((s) => s.id),
        'evicted',
      );
      logger.info(
        { userId: current.userId, evicted: evict.length, cap: maxSessionsPerUser },
        'Evicted sessions over the per-user cap',
      );
    });
  }

  private async bestEffort(step: string, fn: () => Promise<unknown>): Promise<void> {
    try {
      await fn();
    } catch (err) {
      this.deps.logger.error(
        { step, err: err instanceof Error ? err.message : String(err) },
        'Session bookkeeping failed, continuing',
      );
    }
  }
}
