import { type FastifyInstance } from 'fastify';
import { z } from 'zod';
import { SessionError, type Session, type SessionService } from '@gatehouse/domain';
import { AppError, ErrorCode } from '@gatehouse/shared';
import { currentSession, type createSessionGuard } from '../plugins/session';

interface SessionRouteDeps {
  sessionService: SessionService;
  requireSession: ReturnType<typeof createSessionGuard>;
}

const SessionParamsSchema = z.object({
  sessionId: z.string().min(1).max(64),
});

function toSessionView(session: Session, currentId: string) {
  return {
    id: session.id,
    issuedAt: session.issuedAt.toISOString(),
    expiresAt: session.expiresAt.toISOString(),
    lastActivityAt: session.lastActivityAt.toISOString(),
    userAgent: session.userAgent,
    current: session.id === currentId,
  };
}

function mapSessionError(err: unknown): never {
  if (err instanceof SessionError) {
    throw new AppError(ErrorCode.NOT_FOUND, err.message);
  }
  throw err;
}

export function registerSessionRoutes(app: FastifyInstance, deps: SessionRouteDeps): void {
  const { sessionService, requireSession } = deps;

  app.get('/api/v1/sessions', { preHandler: [requireSession] }, async (request) => {
    const session = currentSession(request);
    const sessions = await sessionService.listActive(session.userId);
    return { sessions: sessions.map((s) => toSessionView(s, session.id)) };
  });

  app.delete('/api/v1/sessions/:sessionId', { preHandler: [requireSession] }, async (request, reply) => {
    const parsed = SessionParamsSchema.safeParse(request.params);
    if (!parsed.success) {
      throw new AppError(ErrorCode.VALIDATION, 'Invalid session id');
    }

    try {
      await sessionService.revoke(currentSession(request).userId, parsed.data.sessionId);
    } catch (err) {
      return mapSessionError(err);
    }
    return reply.status(204).send();
  });

  app.delete('/api/v1/sessions', { preHandler: [requireSession] }, async (request) => {
    const revoked = await sessionService.revokeAll(currentSession(request).userId);
    return { revoked };
  });
}
