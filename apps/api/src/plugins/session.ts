import { type FastifyReply, type FastifyRequest } from 'fastify';
import { SessionAuthError, type Session, type SessionAdmissionController } from '@gatehouse/domain';
import { AppError, createLogger } from '@gatehouse/shared';

const logger = createLogger({ name: 'api:session' });

declare module 'fastify' {
  interface FastifyRequest {
    session?: Session;
  }
}

/** preHandler for routes that need a live session. */
export function createSessionGuard(sessions: SessionAdmissionController) {
  return async function requireSession(request: FastifyRequest, reply: FastifyReply) {
    const header = request.headers.authorization;
    if (!header?.startsWith('Bearer ')) {
      throw AppError.unauthorized();
    }

    try {
      const session = await sessions.authorize(header.slice('Bearer '.length).trim());
      request.session = session;
      void reply
        .header('X-Session-ID', session.id)
        .header('X-Session-Expires', session.expiresAt.toISOString());
    } catch (err) {
      if (err instanceof SessionAuthError) {
        logger.info({ kind: err.kind, requestId: request.id }, 'Session rejected');
        throw AppError.unauthorized();
      }
      throw err;
    }
  };
}

/** The session a guarded route runs under. */
export function currentSession(request: FastifyRequest): Session {
  if (!request.session) throw AppError.unauthorized();
  return request.session;
}
