import { type FastifyReply, type FastifyRequest } from 'fastify';
import { type TokenService } from '@gatehouse/domain';
import { AppError, createLogger, resolveClientIp, type RequestGate } from '@gatehouse/shared';

const logger = createLogger({ name: 'api:rate-limit' });

export interface RateLimitHookOptions {
  gate: RequestGate;
  tokenService: TokenService;
  /** Read the client address from X-Forwarded-For / X-Real-IP. */
  trustProxy: boolean;
}

function bearer(request: FastifyRequest): string | null {
  const header = request.headers.authorization;
  if (!header?.startsWith('Bearer ')) return null;
  return header.slice('Bearer '.length).trim() || null;
}

/**
 * onRequest hook: every request passes the burst counter and its rule's
 * sliding window before any route runs. Per-user rules key on the verified
 * bearer subject and fall back to the address.
 */
export function createRateLimiter(opts: RateLimitHookOptions) {
  const { gate, tokenService, trustProxy } = opts;

  async function subjectUser(request: FastifyRequest): Promise<string | null> {
    const token = bearer(request);
    if (!token) return null;
    try {
      const { userId } = await tokenService.verifyAccessToken(token);
      return userId;
    } catch {
      // An unverifiable token limits by address; the session guard rejects it later.
      return null;
    }
  }

  return async function rateLimit(request: FastifyRequest, reply: FastifyReply) {
    const ip = trustProxy ? resolveClientIp(request.headers, request.ip) : request.ip;
    const decision = await gate.check({ path: request.url, ip, userId: await subjectUser(request) });

    switch (decision.kind) {
      case 'bypassed':
        return;
      case 'admitted':
        void reply
          .header('X-RateLimit-Limit', String(decision.decision.limit))
          .header('X-RateLimit-Remaining', String(decision.decision.remaining))
          .header('X-RateLimit-Reset', String(decision.decision.resetAt));
        return;
      case 'rejected':
        logger.warn(
          { rule: decision.rule.name, reason: decision.reason, requestId: request.id },
          'Rate limit exceeded',
        );
        void reply
          .header('X-RateLimit-Limit', String(decision.limit))
          .header('X-RateLimit-Remaining', String(decision.remaining))
          .header('X-RateLimit-Reset', String(decision.resetAt));
        throw AppError.rateLimited(decision.retryAfterSeconds);
    }
  };
}
