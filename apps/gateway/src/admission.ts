import { type IncomingHttpHeaders } from 'node:http';
import { SessionAuthError, type SessionAdmissionController, type Session } from '@gatehouse/domain';
import {
  AppError,
  ErrorCode,
  createLogger,
  resolveClientIp,
  type NamedRule,
  type RequestGate,
  type SafeLogger,
} from '@gatehouse/shared';

export const GATEWAY_PATH = '/ws';

export interface UpgradeRequest {
  url: string;
  headers: IncomingHttpHeaders;
  remoteAddress: string | undefined;
}

export interface Admission {
  session: Session;
  ip: string;
  /** Room named in the upgrade path, joined right after admission. */
  roomId: string | null;
}

export type UpgradeTarget = { ok: true; roomId: string | null } | { ok: false };

/** `/ws` or `/ws/{roomId}`; anything else is not a gateway path. */
export function parseUpgradePath(pathname: string): UpgradeTarget {
  if (pathname === GATEWAY_PATH || pathname === `${GATEWAY_PATH}/`) return { ok: true, roomId: null };
  if (!pathname.startsWith(`${GATEWAY_PATH}/`)) return { ok: false };
  const segment = pathname.slice(GATEWAY_PATH.length + 1);
  if (segment.includes('/')) return { ok: false };
  try {
    return { ok: true, roomId: decodeURIComponent(segment) };
  } catch {
    return { ok: false };
  }
}

/** Bearer header first, then the `token` query parameter browsers can set. */
export function extractCredential(headers: IncomingHttpHeaders, url: URL): string | null {
  const header = headers.authorization;
  if (header?.startsWith('Bearer ')) {
    const token = header.slice('Bearer '.length).trim();
    if (token) return token;
  }
  return url.searchParams.get('token') || null;
}

export interface AdmissionGateDeps {
  gate: RequestGate;
  rule: NamedRule;
  sessions: SessionAdmissionController;
  logger?: SafeLogger;
}

/**
 * Rate limit, then credential, then session. Runs before any room logic; a
 * rejection becomes the close code of the socket.
 */
export class AdmissionGate {
  private readonly logger: SafeLogger;

  constructor(private readonly deps: AdmissionGateDeps) {
    this.logger = deps.logger ?? createLogger({ name: 'gateway:admission' });
  }

  async admit(req: UpgradeRequest): Promise<Admission> {
    const url = new URL(req.url, 'http://gateway.invalid');
    const target = parseUpgradePath(url.pathname);
    if (!target.ok) throw new AppError(ErrorCode.NOT_FOUND, 'Unknown gateway path');

    const ip = resolveClientIp(req.headers, req.remoteAddress);
    const decision = await this.deps.gate.checkRule(this.deps.rule, { path: url.pathname, ip });
    if (decision.kind === 'rejected') {
      this.logger.warn(
        { rule: decision.rule.name, reason: decision.reason, retryAfter: decision.retryAfterSeconds },
        'Connection attempt rate limited',
      );
      throw AppError.rateLimited(decision.retryAfterSeconds);
    }

    const credential = extractCredential(req.headers, url);
    if (!credential) {
      this.logger.info({ kind: 'MISSING_CREDENTIAL' }, 'Connection rejected');
      throw AppError.unauthorized();
    }

    try {
      const session = await this.deps.sessions.authorize(credential);
      return { session, ip, roomId: target.roomId };
    } catch (err) {
      if (err instanceof SessionAuthError) {
        this.logger.info({ kind: err.kind }, 'Connection rejected');
        throw AppError.unauthorized();
      }
      throw err;
    }
  }
}
