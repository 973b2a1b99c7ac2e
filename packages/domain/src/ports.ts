import { type Session, type DeactivationReason } from './session';
import { type Board, type BoardMutation, type MutationOutcome, type Receipt } from './board';

export interface SessionRepository {
  create(
    tx: unknown,
    session: {
      id: string;
      userId: string;
      expiresAt: Date;
      deviceFingerprint: string | null;
      userAgent: string | null;
    },
  ): Promise<Session>;
  findById(tx: unknown, id: string): Promise<Session | null>;
  touch(tx: unknown, id: string, at: Date): Promise<void>;
  listActiveForUser(tx: unknown, userId: string): Promise<Session[]>;
  deactivate(tx: unknown, ids: string[], reason: DeactivationReason): Promise<number>;
  deactivateAllForUser(tx: unknown, userId: string, reason: DeactivationReason): Promise<number>;
}

export interface BoardRepository {
  /** Organization that owns the board, null when the board does not exist. */
  findOrganizationId(tx: unknown, boardId: string): Promise<string | null>;
  getBoard(tx: unknown, boardId: string): Promise<Board | null>;
  apply(tx: unknown, boardId: string, mutation: BoardMutation, receipt: Receipt): Promise<MutationOutcome>;
}

export interface OrganizationDirectory {
  isMember(tx: unknown, organizationId: string, userId: string): Promise<boolean>;
}

export interface TokenService {
  signAccessToken(userId: string, sessionId: string): Promise<string>;
  /** Throws CredentialError for bad, tampered or expired tokens. */
  verifyAccessToken(token: string): Promise<{ userId: string; sessionId: string }>;
}

export class CredentialError extends Error {
  constructor(
    public readonly reason: 'expired' | 'invalid',
    message: string,
  ) {
    super(message);
    this.name = 'CredentialError';
  }
}

/** Subset of the shared logger the domain needs. */
export interface DomainLogger {
  info(meta: Record<string, unknown>, msg: string): void;
  warn(meta: Record<string, unknown>, msg: string): void;
  error(meta: Record<string, unknown>, msg: string): void;
}

export type WithTransaction = <T>(fn: (tx: unknown) => Promise<T>) => Promise<T>;
