import { type DeactivationReason, type Session, type SessionRepository } from '@gatehouse/domain';
import { queryable, toDate, toNullableString, type Row } from '../rows';

const SESSION_COLUMNS = `id, user_id, issued_at, expires_at, last_activity_at,
  device_fingerprint, user_agent, is_active`;

export class PgSessionRepository implements SessionRepository {
  async create(
    tx: unknown,
    session: {
      id: string;
      userId: string;
      expiresAt: Date;
      deviceFingerprint: string | null;
      userAgent: string | null;
    },
  ): Promise<Session> {
    const result = await queryable(tx).query(
      `INSERT INTO user_sessions (id, user_id, expires_at, device_fingerprint, user_agent)
       VALUES ($1, $2, $3, $4, $5)
       RETURNING ${SESSION_COLUMNS}`,
      [session.id, session.userId, session.expiresAt, session.deviceFingerprint, session.userAgent],
    );
    return mapSessionRow(result.rows[0]);
  }

  async findById(tx: unknown, id: string): Promise<Session | null> {
    const result = await queryable(tx).query(
      `SELECT ${SESSION_COLUMNS} FROM user_sessions WHERE id = $1`,
      [id],
    );
    return result.rows[0] ? mapSessionRow(result.rows[0]) : null;
  }

  async touch(tx: unknown, id: string, at: Date): Promise<void> {
    await queryable(tx).query(
      `UPDATE user_sessions SET last_activity_at = GREATEST(last_activity_at, $2)
       WHERE id = $1 AND is_active`,
      [id, at],
    );
  }

  async listActiveForUser(tx: unknown, userId: string): Promise<Session[]> {
    const result = await queryable(tx).query(
      `SELECT ${SESSION_COLUMNS} FROM user_sessions
       WHERE user_id = $1 AND is_active
       ORDER BY last_activity_at DESC`,
      [userId],
    );
    return result.rows.map(mapSessionRow);
  }

  async deactivate(tx: unknown, ids: string[], reason: DeactivationReason): Promise<number> {
    if (ids.length === 0) return 0;
    const result = await queryable(tx).query(
      `UPDATE user_sessions
       SET is_active = FALSE, deactivated_at = NOW(), deactivation_reason = $2
       WHERE id = ANY($1) AND is_active`,
      [ids, reason],
    );
    return result.rowCount ?? 0;
  }

  async deactivateAllForUser(tx: unknown, userId: string, reason: DeactivationReason): Promise<number> {
    const result = await queryable(tx).query(
      `UPDATE user_sessions
       SET is_active = FALSE, deactivated_at = NOW(), deactivation_reason = $2
       WHERE user_id = $1 AND is_active`,
      [userId, reason],
    );
    return result.rowCount ?? 0;
  }
}

function mapSessionRow(row: Row): Session {
  return {
    id: String(row.id),
    userId: String(row.user_id),
    issuedAt: toDate(row.issued_at),
    expiresAt: toDate(row.expires_at),
    lastActivityAt: toDate(row.last_activity_at),
    deviceFingerprint: toNullableString(row.device_fingerprint),
    userAgent: toNullableString(row.user_agent),
    active: row.is_active === true,
  };
}
