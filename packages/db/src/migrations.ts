import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { type Pool } from 'pg';
import { type SafeLogger } from '@gatehouse/shared';

export const MIGRATIONS_DIR = join(__dirname, '..', 'migrations');

// Arbitrary constant shared by every instance that may run migrations at boot.
const MIGRATION_LOCK_ID = 727_411;

export interface MigrationFile {
  name: string;
  sql: string;
}

/** Files not yet recorded, in name order. Non-SQL files are ignored. */
export function pendingMigrations(files: readonly string[], applied: ReadonlySet<string>): string[] {
  return files.filter((f) => f.endsWith('.sql') && !applied.has(f)).sort();
}

export async function readMigrations(dir: string = MIGRATIONS_DIR): Promise<string[]> {
  return readdir(dir);
}

/** The part of a pg client the runner uses. */
export interface MigrationClient {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
}

function recordedName(row: unknown): string | null {
  if (typeof row !== 'object' || row === null || !('name' in row)) return null;
  return typeof row.name === 'string' ? row.name : null;
}

async function applyOne(client: MigrationClient, file: MigrationFile): Promise<void> {
  await client.query('BEGIN');
  try {
    await client.query(file.sql);
    await client.query('INSERT INTO _migrations (name) VALUES ($1)', [file.name]);
    await client.query('COMMIT');
  } catch (err) {
    await client.query('ROLLBACK');
    throw err;
  }
}

/**
 * Applies outstanding migrations one transaction per file. A session-level
 * advisory lock keeps two processes from applying the same file.
 */
export async function runMigrations(
  client: MigrationClient,
  opts: { logger: SafeLogger; dir?: string; load?: (name: string) => Promise<string> },
): Promise<string[]> {
  const dir = opts.dir ?? MIGRATIONS_DIR;
  const load = opts.load ?? ((name: string) => readFile(join(dir, name), 'utf-8'));

  await client.query('SELECT pg_advisory_lock($1)', [MIGRATION_LOCK_ID]);
  try {
    await client.query(`
      CREATE TABLE IF NOT EXISTS _migrations (
        name VARCHAR(255) PRIMARY KEY,
        applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `);
    const recorded = await client.query('SELECT name FROM _migrations');
    const applied = new Set<string>();
    for (const row of recorded.rows) {
      const name = recordedName(row);
      if (name) applied.add(name);
    }
    const pending = pendingMigrations(await readMigrations(dir), applied);

    for (const name of pending) {
      await applyOne(client, { name, sql: await load(name) });
      opts.logger.info({ migration: name }, 'Migration applied');
    }
    return pending;
  } finally {
    await client.query('SELECT pg_advisory_unlock($1)', [MIGRATION_LOCK_ID]);
  }
}

export async function migrate(pool: Pool, logger: SafeLogger): Promise<string[]> {
  const client = await pool.connect();
  try {
    return await runMigrations(client, { logger });
  } finally {
    client.release();
  }
}
