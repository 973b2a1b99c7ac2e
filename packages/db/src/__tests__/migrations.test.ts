import { describe, it, expect, vi } from 'vitest';
import { createLogger } from '@gatehouse/shared';
import { MIGRATIONS_DIR, pendingMigrations, readMigrations, runMigrations } from '../migrations';

const logger = createLogger({ name: 'migrations-test', level: 'silent' });

function fakeClient(recorded: string[], failOn?: string) {
  const query = vi.fn(async (text: string, _values?: unknown[]) => {
    if (text.startsWith('SELECT name')) return { rows: recorded.map((name) => ({ name })) };
    if (failOn && text === failOn) throw new Error('syntax error');
    return { rows: [] };
  });
  return { query };
}

describe('pendingMigrations', () => {
  it('returns unrecorded sql files in name order', () => {
    expect(
      pendingMigrations(['003_c.sql', 'README.md', '001_a.sql', '002_b.sql'], new Set(['001_a.sql'])),
    ).toEqual(['002_b.sql', '003_c.sql']);
  });
});

describe('runMigrations', () => {
  it('ships the migrations in order', async () => {
    const files = pendingMigrations(await readMigrations(MIGRATIONS_DIR), new Set());
    expect(files).toEqual(['001_sessions.sql', '002_organizations.sql', '003_kanban.sql']);
  });

  it('applies only what is missing, each in its own transaction, under the lock', async () => {
    const client = fakeClient(['001_sessions.sql']);
    const applied = await runMigrations(client, {
      logger,
      load: async (name) => `-- ${name}`,
    });

    expect(applied).toEqual(['002_organizations.sql', '003_kanban.sql']);
    const texts = client.query.mock.calls.map(([text]) => text.trim());
    expect(texts[0]).toBe('SELECT pg_advisory_lock($1)');
    expect(texts.slice(3)).toEqual([
      'BEGIN',
      '-- 002_organizations.sql',
      'INSERT INTO _migrations (name) VALUES ($1)',
      'COMMIT',
      'BEGIN',
      '-- 003_kanban.sql',
      'INSERT INTO _migrations (name) VALUES ($1)',
      'COMMIT',
      'SELECT pg_advisory_unlock($1)',
    ]);
  });

  it('rolls back a failing file and still releases the lock', async () => {
    const client = fakeClient([], '-- 002_organizations.sql');
    await expect(
      runMigrations(client, { logger, load: async (name) => `-- ${name}` }),
    ).rejects.toThrow('syntax error');

    const texts = client.query.mock.calls.map(([text]) => text.trim());
    expect(texts.slice(-3)).toEqual(['-- 002_organizations.sql', 'ROLLBACK', 'SELECT pg_advisory_unlock($1)']);
    expect(texts).not.toContain('-- 003_kanban.sql');
  });
});
