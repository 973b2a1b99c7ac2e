import { DatabaseConfigSchema, createLogger, errorMessage, loadConfig } from '@gatehouse/shared';
import { closePool, initPool } from './client';
import { migrate } from './migrations';

const logger = createLogger({ name: 'migrator' });

async function main(): Promise<void> {
  const config = loadConfig(DatabaseConfigSchema);
  const pool = initPool({
    connectionString: config.DATABASE_URL,
    max: config.DATABASE_POOL_MAX,
    statementTimeoutMs: config.DATABASE_STATEMENT_TIMEOUT_MS,
  });
  try {
    const applied = await migrate(pool, logger);
    logger.info({ applied: applied.length }, 'Migrations complete');
  } finally {
    await closePool();
  }
}

main().catch((err: unknown) => {
  logger.fatal({ err: errorMessage(err) }, 'Migration failed');
  process.exit(1);
});
