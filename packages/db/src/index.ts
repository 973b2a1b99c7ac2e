export { initPool, closePool, getPool, withTransaction, type PoolOptions } from './client';
export { migrate, runMigrations, pendingMigrations, MIGRATIONS_DIR } from './migrations';
export { PgSessionRepository } from './repositories/session-repository';
export { PgBoardRepository } from './repositories/board-repository';
export { PgOrganizationDirectory } from './repositories/organization-directory';
