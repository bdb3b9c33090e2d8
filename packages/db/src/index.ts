export {
  initPool,
  closePool,
  getPool,
  withTransaction,
  createTransactionRunner,
  type TransactionalClient,
} from './client';
export { translateDbError, isConnectionError } from './errors';
export { resolveTableLayout, renderMigration, type TableLayout, type TableNames } from './tables';
export { runMigrations, listMigrationFiles, MIGRATIONS_DIR, type MigrationClient } from './migrator';
export { PgApplicationRepository } from './repositories/application-repository';
export { PgUserRepository } from './repositories/user-repository';
export { PgRoleRepository } from './repositories/role-repository';
export { PgGrantRepository } from './repositories/grant-repository';
export { PgRevokedTokenRepository } from './repositories/revoked-token-repository';
export { PgStatsRepository } from './repositories/stats-repository';
export { MemoryStore, type MemoryTx } from './memory-store';
