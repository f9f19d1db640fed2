/**
 * @labelsync/db
 *
 * SQLite persistence for labelsync using Drizzle ORM. Holds the repository
 * registry and the operation log.
 *
 * Consumers use DrizzleDb + schema directly for queries.
 */

export {
  closeDatabase,
  createTestDatabase,
  initDatabase,
  type DatabaseConfig,
  type DrizzleDb,
} from './database'
export {
  getMigrationStatus,
  rollbackMigration,
  runMigrations,
  type Migration,
  type MigrationLogger,
} from './migrations'
export * as schema from './schema'
export type {
  OperationLogInsert,
  OperationLogRow,
  RepositoryInsert,
  RepositoryRow,
} from './schema'
