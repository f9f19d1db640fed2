/**
 * Drizzle ORM Schema
 *
 * Custom column types convert Date to integer (epoch ms) and structured
 * values to JSON text.
 */

import type {
  ContainerRestartResult,
  OutcomeId,
  OutcomeStatus,
  RepositoryName,
  RestartStage,
  SyncResult,
} from '@labelsync/core'
import { customType, index, integer, sqliteTable, text } from 'drizzle-orm/sqlite-core'

/**
 * Custom column type: stores Date as integer (epoch ms) in SQLite.
 */
const timestamp = customType<{ data: Date; driverData: number }>({
  dataType() {
    return 'integer'
  },
  toDriver(value: Date): number {
    return value.getTime()
  },
  fromDriver(value: number): Date {
    return new Date(value)
  },
})

/**
 * Custom column type: stores a JSON-serializable value as text.
 */
function json<T>(name: string) {
  return customType<{ data: T; driverData: string }>({
    dataType() {
      return 'text'
    },
    toDriver(value: T): string {
      return JSON.stringify(value)
    },
    fromDriver(value: string): T {
      return JSON.parse(value) as T
    },
  })(name)
}

export const repositories = sqliteTable('repositories', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  name: text('name').$type<RepositoryName>().notNull().unique(),
  url: text('url').notNull(),
  branch: text('branch').notNull().default('main'),
  localPath: text('local_path'),
  isActive: integer('is_active', { mode: 'boolean' }).notNull().default(true),
  lastSyncStatus: text('last_sync_status', { enum: ['never', 'success', 'failure'] })
    .notNull()
    .default('never'),
  lastSyncAt: timestamp('last_sync_at'),
  lastSyncError: text('last_sync_error'),
  lastCommit: text('last_commit'),
  createdAt: timestamp('created_at')
    .notNull()
    .$defaultFn(() => new Date()),
  updatedAt: timestamp('updated_at')
    .notNull()
    .$defaultFn(() => new Date()),
})

export const operationLog = sqliteTable(
  'operation_log',
  {
    id: text('id').$type<OutcomeId>().primaryKey(),
    repositoryName: text('repository_name').$type<RepositoryName>().notNull(),
    trigger: text('trigger', { enum: ['webhook', 'manual', 'sync-all'] }).notNull(),
    status: text('status').$type<OutcomeStatus>().notNull(),
    summary: text('summary').notNull(),
    sync: json<SyncResult>('sync').notNull(),
    restartStage: json<RestartStage>('restart_stage').notNull(),
    restarts: json<ContainerRestartResult[]>('restarts').notNull(),
    cancelled: integer('cancelled', { mode: 'boolean' }).notNull(),
    startedAt: timestamp('started_at').notNull(),
    completedAt: timestamp('completed_at').notNull(),
  },
  (table) => [
    index('idx_operation_log_repository').on(table.repositoryName),
    index('idx_operation_log_started_at').on(table.startedAt),
  ],
)

export type RepositoryRow = typeof repositories.$inferSelect
export type RepositoryInsert = typeof repositories.$inferInsert
export type OperationLogRow = typeof operationLog.$inferSelect
export type OperationLogInsert = typeof operationLog.$inferInsert
