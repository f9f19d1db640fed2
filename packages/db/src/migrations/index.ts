/**
 * Migration Runner
 *
 * Applies database migrations in order, tracking which have been applied.
 */

import type Database from 'better-sqlite3'
import * as migration001 from './001-initial-schema'

export interface Migration {
  version: number
  up: (db: Database.Database) => void
  down: (db: Database.Database) => void
}

/**
 * Structural logger so callers can pass a pino child without this package
 * depending on pino.
 */
export interface MigrationLogger {
  info(msg: string): void
  warn(msg: string): void
}

const migrations: Migration[] = [
  {
    version: migration001.version,
    up: migration001.up,
    down: migration001.down,
  },
]

function initSchemaVersionTable(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_version (
      version INTEGER PRIMARY KEY,
      applied_at INTEGER NOT NULL
    )
  `)
}

/**
 * Get the current schema version from the database.
 */
function getCurrentVersion(db: Database.Database): number {
  const row = db
    .prepare<[], { version: number | null }>('SELECT MAX(version) as version FROM schema_version')
    .get()
  return row?.version ?? 0
}

/**
 * Run all pending migrations.
 */
export function runMigrations(
  db: Database.Database,
  logger?: MigrationLogger,
): { applied: number[]; current: number } {
  initSchemaVersionTable(db)

  const currentVersion = getCurrentVersion(db)
  const pendingMigrations = migrations.filter((m) => m.version > currentVersion)
  const applied: number[] = []
  const record = db.prepare('INSERT INTO schema_version (version, applied_at) VALUES (?, ?)')

  for (const migration of pendingMigrations) {
    logger?.info(`Applying migration ${migration.version}`)

    db.transaction(() => {
      migration.up(db)
      record.run(migration.version, Date.now())
    })()

    applied.push(migration.version)
  }

  return {
    applied,
    current: applied.length > 0 ? applied[applied.length - 1] : currentVersion,
  }
}

/**
 * Rollback the last migration.
 */
export function rollbackMigration(db: Database.Database, logger?: MigrationLogger): number | null {
  initSchemaVersionTable(db)

  const currentVersion = getCurrentVersion(db)
  if (currentVersion === 0) {
    return null
  }

  const migration = migrations.find((m) => m.version === currentVersion)
  if (!migration) {
    throw new Error(`Migration ${currentVersion} not found`)
  }

  logger?.info(`Rolling back migration ${currentVersion}`)

  db.transaction(() => {
    migration.down(db)
    db.prepare('DELETE FROM schema_version WHERE version = ?').run(currentVersion)
  })()

  return currentVersion
}

/**
 * Get list of all migrations and their status.
 */
export function getMigrationStatus(
  db: Database.Database,
): Array<{ version: number; applied: boolean }> {
  initSchemaVersionTable(db)

  const rows = db.prepare<[], { version: number }>('SELECT version FROM schema_version').all()
  const appliedVersions = new Set(rows.map((row) => row.version))

  return migrations.map((m) => ({
    version: m.version,
    applied: appliedVersions.has(m.version),
  }))
}
