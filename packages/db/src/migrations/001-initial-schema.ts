/**
 * Migration 001: Initial Schema
 *
 * - repositories: registered repositories and their last sync status
 * - operation_log: one row per orchestration outcome
 */

import type Database from 'better-sqlite3'

export const version = 1

export function up(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS repositories (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT NOT NULL UNIQUE,
      url TEXT NOT NULL,
      branch TEXT NOT NULL DEFAULT 'main',
      local_path TEXT,
      is_active INTEGER NOT NULL DEFAULT 1,
      last_sync_status TEXT NOT NULL DEFAULT 'never'
        CHECK (last_sync_status IN ('never', 'success', 'failure')),
      last_sync_at INTEGER,
      last_sync_error TEXT,
      last_commit TEXT,
      created_at INTEGER NOT NULL DEFAULT (strftime('%s', 'now') * 1000),
      updated_at INTEGER NOT NULL DEFAULT (strftime('%s', 'now') * 1000)
    )
  `)

  db.exec(`
    CREATE TABLE IF NOT EXISTS operation_log (
      id TEXT PRIMARY KEY,
      repository_name TEXT NOT NULL,
      trigger TEXT NOT NULL CHECK (trigger IN ('webhook', 'manual', 'sync-all')),
      status TEXT NOT NULL,
      summary TEXT NOT NULL,
      sync TEXT NOT NULL,
      restart_stage TEXT NOT NULL,
      restarts TEXT NOT NULL,
      cancelled INTEGER NOT NULL,
      started_at INTEGER NOT NULL,
      completed_at INTEGER NOT NULL
    )
  `)

  db.exec(`
    CREATE INDEX IF NOT EXISTS idx_operation_log_repository ON operation_log(repository_name)
  `)

  db.exec(`
    CREATE INDEX IF NOT EXISTS idx_operation_log_started_at ON operation_log(started_at)
  `)
}

export function down(db: Database.Database): void {
  db.exec('DROP TABLE IF EXISTS operation_log')
  db.exec('DROP TABLE IF EXISTS repositories')
}
