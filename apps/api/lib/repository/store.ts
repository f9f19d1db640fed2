/**
 * Repository Store
 *
 * The registry of repositories the orchestrator may sync, backed by the
 * `repositories` table. The orchestrator only needs the RepositoryStore
 * interface; the administrative methods serve seeding, the API and tests.
 */

import type {
  Repository,
  RepositoryName,
  RepositoryRegistration,
  RepositorySyncRecord,
} from '@labelsync/core'
import { type DrizzleDb, type RepositoryRow, schema } from '@labelsync/db'
import { asc, eq } from 'drizzle-orm'

export interface RepositoryStore {
  /**
   * Look up an active repository by its exact name.
   * Inactive and unknown repositories both return undefined.
   */
  resolveActiveByName(name: RepositoryName): Repository | undefined

  /**
   * Write back the result of a sync attempt. Unknown names are ignored.
   */
  recordSyncStatus(name: RepositoryName, record: RepositorySyncRecord): void

  listActive(): Repository[]
}

export class SqliteRepositoryStore implements RepositoryStore {
  constructor(private db: DrizzleDb) {}

  list(): Repository[] {
    return this.db
      .select()
      .from(schema.repositories)
      .orderBy(asc(schema.repositories.name))
      .all()
      .map(toRepository)
  }

  listActive(): Repository[] {
    return this.db
      .select()
      .from(schema.repositories)
      .where(eq(schema.repositories.isActive, true))
      .orderBy(asc(schema.repositories.name))
      .all()
      .map(toRepository)
  }

  get(name: RepositoryName): Repository | undefined {
    const row = this.db
      .select()
      .from(schema.repositories)
      .where(eq(schema.repositories.name, name))
      .get()
    return row ? toRepository(row) : undefined
  }

  resolveActiveByName(name: RepositoryName): Repository | undefined {
    const repository = this.get(name)
    return repository?.isActive ? repository : undefined
  }

  /**
   * Insert a repository, or update url/branch/path/active of an existing one
   * with the same name. Sync status is preserved.
   */
  register(registration: RepositoryRegistration): Repository {
    const now = new Date()
    const row = this.db
      .insert(schema.repositories)
      .values({
        name: registration.name,
        url: registration.url,
        branch: registration.branch,
        localPath: registration.localPath,
        isActive: registration.isActive,
        createdAt: now,
        updatedAt: now,
      })
      .onConflictDoUpdate({
        target: schema.repositories.name,
        set: {
          url: registration.url,
          branch: registration.branch,
          localPath: registration.localPath,
          isActive: registration.isActive,
          updatedAt: now,
        },
      })
      .returning()
      .get()
    return toRepository(row)
  }

  setActive(name: RepositoryName, isActive: boolean): boolean {
    const result = this.db
      .update(schema.repositories)
      .set({ isActive, updatedAt: new Date() })
      .where(eq(schema.repositories.name, name))
      .run()
    return result.changes > 0
  }

  remove(name: RepositoryName): boolean {
    const result = this.db
      .delete(schema.repositories)
      .where(eq(schema.repositories.name, name))
      .run()
    return result.changes > 0
  }

  recordSyncStatus(name: RepositoryName, record: RepositorySyncRecord): void {
    this.db
      .update(schema.repositories)
      .set({
        lastSyncStatus: record.success ? 'success' : 'failure',
        lastSyncAt: record.at,
        lastSyncError: record.success ? null : (record.error ?? 'unknown error'),
        ...(record.commit ? { lastCommit: record.commit } : {}),
        updatedAt: record.at,
      })
      .where(eq(schema.repositories.name, name))
      .run()
  }
}

function toRepository(row: RepositoryRow): Repository {
  return {
    id: row.id,
    name: row.name,
    url: row.url,
    branch: row.branch,
    localPath: row.localPath,
    isActive: row.isActive,
    lastSyncStatus: row.lastSyncStatus,
    lastSyncAt: row.lastSyncAt,
    lastSyncError: row.lastSyncError,
    lastCommit: row.lastCommit,
  }
}
