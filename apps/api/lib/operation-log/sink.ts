/**
 * Operation Log
 *
 * One entry per orchestration outcome, stored in SQLite via Drizzle ORM and
 * trimmed to a maximum size. Listeners receive each outcome as it is stored.
 */

import {
  type OperationOutcome,
  type OutcomeId,
  type RepositoryName,
  freezeOutcome,
  outcomeStatus,
  summarizeOutcome,
} from '@labelsync/core'
import { type DrizzleDb, type OperationLogRow, schema } from '@labelsync/db'
import { count, desc, eq, notInArray, sql } from 'drizzle-orm'
import type { Logger } from '../logger'

/**
 * Where outcomes go. May be slow or fail; callers go through OperationLogWriter.
 */
export interface OperationLogSink {
  append(outcome: OperationOutcome): void | Promise<void>
}

export type OperationLogListener = (outcome: OperationOutcome) => void

export interface OperationQuery {
  repository?: RepositoryName
  limit?: number
  offset?: number
}

const DEFAULT_MAX_ENTRIES = 1000
const TRIM_EVERY = 100

export class SqliteOperationLog implements OperationLogSink {
  private listeners: Set<OperationLogListener> = new Set()
  private appended = 0

  constructor(
    private db: DrizzleDb,
    private logger: Logger,
    private maxEntries = DEFAULT_MAX_ENTRIES,
  ) {}

  append(outcome: OperationOutcome): void {
    this.db
      .insert(schema.operationLog)
      .values({
        id: outcome.id,
        repositoryName: outcome.repositoryName,
        trigger: outcome.trigger,
        status: outcomeStatus(outcome),
        summary: summarizeOutcome(outcome),
        sync: outcome.sync,
        restartStage: outcome.restartStage,
        restarts: [...outcome.restarts],
        cancelled: outcome.cancelled,
        startedAt: outcome.startedAt,
        completedAt: outcome.completedAt,
      })
      .run()

    this.appended++
    if (this.appended % TRIM_EVERY === 0) {
      this.trim()
    }

    for (const listener of this.listeners) {
      try {
        listener(outcome)
      } catch (err) {
        this.logger.error({ err, outcomeId: outcome.id }, 'Operation log listener failed')
      }
    }
  }

  /**
   * Most recent outcomes first.
   */
  recent(query: OperationQuery = {}): OperationOutcome[] {
    return this.db
      .select()
      .from(schema.operationLog)
      .where(
        query.repository ? eq(schema.operationLog.repositoryName, query.repository) : undefined,
      )
      .orderBy(...newestFirst())
      .limit(query.limit ?? 50)
      .offset(query.offset ?? 0)
      .all()
      .map(toOutcome)
  }

  get(id: OutcomeId): OperationOutcome | undefined {
    const row = this.db
      .select()
      .from(schema.operationLog)
      .where(eq(schema.operationLog.id, id))
      .get()
    return row ? toOutcome(row) : undefined
  }

  subscribe(listener: OperationLogListener): () => void {
    this.listeners.add(listener)
    return () => this.listeners.delete(listener)
  }

  clear(): void {
    this.db.delete(schema.operationLog).run()
  }

  get count(): number {
    const result = this.db.select({ count: count() }).from(schema.operationLog).get()
    return result?.count ?? 0
  }

  /**
   * Trim old entries to keep only maxEntries.
   */
  trim(): void {
    const keepIds = this.db
      .select({ id: schema.operationLog.id })
      .from(schema.operationLog)
      .orderBy(...newestFirst())
      .limit(this.maxEntries)
      .all()
      .map((r) => r.id)

    if (keepIds.length === 0) {
      this.db.delete(schema.operationLog).run()
      return
    }

    this.db.delete(schema.operationLog).where(notInArray(schema.operationLog.id, keepIds)).run()
  }
}

function toOutcome(row: OperationLogRow): OperationOutcome {
  return freezeOutcome({
    id: row.id,
    repositoryName: row.repositoryName,
    trigger: row.trigger,
    sync: row.sync,
    restartStage: row.restartStage,
    restarts: row.restarts,
    cancelled: row.cancelled,
    startedAt: row.startedAt,
    completedAt: row.completedAt,
  })
}

// Insertion order breaks ties between outcomes that share timestamps
function newestFirst() {
  return [
    desc(schema.operationLog.startedAt),
    desc(schema.operationLog.completedAt),
    desc(sql`rowid`),
  ]
}
