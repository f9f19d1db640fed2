/**
 * App — wires all services into a dependency graph.
 *
 * Callers own the database, the container runtime and the git engine. App owns
 * the service graph built from them. Used by both the production entrypoint
 * (index.ts) and the test harness.
 */

import { type ContainerInspector, type LabelResolver, createLabelResolver } from '@labelsync/core'
import type { DrizzleDb } from '@labelsync/db'
import type { ConcurrentSignalPolicy, StoppedContainerPolicy } from '../lib/config'
import type { Logger } from '../lib/logger'
import { OperationLogWriter, SqliteOperationLog } from '../lib/operation-log'
import { SyncOrchestrator } from '../lib/orchestrator'
import { SqliteRepositoryStore, loadRepositoriesFile, seedRepositories } from '../lib/repository'
import { RestartCoordinator } from '../lib/restart'
import type { SyncEngine } from '../lib/sync'
import { GithubWebhookHandler } from '../lib/webhook'
import { createServer } from './server'

export interface AppConfig {
  db: DrizzleDb
  inspector: ContainerInspector
  engine: SyncEngine
  logger: Logger
  /** Restart label keys in priority order (default: restart-after and its aliases) */
  labelKeys?: readonly string[]
  restartTimeoutSeconds?: number
  stoppedContainers?: StoppedContainerPolicy
  restartOnSyncFailure?: boolean
  concurrentSignals?: ConcurrentSignalPolicy
  webhookSecret?: string
  /** Pending operation log entries before the oldest is dropped (default: 256) */
  logQueueSize?: number
  operationLogMaxEntries?: number
  /** YAML registry seeded on start() */
  repositoriesFile?: string
}

export class App {
  readonly repositories: SqliteRepositoryStore
  readonly operationLog: SqliteOperationLog
  readonly logWriter: OperationLogWriter
  readonly labels: LabelResolver
  readonly restarts: RestartCoordinator
  readonly orchestrator: SyncOrchestrator
  readonly webhook: GithubWebhookHandler
  readonly server: ReturnType<typeof createServer>

  private readonly config: AppConfig

  constructor(config: AppConfig) {
    this.config = config
    const { db, inspector, engine, logger } = config

    this.repositories = new SqliteRepositoryStore(db)
    this.operationLog = new SqliteOperationLog(db, logger, config.operationLogMaxEntries)
    this.logWriter = new OperationLogWriter(this.operationLog, logger, {
      capacity: config.logQueueSize,
    })
    this.labels = createLabelResolver(config.labelKeys)
    this.restarts = new RestartCoordinator(inspector, this.labels, logger, {
      restartTimeoutSeconds: config.restartTimeoutSeconds,
      stoppedContainers: config.stoppedContainers,
    })
    this.orchestrator = new SyncOrchestrator(
      {
        repositories: this.repositories,
        engine,
        restarts: this.restarts,
        log: this.logWriter,
      },
      logger,
      {
        restartOnSyncFailure: config.restartOnSyncFailure,
        concurrentSignals: config.concurrentSignals,
      },
    )
    this.webhook = new GithubWebhookHandler(this.orchestrator, this.repositories, logger, {
      secret: config.webhookSecret,
    })

    this.server = createServer({
      orchestrator: this.orchestrator,
      repositories: this.repositories,
      operationLog: this.operationLog,
      logWriter: this.logWriter,
      inspector,
      labels: this.labels,
      webhook: this.webhook,
      logger,
    })
  }

  /**
   * Seed repositories from the registry file, if one is configured.
   * Returns the number of registrations applied.
   */
  start(): { seeded: number } {
    const file = this.config.repositoriesFile
    if (!file) {
      return { seeded: 0 }
    }
    const registrations = loadRepositoriesFile(file)
    return { seeded: seedRepositories(this.repositories, registrations, this.config.logger) }
  }

  /**
   * Graceful shutdown — cancels running orchestrations and flushes the
   * operation log. Does not close the DB (caller owns it).
   */
  async shutdown(): Promise<void> {
    await this.orchestrator.shutdown()
  }
}
