/**
 * Sync Orchestrator
 *
 * Handles one update signal end to end: sync the repository, record its
 * status, restart dependent containers and log the outcome. Signals for the
 * same repository are serialized; different repositories run in parallel.
 */

import { randomUUID } from 'node:crypto'
import {
  type ContainerRestartResult,
  type OperationOutcome,
  type Repository,
  type RepositoryName,
  type RestartStage,
  RuntimeUnavailableError,
  type SyncResult,
  type TriggerSource,
  errorMessage,
  freezeOutcome,
  outcomeStatus,
  summarizeOutcome,
} from '@labelsync/core'
import type { ConcurrentSignalPolicy } from '../config'
import { OrchestratorClosedError, SyncInProgressError, UnknownRepositoryError } from '../errors'
import type { Logger } from '../logger'
import {
  operationsInFlight,
  operationsQueued,
  orchestrationDuration,
  signalsRejectedTotal,
  signalsTotal,
  syncErrorsTotal,
  syncOperationsTotal,
} from '../metrics'
import type { OperationLogWriter } from '../operation-log'
import type { RepositoryStore } from '../repository'
import type { RestartCoordinator } from '../restart'
import type { SyncEngine } from '../sync'
import { KeyedMutex } from './lock'

export interface SyncOrchestratorDeps {
  repositories: RepositoryStore
  engine: SyncEngine
  restarts: RestartCoordinator
  log: OperationLogWriter
}

export interface SyncOrchestratorConfig {
  /**
   * Run the restart stage even when the sync failed.
   * @default false
   */
  restartOnSyncFailure?: boolean

  /**
   * What to do with a signal for a repository that is already being processed.
   * - `queue`: wait for the running orchestration, then run
   * - `reject`: fail with SyncInProgressError
   * @default 'queue'
   */
  concurrentSignals?: ConcurrentSignalPolicy
}

export interface SignalOptions {
  /** @default 'manual' */
  trigger?: TriggerSource
  signal?: AbortSignal
}

/**
 * Result for one repository of a sync-all run.
 */
export interface SyncAllEntry {
  repositoryName: RepositoryName
  outcome?: OperationOutcome
  error?: string
}

export interface OrchestratorStats {
  inFlight: number
  queued: number
  lockedRepositories: RepositoryName[]
}

export class SyncOrchestrator {
  private readonly logger: Logger
  private readonly locks = new KeyedMutex<RepositoryName>()
  private readonly shutdownController = new AbortController()
  private readonly tasks = new Set<Promise<OperationOutcome>>()
  private readonly restartOnSyncFailure: boolean
  private readonly concurrentSignals: ConcurrentSignalPolicy
  private closed = false

  constructor(
    private deps: SyncOrchestratorDeps,
    logger: Logger,
    config: SyncOrchestratorConfig = {},
  ) {
    this.logger = logger.child({ component: 'SyncOrchestrator' })
    this.restartOnSyncFailure = config.restartOnSyncFailure ?? false
    this.concurrentSignals = config.concurrentSignals ?? 'queue'
  }

  /**
   * Process an update signal for a repository.
   *
   * Rejects before doing anything when the repository is unknown or inactive,
   * when a run is already in progress under the `reject` policy, or after
   * shutdown. Once accepted, always resolves with an outcome that has been
   * handed to the operation log.
   */
  handleUpdateSignal(
    repositoryName: RepositoryName,
    options: SignalOptions = {},
  ): Promise<OperationOutcome> {
    if (this.closed) {
      signalsRejectedTotal.inc({ reason: 'shutdown' })
      return Promise.reject(new OrchestratorClosedError())
    }

    const snapshot = this.deps.repositories.resolveActiveByName(repositoryName)
    if (!snapshot) {
      signalsRejectedTotal.inc({ reason: 'unknown_repository' })
      this.logger.warn({ repository: repositoryName }, 'Signal for unknown repository')
      return Promise.reject(new UnknownRepositoryError(repositoryName))
    }

    if (this.concurrentSignals === 'reject' && this.locks.isLocked(repositoryName)) {
      signalsRejectedTotal.inc({ reason: 'in_progress' })
      this.logger.info({ repository: repositoryName }, 'Signal rejected, sync in progress')
      return Promise.reject(new SyncInProgressError(repositoryName))
    }

    const task = this.run(snapshot, options.trigger ?? 'manual', options.signal)
    this.tasks.add(task)
    task
      .finally(() => this.tasks.delete(task))
      .catch((err) => {
        this.logger.error({ err, repository: repositoryName }, 'Orchestration failed')
      })
    return task
  }

  /**
   * Signal every active repository at once. Each repository still runs under
   * its own lock.
   */
  async syncAll(trigger: TriggerSource = 'sync-all'): Promise<SyncAllEntry[]> {
    const repositories = this.deps.repositories.listActive()
    this.logger.info({ count: repositories.length }, 'Syncing all repositories')

    const settled = await Promise.allSettled(
      repositories.map((repository) => this.handleUpdateSignal(repository.name, { trigger })),
    )

    return settled.map((result, i) =>
      result.status === 'fulfilled'
        ? { repositoryName: repositories[i].name, outcome: result.value }
        : { repositoryName: repositories[i].name, error: errorMessage(result.reason) },
    )
  }

  getStats(): OrchestratorStats {
    return {
      inFlight: this.locks.heldCount,
      queued: this.locks.waitingCount,
      lockedRepositories: this.locks.heldKeys(),
    }
  }

  /**
   * Refuse new signals, cancel running ones and wait until their outcomes
   * are written.
   */
  async shutdown(): Promise<void> {
    if (this.closed) return
    this.closed = true
    this.logger.info({ inFlight: this.tasks.size }, 'Shutting down orchestrator')

    this.shutdownController.abort()
    await Promise.allSettled([...this.tasks])
    await this.deps.log.close()
  }

  private async run(
    snapshot: Repository,
    trigger: TriggerSource,
    callerSignal: AbortSignal | undefined,
  ): Promise<OperationOutcome> {
    const name = snapshot.name
    const startedAt = new Date()
    const signal = callerSignal
      ? AbortSignal.any([this.shutdownController.signal, callerSignal])
      : this.shutdownController.signal

    operationsQueued.inc()
    const release = await this.locks.acquire(name)
    operationsQueued.dec()
    operationsInFlight.inc()
    const endTimer = orchestrationDuration.startTimer({ trigger })

    try {
      // The registry may have changed while this signal was queued
      const repository = this.deps.repositories.resolveActiveByName(name) ?? snapshot

      const sync = await this.syncRepository(repository, signal)
      this.recordSyncStatus(repository, sync)

      const { restartStage, restarts } = await this.restartStage(name, sync, signal)

      const outcome = freezeOutcome({
        id: randomUUID(),
        repositoryName: name,
        trigger,
        sync,
        restartStage,
        restarts,
        cancelled: signal.aborted,
        startedAt,
        completedAt: new Date(),
      })

      this.deps.log.append(outcome)

      const status = outcomeStatus(outcome)
      signalsTotal.inc({ trigger, status })
      this.logger.info(
        { repository: name, outcomeId: outcome.id, trigger, status },
        summarizeOutcome(outcome),
      )

      return outcome
    } finally {
      endTimer()
      operationsInFlight.dec()
      release()
    }
  }

  private async syncRepository(repository: Repository, signal: AbortSignal): Promise<SyncResult> {
    let sync: SyncResult
    if (signal.aborted) {
      sync = {
        success: false,
        changed: false,
        operation: 'update',
        error: { kind: 'SyncCancelled', message: 'Cancelled before sync started' },
        durationMs: 0,
      }
    } else {
      try {
        sync = await this.deps.engine.sync(repository, { signal })
      } catch (err) {
        sync = {
          success: false,
          changed: false,
          operation: 'update',
          error: { kind: 'GitCommandFailed', message: errorMessage(err) },
          durationMs: 0,
        }
      }
    }

    syncOperationsTotal.inc({
      operation: sync.operation,
      status: sync.success ? 'success' : 'failure',
    })
    if (sync.error) {
      syncErrorsTotal.inc({ kind: sync.error.kind })
    }
    return sync
  }

  private recordSyncStatus(repository: Repository, sync: SyncResult): void {
    try {
      this.deps.repositories.recordSyncStatus(repository.name, {
        success: sync.success,
        at: new Date(),
        error: sync.error?.message,
        commit: sync.commit,
      })
    } catch (err) {
      this.logger.error({ err, repository: repository.name }, 'Failed to record sync status')
    }
  }

  private async restartStage(
    name: RepositoryName,
    sync: SyncResult,
    signal: AbortSignal,
  ): Promise<{ restartStage: RestartStage; restarts: ContainerRestartResult[] }> {
    if (signal.aborted) {
      return { restartStage: { status: 'skipped', reason: 'cancelled' }, restarts: [] }
    }

    if (!sync.success && !this.restartOnSyncFailure) {
      return { restartStage: { status: 'skipped', reason: 'sync-failed' }, restarts: [] }
    }

    try {
      const restarts = await this.deps.restarts.restartDependents(name, { signal })
      return { restartStage: { status: signal.aborted ? 'cancelled' : 'completed' }, restarts }
    } catch (err) {
      const kind = err instanceof RuntimeUnavailableError ? 'RuntimeUnavailable' : 'DiscoveryFailed'
      this.logger.error({ repository: name, kind, err: errorMessage(err) }, 'Restart stage failed')
      return {
        restartStage: { status: 'failed', error: { kind, message: errorMessage(err) } },
        restarts: [],
      }
    }
  }
}
