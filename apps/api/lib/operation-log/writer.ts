/**
 * Operation Log Writer
 *
 * Decouples orchestration from the log sink. Outcomes go into a bounded queue
 * drained by a single task, so `append` never waits on or fails with the sink.
 * When the queue is full the oldest pending outcome is dropped.
 */

import type { OperationOutcome } from '@labelsync/core'
import type { Logger } from '../logger'
import { operationLogDroppedTotal, operationLogFailuresTotal } from '../metrics'
import type { OperationLogSink } from './sink'

export interface OperationLogWriterConfig {
  /** @default 256 */
  capacity?: number
}

export interface OperationLogWriterStats {
  pending: number
  written: number
  dropped: number
  failed: number
}

export class OperationLogWriter {
  private readonly logger: Logger
  private readonly capacity: number
  private queue: OperationOutcome[] = []
  private draining: Promise<void> | undefined
  private closed = false
  private written = 0
  private dropped = 0
  private failed = 0

  constructor(
    private sink: OperationLogSink,
    logger: Logger,
    config: OperationLogWriterConfig = {},
  ) {
    this.logger = logger.child({ component: 'OperationLogWriter' })
    this.capacity = Math.max(1, config.capacity ?? 256)
  }

  /**
   * Queue an outcome for writing. Never throws.
   */
  append(outcome: OperationOutcome): void {
    if (this.closed) {
      this.recordDrop(outcome, 'Operation log writer is closed')
      return
    }

    if (this.queue.length >= this.capacity) {
      const oldest = this.queue.shift()
      if (oldest) this.recordDrop(oldest, 'Operation log queue full, dropping oldest entry')
    }

    this.queue.push(outcome)
    this.schedule()
  }

  /**
   * Resolves once every queued outcome has been handed to the sink.
   */
  async flush(): Promise<void> {
    while (this.draining) {
      await this.draining
    }
  }

  /**
   * Stop accepting outcomes and wait for the queue to drain.
   */
  async close(): Promise<void> {
    this.closed = true
    await this.flush()
  }

  getStats(): OperationLogWriterStats {
    return {
      pending: this.queue.length,
      written: this.written,
      dropped: this.dropped,
      failed: this.failed,
    }
  }

  private schedule(): void {
    if (this.draining) return
    this.draining = this.drain().finally(() => {
      this.draining = undefined
      if (this.queue.length > 0) this.schedule()
    })
  }

  private async drain(): Promise<void> {
    // let append() return before the sink runs
    await Promise.resolve()

    let outcome = this.queue.shift()
    while (outcome) {
      try {
        await this.sink.append(outcome)
        this.written++
      } catch (err) {
        this.failed++
        operationLogFailuresTotal.inc()
        this.logger.error(
          { err, outcomeId: outcome.id, repository: outcome.repositoryName },
          'Failed to write operation outcome',
        )
      }
      outcome = this.queue.shift()
    }
  }

  private recordDrop(outcome: OperationOutcome, message: string): void {
    this.dropped++
    operationLogDroppedTotal.inc()
    this.logger.warn({ outcomeId: outcome.id, repository: outcome.repositoryName }, message)
  }
}
