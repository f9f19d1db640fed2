/**
 * Restart Coordinator
 *
 * Finds the containers that declare a dependency on a repository and restarts
 * them one at a time. Containers are re-listed on every call since labels can
 * change between runs.
 */

import {
  type ContainerInspector,
  type ContainerRestartResult,
  type LabelResolver,
  type RepositoryName,
  type RestartTarget,
  errorMessage,
} from '@labelsync/core'
import type { StoppedContainerPolicy } from '../config'
import type { Logger } from '../logger'
import { containerRestartDuration, containerRestartsTotal } from '../metrics'

export interface RestartCoordinatorConfig {
  /**
   * Seconds the runtime waits for a graceful stop before killing.
   * @default 30
   */
  restartTimeoutSeconds?: number

  /**
   * What to do with dependents that are not running.
   * @default 'restart'
   */
  stoppedContainers?: StoppedContainerPolicy
}

export class RestartCoordinator {
  private readonly logger: Logger
  private readonly restartTimeoutSeconds: number
  private readonly stoppedContainers: StoppedContainerPolicy

  constructor(
    private inspector: ContainerInspector,
    private labels: LabelResolver,
    logger: Logger,
    config: RestartCoordinatorConfig = {},
  ) {
    this.logger = logger.child({ component: 'RestartCoordinator' })
    this.restartTimeoutSeconds = config.restartTimeoutSeconds ?? 30
    this.stoppedContainers = config.stoppedContainers ?? 'restart'
  }

  /**
   * Containers whose restart label names the repository, ordered by name then id.
   * @throws RuntimeUnavailableError when the runtime cannot be reached
   */
  async findDependents(repositoryName: RepositoryName): Promise<RestartTarget[]> {
    const containers = await this.inspector.listAll()

    return containers
      .filter((container) => this.labels.matches(container.labels, repositoryName))
      .sort((a, b) => compare(a.name, b.name) || compare(a.id, b.id))
      .map((container) => ({
        container,
        repositories: this.labels.repositoriesFor(container.labels),
      }))
  }

  /**
   * Restart every dependent sequentially. A failed restart is recorded and the
   * next container is still attempted. When the signal aborts, containers not
   * yet attempted are left alone.
   *
   * @throws RuntimeUnavailableError when discovery fails
   */
  async restartDependents(
    repositoryName: RepositoryName,
    options: { signal?: AbortSignal } = {},
  ): Promise<ContainerRestartResult[]> {
    const targets = await this.findDependents(repositoryName)
    const results: ContainerRestartResult[] = []

    if (targets.length === 0) {
      this.logger.info({ repository: repositoryName }, 'No dependent containers')
      return results
    }

    this.logger.info(
      { repository: repositoryName, count: targets.length },
      'Restarting dependent containers',
    )

    for (const { container } of targets) {
      if (options.signal?.aborted) {
        this.logger.warn(
          { repository: repositoryName, remaining: targets.length - results.length },
          'Restarts cancelled',
        )
        break
      }

      if (container.status !== 'running' && this.stoppedContainers === 'skip') {
        results.push({
          containerId: container.id,
          containerName: container.name,
          success: true,
          action: 'skipped',
          durationMs: 0,
        })
        containerRestartsTotal.inc({ action: 'skipped' })
        this.logger.info(
          { repository: repositoryName, containerId: container.id, status: container.status },
          'Skipping stopped container',
        )
        continue
      }

      results.push(await this.restartOne(repositoryName, container.id, container.name))
    }

    return results
  }

  private async restartOne(
    repositoryName: RepositoryName,
    containerId: string,
    containerName: string,
  ): Promise<ContainerRestartResult> {
    const startTime = Date.now()
    try {
      await this.inspector.restart(containerId, this.restartTimeoutSeconds)
      const durationMs = Date.now() - startTime
      containerRestartsTotal.inc({ action: 'restarted' })
      containerRestartDuration.observe(durationMs / 1000)
      this.logger.info(
        { repository: repositoryName, containerId, container: containerName, durationMs },
        'Container restarted',
      )
      return { containerId, containerName, success: true, action: 'restarted', durationMs }
    } catch (err) {
      const message = errorMessage(err)
      containerRestartsTotal.inc({ action: 'failed' })
      this.logger.error(
        { repository: repositoryName, containerId, container: containerName, err: message },
        'Container restart failed',
      )
      return {
        containerId,
        containerName,
        success: false,
        action: 'failed',
        error: { kind: 'RestartFailed', message },
        durationMs: Date.now() - startTime,
      }
    }
  }
}

function compare(a: string, b: string): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}
