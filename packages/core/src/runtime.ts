/**
 * Container Runtime Interface
 *
 * The only two runtime operations the orchestrator needs: list every container
 * with its labels, and restart one container by id.
 *
 * Implemented by @labelsync/docker. The restart coordinator works against this
 * interface so tests can substitute an in-process runtime.
 */

import type { ContainerDescriptor, ContainerId } from './types'

export interface ContainerInspector {
  /**
   * Runtime name for logs.
   * @example 'docker'
   */
  readonly name: string

  /**
   * List all containers, including stopped ones, with their labels.
   * @throws RuntimeUnavailableError when the runtime cannot be reached
   */
  listAll(): Promise<ContainerDescriptor[]>

  /**
   * Restart a single container. Best effort, no retry.
   * @param timeoutSeconds - Seconds the runtime waits for a graceful stop before killing
   */
  restart(id: ContainerId, timeoutSeconds?: number): Promise<void>

  /**
   * Check that the runtime answers.
   */
  ping(): Promise<boolean>
}
