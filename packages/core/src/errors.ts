/**
 * Runtime Error Types
 *
 * Errors raised by container runtime adapters. They carry an HTTP status so the
 * API error handler can map them without knowing each class.
 */

import type { ContainerId } from './types'

export class RuntimeUnavailableError extends Error {
  readonly status = 503
  readonly kind = 'RuntimeUnavailable'

  constructor(runtime: string, cause?: unknown) {
    const detail = cause instanceof Error ? `: ${cause.message}` : ''
    super(`Container runtime ${runtime} is unavailable${detail}`, { cause })
    this.name = 'RuntimeUnavailableError'
  }
}

export class RestartFailedError extends Error {
  readonly status = 502
  readonly kind = 'RestartFailed'

  constructor(
    readonly containerId: ContainerId,
    message: string,
    cause?: unknown,
  ) {
    super(`Failed to restart container ${containerId}: ${message}`, { cause })
    this.name = 'RestartFailedError'
  }
}

/**
 * Extract a message from an unknown thrown value.
 */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message
  return String(err)
}
