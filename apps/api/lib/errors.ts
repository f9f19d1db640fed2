/**
 * Domain Error Types
 *
 * Custom error classes with HTTP status codes for automatic error handling.
 * Elysia's error handler maps error.status to HTTP responses.
 */

import type { RepositoryName } from '@labelsync/core'

export class UnknownRepositoryError extends Error {
  readonly status = 404
  readonly kind = 'UnknownRepository'

  constructor(readonly repositoryName: RepositoryName) {
    super(`Repository ${repositoryName} is not registered or inactive`)
    this.name = 'UnknownRepositoryError'
  }
}

export class SyncInProgressError extends Error {
  readonly status = 409
  readonly kind = 'SyncInProgress'

  constructor(readonly repositoryName: RepositoryName) {
    super(`A sync for ${repositoryName} is already in progress`)
    this.name = 'SyncInProgressError'
  }
}

export class OrchestratorClosedError extends Error {
  readonly status = 503

  constructor() {
    super('Orchestrator is shutting down')
    this.name = 'OrchestratorClosedError'
  }
}

export class OperationNotFoundError extends Error {
  readonly status = 404

  constructor(id: string) {
    super(`Operation ${id} not found`)
    this.name = 'OperationNotFoundError'
  }
}

export class InvalidWebhookPayloadError extends Error {
  readonly status = 400

  constructor(message: string) {
    super(`Invalid webhook payload: ${message}`)
    this.name = 'InvalidWebhookPayloadError'
  }
}

export class WebhookSignatureError extends Error {
  readonly status = 401

  constructor(message = 'Webhook signature is missing or invalid') {
    super(message)
    this.name = 'WebhookSignatureError'
  }
}

/**
 * Type guard for domain errors with an HTTP status code.
 */
export function isDomainError(err: unknown): err is Error & { status: number } {
  return err instanceof Error && 'status' in err && typeof err.status === 'number'
}
