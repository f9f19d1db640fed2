/**
 * GitHub Webhook Intake
 *
 * Turns a webhook delivery into an update signal. Gitea and Gogs send the same
 * headers and push payload, and scripts may post a bare
 * `{ "repository": "<name>" }` without any event header.
 */

import { createHmac, timingSafeEqual } from 'node:crypto'
import { type OperationOutcome, type PushSignal, safeParsePushPayload } from '@labelsync/core'
import {
  InvalidWebhookPayloadError,
  UnknownRepositoryError,
  WebhookSignatureError,
} from '../errors'
import type { Logger } from '../logger'
import type { SyncOrchestrator } from '../orchestrator'
import type { RepositoryStore } from '../repository'

const SIGNATURE_PREFIX = 'sha256='

/**
 * Compute the `x-hub-signature-256` header value for a body.
 * @example signPayload('test-secret', '{}') // 'sha256=...'
 */
export function signPayload(secret: string, body: string): string {
  return SIGNATURE_PREFIX + createHmac('sha256', secret).update(body).digest('hex')
}

/**
 * Constant-time check of an `x-hub-signature-256` header against the body.
 */
export function verifySignature(secret: string, body: string, header: string | undefined): boolean {
  if (!header?.startsWith(SIGNATURE_PREFIX)) return false

  const expected = Buffer.from(signPayload(secret, body))
  const received = Buffer.from(header)
  if (expected.length !== received.length) return false
  return timingSafeEqual(expected, received)
}

export interface WebhookDelivery {
  /** `x-github-event` (or `x-gitea-event`). Treated as `push` when absent. */
  event: string | undefined
  /** `x-hub-signature-256` */
  signature: string | undefined
  /** `x-github-delivery`, for logs only */
  deliveryId: string | undefined
  /** Raw request body, exactly as signed */
  body: string
}

export type WebhookResult =
  | { status: 'pong' }
  | { status: 'ignored'; reason: string }
  | { status: 'processed'; outcome: OperationOutcome }

export interface GithubWebhookConfig {
  /** Shared secret. Signatures are not checked when unset. */
  secret?: string
}

export class GithubWebhookHandler {
  private readonly logger: Logger
  private readonly secret: string | undefined

  constructor(
    private orchestrator: SyncOrchestrator,
    private repositories: RepositoryStore,
    logger: Logger,
    config: GithubWebhookConfig = {},
  ) {
    this.logger = logger.child({ component: 'GithubWebhook' })
    this.secret = config.secret
  }

  /**
   * Verify, parse and dispatch one delivery.
   *
   * @throws WebhookSignatureError when a secret is configured and the signature does not match
   * @throws InvalidWebhookPayloadError when the body is not a push payload
   * @throws UnknownRepositoryError when the pushed repository is not registered or inactive
   */
  async handle(delivery: WebhookDelivery): Promise<WebhookResult> {
    if (this.secret && !verifySignature(this.secret, delivery.body, delivery.signature)) {
      this.logger.warn({ deliveryId: delivery.deliveryId }, 'Rejected webhook with bad signature')
      throw new WebhookSignatureError()
    }

    const event = delivery.event ?? 'push'
    if (event === 'ping') {
      return { status: 'pong' }
    }
    if (event !== 'push') {
      this.logger.debug({ event, deliveryId: delivery.deliveryId }, 'Ignoring webhook event')
      return { status: 'ignored', reason: `event ${event} is not handled` }
    }

    const push = parsePush(delivery.body)

    const repository = this.repositories.resolveActiveByName(push.repositoryName)
    if (!repository) {
      throw new UnknownRepositoryError(push.repositoryName)
    }

    if (push.ref !== undefined && push.branch === undefined) {
      return { status: 'ignored', reason: `${push.ref} is not a branch` }
    }

    if (push.branch !== undefined && push.branch !== repository.branch) {
      this.logger.info(
        { repository: repository.name, branch: push.branch, tracked: repository.branch },
        'Ignoring push to untracked branch',
      )
      return {
        status: 'ignored',
        reason: `push to ${push.branch}, tracking ${repository.branch}`,
      }
    }

    this.logger.info(
      { repository: repository.name, commit: push.commit, deliveryId: delivery.deliveryId },
      'Push received',
    )
    const outcome = await this.orchestrator.handleUpdateSignal(repository.name, {
      trigger: 'webhook',
    })
    return { status: 'processed', outcome }
  }
}

function parsePush(body: string): PushSignal {
  let data: unknown
  try {
    data = JSON.parse(body)
  } catch {
    throw new InvalidWebhookPayloadError('body is not valid JSON')
  }

  const result = safeParsePushPayload(data)
  if (!result.success) {
    const detail = result.errors.map((e) => `${e.path}: ${e.message}`).join(', ')
    throw new InvalidWebhookPayloadError(detail)
  }
  return result.data
}
