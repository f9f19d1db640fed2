/**
 * Webhooks Controller
 *
 * The body is read as text so the signature is checked against the exact
 * bytes that were signed.
 */

import { Elysia, t } from 'elysia'
import type { GithubWebhookHandler } from '../../lib/webhook'

export interface WebhooksControllerDeps {
  webhook: GithubWebhookHandler
}

export function webhooksController(deps: WebhooksControllerDeps) {
  const { webhook } = deps

  return new Elysia({ prefix: '/api/v1/webhooks' }).post(
    '/github',
    ({ body, headers }) =>
      webhook.handle({
        event: headers['x-github-event'] ?? headers['x-gitea-event'],
        signature: headers['x-hub-signature-256'],
        deliveryId: headers['x-github-delivery'],
        body,
      }),
    {
      parse: 'text',
      body: t.String(),
    },
  )
}
