export {
  GithubWebhookHandler,
  type GithubWebhookConfig,
  type WebhookDelivery,
  type WebhookResult,
  signPayload,
  verifySignature,
} from './github'
