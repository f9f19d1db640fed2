/**
 * Route Controllers
 *
 * Export all Elysia route controllers for composing the API server.
 */

export { containersController, type ContainersControllerDeps } from './containers'
export { healthController, type HealthControllerDeps } from './health'
export { metricsController } from './metrics'
export { operationsController, type OperationsControllerDeps } from './operations'
export { repositoriesController, type RepositoriesControllerDeps } from './repositories'
export { webhooksController, type WebhooksControllerDeps } from './webhooks'
