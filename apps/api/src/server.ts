/**
 * Labelsync API Server
 *
 * Elysia-based REST API for update signals, repositories and the operation log.
 */

import { cors } from '@elysiajs/cors'
import type { ContainerInspector, LabelResolver } from '@labelsync/core'
import { Elysia } from 'elysia'
import { isDomainError } from '../lib/errors'
import type { Logger } from '../lib/logger'
import { httpMetricsMiddleware } from '../lib/metrics'
import type { OperationLogWriter, SqliteOperationLog } from '../lib/operation-log'
import type { SyncOrchestrator } from '../lib/orchestrator'
import type { SqliteRepositoryStore } from '../lib/repository'
import type { GithubWebhookHandler } from '../lib/webhook'
import {
  containersController,
  healthController,
  metricsController,
  operationsController,
  repositoriesController,
  webhooksController,
} from './routes'

/**
 * Dependencies for the API server
 */
export interface ServerDependencies {
  orchestrator: SyncOrchestrator
  repositories: SqliteRepositoryStore
  operationLog: SqliteOperationLog
  logWriter: OperationLogWriter
  inspector: ContainerInspector
  labels: LabelResolver
  webhook: GithubWebhookHandler
  logger?: Logger
}

/**
 * Create the Elysia API server
 */
export function createServer(deps: ServerDependencies) {
  const { orchestrator, repositories, operationLog, logWriter, inspector, labels, webhook } = deps
  const logger = deps.logger?.child({ component: 'http' })

  return new Elysia()
    .use(cors())
    .use(httpMetricsMiddleware)
    .onError(({ code, error, set, request }) => {
      if (code === 'NOT_FOUND') {
        set.status = 404
        return { error: 'Not found' }
      }
      if (isDomainError(error)) {
        set.status = error.status
        return { error: error.message, ...('kind' in error ? { kind: error.kind } : {}) }
      }
      logger?.error({ err: error, method: request.method, url: request.url }, 'Unhandled error')
      set.status = 500
      return { error: error instanceof Error ? error.message : 'Internal server error' }
    })
    .use(metricsController())
    .use(healthController({ inspector, orchestrator, repositories, operationLog, logWriter }))
    .use(repositoriesController({ repositories, orchestrator }))
    .use(containersController({ inspector, labels }))
    .use(operationsController({ operationLog }))
    .use(webhooksController({ webhook }))
}
