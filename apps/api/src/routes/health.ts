/**
 * Health & Stats Controller
 *
 * Liveness, runtime reachability and orchestrator counters.
 */

import type { ContainerInspector } from '@labelsync/core'
import { Elysia } from 'elysia'
import type { OperationLogWriter, SqliteOperationLog } from '../../lib/operation-log'
import type { SyncOrchestrator } from '../../lib/orchestrator'
import type { SqliteRepositoryStore } from '../../lib/repository'

export interface HealthControllerDeps {
  inspector: ContainerInspector
  orchestrator: SyncOrchestrator
  repositories: SqliteRepositoryStore
  operationLog: SqliteOperationLog
  logWriter: OperationLogWriter
}

export function healthController(deps: HealthControllerDeps) {
  const { inspector, orchestrator, repositories, operationLog, logWriter } = deps

  return new Elysia({ prefix: '/api/v1' })
    .get('/health', async () => {
      const runtimeReachable = await inspector.ping().catch(() => false)
      return {
        status: 'ok',
        runtime: {
          name: inspector.name,
          status: runtimeReachable ? 'up' : 'down',
        },
        timestamp: new Date().toISOString(),
      }
    })

    .get('/stats', () => {
      const all = repositories.list()
      const failing = all.filter((r) => r.isActive && r.lastSyncStatus === 'failure')

      return {
        repositories: {
          total: all.length,
          active: all.filter((r) => r.isActive).length,
          failing: failing.map((r) => r.name),
        },
        orchestrator: orchestrator.getStats(),
        operationLog: {
          entries: operationLog.count,
          ...logWriter.getStats(),
        },
      }
    })
}
