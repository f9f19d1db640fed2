/**
 * Repositories Controller
 *
 * Registered repositories and the manual sync triggers.
 */

import { Elysia, t } from 'elysia'
import type { SyncOrchestrator } from '../../lib/orchestrator'
import type { SqliteRepositoryStore } from '../../lib/repository'

export interface RepositoriesControllerDeps {
  repositories: SqliteRepositoryStore
  orchestrator: SyncOrchestrator
}

export function repositoriesController(deps: RepositoriesControllerDeps) {
  const { repositories, orchestrator } = deps

  return new Elysia({ prefix: '/api/v1/repositories' })
    .get('/', () => repositories.list())

    .post('/sync', async () => {
      const results = await orchestrator.syncAll()
      return {
        total: results.length,
        succeeded: results.filter((r) => r.outcome?.sync.success).length,
        results,
      }
    })

    .get(
      '/:name',
      ({ params, set }) => {
        const repository = repositories.get(params.name)
        if (!repository) {
          set.status = 404
          return { error: `Repository ${params.name} not found` }
        }
        return repository
      },
      {
        params: t.Object({
          name: t.String(),
        }),
      },
    )

    .post(
      '/:name/sync',
      ({ params }) => orchestrator.handleUpdateSignal(params.name, { trigger: 'manual' }),
      {
        params: t.Object({
          name: t.String(),
        }),
      },
    )
}
