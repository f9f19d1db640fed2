/**
 * Operations Controller
 *
 * Read access to the operation log.
 */

import { Elysia, t } from 'elysia'
import { OperationNotFoundError } from '../../lib/errors'
import type { SqliteOperationLog } from '../../lib/operation-log'

export interface OperationsControllerDeps {
  operationLog: SqliteOperationLog
}

const MAX_LIMIT = 500

export function operationsController(deps: OperationsControllerDeps) {
  const { operationLog } = deps

  return new Elysia({ prefix: '/api/v1/operations' })
    .get(
      '/',
      ({ query }) => {
        const limit = query.limit ? Number.parseInt(query.limit, 10) : 50
        const offset = query.offset ? Number.parseInt(query.offset, 10) : 0
        return operationLog.recent({
          repository: query.repository,
          limit: Number.isNaN(limit) ? 50 : Math.min(Math.max(limit, 1), MAX_LIMIT),
          offset: Number.isNaN(offset) ? 0 : Math.max(offset, 0),
        })
      },
      {
        query: t.Object({
          repository: t.Optional(t.String()),
          limit: t.Optional(t.String()),
          offset: t.Optional(t.String()),
        }),
      },
    )

    .get(
      '/:id',
      ({ params }) => {
        const outcome = operationLog.get(params.id)
        if (!outcome) {
          throw new OperationNotFoundError(params.id)
        }
        return outcome
      },
      {
        params: t.Object({
          id: t.String(),
        }),
      },
    )
}
