/**
 * Containers Controller
 *
 * Lists containers as the runtime reports them, with the repositories each one
 * declares in its restart label.
 */

import type { ContainerInspector, LabelResolver } from '@labelsync/core'
import { Elysia, t } from 'elysia'

export interface ContainersControllerDeps {
  inspector: ContainerInspector
  labels: LabelResolver
}

export function containersController(deps: ContainersControllerDeps) {
  const { inspector, labels } = deps

  return new Elysia({ prefix: '/api/v1/containers' }).get(
    '/',
    async ({ query }) => {
      const containers = await inspector.listAll()

      const described = containers.map((container) => ({
        id: container.id,
        name: container.name,
        image: container.image,
        status: container.status,
        repositories: labels.repositoriesFor(container.labels),
      }))

      const repository = query.repository
      const filtered = repository
        ? described.filter((c) => c.repositories.includes(repository))
        : described

      // Only containers that declare a dependency, unless asked for all
      return query.all === 'true' ? filtered : filtered.filter((c) => c.repositories.length > 0)
    },
    {
      query: t.Object({
        repository: t.Optional(t.String()),
        all: t.Optional(t.String()),
      }),
    },
  )
}
