import { z } from 'zod'
import { branchFromRef } from '../repository-url'
import type { ParseResult } from '../types'

/**
 * Push payload. Accepts the GitHub/Gitea/GitLab shape (`repository.name`) as
 * well as a bare `{ "repository": "<name>" }` from scripts.
 */
export const pushPayloadSchema = z
  .object({
    ref: z.string().optional(),
    after: z.string().optional(),
    repository: z.union([
      z.string().trim().min(1),
      z.object({ name: z.string().trim().min(1) }).passthrough(),
    ]),
  })
  .passthrough()

/**
 * The parts of a push the orchestrator cares about.
 */
export interface PushSignal {
  /** @example 'svc-backend' */
  repositoryName: string

  /** Full ref pushed to. */
  ref?: string

  /** Branch pushed to, when the payload names one. */
  branch?: string

  /** Commit after the push. */
  commit?: string
}

export function safeParsePushPayload(data: unknown): ParseResult<PushSignal> {
  const result = pushPayloadSchema.safeParse(data)
  if (!result.success) {
    const errors = result.error.issues.map((issue) => ({
      path: issue.path.join('.') || '/',
      message: issue.message,
    }))
    return { success: false, errors }
  }

  const { repository, ref, after } = result.data
  return {
    success: true,
    data: {
      repositoryName: typeof repository === 'string' ? repository : repository.name,
      ref,
      branch: branchFromRef(ref),
      commit: after,
    },
  }
}
