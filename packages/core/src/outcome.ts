/**
 * Operation outcome helpers
 */

import type { ContainerRestartResult, OperationOutcome, OutcomeStatus } from './types'

type OutcomeInput = {
  -readonly [K in keyof OperationOutcome]: OperationOutcome[K]
}

/**
 * Build an immutable outcome. Nested objects and the restart list are frozen too.
 */
export function freezeOutcome(input: OutcomeInput): OperationOutcome {
  const restarts = Object.freeze(
    input.restarts.map((r): Readonly<ContainerRestartResult> =>
      Object.freeze({ ...r, error: r.error ? Object.freeze({ ...r.error }) : undefined }),
    ),
  )

  return Object.freeze({
    ...input,
    sync: Object.freeze({
      ...input.sync,
      error: input.sync.error ? Object.freeze({ ...input.sync.error }) : undefined,
    }),
    restartStage: Object.freeze({ ...input.restartStage }),
    restarts,
  })
}

/**
 * Reduce an outcome to a single verdict.
 */
export function outcomeStatus(outcome: OperationOutcome): OutcomeStatus {
  if (outcome.cancelled) return 'cancelled'
  if (!outcome.sync.success) return 'failure'
  if (outcome.restartStage.status === 'failed') return 'partial'
  if (outcome.restarts.some((r) => !r.success)) return 'partial'
  return 'success'
}

/**
 * One-line human summary of an outcome, used for logs and the CLI.
 *
 * @example 'svc-backend: synced (updated), restarted 2/3 container(s), failed: worker-1'
 */
export function summarizeOutcome(outcome: OperationOutcome): string {
  const { repositoryName, sync, restartStage, restarts } = outcome
  const parts: string[] = []

  if (sync.success) {
    parts.push(`synced (${sync.changed ? 'updated' : 'unchanged'})`)
  } else {
    parts.push(`sync failed [${sync.error?.kind ?? 'GitCommandFailed'}]`)
  }

  if (restartStage.status === 'skipped') {
    parts.push(`restarts skipped (${restartStage.reason ?? 'unknown'})`)
  } else if (restartStage.status === 'failed') {
    parts.push(`restart discovery failed [${restartStage.error?.kind ?? 'DiscoveryFailed'}]`)
  } else if (restarts.length === 0) {
    parts.push('no dependent containers')
  } else {
    const restarted = restarts.filter((r) => r.action === 'restarted').length
    const skipped = restarts.filter((r) => r.action === 'skipped').length
    const failed = restarts.filter((r) => r.action === 'failed')
    let text = `restarted ${restarted}/${restarts.length} container(s)`
    if (skipped > 0) text += `, skipped ${skipped}`
    if (failed.length > 0) text += `, failed: ${failed.map((r) => r.containerName).join(', ')}`
    parts.push(text)
  }

  if (outcome.cancelled) parts.push('cancelled')

  return `${repositoryName}: ${parts.join(', ')}`
}
