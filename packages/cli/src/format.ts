/**
 * Plain-text rendering for CLI output.
 */

import type { ContainerInfo, OutcomeInfo, RepositoryInfo } from './client'

export function outcomeVerdict(outcome: OutcomeInfo): string {
  if (outcome.cancelled) return 'cancelled'
  if (!outcome.sync.success) return 'failure'
  if (outcome.restartStage.status === 'failed') return 'partial'
  if (outcome.restarts.some((r) => !r.success)) return 'partial'
  return 'success'
}

/**
 * Multi-line description of one outcome.
 *
 * @example
 * svc-backend [success] manual 2024-05-01T10:00:00.000Z
 *   sync: update abc1234 (changed)
 *   restarted api
 */
export function formatOutcome(outcome: OutcomeInfo): string {
  const lines = [
    `${outcome.repositoryName} [${outcomeVerdict(outcome)}] ${outcome.trigger} ${outcome.startedAt}`,
  ]

  const { sync } = outcome
  if (sync.success) {
    const commit = sync.commit ? ` ${sync.commit.slice(0, 7)}` : ''
    lines.push(`  sync: ${sync.operation}${commit} (${sync.changed ? 'changed' : 'unchanged'})`)
  } else {
    lines.push(`  sync failed: ${sync.error?.kind ?? 'unknown'}: ${sync.error?.message ?? ''}`)
  }

  const stage = outcome.restartStage
  if (stage.status === 'skipped') {
    lines.push(`  restarts skipped (${stage.reason ?? 'unknown'})`)
  } else if (stage.status === 'failed') {
    lines.push(`  restarts failed: ${stage.error?.kind ?? 'unknown'}: ${stage.error?.message ?? ''}`)
  } else if (outcome.restarts.length === 0) {
    lines.push('  no dependent containers')
  }

  for (const restart of outcome.restarts) {
    const detail = restart.error ? `: ${restart.error.message}` : ''
    lines.push(`  ${restart.action} ${restart.containerName}${detail}`)
  }

  return lines.join('\n')
}

/**
 * Left-aligned columns separated by two spaces.
 */
export function formatTable(header: string[], rows: string[][]): string {
  const widths = header.map((h, i) => Math.max(h.length, ...rows.map((r) => (r[i] ?? '').length)))
  const render = (cells: string[]) =>
    cells
      .map((cell, i) => (i === cells.length - 1 ? cell : cell.padEnd(widths[i])))
      .join('  ')
  return [render(header), ...rows.map(render)].join('\n')
}

export function formatRepositories(repositories: RepositoryInfo[]): string {
  if (repositories.length === 0) return 'No repositories registered'
  return formatTable(
    ['NAME', 'BRANCH', 'ACTIVE', 'LAST SYNC', 'COMMIT'],
    repositories.map((r) => [
      r.name,
      r.branch,
      r.isActive ? 'yes' : 'no',
      r.lastSyncStatus === 'never' ? 'never' : `${r.lastSyncStatus} ${r.lastSyncAt ?? ''}`.trim(),
      r.lastCommit?.slice(0, 7) ?? '-',
    ]),
  )
}

export function formatContainers(containers: ContainerInfo[]): string {
  if (containers.length === 0) return 'No dependent containers'
  return formatTable(
    ['NAME', 'STATUS', 'REPOSITORIES'],
    containers.map((c) => [c.name, c.status, c.repositories.join(', ') || '-']),
  )
}
