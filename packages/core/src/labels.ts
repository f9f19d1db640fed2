/**
 * Label Resolver
 *
 * Decides whether a container declares a restart dependency on a repository.
 *
 * Containers opt in with a label whose value is a comma-separated list of
 * repository names:
 *
 *   labels:
 *     restart-after: "svc-backend, svc-worker"
 *
 * Several spellings of the key have been used over time. They are consulted in
 * priority order and only the first key present on the container counts; values
 * are never merged across keys.
 *
 * Everything here is pure so it can be tested against literal label maps.
 */

import type { RepositoryName } from './types'

/**
 * Recognized restart label keys, canonical key first.
 */
export const DEFAULT_RESTART_LABEL_KEYS: readonly string[] = [
  'restart-after',
  'restart_after_pull',
  'restart_after',
]

/**
 * Find the first recognized key present in the label map.
 * Returns undefined when none of the keys is set.
 */
export function findRestartLabel(
  labels: Readonly<Record<string, string>>,
  keys: readonly string[] = DEFAULT_RESTART_LABEL_KEYS,
): { key: string; value: string } | undefined {
  for (const key of keys) {
    if (Object.hasOwn(labels, key)) {
      return { key, value: labels[key] }
    }
  }
  return undefined
}

/**
 * Split a label value into repository names.
 * Entries are trimmed and empty entries dropped.
 */
export function parseRepositoryList(value: string): RepositoryName[] {
  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0)
}

/**
 * Repository names a container depends on, read from the first recognized key.
 */
export function dependentRepositories(
  labels: Readonly<Record<string, string>>,
  keys: readonly string[] = DEFAULT_RESTART_LABEL_KEYS,
): RepositoryName[] {
  const label = findRestartLabel(labels, keys)
  return label ? parseRepositoryList(label.value) : []
}

/**
 * True if the container's restart label lists `repositoryName` exactly
 * (case-sensitive, after trimming each entry).
 */
export function resolveLabels(
  labels: Readonly<Record<string, string>>,
  repositoryName: RepositoryName,
  keys: readonly string[] = DEFAULT_RESTART_LABEL_KEYS,
): boolean {
  return dependentRepositories(labels, keys).includes(repositoryName)
}

export interface LabelResolver {
  readonly keys: readonly string[]
  matches(labels: Readonly<Record<string, string>>, repositoryName: RepositoryName): boolean
  repositoriesFor(labels: Readonly<Record<string, string>>): RepositoryName[]
}

/**
 * Bind the resolver to a configured key list.
 */
export function createLabelResolver(
  keys: readonly string[] = DEFAULT_RESTART_LABEL_KEYS,
): LabelResolver {
  const normalized = keys.map((key) => key.trim()).filter((key) => key.length > 0)
  if (normalized.length === 0) {
    throw new Error('At least one restart label key is required')
  }
  const frozen = Object.freeze([...normalized])

  return {
    keys: frozen,
    matches: (labels, repositoryName) => resolveLabels(labels, repositoryName, frozen),
    repositoriesFor: (labels) => dependentRepositories(labels, frozen),
  }
}
