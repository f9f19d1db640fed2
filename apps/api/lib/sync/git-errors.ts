/**
 * Git error classification.
 *
 * git reports failures as stderr text only. The patterns below map the
 * messages of the clone/fetch/checkout commands we run to a SyncErrorKind so
 * the detection lives in one place.
 */

import type { SyncErrorKind } from '@labelsync/core'

interface ErrorPattern {
  kind: SyncErrorKind
  patterns: RegExp[]
}

// Checked in order: a missing branch is reported with "not found" wording too
const ERROR_PATTERNS: ErrorPattern[] = [
  {
    kind: 'BranchNotFound',
    patterns: [/couldn't find remote ref/i, /Remote branch .+ not found in upstream/i],
  },
  {
    kind: 'AuthenticationFailed',
    patterns: [
      /Authentication failed/i,
      /Permission denied/i,
      /could not read (Username|Password)/i,
      /Host key verification failed/i,
      /HTTP Basic: Access denied/i,
    ],
  },
  {
    kind: 'RepositoryNotFound',
    patterns: [
      /Repository not found/i,
      /does not appear to be a git repository/i,
      /does not exist/i,
    ],
  },
  {
    kind: 'NetworkUnreachable',
    patterns: [
      /Network is unreachable/i,
      /Name or service not known/i,
      /Could not resolve host/i,
      /Temporary failure in name resolution/i,
      /Connection (refused|timed out)/i,
      /Failed to connect to/i,
    ],
  },
]

/**
 * Map git stderr to an error kind. Unrecognized output is `GitCommandFailed`.
 */
export function classifyGitError(stderr: string): SyncErrorKind {
  for (const { kind, patterns } of ERROR_PATTERNS) {
    if (patterns.some((pattern) => pattern.test(stderr))) {
      return kind
    }
  }
  return 'GitCommandFailed'
}

/**
 * Last meaningful line of git output, usually the `fatal:` line.
 */
export function lastErrorLine(output: string): string {
  const lines = output
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
  const fatal = lines.findLast((line) => line.startsWith('fatal:') || line.startsWith('error:'))
  return fatal ?? lines[lines.length - 1] ?? ''
}

export class GitSyncError extends Error {
  readonly status = 502

  constructor(
    readonly kind: SyncErrorKind,
    message: string,
  ) {
    super(message)
    this.name = 'GitSyncError'
  }
}
