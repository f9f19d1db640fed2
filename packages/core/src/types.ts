/**
 * Core types for the labelsync repository sync orchestrator
 */

// =============================================================================
// Identifiers
// =============================================================================

/**
 * Unique name of a registered repository. Also the value containers put in
 * their restart labels.
 * @example 'svc-backend'
 */
export type RepositoryName = string

/**
 * Container identifier as reported by the container runtime.
 * @example '4f2a9c1d8e7b'
 */
export type ContainerId = string

/**
 * Identifier of one orchestration run.
 * @example '3b241101-e2bb-4255-8caf-4136c566a962'
 */
export type OutcomeId = string

// =============================================================================
// Repository
// =============================================================================

/**
 * Result of the most recent sync attempt for a repository.
 * - `never`: the repository has not been synced yet
 * - `success`: the last sync updated the working tree
 * - `failure`: the last sync failed, see `lastSyncError`
 */
export type RepositorySyncStatus = 'never' | 'success' | 'failure'

/**
 * A registered repository.
 */
export interface Repository {
  id: number

  /**
   * Unique name, matched byte-for-byte against container label values.
   * @example 'svc-backend'
   */
  name: RepositoryName

  /**
   * Clone URL.
   * @example 'git@github.com:acme/svc-backend.git'
   * @example 'https://github.com/acme/svc-backend.git'
   */
  url: string

  /**
   * Branch tracked by the working tree.
   * @example 'main'
   */
  branch: string

  /**
   * Working tree location. Derived from the repositories directory when null.
   * @example '/var/lib/labelsync/repos/svc-backend'
   */
  localPath: string | null

  /** Inactive repositories are treated as unknown by the orchestrator. */
  isActive: boolean

  lastSyncStatus: RepositorySyncStatus
  lastSyncAt: Date | null
  lastSyncError: string | null

  /**
   * Commit checked out by the last successful sync.
   * @example '9fceb02d0ae598e95dc970b74767f19372d61af8'
   */
  lastCommit: string | null
}

/**
 * Status written back to the repository store after every sync attempt.
 */
export interface RepositorySyncRecord {
  success: boolean
  at: Date
  error?: string
  commit?: string
}

// =============================================================================
// Containers
// =============================================================================

/**
 * Coarse container state.
 * - `running`: the container is up
 * - `exited`: the container has stopped
 * - `other`: created, paused, restarting, dead, ...
 */
export type ContainerState = 'running' | 'exited' | 'other'

/**
 * A container as observed from the runtime. Never cached across runs because
 * labels can change between restarts.
 */
export interface ContainerDescriptor {
  id: ContainerId

  /**
   * Container name without the leading slash.
   * @example 'svc-backend-api-1'
   */
  name: string

  /** @example 'ghcr.io/acme/svc-backend:latest' */
  image: string

  status: ContainerState

  labels: Record<string, string>
}

/**
 * A container that depends on the repository being synced.
 */
export interface RestartTarget {
  container: ContainerDescriptor

  /**
   * Repository names listed in the consulted restart label.
   * @example ['svc-backend', 'svc-worker']
   */
  repositories: RepositoryName[]
}

// =============================================================================
// Sync
// =============================================================================

/**
 * Why a repository sync failed.
 */
export type SyncErrorKind =
  | 'AuthenticationFailed'
  | 'NetworkUnreachable'
  | 'RepositoryNotFound'
  | 'BranchNotFound'
  | 'SyncTimeout'
  | 'SyncCancelled'
  | 'GitCommandFailed'

export interface SyncFailure {
  kind: SyncErrorKind
  message: string
}

/**
 * Result of one repository sync.
 */
export interface SyncResult {
  success: boolean

  /** Whether HEAD moved (always true for a fresh clone). */
  changed: boolean

  /**
   * `clone` for a repository without a working tree, `update` otherwise.
   */
  operation: 'clone' | 'update'

  /** HEAD after the sync. */
  commit?: string

  /** HEAD before the sync, for updates. */
  previousCommit?: string

  error?: SyncFailure

  durationMs: number
}

// =============================================================================
// Restarts
// =============================================================================

/**
 * What happened to one dependent container.
 * - `restarted`: the runtime restarted (or started) the container
 * - `failed`: the restart call failed, see `error`
 * - `skipped`: the container was stopped and the policy leaves stopped containers alone
 */
export type RestartAction = 'restarted' | 'failed' | 'skipped'

export interface ContainerRestartResult {
  containerId: ContainerId
  containerName: string
  success: boolean
  action: RestartAction
  error?: {
    kind: 'RestartFailed'
    message: string
  }
  durationMs: number
}

// =============================================================================
// Operation outcome
// =============================================================================

/**
 * What started an orchestration run.
 */
export type TriggerSource = 'webhook' | 'manual' | 'sync-all'

/**
 * State of the restart stage of a run.
 * - `completed`: discovery ran and every match was attempted (or there were none)
 * - `skipped`: the stage did not run, see `reason`
 * - `cancelled`: restarts began but the run was cancelled before every match was attempted
 * - `failed`: discovery itself failed, see `error`
 */
export interface RestartStage {
  status: 'completed' | 'skipped' | 'cancelled' | 'failed'
  reason?: 'sync-failed' | 'cancelled'
  error?: {
    kind: 'RuntimeUnavailable' | 'DiscoveryFailed'
    message: string
  }
}

/**
 * The complete result of one signal. Immutable once built.
 */
export interface OperationOutcome {
  readonly id: OutcomeId
  readonly repositoryName: RepositoryName
  readonly trigger: TriggerSource
  readonly sync: Readonly<SyncResult>
  readonly restartStage: Readonly<RestartStage>
  readonly restarts: readonly Readonly<ContainerRestartResult>[]
  readonly cancelled: boolean
  readonly startedAt: Date
  readonly completedAt: Date
}

/**
 * Overall verdict for an outcome.
 * - `success`: synced and every dependent restarted (or none matched)
 * - `partial`: synced but some dependent failed to restart, or discovery failed
 * - `failure`: the sync failed
 * - `cancelled`: the run was interrupted
 */
export type OutcomeStatus = 'success' | 'partial' | 'failure' | 'cancelled'

export type ParseResult<T> =
  | { success: true; data: T }
  | { success: false; errors: ValidationError[] }

export interface ValidationError {
  path: string
  message: string
}
