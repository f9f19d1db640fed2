import { resolve } from 'node:path'
import { DEFAULT_RESTART_LABEL_KEYS, parseDuration } from '@labelsync/core'

export type ConcurrentSignalPolicy = 'queue' | 'reject'
export type StoppedContainerPolicy = 'restart' | 'skip'

export interface LabelsyncConfig {
  apiHost: string
  apiPort: number
  dbPath: string

  /** Parent directory for working trees of repositories without a local path */
  reposDir: string

  /** Optional YAML registry seeded into the store at startup */
  repositoriesFile: string | undefined

  gitTimeoutMs: number
  restartTimeoutSeconds: number

  /** Deadline for one Docker API call. Must exceed the restart grace period. */
  dockerTimeoutMs: number
  labelKeys: readonly string[]
  restartOnSyncFailure: boolean
  concurrentSignals: ConcurrentSignalPolicy
  stoppedContainers: StoppedContainerPolicy

  /** Shared secret for webhook signatures. Signatures are not checked when unset. */
  webhookSecret: string | undefined

  sshKeyPath: string | undefined
  httpsUsername: string | undefined
  httpsToken: string | undefined

  logLevel: string
  logQueueSize: number
  operationLogMaxEntries: number
  dockerHost: string | undefined
}

function getEnvNumber(key: string, defaultValue: number): number {
  const value = process.env[key]
  if (value === undefined) return defaultValue
  const parsed = Number.parseInt(value, 10)
  return Number.isNaN(parsed) ? defaultValue : parsed
}

function getEnvString(key: string, defaultValue: string): string {
  return process.env[key] ?? defaultValue
}

function getEnvOptional(key: string): string | undefined {
  const value = process.env[key]?.trim()
  return value ? value : undefined
}

function getEnvPath(key: string, defaultValue: string): string {
  const value = process.env[key] ?? defaultValue
  // Resolve relative paths from current working directory
  return value.startsWith('/') ? value : resolve(process.cwd(), value)
}

function getEnvBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key]?.trim().toLowerCase()
  if (!value) return defaultValue
  return ['1', 'true', 'yes', 'on'].includes(value)
}

function getEnvDuration(key: string, defaultValue: string): number {
  return parseDuration(process.env[key] ?? defaultValue)
}

function getEnvList(key: string, defaultValue: readonly string[]): readonly string[] {
  const value = process.env[key]
  if (value === undefined) return defaultValue
  const items = value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0)
  return items.length > 0 ? items : defaultValue
}

function getEnvChoice<T extends string>(key: string, choices: readonly T[], defaultValue: T): T {
  const value = process.env[key]?.trim()
  if (!value) return defaultValue
  const choice = choices.find((c) => c === value)
  if (!choice) {
    throw new Error(`${key} must be one of ${choices.join(', ')} (got "${value}")`)
  }
  return choice
}

/**
 * Read configuration from the environment. Exported for tests; the app uses `config`.
 */
export function loadConfig(): LabelsyncConfig {
  const repositoriesFile = getEnvOptional('LABELSYNC_REPOSITORIES_FILE')
  const restartTimeoutSeconds = Math.ceil(
    getEnvDuration('LABELSYNC_RESTART_TIMEOUT', '30s') / 1000,
  )

  return {
    apiHost: getEnvString('LABELSYNC_API_HOST', '0.0.0.0'),
    apiPort: getEnvNumber('LABELSYNC_API_PORT', 3000),
    dbPath: getEnvPath('LABELSYNC_DB_PATH', 'data/labelsync.db'),
    reposDir: getEnvPath('LABELSYNC_REPOS_DIR', '/var/lib/labelsync/repos'),
    repositoriesFile: repositoriesFile
      ? getEnvPath('LABELSYNC_REPOSITORIES_FILE', repositoriesFile)
      : undefined,

    gitTimeoutMs: getEnvDuration('LABELSYNC_GIT_TIMEOUT', '120s'),
    restartTimeoutSeconds,
    dockerTimeoutMs: getEnvDuration('LABELSYNC_DOCKER_TIMEOUT', `${restartTimeoutSeconds + 30}s`),
    labelKeys: getEnvList('LABELSYNC_LABEL_KEYS', DEFAULT_RESTART_LABEL_KEYS),
    restartOnSyncFailure: getEnvBoolean('LABELSYNC_RESTART_ON_SYNC_FAILURE', false),
    concurrentSignals: getEnvChoice(
      'LABELSYNC_CONCURRENT_SIGNALS',
      ['queue', 'reject'] as const,
      'queue',
    ),
    stoppedContainers: getEnvChoice(
      'LABELSYNC_STOPPED_CONTAINERS',
      ['restart', 'skip'] as const,
      'restart',
    ),

    webhookSecret: getEnvOptional('LABELSYNC_WEBHOOK_SECRET'),
    sshKeyPath: getEnvOptional('LABELSYNC_SSH_KEY_PATH'),
    httpsUsername: getEnvOptional('LABELSYNC_HTTPS_USERNAME'),
    httpsToken: getEnvOptional('LABELSYNC_HTTPS_TOKEN'),

    logLevel: getEnvString('LABELSYNC_LOG_LEVEL', 'info'),
    logQueueSize: getEnvNumber('LABELSYNC_LOG_QUEUE_SIZE', 256),
    operationLogMaxEntries: getEnvNumber('LABELSYNC_OPERATION_LOG_MAX_ENTRIES', 1000),
    dockerHost: getEnvOptional('DOCKER_HOST'),
  }
}

export const config: LabelsyncConfig = loadConfig()
