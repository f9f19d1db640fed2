/**
 * Git Sync Engine
 *
 * Brings a repository's working tree to the tip of its configured branch by
 * running the git CLI. Clones when no working tree exists, otherwise fetches
 * and hard-resets. Local modifications are always discarded. Syncs that
 * resolve to the same working tree run one at a time.
 */

import { spawn } from 'node:child_process'
import { existsSync } from 'node:fs'
import { mkdir, rm } from 'node:fs/promises'
import { dirname, join, resolve } from 'node:path'
import {
  type Repository,
  type SyncErrorKind,
  type SyncResult,
  errorMessage,
  toDirectoryName,
} from '@labelsync/core'
import type { Logger } from '../logger'
import { KeyedMutex } from '../orchestrator/lock'
import { type CredentialResolver, toInvocationAuth } from './credentials'
import { GitSyncError, classifyGitError, lastErrorLine } from './git-errors'

export interface GitRunOptions {
  cwd?: string
  env: NodeJS.ProcessEnv
  timeoutMs: number
  signal?: AbortSignal
}

export interface GitRunResult {
  exitCode: number | null
  stdout: string
  stderr: string
  timedOut: boolean
  aborted: boolean
}

/**
 * Runs one git command. Injected so tests can replace the git binary.
 */
export type GitRunner = (args: string[], options: GitRunOptions) => Promise<GitRunResult>

/**
 * Anything that can bring a repository up to date.
 */
export interface SyncEngine {
  /**
   * Never throws; failures are reported in the result.
   */
  sync(repository: Repository, options?: { signal?: AbortSignal }): Promise<SyncResult>
}

export interface GitSyncEngineConfig {
  /** Parent directory for working trees of repositories without a local path */
  reposDir: string

  /**
   * Budget for the whole sync, shared by every git command it runs.
   * @default 120000
   */
  timeoutMs?: number

  credentials?: CredentialResolver

  runner?: GitRunner

  /** @default 'git' */
  gitBinary?: string
}

/**
 * Working tree location for a repository.
 */
export function workingPath(repository: Repository, reposDir: string): string {
  return repository.localPath ?? join(reposDir, toDirectoryName(repository.name))
}

/**
 * Spawn git and collect its output. Kills the process on timeout or abort.
 */
export function createSpawnRunner(gitBinary = 'git'): GitRunner {
  return (args, options) =>
    new Promise((resolve) => {
      let stdout = ''
      let stderr = ''
      let timedOut = false
      let aborted = false

      const proc = spawn(gitBinary, args, {
        cwd: options.cwd,
        env: options.env,
        stdio: ['ignore', 'pipe', 'pipe'],
      })

      const timer = setTimeout(() => {
        timedOut = true
        proc.kill('SIGKILL')
      }, options.timeoutMs)

      const onAbort = () => {
        aborted = true
        proc.kill('SIGKILL')
      }
      options.signal?.addEventListener('abort', onAbort, { once: true })

      const finish = (exitCode: number | null) => {
        clearTimeout(timer)
        options.signal?.removeEventListener('abort', onAbort)
        resolve({ exitCode, stdout, stderr, timedOut, aborted })
      }

      proc.stdout?.on('data', (data: Buffer) => {
        stdout += data.toString()
      })

      proc.stderr?.on('data', (data: Buffer) => {
        stderr += data.toString()
      })

      proc.on('close', (code) => finish(code))

      proc.on('error', (err) => {
        stderr += err.message
        finish(null)
      })
    })
}

interface SyncContext {
  repository: Repository
  deadline: number
  env: NodeJS.ProcessEnv
  configArgs: string[]
  signal?: AbortSignal
}

export class GitSyncEngine implements SyncEngine {
  private readonly reposDir: string
  private readonly timeoutMs: number
  private readonly credentials: CredentialResolver | undefined
  private readonly runner: GitRunner
  private readonly logger: Logger
  private readonly trees = new KeyedMutex<string>()

  constructor(config: GitSyncEngineConfig, logger: Logger) {
    this.reposDir = config.reposDir
    this.timeoutMs = config.timeoutMs ?? 120_000
    this.credentials = config.credentials
    this.runner = config.runner ?? createSpawnRunner(config.gitBinary)
    this.logger = logger.child({ component: 'GitSyncEngine' })
  }

  async sync(repository: Repository, options: { signal?: AbortSignal } = {}): Promise<SyncResult> {
    const path = workingPath(repository, this.reposDir)
    // Different names can map to one directory (`team/app`, `team_app`, a shared local path)
    return this.trees.runExclusive(resolve(path), () =>
      this.syncWorkingTree(repository, path, options),
    )
  }

  private async syncWorkingTree(
    repository: Repository,
    path: string,
    options: { signal?: AbortSignal },
  ): Promise<SyncResult> {
    const startTime = Date.now()
    const operation = existsSync(join(path, '.git')) ? 'update' : 'clone'
    const auth = toInvocationAuth(this.credentials?.resolve(repository))

    const ctx: SyncContext = {
      repository,
      deadline: startTime + this.timeoutMs,
      env: {
        ...process.env,
        ...auth.env,
        GIT_TERMINAL_PROMPT: '0',
        GIT_ASKPASS: 'true',
      },
      configArgs: auth.configArgs,
      signal: options.signal,
    }

    this.logger.debug({ repository: repository.name, operation, path }, 'Syncing repository')

    try {
      if (operation === 'clone') {
        const commit = await this.clone(path, ctx)
        return { success: true, changed: true, operation, commit, durationMs: Date.now() - startTime }
      }

      const { previousCommit, commit } = await this.update(path, ctx)
      return {
        success: true,
        changed: commit !== previousCommit,
        operation,
        commit,
        previousCommit,
        durationMs: Date.now() - startTime,
      }
    } catch (err) {
      const kind: SyncErrorKind = err instanceof GitSyncError ? err.kind : 'GitCommandFailed'
      const message = errorMessage(err)
      this.logger.warn({ repository: repository.name, operation, kind, err: message }, 'Sync failed')
      return {
        success: false,
        changed: false,
        operation,
        error: { kind, message },
        durationMs: Date.now() - startTime,
      }
    }
  }

  private async clone(path: string, ctx: SyncContext): Promise<string> {
    const { url, branch } = ctx.repository

    // A directory without .git is a leftover from an interrupted clone
    await rm(path, { recursive: true, force: true })
    await mkdir(dirname(path), { recursive: true })

    try {
      await this.git(['clone', '--branch', branch, '--single-branch', url, path], undefined, ctx)
      return await this.head(path, ctx)
    } catch (err) {
      await this.removeWorkingTree(path)
      throw err
    }
  }

  private async update(
    path: string,
    ctx: SyncContext,
  ): Promise<{ previousCommit: string; commit: string }> {
    const { url, branch } = ctx.repository

    const previousCommit = await this.head(path, ctx)
    await this.git(['remote', 'set-url', 'origin', url], path, ctx)
    await this.git(
      ['fetch', '--prune', 'origin', `+refs/heads/${branch}:refs/remotes/origin/${branch}`],
      path,
      ctx,
    )
    await this.git(['checkout', '--force', '-B', branch, `refs/remotes/origin/${branch}`], path, ctx)
    await this.git(['clean', '-fd'], path, ctx)
    const commit = await this.head(path, ctx)

    return { previousCommit, commit }
  }

  private async head(path: string, ctx: SyncContext): Promise<string> {
    const stdout = await this.git(['rev-parse', 'HEAD'], path, ctx)
    return stdout.trim()
  }

  /**
   * Run one git command against the remaining budget.
   */
  private async git(args: string[], cwd: string | undefined, ctx: SyncContext): Promise<string> {
    const command = args[0]

    if (ctx.signal?.aborted) {
      throw new GitSyncError('SyncCancelled', 'Sync cancelled')
    }

    const remaining = ctx.deadline - Date.now()
    if (remaining <= 0) {
      throw new GitSyncError('SyncTimeout', `Sync timed out after ${this.timeoutMs}ms`)
    }

    const result = await this.runner([...ctx.configArgs, ...args], {
      cwd,
      env: ctx.env,
      timeoutMs: remaining,
      signal: ctx.signal,
    })

    if (result.aborted) {
      throw new GitSyncError('SyncCancelled', `git ${command} cancelled`)
    }
    if (result.timedOut) {
      throw new GitSyncError('SyncTimeout', `git ${command} timed out after ${this.timeoutMs}ms`)
    }
    if (result.exitCode !== 0) {
      const detail = lastErrorLine(result.stderr) || `exit code ${result.exitCode}`
      throw new GitSyncError(classifyGitError(result.stderr), `git ${command} failed: ${detail}`)
    }

    return result.stdout
  }

  private async removeWorkingTree(path: string): Promise<void> {
    try {
      await rm(path, { recursive: true, force: true })
    } catch (err) {
      this.logger.warn({ path, err: errorMessage(err) }, 'Failed to remove partial clone')
    }
  }
}
