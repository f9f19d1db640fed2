/**
 * GitSyncEngine Unit Tests
 *
 * git itself is replaced by a scripted runner; the working tree lives in a
 * temp directory so clone/update detection is real.
 */

import { existsSync } from 'node:fs'
import { mkdir, mkdtemp, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest'
import { createRepository, createTestLogger } from '../../test/fixtures'
import { createCredentialResolver } from './credentials'
import { type GitRunOptions, type GitRunResult, GitSyncEngine, workingPath } from './git'

type Script = (args: string[], options: GitRunOptions) => Partial<GitRunResult> | Promise<Partial<GitRunResult>>

function createRunner(script: Script) {
  return vi.fn(async (args: string[], options: GitRunOptions): Promise<GitRunResult> => ({
    exitCode: 0,
    stdout: '',
    stderr: '',
    timedOut: false,
    aborted: false,
    ...(await script(args, options)),
  }))
}

/** Subcommand of a recorded call, skipping leading `-c key=value` pairs */
function subcommand(args: string[]): string {
  let i = 0
  while (args[i] === '-c') i += 2
  return args[i]
}

describe('GitSyncEngine', () => {
  let reposDir: string

  beforeEach(async () => {
    reposDir = await mkdtemp(join(tmpdir(), 'git-engine-test-'))
  })

  afterEach(async () => {
    await rm(reposDir, { recursive: true, force: true })
  })

  test('derives the working path from the repository name', () => {
    const repository = createRepository({ name: 'svc-backend' })
    expect(workingPath(repository, '/srv/repos')).toBe('/srv/repos/svc-backend')
    expect(workingPath({ ...repository, localPath: '/opt/app' }, '/srv/repos')).toBe('/opt/app')
  })

  describe('clone', () => {
    test('clones a single branch when no working tree exists', async () => {
      const repository = createRepository({ name: 'svc-backend', branch: 'release' })
      const path = join(reposDir, 'svc-backend')
      const runner = createRunner(async (args) => {
        if (args[0] === 'clone') await mkdir(join(path, '.git'), { recursive: true })
        if (args[0] === 'rev-parse') return { stdout: 'abc123\n' }
        return {}
      })
      const engine = new GitSyncEngine({ reposDir, runner }, createTestLogger())

      const result = await engine.sync(repository)

      expect(result).toMatchObject({
        success: true,
        changed: true,
        operation: 'clone',
        commit: 'abc123',
      })
      expect(runner.mock.calls.map(([args]) => args)).toEqual([
        ['clone', '--branch', 'release', '--single-branch', repository.url, path],
        ['rev-parse', 'HEAD'],
      ])
    })

    test('removes a leftover directory without .git before cloning', async () => {
      const path = join(reposDir, 'svc-backend')
      await mkdir(join(path, 'stale'), { recursive: true })
      const runner = createRunner((args) => {
        if (args[0] === 'clone') {
          expect(existsSync(join(path, 'stale'))).toBe(false)
        }
        return { stdout: 'abc\n' }
      })
      const engine = new GitSyncEngine({ reposDir, runner }, createTestLogger())

      const result = await engine.sync(createRepository({ name: 'svc-backend' }))

      expect(result.success).toBe(true)
    })

    test('classifies a failed clone and removes the partial tree', async () => {
      const path = join(reposDir, 'svc-backend')
      const runner = createRunner(async () => {
        await mkdir(join(path, '.git'), { recursive: true })
        return { exitCode: 128, stderr: "Cloning into 'svc-backend'...\nremote: Repository not found.\nfatal: repository 'x' not found\n" }
      })
      const engine = new GitSyncEngine({ reposDir, runner }, createTestLogger())

      const result = await engine.sync(createRepository({ name: 'svc-backend' }))

      expect(result.success).toBe(false)
      expect(result.operation).toBe('clone')
      expect(result.error).toEqual({
        kind: 'RepositoryNotFound',
        message: "git clone failed: fatal: repository 'x' not found",
      })
      expect(existsSync(path)).toBe(false)
    })
  })

  describe('update', () => {
    let path: string

    beforeEach(async () => {
      path = join(reposDir, 'svc-backend')
      await mkdir(join(path, '.git'), { recursive: true })
    })

    test('fetches and hard-resets to the remote branch', async () => {
      const heads = ['old111\n', 'new222\n']
      const runner = createRunner((args) => {
        if (args[0] === 'rev-parse') return { stdout: heads.shift() }
        return {}
      })
      const engine = new GitSyncEngine({ reposDir, runner }, createTestLogger())
      const repository = createRepository({ name: 'svc-backend', branch: 'main' })

      const result = await engine.sync(repository)

      expect(result).toMatchObject({
        success: true,
        changed: true,
        operation: 'update',
        previousCommit: 'old111',
        commit: 'new222',
      })
      expect(runner.mock.calls.map(([args]) => args)).toEqual([
        ['rev-parse', 'HEAD'],
        ['remote', 'set-url', 'origin', repository.url],
        ['fetch', '--prune', 'origin', '+refs/heads/main:refs/remotes/origin/main'],
        ['checkout', '--force', '-B', 'main', 'refs/remotes/origin/main'],
        ['clean', '-fd'],
        ['rev-parse', 'HEAD'],
      ])
      expect(runner.mock.calls.every(([, options]) => options.cwd === path)).toBe(true)
    })

    test('reports unchanged when HEAD did not move', async () => {
      const runner = createRunner(() => ({ stdout: 'same\n' }))
      const engine = new GitSyncEngine({ reposDir, runner }, createTestLogger())

      const result = await engine.sync(createRepository({ name: 'svc-backend' }))

      expect(result.success).toBe(true)
      expect(result.changed).toBe(false)
    })

    test('classifies a missing branch', async () => {
      const runner = createRunner((args) =>
        args[0] === 'fetch'
          ? { exitCode: 128, stderr: "fatal: couldn't find remote ref feature-x\n" }
          : { stdout: 'abc\n' },
      )
      const engine = new GitSyncEngine({ reposDir, runner }, createTestLogger())

      const result = await engine.sync(createRepository({ name: 'svc-backend', branch: 'feature-x' }))

      expect(result.error).toEqual({
        kind: 'BranchNotFound',
        message: "git fetch failed: fatal: couldn't find remote ref feature-x",
      })
      expect(runner).toHaveBeenCalledTimes(3)
    })

    test('reports a timeout when git is killed by the budget', async () => {
      const runner = createRunner((args) =>
        args[0] === 'fetch' ? { exitCode: null, timedOut: true } : { stdout: 'abc\n' },
      )
      const engine = new GitSyncEngine({ reposDir, runner, timeoutMs: 5000 }, createTestLogger())

      const result = await engine.sync(createRepository({ name: 'svc-backend' }))

      expect(result.error).toEqual({ kind: 'SyncTimeout', message: 'git fetch timed out after 5000ms' })
    })

    test('passes the remaining budget to each command', async () => {
      const runner = createRunner(() => ({ stdout: 'abc\n' }))
      const engine = new GitSyncEngine({ reposDir, runner, timeoutMs: 60_000 }, createTestLogger())

      await engine.sync(createRepository({ name: 'svc-backend' }))

      for (const [, options] of runner.mock.calls) {
        expect(options.timeoutMs).toBeGreaterThan(0)
        expect(options.timeoutMs).toBeLessThanOrEqual(60_000)
      }
    })

    test('does not run git when already cancelled', async () => {
      const runner = createRunner(() => ({}))
      const engine = new GitSyncEngine({ reposDir, runner }, createTestLogger())
      const controller = new AbortController()
      controller.abort()

      const result = await engine.sync(createRepository({ name: 'svc-backend' }), {
        signal: controller.signal,
      })

      expect(result.error?.kind).toBe('SyncCancelled')
      expect(runner).not.toHaveBeenCalled()
    })

    test('reports cancellation when git was killed by an abort', async () => {
      const runner = createRunner((args) =>
        args[0] === 'fetch' ? { exitCode: null, aborted: true } : { stdout: 'abc\n' },
      )
      const engine = new GitSyncEngine({ reposDir, runner }, createTestLogger())

      const result = await engine.sync(createRepository({ name: 'svc-backend' }))

      expect(result.error).toEqual({ kind: 'SyncCancelled', message: 'git fetch cancelled' })
    })

    test('runs git without prompts and with credentials for the invocation only', async () => {
      const runner = createRunner(() => ({ stdout: 'abc\n' }))
      const engine = new GitSyncEngine(
        {
          reposDir,
          runner,
          credentials: createCredentialResolver({ httpsUsername: 'bot', httpsToken: 'test-secret' }),
        },
        createTestLogger(),
      )

      await engine.sync(createRepository({ name: 'svc-backend', url: 'https://git.example.com/a.git' }))

      const [args, options] = runner.mock.calls[0]
      expect(args.slice(0, 2)).toEqual([
        '-c',
        `http.extraHeader=Authorization: Basic ${Buffer.from('bot:test-secret').toString('base64')}`,
      ])
      expect(subcommand(args)).toBe('rev-parse')
      expect(options.env.GIT_TERMINAL_PROMPT).toBe('0')
      expect(options.env.GIT_ASKPASS).toBe('true')
    })
  })

  describe('working tree exclusivity', () => {
    function createOverlapRunner() {
      const active = new Map<string, number>()
      const peak = new Map<string, number>()
      const runner = createRunner(async (args, options) => {
        const tree = options.cwd ?? ''
        const count = (active.get(tree) ?? 0) + 1
        active.set(tree, count)
        peak.set(tree, Math.max(peak.get(tree) ?? 0, count))
        await new Promise((resolve) => setTimeout(resolve, 5))
        active.set(tree, (active.get(tree) ?? 1) - 1)
        return args[0] === 'rev-parse' ? { stdout: 'abc123\n' } : {}
      })
      return { runner, peak }
    }

    test('serializes repositories whose names map to the same directory', async () => {
      const path = join(reposDir, 'team_app')
      await mkdir(join(path, '.git'), { recursive: true })
      const { runner, peak } = createOverlapRunner()
      const engine = new GitSyncEngine({ reposDir, runner }, createTestLogger())

      const results = await Promise.all([
        engine.sync(createRepository({ name: 'team/app' })),
        engine.sync(createRepository({ name: 'team_app' })),
      ])

      expect(results.map((r) => r.success)).toEqual([true, true])
      expect(peak.get(path)).toBe(1)
      expect(runner).toHaveBeenCalledTimes(12)
    })

    test('serializes repositories sharing a local path', async () => {
      const path = join(reposDir, 'shared')
      await mkdir(join(path, '.git'), { recursive: true })
      const { runner, peak } = createOverlapRunner()
      const engine = new GitSyncEngine({ reposDir, runner }, createTestLogger())

      await Promise.all([
        engine.sync(createRepository({ name: 'svc-a', localPath: path })),
        engine.sync(createRepository({ name: 'svc-b', localPath: path })),
      ])

      expect(peak.get(path)).toBe(1)
    })

    test('separate working trees still sync in parallel', async () => {
      await mkdir(join(reposDir, 'svc-a', '.git'), { recursive: true })
      await mkdir(join(reposDir, 'svc-b', '.git'), { recursive: true })
      const order: string[] = []
      const runner = createRunner(async (args, options) => {
        order.push(`${options.cwd === join(reposDir, 'svc-a') ? 'a' : 'b'}:${args[0]}`)
        await new Promise((resolve) => setTimeout(resolve, 5))
        return args[0] === 'rev-parse' ? { stdout: 'abc123\n' } : {}
      })
      const engine = new GitSyncEngine({ reposDir, runner }, createTestLogger())

      await Promise.all([
        engine.sync(createRepository({ name: 'svc-a' })),
        engine.sync(createRepository({ name: 'svc-b' })),
      ])

      expect(order.slice(0, 2).sort()).toEqual(['a:rev-parse', 'b:rev-parse'])
    })
  })
})
