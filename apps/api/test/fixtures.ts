/**
 * Shared test fixtures using Faker.js
 *
 * Factory functions and in-process stand-ins for the container runtime and
 * git, shared by unit and end-to-end tests.
 */

import {
  type ContainerDescriptor,
  type ContainerId,
  type ContainerInspector,
  type OperationOutcome,
  type Repository,
  type RepositoryName,
  type RepositoryRegistration,
  RestartFailedError,
  RuntimeUnavailableError,
  type SyncResult,
  freezeOutcome,
} from '@labelsync/core'
import { faker } from '@faker-js/faker'
import pino from 'pino'
import type { Logger } from '../lib/logger'
import type { SyncEngine } from '../lib/sync/git'

export function createTestLogger(): Logger {
  return pino({ level: 'silent' })
}

// =============================================================================
// ID Generators
// =============================================================================

export function createRepositoryName(): RepositoryName {
  return `svc-${faker.word.noun().toLowerCase()}-${faker.string.alphanumeric(4).toLowerCase()}`
}

export function createContainerId(): ContainerId {
  return faker.string.hexadecimal({ length: 12, casing: 'lower', prefix: '' })
}

export function createCommit(): string {
  return faker.git.commitSha()
}

// =============================================================================
// Repository Fixtures
// =============================================================================

export function createRepository(overrides?: Partial<Repository>): Repository {
  const name = overrides?.name ?? createRepositoryName()
  return {
    id: faker.number.int({ min: 1, max: 10_000 }),
    name,
    url: `https://git.example.com/${faker.internet.domainWord()}/${name}.git`,
    branch: 'main',
    localPath: null,
    isActive: true,
    lastSyncStatus: 'never',
    lastSyncAt: null,
    lastSyncError: null,
    lastCommit: null,
    ...overrides,
  }
}

export function createRegistration(
  overrides?: Partial<RepositoryRegistration>,
): RepositoryRegistration {
  const name = overrides?.name ?? createRepositoryName()
  return {
    name,
    url: `https://git.example.com/${faker.internet.domainWord()}/${name}.git`,
    branch: 'main',
    localPath: null,
    isActive: true,
    ...overrides,
  }
}

// =============================================================================
// Container Fixtures
// =============================================================================

export function createContainer(overrides?: Partial<ContainerDescriptor>): ContainerDescriptor {
  return {
    id: createContainerId(),
    name: `${faker.internet.domainWord()}-${faker.number.int({ min: 1, max: 9 })}`,
    image: `${faker.internet.domainWord()}:${faker.system.semver()}`,
    status: 'running',
    labels: {},
    ...overrides,
  }
}

/**
 * A container whose canonical restart label lists the given repositories.
 */
export function createDependentContainer(
  repositories: RepositoryName[],
  overrides?: Partial<ContainerDescriptor>,
): ContainerDescriptor {
  return createContainer({
    ...overrides,
    labels: { 'restart-after': repositories.join(','), ...overrides?.labels },
  })
}

// =============================================================================
// Sync Fixtures
// =============================================================================

export function createSyncResult(overrides?: Partial<SyncResult>): SyncResult {
  return {
    success: true,
    changed: true,
    operation: 'update',
    commit: createCommit(),
    durationMs: faker.number.int({ min: 5, max: 500 }),
    ...overrides,
  }
}

export function createFailedSyncResult(overrides?: Partial<SyncResult>): SyncResult {
  return {
    success: false,
    changed: false,
    operation: 'update',
    error: { kind: 'NetworkUnreachable', message: 'git fetch failed: Could not resolve host' },
    durationMs: faker.number.int({ min: 5, max: 500 }),
    ...overrides,
  }
}

/**
 * In-process git stand-in. Returns queued results in order, then the default.
 * `hold()` makes the next syncs wait until released.
 */
export class FakeSyncEngine implements SyncEngine {
  readonly calls: Repository[] = []
  private results: SyncResult[] = []
  private gate: Promise<void> | undefined
  private repositoryGates = new Map<RepositoryName, Promise<void>>()
  private waiting: Array<() => void> = []

  constructor(private defaultResult: SyncResult = createSyncResult()) {}

  enqueue(...results: SyncResult[]): this {
    this.results.push(...results)
    return this
  }

  /**
   * Block syncs until the returned function is called. With a name, only
   * that repository's syncs are blocked.
   */
  hold(repositoryName?: RepositoryName): () => void {
    let release = () => {}
    const gate = new Promise<void>((resolve) => {
      release = () => {
        if (repositoryName === undefined) {
          this.gate = undefined
        } else {
          this.repositoryGates.delete(repositoryName)
        }
        resolve()
      }
    })
    if (repositoryName === undefined) {
      this.gate = gate
    } else {
      this.repositoryGates.set(repositoryName, gate)
    }
    return release
  }

  /**
   * Resolves once `count` syncs have started.
   */
  async waitForCalls(count: number): Promise<void> {
    while (this.calls.length < count) {
      await new Promise<void>((resolve) => this.waiting.push(resolve))
    }
  }

  async sync(repository: Repository): Promise<SyncResult> {
    this.calls.push(repository)
    for (const notify of this.waiting.splice(0)) notify()
    if (this.gate) await this.gate
    await this.repositoryGates.get(repository.name)
    return this.results.shift() ?? this.defaultResult
  }
}

// =============================================================================
// Outcome Fixtures
// =============================================================================

type OutcomeOverrides = {
  -readonly [K in keyof OperationOutcome]?: OperationOutcome[K]
}

export function createOutcome(overrides?: OutcomeOverrides): OperationOutcome {
  const startedAt = overrides?.startedAt ?? faker.date.recent()
  return freezeOutcome({
    id: faker.string.uuid(),
    repositoryName: createRepositoryName(),
    trigger: 'manual',
    sync: createSyncResult(),
    restartStage: { status: 'completed' },
    restarts: [],
    cancelled: false,
    startedAt,
    completedAt: new Date(startedAt.getTime() + faker.number.int({ min: 10, max: 5000 })),
    ...overrides,
  })
}

// =============================================================================
// Container Runtime Stand-in
// =============================================================================

/**
 * Container runtime held in memory. Records every restart in order.
 */
export class InMemoryInspector implements ContainerInspector {
  readonly name = 'memory'
  readonly restarted: ContainerId[] = []
  readonly failing = new Set<ContainerId>()
  available = true

  /** Called before each restart completes; lets tests act mid-run. */
  onRestart: ((id: ContainerId) => void | Promise<void>) | undefined

  constructor(public containers: ContainerDescriptor[] = []) {}

  async listAll(): Promise<ContainerDescriptor[]> {
    if (!this.available) {
      throw new RuntimeUnavailableError(this.name, new Error('connect ENOENT /var/run/docker.sock'))
    }
    return this.containers.map((c) => ({ ...c, labels: { ...c.labels } }))
  }

  async restart(id: ContainerId): Promise<void> {
    await this.onRestart?.(id)
    if (this.failing.has(id)) {
      throw new RestartFailedError(id, 'container exited during restart')
    }
    const container = this.containers.find((c) => c.id === id)
    if (!container) {
      throw new RestartFailedError(id, 'no such container')
    }
    container.status = 'running'
    this.restarted.push(id)
  }

  async ping(): Promise<boolean> {
    return this.available
  }
}

// =============================================================================
// Utilities
// =============================================================================

/**
 * Seed faker for deterministic tests.
 */
export function seedFaker(seed: number): void {
  faker.seed(seed)
}
