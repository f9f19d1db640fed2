import { createLabelResolver } from '@labelsync/core'
import { closeDatabase, type DrizzleDb } from '@labelsync/db'
import { afterEach, beforeEach, describe, expect, test } from 'vitest'
import { createTestDb } from '../../test/db'
import {
  FakeSyncEngine,
  InMemoryInspector,
  createRegistration,
  createTestLogger,
} from '../../test/fixtures'
import {
  InvalidWebhookPayloadError,
  UnknownRepositoryError,
  WebhookSignatureError,
} from '../errors'
import { OperationLogWriter, SqliteOperationLog } from '../operation-log'
import { SyncOrchestrator } from '../orchestrator'
import { SqliteRepositoryStore } from '../repository'
import { RestartCoordinator } from '../restart'
import { GithubWebhookHandler, signPayload, verifySignature } from './github'

const SECRET = 'test-secret'

describe('verifySignature', () => {
  const body = '{"repository":{"name":"svc-backend"}}'

  test('accepts the signature computed for the body', () => {
    expect(verifySignature(SECRET, body, signPayload(SECRET, body))).toBe(true)
  })

  test('signatures are lowercase hex sha256 with a prefix', () => {
    expect(signPayload(SECRET, body)).toMatch(/^sha256=[0-9a-f]{64}$/)
  })

  test('rejects a signature made with another secret', () => {
    expect(verifySignature(SECRET, body, signPayload('other-secret', body))).toBe(false)
  })

  test('rejects a signature for a different body', () => {
    expect(verifySignature(SECRET, `${body} `, signPayload(SECRET, body))).toBe(false)
  })

  test('rejects missing, unprefixed and truncated headers', () => {
    const signature = signPayload(SECRET, body)
    expect(verifySignature(SECRET, body, undefined)).toBe(false)
    expect(verifySignature(SECRET, body, signature.slice('sha256='.length))).toBe(false)
    expect(verifySignature(SECRET, body, signature.slice(0, -2))).toBe(false)
  })
})

describe('GithubWebhookHandler', () => {
  let db: DrizzleDb
  let store: SqliteRepositoryStore
  let engine: FakeSyncEngine
  let orchestrator: SyncOrchestrator

  function createHandler(secret?: string): GithubWebhookHandler {
    return new GithubWebhookHandler(orchestrator, store, createTestLogger(), { secret })
  }

  function push(payload: unknown, overrides: { event?: string; signature?: string } = {}) {
    return {
      event: 'event' in overrides ? overrides.event : 'push',
      signature: overrides.signature,
      deliveryId: 'delivery-1',
      body: JSON.stringify(payload),
    }
  }

  beforeEach(() => {
    db = createTestDb()
    store = new SqliteRepositoryStore(db)
    store.register(createRegistration({ name: 'svc-backend', branch: 'main' }))
    engine = new FakeSyncEngine()
    const logger = createTestLogger()
    orchestrator = new SyncOrchestrator(
      {
        repositories: store,
        engine,
        restarts: new RestartCoordinator(new InMemoryInspector(), createLabelResolver(), logger),
        log: new OperationLogWriter(new SqliteOperationLog(db, logger), logger),
      },
      logger,
    )
  })

  afterEach(async () => {
    await orchestrator.shutdown()
    closeDatabase(db)
  })

  test('a push to the tracked branch runs the orchestration', async () => {
    const result = await createHandler().handle(
      push({ ref: 'refs/heads/main', after: 'abc123', repository: { name: 'svc-backend' } }),
    )

    expect(result.status).toBe('processed')
    if (result.status === 'processed') {
      expect(result.outcome.trigger).toBe('webhook')
      expect(result.outcome.repositoryName).toBe('svc-backend')
    }
    expect(engine.calls).toHaveLength(1)
  })

  test('a bare payload without an event header counts as a push', async () => {
    const result = await createHandler().handle(
      push({ repository: 'svc-backend' }, { event: undefined }),
    )

    expect(result.status).toBe('processed')
  })

  test('answers ping with pong', async () => {
    const result = await createHandler().handle(push({ zen: 'Keep it simple' }, { event: 'ping' }))

    expect(result).toEqual({ status: 'pong' })
    expect(engine.calls).toHaveLength(0)
  })

  test('ignores other events', async () => {
    const result = await createHandler().handle(
      push({ repository: { name: 'svc-backend' } }, { event: 'issues' }),
    )

    expect(result).toEqual({ status: 'ignored', reason: 'event issues is not handled' })
    expect(engine.calls).toHaveLength(0)
  })

  test('ignores pushes to other branches', async () => {
    const result = await createHandler().handle(
      push({ ref: 'refs/heads/feature-x', repository: { name: 'svc-backend' } }),
    )

    expect(result).toEqual({ status: 'ignored', reason: 'push to feature-x, tracking main' })
    expect(engine.calls).toHaveLength(0)
  })

  test('ignores tag pushes', async () => {
    const result = await createHandler().handle(
      push({ ref: 'refs/tags/v1.0.0', repository: { name: 'svc-backend' } }),
    )

    expect(result).toEqual({ status: 'ignored', reason: 'refs/tags/v1.0.0 is not a branch' })
  })

  test('rejects unknown repositories', async () => {
    await expect(
      createHandler().handle(push({ ref: 'refs/heads/main', repository: { name: 'other' } })),
    ).rejects.toBeInstanceOf(UnknownRepositoryError)
  })

  test('rejects bodies that are not JSON', async () => {
    const delivery = { event: 'push', signature: undefined, deliveryId: undefined, body: 'nope' }

    await expect(createHandler().handle(delivery)).rejects.toThrow(
      'Invalid webhook payload: body is not valid JSON',
    )
  })

  test('rejects payloads without a repository', async () => {
    await expect(
      createHandler().handle(push({ ref: 'refs/heads/main' })),
    ).rejects.toBeInstanceOf(InvalidWebhookPayloadError)
  })

  describe('with a secret', () => {
    test('accepts a correctly signed delivery', async () => {
      const body = JSON.stringify({ ref: 'refs/heads/main', repository: { name: 'svc-backend' } })

      const result = await createHandler(SECRET).handle({
        event: 'push',
        signature: signPayload(SECRET, body),
        deliveryId: undefined,
        body,
      })

      expect(result.status).toBe('processed')
    })

    test('rejects unsigned deliveries, including pings', async () => {
      await expect(
        createHandler(SECRET).handle(push({ zen: 'hi' }, { event: 'ping' })),
      ).rejects.toBeInstanceOf(WebhookSignatureError)
      expect(engine.calls).toHaveLength(0)
    })

    test('rejects a wrong signature before reading the payload', async () => {
      await expect(
        createHandler(SECRET).handle({
          event: 'push',
          signature: signPayload('other-secret', 'nope'),
          deliveryId: undefined,
          body: 'nope',
        }),
      ).rejects.toBeInstanceOf(WebhookSignatureError)
    })
  })
})
