/**
 * API Test Harness
 *
 * Builds the full service graph over an in-memory database, an in-process
 * container runtime and a scripted git engine, and drives it through
 * `server.handle(Request)`.
 */

import type { RepositoryRegistration } from '@labelsync/core'
import { closeDatabase, type DrizzleDb } from '@labelsync/db'
import { App, type AppConfig } from '../src/app'
import { createTestDb } from './db'
import { FakeSyncEngine, InMemoryInspector, createTestLogger } from './fixtures'

export type TestHarnessConfig = Partial<
  Omit<AppConfig, 'db' | 'inspector' | 'engine' | 'logger'>
> & {
  repositories?: RepositoryRegistration[]
}

/**
 * Result of an API call
 */
export interface ApiResponse<T = unknown> {
  status: number
  data: T
  headers: Headers
}

export class TestHarness {
  readonly inspector = new InMemoryInspector()
  readonly engine = new FakeSyncEngine()
  private _app: App | null = null
  private _db: DrizzleDb | null = null

  constructor(private config: TestHarnessConfig = {}) {}

  setup(): void {
    if (this._app) {
      throw new Error('Test harness already initialized')
    }

    const { repositories, ...appConfig } = this.config
    this._db = createTestDb()
    this._app = new App({
      ...appConfig,
      db: this._db,
      inspector: this.inspector,
      engine: this.engine,
      logger: createTestLogger(),
    })

    for (const registration of repositories ?? []) {
      this._app.repositories.register(registration)
    }
  }

  async teardown(): Promise<void> {
    if (this._app) {
      await this._app.shutdown()
      this._app = null
    }
    if (this._db) {
      closeDatabase(this._db)
      this._db = null
    }
  }

  // ==========================================================================
  // API Call Helpers
  // ==========================================================================

  async get<T = unknown>(path: string): Promise<ApiResponse<T>> {
    return this.request<T>('GET', path)
  }

  async post<T = unknown>(path: string, body?: unknown): Promise<ApiResponse<T>> {
    return this.request<T>(
      'POST',
      path,
      body === undefined ? undefined : JSON.stringify(body),
      body === undefined ? {} : { 'Content-Type': 'application/json' },
    )
  }

  /**
   * Deliver a webhook with the given raw body and headers.
   */
  async webhook<T = unknown>(body: string, headers: Record<string, string>): Promise<ApiResponse<T>> {
    return this.request<T>('POST', '/api/v1/webhooks/github', body, {
      'Content-Type': 'application/json',
      ...headers,
    })
  }

  /**
   * Make an HTTP request to the API. JSON responses are parsed; anything else
   * is returned as text.
   */
  async request<T = unknown>(
    method: string,
    path: string,
    body?: string,
    headers: Record<string, string> = {},
  ): Promise<ApiResponse<T>> {
    const response = await this.app.server.handle(
      new Request(`http://localhost${path}`, { method, headers, body }),
    )

    const text = await response.text()
    const isJson = response.headers.get('content-type')?.includes('application/json') ?? false
    const data: T = isJson ? JSON.parse(text) : text

    return {
      status: response.status,
      data,
      headers: response.headers,
    }
  }

  // ==========================================================================
  // Accessors
  // ==========================================================================

  get app(): App {
    if (!this._app) throw new Error('Test harness not initialized')
    return this._app
  }
}

export function createTestHarness(config?: TestHarnessConfig): TestHarness {
  return new TestHarness(config)
}
