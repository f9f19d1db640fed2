/**
 * HTTP client for the labelsync API. Dates arrive as ISO strings.
 */

export interface RepositoryInfo {
  id: number
  name: string
  url: string
  branch: string
  localPath: string | null
  isActive: boolean
  lastSyncStatus: 'never' | 'success' | 'failure'
  lastSyncAt: string | null
  lastSyncError: string | null
  lastCommit: string | null
}

export interface RestartInfo {
  containerId: string
  containerName: string
  success: boolean
  action: 'restarted' | 'failed' | 'skipped'
  error?: { kind: string; message: string }
  durationMs: number
}

export interface OutcomeInfo {
  id: string
  repositoryName: string
  trigger: 'webhook' | 'manual' | 'sync-all'
  sync: {
    success: boolean
    changed: boolean
    operation: 'clone' | 'update'
    commit?: string
    previousCommit?: string
    error?: { kind: string; message: string }
    durationMs: number
  }
  restartStage: {
    status: 'completed' | 'skipped' | 'cancelled' | 'failed'
    reason?: string
    error?: { kind: string; message: string }
  }
  restarts: RestartInfo[]
  cancelled: boolean
  startedAt: string
  completedAt: string
}

export interface SyncAllResult {
  total: number
  succeeded: number
  results: Array<{ repositoryName: string; outcome?: OutcomeInfo; error?: string }>
}

export interface ContainerInfo {
  id: string
  name: string
  image: string
  status: 'running' | 'exited' | 'other'
  repositories: string[]
}

export interface HistoryOptions {
  repository?: string
  limit?: number
}

export interface ContainerOptions {
  repository?: string
  all?: boolean
}

export interface LabelsyncClient {
  repositories(): Promise<RepositoryInfo[]>
  sync(name: string): Promise<OutcomeInfo>
  syncAll(): Promise<SyncAllResult>
  history(options?: HistoryOptions): Promise<OutcomeInfo[]>
  containers(options?: ContainerOptions): Promise<ContainerInfo[]>
}

export class ApiError extends Error {
  constructor(
    readonly status: number,
    message: string,
  ) {
    super(message)
    this.name = 'ApiError'
  }
}

export function createClient(baseUrl: string, fetchImpl: typeof fetch = fetch): LabelsyncClient {
  const api = `${baseUrl.replace(/\/$/, '')}/api/v1`

  async function request(path: string, init?: RequestInit): Promise<Response> {
    const res = await fetchImpl(`${api}${path}`, init)
    if (!res.ok) {
      throw new ApiError(res.status, `${res.status} ${await errorText(res)}`)
    }
    return res
  }

  return {
    async repositories() {
      const res = await request('/repositories')
      return res.json() as Promise<RepositoryInfo[]>
    },

    async sync(name) {
      const res = await request(`/repositories/${encodeURIComponent(name)}/sync`, {
        method: 'POST',
      })
      return res.json() as Promise<OutcomeInfo>
    },

    async syncAll() {
      const res = await request('/repositories/sync', { method: 'POST' })
      return res.json() as Promise<SyncAllResult>
    },

    async history(options = {}) {
      const params = new URLSearchParams()
      if (options.repository) params.set('repository', options.repository)
      if (options.limit !== undefined) params.set('limit', String(options.limit))
      const res = await request(`/operations${toQuery(params)}`)
      return res.json() as Promise<OutcomeInfo[]>
    },

    async containers(options = {}) {
      const params = new URLSearchParams()
      if (options.repository) params.set('repository', options.repository)
      if (options.all) params.set('all', 'true')
      const res = await request(`/containers${toQuery(params)}`)
      return res.json() as Promise<ContainerInfo[]>
    },
  }
}

function toQuery(params: URLSearchParams): string {
  const query = params.toString()
  return query ? `?${query}` : ''
}

async function errorText(res: Response): Promise<string> {
  const text = await res.text()
  return errorField(text) ?? (text || res.statusText)
}

function errorField(text: string): string | undefined {
  let body: unknown
  try {
    body = JSON.parse(text)
  } catch {
    return undefined
  }
  if (typeof body === 'object' && body !== null && 'error' in body) {
    return typeof body.error === 'string' ? body.error : undefined
  }
  return undefined
}
