/**
 * Docker Container Inspector
 *
 * Implements ContainerInspector using dockerode. Only listing and restarting
 * are needed: containers are owned by whoever deployed them.
 */

import {
  type ContainerDescriptor,
  type ContainerId,
  type ContainerInspector,
  type ContainerState,
  RestartFailedError,
  RuntimeUnavailableError,
  errorMessage,
} from '@labelsync/core'
import Docker from 'dockerode'

export interface DockerInspectorConfig {
  /**
   * Path to the Docker socket for local connections.
   * @example '/var/run/docker.sock'
   * @example '/home/user/.docker/desktop/docker.sock'
   */
  socketPath?: string

  /**
   * Docker host for remote connections. When set, uses TCP instead of socket.
   * @example 'localhost'
   * @example '192.168.1.100'
   */
  host?: string

  /**
   * Docker port for remote connections. Only used when `host` is set.
   * @default 2375
   */
  port?: number

  /**
   * Per-request timeout in milliseconds. Applied to the socket by dockerode and as a
   * deadline on every call, so a daemon that accepts but never answers fails the call.
   * Must exceed the restart grace period.
   */
  timeout?: number

  /**
   * Pre-built client. Takes precedence over the connection settings.
   */
  client?: DockerClient
}

/**
 * Container as returned by the list endpoint.
 */
export interface DockerContainerSummary {
  Id: string
  Names: string[]
  Image: string
  State: string
  Labels: Record<string, string> | null
}

/**
 * The slice of the Docker API the inspector uses.
 */
export interface DockerClient {
  listContainers(options: { all: boolean }): Promise<DockerContainerSummary[]>
  getContainer(id: string): {
    restart(options?: { t?: number }): Promise<unknown>
    start(): Promise<unknown>
  }
  ping(): Promise<unknown>
}

const CONNECTION_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOENT',
  'EACCES',
  'EPIPE',
  'ETIMEDOUT',
  'EHOSTUNREACH',
])

/**
 * Adapt a dockerode instance to DockerClient.
 */
export function fromDockerode(docker: Docker): DockerClient {
  return {
    listContainers: (options) => docker.listContainers(options),
    getContainer: (id) => {
      const container = docker.getContainer(id)
      return {
        restart: (options) => container.restart(options),
        start: () => container.start(),
      }
    },
    ping: () => docker.ping(),
  }
}

class DockerTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`request timed out after ${timeoutMs}ms`)
    this.name = 'DockerTimeoutError'
  }
}

export class DockerInspector implements ContainerInspector {
  readonly name = 'docker'
  private docker: DockerClient
  private timeoutMs: number | undefined

  constructor(config?: DockerInspectorConfig) {
    this.timeoutMs = config?.timeout
    if (config?.client) {
      this.docker = config.client
    } else if (config?.host) {
      this.docker = fromDockerode(
        new Docker({ host: config.host, port: config.port ?? 2375, timeout: config.timeout }),
      )
    } else {
      this.docker = fromDockerode(
        new Docker({
          socketPath: config?.socketPath ?? '/var/run/docker.sock',
          timeout: config?.timeout,
        }),
      )
    }
  }

  async listAll(): Promise<ContainerDescriptor[]> {
    let containers: DockerContainerSummary[]
    try {
      containers = await this.withDeadline(this.docker.listContainers({ all: true }))
    } catch (err) {
      if (isConnectionError(err)) {
        throw new RuntimeUnavailableError(this.name, err)
      }
      throw err
    }

    return containers.map((c) => ({
      id: c.Id,
      name: c.Names[0]?.replace(/^\//, '') ?? c.Id.slice(0, 12),
      image: c.Image,
      status: toState(c.State),
      labels: c.Labels ?? {},
    }))
  }

  async restart(id: ContainerId, timeoutSeconds?: number): Promise<void> {
    const container = this.docker.getContainer(id)
    const options = timeoutSeconds !== undefined ? { t: timeoutSeconds } : undefined

    try {
      await this.withDeadline(container.restart(options))
    } catch (err) {
      // Docker answers 304 when the container was already stopped; start it instead
      if (statusCode(err) === 304) {
        await this.start(id)
        return
      }
      throw this.toRestartError(id, err)
    }
  }

  async ping(): Promise<boolean> {
    try {
      await this.withDeadline(this.docker.ping())
      return true
    } catch {
      return false
    }
  }

  private async start(id: ContainerId): Promise<void> {
    try {
      await this.withDeadline(this.docker.getContainer(id).start())
    } catch (err) {
      throw this.toRestartError(id, err)
    }
  }

  private async withDeadline<T>(request: Promise<T>): Promise<T> {
    const timeoutMs = this.timeoutMs
    if (timeoutMs === undefined) return request

    let timer: ReturnType<typeof setTimeout> | undefined
    try {
      return await Promise.race([
        request,
        new Promise<never>((_resolve, reject) => {
          timer = setTimeout(() => reject(new DockerTimeoutError(timeoutMs)), timeoutMs)
        }),
      ])
    } finally {
      clearTimeout(timer)
    }
  }

  private toRestartError(id: ContainerId, err: unknown): Error {
    if (isConnectionError(err)) {
      return new RuntimeUnavailableError(this.name, err)
    }
    if (statusCode(err) === 404) {
      return new RestartFailedError(id, 'no such container', err)
    }
    return new RestartFailedError(id, errorMessage(err), err)
  }
}

function toState(state: string): ContainerState {
  if (state === 'running') return 'running'
  if (state === 'exited') return 'exited'
  return 'other'
}

function statusCode(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null || !('statusCode' in err)) return undefined
  return typeof err.statusCode === 'number' ? err.statusCode : undefined
}

const CONNECTION_ERROR_MESSAGES = ['socket hang up', 'timeout', 'request timed out']

function isConnectionError(err: unknown): boolean {
  if (err instanceof DockerTimeoutError) return true
  if (typeof err !== 'object' || err === null) return false
  if ('code' in err && typeof err.code === 'string' && CONNECTION_ERROR_CODES.has(err.code)) {
    return true
  }
  if (err instanceof Error && !('statusCode' in err)) {
    const message = err.message.toLowerCase()
    return CONNECTION_ERROR_MESSAGES.some((m) => message === m || message.startsWith(`${m} `))
  }
  return false
}
