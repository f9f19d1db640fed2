import type { DockerInspectorConfig } from './docker-inspector'

/**
 * Parse a DOCKER_HOST value into inspector connection settings.
 *
 * Supports:
 * - tcp://host:port → { host, port }
 * - unix:///path → { socketPath }
 * - /path → { socketPath }
 * - unset → undefined (uses default /var/run/docker.sock)
 */
export function parseDockerHost(dockerHost: string | undefined): DockerInspectorConfig | undefined {
  if (!dockerHost) {
    return undefined
  }

  if (dockerHost.startsWith('tcp://')) {
    const url = new URL(dockerHost)
    return {
      host: url.hostname,
      port: url.port ? Number.parseInt(url.port, 10) : 2375,
    }
  }

  if (dockerHost.startsWith('unix://')) {
    return {
      socketPath: dockerHost.slice('unix://'.length),
    }
  }

  if (dockerHost.startsWith('/')) {
    return { socketPath: dockerHost }
  }

  throw new Error(
    `Invalid DOCKER_HOST: ${dockerHost}. Expected tcp://host:port, unix:///path, or /path`,
  )
}

/**
 * Human-readable connection target for startup logs.
 */
export function describeDockerTarget(config: DockerInspectorConfig | undefined): string {
  if (config?.host) {
    return `tcp://${config.host}:${config.port ?? 2375}`
  }
  return config?.socketPath ?? '/var/run/docker.sock'
}
