import { node } from '@elysiajs/node'
import { formatDuration } from '@labelsync/core'
import { closeDatabase, initDatabase } from '@labelsync/db'
import { DockerInspector, describeDockerTarget, parseDockerHost } from '@labelsync/docker'
import { Elysia } from 'elysia'
import { config } from '../lib/config'
import { createLogger } from '../lib/logger'
import { GitSyncEngine, createCredentialResolver } from '../lib/sync'
import { App } from './app'

const logger = createLogger(config.logLevel)

logger.info(
  {
    api: `${config.apiHost}:${config.apiPort}`,
    database: config.dbPath,
    reposDir: config.reposDir,
    repositoriesFile: config.repositoriesFile ?? null,
    labelKeys: config.labelKeys,
    gitTimeout: formatDuration(config.gitTimeoutMs),
    restartTimeout: `${config.restartTimeoutSeconds}s`,
    dockerTimeout: formatDuration(config.dockerTimeoutMs),
    concurrentSignals: config.concurrentSignals,
    restartOnSyncFailure: config.restartOnSyncFailure,
    stoppedContainers: config.stoppedContainers,
    webhookSignatures: config.webhookSecret ? 'required' : 'disabled',
  },
  'Starting labelsync',
)

// Initialize SQLite database with WAL mode
const db = initDatabase({ path: config.dbPath, logger })

// Container runtime with optional DOCKER_HOST configuration
const dockerConfig = { ...parseDockerHost(config.dockerHost), timeout: config.dockerTimeoutMs }
const inspector = new DockerInspector(dockerConfig)
logger.info({ runtime: inspector.name, target: describeDockerTarget(dockerConfig) }, 'Runtime')

const engine = new GitSyncEngine(
  {
    reposDir: config.reposDir,
    timeoutMs: config.gitTimeoutMs,
    credentials: createCredentialResolver({
      sshKeyPath: config.sshKeyPath,
      httpsUsername: config.httpsUsername,
      httpsToken: config.httpsToken,
    }),
  },
  logger,
)

const app = new App({
  db,
  inspector,
  engine,
  logger,
  labelKeys: config.labelKeys,
  restartTimeoutSeconds: config.restartTimeoutSeconds,
  stoppedContainers: config.stoppedContainers,
  restartOnSyncFailure: config.restartOnSyncFailure,
  concurrentSignals: config.concurrentSignals,
  webhookSecret: config.webhookSecret,
  logQueueSize: config.logQueueSize,
  operationLogMaxEntries: config.operationLogMaxEntries,
  repositoriesFile: config.repositoriesFile,
})

const { seeded } = app.start()
const active = app.repositories.listActive()
logger.info(
  { seeded, active: active.map((r) => r.name) },
  `${active.length} active repositor${active.length === 1 ? 'y' : 'ies'}`,
)

if (!(await inspector.ping())) {
  logger.warn('Container runtime is not reachable; restarts will fail until it is')
}

const server = new Elysia({ adapter: node() }).use(app.server)

server.listen({ hostname: config.apiHost, port: config.apiPort }, () => {
  logger.info(`Labelsync API listening on ${config.apiHost}:${config.apiPort}`)
})

let stopping = false

// Graceful shutdown: cancel running orchestrations and flush the operation log
async function shutdown(signal: string) {
  if (stopping) return
  stopping = true
  logger.info({ signal }, 'Shutting down...')
  try {
    await app.shutdown()
    await server.stop()
  } catch (err) {
    logger.error({ err }, 'Error during shutdown')
  }
  closeDatabase(db, logger)
  process.exit(0)
}

process.on('SIGINT', () => void shutdown('SIGINT'))
process.on('SIGTERM', () => void shutdown('SIGTERM'))
