import 'dotenv/config'
import { serve } from '@hono/node-server'
import { checkDatabaseConnection, createDatabase } from '@lingo/db'
import { createApp } from './app.js'
import { loadConfig } from './config.js'
import { createOpenSearchIndex } from './infra/opensearch-index.js'
import { createRedisCache } from './infra/redis-cache.js'
import { createLogger, setLogLevel } from './logger.js'
import { createOutboxStore } from './repositories/outbox-store.js'
import { createContentRuntimes } from './services/content-runtimes.js'
import { createConnectionStatus, createHealthMonitor } from './sync/connection-status.js'
import { createOutboxWorker } from './sync/outbox-worker.js'

async function main() {
  const config = loadConfig(process.env)
  setLogLevel(config.LOG_LEVEL)
  const log = createLogger('api')

  const { db, pool } = createDatabase({
    connectionString: config.DATABASE_URL,
    queryTimeoutMs: config.DB_QUERY_TIMEOUT_MS,
  })

  const connection = createConnectionStatus(log.child('connection'), { cache: false, search: false })
  const cache = createRedisCache({
    url: config.REDIS_URL,
    commandTimeoutMs: config.CACHE_COMMAND_TIMEOUT_MS,
    connection,
    logger: log.child('redis'),
  })
  const searchIndex = createOpenSearchIndex({
    url: config.OPENSEARCH_URL,
    requestTimeoutMs: config.SEARCH_REQUEST_TIMEOUT_MS,
  })
  const monitor = createHealthMonitor(
    { cache: () => cache.ping(), search: () => searchIndex.ping() },
    connection,
    log.child('health'),
  )

  const runtimes = createContentRuntimes(db, {
    cache,
    searchIndex,
    connection,
    cacheTtlSeconds: config.CACHE_TTL_SECONDS,
    maxBatch: config.DELTA_SYNC_MAX_BATCH,
    logger: log,
    onWrite: () => worker.schedule(),
  })
  const kinds = Object.values(runtimes)

  const worker = createOutboxWorker({
    outbox: createOutboxStore(db),
    handlers: kinds.map((runtime) => runtime.resync),
    options: {
      batchSize: config.OUTBOX_BATCH_SIZE,
      maxAttempts: config.OUTBOX_MAX_ATTEMPTS,
      retryDelayMs: config.OUTBOX_RETRY_DELAY_MS,
      pollIntervalMs: config.OUTBOX_POLL_INTERVAL_MS,
    },
    logger: log.child('outbox'),
  })

  const app = createApp({
    services: kinds.map((runtime) => runtime.service),
    connection,
    checkDatabase: () => checkDatabaseConnection(pool),
    logger: log.child('http'),
  })

  const status = await monitor.probe()
  log.info('dependencies probed', status)
  monitor.start(config.HEALTH_CHECK_INTERVAL_MS)
  worker.start()

  const server = serve({ fetch: app.fetch, port: config.PORT }, (info) => {
    log.info(`content API listening on http://localhost:${info.port}`)
  })

  let stopping = false
  const shutdown = async (signal: string) => {
    if (stopping) return
    stopping = true
    log.info(`${signal} received, shutting down`)
    server.close()
    monitor.stop()
    await worker.stop()
    await Promise.allSettled([cache.close(), searchIndex.close(), pool.end()])
    log.info('shutdown complete')
  }

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        log.error('shutdown failed', { error })
        process.exitCode = 1
      })
    })
  }
}

main().catch((error: unknown) => {
  console.error('[api] failed to start', error)
  process.exit(1)
})
