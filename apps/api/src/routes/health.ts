import { Hono } from 'hono'
import type { Logger } from '../logger.js'
import type { ConnectionStatus } from '../sync/connection-status.js'
import { fail, ok } from './_api.js'

export interface HealthRouteDeps {
  connection: ConnectionStatus
  /** Round-trip to the relational store. */
  checkDatabase: () => Promise<boolean>
  logger: Logger
}

/**
 * Liveness plus the last known state of each backing service.
 *
 * The relational store is checked on every call. Cache and search report the
 * flags the health monitor and client events maintain; either one being down
 * only degrades the service and still answers 200.
 */
export function createHealthRoutes(deps: HealthRouteDeps) {
  const routes = new Hono()

  routes.get('/health', async (c) => {
    let database = false
    try {
      database = await deps.checkDatabase()
    } catch (error) {
      deps.logger.warn('database health check failed', { error })
    }

    const dependencies = {
      database,
      cache: deps.connection.cacheAvailable,
      search: deps.connection.searchAvailable,
    }
    const healthy = Object.values(dependencies).every(Boolean)
    if (!database) {
      return fail(c, 'DEPENDENCY_UNAVAILABLE', 'The database is unreachable.', 503, { dependencies })
    }
    return ok(c, { status: healthy ? 'ok' : 'degraded', dependencies })
  })

  return routes
}
