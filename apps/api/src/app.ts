import { Hono } from 'hono'
import { cors } from 'hono/cors'
import { AppError } from './errors.js'
import type { Logger } from './logger.js'
import type { KindShape } from './content/types.js'
import { routeSegment } from './content/registry.js'
import { requestId } from './middleware/request-id.js'
import { fail, failWith } from './routes/_api.js'
import { createContentRoutes } from './routes/content.js'
import { createHealthRoutes, type HealthRouteDeps } from './routes/health.js'
import type { ContentService } from './services/content-service.js'

export interface AppDeps extends HealthRouteDeps {
  services: ContentService<KindShape>[]
  logger: Logger
}

/**
 * Builds the HTTP app without binding a port, so tests can drive it through
 * `app.request()`.
 */
export function createApp(deps: AppDeps) {
  const app = new Hono()
  const { logger } = deps

  app.use('/*', cors())
  app.use('/*', requestId)

  app.route('/', createHealthRoutes(deps))
  for (const service of deps.services) {
    app.route(`/api/v1/${routeSegment(service.kind)}`, createContentRoutes(service))
  }

  app.onError((err, c) => {
    if (err instanceof AppError) {
      if (err.status >= 500) {
        logger.error(`${c.req.method} ${c.req.path} failed`, { code: err.code, error: err.message })
      }
      return failWith(c, err)
    }
    logger.error(`${c.req.method} ${c.req.path} crashed`, { error: err.message, stack: err.stack })
    return fail(c, 'INTERNAL_ERROR', 'Internal server error.', 500)
  })

  app.notFound((c) => fail(c, 'NOT_FOUND', `No route for ${c.req.method} ${c.req.path}.`, 404))

  return app
}
