/**
 * Content item routes, mounted once per kind under `/api/v1/<kind>-questions`.
 *
 * ELI5:
 * Handlers only parse the request and call the kind's service. Domain errors
 * bubble up to the app's `onError`, which turns them into the error envelope.
 */

import { Hono } from 'hono'
import { z } from 'zod'
import { ValidationError } from '../errors.js'
import type { KindShape } from '../content/types.js'
import type { ContentService } from '../services/content-service.js'
import { ok, readJson } from './_api.js'

const idsBodySchema = z.object({
  ids: z.array(z.string().min(1)),
})

const syncBodySchema = z.object({
  questions: z.array(
    z.object({
      id: z.string().min(1),
      version: z.number().int().min(0),
    }),
  ),
})

const searchQuerySchema = z.object({
  status: z.enum(['complete', 'uncomplete']).optional(),
  type: z.string().min(1).optional(),
  topic: z.string().min(1).optional(),
  page: z.coerce.number().int().min(1).default(1),
  pageSize: z.coerce.number().int().min(1).max(100).default(20),
})

function parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown, message: string): T {
  const parsed = schema.safeParse(input)
  if (!parsed.success) throw new ValidationError(message, parsed.error.flatten())
  return parsed.data
}

export function createContentRoutes(service: ContentService<KindShape>) {
  const routes = new Hono()

  routes.post('/', async (c) => {
    const detail = await service.create(await readJson(c))
    return ok(c, detail, 201)
  })

  routes.post('/list', async (c) => {
    const body = parse(idsBodySchema, await readJson(c), 'Body must be { ids: string[] }.')
    return ok(c, await service.getByIds(body.ids))
  })

  routes.post('/sync', async (c) => {
    const body = parse(syncBodySchema, await readJson(c), 'Body must be { questions: [{ id, version }] }.')
    return ok(c, await service.resolveDelta(body.questions))
  })

  routes.get('/search', async (c) => {
    const query = parse(searchQuerySchema, c.req.query(), 'Invalid search query.')
    return ok(c, await service.search(query))
  })

  routes.delete('/', async (c) => {
    return ok(c, await service.purge())
  })

  routes.patch('/sub-records/:slot/:recordId', async (c) => {
    const record = await service.updateSubRecord(c.req.param('slot'), c.req.param('recordId'), await readJson(c))
    return ok(c, record)
  })

  routes.delete('/sub-records/:slot/:recordId', async (c) => {
    const recordId = c.req.param('recordId')
    await service.removeSubRecord(c.req.param('slot'), recordId)
    return ok(c, { id: recordId, deleted: true })
  })

  routes.get('/:id', async (c) => {
    return ok(c, await service.getDetail(c.req.param('id')))
  })

  routes.patch('/:id', async (c) => {
    return ok(c, await service.updateField(c.req.param('id'), await readJson(c)))
  })

  routes.delete('/:id', async (c) => {
    const id = c.req.param('id')
    await service.delete(id)
    return ok(c, { id, deleted: true })
  })

  routes.post('/:id/sub-records/:slot', async (c) => {
    const record = await service.addSubRecord(c.req.param('id'), c.req.param('slot'), await readJson(c))
    return ok(c, record, 201)
  })

  return routes
}
