/**
 * @fileoverview HTTP surface tests
 *
 * @description
 * Drives the Hono app through `app.request()` over the in-process harness:
 * status codes, the `{ success, data | error, meta }` envelope and the error
 * mapping done in `onError`.
 */

import { beforeEach, describe, expect, it } from 'vitest'
import { z } from 'zod'
import { createApp } from '../../app.js'
import { writingDetailSchema } from '../../content/kinds/writing.js'
import { silentLogger } from '../../logger.js'
import {
  createHarness,
  essayInput,
  grammarBlankQuestion,
  writingEssayQuestion,
  type Harness,
} from '../../testing/fixtures.js'

const envelopeSchema = z.object({
  success: z.boolean(),
  data: z.unknown(),
  error: z
    .object({
      code: z.string(),
      message: z.string(),
      details: z.unknown(),
    })
    .optional(),
  meta: z.object({ requestId: z.string(), timestamp: z.string() }),
})

const recordSchema = z.object({ id: z.string() }).passthrough()

function send(method: string, body: unknown, headers: Record<string, string> = {}): RequestInit {
  return {
    method,
    headers: { 'content-type': 'application/json', ...headers },
    body: typeof body === 'string' ? body : JSON.stringify(body),
  }
}

async function read(response: Response) {
  return envelopeSchema.parse(await response.json())
}

describe('content routes', () => {
  let h: Harness
  let databaseUp: boolean
  let app: ReturnType<typeof createApp>

  const writing = '/api/v1/writing-questions'
  const grammar = '/api/v1/grammar-questions'

  const createEssay = async () => {
    const response = await app.request(writing, send('POST', writingEssayQuestion))
    return writingDetailSchema.parse((await read(response)).data)
  }

  beforeEach(() => {
    h = createHarness()
    databaseUp = true
    app = createApp({
      services: [h.writing.service, h.grammar.service],
      connection: h.connection,
      checkDatabase: async () => databaseUp,
      logger: silentLogger,
    })
  })

  describe('GET /health', () => {
    it('should report every dependency up', async () => {
      const response = await app.request('/health')

      expect(response.status).toBe(200)
      expect((await read(response)).data).toEqual({
        status: 'ok',
        dependencies: { database: true, cache: true, search: true },
      })
    })

    it('should answer 200 degraded while the cache is down', async () => {
      h.connection.mark('cache', false)

      const response = await app.request('/health')

      expect(response.status).toBe(200)
      expect((await read(response)).data).toMatchObject({ status: 'degraded' })
    })

    it('should answer 503 while the database is down', async () => {
      databaseUp = false

      const response = await app.request('/health')
      const body = await read(response)

      expect(response.status).toBe(503)
      expect(body.success).toBe(false)
      expect(body.error?.code).toBe('DEPENDENCY_UNAVAILABLE')
    })
  })

  describe('items', () => {
    it('should create an item and echo the caller request id', async () => {
      const response = await app.request(writing, send('POST', writingEssayQuestion, { 'x-request-id': 'req-1' }))
      const body = await read(response)

      expect(response.status).toBe(201)
      expect(response.headers.get('x-request-id')).toBe('req-1')
      expect(body.meta.requestId).toBe('req-1')
      expect(writingDetailSchema.parse(body.data)).toMatchObject({ type: 'ESSAY', version: 1, essay: [] })
    })

    it('should reject a body that is not JSON', async () => {
      const response = await app.request(writing, send('POST', '{"type":'))
      const body = await read(response)

      expect(response.status).toBe(400)
      expect(body.error).toMatchObject({ code: 'VALIDATION_ERROR', message: 'Request body must be valid JSON.' })
    })

    it('should reject an invalid item with field details', async () => {
      const response = await app.request(writing, send('POST', { ...writingEssayQuestion, maxTime: 5 }))
      const body = await read(response)

      expect(response.status).toBe(400)
      expect(body.error?.details).toMatchObject({ fieldErrors: { maxTime: [expect.any(String)] } })
    })

    it('should read one item and answer 404 for a missing one', async () => {
      const created = await createEssay()

      const found = await app.request(`${writing}/${created.id}`)
      const missing = await app.request(`${writing}/writing_missing`)

      expect(found.status).toBe(200)
      expect(writingDetailSchema.parse((await read(found)).data).id).toBe(created.id)
      expect(missing.status).toBe(404)
      expect((await read(missing)).error).toMatchObject({
        code: 'NOT_FOUND',
        message: 'writing question writing_missing not found.',
      })
    })

    it('should update a field and bump the version', async () => {
      const created = await createEssay()

      const response = await app.request(`${writing}/${created.id}`, send('PATCH', { field: 'max_time', value: 900 }))

      expect(response.status).toBe(200)
      expect(writingDetailSchema.parse((await read(response)).data)).toMatchObject({ maxTime: 900, version: 2 })
    })

    it('should answer INVALID_FIELD for a field the kind does not expose', async () => {
      const created = await createEssay()

      const response = await app.request(`${writing}/${created.id}`, send('PATCH', { field: 'title', value: 'x' }))

      expect(response.status).toBe(400)
      expect((await read(response)).error?.code).toBe('INVALID_FIELD')
    })

    it('should delete an item', async () => {
      const created = await createEssay()

      const response = await app.request(`${writing}/${created.id}`, { method: 'DELETE' })

      expect((await read(response)).data).toEqual({ id: created.id, deleted: true })
      expect((await app.request(`${writing}/${created.id}`)).status).toBe(404)
    })

    it('should map store failures to 503', async () => {
      const created = await createEssay()
      h.db.failure = new Error('connection refused')

      const response = await app.request(`${writing}/${created.id}`)

      expect(response.status).toBe(503)
      expect((await read(response)).error?.code).toBe('STORE_ERROR')
    })
  })

  describe('sub-records', () => {
    it('should add, patch and remove a sub-record', async () => {
      const created = await createEssay()

      const added = await app.request(`${writing}/${created.id}/sub-records/essay`, send('POST', essayInput))
      expect(added.status).toBe(201)
      const record = recordSchema.parse((await read(added)).data)

      const patched = await app.request(
        `${writing}/sub-records/essay/${record.id}`,
        send('PATCH', { explain: 'States a position and supports it.' }),
      )
      expect((await read(patched)).data).toEqual({
        ...essayInput,
        id: record.id,
        explain: 'States a position and supports it.',
      })

      const removed = await app.request(`${writing}/sub-records/essay/${record.id}`, { method: 'DELETE' })
      expect((await read(removed)).data).toEqual({ id: record.id, deleted: true })
    })

    it('should answer 409 for a second record in a single-record slot', async () => {
      const created = await app.request(grammar, send('POST', grammarBlankQuestion))
      const { id } = recordSchema.parse((await read(created)).data)
      const path = `${grammar}/${id}/sub-records/fillInTheBlankQuestion`

      await app.request(path, send('POST', { question: 'She ___ to school.' }))
      const second = await app.request(path, send('POST', { question: 'They ___ home.' }))

      expect(second.status).toBe(409)
      expect((await read(second)).error?.code).toBe('CONFLICT')
    })

    it('should answer 400 for an unknown slot', async () => {
      const created = await createEssay()

      const response = await app.request(`${writing}/${created.id}/sub-records/matching`, send('POST', {}))

      expect(response.status).toBe(400)
      expect((await read(response)).error?.message).toBe('Unknown writing slot "matching".')
    })
  })

  describe('batch reads', () => {
    it('should list items by id', async () => {
      const created = await createEssay()

      const response = await app.request(`${writing}/list`, send('POST', { ids: [created.id, 'writing_missing'] }))
      const data = z.array(writingDetailSchema).parse((await read(response)).data)

      expect(data.map((detail) => detail.id)).toEqual([created.id])
    })

    it('should answer delta sync with newer items only', async () => {
      const created = await createEssay()
      await app.request(`${writing}/${created.id}`, send('PATCH', { field: 'instruction', value: 'Write again.' }))

      const sync = (version: number) =>
        app.request(`${writing}/sync`, send('POST', { questions: [{ id: created.id, version }] }))
      const newer = await sync(1)
      const current = await sync(2)

      expect(z.array(writingDetailSchema).parse((await read(newer)).data).map((detail) => detail.version)).toEqual([2])
      expect((await read(current)).data).toEqual([])
    })

    it('should answer a version beyond the integer column range with an empty list', async () => {
      const created = await createEssay()

      const response = await app.request(
        `${writing}/sync`,
        send('POST', { questions: [{ id: created.id, version: 3_000_000_000 }] }),
      )

      expect(response.status).toBe(200)
      expect((await read(response)).data).toEqual([])
    })

    it('should reject a malformed delta request', async () => {
      const response = await app.request(`${writing}/sync`, send('POST', { questions: [{ id: 'writing_1' }] }))

      expect(response.status).toBe(400)
      expect((await read(response)).error?.message).toBe('Body must be { questions: [{ id, version }] }.')
    })
  })

  describe('search', () => {
    it('should list indexed items by status', async () => {
      const created = await createEssay()
      await h.worker.drain()

      const response = await app.request(`${writing}/search?status=uncomplete&pageSize=5`)
      const body = await read(response)

      expect(response.status).toBe(200)
      expect(body.data).toMatchObject({ total: 1, page: 1, pageSize: 5, items: [{ status: 'uncomplete' }] })
      expect(body.data).toMatchObject({ items: [{ detail: { id: created.id } }] })
    })

    it('should reject a page size above 100', async () => {
      const response = await app.request(`${writing}/search?pageSize=500`)

      expect(response.status).toBe(400)
    })

    it('should answer 503 while search is down', async () => {
      h.connection.mark('search', false)

      const response = await app.request(`${writing}/search`)

      expect(response.status).toBe(503)
      expect((await read(response)).error?.code).toBe('DEPENDENCY_UNAVAILABLE')
    })
  })

  it('should purge a kind', async () => {
    await createEssay()

    const response = await app.request(writing, { method: 'DELETE' })

    expect((await read(response)).data).toEqual({ removed: 1, degraded: [] })
  })

  it('should answer unknown routes with the error envelope', async () => {
    const response = await app.request('/api/v1/vocabulary-questions')

    expect(response.status).toBe(404)
    expect((await read(response)).error?.message).toBe('No route for GET /api/v1/vocabulary-questions.')
  })
})
