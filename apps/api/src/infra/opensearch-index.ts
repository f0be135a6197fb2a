import { Client, errors } from '@opensearch-project/opensearch'
import { z } from 'zod'
import type { SearchFieldMapping } from '../content/types.js'
import type { SearchIndex } from '../sync/ports.js'

export interface OpenSearchIndexOptions {
  url: string
  requestTimeoutMs: number
}

export interface OpenSearchIndex extends SearchIndex {
  close(): Promise<void>
}

const getResponseSchema = z.object({ _source: z.unknown() })

const searchResponseSchema = z.object({
  hits: z.object({
    total: z.union([z.number(), z.object({ value: z.number() })]),
    hits: z.array(z.object({ _source: z.unknown() })),
  }),
})

function isNotFound(error: unknown) {
  return error instanceof errors.ResponseError && error.statusCode === 404
}

/**
 * `SearchIndex` over the OpenSearch client.
 *
 * Documents are written with the `index` API, which replaces whatever was
 * stored under the id. Lookups of a missing index or document return
 * false/null rather than throwing.
 */
export function createOpenSearchIndex(options: OpenSearchIndexOptions): OpenSearchIndex {
  const client = new Client({ node: options.url, requestTimeout: options.requestTimeoutMs })

  return {
    async indexExists(index) {
      const response = await client.indices.exists({ index })
      return response.body === true
    },

    async createIndex(index, mappings: Record<string, SearchFieldMapping>) {
      await client.indices.create({ index, body: { mappings: { properties: mappings } } })
    },

    async dropIndex(index) {
      try {
        await client.indices.delete({ index })
        return true
      } catch (error) {
        if (isNotFound(error)) return false
        throw error
      }
    },

    async put(index, id, document) {
      await client.index({ index, id, body: document })
    },

    async remove(index, id) {
      try {
        await client.delete({ index, id })
        return true
      } catch (error) {
        if (isNotFound(error)) return false
        throw error
      }
    },

    async get(index, id) {
      try {
        const response = await client.get({ index, id })
        return getResponseSchema.parse(response.body)._source
      } catch (error) {
        if (isNotFound(error)) return null
        throw error
      }
    },

    async search(index, query) {
      const response = await client.search({
        index,
        body: {
          query: {
            bool: { filter: query.filters.map((filter) => ({ term: { [filter.field]: filter.value } })) },
          },
          sort: [{ [query.sort.field]: { order: query.sort.order } }],
          from: query.from,
          size: query.size,
        },
      })
      const { hits } = searchResponseSchema.parse(response.body)
      return {
        total: typeof hits.total === 'number' ? hits.total : hits.total.value,
        documents: hits.hits.map((hit) => hit._source),
      }
    },

    async ping() {
      const response = await client.ping()
      return response.body === true
    },

    close: () => client.close(),
  }
}
