import { z } from 'zod'
import { DependencyUnavailableError, SYNC_OK, degraded, errorMessage, type SyncResult } from '../errors.js'
import type { Logger } from '../logger.js'
import type { CompletionStatus, ContentKindModule, KindShape } from '../content/types.js'
import type { ConnectionStatus } from './connection-status.js'
import type { SearchFilter, SearchIndex } from './ports.js'

export interface SearchDocument<TDetail> {
  detail: TDetail
  status: CompletionStatus
}

export interface SearchFindInput {
  status?: CompletionStatus
  type?: string
  topic?: string
  page: number
  pageSize: number
}

export interface SearchFindResult<TDetail> {
  total: number
  page: number
  pageSize: number
  items: SearchDocument<TDetail>[]
}

export interface SearchSynchronizer<K extends KindShape> {
  /** Full overwrite of the item's document. Creates the index on first use. */
  upsert(detail: K['detail'], status: CompletionStatus): Promise<SyncResult>
  /** A missing document counts as removed. */
  remove(itemId: string): Promise<SyncResult>
  get(itemId: string): Promise<SearchDocument<K['detail']> | null>
  /** Filtered listing, newest first. No scoring. Creates the index if missing. */
  find(input: SearchFindInput): Promise<SearchFindResult<K['detail']>>
  createIndex(): Promise<SyncResult>
  dropIndex(): Promise<SyncResult>
}

export interface SearchSynchronizerDeps<K extends KindShape> {
  module: ContentKindModule<K>
  index: SearchIndex
  connection: ConnectionStatus
  logger: Logger
}

const statusFacetSchema = z.object({ status: z.enum(['complete', 'uncomplete']) })

/**
 * Search Synchronizer
 *
 * One document per item, keyed by the item id, holding the detail view plus
 * a `status` facet. Writes are best-effort like the cache; reads that cannot
 * reach the cluster raise `DependencyUnavailableError`.
 */
export function createSearchSynchronizer<K extends KindShape>(deps: SearchSynchronizerDeps<K>): SearchSynchronizer<K> {
  const { module, index, connection, logger } = deps
  const indexName = module.indexName
  let ensured: Promise<void> | null = null

  const failure = (operation: string, itemId: string | undefined, error: unknown): SyncResult => {
    logger.error(`search ${operation} failed`, { kind: module.kind, itemId, error: errorMessage(error) })
    return degraded({ target: 'search', operation, itemId, message: errorMessage(error), cause: error })
  }

  const unavailable = (operation: string, itemId?: string): SyncResult => {
    logger.warn(`search ${operation} skipped, search unavailable`, { kind: module.kind, itemId })
    return degraded({ target: 'search', operation, itemId, message: 'search unavailable' })
  }

  const ensureIndex = () => {
    if (!ensured) {
      ensured = (async () => {
        if (await index.indexExists(indexName)) return
        await index.createIndex(indexName, module.searchMappings)
        logger.info('created search index', { index: indexName })
      })().catch((error: unknown) => {
        ensured = null
        throw error
      })
    }
    return ensured
  }

  const decode = (itemId: string, source: unknown): SearchDocument<K['detail']> | null => {
    const status = statusFacetSchema.safeParse(source)
    const detail = module.detailSchema.safeParse(source)
    if (!status.success || !detail.success) {
      logger.warn('unreadable search document', { kind: module.kind, itemId })
      return null
    }
    return { detail: detail.data, status: status.data.status }
  }

  const requireSearch = () => {
    if (!connection.searchAvailable) throw new DependencyUnavailableError('search')
  }

  return {
    async upsert(detail, status) {
      if (!connection.searchAvailable) return unavailable('upsert', detail.id)
      try {
        await ensureIndex()
        await index.put(indexName, detail.id, { ...detail, status })
        return SYNC_OK
      } catch (error) {
        return failure('upsert', detail.id, error)
      }
    },

    async remove(itemId) {
      if (!connection.searchAvailable) return unavailable('remove', itemId)
      try {
        const removed = await index.remove(indexName, itemId)
        if (!removed) logger.debug('search document already absent', { kind: module.kind, itemId })
        return SYNC_OK
      } catch (error) {
        return failure('remove', itemId, error)
      }
    },

    async get(itemId) {
      requireSearch()
      let source: unknown
      try {
        source = await index.get(indexName, itemId)
      } catch (error) {
        throw new DependencyUnavailableError('search', error)
      }
      if (source === null || source === undefined) return null
      return decode(itemId, source)
    },

    async find(input) {
      requireSearch()
      const filters: SearchFilter[] = []
      if (input.status) filters.push({ field: 'status', value: input.status })
      if (input.type) filters.push({ field: 'type', value: input.type })
      if (input.topic) filters.push({ field: 'topic.keyword', value: input.topic })

      try {
        await ensureIndex()
        const page = await index.search(indexName, {
          filters,
          sort: { field: 'createdAt', order: 'desc' },
          from: (input.page - 1) * input.pageSize,
          size: input.pageSize,
        })
        const items: SearchDocument<K['detail']>[] = []
        for (const source of page.documents) {
          const decoded = decode('(search hit)', source)
          if (decoded) items.push(decoded)
        }
        return { total: page.total, page: input.page, pageSize: input.pageSize, items }
      } catch (error) {
        throw new DependencyUnavailableError('search', error)
      }
    },

    async createIndex() {
      if (!connection.searchAvailable) return unavailable('createIndex')
      try {
        await ensureIndex()
        return SYNC_OK
      } catch (error) {
        return failure('createIndex', undefined, error)
      }
    },

    async dropIndex() {
      if (!connection.searchAvailable) return unavailable('dropIndex')
      try {
        await index.dropIndex(indexName)
        ensured = null
        return SYNC_OK
      } catch (error) {
        return failure('dropIndex', undefined, error)
      }
    },
  }
}
