import { SYNC_OK, degraded, errorMessage, type SyncResult } from '../errors.js'
import type { Logger } from '../logger.js'
import type { CompletionStatus, ContentKindModule, KindShape } from '../content/types.js'
import type { CompletionEvaluator } from './completion.js'
import { oppositeStatus } from './completion.js'
import type { ConnectionStatus } from './connection-status.js'
import type { CacheStore } from './ports.js'

export interface CachedDetail<TDetail> {
  detail: TDetail
  status: CompletionStatus
}

export interface CacheSynchronizer<K extends KindShape> {
  key(itemId: string, status: CompletionStatus, version: number): string
  /** Writes the view under its `(id, status, version)` key and drops the other status at that version. */
  sync(detail: K['detail']): Promise<SyncResult>
  /**
   * Read-path write-back. Writes the view only when no entry exists yet for
   * its `(id, version)`, and never deletes one.
   */
  fill(detail: K['detail']): Promise<SyncResult>
  /** Cached view at exactly `version`, or null on a miss. */
  fetch(itemId: string, version: number): Promise<CachedDetail<K['detail']> | null>
  /** Drops every cached version of one item. */
  evict(itemId: string): Promise<SyncResult>
  /** Drops every cached item of the kind. */
  evictAll(): Promise<SyncResult>
}

export interface CacheSynchronizerDeps<K extends KindShape> {
  module: ContentKindModule<K>
  cache: CacheStore
  completion: CompletionEvaluator<K>
  connection: ConnectionStatus
  ttlSeconds: number
  logger: Logger
}

const PROBE_ORDER: CompletionStatus[] = ['complete', 'uncomplete']

/**
 * Cache Synchronizer
 *
 * ELI5:
 * Each cached view lives under `<prefix>:<id>:<status>:<version>`. Older
 * versions are left for the TTL to clean up. The key with the other status at
 * the same version is deleted on every write, because completeness can change
 * without a version bump (sub-record edits).
 *
 * Only the outbox resync calls `sync`. Reads write back through `fill`, which
 * never replaces or deletes an entry: a view assembled before a concurrent
 * sub-record write must not overwrite what the resync stored after it.
 *
 * Nothing here throws: failures are logged and returned as a `SyncResult`,
 * and reads that fail behave like misses.
 */
export function createCacheSynchronizer<K extends KindShape>(deps: CacheSynchronizerDeps<K>): CacheSynchronizer<K> {
  const { module, cache, completion, connection, ttlSeconds, logger } = deps
  const prefix = module.cachePrefix

  const key = (itemId: string, status: CompletionStatus, version: number) =>
    `${prefix}:${itemId}:${status}:${version}`

  const failure = (operation: string, itemId: string | undefined, error: unknown): SyncResult => {
    logger.error(`cache ${operation} failed`, { kind: module.kind, itemId, error: errorMessage(error) })
    return degraded({ target: 'cache', operation, itemId, message: errorMessage(error), cause: error })
  }

  const unavailable = (operation: string, itemId?: string): SyncResult => {
    logger.warn(`cache ${operation} skipped, cache unavailable`, { kind: module.kind, itemId })
    return degraded({ target: 'cache', operation, itemId, message: 'cache unavailable' })
  }

  const deletePattern = async (operation: string, pattern: string, itemId?: string) => {
    if (!connection.cacheAvailable) return unavailable(operation, itemId)
    try {
      const removed = await cache.deleteMatching(pattern)
      logger.debug(`cache ${operation}`, { kind: module.kind, pattern, removed })
      return SYNC_OK
    } catch (error) {
      return failure(operation, itemId, error)
    }
  }

  return {
    key,

    async sync(detail) {
      if (!connection.cacheAvailable) return unavailable('sync', detail.id)
      const status = completion.statusOf(detail)
      try {
        await cache.set(key(detail.id, status, detail.version), JSON.stringify(detail), ttlSeconds)
        await cache.del([key(detail.id, oppositeStatus(status), detail.version)])
        return SYNC_OK
      } catch (error) {
        return failure('sync', detail.id, error)
      }
    },

    async fill(detail) {
      if (!connection.cacheAvailable) return unavailable('fill', detail.id)
      const status = completion.statusOf(detail)
      try {
        const written = await cache.setUnlessExists(
          key(detail.id, status, detail.version),
          JSON.stringify(detail),
          ttlSeconds,
          [key(detail.id, oppositeStatus(status), detail.version)],
        )
        if (!written) logger.debug('cache fill skipped, entry exists', { kind: module.kind, itemId: detail.id })
        return SYNC_OK
      } catch (error) {
        return failure('fill', detail.id, error)
      }
    },

    async fetch(itemId, version) {
      if (!connection.cacheAvailable) return null
      for (const status of PROBE_ORDER) {
        let raw: string | null
        try {
          raw = await cache.get(key(itemId, status, version))
        } catch (error) {
          logger.warn('cache read failed, treating as miss', {
            kind: module.kind,
            itemId,
            error: errorMessage(error),
          })
          return null
        }
        if (raw === null) continue

        let payload: unknown
        try {
          payload = JSON.parse(raw)
        } catch {
          payload = undefined
        }
        const parsed = module.detailSchema.safeParse(payload)
        if (!parsed.success) {
          logger.warn('corrupt cache entry, treating as miss', { kind: module.kind, itemId, version, status })
          return null
        }
        return { detail: parsed.data, status }
      }
      return null
    },

    evict: (itemId) => deletePattern('evict', `${prefix}:${itemId}:*`, itemId),
    evictAll: () => deletePattern('evictAll', `${prefix}:*`),
  }
}
