import { NotFoundError, SYNC_OK, type SyncResult } from '../errors.js'
import type { Logger } from '../logger.js'
import type { ContentKind, KindShape } from '../content/types.js'
import type { CacheSynchronizer } from './cache-synchronizer.js'
import type { CompletionEvaluator } from './completion.js'
import type { DetailAssembler } from './detail-assembler.js'
import type { SearchSynchronizer } from './search-synchronizer.js'

/** Brings the cache and search index for one item in line with the store. */
export interface ResyncHandler {
  readonly kind: ContentKind
  resync(itemId: string): Promise<SyncResult>
}

function firstFailure(results: SyncResult[]): SyncResult {
  return results.find((result) => !result.ok) ?? SYNC_OK
}

/**
 * Assemble, evaluate, cache, index. When the item no longer exists its cache
 * keys and search document are removed instead. Store failures and unknown
 * types are thrown so the caller can retry.
 */
export function createResyncPipeline<K extends KindShape>(deps: {
  kind: ContentKind
  assembler: DetailAssembler<K>
  completion: CompletionEvaluator<K>
  cache: CacheSynchronizer<K>
  search: SearchSynchronizer<K>
  logger: Logger
}): ResyncHandler {
  const { kind, assembler, completion, cache, search, logger } = deps

  const purge = async (itemId: string) => {
    logger.debug('item gone, purging derived copies', { kind, itemId })
    return firstFailure(await Promise.all([cache.evict(itemId), search.remove(itemId)]))
  }

  return {
    kind,
    async resync(itemId) {
      let detail: K['detail']
      try {
        detail = await assembler.assemble(itemId)
      } catch (error) {
        if (error instanceof NotFoundError) return purge(itemId)
        throw error
      }

      const status = completion.statusOf(detail)
      const results = await Promise.all([cache.sync(detail), search.upsert(detail, status)])
      return firstFailure(results)
    },
  }
}
