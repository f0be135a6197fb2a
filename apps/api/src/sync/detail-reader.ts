import { NotFoundError, UnknownTypeError } from '../errors.js'
import type { Logger } from '../logger.js'
import type { KindShape } from '../content/types.js'
import type { CacheSynchronizer } from './cache-synchronizer.js'
import type { DetailAssembler } from './detail-assembler.js'

export interface DetailReader<K extends KindShape> {
  /**
   * Detail view for a stored item: the cached view at the item's current
   * version, or a fresh assembly that is then filled into the cache.
   * Null when the item vanished or carries an unknown type.
   */
  read(item: K['item']): Promise<K['detail'] | null>
  readMany(items: K['item'][]): Promise<K['detail'][]>
}

export function createDetailReader<K extends KindShape>(deps: {
  assembler: DetailAssembler<K>
  cache: CacheSynchronizer<K>
  logger: Logger
}): DetailReader<K> {
  const { assembler, cache, logger } = deps

  const read = async (item: K['item']): Promise<K['detail'] | null> => {
    const cached = await cache.fetch(item.id, item.version)
    if (cached) return cached.detail

    try {
      const detail = await assembler.assemble(item.id)
      await cache.fill(detail)
      return detail
    } catch (error) {
      if (error instanceof NotFoundError) return null
      if (error instanceof UnknownTypeError) {
        logger.error('skipping item with unknown type', { itemId: error.itemId, type: error.itemType })
        return null
      }
      throw error
    }
  }

  return {
    read,
    async readMany(items) {
      const details: (K['detail'] | null)[] = await Promise.all(items.map((item) => read(item)))
      return details.filter((detail): detail is K['detail'] => detail !== null)
    },
  }
}
