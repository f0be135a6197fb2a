import { LIMITS } from '../content/fields.js'
import type { ContentKindModule, KindShape, VersionPair } from '../content/types.js'
import type { ContentRepository } from '../repositories/types.js'
import { storeCall } from '../repositories/store-call.js'
import type { DetailReader } from './detail-reader.js'

export interface DeltaSyncResolver<K extends KindShape> {
  /**
   * Detail views of every item whose stored version is above the version the
   * client holds, newest first. Items at or below it are omitted.
   */
  resolve(pairs: VersionPair[]): Promise<K['detail'][]>
}

/** One pair per id; a later pair for the same id replaces an earlier one. */
export function dedupePairs(pairs: VersionPair[]): VersionPair[] {
  const latest = new Map<string, number>()
  for (const pair of pairs) {
    latest.delete(pair.id)
    latest.set(pair.id, pair.version)
  }
  return Array.from(latest, ([id, version]) => ({ id, version }))
}

/**
 * Delta Sync Resolver
 *
 * ELI5:
 * The relational store decides which items are newer (one batched
 * `(id = ? AND version > ?) OR ...` query). The cache only supplies the view
 * at that current version; on a miss the view is assembled and cached.
 */
export function createDeltaSyncResolver<K extends KindShape>(deps: {
  module: ContentKindModule<K>
  repository: ContentRepository<K>
  reader: DetailReader<K>
}): DeltaSyncResolver<K> {
  const { module, repository, reader } = deps

  return {
    async resolve(pairs) {
      // Nothing is stored above the column's maximum, so such pairs cannot match.
      const deduped = dedupePairs(pairs).filter((pair) => pair.version < LIMITS.maxVersion)
      if (deduped.length === 0) return []

      const newer = await storeCall(`find newer ${module.kind} questions`, () => repository.findNewer(deduped))
      return reader.readMany(newer)
    },
  }
}
