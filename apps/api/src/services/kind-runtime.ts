import type { Logger } from '../logger.js'
import type { ContentKindModule, KindShape } from '../content/types.js'
import type { ContentRepository } from '../repositories/types.js'
import { createCacheSynchronizer, type CacheSynchronizer } from '../sync/cache-synchronizer.js'
import { createCompletionEvaluator } from '../sync/completion.js'
import type { ConnectionStatus } from '../sync/connection-status.js'
import { createDeltaSyncResolver } from '../sync/delta-sync-resolver.js'
import { createDetailAssembler } from '../sync/detail-assembler.js'
import { createDetailReader } from '../sync/detail-reader.js'
import type { CacheStore, SearchIndex } from '../sync/ports.js'
import { createResyncPipeline, type ResyncHandler } from '../sync/resync-pipeline.js'
import { createSearchSynchronizer, type SearchSynchronizer } from '../sync/search-synchronizer.js'
import { createVersionMutator } from '../sync/version-mutator.js'
import { createContentService, type ContentService } from './content-service.js'

export interface SharedInfrastructure {
  cache: CacheStore
  searchIndex: SearchIndex
  connection: ConnectionStatus
  cacheTtlSeconds: number
  maxBatch: number
  logger: Logger
  now?: () => Date
  onWrite?: () => void
}

export interface KindRuntime<K extends KindShape> {
  service: ContentService<K>
  resync: ResyncHandler
  cache: CacheSynchronizer<K>
  search: SearchSynchronizer<K>
}

/** Wires the sync components and the service for one content kind. */
export function createKindRuntime<K extends KindShape>(
  module: ContentKindModule<K>,
  repository: ContentRepository<K>,
  shared: SharedInfrastructure,
): KindRuntime<K> {
  const logger = shared.logger.child(module.kind)
  const completion = createCompletionEvaluator(module)
  const assembler = createDetailAssembler(module, repository)
  const cache = createCacheSynchronizer({
    module,
    cache: shared.cache,
    completion,
    connection: shared.connection,
    ttlSeconds: shared.cacheTtlSeconds,
    logger,
  })
  const search = createSearchSynchronizer({
    module,
    index: shared.searchIndex,
    connection: shared.connection,
    logger,
  })
  const reader = createDetailReader({ assembler, cache, logger })

  const service = createContentService({
    module,
    repository,
    assembler,
    mutator: createVersionMutator(module, shared.now),
    reader,
    resolver: createDeltaSyncResolver({ module, repository, reader }),
    cache,
    search,
    logger,
    maxBatch: shared.maxBatch,
    onWrite: shared.onWrite,
  })

  const resync = createResyncPipeline({ kind: module.kind, assembler, completion, cache, search, logger })

  return { service, resync, cache, search }
}
