import { z } from 'zod'
import { describeDegradation, NotFoundError, ValidationError, type SyncResult } from '../errors.js'
import type { Logger } from '../logger.js'
import type {
  ContentKind,
  ContentKindModule,
  KindShape,
  SlotName,
  SubRecord,
  VersionPair,
} from '../content/types.js'
import type { ContentRepository } from '../repositories/types.js'
import { storeCall } from '../repositories/store-call.js'
import type { CacheSynchronizer } from '../sync/cache-synchronizer.js'
import type { DeltaSyncResolver } from '../sync/delta-sync-resolver.js'
import type { DetailAssembler } from '../sync/detail-assembler.js'
import type { DetailReader } from '../sync/detail-reader.js'
import type { SearchFindInput, SearchFindResult, SearchSynchronizer } from '../sync/search-synchronizer.js'
import type { VersionMutator } from '../sync/version-mutator.js'

export interface PurgeReport {
  removed: number
  degraded: string[]
}

export interface ContentService<K extends KindShape> {
  readonly kind: ContentKind
  create(input: unknown): Promise<K['detail']>
  updateField(id: string, request: unknown): Promise<K['detail']>
  delete(id: string): Promise<void>
  getDetail(id: string): Promise<K['detail']>
  getByIds(ids: string[]): Promise<K['detail'][]>
  resolveDelta(pairs: VersionPair[]): Promise<K['detail'][]>
  search(filter: SearchFindInput): Promise<SearchFindResult<K['detail']>>
  addSubRecord(parentId: string, slot: string, input: unknown): Promise<SubRecord>
  updateSubRecord(slot: string, recordId: string, patch: unknown): Promise<SubRecord>
  removeSubRecord(slot: string, recordId: string): Promise<void>
  purge(): Promise<PurgeReport>
}

export interface ContentServiceDeps<K extends KindShape> {
  module: ContentKindModule<K>
  repository: ContentRepository<K>
  assembler: DetailAssembler<K>
  mutator: VersionMutator<K>
  reader: DetailReader<K>
  resolver: DeltaSyncResolver<K>
  cache: CacheSynchronizer<K>
  search: SearchSynchronizer<K>
  logger: Logger
  /** Upper bound on ids per batch read or delta request. */
  maxBatch: number
  /** Called after every committed write, e.g. to wake the outbox worker. */
  onWrite?: () => void
}

const patchSchema = z.record(z.string(), z.unknown())

function invalid(message: string, error: z.ZodError) {
  return new ValidationError(message, error.flatten())
}

/**
 * Content service
 *
 * ELI5:
 * Thin orchestration over one kind. Every write commits the row change and
 * its resync outbox row together, then pokes the outbox worker; the cache and
 * search index catch up from there. The view a write returns is assembled
 * inside the same transaction, so nothing reads the store after the commit.
 * Sub-record writes never change the parent's version.
 */
export function createContentService<K extends KindShape>(deps: ContentServiceDeps<K>): ContentService<K> {
  const { module, repository, assembler, mutator, reader, resolver, cache, search, logger, maxBatch } = deps
  const label = `${module.kind} question`

  const committed = () => deps.onWrite?.()

  const requireSlot = (slot: string): SlotName<K> => {
    if (!isSlotName(module, slot)) {
      throw new ValidationError(`Unknown ${module.kind} slot "${slot}".`, { slot })
    }
    return slot
  }

  const requireBatch = (size: number) => {
    if (size > maxBatch) {
      throw new ValidationError(`At most ${maxBatch} items per request.`, { size })
    }
  }

  const describe = (results: SyncResult[]) =>
    results.flatMap((result) => (result.ok ? [] : [describeDegradation(result.error)]))

  return {
    kind: module.kind,

    async create(input) {
      const parsed = module.createSchema.safeParse(input)
      if (!parsed.success) throw invalid(`Invalid ${label}.`, parsed.error)

      const detail = await storeCall(`create ${label}`, () =>
        repository.transaction(async (scope) => {
          const created = await scope.insert(parsed.data)
          await scope.enqueue(created.id, 'created')
          return assembler.assembleItem(created, scope.slots)
        }),
      )
      committed()
      logger.info('created', { kind: module.kind, id: detail.id, type: detail.type })
      return detail
    },

    async updateField(id, request) {
      const detail = await storeCall(`update ${label}`, () =>
        repository.transaction(async (scope) => {
          const current = await scope.findById(id)
          if (!current) throw new NotFoundError(label, id)
          const next = mutator.apply(current, request)
          const written = await scope.save(next)
          if (!written) throw new NotFoundError(label, id)
          await scope.enqueue(id, 'updated')
          return assembler.assembleItem(written, scope.slots)
        }),
      )
      committed()
      logger.info('field updated', { kind: module.kind, id, version: detail.version })
      return detail
    },

    async delete(id) {
      await storeCall(`delete ${label}`, () =>
        repository.transaction(async (scope) => {
          const removed = await scope.remove(id)
          if (!removed) throw new NotFoundError(label, id)
          await scope.enqueue(id, 'deleted')
        }),
      )
      committed()
      logger.info('deleted', { kind: module.kind, id })
    },

    async getDetail(id) {
      const detail = await assembler.assemble(id)
      await cache.fill(detail)
      return detail
    },

    async getByIds(ids) {
      const unique = Array.from(new Set(ids))
      requireBatch(unique.length)
      if (unique.length === 0) return []
      const items = await storeCall(`load ${label}s`, () => repository.findByIds(unique))
      return reader.readMany(items)
    },

    async resolveDelta(pairs) {
      requireBatch(pairs.length)
      return resolver.resolve(pairs)
    },

    search: (filter) => search.find(filter),

    async addSubRecord(parentId, slot, input) {
      const name = requireSlot(slot)
      const parsed = module.slots[name].input.safeParse(input)
      if (!parsed.success) throw invalid(`Invalid ${slot} record.`, parsed.error)

      const record = await storeCall(`add ${module.kind} ${slot}`, () =>
        repository.transaction(async (scope) => {
          const parent = await scope.findById(parentId)
          if (!parent) throw new NotFoundError(label, parentId)
          const inserted = await scope.slots[name].insert(parentId, parsed.data)
          await scope.enqueue(parentId, 'sub_record_created')
          return inserted
        }),
      )
      committed()
      return record
    },

    async updateSubRecord(slot, recordId, patch) {
      const name = requireSlot(slot)
      const patchParsed = patchSchema.safeParse(patch)
      if (!patchParsed.success) throw invalid(`Invalid ${slot} patch.`, patchParsed.error)

      const record = await storeCall(`update ${module.kind} ${slot}`, () =>
        repository.transaction(async (scope) => {
          const store = scope.slots[name]
          const existing = await store.find(recordId)
          if (!existing) throw new NotFoundError(`${module.kind} ${slot} record`, recordId)

          const merged = module.slots[name].input.safeParse({ ...existing.record, ...patchParsed.data })
          if (!merged.success) throw invalid(`Invalid ${slot} record.`, merged.error)

          const updated = await store.update(recordId, merged.data)
          if (!updated) throw new NotFoundError(`${module.kind} ${slot} record`, recordId)
          await scope.enqueue(updated.parentId, 'sub_record_updated')
          return updated.record
        }),
      )
      committed()
      return record
    },

    async removeSubRecord(slot, recordId) {
      const name = requireSlot(slot)
      await storeCall(`remove ${module.kind} ${slot}`, () =>
        repository.transaction(async (scope) => {
          const parentId = await scope.slots[name].remove(recordId)
          if (parentId === null) throw new NotFoundError(`${module.kind} ${slot} record`, recordId)
          await scope.enqueue(parentId, 'sub_record_deleted')
        }),
      )
      committed()
    },

    async purge() {
      const removed = await storeCall(`purge ${label}s`, () => repository.transaction((scope) => scope.removeAll()))
      const results = await Promise.all([cache.evictAll(), search.dropIndex()])
      logger.warn('purged', { kind: module.kind, removed })
      return { removed, degraded: describe(results) }
    },
  }
}

export function isSlotName<K extends KindShape>(module: ContentKindModule<K>, name: string): name is SlotName<K> {
  return Object.prototype.hasOwnProperty.call(module.slots, name)
}
