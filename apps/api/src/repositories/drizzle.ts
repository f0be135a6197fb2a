import { and, eq, gt, or, type SQL, type SQLWrapper } from 'drizzle-orm'
import { syncOutbox, type Database, type Executor } from '@lingo/db'
import type {
  ContentItemBase,
  ContentKind,
  KindShape,
  OwnedRecord,
  SlotStore,
  SlotStores,
  VersionPair,
} from '../content/types.js'
import { stripOwnership } from '../content/fields.js'
import type { ContentRepository, WriteScope } from './types.js'

type OwnedRow = { id: string; questionId: string; createdAt: Date; updatedAt: Date }

type RecordOf<TRow extends OwnedRow> = Omit<TRow, 'questionId' | 'createdAt' | 'updatedAt'>

/** Raw queries for one sub-record table. Every call returns full rows. */
export interface SlotQueries<TRow extends OwnedRow, TInput> {
  list(parentId: string): Promise<TRow[]>
  find(recordId: string): Promise<TRow[]>
  insert(parentId: string, input: TInput): Promise<TRow[]>
  update(recordId: string, input: TInput): Promise<TRow[]>
  remove(recordId: string): Promise<TRow[]>
}

function owned<TRow extends OwnedRow>(row: TRow | undefined): OwnedRecord<RecordOf<TRow>> | null {
  return row ? { parentId: row.questionId, record: stripOwnership(row) } : null
}

/** Adapts per-table queries to a `SlotStore`, dropping ownership columns. */
export function slotStore<TRow extends OwnedRow, TInput>(
  queries: SlotQueries<TRow, TInput>,
): SlotStore<RecordOf<TRow>, TInput> {
  return {
    list: async (parentId) => (await queries.list(parentId)).map((row) => stripOwnership(row)),
    find: async (recordId) => owned((await queries.find(recordId))[0]),
    insert: async (parentId, input) => stripOwnership(requireRow(await queries.insert(parentId, input), 'sub-record')),
    update: async (recordId, input) => owned((await queries.update(recordId, input))[0]),
    remove: async (recordId) => (await queries.remove(recordId))[0]?.questionId ?? null,
  }
}

/** Parent-table queries for one kind, bound to a handle or transaction. */
export interface ParentQueries<K extends KindShape> {
  findById(id: string): Promise<K['item'] | null>
  findByIds(ids: string[]): Promise<K['item'][]>
  findNewer(pairs: VersionPair[]): Promise<K['item'][]>
  insert(input: K['create']): Promise<K['item']>
  save(item: K['item']): Promise<K['item'] | null>
  remove(id: string): Promise<boolean>
  removeAll(): Promise<number>
}

export interface DrizzleRepositoryConfig<K extends KindShape> {
  kind: ContentKind
  db: Database
  parents: (executor: Executor) => ParentQueries<K>
  slots: (executor: Executor) => SlotStores<K>
}

/**
 * Builds a `ContentRepository` from parent and slot queries.
 *
 * ELI5:
 * Reads go straight to the pool. Writes get a scope bound to one transaction,
 * and `enqueue` writes the outbox row through that same transaction.
 */
export function createDrizzleRepository<K extends KindShape>(config: DrizzleRepositoryConfig<K>): ContentRepository<K> {
  const { kind, db } = config
  const root = config.parents(db)

  return {
    kind,
    findById: (id) => root.findById(id),
    findByIds: (ids) => (ids.length === 0 ? Promise.resolve([]) : root.findByIds(ids)),
    findNewer: (pairs) => (pairs.length === 0 ? Promise.resolve([]) : root.findNewer(pairs)),
    slots: config.slots(db),
    transaction: (work) =>
      db.transaction(async (tx) => {
        const parents = config.parents(tx)
        const scope: WriteScope<K> = {
          findById: (id) => parents.findById(id),
          insert: (input) => parents.insert(input),
          save: (item) => parents.save(item),
          remove: (id) => parents.remove(id),
          removeAll: () => parents.removeAll(),
          slots: config.slots(tx),
          async enqueue(itemId, reason) {
            await tx.insert(syncOutbox).values({ kind, itemId, reason })
          },
        }
        return work(scope)
      }),
  }
}

/** `(id = $1 AND version > $2) OR ...` for a delta request. */
export function newerThan(
  columns: { id: SQLWrapper; version: SQLWrapper },
  pairs: VersionPair[],
): SQL | undefined {
  return or(...pairs.map((pair) => and(eq(columns.id, pair.id), gt(columns.version, pair.version))))
}

/** Columns a field update may change on any parent row. */
export function mutableColumns(item: ContentItemBase) {
  return {
    type: item.type,
    topic: item.topic,
    instruction: item.instruction,
    imageUrls: item.imageUrls,
    maxTime: item.maxTime,
    version: item.version,
    updatedAt: item.updatedAt,
  }
}

export function firstRow<T>(rows: T[]): T | null {
  return rows[0] ?? null
}

export function requireRow<T>(rows: T[], what: string): T {
  const [row] = rows
  if (!row) throw new Error(`Insert returned no ${what} row.`)
  return row
}
