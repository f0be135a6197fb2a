import type { z } from 'zod'

/**
 * Shared vocabulary for every content kind.
 *
 * ELI5:
 * A kind (writing, grammar, ...) is described once as a `KindShape` (its row,
 * create input, sub-record slots, detail view and field updates) and once as
 * a `ContentKindModule` value that carries the schemas and rules for that
 * shape. The sync core is written against these two types only, so adding a
 * kind never touches the core.
 */

export const CONTENT_KINDS = ['grammar', 'listening', 'reading', 'speaking', 'writing'] as const

export type ContentKind = (typeof CONTENT_KINDS)[number]

export type CompletionStatus = 'complete' | 'uncomplete'

/** Zod schema producing `T` from untrusted input. */
export type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>

/** Columns shared by every parent row, as read from the store. */
export interface ContentItemBase {
  id: string
  type: string
  topic: string[]
  instruction: string
  imageUrls: string[]
  maxTime: number
  version: number
  createdAt: Date
  updatedAt: Date
}

/** Parent row as exposed to clients: timestamps become ISO strings. */
export type ItemView<T extends ContentItemBase> = Omit<T, 'createdAt' | 'updatedAt'> & {
  createdAt: string
  updatedAt: string
}

export type DetailBase = ItemView<ContentItemBase>

export interface SubRecord {
  id: string
}

export type SlotCardinality = 'single' | 'many'

export interface SlotShape {
  record: SubRecord
  input: object
}

export interface KindShape {
  item: ContentItemBase
  create: object
  slots: { [slot: string]: SlotShape }
  detail: DetailBase
  update: { field: string; value: unknown }
}

export type SlotName<K extends KindShape> = Extract<keyof K['slots'], string>

export interface SlotSpec<TRecord, TInput> {
  cardinality: SlotCardinality
  input: Schema<TInput>
  record: Schema<TRecord>
}

export type SlotSpecs<K extends KindShape> = {
  [S in SlotName<K>]: SlotSpec<K['slots'][S]['record'], K['slots'][S]['input']>
}

/** A stored sub-record together with the parent it belongs to. */
export interface OwnedRecord<TRecord> {
  parentId: string
  record: TRecord
}

/**
 * Storage for one sub-record slot. Rows are listed oldest first.
 * Mutations report the owning parent id, or null when the record is gone.
 */
export interface SlotStore<TRecord, TInput> {
  list(parentId: string): Promise<TRecord[]>
  find(recordId: string): Promise<OwnedRecord<TRecord> | null>
  insert(parentId: string, input: TInput): Promise<TRecord>
  update(recordId: string, input: TInput): Promise<OwnedRecord<TRecord> | null>
  remove(recordId: string): Promise<string | null>
}

export type SlotStores<K extends KindShape> = {
  [S in SlotName<K>]: SlotStore<K['slots'][S]['record'], K['slots'][S]['input']>
}

export type CompletionRule<TDetail> = (detail: TDetail) => boolean

export interface SearchFieldMapping {
  type: 'keyword' | 'text' | 'integer' | 'boolean' | 'date' | 'object'
  fields?: Record<string, SearchFieldMapping>
  enabled?: boolean
}

export interface ContentKindModule<K extends KindShape> {
  kind: ContentKind
  /** Cache key prefix, e.g. `writing_question`. */
  cachePrefix: string
  /** Search index name, e.g. `writing_questions`. */
  indexName: string
  questionTypes: readonly string[]
  createSchema: Schema<K['create']>
  fieldUpdateSchema: Schema<K['update']>
  detailSchema: Schema<K['detail']>
  slots: SlotSpecs<K>
  /** Returns a copy with exactly the addressed field replaced. */
  applyUpdate(item: K['item'], update: K['update']): K['item']
  /** Builds the detail view, loading only the slots the item's type uses. */
  assemble(item: K['item'], slots: SlotStores<K>): Promise<K['detail']>
  completion: Record<string, CompletionRule<K['detail']>>
  /** Extra search mappings beyond the shared parent fields. */
  searchMappings: Record<string, SearchFieldMapping>
}

export interface VersionPair {
  id: string
  version: number
}
