import type { SearchFieldMapping } from '../content/types.js'

/** Key/value cache with TTLs and glob-pattern deletes. */
export interface CacheStore {
  get(key: string): Promise<string | null>
  set(key: string, value: string, ttlSeconds: number): Promise<void>
  /**
   * Atomically writes `key` unless it or any of `guards` already exists.
   * Returns whether the value was written.
   */
  setUnlessExists(key: string, value: string, ttlSeconds: number, guards: string[]): Promise<boolean>
  del(keys: string[]): Promise<number>
  /** Deletes every key matching a glob pattern (`prefix:id:*`). */
  deleteMatching(pattern: string): Promise<number>
  ping(): Promise<boolean>
}

export interface SearchFilter {
  field: string
  value: string
}

export interface SearchQuery {
  filters: SearchFilter[]
  sort: { field: string; order: 'asc' | 'desc' }
  from: number
  size: number
}

export interface SearchPage {
  total: number
  documents: unknown[]
}

/** Document index holding one document per content item. */
export interface SearchIndex {
  indexExists(index: string): Promise<boolean>
  createIndex(index: string, mappings: Record<string, SearchFieldMapping>): Promise<void>
  /** Returns false when there was no index to drop. */
  dropIndex(index: string): Promise<boolean>
  /** Full overwrite of the document stored under `id`. */
  put(index: string, id: string, document: object): Promise<void>
  /** Returns false when there was no document to remove. */
  remove(index: string, id: string): Promise<boolean>
  get(index: string, id: string): Promise<unknown>
  search(index: string, query: SearchQuery): Promise<SearchPage>
  ping(): Promise<boolean>
}
