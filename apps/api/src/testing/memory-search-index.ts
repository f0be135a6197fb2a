import type { SearchFieldMapping } from '../content/types.js'
import type { SearchIndex, SearchQuery } from '../sync/ports.js'

type Document = Record<string, unknown>

function fieldMatches(document: Document, field: string, value: string) {
  const name = field.endsWith('.keyword') ? field.slice(0, -'.keyword'.length) : field
  const stored = document[name]
  return Array.isArray(stored) ? stored.includes(value) : stored === value
}

function sortValue(document: Document, field: string) {
  const value = document[field]
  return typeof value === 'string' || typeof value === 'number' ? String(value) : ''
}

/**
 * In-process `SearchIndex` with term filters and a single sort field.
 * Like the real cluster, searching an index that does not exist fails.
 */
export class MemorySearchIndex implements SearchIndex {
  readonly indices = new Map<string, Map<string, Document>>()
  readonly mappings = new Map<string, Record<string, SearchFieldMapping>>()
  failure: Error | null = null
  reachable = true

  private guard() {
    if (this.failure) throw this.failure
  }

  async indexExists(index: string) {
    this.guard()
    return this.indices.has(index)
  }

  async createIndex(index: string, mappings: Record<string, SearchFieldMapping>) {
    this.guard()
    if (this.indices.has(index)) throw new Error(`resource_already_exists_exception: ${index}`)
    this.indices.set(index, new Map())
    this.mappings.set(index, mappings)
  }

  async dropIndex(index: string) {
    this.guard()
    this.mappings.delete(index)
    return this.indices.delete(index)
  }

  async put(index: string, id: string, document: object) {
    this.guard()
    let documents = this.indices.get(index)
    if (!documents) {
      documents = new Map()
      this.indices.set(index, documents)
    }
    documents.set(id, JSON.parse(JSON.stringify(document)))
  }

  async remove(index: string, id: string) {
    this.guard()
    return this.indices.get(index)?.delete(id) ?? false
  }

  async get(index: string, id: string) {
    this.guard()
    return this.indices.get(index)?.get(id) ?? null
  }

  async search(index: string, query: SearchQuery) {
    this.guard()
    const documents = this.indices.get(index)
    if (!documents) throw new Error(`index_not_found_exception: ${index}`)

    const direction = query.sort.order === 'asc' ? 1 : -1
    const hits = Array.from(documents.values())
      .filter((document) => query.filters.every((filter) => fieldMatches(document, filter.field, filter.value)))
      .sort((a, b) => sortValue(a, query.sort.field).localeCompare(sortValue(b, query.sort.field)) * direction)

    return { total: hits.length, documents: hits.slice(query.from, query.from + query.size) }
  }

  async ping() {
    return this.reachable
  }

  document(index: string, id: string) {
    return this.indices.get(index)?.get(id)
  }
}
