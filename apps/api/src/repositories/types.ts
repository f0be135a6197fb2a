import type { ContentKind, KindShape, SlotStores, VersionPair } from '../content/types.js'

export type ResyncReason =
  | 'created'
  | 'updated'
  | 'deleted'
  | 'sub_record_created'
  | 'sub_record_updated'
  | 'sub_record_deleted'

/**
 * Authoritative store for one content kind.
 *
 * Reads run on the shared handle. Writes run inside `transaction`, where the
 * scope's `enqueue` adds the resync outbox row in the same transaction as the
 * write it describes.
 */
export interface ContentRepository<K extends KindShape> {
  readonly kind: ContentKind
  findById(id: string): Promise<K['item'] | null>
  /** Newest first. Unknown ids are skipped. */
  findByIds(ids: string[]): Promise<K['item'][]>
  /** Items whose stored version is above the paired version, newest first. */
  findNewer(pairs: VersionPair[]): Promise<K['item'][]>
  slots: SlotStores<K>
  transaction<T>(work: (scope: WriteScope<K>) => Promise<T>): Promise<T>
}

export interface WriteScope<K extends KindShape> {
  findById(id: string): Promise<K['item'] | null>
  insert(input: K['create']): Promise<K['item']>
  /**
   * Writes every mutable column and the version carried by `item`.
   * Returns null when the row no longer exists.
   */
  save(item: K['item']): Promise<K['item'] | null>
  remove(id: string): Promise<boolean>
  /** Deletes every item of the kind. Returns the number of parents removed. */
  removeAll(): Promise<number>
  slots: SlotStores<K>
  enqueue(itemId: string, reason: ResyncReason): Promise<void>
}

export interface OutboxEntry {
  id: number
  kind: string
  itemId: string
  reason: string
  attempts: number
  createdAt: Date
}

/**
 * Durable queue of pending resyncs.
 *
 * `claim` leases due rows to one worker: it bumps `attempts` and pushes
 * `availableAt` to `leaseUntil`, so a crashed worker's rows become due again.
 */
export interface OutboxStore {
  claim(limit: number, now: Date, leaseUntil: Date): Promise<OutboxEntry[]>
  complete(ids: number[]): Promise<void>
  reschedule(ids: number[], availableAt: Date, lastError: string): Promise<void>
  markDead(ids: number[], lastError: string): Promise<void>
}
