import { and, asc, eq, inArray, lte, sql } from 'drizzle-orm'
import { syncOutbox, type Database } from '@lingo/db'
import type { OutboxEntry, OutboxStore } from './types.js'

/**
 * Outbox store
 *
 * ELI5:
 * `claim` locks due rows with `FOR UPDATE SKIP LOCKED`, so two workers never
 * take the same row. A claimed row is pushed into the future by its lease; if
 * the worker dies before reporting back, the row simply becomes due again.
 */
export function createOutboxStore(db: Database): OutboxStore {
  return {
    async claim(limit, now, leaseUntil) {
      return db.transaction(async (tx) => {
        const due = await tx
          .select({ id: syncOutbox.id })
          .from(syncOutbox)
          .where(and(eq(syncOutbox.status, 'pending'), lte(syncOutbox.availableAt, now)))
          .orderBy(asc(syncOutbox.availableAt), asc(syncOutbox.id))
          .limit(limit)
          .for('update', { skipLocked: true })
        if (due.length === 0) return []

        const claimed: OutboxEntry[] = await tx
          .update(syncOutbox)
          .set({ attempts: sql`${syncOutbox.attempts} + 1`, availableAt: leaseUntil })
          .where(
            inArray(
              syncOutbox.id,
              due.map((row) => row.id),
            ),
          )
          .returning({
            id: syncOutbox.id,
            kind: syncOutbox.kind,
            itemId: syncOutbox.itemId,
            reason: syncOutbox.reason,
            attempts: syncOutbox.attempts,
            createdAt: syncOutbox.createdAt,
          })
        return claimed.sort((a, b) => a.id - b.id)
      })
    },

    async complete(ids) {
      if (ids.length === 0) return
      await db.delete(syncOutbox).where(inArray(syncOutbox.id, ids))
    },

    async reschedule(ids, availableAt, lastError) {
      if (ids.length === 0) return
      await db.update(syncOutbox).set({ availableAt, lastError }).where(inArray(syncOutbox.id, ids))
    },

    async markDead(ids, lastError) {
      if (ids.length === 0) return
      await db.update(syncOutbox).set({ status: 'dead', lastError }).where(inArray(syncOutbox.id, ids))
    },
  }
}
