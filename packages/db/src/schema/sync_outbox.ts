import {
  bigserial,
  index,
  integer,
  pgEnum,
  pgTable,
  text,
  timestamp,
  varchar,
} from "drizzle-orm/pg-core";
import { createdAt } from "./_common";

export const syncOutboxStatusEnum = pgEnum("sync_outbox_status", [
  "pending",
  "dead",
]);

/**
 * sync_outbox
 *
 * ELI5:
 * Every write to a content item (or one of its sub-records) drops a row here
 * inside the same transaction. A worker later reads the rows and rebuilds the
 * cache entry and search document for that item. If the cache or search
 * cluster is down, the row just waits and is retried.
 */
export const syncOutbox = pgTable(
  "sync_outbox",
  {
    id: bigserial("id", { mode: "number" }).primaryKey(),

    /** Content kind key (`writing`, `grammar`, ...). */
    kind: varchar("kind", { length: 40 }).notNull(),

    /** Parent content item to resync. */
    itemId: text("item_id").notNull(),

    /** What triggered the resync, for logs only. */
    reason: varchar("reason", { length: 60 }).notNull(),

    status: syncOutboxStatusEnum("status").default("pending").notNull(),

    /** Delivery attempts so far (incremented when a worker claims the row). */
    attempts: integer("attempts").default(0).notNull(),

    lastError: text("last_error"),

    /** Row is claimable once `now() >= available_at`. */
    availableAt: timestamp("available_at", { withTimezone: true })
      .defaultNow()
      .notNull(),

    createdAt: createdAt(),
  },
  (table) => ({
    syncOutboxDueIdx: index("sync_outbox_due_idx").on(
      table.status,
      table.availableAt,
    ),
    syncOutboxItemIdx: index("sync_outbox_item_idx").on(table.kind, table.itemId),
  }),
);

export type SyncOutboxRow = typeof syncOutbox.$inferSelect;
