import { drizzle, type NodePgDatabase, type NodePgQueryResultHKT } from 'drizzle-orm/node-postgres'
import type { PgDatabase } from 'drizzle-orm/pg-core'
import { Pool } from 'pg'

// Common utilities
export * from './id'
export * from './schema/_common'

// Schema exports
export * from './schema/writing'
export * from './schema/grammar'
export * from './schema/listening'
export * from './schema/reading'
export * from './schema/speaking'
export * from './schema/sync_outbox'

import * as writingSchema from './schema/writing'
import * as grammarSchema from './schema/grammar'
import * as listeningSchema from './schema/listening'
import * as readingSchema from './schema/reading'
import * as speakingSchema from './schema/speaking'
import * as syncOutboxSchema from './schema/sync_outbox'

/**
 * Unified Drizzle schema registry.
 *
 * One module per content kind, plus the resync outbox every kind writes into.
 */
export const schema = {
  ...writingSchema,
  ...grammarSchema,
  ...listeningSchema,
  ...readingSchema,
  ...speakingSchema,
  ...syncOutboxSchema,
}

export type Database = NodePgDatabase<typeof schema>

/** Either the root handle or an open transaction. Repositories accept both. */
export type Executor = PgDatabase<NodePgQueryResultHKT, typeof schema>

export interface DatabaseOptions {
  connectionString: string
  /** Per-query deadline enforced by the `pg` client. */
  queryTimeoutMs?: number
  max?: number
}

export interface DatabaseHandle {
  db: Database
  pool: Pool
}

/**
 * Creates the pool and Drizzle handle.
 *
 * ELI5:
 * Nothing connects at import time. The server builds one handle at boot and
 * passes it down, so tests never need a `DATABASE_URL`.
 */
export function createDatabase(options: DatabaseOptions): DatabaseHandle {
  if (!options.connectionString) {
    throw new Error('DATABASE_URL is required to initialize @lingo/db')
  }

  const pool = new Pool({
    connectionString: options.connectionString,
    query_timeout: options.queryTimeoutMs,
    max: options.max,
  })
  const db = drizzle(pool, { schema })
  return { db, pool }
}

export async function checkDatabaseConnection(pool: Pool): Promise<boolean> {
  const client = await pool.connect()
  try {
    await client.query('SELECT 1')
    return true
  } finally {
    client.release()
  }
}
