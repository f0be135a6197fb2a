import { describeDegradation, errorMessage } from '../errors.js'
import type { Logger } from '../logger.js'
import type { OutboxEntry, OutboxStore } from '../repositories/types.js'
import { storeCall } from '../repositories/store-call.js'
import type { ResyncHandler } from './resync-pipeline.js'

export const MAX_RETRY_DELAY_MS = 5 * 60 * 1000

export interface OutboxWorkerOptions {
  batchSize: number
  maxAttempts: number
  retryDelayMs: number
  pollIntervalMs: number
  /** How long a claimed row stays invisible to other workers. */
  leaseMs?: number
  now?: () => Date
}

export interface DrainReport {
  claimed: number
  resynced: number
  retried: number
  dead: number
}

export interface OutboxWorker {
  /** Claims one batch of due rows and resyncs each item once. */
  drain(): Promise<DrainReport>
  /** Requests a drain soon. Calls made while a drain runs coalesce into one follow-up drain. */
  schedule(): void
  start(): void
  stop(): Promise<void>
}

export function retryDelay(attempts: number, baseDelayMs: number) {
  return Math.min(baseDelayMs * 2 ** Math.max(attempts - 1, 0), MAX_RETRY_DELAY_MS)
}

function groupByItem(entries: OutboxEntry[]) {
  const groups = new Map<string, OutboxEntry[]>()
  for (const entry of entries) {
    const key = `${entry.kind}:${entry.itemId}`
    const group = groups.get(key)
    if (group) {
      group.push(entry)
    } else {
      groups.set(key, [entry])
    }
  }
  return Array.from(groups.values())
}

/**
 * Outbox worker
 *
 * ELI5:
 * Each write leaves a `sync_outbox` row. The worker leases a batch of due
 * rows, runs the kind's resync once per item, and then either deletes the
 * rows (success) or pushes them back with exponential backoff. Rows that
 * keep failing past `maxAttempts` are parked as `dead`.
 */
export function createOutboxWorker(deps: {
  outbox: OutboxStore
  handlers: ResyncHandler[]
  options: OutboxWorkerOptions
  logger: Logger
}): OutboxWorker {
  const { outbox, options, logger } = deps
  const handlers = new Map<string, ResyncHandler>()
  for (const handler of deps.handlers) handlers.set(handler.kind, handler)
  const clock = options.now ?? (() => new Date())
  const leaseMs = options.leaseMs ?? Math.max(options.retryDelayMs, 30_000)

  let timer: NodeJS.Timeout | null = null
  let running: Promise<void> | null = null
  let pending = false

  const runHandler = async (group: OutboxEntry[]): Promise<string | null> => {
    const [{ kind, itemId }] = group
    const handler = handlers.get(kind)
    if (!handler) return `no resync handler for kind "${kind}"`
    try {
      const result = await handler.resync(itemId)
      return result.ok ? null : describeDegradation(result.error)
    } catch (error) {
      return errorMessage(error)
    }
  }

  const settle = async (group: OutboxEntry[], lastError: string | null, report: DrainReport) => {
    const ids = group.map((entry) => entry.id)
    if (lastError === null) {
      await outbox.complete(ids)
      report.resynced += 1
      return
    }

    const [{ kind, itemId }] = group
    const attempts = Math.max(...group.map((entry) => entry.attempts))
    logger.error('resync failed', { kind, itemId, attempts, error: lastError })

    for (const entry of group) {
      if (entry.attempts >= options.maxAttempts) {
        await outbox.markDead([entry.id], lastError)
        report.dead += 1
        logger.error('outbox row marked dead', { id: entry.id, kind, itemId, attempts: entry.attempts })
      } else {
        const availableAt = new Date(clock().getTime() + retryDelay(entry.attempts, options.retryDelayMs))
        await outbox.reschedule([entry.id], availableAt, lastError)
        report.retried += 1
      }
    }
  }

  const drain = async (): Promise<DrainReport> => {
    const now = clock()
    const entries = await storeCall('claim outbox rows', () =>
      outbox.claim(options.batchSize, now, new Date(now.getTime() + leaseMs)),
    )
    const report: DrainReport = { claimed: entries.length, resynced: 0, retried: 0, dead: 0 }

    for (const group of groupByItem(entries)) {
      const lastError = await runHandler(group)
      await storeCall('settle outbox rows', () => settle(group, lastError, report))
    }

    if (report.claimed > 0) logger.debug('outbox drained', { ...report })
    return report
  }

  const loop = async () => {
    do {
      pending = false
      await drain()
    } while (pending)
  }

  const schedule = () => {
    if (running) {
      pending = true
      return
    }
    running = loop()
      .catch((error: unknown) => {
        logger.error('outbox drain failed', { error: errorMessage(error) })
      })
      .finally(() => {
        running = null
      })
  }

  return {
    drain,
    schedule,
    start() {
      if (timer) return
      timer = setInterval(schedule, options.pollIntervalMs)
      timer.unref()
      schedule()
    },
    async stop() {
      if (timer) clearInterval(timer)
      timer = null
      pending = false
      if (running) await running
    },
  }
}
