import type { Logger } from '../logger.js'
import type { SyncTarget } from '../errors.js'

/**
 * Last known reachability of the cache and the search cluster.
 *
 * ELI5:
 * Instead of a global "redis is up" flag, one `ConnectionStatus` object is
 * created at boot and handed to everything that talks to those services. The
 * Redis client events and the periodic health probe flip it; the
 * synchronizers read it before each call.
 */
export interface ConnectionStatus {
  readonly cacheAvailable: boolean
  readonly searchAvailable: boolean
  isAvailable(target: SyncTarget): boolean
  mark(target: SyncTarget, available: boolean): void
}

export function createConnectionStatus(logger: Logger, initial = { cache: true, search: true }): ConnectionStatus {
  const state: Record<SyncTarget, boolean> = { ...initial }

  return {
    get cacheAvailable() {
      return state.cache
    },
    get searchAvailable() {
      return state.search
    },
    isAvailable(target) {
      return state[target]
    },
    mark(target, available) {
      if (state[target] === available) return
      state[target] = available
      if (available) {
        logger.info(`${target} connection restored`)
      } else {
        logger.error(`${target} connection lost`)
      }
    },
  }
}

export type HealthProbe = () => Promise<boolean>

export interface HealthMonitor {
  probe(): Promise<Record<SyncTarget, boolean>>
  start(intervalMs: number): void
  stop(): void
}

/**
 * Pings the cache and search cluster and records the answers.
 * A probe that throws counts as unavailable.
 */
export function createHealthMonitor(
  probes: Record<SyncTarget, HealthProbe>,
  status: ConnectionStatus,
  logger: Logger,
): HealthMonitor {
  let timer: NodeJS.Timeout | null = null

  const check = async (target: SyncTarget) => {
    try {
      return await probes[target]()
    } catch (error) {
      logger.debug(`${target} probe failed`, { error })
      return false
    }
  }

  const probe = async () => {
    const [cache, search] = await Promise.all([check('cache'), check('search')])
    status.mark('cache', cache)
    status.mark('search', search)
    return { cache, search }
  }

  return {
    probe,
    start(intervalMs) {
      if (timer) return
      timer = setInterval(() => {
        probe().catch((error: unknown) => logger.error('health probe crashed', { error }))
      }, intervalMs)
      timer.unref()
    },
    stop() {
      if (timer) clearInterval(timer)
      timer = null
    },
  }
}
