import { Redis } from 'ioredis'
import type { Logger } from '../logger.js'
import type { ConnectionStatus } from '../sync/connection-status.js'
import type { CacheStore } from '../sync/ports.js'

const SCAN_COUNT = 200

// KEYS[1] is the key to write; every key is checked before the SET.
const SET_UNLESS_EXISTS = `
for i = 1, #KEYS do
  if redis.call('EXISTS', KEYS[i]) == 1 then return 0 end
end
redis.call('SET', KEYS[1], ARGV[1], 'EX', ARGV[2])
return 1
`

export interface RedisCacheOptions {
  url: string
  commandTimeoutMs: number
  connection: ConnectionStatus
  logger: Logger
}

export interface RedisCache extends CacheStore {
  close(): Promise<void>
}

/**
 * ioredis-backed `CacheStore`.
 *
 * Client events keep `ConnectionStatus` current between health probes. With
 * the offline queue disabled, commands fail fast while disconnected instead
 * of piling up behind the reconnect.
 */
export function createRedisCache(options: RedisCacheOptions): RedisCache {
  const { connection, logger } = options
  const client = new Redis(options.url, {
    commandTimeout: options.commandTimeoutMs,
    enableOfflineQueue: false,
    maxRetriesPerRequest: 1,
    lazyConnect: true,
  })

  client.on('ready', () => connection.mark('cache', true))
  client.on('end', () => connection.mark('cache', false))
  client.on('error', (error: Error) => {
    logger.debug('redis client error', { error: error.message })
    connection.mark('cache', false)
  })

  client.connect().catch((error: unknown) => {
    logger.warn('redis connect failed, retrying in background', { error })
  })

  return {
    get: (key) => client.get(key),

    async set(key, value, ttlSeconds) {
      await client.set(key, value, 'EX', ttlSeconds)
    },

    async setUnlessExists(key, value, ttlSeconds, guards) {
      const written = await client.eval(SET_UNLESS_EXISTS, 1 + guards.length, key, ...guards, value, ttlSeconds)
      return written === 1
    },

    async del(keys) {
      if (keys.length === 0) return 0
      return client.del(...keys)
    },

    async deleteMatching(pattern) {
      let cursor = '0'
      let removed = 0
      do {
        const [next, keys] = await client.scan(cursor, 'MATCH', pattern, 'COUNT', SCAN_COUNT)
        cursor = next
        if (keys.length > 0) removed += await client.del(...keys)
      } while (cursor !== '0')
      return removed
    },

    async ping() {
      return (await client.ping()) === 'PONG'
    },

    async close() {
      await client.quit()
    },
  }
}
