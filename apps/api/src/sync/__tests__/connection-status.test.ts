import { describe, expect, it, vi } from 'vitest'
import { silentLogger, type Logger } from '../../logger.js'
import { createConnectionStatus, createHealthMonitor } from '../connection-status.js'

function recordingLogger() {
  const lines: string[] = []
  const logger: Logger = {
    debug: () => {},
    info: (message) => lines.push(`info ${message}`),
    warn: (message) => lines.push(`warn ${message}`),
    error: (message) => lines.push(`error ${message}`),
    child: () => logger,
  }
  return { logger, lines }
}

describe('connection status', () => {
  it('should start with both services available by default', () => {
    const status = createConnectionStatus(silentLogger)

    expect(status.cacheAvailable).toBe(true)
    expect(status.searchAvailable).toBe(true)
  })

  it('should log only transitions', () => {
    const { logger, lines } = recordingLogger()
    const status = createConnectionStatus(logger)

    status.mark('cache', false)
    status.mark('cache', false)
    status.mark('cache', true)

    expect(lines).toEqual(['error cache connection lost', 'info cache connection restored'])
    expect(status.isAvailable('cache')).toBe(true)
  })
})

describe('health monitor', () => {
  it('should record probe answers and count a throwing probe as down', async () => {
    const status = createConnectionStatus(silentLogger)
    const monitor = createHealthMonitor(
      {
        cache: async () => true,
        search: async () => {
          throw new Error('ECONNREFUSED')
        },
      },
      status,
      silentLogger,
    )

    expect(await monitor.probe()).toEqual({ cache: true, search: false })
    expect(status.searchAvailable).toBe(false)
  })

  it('should probe on an interval until stopped', async () => {
    vi.useFakeTimers()
    try {
      const cache = vi.fn(async () => false)
      const status = createConnectionStatus(silentLogger)
      const monitor = createHealthMonitor({ cache, search: async () => true }, status, silentLogger)

      monitor.start(1_000)
      await vi.advanceTimersByTimeAsync(2_500)
      monitor.stop()
      await vi.advanceTimersByTimeAsync(5_000)

      expect(cache).toHaveBeenCalledTimes(2)
      expect(status.cacheAvailable).toBe(false)
    } finally {
      vi.useRealTimers()
    }
  })
})
