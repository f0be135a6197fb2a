import type { CacheStore } from '../sync/ports.js'

interface Entry {
  value: string
  ttlSeconds: number
}

function globToRegExp(pattern: string) {
  const escaped = pattern.replace(/[.+?^${}()|[\]\\]/g, '\\$&').replace(/\*/g, '.*')
  return new RegExp(`^${escaped}$`)
}

/**
 * In-process `CacheStore`. TTLs are recorded, not enforced.
 * Set `failure` to make every call reject with it.
 */
export class MemoryCache implements CacheStore {
  readonly entries = new Map<string, Entry>()
  failure: Error | null = null
  reachable = true

  private guard() {
    if (this.failure) throw this.failure
  }

  async get(key: string) {
    this.guard()
    return this.entries.get(key)?.value ?? null
  }

  async set(key: string, value: string, ttlSeconds: number) {
    this.guard()
    this.entries.set(key, { value, ttlSeconds })
  }

  async setUnlessExists(key: string, value: string, ttlSeconds: number, guards: string[]) {
    this.guard()
    if ([key, ...guards].some((existing) => this.entries.has(existing))) return false
    this.entries.set(key, { value, ttlSeconds })
    return true
  }

  async del(keys: string[]) {
    this.guard()
    let removed = 0
    for (const key of keys) {
      if (this.entries.delete(key)) removed += 1
    }
    return removed
  }

  async deleteMatching(pattern: string) {
    this.guard()
    const matcher = globToRegExp(pattern)
    return this.del(Array.from(this.entries.keys()).filter((key) => matcher.test(key)))
  }

  async ping() {
    return this.reachable
  }

  keys() {
    return Array.from(this.entries.keys()).sort()
  }
}
