import type { LockCommands } from '@shelfcrawl/redis'
import type { CacheCommands } from '../crawl/cache-store.js'

/**
 * In-process stand-in for the ioredis string commands the cache store and
 * fingerprint lock use. TTLs are recorded, not enforced.
 */
export class FakeRedis implements CacheCommands, LockCommands {
  readonly data = new Map<string, string>()
  readonly ttls = new Map<string, number>()

  async get(key: string): Promise<string | null> {
    return this.data.get(key) ?? null
  }

  set(key: string, value: string, px: 'PX', ttlMs: number): Promise<'OK'>
  set(key: string, value: string, px: 'PX', ttlMs: number, nx: 'NX'): Promise<'OK' | null>
  async set(key: string, value: string, _px: 'PX', ttlMs: number, nx?: 'NX'): Promise<'OK' | null> {
    if (nx === 'NX' && this.data.has(key)) {
      return null
    }
    this.data.set(key, value)
    this.ttls.set(key, ttlMs)
    return 'OK'
  }

  async del(...keys: string[]): Promise<number> {
    let removed = 0
    for (const key of keys) {
      if (this.data.delete(key)) removed++
      this.ttls.delete(key)
    }
    return removed
  }

  async keys(pattern: string): Promise<string[]> {
    const prefix = pattern.endsWith('*') ? pattern.slice(0, -1) : pattern
    return [...this.data.keys()].filter(key => (pattern.endsWith('*') ? key.startsWith(prefix) : key === prefix))
  }

  /** Only the owner-token release script is understood */
  async eval(_script: string, _numKeys: number, ...args: Array<string | number>): Promise<unknown> {
    const [key, token] = args.map(String)
    if (key !== undefined && this.data.get(key) === token) {
      this.data.delete(key)
      return 1
    }
    return 0
  }
}
