/**
 * Cache stores
 *
 * MemoryCacheStore lives for one process; RedisCacheStore survives the process,
 * so a re-run within the TTL window skips work that already succeeded.
 */

import { acquireRedisLock, releaseRedisLock, type LockCommands } from '@shelfcrawl/redis'
import type { CacheEntry, CacheStore, FingerprintLock, LockHandle } from './types.js'

export class MemoryCacheStore implements CacheStore {
  private readonly entries = new Map<string, CacheEntry>()

  async get(fingerprint: string): Promise<CacheEntry | null> {
    return this.entries.get(fingerprint) ?? null
  }

  async set(entry: CacheEntry): Promise<void> {
    this.entries.set(entry.fingerprint, entry)
  }

  async delete(fingerprint: string): Promise<void> {
    this.entries.delete(fingerprint)
  }

  async clear(): Promise<void> {
    this.entries.clear()
  }

  get size(): number {
    return this.entries.size
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Redis
// ═══════════════════════════════════════════════════════════════════════════════

const CACHE_KEY_PREFIX = 'shelfcrawl:cache:'
const LOCK_KEY_PREFIX = 'shelfcrawl:cache-lock:'

/** The subset of ioredis commands the cache store needs */
export interface CacheCommands {
  get(key: string): Promise<string | null>
  set(key: string, value: string, px: 'PX', ttlMs: number): Promise<unknown>
  del(...keys: string[]): Promise<number>
  keys(pattern: string): Promise<string[]>
}

function isCacheEntry(value: unknown): value is CacheEntry {
  if (typeof value !== 'object' || value === null) return false
  return (
    'fingerprint' in value &&
    typeof value.fingerprint === 'string' &&
    'value' in value &&
    'createdAt' in value &&
    typeof value.createdAt === 'number' &&
    'expiresAt' in value &&
    typeof value.expiresAt === 'number'
  )
}

/**
 * Entries are stored as JSON with a Redis TTL equal to the entry lifetime, so
 * task results must be JSON-serializable.
 */
export class RedisCacheStore implements CacheStore {
  constructor(private readonly redis: CacheCommands) {}

  async get(fingerprint: string): Promise<CacheEntry | null> {
    const raw = await this.redis.get(`${CACHE_KEY_PREFIX}${fingerprint}`)
    if (raw === null) return null

    const parsed: unknown = JSON.parse(raw)
    if (!isCacheEntry(parsed)) {
      throw new Error(`Malformed cache entry for ${fingerprint}`)
    }
    return parsed
  }

  async set(entry: CacheEntry): Promise<void> {
    const ttlMs = Math.max(entry.expiresAt - entry.createdAt, 1)
    await this.redis.set(`${CACHE_KEY_PREFIX}${entry.fingerprint}`, JSON.stringify(entry), 'PX', ttlMs)
  }

  async delete(fingerprint: string): Promise<void> {
    await this.redis.del(`${CACHE_KEY_PREFIX}${fingerprint}`)
  }

  async clear(): Promise<void> {
    const keys = await this.redis.keys(`${CACHE_KEY_PREFIX}*`)
    if (keys.length > 0) {
      await this.redis.del(...keys)
    }
  }
}

/**
 * Per-fingerprint lock shared by every process using the same Redis.
 * The TTL bounds how long a crashed owner can block others.
 */
export class RedisFingerprintLock implements FingerprintLock {
  constructor(
    private readonly redis: LockCommands,
    private readonly ttlMs: number
  ) {}

  async tryAcquire(fingerprint: string): Promise<LockHandle | null> {
    return acquireRedisLock(this.redis, `${LOCK_KEY_PREFIX}${fingerprint}`, this.ttlMs)
  }

  async release(handle: LockHandle): Promise<void> {
    await releaseRedisLock(this.redis, handle)
  }
}
