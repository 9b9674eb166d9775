/**
 * Task cache: fingerprint memoization with TTL and single-flight
 *
 * - A fresh entry is returned without recomputation.
 * - Concurrent callers with the same fingerprint share one in-flight
 *   computation (TaskInvocation). With a FingerprintLock, callers in other
 *   processes are serialized behind it instead.
 * - Only successes are stored. A failed computation leaves nothing behind and
 *   the next call starts from scratch.
 * - Store errors degrade to a miss or a skipped write; they never fail a task.
 */

import type { ILogger } from '@shelfcrawl/logger'
import { loggers } from '../config/logger.js'
import { shortFingerprint } from './fingerprint.js'
import type { CacheEntry, CacheStore, Clock, FingerprintLock, InvocationStatus, LockHandle, Sleep, TaskInvocation } from './types.js'
import { DEFAULT_CACHE_TTL_MS, realSleep, systemClock } from './types.js'
import { MemoryCacheStore } from './cache-store.js'

export interface TaskCacheOptions {
  store?: CacheStore
  lock?: FingerprintLock
  /** Poll interval while another process holds the fingerprint lock */
  lockPollMs?: number
  defaultTtlMs?: number
  now?: Clock
  sleep?: Sleep
  logger?: ILogger
}

export interface CacheRunOptions {
  ttlMs?: number
  /** Called when the value came from the store */
  onHit?: (entry: CacheEntry) => void
}

export class TaskCache {
  private readonly store: CacheStore
  private readonly lock?: FingerprintLock
  private readonly lockPollMs: number
  private readonly defaultTtlMs: number
  private readonly now: Clock
  private readonly sleep: Sleep
  private readonly log: ILogger
  private readonly inFlight = new Map<string, TaskInvocation>()

  constructor(options: TaskCacheOptions = {}) {
    this.store = options.store ?? new MemoryCacheStore()
    this.lock = options.lock
    this.lockPollMs = options.lockPollMs ?? 250
    this.defaultTtlMs = options.defaultTtlMs ?? DEFAULT_CACHE_TTL_MS
    this.now = options.now ?? systemClock
    this.sleep = options.sleep ?? realSleep
    this.log = options.logger ?? loggers.cache
  }

  /**
   * Return the cached value for `fingerprint`, or compute, store and return it.
   *
   * The returned value is typed by the caller: one fingerprint always belongs
   * to one task, so a stored value has that task's result type.
   */
  run<T>(fingerprint: string, compute: () => Promise<T>, options: CacheRunOptions = {}): Promise<T> {
    const existing = this.inFlight.get(fingerprint)
    if (existing) {
      this.log.debug('Joining in-flight computation', { fingerprint: shortFingerprint(fingerprint) })
      return existing.result as Promise<T>
    }

    const invocation: TaskInvocation<T> = {
      fingerprint,
      status: 'pending',
      result: this.resolve(fingerprint, compute, options),
    }
    this.inFlight.set(fingerprint, invocation)

    const settle = (status: InvocationStatus) => {
      invocation.status = status
      this.inFlight.delete(fingerprint)
      this.log.debug('Computation settled', { fingerprint: shortFingerprint(fingerprint), status: invocation.status })
    }
    invocation.result.then(
      () => settle('done'),
      () => settle('failed')
    )

    return invocation.result
  }

  /** 'pending' while a computation for `fingerprint` is in flight, else null */
  status(fingerprint: string): InvocationStatus | null {
    return this.inFlight.get(fingerprint)?.status ?? null
  }

  /** Number of computations currently in flight */
  get pending(): number {
    return this.inFlight.size
  }

  async clear(): Promise<void> {
    await this.store.clear()
  }

  private async resolve<T>(fingerprint: string, compute: () => Promise<T>, options: CacheRunOptions): Promise<T> {
    const hit = await this.lookup(fingerprint)
    if (hit) {
      options.onHit?.(hit)
      return hit.value as T
    }

    if (!this.lock) {
      return this.computeAndStore(fingerprint, compute, options)
    }

    const handle = await this.waitForLock(fingerprint)
    try {
      // Another process may have finished while we waited
      const filled = await this.lookup(fingerprint)
      if (filled) {
        options.onHit?.(filled)
        return filled.value as T
      }
      return await this.computeAndStore(fingerprint, compute, options)
    } finally {
      await this.releaseLock(handle)
    }
  }

  private async computeAndStore<T>(fingerprint: string, compute: () => Promise<T>, options: CacheRunOptions): Promise<T> {
    const value = await compute()

    const createdAt = this.now()
    const entry: CacheEntry<T> = {
      fingerprint,
      value,
      createdAt,
      expiresAt: createdAt + (options.ttlMs ?? this.defaultTtlMs),
    }

    try {
      await this.store.set(entry)
    } catch (error) {
      this.log.warn('Cache write failed, result not cached', { fingerprint: shortFingerprint(fingerprint) }, error)
    }

    return value
  }

  private async lookup(fingerprint: string): Promise<CacheEntry | null> {
    let entry: CacheEntry | null
    try {
      entry = await this.store.get(fingerprint)
    } catch (error) {
      this.log.warn('Cache read failed, treating as miss', { fingerprint: shortFingerprint(fingerprint) }, error)
      return null
    }

    if (!entry) return null

    if (entry.expiresAt <= this.now()) {
      this.log.debug('Cache entry expired', { fingerprint: shortFingerprint(fingerprint) })
      try {
        await this.store.delete(fingerprint)
      } catch (error) {
        this.log.warn('Failed to delete expired entry', { fingerprint: shortFingerprint(fingerprint) }, error)
      }
      return null
    }

    return entry
  }

  private async waitForLock(fingerprint: string): Promise<LockHandle> {
    const lock = this.lock
    if (!lock) {
      throw new Error('waitForLock called without a lock')
    }

    for (;;) {
      const handle = await lock.tryAcquire(fingerprint)
      if (handle) return handle
      await this.sleep(this.lockPollMs)
    }
  }

  private async releaseLock(handle: LockHandle): Promise<void> {
    try {
      await this.lock?.release(handle)
    } catch (error) {
      // The lock TTL frees it eventually
      this.log.warn('Failed to release fingerprint lock', { key: handle.key }, error)
    }
  }
}
