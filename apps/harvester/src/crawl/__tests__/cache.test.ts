import { describe, it, expect, vi } from 'vitest'
import { silentLogger } from '@shelfcrawl/logger'
import { TaskCache } from '../cache.js'
import { MemoryCacheStore } from '../cache-store.js'
import type { CacheEntry, CacheStore, FingerprintLock, LockHandle } from '../types.js'
import { createFakeTime } from '../../testing/fake-time.js'

function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined
  const promise = new Promise<T>(r => {
    resolve = r
  })
  return { promise, resolve }
}

describe('TaskCache', () => {
  it('shares one in-flight computation between concurrent callers', async () => {
    const cache = new TaskCache({ logger: silentLogger })
    const gate = deferred<string[]>()
    const compute = vi.fn(() => gate.promise)

    const first = cache.run('fp', compute)
    const second = cache.run('fp', compute)
    expect(cache.pending).toBe(1)

    gate.resolve(['a', 'b'])

    expect(await first).toEqual(['a', 'b'])
    expect(await second).toEqual(['a', 'b'])
    expect(compute).toHaveBeenCalledTimes(1)
    expect(cache.pending).toBe(0)
  })

  it('returns a fresh entry without recomputing and recomputes once it expires', async () => {
    const time = createFakeTime(10_000)
    const store = new MemoryCacheStore()
    const cache = new TaskCache({ store, now: time.now, logger: silentLogger })
    let calls = 0
    const compute = async () => ++calls

    expect(await cache.run('fp', compute, { ttlMs: 1000 })).toBe(1)
    expect(await store.get('fp')).toEqual({ fingerprint: 'fp', value: 1, createdAt: 10_000, expiresAt: 11_000 })

    time.advance(999)
    expect(await cache.run('fp', compute, { ttlMs: 1000 })).toBe(1)

    time.advance(1)
    expect(await cache.run('fp', compute, { ttlMs: 1000 })).toBe(2)
    expect(calls).toBe(2)
  })

  it('reports store hits', async () => {
    const cache = new TaskCache({ logger: silentLogger })
    const onHit = vi.fn()

    await cache.run('fp', async () => 'value')
    await cache.run('fp', async () => 'other', { onHit })

    expect(onHit).toHaveBeenCalledTimes(1)
  })

  it('never caches a failure', async () => {
    const store = new MemoryCacheStore()
    const cache = new TaskCache({ store, logger: silentLogger })
    const compute = vi.fn<() => Promise<string>>().mockRejectedValueOnce(new Error('boom')).mockResolvedValueOnce('ok')

    await expect(cache.run('fp', compute)).rejects.toThrow('boom')
    expect(store.size).toBe(0)
    expect(cache.pending).toBe(0)

    expect(await cache.run('fp', compute)).toBe('ok')
    expect(compute).toHaveBeenCalledTimes(2)
  })

  it('tracks the invocation status until it settles', async () => {
    const debug = vi.fn()
    const cache = new TaskCache({ logger: { ...silentLogger, debug } })
    const gate = deferred<string>()

    const pending = cache.run('fp-ok', () => gate.promise)
    expect(cache.status('fp-ok')).toBe('pending')

    gate.resolve('value')
    await pending
    await expect(cache.run('fp-bad', async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom')

    expect(cache.status('fp-ok')).toBeNull()
    expect(cache.status('fp-bad')).toBeNull()
    expect(debug).toHaveBeenCalledWith('Computation settled', { fingerprint: 'fp-ok', status: 'done' })
    expect(debug).toHaveBeenCalledWith('Computation settled', { fingerprint: 'fp-bad', status: 'failed' })
  })

  it('treats store read and write failures as a miss', async () => {
    const store: CacheStore = {
      get: vi.fn<CacheStore['get']>().mockRejectedValue(new Error('connection reset')),
      set: vi.fn<CacheStore['set']>().mockRejectedValue(new Error('connection reset')),
      delete: vi.fn<CacheStore['delete']>().mockResolvedValue(undefined),
      clear: vi.fn<CacheStore['clear']>().mockResolvedValue(undefined),
    }
    const warn = vi.fn()
    const cache = new TaskCache({ store, logger: { ...silentLogger, warn } })

    expect(await cache.run('fp', async () => 42)).toBe(42)
    expect(warn).toHaveBeenCalledTimes(2)
  })

  it('waits for a held fingerprint lock and re-checks the store after acquiring it', async () => {
    const time = createFakeTime()
    const handle: LockHandle = { key: 'lock:fp', token: 'tok' }
    const lock: FingerprintLock = {
      tryAcquire: vi.fn<FingerprintLock['tryAcquire']>().mockResolvedValueOnce(null).mockResolvedValueOnce(handle),
      release: vi.fn<FingerprintLock['release']>().mockResolvedValue(undefined),
    }

    const filled: CacheEntry = { fingerprint: 'fp', value: 'from-other-process', createdAt: 0, expiresAt: 60_000 }
    const store = new MemoryCacheStore()
    const get = vi.spyOn(store, 'get').mockResolvedValueOnce(null).mockResolvedValueOnce(filled)

    const cache = new TaskCache({ store, lock, lockPollMs: 50, now: time.now, sleep: time.sleep, logger: silentLogger })
    const compute = vi.fn(async () => 'computed')

    expect(await cache.run('fp', compute)).toBe('from-other-process')
    expect(compute).not.toHaveBeenCalled()
    expect(get).toHaveBeenCalledTimes(2)
    expect(time.sleeps).toEqual([50])
    expect(lock.release).toHaveBeenCalledWith(handle)
  })

  it('releases the lock when the computation fails', async () => {
    const handle: LockHandle = { key: 'lock:fp', token: 'tok' }
    const lock: FingerprintLock = {
      tryAcquire: vi.fn<FingerprintLock['tryAcquire']>().mockResolvedValue(handle),
      release: vi.fn<FingerprintLock['release']>().mockResolvedValue(undefined),
    }
    const cache = new TaskCache({ lock, logger: silentLogger })

    await expect(cache.run('fp', async () => Promise.reject(new Error('nav failed')))).rejects.toThrow('nav failed')
    expect(lock.release).toHaveBeenCalledWith(handle)
  })
})
