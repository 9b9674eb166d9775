import { describe, it, expect, vi } from 'vitest'
import { silentLogger } from '@shelfcrawl/logger'
import { SlidingWindowRateLimiter } from '../rate-limiter.js'
import { RedisRateLimiter, type RateLimitCommands } from '../redis-rate-limiter.js'
import { createFakeTime } from '../../testing/fake-time.js'

describe('SlidingWindowRateLimiter', () => {
  it('admits up to the limit immediately, then waits for the window to slide', async () => {
    const time = createFakeTime()
    const limiter = new SlidingWindowRateLimiter({
      defaultPolicy: { limit: 2, intervalMs: 1000 },
      now: time.now,
      sleep: time.sleep,
      logger: silentLogger,
    })

    const admittedAt: number[] = []
    for (let i = 0; i < 3; i++) {
      await limiter.acquire('tops_website')
      admittedAt.push(time.now())
    }

    expect(admittedAt).toEqual([0, 0, 1000])
    expect(time.sleeps).toEqual([1000])
  })

  it('keeps separate windows per resource name', async () => {
    const time = createFakeTime()
    const limiter = new SlidingWindowRateLimiter({
      defaultPolicy: { limit: 1, intervalMs: 500 },
      now: time.now,
      sleep: time.sleep,
      logger: silentLogger,
    })

    await limiter.acquire('a')
    await limiter.acquire('b')

    expect(time.sleeps).toEqual([])
  })

  it('admits in arrival order', async () => {
    const time = createFakeTime()
    const limiter = new SlidingWindowRateLimiter({
      defaultPolicy: { limit: 1, intervalMs: 100 },
      now: time.now,
      sleep: time.sleep,
      logger: silentLogger,
    })

    const order: string[] = []
    await Promise.all(
      ['first', 'second', 'third'].map(async label => {
        await limiter.acquire('x')
        order.push(label)
      })
    )

    expect(order).toEqual(['first', 'second', 'third'])
  })

  it('uses named policies over the default', () => {
    const limiter = new SlidingWindowRateLimiter({
      policies: { tops_website: { limit: 5, intervalMs: 2000 } },
      logger: silentLogger,
    })

    expect(limiter.getPolicy('tops_website')).toEqual({ limit: 5, intervalMs: 2000 })
    expect(limiter.getPolicy('other')).toEqual({ limit: 2, intervalMs: 1000 })
  })

  it('rejects invalid policies', () => {
    expect(() => new SlidingWindowRateLimiter({ defaultPolicy: { limit: 0, intervalMs: 1000 } })).toThrow(RangeError)
    expect(() => new SlidingWindowRateLimiter({ defaultPolicy: { limit: 1, intervalMs: 0 } })).toThrow(RangeError)
  })
})

describe('RedisRateLimiter', () => {
  it('sleeps for the retry hint until the script admits', async () => {
    const time = createFakeTime(5000)
    const evalFn = vi
      .fn<RateLimitCommands['eval']>()
      .mockResolvedValueOnce([0, 400])
      .mockResolvedValueOnce([1, 0])

    const limiter = new RedisRateLimiter({
      redis: { eval: evalFn },
      defaultPolicy: { limit: 2, intervalMs: 1000 },
      now: time.now,
      sleep: time.sleep,
      logger: silentLogger,
    })

    await limiter.acquire('tops_website')

    expect(time.sleeps).toEqual([400])
    expect(evalFn).toHaveBeenCalledTimes(2)
    expect(evalFn.mock.calls[0]?.slice(1, 6)).toEqual([1, 'shelfcrawl:ratelimit:tops_website', '5000', '1000', '2'])
    expect(evalFn.mock.calls[1]?.[3]).toBe('5400')
  })

  it('waits at least 1ms when the hint is zero', async () => {
    const time = createFakeTime()
    const evalFn = vi
      .fn<RateLimitCommands['eval']>()
      .mockResolvedValueOnce([0, 0])
      .mockResolvedValueOnce([1, 0])

    const limiter = new RedisRateLimiter({ redis: { eval: evalFn }, now: time.now, sleep: time.sleep, logger: silentLogger })
    await limiter.acquire('x')

    expect(time.sleeps).toEqual([1])
  })

  it('fails on an unexpected script reply', async () => {
    const limiter = new RedisRateLimiter({
      redis: { eval: vi.fn<RateLimitCommands['eval']>().mockResolvedValue('OK') },
      logger: silentLogger,
    })

    await expect(limiter.acquire('x')).rejects.toThrow('Unexpected rate limit script reply for shelfcrawl:ratelimit:x')
  })
})
