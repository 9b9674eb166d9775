/**
 * Redis-backed Rate Limiter
 *
 * Same sliding-window policy as SlidingWindowRateLimiter, with the window kept
 * in a Redis sorted set so several crawler processes share one budget per
 * resource name. Admission is decided atomically by a Lua script.
 */

import { randomUUID } from 'node:crypto'
import type { ILogger } from '@shelfcrawl/logger'
import { loggers } from '../config/logger.js'
import type { Clock, RateLimiter, RateLimitPolicy, Sleep } from './types.js'
import { DEFAULT_RATE_LIMIT_POLICY, realSleep, systemClock } from './types.js'

/** Key prefix for rate limiter state in Redis */
const REDIS_KEY_PREFIX = 'shelfcrawl:ratelimit:'

/** TTL for window keys so abandoned names do not linger */
const KEY_TTL_SECONDS = 3600

const ACQUIRE_LUA = `
  local key = KEYS[1]
  local now = tonumber(ARGV[1])
  local windowMs = tonumber(ARGV[2])
  local limit = tonumber(ARGV[3])
  local ttl = tonumber(ARGV[4])
  local member = ARGV[5]

  redis.call('ZREMRANGEBYSCORE', key, '-inf', now - windowMs)

  local count = redis.call('ZCARD', key)
  if count < limit then
    redis.call('ZADD', key, now, member)
    redis.call('EXPIRE', key, ttl)
    return {1, 0}
  end

  local oldest = redis.call('ZRANGE', key, 0, 0, 'WITHSCORES')
  if #oldest >= 2 then
    return {0, tonumber(oldest[2]) + windowMs - now}
  end
  return {0, windowMs}
`

/** The subset of ioredis commands the limiter needs */
export interface RateLimitCommands {
  eval(script: string, numKeys: number, ...args: Array<string | number>): Promise<unknown>
}

export interface RedisRateLimiterOptions {
  redis: RateLimitCommands
  policies?: Record<string, RateLimitPolicy>
  defaultPolicy?: RateLimitPolicy
  now?: Clock
  sleep?: Sleep
  logger?: ILogger
}

export class RedisRateLimiter implements RateLimiter {
  private readonly redis: RateLimitCommands
  private readonly policies: Map<string, RateLimitPolicy>
  private readonly defaultPolicy: RateLimitPolicy
  private readonly now: Clock
  private readonly sleep: Sleep
  private readonly log: ILogger

  constructor(options: RedisRateLimiterOptions) {
    this.redis = options.redis
    this.policies = new Map(Object.entries(options.policies ?? {}))
    this.defaultPolicy = options.defaultPolicy ?? DEFAULT_RATE_LIMIT_POLICY
    this.now = options.now ?? systemClock
    this.sleep = options.sleep ?? realSleep
    this.log = options.logger ?? loggers.rateLimit
  }

  getPolicy(name: string): RateLimitPolicy {
    return this.policies.get(name) ?? this.defaultPolicy
  }

  /**
   * Block until the shared window for `name` admits one more operation.
   */
  async acquire(name: string): Promise<void> {
    const policy = this.getPolicy(name)
    const key = `${REDIS_KEY_PREFIX}${name}`

    for (;;) {
      const result = await this.tryAcquire(key, policy)
      if (result.acquired) {
        return
      }

      const waitMs = Math.max(result.retryAfterMs, 1)
      this.log.debug('Waiting for shared slot', { name, waitMs })
      await this.sleep(waitMs)
    }
  }

  private async tryAcquire(
    key: string,
    policy: RateLimitPolicy
  ): Promise<{ acquired: boolean; retryAfterMs: number }> {
    const now = this.now()
    const member = `${now}:${randomUUID()}`

    const raw = await this.redis.eval(
      ACQUIRE_LUA,
      1,
      key,
      now.toString(),
      policy.intervalMs.toString(),
      policy.limit.toString(),
      KEY_TTL_SECONDS.toString(),
      member
    )

    if (!Array.isArray(raw) || raw.length < 2) {
      throw new Error(`Unexpected rate limit script reply for ${key}`)
    }

    return {
      acquired: Number(raw[0]) === 1,
      retryAfterMs: Number(raw[1]),
    }
  }
}
