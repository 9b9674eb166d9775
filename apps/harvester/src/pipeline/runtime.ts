/**
 * Per-run collaborators built from CrawlConfig
 *
 * memory: in-process cache and rate limiter
 * redis: cache entries, fingerprint locks and the rate-limit window live in
 *        Redis, shared by every crawler process using the same server
 */

import { createRedisClient, type Redis } from '@shelfcrawl/redis'
import type { ILogger } from '@shelfcrawl/logger'
import { loggers } from '../config/logger.js'
import type { CrawlConfig } from '../config/crawl.js'
import { TaskCache } from '../crawl/cache.js'
import { MemoryCacheStore, RedisCacheStore, RedisFingerprintLock } from '../crawl/cache-store.js'
import { SlidingWindowRateLimiter } from '../crawl/rate-limiter.js'
import { RedisRateLimiter } from '../crawl/redis-rate-limiter.js'
import type { TaskRuntime } from '../crawl/task.js'

/** Longest a crashed process can hold a fingerprint */
const FINGERPRINT_LOCK_TTL_MS = 10 * 60 * 1000

export interface CrawlRuntime {
  runtime: TaskRuntime
  /** Release connections opened for the run */
  shutdown(): Promise<void>
}

export type RuntimeConfig = Pick<CrawlConfig, 'cacheBackend' | 'cacheTtlMs' | 'rateLimit' | 'rateLimitName'>

export interface RuntimeOptions {
  /** Redis client factory, for the 'redis' backend */
  connectRedis?: () => Redis
  logger?: ILogger
}

export function createCrawlRuntime(config: RuntimeConfig, options: RuntimeOptions = {}): CrawlRuntime {
  const log = options.logger ?? loggers.pipeline
  const policies = { [config.rateLimitName]: config.rateLimit }

  if (config.cacheBackend === 'redis') {
    const redis = (options.connectRedis ?? (() => createRedisClient()))()
    log.info('Using Redis cache and rate limiter', { rateLimitName: config.rateLimitName })

    return {
      runtime: {
        cache: new TaskCache({
          store: new RedisCacheStore(redis),
          lock: new RedisFingerprintLock(redis, FINGERPRINT_LOCK_TTL_MS),
          defaultTtlMs: config.cacheTtlMs,
        }),
        rateLimiter: new RedisRateLimiter({ redis, policies }),
        rateLimitName: config.rateLimitName,
        cacheTtlMs: config.cacheTtlMs,
      },
      async shutdown() {
        await redis.quit()
      },
    }
  }

  return {
    runtime: {
      cache: new TaskCache({ store: new MemoryCacheStore(), defaultTtlMs: config.cacheTtlMs }),
      rateLimiter: new SlidingWindowRateLimiter({ policies }),
      rateLimitName: config.rateLimitName,
      cacheTtlMs: config.cacheTtlMs,
    },
    async shutdown() {},
  }
}
