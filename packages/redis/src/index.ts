/**
 * @shelfcrawl/redis - Redis connection utilities
 *
 * Redis is optional for a crawl: it backs the shared task cache and the
 * cross-process rate limiter when a deployment runs several crawler processes
 * against the same site. Settings come from the environment:
 *
 * - REDIS_URL: full URL (redis://:password@host:port), parsed into components
 * - REDIS_HOST / REDIS_PORT / REDIS_PASSWORD: used when REDIS_URL is absent
 */

import { Redis, type RedisOptions } from 'ioredis'
import { createLogger, type ILogger } from '@shelfcrawl/logger'

export interface RedisConnectionSettings {
  host: string
  port: number
  password?: string
  url?: string
}

const RECONNECT_ERRORS = [
  'READONLY',
  'ECONNRESET',
  'ETIMEDOUT',
  'ECONNREFUSED',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ENOTFOUND',
]

/** Attempts after which reconnect logging drops to once per minute */
const QUIET_AFTER_ATTEMPTS = 20

const defaultLog = createLogger('redis')

/**
 * Resolve connection settings from environment variables.
 * A malformed REDIS_URL falls back to REDIS_HOST/PORT.
 */
export function resolveRedisSettings(
  env: NodeJS.ProcessEnv = process.env,
  log: ILogger = defaultLog
): RedisConnectionSettings {
  const redisUrl = env.REDIS_URL

  if (redisUrl) {
    try {
      const url = new URL(redisUrl)
      return {
        host: url.hostname,
        port: parseInt(url.port || '6379', 10),
        password: url.password || undefined,
        url: redisUrl,
      }
    } catch {
      log.warn('Failed to parse REDIS_URL, falling back to REDIS_HOST/PORT')
    }
  }

  return {
    host: env.REDIS_HOST || 'localhost',
    port: parseInt(env.REDIS_PORT || '6379', 10),
    password: env.REDIS_PASSWORD || undefined,
  }
}

/**
 * Connection description for logs, password masked.
 */
export function describeRedisConnection(settings: RedisConnectionSettings): string {
  return settings.url ? settings.url.replace(/\/\/([^:@/]*):[^@]+@/, '//$1:***@') : `${settings.host}:${settings.port}`
}

/**
 * ioredis options with keepalive, bounded reconnect backoff and quieter logging
 * during prolonged outages.
 */
export function buildRedisOptions(settings: RedisConnectionSettings, log: ILogger = defaultLog): RedisOptions {
  let lastQuietLog = 0
  const target = describeRedisConnection(settings)

  return {
    host: settings.host,
    port: settings.port,
    password: settings.password,
    maxRetriesPerRequest: null,
    keepAlive: 10000,
    connectTimeout: 10000,
    commandTimeout: 30000,
    enableOfflineQueue: true,
    retryStrategy(times: number) {
      if (times > QUIET_AFTER_ATTEMPTS) {
        const now = Date.now()
        if (now - lastQuietLog > 60000) {
          lastQuietLog = now
          log.error('Prolonged outage, still reconnecting', { attempts: times, connection: target })
        }
        return 30000
      }

      const delay = Math.min(times * 500, 30000)
      log.info('Reconnecting', { attempt: times, delayMs: delay })
      return delay
    },
    reconnectOnError(err: Error) {
      return RECONNECT_ERRORS.some(code => err.message.includes(code))
    },
  }
}

/**
 * Create a dedicated client. The caller owns it and must `quit()` it.
 */
export function createRedisClient(
  settings: RedisConnectionSettings = resolveRedisSettings(),
  log: ILogger = defaultLog
): Redis {
  const client = new Redis(buildRedisOptions(settings, log))

  client.on('error', (err: Error) => {
    log.error('Connection error', { connection: describeRedisConnection(settings) }, err)
  })

  return client
}

export {
  DEFAULT_LOCK_TTL_MS,
  acquireRedisLock,
  releaseRedisLock,
  type LockCommands,
  type RedisLockHandle,
} from './lock.js'

export { Redis }
export type { RedisOptions }
