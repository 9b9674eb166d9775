/**
 * Task wrapper
 *
 * A task is a named, versioned async function over named arguments. Invoking it
 * goes through the cache first (one computation per fingerprint), and every
 * attempt of that computation acquires a rate-limit slot before running.
 *
 *   invoke(args)
 *     └─ TaskCache.run(fingerprint)
 *          └─ withRetry
 *               ├─ rateLimiter.acquire(name)
 *               └─ definition.run(args)
 */

import type { ILogger } from '@shelfcrawl/logger'
import { loggers } from '../config/logger.js'
import { TaskFailedError } from '../errors.js'
import type { TaskCache } from './cache.js'
import { computeFingerprint, shortFingerprint, taskKey } from './fingerprint.js'
import { RetriesExhaustedError, withRetry } from './retry.js'
import type { RateLimiter, RetryPolicy, Sleep } from './types.js'
import { DEFAULT_RETRY_POLICY } from './types.js'

/** Shared per-run collaborators */
export interface TaskRuntime {
  cache: TaskCache
  rateLimiter: RateLimiter
  /** Resource name every rate-limited task acquires */
  rateLimitName: string
  cacheTtlMs?: number
  sleep?: Sleep
  logger?: ILogger
}

export interface TaskContext {
  /** 1-based */
  attempt: number
  fingerprint: string
  logger: ILogger
  runtime: TaskRuntime
}

export interface TaskDefinition<A extends object, R> {
  name: string
  /** Bump to invalidate cached results after changing what the task computes */
  version: string
  /** Arguments left out of the fingerprint */
  cacheExclude?: ReadonlyArray<keyof A & string>
  retry?: RetryPolicy
  /** Defaults to true */
  rateLimited?: boolean
  run(args: A, context: TaskContext): Promise<R>
}

export interface Task<A extends object, R> {
  readonly name: string
  readonly version: string
  fingerprint(args: A): string
  invoke(args: A, runtime: TaskRuntime): Promise<R>
}

export function defineTask<A extends object, R>(definition: TaskDefinition<A, R>): Task<A, R> {
  const identity = { name: definition.name, version: definition.version }
  const key = taskKey(identity)
  const exclude = definition.cacheExclude ?? []
  const retryPolicy = definition.retry ?? DEFAULT_RETRY_POLICY
  const rateLimited = definition.rateLimited ?? true

  const fingerprint = (args: A): string => computeFingerprint(identity, args, exclude)

  async function invoke(args: A, runtime: TaskRuntime): Promise<R> {
    const fp = fingerprint(args)
    const log = (runtime.logger ?? loggers.tasks).child(definition.name, { fingerprint: shortFingerprint(fp) })

    const compute = async (): Promise<R> => {
      log.debug('Task started')
      try {
        return await withRetry(
          async attempt => {
            if (rateLimited) {
              await runtime.rateLimiter.acquire(runtime.rateLimitName)
            }
            return definition.run(args, { attempt, fingerprint: fp, logger: log, runtime })
          },
          retryPolicy,
          {
            sleep: runtime.sleep,
            onRetry: (attempt, error) => {
              log.warn('Task attempt failed, retrying', { attempt }, error)
            },
          }
        )
      } catch (error) {
        if (error instanceof RetriesExhaustedError) {
          const failure = new TaskFailedError(key, fp, error.attempts, { cause: error.lastError })
          log.error('Task failed', { attempts: error.attempts }, error.lastError)
          throw failure
        }
        throw error
      }
    }

    return runtime.cache.run(fp, compute, {
      ttlMs: runtime.cacheTtlMs,
      onHit: () => log.debug('Cache hit'),
    })
  }

  return {
    name: definition.name,
    version: definition.version,
    fingerprint,
    invoke,
  }
}
