/**
 * In-process sliding-window rate limiter
 *
 * Admissions per resource name are served in arrival order: each acquire()
 * waits for the previous caller's admission before computing its own, and
 * waits by sleeping until the oldest admission leaves the window.
 */

import type { ILogger } from '@shelfcrawl/logger'
import { loggers } from '../config/logger.js'
import type { Clock, RateLimiter, RateLimitPolicy, Sleep } from './types.js'
import { DEFAULT_RATE_LIMIT_POLICY, realSleep, systemClock } from './types.js'

export interface SlidingWindowRateLimiterOptions {
  /** Policies per resource name */
  policies?: Record<string, RateLimitPolicy>

  /** Policy for names without an entry in `policies` */
  defaultPolicy?: RateLimitPolicy

  now?: Clock
  sleep?: Sleep
  logger?: ILogger
}

export class SlidingWindowRateLimiter implements RateLimiter {
  private readonly policies: Map<string, RateLimitPolicy>
  private readonly defaultPolicy: RateLimitPolicy
  private readonly now: Clock
  private readonly sleep: Sleep
  private readonly log: ILogger

  /** Admission timestamps inside the current window, oldest first */
  private readonly windows = new Map<string, number[]>()

  /** Tail of the FIFO admission chain per name */
  private readonly queues = new Map<string, Promise<void>>()

  constructor(options: SlidingWindowRateLimiterOptions = {}) {
    this.policies = new Map(Object.entries(options.policies ?? {}))
    this.defaultPolicy = options.defaultPolicy ?? DEFAULT_RATE_LIMIT_POLICY
    this.now = options.now ?? systemClock
    this.sleep = options.sleep ?? realSleep
    this.log = options.logger ?? loggers.rateLimit

    for (const [name, policy] of this.policies) {
      assertValidPolicy(name, policy)
    }
    assertValidPolicy('default', this.defaultPolicy)
  }

  getPolicy(name: string): RateLimitPolicy {
    return this.policies.get(name) ?? this.defaultPolicy
  }

  acquire(name: string): Promise<void> {
    const previous = this.queues.get(name) ?? Promise.resolve()
    const admission = previous.then(() => this.admit(name))
    // The chain must survive a rejected admission so later callers still queue
    this.queues.set(
      name,
      admission.catch((error: unknown) => {
        this.log.warn('Admission failed', { name }, error)
      })
    )
    return admission
  }

  private async admit(name: string): Promise<void> {
    const policy = this.getPolicy(name)
    let admissions = this.windows.get(name)
    if (!admissions) {
      admissions = []
      this.windows.set(name, admissions)
    }

    for (;;) {
      const now = this.now()
      while (admissions.length > 0 && (admissions[0] ?? now) <= now - policy.intervalMs) {
        admissions.shift()
      }

      if (admissions.length < policy.limit) {
        admissions.push(now)
        return
      }

      const oldest = admissions[0] ?? now
      const waitMs = Math.max(oldest + policy.intervalMs - now, 1)
      this.log.debug('Waiting for slot', { name, waitMs })
      await this.sleep(waitMs)
    }
  }
}

function assertValidPolicy(name: string, policy: RateLimitPolicy): void {
  if (!Number.isInteger(policy.limit) || policy.limit < 1) {
    throw new RangeError(`Rate limit for '${name}' must be a positive integer, got ${policy.limit}`)
  }
  if (!Number.isFinite(policy.intervalMs) || policy.intervalMs <= 0) {
    throw new RangeError(`Rate interval for '${name}' must be positive, got ${policy.intervalMs}`)
  }
}
