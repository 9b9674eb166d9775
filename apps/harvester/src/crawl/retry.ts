import type { RetryPolicy, Sleep } from './types.js'
import { DEFAULT_RETRY_POLICY, realSleep } from './types.js'

export interface RetryOptions {
  sleep?: Sleep
  /** Called before each retry with the 1-based attempt that just failed */
  onRetry?: (attempt: number, error: unknown) => void
}

export class RetriesExhaustedError extends Error {
  constructor(
    readonly attempts: number,
    readonly lastError: unknown
  ) {
    super(`Gave up after ${attempts} attempt(s)`, { cause: lastError })
    this.name = 'RetriesExhaustedError'
  }
}

/**
 * Run `fn` until it resolves or `policy.retries` retries have failed.
 * `fn` receives the 1-based attempt number.
 *
 * @throws RetriesExhaustedError wrapping the last failure
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  options: RetryOptions = {}
): Promise<T> {
  const sleep = options.sleep ?? realSleep
  const maxAttempts = Math.max(policy.retries, 0) + 1

  let lastError: unknown
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn(attempt)
    } catch (error) {
      lastError = error
      if (attempt < maxAttempts) {
        options.onRetry?.(attempt, error)
        if (policy.delayMs > 0) {
          await sleep(policy.delayMs)
        }
      }
    }
  }

  throw new RetriesExhaustedError(maxAttempts, lastError)
}
