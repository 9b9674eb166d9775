/**
 * Crawl orchestration core types
 *
 * Rate limiting, fingerprinted caching, retry and stabilization contracts
 * shared by every stage of the pipeline.
 */

// ═══════════════════════════════════════════════════════════════════════════════
// Time
// ═══════════════════════════════════════════════════════════════════════════════

/** Suspend for `ms`. Injected so tests never wait on real timers. */
export type Sleep = (ms: number) => Promise<void>

/** Epoch milliseconds */
export type Clock = () => number

export const realSleep: Sleep = ms => new Promise(resolve => setTimeout(resolve, ms))

export const systemClock: Clock = () => Date.now()

// ═══════════════════════════════════════════════════════════════════════════════
// Rate Limiter
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * At most `limit` admissions per sliding window of `intervalMs`.
 */
export interface RateLimitPolicy {
  limit: number
  intervalMs: number
}

/**
 * Gate in front of one named external resource.
 *
 * Every fetch-issuing task in a run shares one instance and one resource name,
 * so the policy bounds the whole run rather than a single stage.
 */
export interface RateLimiter {
  /** Suspend until the named resource admits one more operation. */
  acquire(name: string): Promise<void>

  /** Policy in effect for `name` */
  getPolicy(name: string): RateLimitPolicy
}

/** Two page loads per second */
export const DEFAULT_RATE_LIMIT_POLICY: RateLimitPolicy = {
  limit: 2,
  intervalMs: 1000,
}

// ═══════════════════════════════════════════════════════════════════════════════
// Cache
// ═══════════════════════════════════════════════════════════════════════════════

export interface CacheEntry<T = unknown> {
  fingerprint: string
  value: T
  /** Epoch ms */
  createdAt: number
  /** Epoch ms; the entry is a miss from this instant on */
  expiresAt: number
}

/**
 * Backing storage for task results. Stores never interpret expiry beyond
 * optional housekeeping; TaskCache decides what is fresh.
 */
export interface CacheStore {
  get(fingerprint: string): Promise<CacheEntry | null>
  set(entry: CacheEntry): Promise<void>
  delete(fingerprint: string): Promise<void>
  clear(): Promise<void>
}

export interface LockHandle {
  key: string
  token: string
}

/**
 * Cross-process mutual exclusion per fingerprint. Optional: without one, the
 * at-most-one-computation guarantee holds within a single process.
 */
export interface FingerprintLock {
  /** Returns null when another owner holds the lock */
  tryAcquire(fingerprint: string): Promise<LockHandle | null>
  release(handle: LockHandle): Promise<void>
}

export type InvocationStatus = 'pending' | 'done' | 'failed'

/** Transient record of one in-flight computation */
export interface TaskInvocation<T = unknown> {
  fingerprint: string
  status: InvocationStatus
  result: Promise<T>
}

/** One day */
export const DEFAULT_CACHE_TTL_MS = 24 * 60 * 60 * 1000

// ═══════════════════════════════════════════════════════════════════════════════
// Retry
// ═══════════════════════════════════════════════════════════════════════════════

export interface RetryPolicy {
  /** Automatic retries after the first attempt */
  retries: number
  /** Delay before each retry */
  delayMs: number
}

/** One automatic retry on any failure */
export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  retries: 1,
  delayMs: 1000,
}

// ═══════════════════════════════════════════════════════════════════════════════
// Stabilization
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * A collection that grows lazily when triggered (infinite scroll).
 */
export interface GrowthSource {
  /** Issue one grow trigger (a scroll step) */
  grow(): Promise<void>
  /** Current realized size */
  sample(): Promise<number>
}

export interface StabilizationConfig {
  /** Consecutive equal samples that count as a plateau */
  ringSize: number
  /** Grow triggers issued per round */
  triggersPerRound: number
  /** Wait after each trigger */
  stepDelayMs: number
  /** Wait after each round, before sampling */
  settleDelayMs: number
  /** Budget for accumulated waits; reaching it ends the loop */
  maxWaitMs: number
  /** Wait before the first sample; not counted against the budget */
  initialDelayMs: number
}

export const DEFAULT_STABILIZATION_CONFIG: StabilizationConfig = {
  ringSize: 3,
  triggersPerRound: 3,
  stepDelayMs: 500,
  settleDelayMs: 2000,
  maxWaitMs: 300_000,
  initialDelayMs: 3000,
}

export type StabilizationReason = 'plateau' | 'timeout'

export interface StabilizationResult {
  size: number
  rounds: number
  waitedMs: number
  reason: StabilizationReason
}
