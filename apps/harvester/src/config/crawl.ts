/**
 * Crawl configuration from environment variables
 *
 * Every variable is optional; defaults reproduce a polite single-process run
 * against the Tops storefront.
 */

import path from 'node:path'
import { fileURLToPath } from 'node:url'
import { z } from 'zod'
import { DEFAULT_CACHE_TTL_MS, DEFAULT_RATE_LIMIT_POLICY, type RateLimitPolicy } from '../crawl/types.js'
import { ConfigurationError } from '../errors.js'

/** apps/harvester */
export const HARVESTER_ROOT = fileURLToPath(new URL('../../', import.meta.url))

export const DEFAULT_SEEDS_FILE = path.join(HARVESTER_ROOT, 'config', 'seeds.json')
export const DEFAULT_OUTPUT_DIR = path.join(HARVESTER_ROOT, 'data')
export const DEFAULT_RATE_LIMIT_NAME = 'tops_website'

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback)

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('true')
  .transform(value => value === 'true' || value === '1')

const envSchema = z.object({
  SHELFCRAWL_OUTPUT_DIR: z.string().trim().min(1).optional(),
  SHELFCRAWL_SEEDS_FILE: z.string().trim().min(1).optional(),
  SHELFCRAWL_RATE_LIMIT_NAME: z.string().trim().min(1).default(DEFAULT_RATE_LIMIT_NAME),
  SHELFCRAWL_RATE_LIMIT: positiveInt(DEFAULT_RATE_LIMIT_POLICY.limit),
  SHELFCRAWL_RATE_INTERVAL_MS: positiveInt(DEFAULT_RATE_LIMIT_POLICY.intervalMs),
  SHELFCRAWL_CONCURRENCY: positiveInt(4),
  SHELFCRAWL_CACHE_TTL_MS: positiveInt(DEFAULT_CACHE_TTL_MS),
  SHELFCRAWL_CACHE_BACKEND: z.enum(['memory', 'redis']).default('memory'),
  SHELFCRAWL_FAILURE_POLICY: z.enum(['abort', 'continue']).default('abort'),
  SHELFCRAWL_HEADLESS: booleanFlag,
})

export type CacheBackend = 'memory' | 'redis'

export interface CrawlConfig {
  outputDir: string
  seedsFile: string
  rateLimitName: string
  rateLimit: RateLimitPolicy
  concurrency: number
  cacheTtlMs: number
  /** 'redis' also moves the rate limiter into Redis */
  cacheBackend: CacheBackend
  failurePolicy: 'abort' | 'continue'
  headless: boolean
}

/**
 * @throws ConfigurationError listing every invalid variable
 */
export function loadCrawlConfig(env: NodeJS.ProcessEnv = process.env): CrawlConfig {
  // Blank values mean "unset"
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ''))

  const parsed = envSchema.safeParse(present)
  if (!parsed.success) {
    throw new ConfigurationError(
      'Invalid crawl configuration',
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
      { cause: parsed.error }
    )
  }

  const vars = parsed.data
  return {
    outputDir: path.resolve(vars.SHELFCRAWL_OUTPUT_DIR ?? DEFAULT_OUTPUT_DIR),
    seedsFile: path.resolve(vars.SHELFCRAWL_SEEDS_FILE ?? DEFAULT_SEEDS_FILE),
    rateLimitName: vars.SHELFCRAWL_RATE_LIMIT_NAME,
    rateLimit: { limit: vars.SHELFCRAWL_RATE_LIMIT, intervalMs: vars.SHELFCRAWL_RATE_INTERVAL_MS },
    concurrency: vars.SHELFCRAWL_CONCURRENCY,
    cacheTtlMs: vars.SHELFCRAWL_CACHE_TTL_MS,
    cacheBackend: vars.SHELFCRAWL_CACHE_BACKEND,
    failurePolicy: vars.SHELFCRAWL_FAILURE_POLICY,
    headless: vars.SHELFCRAWL_HEADLESS,
  }
}
