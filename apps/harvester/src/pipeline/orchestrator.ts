/**
 * Pipeline orchestrator
 *
 *   seeds ──▶ findCategoryPages ──flatten──▶ findProductPages ──flatten──▶ extractProductInfo ──▶ sink
 *
 * Each stage fans its task out over the whole input with bounded concurrency.
 * Results are joined in input order before the next stage starts. Sibling
 * units always finish; the failure policy decides what happens afterwards:
 * - abort: throw StageFailedError with every failure, nothing is written
 * - continue: drop the failed slots and report them in the result
 */

import type { ILogger } from '@shelfcrawl/logger'
import type { BrowserSession } from '../browser/session.js'
import { loggers } from '../config/logger.js'
import { fanOut, flatten } from '../crawl/fan-out.js'
import type { TaskRuntime } from '../crawl/task.js'
import { StageFailedError, toError, type UnitFailure } from '../errors.js'
import type { ProductRecord } from '../extract/types.js'
import type { SiteTasks } from '../sites/tops/index.js'
import { writeJsonl, type SinkOptions, type SinkResult } from './sink.js'

export type FailurePolicy = 'abort' | 'continue'

export type StageName = 'categories' | 'products' | 'extract'

export const DEFAULT_CONCURRENCY = 4

export interface PipelineLimits {
  /** Seeds fed to stage 1 */
  seedLimit?: number
  /** Category URLs fed to stage 2 */
  categoryLimit?: number
  /** Product URLs fed to stage 3 */
  productLimit?: number
}

export interface PipelineDeps {
  tasks: SiteTasks
  runtime: TaskRuntime
  output: SinkOptions
  concurrency?: number
  failurePolicy?: FailurePolicy
  limits?: PipelineLimits
  /** Shared by every extraction; caller-owned */
  session?: BrowserSession
  logger?: ILogger
}

export interface StageFailure extends UnitFailure {
  stage: StageName
}

export interface PipelineResult {
  categoryUrls: string[]
  productUrls: string[]
  records: ProductRecord[]
  failures: StageFailure[]
  output: SinkResult
}

function applyLimit<T>(items: T[], limit: number | undefined): T[] {
  return limit === undefined ? items : items.slice(0, Math.max(limit, 0))
}

interface StageResult<O> {
  values: O[]
  failures: StageFailure[]
}

async function runStage<O>(
  stage: StageName,
  inputs: readonly string[],
  worker: (input: string) => Promise<O>,
  deps: PipelineDeps,
  log: ILogger
): Promise<StageResult<O>> {
  const started = Date.now()
  log.info('Stage started', { stage, inputs: inputs.length })

  const outcomes = await fanOut(inputs, worker, { concurrency: deps.concurrency ?? DEFAULT_CONCURRENCY })

  const values: O[] = []
  const failures: StageFailure[] = []
  outcomes.forEach((outcome, index) => {
    if (outcome.ok) {
      values.push(outcome.value)
    } else {
      failures.push({ stage, index, input: inputs[index] ?? '', error: toError(outcome.error) })
    }
  })

  log.info('Stage finished', {
    stage,
    succeeded: values.length,
    failed: failures.length,
    durationMs: Date.now() - started,
  })

  if (failures.length > 0) {
    if ((deps.failurePolicy ?? 'abort') === 'abort') {
      throw new StageFailedError(stage, failures)
    }
    for (const failure of failures) {
      log.warn('Dropping failed input', { stage, input: failure.input }, failure.error)
    }
  }

  return { values, failures }
}

function extractStage(productUrls: readonly string[], deps: PipelineDeps, log: ILogger) {
  return runStage(
    'extract',
    productUrls,
    url => deps.tasks.extractProductInfo.invoke({ url, session: deps.session }, deps.runtime),
    deps,
    log
  )
}

/**
 * Crawl from department seeds to a JSONL file of product records.
 *
 * @throws StageFailedError under the 'abort' policy
 */
export async function runPipeline(seeds: readonly string[], deps: PipelineDeps): Promise<PipelineResult> {
  const log = deps.logger ?? loggers.pipeline
  const limits = deps.limits ?? {}

  const seedInputs = applyLimit([...seeds], limits.seedLimit)
  const categories = await runStage(
    'categories',
    seedInputs,
    url => deps.tasks.findCategoryPages.invoke({ url }, deps.runtime),
    deps,
    log
  )
  const categoryUrls = applyLimit(flatten(categories.values), limits.categoryLimit)
  log.info('Found category pages', { count: categoryUrls.length })

  const products = await runStage(
    'products',
    categoryUrls,
    url => deps.tasks.findProductPages.invoke({ url }, deps.runtime),
    deps,
    log
  )
  const productUrls = applyLimit(flatten(products.values), limits.productLimit)
  log.info('Found product pages', { count: productUrls.length })

  const extractions = await extractStage(productUrls, deps, log)
  const records = extractions.values.map(extraction => extraction.record)
  const output = await writeJsonl(records, deps.output)

  return {
    categoryUrls,
    productUrls,
    records,
    failures: [...categories.failures, ...products.failures, ...extractions.failures],
    output,
  }
}

/**
 * Extract a known list of product pages and write them out.
 *
 * @throws StageFailedError under the 'abort' policy
 */
export async function extractProducts(productUrls: readonly string[], deps: PipelineDeps): Promise<PipelineResult> {
  const log = deps.logger ?? loggers.pipeline
  const inputs = applyLimit([...productUrls], deps.limits?.productLimit)

  const extractions = await extractStage(inputs, deps, log)
  const records = extractions.values.map(extraction => extraction.record)
  const output = await writeJsonl(records, deps.output)

  return { categoryUrls: [], productUrls: inputs, records, failures: extractions.failures, output }
}
