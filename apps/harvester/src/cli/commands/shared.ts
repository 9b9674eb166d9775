import path from 'node:path'
import type { ILogger } from '@shelfcrawl/logger'
import type { SessionFactory } from '../../browser/session.js'
import { openBrowserSession } from '../../browser/playwright.js'
import { loadCrawlConfig, type CrawlConfig } from '../../config/crawl.js'
import { loggers } from '../../config/logger.js'
import type { TaskRuntime } from '../../crawl/task.js'
import { classifyError, ConfigurationError } from '../../errors.js'
import type { PipelineDeps, PipelineResult } from '../../pipeline/orchestrator.js'
import { createCrawlRuntime, type CrawlRuntime } from '../../pipeline/runtime.js'
import type { SinkOptions } from '../../pipeline/sink.js'
import { createTopsTasks } from '../../sites/tops/index.js'

export const EXIT_OK = 0
export const EXIT_RUN_FAILED = 1
export const EXIT_USAGE = 2

/** Everything a command reaches outside its arguments */
export interface CommandEnv {
  config: CrawlConfig
  openSession: SessionFactory
  createRuntime: (config: CrawlConfig) => CrawlRuntime
  logger: ILogger
}

function resolveEnv(overrides: Partial<CommandEnv>): CommandEnv {
  const config = overrides.config ?? loadCrawlConfig()
  return {
    config,
    openSession: overrides.openSession ?? (() => openBrowserSession({ headless: config.headless })),
    createRuntime: overrides.createRuntime ?? (cfg => createCrawlRuntime(cfg)),
    logger: overrides.logger ?? loggers.cli,
  }
}

/** `--output <file>` overrides the configured directory and default file name */
export function sinkOptions(config: CrawlConfig, output: string | undefined): SinkOptions {
  if (!output) {
    return { outputDir: config.outputDir }
  }
  const target = path.resolve(output)
  return { outputDir: path.dirname(target), fileName: path.basename(target) }
}

export function pipelineDeps(env: CommandEnv, runtime: TaskRuntime, output: string | undefined): PipelineDeps {
  return {
    tasks: createTopsTasks({ openSession: env.openSession }),
    runtime,
    output: sinkOptions(env.config, output),
    concurrency: env.config.concurrency,
    failurePolicy: env.config.failurePolicy,
  }
}

/**
 * Build the run's runtime, hand it to `fn`, and release it afterwards.
 */
export async function withRuntime<T>(env: CommandEnv, fn: (runtime: TaskRuntime) => Promise<T>): Promise<T> {
  const crawl = env.createRuntime(env.config)
  try {
    return await fn(crawl.runtime)
  } finally {
    await crawl.shutdown().catch((error: unknown) => {
      env.logger.warn('Failed to release run resources', {}, error)
    })
  }
}

/**
 * Run a pipeline and map the outcome to an exit code.
 */
export async function executeRun(
  command: string,
  overrides: Partial<CommandEnv>,
  fn: (env: CommandEnv) => Promise<PipelineResult>
): Promise<number> {
  const log = overrides.logger ?? loggers.cli
  const started = Date.now()

  try {
    const env = resolveEnv(overrides)
    const result = await fn(env)

    log.info('Run complete', {
      command,
      categories: result.categoryUrls.length,
      products: result.productUrls.length,
      records: result.output.count,
      dropped: result.failures.length,
      output: result.output.path,
      durationMs: Date.now() - started,
    })
    return EXIT_OK
  } catch (error) {
    const classified = classifyError(error)
    log.error(
      'Run failed',
      { command, category: classified.category, code: classified.code, ...classified.details },
      error
    )
    return error instanceof ConfigurationError ? EXIT_USAGE : EXIT_RUN_FAILED
  }
}
