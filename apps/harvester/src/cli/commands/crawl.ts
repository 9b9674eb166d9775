import path from 'node:path'
import { loadSeeds } from '../../config/seeds.js'
import { runPipeline } from '../../pipeline/orchestrator.js'
import { executeRun, pipelineDeps, withRuntime, type CommandEnv } from './shared.js'

export interface CrawlCommandArgs {
  seedsFile?: string
  output?: string
  /** Drop cached task results before running */
  fresh?: boolean
}

export async function runCrawlCommand(args: CrawlCommandArgs, overrides: Partial<CommandEnv> = {}): Promise<number> {
  return executeRun('crawl', overrides, async env => {
    const seeds = await loadSeeds(args.seedsFile ? path.resolve(args.seedsFile) : env.config.seedsFile)
    env.logger.info('Starting crawl', { seeds: seeds.length, concurrency: env.config.concurrency })

    return withRuntime(env, async runtime => {
      if (args.fresh) {
        await runtime.cache.clear()
        env.logger.info('Cleared task cache')
      }
      return runPipeline(seeds, pipelineDeps(env, runtime, args.output))
    })
  })
}
