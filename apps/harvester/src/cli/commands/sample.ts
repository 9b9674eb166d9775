import { runPipeline } from '../../pipeline/orchestrator.js'
import { EXIT_USAGE, executeRun, pipelineDeps, withRuntime, type CommandEnv } from './shared.js'

export const DEFAULT_SAMPLE_SEED = 'https://www.tops.co.th/en/petnme'
export const DEFAULT_SAMPLE_CATEGORIES = 1
export const DEFAULT_SAMPLE_PRODUCTS = 10

export interface SampleCommandArgs {
  seed?: string
  categories?: number
  products?: number
  output?: string
}

function isCount(value: number): boolean {
  return Number.isInteger(value) && value >= 0
}

/**
 * One seed, the first few categories and the first few products: a quick
 * end-to-end check against the live site.
 */
export async function runSampleCommand(args: SampleCommandArgs, overrides: Partial<CommandEnv> = {}): Promise<number> {
  const categories = args.categories ?? DEFAULT_SAMPLE_CATEGORIES
  const products = args.products ?? DEFAULT_SAMPLE_PRODUCTS
  if (!isCount(categories) || !isCount(products)) {
    console.error('--categories and --products take a non-negative integer')
    return EXIT_USAGE
  }

  const seed = args.seed || DEFAULT_SAMPLE_SEED

  return executeRun('sample', overrides, async env => {
    env.logger.info('Starting sample run', { seed, categories, products })

    return withRuntime(env, runtime =>
      runPipeline([seed], {
        ...pipelineDeps(env, runtime, args.output),
        limits: { categoryLimit: categories, productLimit: products },
      })
    )
  })
}
