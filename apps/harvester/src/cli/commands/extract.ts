import path from 'node:path'
import { withSession } from '../../browser/session.js'
import { loadUrlList } from '../../config/seeds.js'
import { extractProducts } from '../../pipeline/orchestrator.js'
import { EXIT_USAGE, executeRun, pipelineDeps, withRuntime, type CommandEnv } from './shared.js'

export interface ExtractCommandArgs {
  urlFile: string
  output?: string
}

/**
 * Re-extract a known list of product pages. All pages share one browser.
 */
export async function runExtractCommand(args: ExtractCommandArgs, overrides: Partial<CommandEnv> = {}): Promise<number> {
  if (!args.urlFile) {
    console.error('Missing --url-file <path>')
    return EXIT_USAGE
  }

  return executeRun('extract', overrides, async env => {
    const urls = await loadUrlList(path.resolve(args.urlFile))
    env.logger.info('Starting extraction', { urls: urls.length })

    return withRuntime(env, runtime =>
      withSession(
        env.openSession,
        session => extractProducts(urls, { ...pipelineDeps(env, runtime, args.output), session }),
        undefined,
        env.logger
      )
    )
  })
}
