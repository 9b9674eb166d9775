import '../config/env.js'
import { runCrawlCommand } from './commands/crawl.js'
import { runExtractCommand } from './commands/extract.js'
import { runSampleCommand } from './commands/sample.js'
import { EXIT_USAGE } from './commands/shared.js'
import { asCount, asString, parseFlags } from './parse-flags.js'

function printHelp(): void {
  console.log('Shelfcrawl harvester')
  console.log('')
  console.log('Commands:')
  console.log('  crawl [--seeds <path>] [--output <file>] [--fresh]')
  console.log('  sample [--seed <url>] [--categories 1] [--products 10] [--output <file>]')
  console.log('  extract --url-file <path> [--output <file>]')
  console.log('')
  console.log('Exit codes: 0 success, 1 run failure, 2 usage or configuration error')
}

async function main(): Promise<number> {
  const [, , command, ...rest] = process.argv
  if (!command || command === '--help' || command === '-h') {
    printHelp()
    return 0
  }

  const flags = parseFlags(rest)
  if (flags.help === true || flags.h === true) {
    printHelp()
    return 0
  }

  switch (command) {
    case 'crawl':
      return runCrawlCommand({
        seedsFile: asString(flags.seeds) || undefined,
        output: asString(flags.output) || undefined,
        fresh: flags.fresh === true,
      })
    case 'sample':
      return runSampleCommand({
        seed: asString(flags.seed) || undefined,
        categories: asCount(flags.categories),
        products: asCount(flags.products),
        output: asString(flags.output) || undefined,
      })
    case 'extract':
      return runExtractCommand({
        urlFile: asString(flags['url-file']),
        output: asString(flags.output) || undefined,
      })
    default:
      console.error(`Unknown command: ${command}`)
      printHelp()
      return EXIT_USAGE
  }
}

main().then(
  exitCode => {
    process.exitCode = exitCode
  },
  (error: unknown) => {
    console.error(error instanceof Error ? error.message : String(error))
    process.exitCode = 1
  }
)
