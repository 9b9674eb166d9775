import { mkdir, writeFile } from 'node:fs/promises'
import path from 'node:path'
import type { ILogger } from '@shelfcrawl/logger'
import { loggers } from '../config/logger.js'
import type { ProductRecord } from '../extract/types.js'

export const DEFAULT_OUTPUT_FILE = 'products.jsonl'

export interface SinkOptions {
  outputDir: string
  fileName?: string
  logger?: ILogger
}

export interface SinkResult {
  path: string
  count: number
}

export function toJsonl(records: readonly ProductRecord[]): string {
  return records.map(record => `${JSON.stringify(record)}\n`).join('')
}

/**
 * Replace `<outputDir>/<fileName>` with one JSON line per record.
 */
export async function writeJsonl(records: readonly ProductRecord[], options: SinkOptions): Promise<SinkResult> {
  const log = options.logger ?? loggers.sink
  const target = path.resolve(options.outputDir, options.fileName ?? DEFAULT_OUTPUT_FILE)

  await mkdir(path.dirname(target), { recursive: true })
  await writeFile(target, toJsonl(records), 'utf8')

  log.info('Wrote records', { path: target, count: records.length })
  return { path: target, count: records.length }
}
