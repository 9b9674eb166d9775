import { mkdtemp, readFile, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, it, expect } from 'vitest'
import { silentLogger } from '@shelfcrawl/logger'
import type { ProductRecord } from '../../extract/types.js'
import { toJsonl, writeJsonl } from '../sink.js'

const milk: ProductRecord = {
  name: 'Fresh Milk',
  quantity: '1L',
  price: 52,
  images: [],
  barcode: null,
  labels: ['Organic'],
  store_url: 'https://shop.test/en/fresh-milk',
}

describe('toJsonl', () => {
  it('writes one newline-terminated JSON object per record', () => {
    expect(toJsonl([milk])).toBe(
      '{"name":"Fresh Milk","quantity":"1L","price":52,"images":[],"barcode":null,"labels":["Organic"],"store_url":"https://shop.test/en/fresh-milk"}\n'
    )
    expect(toJsonl([])).toBe('')
  })
})

describe('writeJsonl', () => {
  let root: string

  beforeEach(async () => {
    root = await mkdtemp(path.join(tmpdir(), 'shelfcrawl-sink-'))
  })

  afterEach(async () => {
    await rm(root, { recursive: true, force: true })
  })

  it('creates the output directory and overwrites an existing file', async () => {
    const outputDir = path.join(root, 'nested', 'data')

    await writeJsonl([milk, milk], { outputDir, logger: silentLogger })
    const result = await writeJsonl([milk], { outputDir, logger: silentLogger })

    expect(result).toEqual({ path: path.join(outputDir, 'products.jsonl'), count: 1 })
    expect(await readFile(result.path, 'utf8')).toBe(toJsonl([milk]))
  })
})
