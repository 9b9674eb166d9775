import { describe, expect, it } from 'vitest'
import { asCount, asString, parseFlags } from '../parse-flags.js'

describe('parseFlags', () => {
  it('parses standard single-token values', () => {
    const flags = parseFlags(['--seeds', 'config/seeds.json', '--output', 'out/products.jsonl'])
    expect(flags.seeds).toBe('config/seeds.json')
    expect(flags.output).toBe('out/products.jsonl')
  })

  it('parses inline values and bare switches', () => {
    const flags = parseFlags(['--products=10', '--fresh'])
    expect(flags.products).toBe('10')
    expect(flags.fresh).toBe(true)
  })

  it('preserves multi-token flag values', () => {
    const flags = parseFlags(['--url-file', 'My', 'Urls.txt', '--fresh'])

    expect(flags['url-file']).toBe('My Urls.txt')
    expect(flags.fresh).toBe(true)
  })

  it('ignores non-flag positional tokens', () => {
    const flags = parseFlags(['sample', '--seed', 'https://shop.test/en/pets'])
    expect(flags).toEqual({ seed: 'https://shop.test/en/pets' })
  })
})

describe('flag values', () => {
  it('reads strings', () => {
    expect(asString('x')).toBe('x')
    expect(asString(true)).toBe('')
    expect(asString(undefined)).toBe('')
  })

  it('reads counts and flags malformed ones as NaN', () => {
    expect(asCount(undefined)).toBeUndefined()
    expect(asCount('10')).toBe(10)
    expect(asCount('0')).toBe(0)
    expect(asCount('ten')).toBeNaN()
    expect(asCount('-1')).toBeNaN()
    expect(asCount(true)).toBeNaN()
  })
})
