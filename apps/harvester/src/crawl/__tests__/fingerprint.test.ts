import { describe, it, expect } from 'vitest'
import { canonicalJson, computeFingerprint, shortFingerprint, taskKey } from '../fingerprint.js'

const task = { name: 'extract-product', version: '1' }

describe('canonicalJson', () => {
  it('sorts keys recursively and drops undefined values', () => {
    expect(canonicalJson({ b: 1, a: { d: [1, 'x'], c: undefined, b: null } })).toBe('{"a":{"b":null,"d":[1,"x"]},"b":1}')
  })

  it('encodes dates and bigints as strings', () => {
    expect(canonicalJson({ at: new Date('2024-01-02T03:04:05.000Z'), n: 10n })).toBe(
      '{"at":"2024-01-02T03:04:05.000Z","n":"10n"}'
    )
  })

  it('rejects functions and circular structures', () => {
    const circular: Record<string, unknown> = {}
    circular.self = circular

    expect(() => canonicalJson({ fn: () => 1 })).toThrow(TypeError)
    expect(() => canonicalJson(circular)).toThrow(/circular/)
  })

  it('allows the same object twice when it is not a cycle', () => {
    const shared = { x: 1 }
    expect(canonicalJson([shared, shared])).toBe('[{"x":1},{"x":1}]')
  })
})

describe('computeFingerprint', () => {
  it('is a sha256 hex digest independent of argument order', () => {
    const a = computeFingerprint(task, { url: 'https://shop.test/p/1', limit: 3 })
    const b = computeFingerprint(task, { limit: 3, url: 'https://shop.test/p/1' })

    expect(a).toMatch(/^[0-9a-f]{64}$/)
    expect(a).toBe(b)
  })

  it('ignores excluded arguments', () => {
    const withSession = computeFingerprint(task, { url: 'https://shop.test/p/1', session: { id: 1 } }, ['session'])
    const withOther = computeFingerprint(task, { url: 'https://shop.test/p/1', session: { id: 2 } }, ['session'])
    const without = computeFingerprint(task, { url: 'https://shop.test/p/1' })

    expect(withSession).toBe(withOther)
    expect(withSession).toBe(without)
  })

  it('changes with the task version and with inputs', () => {
    const base = computeFingerprint(task, { url: 'https://shop.test/p/1' })

    expect(computeFingerprint({ ...task, version: '2' }, { url: 'https://shop.test/p/1' })).not.toBe(base)
    expect(computeFingerprint(task, { url: 'https://shop.test/p/2' })).not.toBe(base)
  })

  it('exposes the task key and a short form for logs', () => {
    const fp = computeFingerprint(task, {})

    expect(taskKey(task)).toBe('extract-product@1')
    expect(shortFingerprint(fp)).toBe(fp.slice(0, 12))
  })
})
