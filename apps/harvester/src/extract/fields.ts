/**
 * Field rules for product pages
 *
 * Each rule turns raw page text into a FieldResult:
 * - ok: the value
 * - soft: the field is optional and absent, recorded as null
 * - hard: a mandatory field is missing or malformed, the extraction fails
 *
 * Rules are pure; reading the page happens in the site module.
 */

import { formatEan13 } from '@shelfcrawl/barcode'

export type FieldResult<T> =
  | { kind: 'ok'; value: T }
  | { kind: 'soft'; reason: string }
  | { kind: 'hard'; reason: string }

export const ok = <T>(value: T): FieldResult<T> => ({ kind: 'ok', value })
export const soft = <T>(reason: string): FieldResult<T> => ({ kind: 'soft', reason })
export const hard = <T>(reason: string): FieldResult<T> => ({ kind: 'hard', reason })

export interface NameQuantity {
  name: string
  quantity: string | null
}

/** Whitespace, then a count and a one- or two-letter unit ending in a dot: "500G.", "1 L." */
/** Plain decimal notation, optionally signed; no exponent, hex or binary */
const DECIMAL = /^-?(\d+\.?\d*|\.\d+)$/

const QUANTITY_SUFFIX = /\s(\d+\s?[a-zA-Z]{1,2}\.)$/

/** Leading "(Promo)"-style qualifier */
const LEADING_QUALIFIER = /^\([^)]*\)\s*/

export function splitNameQuantity(raw: string | null): FieldResult<NameQuantity> {
  const trimmed = raw?.trim() ?? ''
  if (trimmed === '') {
    return hard('missing')
  }

  const match = QUANTITY_SUFFIX.exec(trimmed)
  const suffix = match?.[1]
  if (!match || suffix === undefined) {
    return ok({ name: trimmed, quantity: null })
  }

  const name = trimmed
    .slice(0, match.index)
    .split(/\s+/)
    .filter(token => token !== '')
    .join(' ')
    .replace(LEADING_QUALIFIER, '')

  if (name === '') {
    return hard(`no name left after removing quantity from "${trimmed}"`)
  }

  return ok({ name, quantity: suffix.replace(/[^a-zA-Z0-9]/g, '') })
}

/**
 * Last whitespace-separated token of the sku line, kept only when it is a
 * valid EAN-13. Never fails.
 */
export function parseBarcode(raw: string | null): FieldResult<string | null> {
  const tokens = raw?.trim().split(/\s+/) ?? []
  const candidate = tokens[tokens.length - 1]
  return ok(candidate ? formatEan13(candidate) : null)
}

export function parsePrice(raw: string | null): FieldResult<number> {
  const text = raw?.trim().replace(/,/g, '') ?? ''
  if (text === '') {
    return hard('missing')
  }

  const price = DECIMAL.test(text) ? Number(text) : Number.NaN
  if (!Number.isFinite(price)) {
    return hard(`not a number: "${raw?.trim()}"`)
  }
  if (price < 0) {
    return hard(`negative: ${price}`)
  }
  return ok(price)
}

/** Collapse runs of spaces and tabs; newlines are kept */
export function normalizeDetails(raw: string | null): FieldResult<string> {
  if (raw === null) {
    return soft('absent')
  }
  const text = raw.replace(/[ \t]+/g, ' ').trim()
  return text === '' ? soft('empty') : ok(text)
}

export function normalizeImages(values: ReadonlyArray<string | null>): string[] {
  return values.filter((src): src is string => src !== null && src !== '')
}

export function normalizeLabels(values: ReadonlyArray<string | null>): string[] {
  return values.map(alt => alt?.trim() ?? '').filter(alt => alt !== '')
}
