/**
 * EAN-13 validation
 *
 * An EAN-13 is exactly 13 ASCII digits. The last digit is a check digit over
 * the first twelve, weighted 1,3,1,3,... from the left:
 *
 *   check = (10 - (Σ digit[i] * weight[i]) mod 10) mod 10
 *
 * Leading zeros are significant and never stripped.
 */

export const EAN13_LENGTH = 13

/** Prefix used when a validated code is written to a record */
export const EAN13_LABEL = 'EAN-13'

const DIGITS_ONLY = /^[0-9]+$/

/**
 * Compute the check digit for the first 12 digits of a code.
 * Returns null unless given exactly 12 digits.
 */
export function computeEan13CheckDigit(payload: string): number | null {
  if (payload.length !== EAN13_LENGTH - 1 || !DIGITS_ONLY.test(payload)) {
    return null
  }

  let sum = 0
  for (let i = 0; i < payload.length; i++) {
    const weight = i % 2 === 0 ? 1 : 3
    sum += Number(payload[i]) * weight
  }

  return (10 - (sum % 10)) % 10
}

/**
 * True iff `code` is 13 digits and its last digit matches the computed check digit.
 * Never throws.
 */
export function isValidEan13(code: string): boolean {
  if (code.length !== EAN13_LENGTH || !DIGITS_ONLY.test(code)) {
    return false
  }

  const expected = computeEan13CheckDigit(code.slice(0, EAN13_LENGTH - 1))
  return expected !== null && expected === Number(code[EAN13_LENGTH - 1])
}

/**
 * Format a code as `"EAN-13 <code>"`, or null if it does not validate.
 */
export function formatEan13(code: string): string | null {
  return isValidEan13(code) ? `${EAN13_LABEL} ${code}` : null
}
