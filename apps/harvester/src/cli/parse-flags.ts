export type Flags = Record<string, string | boolean>

/**
 * `--key value`, `--key=value` and bare `--switch`. Consecutive non-flag
 * tokens after a key are joined with spaces; tokens before the first flag are
 * ignored.
 */
export function parseFlags(argv: readonly string[]): Flags {
  const flags: Flags = {}

  let i = 0
  while (i < argv.length) {
    const token = argv[i] ?? ''
    i++
    if (!token.startsWith('--')) {
      continue
    }

    const body = token.slice(2)
    const eq = body.indexOf('=')
    if (eq > 0) {
      flags[body.slice(0, eq)] = body.slice(eq + 1)
      continue
    }

    const valueTokens: string[] = []
    while (i < argv.length && !(argv[i] ?? '').startsWith('--')) {
      valueTokens.push(argv[i] ?? '')
      i++
    }

    flags[body] = valueTokens.length > 0 ? valueTokens.join(' ') : true
  }

  return flags
}

export function asString(value: string | boolean | undefined): string {
  return typeof value === 'string' ? value : ''
}

/**
 * Non-negative integer flag. Undefined when absent; NaN when present but not
 * an integer, so callers can report a usage error.
 */
export function asCount(value: string | boolean | undefined): number | undefined {
  if (value === undefined) {
    return undefined
  }
  if (typeof value !== 'string' || !/^\d+$/.test(value)) {
    return Number.NaN
  }
  return Number.parseInt(value, 10)
}
