/**
 * Task fingerprints
 *
 * fingerprint = sha256(canonical JSON of { task, inputs })
 *
 * `task` is the task name plus its version, so bumping a task's version
 * invalidates everything it cached. `inputs` are the task's named arguments
 * minus its exclusion list (shared handles such as a browser session must not
 * affect cache hits). Canonical JSON sorts object keys recursively and drops
 * undefined values, so argument order and omitted optionals do not matter.
 */

import { createHash } from 'node:crypto'

export interface TaskIdentity {
  name: string
  version: string
}

/** Characters of the fingerprint shown in logs */
export const SHORT_FINGERPRINT_LENGTH = 12

export function taskKey(identity: TaskIdentity): string {
  return `${identity.name}@${identity.version}`
}

export function computeFingerprint(
  identity: TaskIdentity,
  args: object,
  exclude: readonly string[] = []
): string {
  const excluded = new Set(exclude)
  const inputs: Record<string, unknown> = {}
  for (const [key, value] of Object.entries(args)) {
    if (!excluded.has(key)) {
      inputs[key] = value
    }
  }

  const payload = canonicalJson({ task: taskKey(identity), inputs })
  return createHash('sha256').update(payload).digest('hex')
}

export function shortFingerprint(fingerprint: string): string {
  return fingerprint.slice(0, SHORT_FINGERPRINT_LENGTH)
}

/**
 * Deterministic JSON encoding.
 * @throws TypeError for values that cannot be part of a fingerprint
 */
export function canonicalJson(value: unknown): string {
  return encode(value, new Set())
}

function encode(value: unknown, seen: Set<object>): string {
  if (value === null) return 'null'

  switch (typeof value) {
    case 'string':
      return JSON.stringify(value)
    case 'number':
      return Number.isFinite(value) ? JSON.stringify(value) : JSON.stringify(String(value))
    case 'boolean':
      return value ? 'true' : 'false'
    case 'bigint':
      return JSON.stringify(`${value.toString()}n`)
    case 'undefined':
      return 'null'
    case 'function':
    case 'symbol':
      throw new TypeError(`Cannot fingerprint a ${typeof value}; add the argument to the exclusion list`)
  }

  if (typeof value !== 'object') {
    throw new TypeError(`Cannot fingerprint value of type ${typeof value}`)
  }

  if (seen.has(value)) {
    throw new TypeError('Cannot fingerprint a circular structure; add the argument to the exclusion list')
  }
  seen.add(value)

  try {
    if (value instanceof Date) {
      return JSON.stringify(value.toISOString())
    }

    if (Array.isArray(value)) {
      return `[${value.map(item => encode(item, seen)).join(',')}]`
    }

    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))

    return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${encode(v, seen)}`).join(',')}}`
  } finally {
    seen.delete(value)
  }
}
