/**
 * Harvester error types and classification
 *
 * Every failure that leaves a task is one of the classes below. classifyError()
 * maps anything thrown to a category/code pair for structured logs.
 */

import { ZodError } from 'zod'

export type ErrorCategory =
  | 'validation' // Page content did not satisfy a mandatory field rule
  | 'external' // Browser/navigation failure
  | 'timeout' // An element did not appear in time
  | 'configuration' // Bad env or seed file
  | 'task' // Terminal task failure after retries
  | 'internal'

export const ERROR_CODES = {
  FIELD_EXTRACTION_FAILED: 'FIELD_EXTRACTION_FAILED',
  NAVIGATION_FAILED: 'NAVIGATION_FAILED',
  ELEMENT_TIMEOUT: 'ELEMENT_TIMEOUT',
  INVALID_CONFIGURATION: 'INVALID_CONFIGURATION',
  TASK_FAILED: 'TASK_FAILED',
  STAGE_FAILED: 'STAGE_FAILED',
  UNEXPECTED_ERROR: 'UNEXPECTED_ERROR',
} as const

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES]

export interface ClassifiedError {
  category: ErrorCategory
  code: ErrorCode
  message: string
  isRetryable: boolean
  details?: Record<string, unknown>
}

export interface FieldFailure {
  field: string
  reason: string
}

/**
 * A mandatory field could not be produced from the page.
 */
export class ExtractionError extends Error {
  readonly category = 'validation' as const
  readonly code = ERROR_CODES.FIELD_EXTRACTION_FAILED

  constructor(
    readonly url: string,
    readonly failures: readonly FieldFailure[]
  ) {
    super(`Extraction failed for ${url}: ${failures.map(f => `${f.field} (${f.reason})`).join(', ')}`)
    this.name = 'ExtractionError'
  }
}

/**
 * The browser could not load or query a page.
 */
export class NavigationError extends Error {
  readonly category = 'external' as const
  readonly code = ERROR_CODES.NAVIGATION_FAILED

  constructor(
    readonly url: string,
    options?: { cause?: unknown }
  ) {
    super(`Navigation failed for ${url}`, options)
    this.name = 'NavigationError'
  }
}

/**
 * An element did not appear within its timeout.
 */
export class ElementTimeoutError extends Error {
  readonly category = 'timeout' as const
  readonly code = ERROR_CODES.ELEMENT_TIMEOUT

  constructor(
    readonly selector: string,
    readonly timeoutMs: number,
    options?: { cause?: unknown }
  ) {
    super(`Timed out after ${timeoutMs}ms waiting for ${selector}`, options)
    this.name = 'ElementTimeoutError'
  }
}

export class ConfigurationError extends Error {
  readonly category = 'configuration' as const
  readonly code = ERROR_CODES.INVALID_CONFIGURATION

  constructor(
    message: string,
    readonly issues: readonly string[] = [],
    options?: { cause?: unknown }
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message, options)
    this.name = 'ConfigurationError'
  }
}

/**
 * A task exhausted its attempts. Never cached.
 */
export class TaskFailedError extends Error {
  readonly category = 'task' as const
  readonly code = ERROR_CODES.TASK_FAILED

  constructor(
    readonly task: string,
    readonly fingerprint: string,
    readonly attempts: number,
    options: { cause: unknown }
  ) {
    super(`Task ${task} failed after ${attempts} attempt(s): ${describeCause(options.cause)}`, options)
    this.name = 'TaskFailedError'
  }
}

export interface UnitFailure {
  index: number
  input: string
  error: Error
}

/**
 * One or more fan-out units of a stage failed and the run policy is 'abort'.
 */
export class StageFailedError extends Error {
  readonly category = 'task' as const
  readonly code = ERROR_CODES.STAGE_FAILED

  constructor(
    readonly stage: string,
    readonly failures: readonly UnitFailure[]
  ) {
    super(`Stage ${stage} failed for ${failures.length} input(s)`)
    this.name = 'StageFailedError'
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause)
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value))
}

/**
 * Classify an error into a structured form for logging.
 */
export function classifyError(error: unknown): ClassifiedError {
  if (error instanceof ZodError) {
    return {
      category: 'configuration',
      code: ERROR_CODES.INVALID_CONFIGURATION,
      message: 'Configuration validation failed',
      isRetryable: false,
      details: {
        issues: error.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message })),
      },
    }
  }

  if (error instanceof ExtractionError) {
    return {
      category: error.category,
      code: error.code,
      message: error.message,
      isRetryable: false,
      details: { url: error.url, failures: error.failures },
    }
  }

  if (error instanceof NavigationError) {
    return { category: error.category, code: error.code, message: error.message, isRetryable: true, details: { url: error.url } }
  }

  if (error instanceof ElementTimeoutError) {
    return {
      category: error.category,
      code: error.code,
      message: error.message,
      isRetryable: true,
      details: { selector: error.selector, timeoutMs: error.timeoutMs },
    }
  }

  if (error instanceof ConfigurationError) {
    return { category: error.category, code: error.code, message: error.message, isRetryable: false }
  }

  if (error instanceof TaskFailedError) {
    return {
      category: error.category,
      code: error.code,
      message: error.message,
      isRetryable: false,
      details: { task: error.task, fingerprint: error.fingerprint, attempts: error.attempts },
    }
  }

  if (error instanceof StageFailedError) {
    return {
      category: error.category,
      code: error.code,
      message: error.message,
      isRetryable: false,
      details: { stage: error.stage, failed: error.failures.map(f => f.input) },
    }
  }

  return {
    category: 'internal',
    code: ERROR_CODES.UNEXPECTED_ERROR,
    message: error instanceof Error ? error.message || 'An unexpected error occurred' : String(error),
    isRetryable: false,
  }
}
