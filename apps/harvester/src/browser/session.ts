/**
 * Browser capability used by the crawl tasks
 *
 * Tasks depend on these interfaces only. The Playwright implementation lives
 * in ./playwright.ts; tests use in-process fakes.
 */

import type { ILogger } from '@shelfcrawl/logger'
import { loggers } from '../config/logger.js'

export interface ElementWaitOptions {
  /** Falls back to the session's default timeout */
  timeoutMs?: number
}

export interface BrowserPage {
  /** Current page URL, used to resolve relative links */
  url(): string

  /** @throws NavigationError */
  goto(url: string): Promise<void>

  /** @throws ElementTimeoutError */
  waitForSelector(selector: string, options?: ElementWaitOptions): Promise<void>

  waitForTimeout(ms: number): Promise<void>

  /** Matches currently in the DOM; does not wait */
  count(selector: string): Promise<number>

  /** Attribute of every match in document order; null where a match lacks it */
  attributes(selector: string, name: string): Promise<Array<string | null>>

  /**
   * Text of the first match.
   * @throws ElementTimeoutError when nothing matches in time
   */
  textContent(selector: string, options?: ElementWaitOptions): Promise<string | null>

  /** Mouse-wheel scroll by the given deltas */
  scroll(dx: number, dy: number): Promise<void>

  close(): Promise<void>
}

export interface BrowserSession {
  newPage(): Promise<BrowserPage>
  close(): Promise<void>
}

export type SessionFactory = () => Promise<BrowserSession>

/**
 * Run `fn` with a session. A supplied session belongs to the caller and is
 * left open; otherwise one is opened from `open` and closed on every exit path.
 */
export async function withSession<T>(
  open: SessionFactory,
  fn: (session: BrowserSession) => Promise<T>,
  supplied?: BrowserSession,
  log: ILogger = loggers.browser
): Promise<T> {
  if (supplied) {
    return fn(supplied)
  }

  const session = await open()
  try {
    return await fn(session)
  } finally {
    await session.close().catch((error: unknown) => {
      log.warn('Failed to close browser session', {}, error)
    })
  }
}

/**
 * Open a page on `session` for the duration of `fn`.
 */
export async function withPage<T>(
  session: BrowserSession,
  fn: (page: BrowserPage) => Promise<T>,
  log: ILogger = loggers.browser
): Promise<T> {
  const page = await session.newPage()
  try {
    return await fn(page)
  } finally {
    await page.close().catch((error: unknown) => {
      log.warn('Failed to close page', { url: page.url() }, error)
    })
  }
}
