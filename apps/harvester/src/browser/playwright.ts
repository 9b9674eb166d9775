import { chromium, errors, type Browser, type Page } from 'playwright-core'
import { loggers } from '../config/logger.js'
import { ElementTimeoutError, NavigationError } from '../errors.js'
import type { BrowserPage, BrowserSession, ElementWaitOptions } from './session.js'

export interface PlaywrightSessionOptions {
  headless?: boolean
  /** Default for navigation and element waits */
  timeoutMs?: number
  userAgent?: string
}

const DEFAULT_TIMEOUT_MS = 30_000

const DEFAULT_DESKTOP_UA =
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36'

const log = loggers.browser

class PlaywrightBrowserPage implements BrowserPage {
  constructor(
    private readonly page: Page,
    private readonly defaultTimeoutMs: number
  ) {}

  url(): string {
    return this.page.url()
  }

  async goto(url: string): Promise<void> {
    try {
      await this.page.goto(url, { timeout: this.defaultTimeoutMs })
    } catch (error) {
      throw new NavigationError(url, { cause: error })
    }
  }

  async waitForSelector(selector: string, options: ElementWaitOptions = {}): Promise<void> {
    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs
    await this.guardTimeout(selector, timeoutMs, () => this.page.waitForSelector(selector, { timeout: timeoutMs }))
  }

  async waitForTimeout(ms: number): Promise<void> {
    await this.page.waitForTimeout(ms)
  }

  count(selector: string): Promise<number> {
    return this.page.locator(selector).count()
  }

  async attributes(selector: string, name: string): Promise<Array<string | null>> {
    const values: Array<string | null> = []
    for (const element of await this.page.locator(selector).all()) {
      values.push(await element.getAttribute(name))
    }
    return values
  }

  textContent(selector: string, options: ElementWaitOptions = {}): Promise<string | null> {
    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs
    return this.guardTimeout(selector, timeoutMs, () =>
      this.page.locator(selector).first().textContent({ timeout: timeoutMs })
    )
  }

  async scroll(dx: number, dy: number): Promise<void> {
    await this.page.mouse.wheel(dx, dy)
  }

  async close(): Promise<void> {
    await this.page.close()
  }

  private async guardTimeout<T>(selector: string, timeoutMs: number, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn()
    } catch (error) {
      if (error instanceof errors.TimeoutError) {
        throw new ElementTimeoutError(selector, timeoutMs, { cause: error })
      }
      throw error
    }
  }
}

/**
 * One Chromium instance; every newPage() gets its own context-backed page.
 */
export class PlaywrightBrowserSession implements BrowserSession {
  private constructor(
    private readonly browser: Browser,
    private readonly options: Required<PlaywrightSessionOptions>
  ) {}

  static async launch(options: PlaywrightSessionOptions = {}): Promise<PlaywrightBrowserSession> {
    const resolved: Required<PlaywrightSessionOptions> = {
      headless: options.headless !== false,
      timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      userAgent: options.userAgent ?? DEFAULT_DESKTOP_UA,
    }

    const browser = await chromium.launch({ headless: resolved.headless, args: ['--no-sandbox'] })
    log.debug('Browser launched', { headless: resolved.headless })
    return new PlaywrightBrowserSession(browser, resolved)
  }

  async newPage(): Promise<BrowserPage> {
    const page = await this.browser.newPage({ userAgent: this.options.userAgent })
    page.setDefaultTimeout(this.options.timeoutMs)
    return new PlaywrightBrowserPage(page, this.options.timeoutMs)
  }

  async close(): Promise<void> {
    await this.browser.close()
    log.debug('Browser closed')
  }
}

export function openBrowserSession(options: PlaywrightSessionOptions = {}): Promise<BrowserSession> {
  return PlaywrightBrowserSession.launch(options)
}
