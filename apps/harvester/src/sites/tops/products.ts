import { resolveLinks } from '../../browser/links.js'
import { withPage, withSession, type SessionFactory } from '../../browser/session.js'
import { waitForStabilization } from '../../crawl/stabilization.js'
import { defineTask, type Task } from '../../crawl/task.js'
import type { StabilizationConfig } from '../../crawl/types.js'
import type { PageArgs } from './categories.js'
import { SCROLL_STEP_PX, SELECTORS } from './selectors.js'

/**
 * Category listing → product page URLs. Scrolls until the product grid stops
 * growing, then reads every card's link.
 */
export function defineFindProductPages(
  openSession: SessionFactory,
  stabilization: Partial<StabilizationConfig> = {}
): Task<PageArgs, string[]> {
  return defineTask<PageArgs, string[]>({
    name: 'find-product-pages',
    version: '1',
    async run({ url }, { logger }) {
      logger.info('Finding product pages', { url })

      return withSession(openSession, session =>
        withPage(session, async page => {
          await page.goto(url)

          const result = await waitForStabilization(
            {
              grow: () => page.scroll(0, SCROLL_STEP_PX),
              sample: () => page.count(SELECTORS.productItem),
            },
            stabilization,
            { sleep: ms => page.waitForTimeout(ms), logger }
          )

          const links = resolveLinks(await page.attributes(SELECTORS.productItem, 'href'), page.url())
          logger.info('Found product pages', {
            url,
            count: links.length,
            rounds: result.rounds,
            waitedMs: result.waitedMs,
            reason: result.reason,
          })
          return links
        })
      )
    },
  })
}
