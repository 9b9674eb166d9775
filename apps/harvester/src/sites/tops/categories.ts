import { resolveLinks } from '../../browser/links.js'
import { withPage, withSession, type SessionFactory } from '../../browser/session.js'
import { defineTask, type Task } from '../../crawl/task.js'
import { SELECTORS, TIMINGS } from './selectors.js'

export interface PageArgs {
  url: string
}

/**
 * Department page → category listing URLs, in carousel order.
 */
export function defineFindCategoryPages(openSession: SessionFactory): Task<PageArgs, string[]> {
  return defineTask<PageArgs, string[]>({
    name: 'find-category-pages',
    version: '1',
    async run({ url }, { logger }) {
      logger.info('Finding category pages', { url })

      return withSession(openSession, session =>
        withPage(session, async page => {
          await page.goto(url)
          await page.waitForSelector(SELECTORS.categoryCarousel)
          await page.waitForTimeout(TIMINGS.categorySettleMs)

          const links = resolveLinks(await page.attributes(SELECTORS.categoryLink, 'href'), page.url())
          logger.info('Found category pages', { url, count: links.length })
          return links
        })
      )
    },
  })
}
