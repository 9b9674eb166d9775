import type { ILogger } from '@shelfcrawl/logger'
import type { BrowserPage, BrowserSession, SessionFactory } from '../../browser/session.js'
import { withPage, withSession } from '../../browser/session.js'
import { loggers } from '../../config/logger.js'
import { defineTask, type Task } from '../../crawl/task.js'
import { ElementTimeoutError } from '../../errors.js'
import {
  normalizeDetails,
  normalizeImages,
  normalizeLabels,
  parseBarcode,
  parsePrice,
  splitNameQuantity,
} from '../../extract/fields.js'
import { buildProductRecord } from '../../extract/record.js'
import type { ProductExtraction } from '../../extract/types.js'
import { SELECTORS, TIMINGS } from './selectors.js'

export interface ExtractArgs {
  url: string
  /** Caller-owned session; left open */
  session?: BrowserSession
}

/** Text of `selector`, or null when it never appears */
async function readText(page: BrowserPage, selector: string, timeoutMs?: number): Promise<string | null> {
  try {
    return await page.textContent(selector, { timeoutMs })
  } catch (error) {
    if (error instanceof ElementTimeoutError) return null
    throw error
  }
}

export async function readProductPage(
  page: BrowserPage,
  url: string,
  log: ILogger = loggers.extract
): Promise<ProductExtraction> {
  await page.goto(url)

  const rawName = await readText(page, SELECTORS.name)
  const images = normalizeImages(await page.attributes(SELECTORS.images, 'src'))
  const rawSku = await readText(page, SELECTORS.sku, TIMINGS.skuTimeoutMs)
  const rawDetails = await readText(page, SELECTORS.details, TIMINGS.detailsTimeoutMs)
  const rawPrice = await readText(page, SELECTORS.price)
  const labels = normalizeLabels(await page.attributes(SELECTORS.labels, 'alt'))

  const barcode = parseBarcode(rawSku)
  const details = normalizeDetails(rawDetails)
  if (barcode.kind === 'ok' && barcode.value === null) {
    log.debug('No valid barcode', { url, sku: rawSku })
  }
  if (details.kind === 'soft') {
    log.debug('Details unavailable', { url, reason: details.reason })
  }

  return buildProductRecord(url, {
    nameQuantity: splitNameQuantity(rawName),
    price: parsePrice(rawPrice),
    barcode,
    details,
    images,
    labels,
  })
}

/**
 * Product page → ProductExtraction. The session is not part of the cache key.
 */
export function defineExtractProductInfo(openSession: SessionFactory): Task<ExtractArgs, ProductExtraction> {
  return defineTask<ExtractArgs, ProductExtraction>({
    name: 'extract-product-info',
    version: '1',
    cacheExclude: ['session'],
    async run({ url, session }, { logger }) {
      logger.info('Extracting product', { url })

      const extraction = await withSession(
        openSession,
        active => withPage(active, page => readProductPage(page, url)),
        session
      )

      logger.debug('Extracted product', {
        url,
        name: extraction.record.name,
        price: extraction.record.price,
        hasBarcode: extraction.record.barcode !== null,
        details: extraction.details,
      })
      return extraction
    },
  })
}
