/**
 * Tops storefront tasks
 *
 * department page → category pages → product pages → product records
 */

import type { SessionFactory } from '../../browser/session.js'
import type { Task } from '../../crawl/task.js'
import type { StabilizationConfig } from '../../crawl/types.js'
import type { ProductExtraction } from '../../extract/types.js'
import { defineFindCategoryPages, type PageArgs } from './categories.js'
import { defineExtractProductInfo, type ExtractArgs } from './extract.js'
import { defineFindProductPages } from './products.js'

export interface TopsTaskOptions {
  openSession: SessionFactory
  stabilization?: Partial<StabilizationConfig>
}

export interface SiteTasks {
  findCategoryPages: Task<PageArgs, string[]>
  findProductPages: Task<PageArgs, string[]>
  extractProductInfo: Task<ExtractArgs, ProductExtraction>
}

export function createTopsTasks(options: TopsTaskOptions): SiteTasks {
  return {
    findCategoryPages: defineFindCategoryPages(options.openSession),
    findProductPages: defineFindProductPages(options.openSession, options.stabilization),
    extractProductInfo: defineExtractProductInfo(options.openSession),
  }
}

export type { PageArgs } from './categories.js'
export type { ExtractArgs } from './extract.js'
export { readProductPage } from './extract.js'
export { SELECTORS } from './selectors.js'
