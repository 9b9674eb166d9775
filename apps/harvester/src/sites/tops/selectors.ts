/**
 * Tops storefront selectors
 *
 * Listing pages render products lazily on scroll; product pages render the
 * detail block client-side, so every read goes through the live DOM.
 */

export const SELECTORS = {
  // Department page: carousel of sub-category links
  categoryCarousel: 'div .plp-carousels div .plp-carousel',
  categoryLink: '.plp-carousel__link',

  // Category page: one anchor per product card
  productItem: '.product-item-inner-wrap',

  // Product page
  name: '.product-Details-name .product-tile__name',
  images: '.img-zoom-container img',
  sku: '.product-Details-sku',
  details: '.accordion-item-product-details .accordion-body',
  price: '.product-Details-current-price',
  // Badge images, excluding the UI icon that shares the container
  labels: '.product-Details-common-description img:not(.product-Details-ui.image)',
} as const

export const TIMINGS = {
  /** Carousels keep appending links after the first one renders */
  categorySettleMs: 5_000,
  /** The details accordion is optional; do not wait for it */
  detailsTimeoutMs: 100,
  skuTimeoutMs: 1_000,
} as const

/** Vertical wheel delta per grow trigger */
export const SCROLL_STEP_PX = 300
