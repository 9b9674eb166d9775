/**
 * One persisted product. Field names are the JSONL wire format.
 */
export interface ProductRecord {
  readonly name: string
  /** Pack size such as "500G", null when the name carries none */
  readonly quantity: string | null
  readonly price: number
  readonly images: readonly string[]
  /** "EAN-13 <code>" or null */
  readonly barcode: string | null
  readonly labels: readonly string[]
  readonly store_url: string
}

export interface ProductExtraction {
  record: ProductRecord
  /** Free-text product details; logged, never persisted */
  details: string | null
}
