import { ExtractionError, type FieldFailure } from '../errors.js'
import type { FieldResult, NameQuantity } from './fields.js'
import type { ProductExtraction, ProductRecord } from './types.js'

export interface ProductFields {
  nameQuantity: FieldResult<NameQuantity>
  price: FieldResult<number>
  barcode: FieldResult<string | null>
  details: FieldResult<string>
  images: string[]
  labels: string[]
}

function valueOrNull<T>(result: FieldResult<T>): T | null {
  return result.kind === 'ok' ? result.value : null
}

/**
 * Assemble the record for `url`, or fail with every hard field at once.
 *
 * @throws ExtractionError
 */
export function buildProductRecord(url: string, fields: ProductFields): ProductExtraction {
  const failures: FieldFailure[] = []
  const collect = (field: string, result: FieldResult<unknown>): void => {
    if (result.kind === 'hard') failures.push({ field, reason: result.reason })
  }

  collect('name', fields.nameQuantity)
  collect('price', fields.price)
  collect('barcode', fields.barcode)
  collect('details', fields.details)

  const { nameQuantity, price } = fields
  if (failures.length > 0 || nameQuantity.kind !== 'ok' || price.kind !== 'ok') {
    throw new ExtractionError(url, failures)
  }

  const record: ProductRecord = Object.freeze({
    name: nameQuantity.value.name,
    quantity: nameQuantity.value.quantity,
    price: price.value,
    images: Object.freeze([...fields.images]),
    barcode: valueOrNull(fields.barcode),
    labels: Object.freeze([...fields.labels]),
    store_url: url,
  })

  return { record, details: valueOrNull(fields.details) }
}
