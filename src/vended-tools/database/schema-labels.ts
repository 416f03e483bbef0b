import { ObjectId } from 'mongodb'
import { isPlainRecord } from './serialize.js'

const OBJECT_KEY_PREVIEW = 8
const ARRAY_ITEM_KEY_PREVIEW = 5

/**
 * Short type label for a sampled field value.
 *
 * Objects preview their first keys, arrays whose first item is an object are
 * marked as a list of objects.
 *
 * @example
 * ```typescript
 * describeValueType({ city: 'Oslo', zip: '0150' }) // 'object (keys: city, zip)'
 * describeValueType([{ sku: 'A1', qty: 2 }])       // 'array (list of objects, first keys: sku, qty)'
 * ```
 */
export function describeValueType(value: unknown): string {
  if (value === null || value === undefined) {
    return 'null'
  }
  if (value instanceof ObjectId) {
    return 'ObjectId'
  }
  if (value instanceof Date) {
    return 'Date'
  }
  if (Array.isArray(value)) {
    const first: unknown = value[0]
    if (isPlainRecord(first)) {
      return `array (list of objects, first keys: ${Object.keys(first).slice(0, ARRAY_ITEM_KEY_PREVIEW).join(', ')})`
    }
    return 'array'
  }
  if (isPlainRecord(value)) {
    return `object (keys: ${Object.keys(value).slice(0, OBJECT_KEY_PREVIEW).join(', ')})`
  }
  switch (typeof value) {
    case 'string':
      return 'string'
    case 'boolean':
      return 'bool'
    case 'number':
      return Number.isInteger(value) ? 'int' : 'double'
    case 'bigint':
      return 'long'
    default:
      break
  }
  if (typeof value === 'object' && '_bsontype' in value && typeof value._bsontype === 'string') {
    return value._bsontype
  }
  return typeof value
}
