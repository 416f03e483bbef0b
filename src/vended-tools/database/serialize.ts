import { BSON, ObjectId } from 'mongodb'
import type { StoredDocument } from '../../store/document-store.js'

/**
 * Whether `value` is a plain key/value mapping (not an array, not a driver type).
 */
export function isPlainRecord(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false
  }
  const prototype: unknown = Object.getPrototypeOf(value)
  return prototype === Object.prototype || prototype === null
}

/**
 * Replaces every ObjectId with its hex string, recursing through mappings and sequences.
 */
export function stringifyIdentifiers(value: unknown): unknown {
  if (value instanceof ObjectId) {
    return value.toHexString()
  }
  if (Array.isArray(value)) {
    return value.map((item) => stringifyIdentifiers(item))
  }
  if (isPlainRecord(value)) {
    const result: Record<string, unknown> = {}
    for (const [key, member] of Object.entries(value)) {
      result[key] = stringifyIdentifiers(member)
    }
    return result
  }
  return value
}

/**
 * Renders documents as indented JSON for the model.
 */
export function formatDocuments(documents: StoredDocument[]): string {
  return JSON.stringify(stringifyIdentifiers(documents), jsonReplacer, 2)
}

function jsonReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value
}

/**
 * Parses a query argument the model sent either as Extended JSON text or as a structured value.
 * Extended JSON lets the model write `{"$oid": "..."}` or `{"$date": "..."}`.
 *
 * @throws SyntaxError or BSONError when the text is not valid Extended JSON
 */
export function parseQueryArgument(value: unknown): unknown {
  if (typeof value === 'string') {
    if (value.trim() === '') {
      return undefined
    }
    const parsed: unknown = BSON.EJSON.parse(value, { relaxed: true })
    return parsed
  }
  if (value === undefined || value === null) {
    return undefined
  }
  const wrapped: unknown = BSON.EJSON.deserialize({ value }, { relaxed: true })
  return isPlainRecord(wrapped) ? wrapped['value'] : undefined
}
