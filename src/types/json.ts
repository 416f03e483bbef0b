/**
 * JSON value types shared by tool inputs, tool specs and model payloads.
 */

/**
 * Any value that survives a round trip through `JSON.stringify` / `JSON.parse`.
 */
export type JSONValue = string | number | boolean | null | JSONValue[] | { [key: string]: JSONValue }

/**
 * A JSON Schema document, as produced for tool input specifications.
 */
export type JSONSchema = { [key: string]: JSONValue }

/**
 * Narrows an unknown value to a plain JSON object (not an array, not null).
 */
export function isJSONObject(value: unknown): value is { [key: string]: JSONValue } {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Recursively copies `value` into a {@link JSONValue}, dropping what JSON cannot carry
 * (functions, symbols, undefined members). Non-finite numbers become null.
 *
 * @param value - Arbitrary value, typically a library-produced document
 * @returns An equivalent JSON value
 */
export function toJSONValue(value: unknown): JSONValue {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return value
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null
  }
  if (typeof value === 'bigint') {
    return value.toString()
  }
  if (Array.isArray(value)) {
    return value.map((item) => toJSONValue(item))
  }
  if (typeof value === 'object') {
    const result: { [key: string]: JSONValue } = {}
    for (const [key, member] of Object.entries(value)) {
      if (member === undefined || typeof member === 'function' || typeof member === 'symbol') {
        continue
      }
      result[key] = toJSONValue(member)
    }
    return result
  }
  return null
}
