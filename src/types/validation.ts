/**
 * Returns `value` when it is neither null nor undefined, otherwise throws.
 * Used when mapping provider responses whose typings mark every field optional.
 *
 * @param value - Value to check
 * @param fieldName - Name reported in the error
 * @returns The value, narrowed to exclude null and undefined
 */
export function ensureDefined<T>(value: T | null | undefined, fieldName: string): T {
  if (value === undefined || value === null) {
    throw new Error(`Expected value to be defined, but got ${value}: ${fieldName}`)
  }
  return value
}
