import { isEmptyValue } from './basic'

function toFiniteNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null
  }
  if (isEmptyValue(value)) return null

  const num = Number(String(value).trim())
  return Number.isFinite(num) ? num : null
}

/**
 * Parses a latitude or longitude. Unparsable input is absent, not zero.
 *
 * @example
 * ```typescript
 * parseCoordinate('45.5017') // 45.5017
 * parseCoordinate('n/a')     // null
 * parseCoordinate('')        // null
 * ```
 */
export function parseCoordinate(value: unknown): number | null {
  return toFiniteNumber(value)
}

/**
 * Parses an epoch timestamp, truncating fractions. Unparsable input becomes 0.
 *
 * @example
 * ```typescript
 * parseTimestamp('1723600000') // 1723600000
 * parseTimestamp('12.9')       // 12
 * parseTimestamp('soon')       // 0
 * ```
 */
export function parseTimestamp(value: unknown): number {
  const num = toFiniteNumber(value)
  return num === null ? 0 : Math.trunc(num)
}

/**
 * Parses a 0/1 style flag. Unparsable input becomes 0.
 */
export function parseFlag(value: unknown): number {
  return parseTimestamp(value)
}
