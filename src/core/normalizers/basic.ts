/**
 * Trims a value and collapses internal whitespace runs into a single space.
 *
 * @param value - The value to clean
 * @returns Cleaned string, or `''` for null, undefined or blank input
 *
 * @example
 * ```typescript
 * cleanString('  Clinique   du  Parc ') // 'Clinique du Parc'
 * cleanString('line\n\nbreak')        // 'line break'
 * cleanString(null)                    // ''
 * ```
 */
export function cleanString(value: unknown): string {
  if (value == null || value === '') return ''
  return String(value).trim().replace(/\s+/g, ' ')
}

/**
 * Removes all non-numeric characters, keeping only digits.
 *
 * @example
 * ```typescript
 * numericOnly('(514) 555-0123') // '5145550123'
 * numericOnly(null)             // ''
 * ```
 */
export function numericOnly(value: unknown): string {
  if (value == null) return ''
  return String(value).replace(/\D/g, '')
}

/**
 * True when a cell holds no usable value: null, undefined, NaN or a blank string.
 */
export function isEmptyValue(value: unknown): boolean {
  if (value === null || value === undefined) return true
  if (typeof value === 'number') return Number.isNaN(value)
  return String(value).trim() === ''
}
