/**
 * Canadian postal code, with or without the middle space (e.g. "J0Y 1Z0").
 * Applied to upper-cased input.
 */
const POSTAL_CODE_PATTERN = /\b[A-Z]\d[A-Z]\s*\d[A-Z]\d\b/g

const TRAILING_COMMA_PATTERN = /,\s*$/

/**
 * Removes Canadian postal codes from an upper-cased address.
 *
 * @example
 * ```typescript
 * stripPostalCode('1141 RUE ROYALE, MALARTIC J0Y 1Z0') // '1141 RUE ROYALE, MALARTIC '
 * ```
 */
export function stripPostalCode(address: string): string {
  return address.replace(POSTAL_CODE_PATTERN, '')
}

/**
 * Computes the comparison key used to decide whether two rows describe the
 * same place. Upper-cases, strips postal codes, drops a trailing comma and
 * collapses whitespace. The key is never written to clean output.
 *
 * @param value - Raw address
 * @returns Address key, or `''` when the address is missing
 *
 * @example
 * ```typescript
 * normalizeAddressKey(' 1141 rue Royale,  Malartic, J0Y 1Z0 ')
 * // '1141 RUE ROYALE, MALARTIC'
 * normalizeAddressKey('123 Main St,')  // '123 MAIN ST'
 * normalizeAddressKey(undefined)       // ''
 * ```
 */
export function normalizeAddressKey(value: unknown): string {
  if (value == null) return ''

  let address = String(value).toUpperCase().trim()
  address = stripPostalCode(address)
  address = address.replace(TRAILING_COMMA_PATTERN, '')
  address = address.replace(/\s+/g, ' ')

  return address.trim()
}
