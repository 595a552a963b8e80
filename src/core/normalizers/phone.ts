import { isValidPhoneNumber, type CountryCode } from 'libphonenumber-js'
import { numericOnly } from './basic'

/**
 * Options for phone normalization.
 */
export interface PhoneNormalizerOptions {
  /** Country calling code prepended to ten-digit national numbers (default: "1") */
  countryCode?: string
  /** Prefix written before the digits when `keepPrefix` is set (default: "+") */
  prefix?: string
}

export const DEFAULT_PHONE_OPTIONS: Required<PhoneNormalizerOptions> = {
  countryCode: '1',
  prefix: '+',
}

/**
 * Normalizes a North American phone or fax number to its digit form.
 *
 * Ten digits get the country code prepended; eleven digits already starting
 * with the country code are kept. Any other shape is returned as the trimmed
 * original so unrecognized numbers are not lost.
 *
 * @param value - Raw phone value
 * @param keepPrefix - Write `options.prefix` before the digits (default: true)
 * @param options - Country code and prefix overrides
 * @returns Canonical number, the trimmed input when unrecognized, or `''` when empty
 *
 * @example
 * ```typescript
 * normalizePhone('(514) 555-0123')        // '+15145550123'
 * normalizePhone('514-555-0123', false)   // '15145550123'
 * normalizePhone('1 514 555 0123', false) // '15145550123'
 * normalizePhone(' ext. 42 ')             // 'ext. 42'
 * normalizePhone(null)                    // ''
 * ```
 */
export function normalizePhone(
  value: unknown,
  keepPrefix = true,
  options: PhoneNormalizerOptions = {}
): string {
  if (value == null || value === '') return ''

  const { countryCode, prefix } = { ...DEFAULT_PHONE_OPTIONS, ...options }
  const digits = numericOnly(value)
  const nationalLength = 11 - countryCode.length

  let result: string
  if (digits.length === nationalLength) {
    result = `${countryCode}${digits}`
  } else if (digits.length === 11 && digits.startsWith(countryCode)) {
    result = digits
  } else {
    return String(value).trim()
  }

  return keepPrefix ? `${prefix}${result}` : result
}

/**
 * Validates if a string is a dialable phone number.
 * Used for reporting only; normalization never depends on it.
 *
 * @example
 * ```typescript
 * isValidPhone('+12025550123') // true
 * isValidPhone('123', 'CA')    // false
 * ```
 */
export function isValidPhone(phone: string, country: CountryCode = 'CA'): boolean {
  if (!phone || typeof phone !== 'string') {
    return false
  }

  try {
    return isValidPhoneNumber(phone, country)
  } catch {
    return false
  }
}
