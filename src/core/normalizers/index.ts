/**
 * Field normalizers
 * @module core/normalizers
 */

export { cleanString, numericOnly, isEmptyValue } from './basic'
export {
  normalizePhone,
  isValidPhone,
  DEFAULT_PHONE_OPTIONS,
  type PhoneNormalizerOptions,
} from './phone'
export { normalizeAddressKey, stripPostalCode } from './address'
export { parseCoordinate, parseTimestamp, parseFlag } from './numeric'
