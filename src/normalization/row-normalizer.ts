/**
 * Turns loaded table rows into typed establishment rows
 * @module normalization/row-normalizer
 */

import type { EstablishmentRow } from '../types/establishment.js'
import type { RawRow } from '../io/csv-reader.js'
import type { TargetColumn } from '../io/columns.js'
import type { PhoneNormalizerOptions } from '../core/normalizers/index.js'
import {
  cleanString,
  normalizeAddressKey,
  normalizePhone,
  parseCoordinate,
  parseFlag,
  parseTimestamp,
} from '../core/normalizers/index.js'
import type { Logger } from '../utils/logger.js'
import { silentLogger } from '../utils/logger.js'

export interface RowNormalizerOptions {
  /** Phone/fax normalization settings */
  phone?: PhoneNormalizerOptions

  /**
   * Whether the source carried an `is_fax_enabled` column. When it did not,
   * the flag is derived from the presence of a fax number.
   */
  hasFaxEnabledColumn?: boolean

  logger?: Logger
}

export interface NormalizedRows {
  rows: EstablishmentRow[]
  /** Rows dropped because neither coordinate parsed */
  droppedWithoutCoordinates: number
}

function text(raw: RawRow, column: TargetColumn): string {
  return cleanString(raw[column])
}

/**
 * Normalizes one loaded row.
 *
 * @example
 * ```typescript
 * const row = normalizeRow(raw, { hasFaxEnabledColumn: false })
 * row.internationalPhoneNumber // '+15145550123'
 * row.faxNumbers               // '15145550124'
 * row.isFaxEnabled             // 1
 * ```
 */
export function normalizeRow(raw: RawRow, options: RowNormalizerOptions = {}): EstablishmentRow {
  const address = text(raw, 'address')
  const faxNumbers = normalizePhone(raw.fax_numbers, false, options.phone)
  const hasFaxEnabledColumn = options.hasFaxEnabledColumn ?? true

  return {
    id: raw.id.trim(),
    name: text(raw, 'name'),
    address,
    locality: text(raw, 'locality'),
    region: text(raw, 'region'),
    country: text(raw, 'country'),
    administrativeAreaLevel1: text(raw, 'administrative_area_level_1'),
    administrativeAreaLevel2: text(raw, 'administrative_area_level_2'),
    internationalPhoneNumber: normalizePhone(raw.international_phone_number, true, options.phone),
    faxNumbers,
    faxKeywordsEn: raw.fax_keywords_en,
    faxKeywordsFr: raw.fax_keywords_fr,
    billingCode: text(raw, 'ramq_code'),
    billingCategories: raw.ramq_billing_categories,
    type: text(raw, 'type'),
    website: text(raw, 'website'),
    latitude: parseCoordinate(raw.latitude),
    longitude: parseCoordinate(raw.longitude),
    addedTime: parseTimestamp(raw.added_time),
    placeType: text(raw, 'place_type'),
    isFaxEnabled: hasFaxEnabledColumn
      ? parseFlag(raw.is_fax_enabled)
      : faxNumbers.trim() !== ''
        ? 1
        : 0,
    normalizedAddress: normalizeAddressKey(address),
  }
}

/**
 * Normalizes every row and drops rows where both coordinates are absent.
 */
export function normalizeRows(rawRows: RawRow[], options: RowNormalizerOptions = {}): NormalizedRows {
  const logger = options.logger ?? silentLogger
  const rows: EstablishmentRow[] = []
  let droppedWithoutCoordinates = 0

  for (const raw of rawRows) {
    const row = normalizeRow(raw, options)
    if (row.latitude === null && row.longitude === null) {
      droppedWithoutCoordinates++
      continue
    }
    rows.push(row)
  }

  if (droppedWithoutCoordinates > 0) {
    logger.info('Dropped rows without coordinates', { count: droppedWithoutCoordinates })
  }

  return { rows, droppedWithoutCoordinates }
}
