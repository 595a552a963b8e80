/**
 * Column layout of the input and output tables
 * @module io/columns
 */

import type { CanonicalRecord } from '../types/establishment.js'

/**
 * Output column for each canonical record field, in output order
 */
export const CLEAN_COLUMN_FIELDS = [
  ['id', 'id'],
  ['admin_user_id', 'adminUserId'],
  ['name', 'name'],
  ['address', 'address'],
  ['locality', 'locality'],
  ['region', 'region'],
  ['country', 'country'],
  ['administrative_area_level_1', 'administrativeAreaLevel1'],
  ['administrative_area_level_2', 'administrativeAreaLevel2'],
  ['international_phone_number', 'internationalPhoneNumber'],
  ['fax_numbers', 'faxNumbers'],
  ['fax_keywords_en', 'faxKeywordsEn'],
  ['fax_keywords_fr', 'faxKeywordsFr'],
  ['ramq_code', 'billingCode'],
  ['ramq_billing_categories', 'billingCategories'],
  ['type', 'type'],
  ['website', 'website'],
  ['latitude', 'latitude'],
  ['longitude', 'longitude'],
  ['added_time', 'addedTime'],
  ['place_type', 'placeType'],
  ['is_fax_enabled', 'isFaxEnabled'],
] as const satisfies ReadonlyArray<readonly [string, keyof CanonicalRecord]>

export type TargetColumn = (typeof CLEAN_COLUMN_FIELDS)[number][0]

/**
 * The 22 clean output columns, in their fixed order
 */
export const TARGET_COLUMNS: readonly TargetColumn[] = CLEAN_COLUMN_FIELDS.map(
  ([column]) => column,
)

/**
 * Source column → target column renames applied on load.
 * Target columns not listed here keep their own name.
 */
export const COLUMN_MAPPING: ReadonlyMap<string, TargetColumn> = new Map<string, TargetColumn>([
  ['code', 'ramq_code'],
])

/**
 * Columns the input must provide (after renaming)
 */
export const REQUIRED_COLUMNS: readonly TargetColumn[] = ['id', 'address', 'latitude', 'longitude']

/**
 * Extra column written with rejected and quarantined rows
 */
export const NORMALIZED_ADDRESS_COLUMN = 'normalized_address'

/**
 * Audit trail columns, in output order
 */
export const AUDIT_COLUMNS = [
  'id',
  'normalized_address',
  'source_row_count',
  'merged_ramq_codes',
  'merged_fax_numbers',
  'field_conflicts',
  'status',
] as const

/**
 * Returns true if the column belongs to the target schema
 */
export function isTargetColumn(column: string): column is TargetColumn {
  return TARGET_COLUMNS.some((target) => target === column)
}

/**
 * Maps a source header to its target column, or null when the column is not kept
 */
export function mapSourceColumn(header: string): TargetColumn | null {
  const trimmed = header.trim()
  const mapped = COLUMN_MAPPING.get(trimmed)
  if (mapped !== undefined) return mapped
  return isTargetColumn(trimmed) ? trimmed : null
}
