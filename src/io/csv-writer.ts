/**
 * Serializes reconciliation outputs to CSV text
 * @module io/csv-writer
 */

import { stringify } from 'csv-stringify/sync'
import type { AuditEntry, CanonicalRecord, EstablishmentRow } from '../types/establishment.js'
import { toCanonicalRecord } from '../reconciliation/index.js'
import {
  AUDIT_COLUMNS,
  CLEAN_COLUMN_FIELDS,
  NORMALIZED_ADDRESS_COLUMN,
  TARGET_COLUMNS,
} from './columns.js'

/**
 * Formats one cell. Absent numbers become empty cells.
 */
export function formatCell(value: string | number | null | undefined): string {
  if (value === null || value === undefined) return ''
  if (typeof value === 'number') return Number.isFinite(value) ? String(value) : ''
  return value
}

function recordCells(record: CanonicalRecord): string[] {
  return CLEAN_COLUMN_FIELDS.map(([, field]) => formatCell(record[field]))
}

/**
 * Writes canonical records with the 22 target columns in their fixed order.
 *
 * @example
 * ```typescript
 * writeCleanCsv(result.clean).split('\n')[0]
 * // 'id,admin_user_id,name,address,...,place_type,is_fax_enabled'
 * ```
 */
export function writeCleanCsv(records: CanonicalRecord[]): string {
  return stringify(records.map(recordCells), {
    header: true,
    columns: [...TARGET_COLUMNS],
  })
}

/**
 * Writes rejected or quarantined rows: the target columns followed by the
 * address key used for comparison.
 */
export function writeRowsCsv(rows: EstablishmentRow[]): string {
  return stringify(
    rows.map((row) => [...recordCells(toCanonicalRecord(row)), row.normalizedAddress]),
    {
      header: true,
      columns: [...TARGET_COLUMNS, NORMALIZED_ADDRESS_COLUMN],
    },
  )
}

/**
 * Writes the audit trail. Field conflicts are encoded as a JSON object.
 */
export function writeAuditCsv(entries: AuditEntry[]): string {
  return stringify(
    entries.map((entry) => [
      entry.id,
      entry.normalizedAddress,
      String(entry.sourceRowCount),
      entry.mergedBillingCodes,
      entry.mergedFaxNumbers,
      JSON.stringify(entry.fieldConflicts),
      entry.status,
    ]),
    {
      header: true,
      columns: [...AUDIT_COLUMNS],
    },
  )
}
