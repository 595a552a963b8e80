/**
 * Loads establishment tables from CSV text
 * @module io/csv-reader
 */

import { parse } from 'csv-parse/sync'
import type { TargetColumn } from './columns.js'
import { REQUIRED_COLUMNS, mapSourceColumn } from './columns.js'
import { InputSchemaError } from '../utils/errors.js'

/**
 * One loaded row, keyed by target column. Every target column is present.
 */
export type RawRow = Record<TargetColumn, string>

export interface LoadedTable {
  rows: RawRow[]
  /** Target columns that were present in the source (after renaming) */
  sourceColumns: TargetColumn[]
}

export interface CsvReadOptions {
  /** Field delimiter (default: ",") */
  delimiter?: string
}

/**
 * A row with every target column set to `''`
 */
export function emptyRow(): RawRow {
  return {
    id: '',
    admin_user_id: '',
    name: '',
    address: '',
    locality: '',
    region: '',
    country: '',
    administrative_area_level_1: '',
    administrative_area_level_2: '',
    international_phone_number: '',
    fax_numbers: '',
    fax_keywords_en: '',
    fax_keywords_fr: '',
    ramq_code: '',
    ramq_billing_categories: '',
    type: '',
    website: '',
    latitude: '',
    longitude: '',
    added_time: '',
    place_type: '',
    is_fax_enabled: '',
  }
}

/**
 * Reads the header row of CSV text, or `[]` when there is none
 */
export function readCsvHeader(text: string, options: CsvReadOptions = {}): string[] {
  const records: string[][] = parse(text, {
    delimiter: options.delimiter ?? ',',
    bom: true,
    skip_empty_lines: true,
    relax_column_count: true,
    to_line: 1,
  })
  return records[0] ?? []
}

/**
 * Parses CSV text into rows of the target schema.
 *
 * Source headers are renamed through `COLUMN_MAPPING`; columns outside the
 * target schema are dropped and missing target columns are filled with `''`.
 *
 * @throws {InputSchemaError} If a required column is absent
 *
 * @example
 * ```typescript
 * const { rows } = readEstablishmentCsv('id,code,address,latitude,longitude\nX1,A1,1 Main St,45.5,-73.6\n')
 * rows[0].ramq_code // 'A1'
 * ```
 */
export function readEstablishmentCsv(text: string, options: CsvReadOptions = {}): LoadedTable {
  const records: string[][] = parse(text, {
    columns: false,
    delimiter: options.delimiter ?? ',',
    bom: true,
    skip_empty_lines: true,
    relax_column_count: true,
    trim: true,
  })

  if (records.length === 0) {
    throw new InputSchemaError([...REQUIRED_COLUMNS], { reason: 'input has no header row' })
  }

  const [header, ...dataRows] = records
  const columnAt = header.map(mapSourceColumn)
  const sourceColumns = columnAt.filter((column): column is TargetColumn => column !== null)

  const missing = REQUIRED_COLUMNS.filter((column) => !sourceColumns.includes(column))
  if (missing.length > 0) {
    throw new InputSchemaError(missing, { header })
  }

  const rows = dataRows.map((values) => {
    const row = emptyRow()
    columnAt.forEach((column, index) => {
      if (column !== null) row[column] = values[index] ?? ''
    })
    return row
  })

  return { rows, sourceColumns: Array.from(new Set(sourceColumns)) }
}
