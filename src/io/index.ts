export {
  CLEAN_COLUMN_FIELDS,
  TARGET_COLUMNS,
  COLUMN_MAPPING,
  REQUIRED_COLUMNS,
  AUDIT_COLUMNS,
  NORMALIZED_ADDRESS_COLUMN,
  isTargetColumn,
  mapSourceColumn,
  type TargetColumn,
} from './columns.js'
export {
  readEstablishmentCsv,
  readCsvHeader,
  emptyRow,
  type RawRow,
  type LoadedTable,
  type CsvReadOptions,
} from './csv-reader.js'
export { writeCleanCsv, writeRowsCsv, writeAuditCsv, formatCell } from './csv-writer.js'
