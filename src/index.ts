// Main entry point
export {
  ReconciliationDriver,
  reconcileEstablishments,
  GroupReconciler,
  reconcileGroup,
  classifyGroup,
  toCanonicalRecord,
  buildGroupTrace,
  partitionByIdentifier,
  groupByIdentifier,
  hasMissingId,
} from './reconciliation/index.js'

export type {
  GroupState,
  GroupOutcome,
  GroupTrace,
  SubgroupPreview,
  ReconcileOptions,
  ReconciliationStats,
  ReconciliationResult,
} from './reconciliation/index.js'

// Types - Establishments
export type {
  EstablishmentRow,
  CanonicalRecord,
  IdentifierGroup,
  FaxKeyword,
  FaxKeywordLanguage,
  FaxKeywordLists,
  FieldConflicts,
  AuditEntry,
  AuditStatus,
  ScalarField,
} from './types/establishment.js'

export {
  SCALAR_FIELDS,
  MULTIPLE_ADDRESSES,
} from './types/establishment.js'

// Normalizers
export {
  cleanString,
  numericOnly,
  isEmptyValue,
  normalizePhone,
  isValidPhone,
  normalizeAddressKey,
  stripPostalCode,
  parseCoordinate,
  parseTimestamp,
  parseFlag,
  type PhoneNormalizerOptions,
} from './core/normalizers/index.js'

// Fax consolidation
export {
  mergeFaxNumbers,
  mergeFaxKeywords,
  defaultFaxKeywords,
  parseFaxKeywords,
  serializeFaxKeywords,
} from './fax/index.js'

// Merge strategies
export {
  mergeField,
  registerStrategy,
  getStrategy,
  hasStrategy,
  getRegisteredStrategies,
  mostFrequent,
  union,
  type MergeStrategy,
  type StrategyFunction,
  type FieldMergeResult,
} from './merge/index.js'

// Configuration
export {
  DEFAULT_RECONCILE_CONFIG,
  resolveConfig,
  parseConfigFile,
  type ReconcileConfig,
  type ReconcileConfigInput,
} from './config/index.js'

// I/O and reporting
export {
  readEstablishmentCsv,
  writeCleanCsv,
  writeRowsCsv,
  writeAuditCsv,
  TARGET_COLUMNS,
  COLUMN_MAPPING,
  AUDIT_COLUMNS,
} from './io/index.js'
export { normalizeRow, normalizeRows } from './normalization/index.js'
export { renderQaReport, runQualityChecks } from './report/index.js'
export { runPipeline, OUTPUT_FILES, type PipelineRun } from './pipeline/index.js'

// Errors
export {
  ReconciliationError,
  ConfigurationError,
  InputSchemaError,
  KeywordPayloadError,
  isReconciliationError,
} from './utils/errors.js'
export { InvalidStrategyError } from './merge/index.js'

// Logging
export { createConsoleLogger, silentLogger, type Logger, type LogLevel } from './utils/logger.js'
