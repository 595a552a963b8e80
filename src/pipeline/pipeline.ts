/**
 * One batch run: CSV text in, CSV and report text out
 * @module pipeline/pipeline
 */

import { readCsvHeader, readEstablishmentCsv } from '../io/csv-reader.js'
import { writeAuditCsv, writeCleanCsv, writeRowsCsv } from '../io/csv-writer.js'
import { normalizeRows } from '../normalization/index.js'
import { resolveConfig } from '../config/reconcile-config.js'
import type { ReconcileConfigInput } from '../config/reconcile-config.js'
import { ReconciliationDriver } from '../reconciliation/index.js'
import type { ReconciliationResult } from '../reconciliation/index.js'
import { renderQaReport } from '../report/index.js'
import type { Logger } from '../utils/logger.js'
import { silentLogger } from '../utils/logger.js'

/**
 * Default output file names
 */
export const OUTPUT_FILES = {
  clean: 'establishments_clean.csv',
  rejects: '_rejects_missing_id.csv',
  quarantine: '_rejects_conflicting_address_for_same_id.csv',
  audit: '_merge_audit.csv',
  report: '_qa_report.md',
} as const

export type OutputKind = keyof typeof OUTPUT_FILES

export interface PipelineOptions {
  config?: ReconcileConfigInput
  logger?: Logger
  /** Input field delimiter (default: ",") */
  delimiter?: string
  /** File names used in the report; defaults to {@link OUTPUT_FILES} */
  fileNames?: Partial<Record<OutputKind, string>>
}

/**
 * Serialized outputs. Rejects, quarantine and audit are only produced when non-empty.
 */
export interface PipelineOutputs {
  clean: string
  rejects?: string
  quarantine?: string
  audit?: string
  report: string
}

export interface PipelineRun {
  totalInputRows: number
  droppedWithoutCoordinates: number
  result: ReconciliationResult
  outputs: PipelineOutputs
}

/**
 * Loads, normalizes and reconciles an establishment table and renders every output.
 *
 * @throws {InputSchemaError} If the table lacks required columns
 * @throws {ConfigurationError} If the configuration is invalid
 */
export function runPipeline(csvText: string, options: PipelineOptions = {}): PipelineRun {
  const logger = options.logger ?? silentLogger
  const config = resolveConfig(options.config)
  const fileNames = { ...OUTPUT_FILES, ...options.fileNames }

  const table = readEstablishmentCsv(csvText, { delimiter: options.delimiter })
  logger.info('Loaded input rows', { count: table.rows.length })

  const normalized = normalizeRows(table.rows, {
    phone: config.phone,
    hasFaxEnabledColumn: table.sourceColumns.includes('is_fax_enabled'),
    logger,
  })

  const driver = new ReconciliationDriver({ config, logger })
  const result = driver.run(normalized.rows)

  const outputs: PipelineOutputs = {
    clean: writeCleanCsv(result.clean),
    report: '',
  }
  const written: string[] = [fileNames.clean]

  if (result.rejects.length > 0) {
    outputs.rejects = writeRowsCsv(result.rejects)
    written.push(fileNames.rejects)
  }
  if (result.quarantine.length > 0) {
    outputs.quarantine = writeRowsCsv(result.quarantine)
    written.push(fileNames.quarantine)
  }
  if (result.audit.length > 0) {
    outputs.audit = writeAuditCsv(result.audit)
    written.push(fileNames.audit)
  }
  written.push(fileNames.report)

  outputs.report = renderQaReport({
    totalInputRows: table.rows.length,
    droppedWithoutCoordinates: normalized.droppedWithoutCoordinates,
    result,
    outputFiles: written,
    cleanHeader: readCsvHeader(outputs.clean),
    faxSeparator: config.faxSeparator,
  })

  return {
    totalInputRows: table.rows.length,
    droppedWithoutCoordinates: normalized.droppedWithoutCoordinates,
    result,
    outputs,
  }
}
