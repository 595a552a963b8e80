/**
 * Markdown QA report for one reconciliation run
 * @module report/qa-report
 */

import type { CanonicalRecord } from '../types/establishment.js'
import type { GroupTrace, ReconciliationResult } from '../reconciliation/index.js'
import { hasMissingId } from '../reconciliation/index.js'
import { TARGET_COLUMNS } from '../io/columns.js'
import { isValidPhone } from '../core/normalizers/index.js'

export interface QaReportInput {
  /** Rows read from the input file, before any filtering */
  totalInputRows: number

  /** Rows dropped because both coordinates were absent */
  droppedWithoutCoordinates: number

  result: ReconciliationResult

  /** Output file names, listed at the end of the report */
  outputFiles?: string[]

  /**
   * Header of the clean CSV as written. The schema check is only run when
   * it is given.
   */
  cleanHeader?: readonly string[]

  /** Separator between fax numbers in the clean output (default: ",") */
  faxSeparator?: string

  title?: string
}

/**
 * A single data-quality assertion shown in the report
 */
export interface QualityCheck {
  label: string
  passed: boolean
  detail?: string
}

/**
 * Counts fax numbers in the clean output that are not dialable numbers
 */
export function countInvalidFaxNumbers(records: CanonicalRecord[], separator = ','): number {
  let invalid = 0
  for (const record of records) {
    for (const fax of record.faxNumbers.split(separator)) {
      const number = fax.trim()
      if (number === '') continue
      if (!isValidPhone(/^\d+$/.test(number) ? `+${number}` : number)) invalid++
    }
  }
  return invalid
}

/**
 * Runs the data-quality checks over a reconciliation result
 */
export function runQualityChecks(input: QaReportInput): QualityCheck[] {
  const { result } = input
  const ids = result.clean.map((record) => record.id)
  const uniqueIds = new Set(ids)
  const quarantinedIds = new Set(result.quarantine.map((row) => row.id))
  const cleanCountForQuarantined = ids.filter((id) => quarantinedIds.has(id)).length
  const invalidFax = countInvalidFaxNumbers(result.clean, input.faxSeparator)

  const checks: QualityCheck[] = [
    {
      label: 'All IDs in cleaned file are unique',
      passed: uniqueIds.size === ids.length,
      detail: `${uniqueIds.size} unique of ${ids.length}`,
    },
    {
      label: 'No empty IDs in cleaned file',
      passed: ids.every((id) => id.trim() !== ''),
    },
    {
      label: 'All rows with empty ID are in rejects file',
      passed: result.rejects.length === result.stats.missingIdRows && result.rejects.every(hasMissingId),
      detail: `${result.rejects.length} rejected`,
    },
    {
      label: 'Each quarantined ID has exactly one representative in cleaned file',
      passed: cleanCountForQuarantined === quarantinedIds.size,
      detail: `${quarantinedIds.size} quarantined IDs`,
    },
  ]

  if (input.cleanHeader) {
    checks.push(checkCleanHeader(input.cleanHeader))
  }

  checks.push({
    label: 'All fax numbers are valid phone numbers',
    passed: invalidFax === 0,
    detail: `${invalidFax} invalid`,
  })

  return checks
}

/**
 * Compares a written clean header with the target columns, position by position
 */
export function checkCleanHeader(header: readonly string[]): QualityCheck {
  const passed =
    header.length === TARGET_COLUMNS.length &&
    TARGET_COLUMNS.every((column, index) => header[index] === column)

  return {
    label: `Target schema enforced: all ${TARGET_COLUMNS.length} columns present in order`,
    passed,
    detail: `${header.length} columns written`,
  }
}

function renderCheck(check: QualityCheck): string {
  const mark = check.passed ? '✅' : '❌'
  const detail = check.detail ? ` (${check.detail})` : ''
  return `- ${mark} ${check.label}: ${check.passed}${detail}`
}

function renderTrace(trace: GroupTrace): string[] {
  const lines: string[] = [
    `## Detail trace: ${trace.id}`,
    '',
    `**Status**: ${trace.status ?? 'SINGLE'}`,
    `**Reason**: ${trace.reason}`,
    `**Total occurrences**: ${trace.totalRows}`,
    `**Unique normalized addresses**: ${trace.uniqueAddresses}`,
    '',
    '### Address analysis',
    '',
  ]

  trace.rows.forEach((row, index) => {
    lines.push(`${index + 1}. Billing code: ${row.billingCode || '(none)'}`)
    lines.push(`   - Original: ${row.address}`)
    lines.push(`   - Normalized: ${row.normalizedAddress}`)
  })

  lines.push('', '### Kept in clean file', '')
  lines.push(`- Billing codes: ${trace.kept.billingCode || '(none)'}`)
  lines.push(`- Address: ${trace.kept.address}`)

  if (trace.subgroupPreviews.length > 0) {
    lines.push('', '### Same-address subsets that would have merged', '')
    for (const preview of trace.subgroupPreviews) {
      lines.push(
        `- ${preview.normalizedAddress}: ${preview.sourceRowCount} rows, ` +
          `billing codes ${preview.billingCodes || '(none)'}, fax ${preview.faxNumbers || '(none)'}`,
      )
    }
  }

  lines.push('')
  return lines
}

/**
 * Renders the QA report as Markdown.
 *
 * @example
 * ```typescript
 * const markdown = renderQaReport({ totalInputRows: 10, droppedWithoutCoordinates: 0, result })
 * markdown.startsWith('# Establishment Data Cleaning QA Report') // true
 * ```
 */
export function renderQaReport(input: QaReportInput): string {
  const { stats } = input.result
  const lines: string[] = [
    `# ${input.title ?? 'Establishment Data Cleaning QA Report'}`,
    '',
    '## Summary Statistics',
    '',
    `- **Total input rows**: ${input.totalInputRows}`,
    `- **Rows dropped (no coordinates)**: ${input.droppedWithoutCoordinates}`,
    `- **Rows dropped (no ID)**: ${stats.missingIdRows}`,
    `- **Rows with valid ID**: ${stats.rowsWithId}`,
    `- **Unique ID values**: ${stats.uniqueIds}`,
    `- **Duplicate ID groups**: ${stats.uniqueIds - stats.singletonCount}`,
    `- **Groups merged (same address)**: ${stats.mergedGroupCount}`,
    `- **Groups with conflicts (kept first record, others quarantined)**: ${stats.quarantinedGroupCount}`,
    `- **Rows quarantined**: ${stats.quarantinedRowCount}`,
    `- **Final cleaned row count**: ${stats.cleanRecordCount}`,
    '',
    '## Data Quality Checks',
    '',
    ...runQualityChecks(input).map(renderCheck),
    '',
  ]

  for (const trace of input.result.traces) {
    lines.push(...renderTrace(trace))
  }

  if (input.outputFiles && input.outputFiles.length > 0) {
    lines.push('## Output Files Generated', '')
    input.outputFiles.forEach((file, index) => lines.push(`${index + 1}. ${file}`))
    lines.push('')
  }

  return lines.join('\n')
}
