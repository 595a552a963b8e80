import { describe, it, expect } from 'vitest'
import {
  renderQaReport,
  runQualityChecks,
  countInvalidFaxNumbers,
  checkCleanHeader,
} from '../../../src/report/index.js'
import { TARGET_COLUMNS } from '../../../src/io/index.js'
import { reconcileEstablishments, toCanonicalRecord } from '../../../src/reconciliation/index.js'
import { createRow } from '../../fixtures/establishments.js'

function sampleResult(trace: string[] = []) {
  return reconcileEstablishments(
    [
      createRow({ id: '' }),
      createRow({ id: 'X1', billingCode: 'A1' }),
      createRow({ id: 'X1', billingCode: 'B2' }),
      createRow({ id: 'X2', address: '2 B St', billingCode: 'C3' }),
      createRow({ id: 'X2', address: '1 A St', billingCode: 'D4' }),
      createRow({ id: 'S1', address: '5 Solo Ave', faxNumbers: '15148721234' }),
    ],
    { config: { trace } }
  )
}

describe('countInvalidFaxNumbers', () => {
  it('counts numbers that cannot be dialed', () => {
    const records = [
      toCanonicalRecord(createRow({ faxNumbers: '12345' })),
      toCanonicalRecord(createRow({ faxNumbers: '' })),
    ]

    expect(countInvalidFaxNumbers(records)).toBe(1)
  })
})

describe('runQualityChecks', () => {
  it('passes on a reconciled result', () => {
    const checks = runQualityChecks({
      totalInputRows: 6,
      droppedWithoutCoordinates: 0,
      result: sampleResult(),
      cleanHeader: [...TARGET_COLUMNS],
    })

    expect(checks).toHaveLength(6)
    expect(checks.every((check) => check.passed)).toBe(true)
  })

  it('skips the schema check when no header is given', () => {
    const checks = runQualityChecks({
      totalInputRows: 6,
      droppedWithoutCoordinates: 0,
      result: sampleResult(),
    })

    expect(checks.map((check) => check.label)).not.toContain(
      'Target schema enforced: all 22 columns present in order'
    )
    expect(checks).toHaveLength(5)
  })

  it('fails when clean ids repeat', () => {
    const result = sampleResult()
    const [check] = runQualityChecks({
      totalInputRows: 6,
      droppedWithoutCoordinates: 0,
      result: { ...result, clean: [result.clean[0], result.clean[0]] },
    })

    expect(check).toEqual({
      label: 'All IDs in cleaned file are unique',
      passed: false,
      detail: '1 unique of 2',
    })
  })
})

describe('renderQaReport', () => {
  it('renders statistics and checks', () => {
    const lines = renderQaReport({
      totalInputRows: 7,
      droppedWithoutCoordinates: 1,
      result: sampleResult(),
    }).split('\n')

    expect(lines[0]).toBe('# Establishment Data Cleaning QA Report')
    expect(lines).toContain('- **Total input rows**: 7')
    expect(lines).toContain('- **Rows dropped (no coordinates)**: 1')
    expect(lines).toContain('- **Rows dropped (no ID)**: 1')
    expect(lines).toContain('- **Duplicate ID groups**: 2')
    expect(lines).toContain('- **Rows quarantined**: 2')
    expect(lines).toContain('- **Final cleaned row count**: 3')
    expect(lines).toContain('- ✅ All IDs in cleaned file are unique: true (3 unique of 3)')
    expect(lines).toContain('- ✅ All rows with empty ID are in rejects file: true (1 rejected)')
    expect(lines).toContain(
      '- ✅ Each quarantined ID has exactly one representative in cleaned file: true (1 quarantined IDs)'
    )
    expect(lines).toContain('- ✅ All fax numbers are valid phone numbers: true (0 invalid)')
  })

  it('renders traces and output files', () => {
    const lines = renderQaReport({
      totalInputRows: 6,
      droppedWithoutCoordinates: 0,
      result: sampleResult(['X2']),
      outputFiles: ['establishments_clean.csv', '_qa_report.md'],
      title: 'Nightly QA',
    }).split('\n')

    expect(lines[0]).toBe('# Nightly QA')
    expect(lines).toContain('## Detail trace: X2')
    expect(lines).toContain('**Status**: KEPT_FIRST_QUARANTINED_OTHERS')
    expect(lines).toContain('- Billing codes: C3;D4')
    expect(lines).toContain('- Address: 1 A St')
    expect(lines).toContain('## Output Files Generated')
    expect(lines).toContain('1. establishments_clean.csv')
    expect(lines).toContain('2. _qa_report.md')
  })
})

describe('checkCleanHeader', () => {
  it('passes for the target columns in order', () => {
    expect(checkCleanHeader(TARGET_COLUMNS)).toEqual({
      label: 'Target schema enforced: all 22 columns present in order',
      passed: true,
      detail: '22 columns written',
    })
  })

  it('fails when columns are swapped', () => {
    const header = [...TARGET_COLUMNS]
    header[0] = 'admin_user_id'
    header[1] = 'id'

    expect(checkCleanHeader(header).passed).toBe(false)
  })

  it('fails when a column is missing', () => {
    expect(checkCleanHeader(TARGET_COLUMNS.slice(0, 21))).toEqual({
      label: 'Target schema enforced: all 22 columns present in order',
      passed: false,
      detail: '21 columns written',
    })
  })
})
