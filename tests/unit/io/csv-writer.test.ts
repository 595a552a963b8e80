import { describe, it, expect } from 'vitest'
import {
  writeCleanCsv,
  writeRowsCsv,
  writeAuditCsv,
  formatCell,
  TARGET_COLUMNS,
} from '../../../src/io/index.js'
import { toCanonicalRecord } from '../../../src/reconciliation/index.js'
import { createRow } from '../../fixtures/establishments.js'

const DEFAULT_ROW_CELLS = [
  'X1',
  '',
  'Clinique Test',
  '1 Main St',
  'Montreal',
  'QC',
  'CA',
  'Quebec',
  '',
  '',
  '',
  '',
  '',
  '',
  '',
  'clinic',
  '',
  '45.5',
  '-73.6',
  '1700000000',
  '',
  '0',
]

describe('formatCell', () => {
  it('formats numbers and absent values', () => {
    expect(formatCell(0)).toBe('0')
    expect(formatCell(-73.6)).toBe('-73.6')
    expect(formatCell(null)).toBe('')
    expect(formatCell(Number.NaN)).toBe('')
    expect(formatCell('x')).toBe('x')
  })
})

describe('writeCleanCsv', () => {
  it('writes the target columns in order', () => {
    const lines = writeCleanCsv([toCanonicalRecord(createRow())]).split('\n')

    expect(lines[0]).toBe(TARGET_COLUMNS.join(','))
    expect(lines[1]).toBe(DEFAULT_ROW_CELLS.join(','))
    expect(lines[2]).toBe('')
  })

  it('writes absent coordinates as empty cells', () => {
    const lines = writeCleanCsv([toCanonicalRecord(createRow({ latitude: null }))]).split('\n')

    expect(lines[1].split(',')[17]).toBe('')
  })

  it('quotes keyword JSON', () => {
    const record = toCanonicalRecord(
      createRow({ faxKeywordsEn: '[{"fax_number":"1","keyword_en":"x"}]' })
    )
    const lines = writeCleanCsv([record]).split('\n')

    expect(lines[1]).toContain(',"[{""fax_number"":""1"",""keyword_en"":""x""}]",')
  })
})

describe('writeRowsCsv', () => {
  it('appends the address key column', () => {
    const lines = writeRowsCsv([createRow()]).split('\n')

    expect(lines[0]).toBe([...TARGET_COLUMNS, 'normalized_address'].join(','))
    expect(lines[1]).toBe([...DEFAULT_ROW_CELLS, '1 MAIN ST'].join(','))
  })
})

describe('writeAuditCsv', () => {
  it('encodes field conflicts as JSON', () => {
    const lines = writeAuditCsv([
      {
        id: 'X1',
        normalizedAddress: '1 MAIN ST',
        sourceRowCount: 2,
        mergedBillingCodes: 'A1;B2',
        mergedFaxNumbers: '15551234567',
        fieldConflicts: {},
        status: 'MERGED',
      },
      {
        id: 'X2',
        normalizedAddress: 'MULTIPLE_ADDRESSES',
        sourceRowCount: 2,
        mergedBillingCodes: 'C3',
        mergedFaxNumbers: '',
        fieldConflicts: { addresses: ['2 B ST', '1 A ST'] },
        status: 'KEPT_FIRST_QUARANTINED_OTHERS',
      },
    ]).split('\n')

    expect(lines[0]).toBe(
      'id,normalized_address,source_row_count,merged_ramq_codes,merged_fax_numbers,field_conflicts,status'
    )
    expect(lines[1]).toBe('X1,1 MAIN ST,2,A1;B2,15551234567,{},MERGED')
    expect(lines[2]).toBe(
      'X2,MULTIPLE_ADDRESSES,2,C3,,"{""addresses"":[""2 B ST"",""1 A ST""]}",KEPT_FIRST_QUARANTINED_OTHERS'
    )
  })
})
