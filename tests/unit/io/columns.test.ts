import { describe, it, expect } from 'vitest'
import {
  TARGET_COLUMNS,
  AUDIT_COLUMNS,
  isTargetColumn,
  mapSourceColumn,
} from '../../../src/io/index.js'

describe('Column layout', () => {
  it('has 22 target columns in fixed order', () => {
    expect(TARGET_COLUMNS).toHaveLength(22)
    expect(TARGET_COLUMNS[0]).toBe('id')
    expect(TARGET_COLUMNS[1]).toBe('admin_user_id')
    expect(TARGET_COLUMNS[13]).toBe('ramq_code')
    expect(TARGET_COLUMNS[21]).toBe('is_fax_enabled')
  })

  it('lists the audit columns', () => {
    expect(AUDIT_COLUMNS).toEqual([
      'id',
      'normalized_address',
      'source_row_count',
      'merged_ramq_codes',
      'merged_fax_numbers',
      'field_conflicts',
      'status',
    ])
  })

  describe('mapSourceColumn', () => {
    it('renames mapped source columns', () => {
      expect(mapSourceColumn('code')).toBe('ramq_code')
    })

    it('keeps target columns and trims headers', () => {
      expect(mapSourceColumn(' name ')).toBe('name')
    })

    it('drops unknown columns', () => {
      expect(mapSourceColumn('rating')).toBeNull()
    })

    it('ignores headers named after object members', () => {
      expect(mapSourceColumn('constructor')).toBeNull()
      expect(mapSourceColumn('toString')).toBeNull()
      expect(mapSourceColumn('__proto__')).toBeNull()
    })
  })

  it('recognizes target columns', () => {
    expect(isTargetColumn('fax_numbers')).toBe(true)
    expect(isTargetColumn('code')).toBe(false)
  })
})
