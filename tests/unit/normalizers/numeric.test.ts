import { describe, it, expect } from 'vitest'
import {
  parseCoordinate,
  parseTimestamp,
  parseFlag,
} from '../../../src/core/normalizers/index'

describe('Numeric Normalizers', () => {
  describe('parseCoordinate', () => {
    it('parses decimal text', () => {
      expect(parseCoordinate('45.5017')).toBe(45.5017)
      expect(parseCoordinate(' -73.6 ')).toBe(-73.6)
    })

    it('passes finite numbers through', () => {
      expect(parseCoordinate(12)).toBe(12)
    })

    it('returns null for unparsable input', () => {
      expect(parseCoordinate('n/a')).toBeNull()
      expect(parseCoordinate('')).toBeNull()
      expect(parseCoordinate(null)).toBeNull()
      expect(parseCoordinate(Number.NaN)).toBeNull()
      expect(parseCoordinate('Infinity')).toBeNull()
    })
  })

  describe('parseTimestamp', () => {
    it('truncates fractions', () => {
      expect(parseTimestamp('1723600000')).toBe(1723600000)
      expect(parseTimestamp('12.9')).toBe(12)
      expect(parseTimestamp('-3.7')).toBe(-3)
    })

    it('returns 0 for unparsable input', () => {
      expect(parseTimestamp('soon')).toBe(0)
      expect(parseTimestamp('')).toBe(0)
    })
  })

  describe('parseFlag', () => {
    it('parses 0/1 flags', () => {
      expect(parseFlag('1')).toBe(1)
      expect(parseFlag('1.0')).toBe(1)
      expect(parseFlag('')).toBe(0)
    })
  })
})
