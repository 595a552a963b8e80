import { describe, it, expect } from 'vitest'
import {
  cleanString,
  numericOnly,
  isEmptyValue,
} from '../../../src/core/normalizers/index'

describe('Basic Normalizers', () => {
  describe('cleanString', () => {
    it('trims and collapses internal whitespace', () => {
      expect(cleanString('  Clinique   du  Parc ')).toBe('Clinique du Parc')
    })

    it('collapses newlines and tabs', () => {
      expect(cleanString('line\n\n\tbreak')).toBe('line break')
    })

    it('returns empty string for null and undefined', () => {
      expect(cleanString(null)).toBe('')
      expect(cleanString(undefined)).toBe('')
    })

    it('stringifies numbers', () => {
      expect(cleanString(42)).toBe('42')
    })
  })

  describe('numericOnly', () => {
    it('keeps only digits', () => {
      expect(numericOnly('(514) 555-0123')).toBe('5145550123')
    })

    it('returns empty string for null', () => {
      expect(numericOnly(null)).toBe('')
    })
  })

  describe('isEmptyValue', () => {
    it('treats null, undefined, NaN and blank strings as empty', () => {
      expect(isEmptyValue(null)).toBe(true)
      expect(isEmptyValue(undefined)).toBe(true)
      expect(isEmptyValue(Number.NaN)).toBe(true)
      expect(isEmptyValue('   ')).toBe(true)
    })

    it('treats zero and text as present', () => {
      expect(isEmptyValue(0)).toBe(false)
      expect(isEmptyValue('x')).toBe(false)
    })
  })
})
