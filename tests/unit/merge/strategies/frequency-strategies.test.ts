import { describe, it, expect } from 'vitest'
import {
  mostFrequent,
  distinctNonEmpty,
} from '../../../../src/merge/strategies/frequency-strategies.js'

describe('Frequency Strategies', () => {
  describe('mostFrequent', () => {
    it('returns the most common value', () => {
      expect(mostFrequent(['a', 'b', 'b'])).toBe('b')
    })

    it('breaks ties by first appearance', () => {
      expect(mostFrequent(['x', 'y'])).toBe('x')
      expect(mostFrequent(['b', 'a', 'a', 'b'])).toBe('b')
    })

    it('ignores empty values', () => {
      expect(mostFrequent(['', '', null, 'value'])).toBe('value')
      expect(mostFrequent([Number.NaN, Number.NaN, 1])).toBe(1)
    })

    it('returns undefined when every value is empty', () => {
      expect(mostFrequent(['', null])).toBeUndefined()
      expect(mostFrequent([])).toBeUndefined()
    })

    it('works on numbers', () => {
      expect(mostFrequent([45.5, 45.6, 45.6])).toBe(45.6)
    })
  })

  describe('distinctNonEmpty', () => {
    it('returns distinct values in first-seen order', () => {
      expect(distinctNonEmpty(['a', '', 'b', 'a', null])).toEqual(['a', 'b'])
    })
  })
})
