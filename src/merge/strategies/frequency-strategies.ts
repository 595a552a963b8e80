/**
 * Frequency-based merge strategies: mostFrequent
 * @module merge/strategies/frequency-strategies
 */

import type { StrategyFunction } from '../types.js'
import { isEmptyValue } from '../../core/normalizers/index.js'

/**
 * Returns the distinct non-empty values in first-seen order.
 *
 * @example
 * ```typescript
 * distinctNonEmpty(['a', '', 'b', 'a']) // ['a', 'b']
 * ```
 */
export function distinctNonEmpty<T>(values: T[]): T[] {
  const seen = new Set<T>()
  const result: T[] = []
  for (const value of values) {
    if (isEmptyValue(value) || seen.has(value)) continue
    seen.add(value)
    result.push(value)
  }
  return result
}

/**
 * Returns the most frequently occurring non-empty value.
 * Ties go to the value seen first, so the result never depends on map
 * iteration order.
 *
 * @example
 * ```typescript
 * mostFrequent(['a', 'b', 'b'])      // 'b'
 * mostFrequent(['x', 'y'])           // 'x' (tie: returns first)
 * mostFrequent(['', null, 'value'])  // 'value'
 * mostFrequent([45.5, 45.5, 45.6])   // 45.5
 * ```
 */
export const mostFrequent: StrategyFunction = (values: unknown[]): unknown => {
  if (!values || values.length === 0) return undefined

  const frequencies = new Map<unknown, { count: number; firstIndex: number }>()

  values.forEach((value, index) => {
    if (isEmptyValue(value)) return
    const existing = frequencies.get(value)
    if (existing) {
      existing.count += 1
    } else {
      frequencies.set(value, { count: 1, firstIndex: index })
    }
  })

  let maxCount = 0
  let maxFirstIndex = Infinity
  let result: unknown = undefined

  for (const [value, { count, firstIndex }] of frequencies) {
    if (count > maxCount || (count === maxCount && firstIndex < maxFirstIndex)) {
      maxCount = count
      maxFirstIndex = firstIndex
      result = value
    }
  }

  return result
}
