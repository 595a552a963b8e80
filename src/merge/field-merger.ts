/**
 * Applies a named strategy to one field across a group of rows
 * @module merge/field-merger
 */

import type { FieldMergeOptions, FieldMergeResult, MergeStrategy } from './types.js'
import { getStrategy, distinctNonEmpty } from './strategies/index.js'

/**
 * Merges the values of one field taken from every row of a group.
 *
 * @param values - One value per row, in row order
 * @param strategy - Registered strategy name
 * @param options - Strategy options
 * @returns The chosen value plus the distinct values used for conflict reporting
 * @throws {InvalidStrategyError} If the strategy is not registered
 *
 * @example
 * ```typescript
 * mergeField(['Clinique A', 'Clinique B', 'Clinique A'], 'mostFrequent')
 * // { value: 'Clinique A', hadConflict: true, distinctValues: ['Clinique A', 'Clinique B'] }
 * ```
 */
export function mergeField<T>(
  values: T[],
  strategy: MergeStrategy | string,
  options?: FieldMergeOptions,
): FieldMergeResult<T> {
  const fn = getStrategy(strategy)
  const distinctValues = distinctNonEmpty(values)

  return {
    value: fn(values, options),
    hadConflict: distinctValues.length > 1,
    distinctValues,
  }
}
