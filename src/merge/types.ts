/**
 * Merge-related type definitions for group reconciliation
 * @module merge/types
 */

/**
 * Built-in merge strategies for field values.
 *
 * - `mostFrequent` - Use the most common non-empty value, earliest on ties
 * - `union` - Distinct non-empty values from all records, first-seen order
 */
export type MergeStrategy = 'mostFrequent' | 'union'

/**
 * Array of all built-in merge strategy names
 */
export const MERGE_STRATEGIES: MergeStrategy[] = ['mostFrequent', 'union']

/**
 * Options for configuring merge strategies
 */
export interface FieldMergeOptions {
  /** Separator used when a strategy joins values into one string */
  separator?: string
}

/**
 * Strategy function signature for applying merge strategies.
 * `values` holds one entry per source row, in row order.
 */
export type StrategyFunction = (
  values: unknown[],
  options?: FieldMergeOptions,
) => unknown

/**
 * Result from applying a strategy to a field
 */
export interface FieldMergeResult<T = unknown> {
  /** The selected/computed value; undefined when every source was empty */
  value: unknown

  /** Whether more than one distinct non-empty value was seen */
  hadConflict: boolean

  /** Distinct non-empty values, first-seen order */
  distinctValues: T[]
}
