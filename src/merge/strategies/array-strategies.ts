/**
 * Array merge strategies: union
 * @module merge/strategies/array-strategies
 */

import type { StrategyFunction, FieldMergeOptions } from '../types.js'
import { distinctNonEmpty } from './frequency-strategies.js'

/**
 * Creates a union of the distinct non-empty values, in first-seen order.
 * With a `separator` option the union is joined into a single string.
 *
 * @example
 * ```typescript
 * union(['A1', '', 'B2', 'A1'])                       // ['A1', 'B2']
 * union(['A1', 'B2', 'A1'], { separator: ';' })      // 'A1;B2'
 * union([null, ''], { separator: ';' })              // ''
 * ```
 */
export const union: StrategyFunction = (
  values: unknown[],
  options?: FieldMergeOptions
): unknown[] | string => {
  const distinct = distinctNonEmpty(values ?? [])
  if (options?.separator !== undefined) {
    return distinct.map((value) => String(value)).join(options.separator)
  }
  return distinct
}
