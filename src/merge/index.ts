/**
 * Field merge module
 * @module merge
 */

// Types
export type {
  MergeStrategy,
  FieldMergeOptions,
  StrategyFunction,
  FieldMergeResult,
} from './types.js'

export { MERGE_STRATEGIES } from './types.js'

// Errors
export { InvalidStrategyError } from './merge-error.js'

// Strategies
export {
  registerStrategy,
  getStrategy,
  hasStrategy,
  getRegisteredStrategies,
  unregisterStrategy,
  clearStrategies,
  isBuiltInStrategy,
  registerBuiltInStrategies,
  mostFrequent,
  distinctNonEmpty,
  union,
} from './strategies/index.js'

export { mergeField } from './field-merger.js'
