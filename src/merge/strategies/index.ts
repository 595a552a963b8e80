/**
 * Merge strategies module - exports all strategy implementations and the registry
 * @module merge/strategies
 */

// Strategy registry
export {
  registerStrategy,
  getStrategy,
  hasStrategy,
  getRegisteredStrategies,
  unregisterStrategy,
  clearStrategies,
  isBuiltInStrategy,
} from './strategy-registry.js'

export { mostFrequent, distinctNonEmpty } from './frequency-strategies.js'
export { union } from './array-strategies.js'

import { mostFrequent } from './frequency-strategies.js'
import { union } from './array-strategies.js'
import { registerStrategy } from './strategy-registry.js'

/**
 * Register all built-in strategies with the registry.
 * This function is called automatically when the module is imported.
 */
export function registerBuiltInStrategies(): void {
  registerStrategy('mostFrequent', mostFrequent)
  registerStrategy('union', union)
}

// Auto-register built-in strategies on module load
registerBuiltInStrategies()
