/**
 * Strategy registry for managing merge strategies
 * @module merge/strategies/strategy-registry
 */

import type { StrategyFunction, MergeStrategy } from '../types.js'
import { MERGE_STRATEGIES } from '../types.js'
import { InvalidStrategyError } from '../merge-error.js'

/**
 * Registry mapping strategy names to their implementations
 */
const strategyRegistry = new Map<string, StrategyFunction>()

/**
 * Register a strategy implementation
 *
 * @param name - The strategy name (can be a built-in MergeStrategy or custom name)
 * @param fn - The strategy function implementation
 * @throws {InvalidStrategyError} If strategy name is empty
 *
 * @example
 * ```typescript
 * registerStrategy('preferLast', (values) => values.filter(Boolean).at(-1))
 * ```
 */
export function registerStrategy(name: string, fn: StrategyFunction): void {
  if (!name || name.trim() === '') {
    throw new InvalidStrategyError(name, 'strategy name cannot be empty')
  }
  strategyRegistry.set(name, fn)
}

/**
 * Retrieve a strategy implementation by name
 *
 * @throws {InvalidStrategyError} If strategy is not found
 */
export function getStrategy(name: string): StrategyFunction {
  const strategy = strategyRegistry.get(name)
  if (!strategy) {
    throw new InvalidStrategyError(
      name,
      `unknown strategy. Available strategies: ${getRegisteredStrategies().join(', ')}`,
    )
  }
  return strategy
}

/**
 * Check if a strategy is registered
 */
export function hasStrategy(name: string): boolean {
  return strategyRegistry.has(name)
}

/**
 * Get all registered strategy names
 */
export function getRegisteredStrategies(): string[] {
  return Array.from(strategyRegistry.keys())
}

/**
 * Remove a strategy from the registry
 *
 * @returns True if the strategy was removed, false if it wasn't registered
 */
export function unregisterStrategy(name: string): boolean {
  return strategyRegistry.delete(name)
}

/**
 * Clear all registered strategies (useful for testing)
 */
export function clearStrategies(): void {
  strategyRegistry.clear()
}

/**
 * Check if a strategy name is a built-in MergeStrategy
 */
export function isBuiltInStrategy(name: string): name is MergeStrategy {
  return MERGE_STRATEGIES.some((strategy) => strategy === name)
}
