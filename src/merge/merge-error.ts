/**
 * Merge-specific error classes
 * @module merge/merge-error
 */

import { ReconciliationError } from '../utils/errors.js'

/**
 * Error thrown when a merge strategy is not found or invalid
 */
export class InvalidStrategyError extends ReconciliationError {
  /** The invalid strategy name */
  public readonly strategy: string

  constructor(strategy: string, reason?: string, context?: Record<string, unknown>) {
    super(
      reason
        ? `Invalid merge strategy '${strategy}': ${reason}`
        : `Invalid merge strategy: '${strategy}'`,
      'INVALID_STRATEGY',
      { strategy, ...context },
    )
    this.name = 'InvalidStrategyError'
    this.strategy = strategy
  }
}
