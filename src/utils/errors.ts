/**
 * Central error classes and validation utilities
 * @module utils/errors
 */

/**
 * Base error class for all reconciliation errors
 */
export class ReconciliationError extends Error {
  /** Error code for programmatic error handling */
  public readonly code: string

  /** Additional error context */
  public readonly context?: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context?: Record<string, unknown>
  ) {
    super(message)
    this.name = 'ReconciliationError'
    this.code = code
    this.context = context

    // Maintains proper stack trace (Node.js specific)
    if (typeof Error.captureStackTrace === 'function') {
      Error.captureStackTrace(this, this.constructor)
    }
  }
}

/**
 * Error thrown when configuration is invalid
 */
export class ConfigurationError extends ReconciliationError {
  public readonly field?: string

  constructor(message: string, field?: string, context?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', { field, ...context })
    this.name = 'ConfigurationError'
    this.field = field
  }
}

/**
 * Error thrown when the input table lacks columns the pipeline needs
 */
export class InputSchemaError extends ReconciliationError {
  public readonly missingColumns: string[]

  constructor(missingColumns: string[], context?: Record<string, unknown>) {
    super(
      `Input is missing required columns: ${missingColumns.join(', ')}`,
      'INPUT_SCHEMA_ERROR',
      { missingColumns, ...context }
    )
    this.name = 'InputSchemaError'
    this.missingColumns = missingColumns
  }
}

/**
 * Error thrown when a stored fax keyword list cannot be read
 */
export class KeywordPayloadError extends ReconciliationError {
  public readonly payload: string

  constructor(payload: string, reason: string) {
    super(`Malformed fax keyword payload: ${reason}`, 'KEYWORD_PAYLOAD_ERROR', {
      payload,
      reason,
    })
    this.name = 'KeywordPayloadError'
    this.payload = payload
  }
}

// ==================== VALIDATION UTILITIES ====================

/**
 * Validates that a string is non-empty
 */
export function requireNonEmptyString(value: unknown, parameterName: string): string {
  if (typeof value !== 'string') {
    throw new ConfigurationError(`${parameterName} must be a string`, parameterName, {
      value,
    })
  }
  if (value.trim().length === 0) {
    throw new ConfigurationError(`${parameterName} must not be empty`, parameterName)
  }
  return value
}

/**
 * Check if an error belongs to this library
 */
export function isReconciliationError(error: unknown): error is ReconciliationError {
  return error instanceof ReconciliationError
}
