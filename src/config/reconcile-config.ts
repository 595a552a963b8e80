/**
 * Reconciliation configuration and defaults
 * @module config/reconcile-config
 */

import type { FaxKeywordLanguage } from '../types/establishment.js'
import type { PhoneNormalizerOptions } from '../core/normalizers/index.js'
import { DEFAULT_PHONE_OPTIONS } from '../core/normalizers/index.js'
import { ConfigurationError, requireNonEmptyString } from '../utils/errors.js'

/**
 * Keyword phrase attached to a fax number when no stored keyword exists
 */
export type DefaultKeywordPhrases = Record<FaxKeywordLanguage, string>

/**
 * Overall reconciliation configuration
 */
export interface ReconcileConfig {
  /** Phrases used to synthesize keyword entries, per language */
  defaultKeywords: DefaultKeywordPhrases

  /** Phone/fax normalization settings */
  phone: Required<PhoneNormalizerOptions>

  /** Identifiers for which a detailed group trace is collected */
  trace: string[]

  /** Separator between merged billing codes and categories */
  billingSeparator: string

  /** Separator between merged fax numbers */
  faxSeparator: string
}

/**
 * Partial configuration accepted from callers and config files
 */
export interface ReconcileConfigInput {
  defaultKeywords?: Partial<DefaultKeywordPhrases>
  phone?: PhoneNormalizerOptions
  trace?: string[]
  billingSeparator?: string
  faxSeparator?: string
}

/**
 * Default reconciliation configuration
 */
export const DEFAULT_RECONCILE_CONFIG: ReconcileConfig = {
  defaultKeywords: {
    en: 'general inquiries',
    fr: 'renseignements généraux',
  },
  phone: { ...DEFAULT_PHONE_OPTIONS },
  trace: [],
  billingSeparator: ';',
  faxSeparator: ',',
}

/**
 * Merges caller overrides onto the defaults and validates the result.
 *
 * @throws {ConfigurationError} If a value is empty or malformed
 *
 * @example
 * ```typescript
 * const config = resolveConfig({ trace: ['ChIJtest-place'] })
 * config.defaultKeywords.en // 'general inquiries'
 * ```
 */
export function resolveConfig(input: ReconcileConfigInput = {}): ReconcileConfig {
  const config: ReconcileConfig = {
    defaultKeywords: {
      ...DEFAULT_RECONCILE_CONFIG.defaultKeywords,
      ...input.defaultKeywords,
    },
    phone: { ...DEFAULT_RECONCILE_CONFIG.phone, ...input.phone },
    trace: [...(input.trace ?? DEFAULT_RECONCILE_CONFIG.trace)],
    billingSeparator: input.billingSeparator ?? DEFAULT_RECONCILE_CONFIG.billingSeparator,
    faxSeparator: input.faxSeparator ?? DEFAULT_RECONCILE_CONFIG.faxSeparator,
  }

  validateConfig(config)
  return config
}

/**
 * Validates a complete reconciliation configuration
 *
 * @throws {ConfigurationError} If configuration is invalid
 */
export function validateConfig(config: ReconcileConfig): void {
  requireNonEmptyString(config.defaultKeywords.en, 'defaultKeywords.en')
  requireNonEmptyString(config.defaultKeywords.fr, 'defaultKeywords.fr')

  if (!/^\d{1,3}$/.test(config.phone.countryCode)) {
    throw new ConfigurationError(
      `phone.countryCode must be 1 to 3 digits, got '${config.phone.countryCode}'`,
      'phone.countryCode',
    )
  }

  requireNonEmptyString(config.billingSeparator, 'billingSeparator')
  requireNonEmptyString(config.faxSeparator, 'faxSeparator')

  for (const id of config.trace) {
    requireNonEmptyString(id, 'trace')
  }
}
