/**
 * Fax number and fax keyword consolidation across the rows of a group
 * @module fax/fax-consolidator
 */

import type {
  EstablishmentRow,
  FaxKeyword,
  FaxKeywordLanguage,
  FaxKeywordLists,
} from '../types/establishment.js'
import type { DefaultKeywordPhrases } from '../config/reconcile-config.js'
import { DEFAULT_RECONCILE_CONFIG } from '../config/reconcile-config.js'
import type { PhoneNormalizerOptions } from '../core/normalizers/index.js'
import { normalizePhone } from '../core/normalizers/index.js'
import { parseFaxKeywords } from './keyword-codec.js'
import { isReconciliationError } from '../utils/errors.js'
import type { Logger } from '../utils/logger.js'
import { silentLogger } from '../utils/logger.js'

const FAX_SPLIT_PATTERN = /[;,]/

export interface FaxMergeOptions {
  /** Phone normalization settings applied to each fax number */
  phone?: PhoneNormalizerOptions
  /** Separator between merged numbers (default: ",") */
  separator?: string
}

export interface KeywordMergeOptions {
  /** Phrases used when no stored keyword exists */
  defaults?: DefaultKeywordPhrases
  /** Separator between fax numbers in `faxNumbers` (default: ",") */
  separator?: string
  logger?: Logger
}

type KeywordSource = Pick<EstablishmentRow, 'faxKeywordsEn' | 'faxKeywordsFr'>

/**
 * Merges raw fax values into one deduplicated list.
 * Each value may hold several numbers separated by `,` or `;`. Numbers are
 * normalized without prefix; first occurrence wins the position.
 *
 * @param values - Raw fax values, in row order
 * @returns Fax numbers joined with the separator
 *
 * @example
 * ```typescript
 * mergeFaxNumbers(['5551234567', '', '555-123-4567;5559998888'])
 * // '15551234567,15559998888'
 * ```
 */
export function mergeFaxNumbers(values: unknown[], options: FaxMergeOptions = {}): string {
  const separator = options.separator ?? DEFAULT_RECONCILE_CONFIG.faxSeparator
  const seen = new Set<string>()
  const merged: string[] = []

  for (const value of values) {
    if (value == null || value === '') continue

    for (const piece of String(value).split(FAX_SPLIT_PATTERN)) {
      const normalized = normalizePhone(piece.trim(), false, options.phone)
      if (!normalized || seen.has(normalized)) continue
      seen.add(normalized)
      merged.push(normalized)
    }
  }

  return merged.join(separator)
}

/**
 * Builds one default keyword entry per fax number and language.
 *
 * @example
 * ```typescript
 * defaultFaxKeywords('15141234567')
 * // { en: [{ faxNumber: '15141234567', keyword: 'general inquiries', language: 'en' }],
 * //   fr: [{ faxNumber: '15141234567', keyword: 'renseignements généraux', language: 'fr' }] }
 * ```
 */
export function defaultFaxKeywords(
  faxNumbers: string,
  defaults: DefaultKeywordPhrases = DEFAULT_RECONCILE_CONFIG.defaultKeywords,
  separator: string = DEFAULT_RECONCILE_CONFIG.faxSeparator,
): FaxKeywordLists {
  const numbers = faxNumbers
    .split(separator)
    .map((fax) => fax.trim())
    .filter((fax) => fax !== '')

  const build = (language: FaxKeywordLanguage): FaxKeyword[] =>
    numbers.map((faxNumber) => ({ faxNumber, keyword: defaults[language], language }))

  return { en: build('en'), fr: build('fr') }
}

function collectKeywords(
  rows: KeywordSource[],
  language: FaxKeywordLanguage,
  logger: Logger,
): FaxKeyword[] {
  const byFax = new Map<string, FaxKeyword>()

  for (const row of rows) {
    const stored = language === 'en' ? row.faxKeywordsEn : row.faxKeywordsFr
    if (!stored || stored.trim() === '' || stored.trim() === '[]') continue

    let entries: FaxKeyword[]
    try {
      entries = parseFaxKeywords(stored, language)
    } catch (error) {
      if (!isReconciliationError(error)) throw error
      logger.debug('Skipping malformed fax keyword payload', { language, error })
      continue
    }

    // later rows overwrite earlier entries for the same fax number
    for (const entry of entries) {
      byFax.set(entry.faxNumber, entry)
    }
  }

  return Array.from(byFax.values())
}

/**
 * Merges the stored keyword lists of a group.
 *
 * Entries are collected in row order and deduplicated per language by fax
 * number, a later entry replacing an earlier one. When no row carries any
 * entry, defaults are synthesized for every number in `faxNumbers`.
 *
 * @param rows - Group rows, in row order
 * @param faxNumbers - Merged fax numbers of the group
 *
 * @example
 * ```typescript
 * mergeFaxKeywords([{ faxKeywordsEn: '', faxKeywordsFr: '' }], '15141234567')
 * // defaults for 15141234567 in both languages
 * ```
 */
export function mergeFaxKeywords(
  rows: KeywordSource[],
  faxNumbers: string,
  options: KeywordMergeOptions = {},
): FaxKeywordLists {
  const logger = options.logger ?? silentLogger
  const en = collectKeywords(rows, 'en', logger)
  const fr = collectKeywords(rows, 'fr', logger)

  if (en.length > 0 || fr.length > 0) {
    return { en, fr }
  }

  if (faxNumbers !== '') {
    return defaultFaxKeywords(faxNumbers, options.defaults, options.separator)
  }

  return { en: [], fr: [] }
}
