/**
 * Storage form of fax keyword lists.
 *
 * Keyword lists are stored as JSON text, one array per language:
 * `[{"fax_number":"15145550123","keyword_en":"general inquiries"}]`.
 * Everything inside the engine works on typed {@link FaxKeyword} entries;
 * conversion happens only here.
 *
 * @module fax/keyword-codec
 */

import { z } from 'zod'
import type { FaxKeyword, FaxKeywordLanguage } from '../types/establishment.js'
import { KeywordPayloadError } from '../utils/errors.js'

const payloadSchema = z.array(z.unknown())

const storedEntrySchema = z
  .object({
    fax_number: z.union([z.string(), z.number()]).transform((value) => String(value)),
  })
  .passthrough()

function keywordOf(entry: Record<string, unknown>, language: FaxKeywordLanguage): string {
  const localized = entry[`keyword_${language}`]
  if (typeof localized === 'string') return localized
  const generic = entry.keyword
  return typeof generic === 'string' ? generic : ''
}

/**
 * Parses a stored keyword list.
 * Blank text is an empty list. Entries without a `fax_number` are ignored.
 *
 * @throws {KeywordPayloadError} If the text is not a JSON array
 *
 * @example
 * ```typescript
 * parseFaxKeywords('[{"fax_number":"15145550123","keyword_fr":"urgence"}]', 'fr')
 * // [{ faxNumber: '15145550123', keyword: 'urgence', language: 'fr' }]
 * ```
 */
export function parseFaxKeywords(text: string, language: FaxKeywordLanguage): FaxKeyword[] {
  if (text.trim() === '') return []

  let decoded: unknown
  try {
    decoded = JSON.parse(text)
  } catch (error) {
    throw new KeywordPayloadError(text, error instanceof Error ? error.message : String(error))
  }

  const payload = payloadSchema.safeParse(decoded)
  if (!payload.success) {
    throw new KeywordPayloadError(text, 'expected a JSON array')
  }

  const keywords: FaxKeyword[] = []
  for (const item of payload.data) {
    const entry = storedEntrySchema.safeParse(item)
    if (!entry.success) continue
    keywords.push({
      faxNumber: entry.data.fax_number,
      keyword: keywordOf(entry.data, language),
      language,
    })
  }
  return keywords
}

/**
 * Serializes a keyword list to its stored JSON form.
 *
 * @example
 * ```typescript
 * serializeFaxKeywords([{ faxNumber: '15145550123', keyword: 'general inquiries', language: 'en' }], 'en')
 * // '[{"fax_number":"15145550123","keyword_en":"general inquiries"}]'
 * serializeFaxKeywords([], 'fr') // '[]'
 * ```
 */
export function serializeFaxKeywords(
  keywords: FaxKeyword[],
  language: FaxKeywordLanguage,
): string {
  return JSON.stringify(
    keywords.map((keyword) => ({
      fax_number: keyword.faxNumber,
      [`keyword_${language}`]: keyword.keyword,
    })),
  )
}
