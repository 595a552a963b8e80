import { describe, it, expect } from 'vitest'
import {
  mergeFaxNumbers,
  mergeFaxKeywords,
  defaultFaxKeywords,
} from '../../../src/fax/index.js'
import { createSpyLogger } from '../../fixtures/establishments.js'

const noKeywords = { faxKeywordsEn: '', faxKeywordsFr: '' }

describe('Fax consolidation', () => {
  describe('mergeFaxNumbers', () => {
    it('splits, normalizes and deduplicates numbers in first-seen order', () => {
      expect(mergeFaxNumbers(['5551234567', '', '555-123-4567;5559998888'])).toBe(
        '15551234567,15559998888'
      )
    })

    it('accepts comma-separated values with spaces', () => {
      expect(mergeFaxNumbers(['5551234567, 1-555-999-8888'])).toBe('15551234567,15559998888')
    })

    it('skips missing values and empty pieces', () => {
      expect(mergeFaxNumbers([null, undefined, '5551234567,'])).toBe('15551234567')
    })

    it('keeps unrecognized numbers as written', () => {
      expect(mergeFaxNumbers(['12345'])).toBe('12345')
    })

    it('joins with a custom separator', () => {
      expect(mergeFaxNumbers(['5551234567;5559998888'], { separator: ';' })).toBe(
        '15551234567;15559998888'
      )
    })

    it('returns an empty string when there is nothing to merge', () => {
      expect(mergeFaxNumbers([])).toBe('')
    })
  })

  describe('defaultFaxKeywords', () => {
    it('builds one entry per number and language', () => {
      expect(defaultFaxKeywords('15141234567,15559998888')).toEqual({
        en: [
          { faxNumber: '15141234567', keyword: 'general inquiries', language: 'en' },
          { faxNumber: '15559998888', keyword: 'general inquiries', language: 'en' },
        ],
        fr: [
          { faxNumber: '15141234567', keyword: 'renseignements généraux', language: 'fr' },
          { faxNumber: '15559998888', keyword: 'renseignements généraux', language: 'fr' },
        ],
      })
    })

    it('uses configured phrases', () => {
      const lists = defaultFaxKeywords('15141234567', { en: 'main line', fr: 'ligne principale' })

      expect(lists.en[0].keyword).toBe('main line')
      expect(lists.fr[0].keyword).toBe('ligne principale')
    })
  })

  describe('mergeFaxKeywords', () => {
    it('synthesizes defaults when no row carries keywords', () => {
      expect(mergeFaxKeywords([noKeywords], '15141234567')).toEqual({
        en: [{ faxNumber: '15141234567', keyword: 'general inquiries', language: 'en' }],
        fr: [{ faxNumber: '15141234567', keyword: 'renseignements généraux', language: 'fr' }],
      })
    })

    it('treats stored empty lists as absent', () => {
      const lists = mergeFaxKeywords([{ faxKeywordsEn: '[]', faxKeywordsFr: ' [] ' }], '15141234567')

      expect(lists.en).toHaveLength(1)
      expect(lists.fr).toHaveLength(1)
    })

    it('returns empty lists without keywords or fax numbers', () => {
      expect(mergeFaxKeywords([noKeywords], '')).toEqual({ en: [], fr: [] })
    })

    it('lets a later entry replace an earlier one for the same number', () => {
      const rows = [
        {
          faxKeywordsEn:
            '[{"fax_number":"15145550123","keyword_en":"old"},{"fax_number":"15145550124","keyword_en":"lab"}]',
          faxKeywordsFr: '',
        },
        {
          faxKeywordsEn: '[{"fax_number":"15145550123","keyword_en":"new"}]',
          faxKeywordsFr: '',
        },
      ]

      expect(mergeFaxKeywords(rows, '15145550123,15145550124')).toEqual({
        en: [
          { faxNumber: '15145550123', keyword: 'new', language: 'en' },
          { faxNumber: '15145550124', keyword: 'lab', language: 'en' },
        ],
        fr: [],
      })
    })

    it('skips malformed payloads and logs them', () => {
      const logger = createSpyLogger()
      const rows = [
        { faxKeywordsEn: 'not json', faxKeywordsFr: '' },
        { faxKeywordsEn: '[{"fax_number":"15145550123","keyword_en":"reception"}]', faxKeywordsFr: '' },
      ]

      const lists = mergeFaxKeywords(rows, '15145550123', { logger })

      expect(lists.en).toEqual([
        { faxNumber: '15145550123', keyword: 'reception', language: 'en' },
      ])
      expect(logger.debug).toHaveBeenCalledWith(
        'Skipping malformed fax keyword payload',
        expect.objectContaining({ language: 'en' })
      )
    })

    it('falls back to defaults when every payload is malformed', () => {
      const lists = mergeFaxKeywords(
        [{ faxKeywordsEn: '{', faxKeywordsFr: '"text"' }],
        '15145550123'
      )

      expect(lists.en).toEqual([
        { faxNumber: '15145550123', keyword: 'general inquiries', language: 'en' },
      ])
    })
  })
})
