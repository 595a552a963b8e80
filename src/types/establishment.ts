/**
 * A healthcare establishment row after normalization.
 * Rows are built once by the row normalizer and never mutated afterward.
 */
export interface EstablishmentRow {
  /** External place identifier; `''` when the source had none */
  id: string
  name: string
  address: string
  locality: string
  region: string
  country: string
  administrativeAreaLevel1: string
  administrativeAreaLevel2: string
  internationalPhoneNumber: string
  /** One or more fax numbers, possibly `,`/`;` separated */
  faxNumbers: string
  /** Stored English keyword list (JSON text) */
  faxKeywordsEn: string
  /** Stored French keyword list (JSON text) */
  faxKeywordsFr: string
  billingCode: string
  /** One or more billing categories, possibly `;` separated */
  billingCategories: string
  type: string
  website: string
  latitude: number | null
  longitude: number | null
  addedTime: number
  placeType: string
  isFaxEnabled: number
  /** Comparison key derived from `address` */
  normalizedAddress: string
}

/**
 * The single reconciled output row for an identifier.
 * Fax keyword fields hold the serialized keyword lists.
 */
export interface CanonicalRecord extends Omit<EstablishmentRow, 'normalizedAddress'> {
  /** Placeholder, always empty */
  adminUserId: string
}

/**
 * Scalar fields merged by most-frequent value in a same-address group.
 */
export const SCALAR_FIELDS = [
  'name',
  'address',
  'locality',
  'region',
  'country',
  'administrativeAreaLevel1',
  'administrativeAreaLevel2',
  'internationalPhoneNumber',
  'type',
  'website',
  'latitude',
  'longitude',
  'addedTime',
  'placeType',
  'isFaxEnabled',
] as const satisfies readonly (keyof EstablishmentRow)[]

export type ScalarField = (typeof SCALAR_FIELDS)[number]

/**
 * All rows sharing one non-empty identifier.
 */
export interface IdentifierGroup {
  id: string
  rows: EstablishmentRow[]
}

export type FaxKeywordLanguage = 'en' | 'fr'

/**
 * A keyword phrase attached to one fax number.
 */
export interface FaxKeyword {
  faxNumber: string
  keyword: string
  language: FaxKeywordLanguage
}

/**
 * Keyword lists per language, in output order.
 */
export interface FaxKeywordLists {
  en: FaxKeyword[]
  fr: FaxKeyword[]
}

export type AuditStatus = 'MERGED' | 'KEPT_FIRST_QUARANTINED_OTHERS'

/** Audit marker used in place of an address key for conflicting groups */
export const MULTIPLE_ADDRESSES = 'MULTIPLE_ADDRESSES'

/**
 * Field → distinct values observed for it within one group.
 */
export type FieldConflicts = Partial<Record<ScalarField | 'addresses', string[]>>

/**
 * One audit row per merged or quarantined identifier group.
 */
export interface AuditEntry {
  id: string
  /** Shared address key, or `MULTIPLE_ADDRESSES` */
  normalizedAddress: string
  sourceRowCount: number
  mergedBillingCodes: string
  mergedFaxNumbers: string
  fieldConflicts: FieldConflicts
  status: AuditStatus
}
