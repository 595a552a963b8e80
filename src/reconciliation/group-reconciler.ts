/**
 * Reconciles the rows sharing one identifier into a canonical record
 * @module reconciliation/group-reconciler
 */

import type {
  AuditEntry,
  CanonicalRecord,
  EstablishmentRow,
  FaxKeywordLists,
  FieldConflicts,
  IdentifierGroup,
  ScalarField,
} from '../types/establishment.js'
import { MULTIPLE_ADDRESSES } from '../types/establishment.js'
import type { ReconcileConfig } from '../config/reconcile-config.js'
import { resolveConfig } from '../config/reconcile-config.js'
import { mergeFaxKeywords, mergeFaxNumbers, serializeFaxKeywords } from '../fax/index.js'
import { distinctNonEmpty, mergeField } from '../merge/index.js'
import type { Logger } from '../utils/logger.js'
import { silentLogger } from '../utils/logger.js'
import type { GroupOutcome, GroupState, ReconcileOptions } from './types.js'

type NumericScalarField = Extract<
  ScalarField,
  'latitude' | 'longitude' | 'addedTime' | 'isFaxEnabled'
>
type StringScalarField = Exclude<ScalarField, NumericScalarField>

/**
 * Drops the address key and adds the admin placeholder
 */
export function toCanonicalRecord(row: EstablishmentRow): CanonicalRecord {
  const { normalizedAddress: _addressKey, ...fields } = row
  return { ...fields, adminUserId: '' }
}

/**
 * Compares address keys by code unit, the same order on every platform
 */
function compareAddressKeys(a: EstablishmentRow, b: EstablishmentRow): number {
  if (a.normalizedAddress < b.normalizedAddress) return -1
  if (a.normalizedAddress > b.normalizedAddress) return 1
  return 0
}

/**
 * Decides the state of a group from its shape
 */
export function classifyGroup(rows: EstablishmentRow[]): GroupState {
  if (rows.length <= 1) return 'singleton'
  const keys = new Set(rows.map((row) => row.normalizedAddress))
  return keys.size > 1 ? 'conflicting' : 'homogeneous'
}

/**
 * Group reconciler: turns one identifier group into a canonical record,
 * an optional audit entry, and the rows to quarantine.
 *
 * @example
 * ```typescript
 * const reconciler = new GroupReconciler()
 * const outcome = reconciler.reconcile({ id: 'X1', rows })
 * outcome.state         // 'homogeneous'
 * outcome.audit?.status // 'MERGED'
 * ```
 */
export class GroupReconciler {
  private readonly config: ReconcileConfig
  private readonly logger: Logger

  constructor(options: ReconcileOptions = {}) {
    this.config = resolveConfig(options.config)
    this.logger = options.logger ?? silentLogger
  }

  /**
   * Get the resolved configuration
   */
  getConfig(): ReconcileConfig {
    return this.config
  }

  /**
   * Reconciles one group. Rows must share the group identifier and the group
   * must not be empty.
   */
  reconcile(group: IdentifierGroup): GroupOutcome {
    const state = classifyGroup(group.rows)

    switch (state) {
      case 'singleton':
        return this.passThrough(group)
      case 'homogeneous':
        return this.mergeGroup(group)
      case 'conflicting':
        return this.keepFirstAndQuarantine(group)
    }
  }

  private passThrough(group: IdentifierGroup): GroupOutcome {
    const [row] = group.rows
    const faxNumbers = this.mergeFaxNumbers(group.rows)
    const keywords = this.mergeKeywords(group.rows, faxNumbers)

    return {
      state: 'singleton',
      record: {
        ...toCanonicalRecord(row),
        faxNumbers,
        ...this.serializeKeywords(keywords),
      },
      quarantined: [],
    }
  }

  private mergeGroup(group: IdentifierGroup): GroupOutcome {
    const { rows } = group
    const conflicts: FieldConflicts = {}

    const pick = (field: ScalarField): unknown => {
      const result = mergeField(
        rows.map((row) => row[field]),
        'mostFrequent',
      )
      if (result.hadConflict) {
        conflicts[field] = result.distinctValues.map((value) => String(value))
      }
      return result.value
    }
    const text = (field: StringScalarField): string => {
      const value = pick(field)
      return typeof value === 'string' ? value : ''
    }
    const coordinate = (field: 'latitude' | 'longitude'): number | null => {
      const value = pick(field)
      return typeof value === 'number' ? value : null
    }
    const integer = (field: 'addedTime' | 'isFaxEnabled'): number => {
      const value = pick(field)
      return typeof value === 'number' ? value : 0
    }

    const faxNumbers = this.mergeFaxNumbers(rows)
    const keywords = this.mergeKeywords(rows, faxNumbers)
    const billingCode = this.mergeBillingCodes(rows)
    const billingCategories = distinctNonEmpty(rows.map((row) => row.billingCategories)).join(
      this.config.billingSeparator,
    )

    const record: CanonicalRecord = {
      id: group.id,
      adminUserId: '',
      name: text('name'),
      address: text('address'),
      locality: text('locality'),
      region: text('region'),
      country: text('country'),
      administrativeAreaLevel1: text('administrativeAreaLevel1'),
      administrativeAreaLevel2: text('administrativeAreaLevel2'),
      internationalPhoneNumber: text('internationalPhoneNumber'),
      faxNumbers,
      ...this.serializeKeywords(keywords),
      billingCode,
      billingCategories,
      type: text('type'),
      website: text('website'),
      latitude: coordinate('latitude'),
      longitude: coordinate('longitude'),
      addedTime: integer('addedTime'),
      placeType: text('placeType'),
      isFaxEnabled: integer('isFaxEnabled'),
    }

    const audit: AuditEntry = {
      id: group.id,
      normalizedAddress: rows[0].normalizedAddress,
      sourceRowCount: rows.length,
      mergedBillingCodes: billingCode,
      mergedFaxNumbers: faxNumbers,
      fieldConflicts: conflicts,
      status: 'MERGED',
    }

    this.logger.debug('Merged identifier group', {
      id: group.id,
      rows: rows.length,
      conflicts: Object.keys(conflicts),
    })

    return { state: 'homogeneous', record, audit, quarantined: [] }
  }

  private keepFirstAndQuarantine(group: IdentifierGroup): GroupOutcome {
    const { rows } = group
    const [representative] = [...rows].sort(compareAddressKeys)

    // fax lines and billing codes are shared by the whole identifier
    const faxNumbers = this.mergeFaxNumbers(rows)
    const keywords = this.mergeKeywords(rows, faxNumbers)
    const billingCode = this.mergeBillingCodes(rows)

    const addresses = Array.from(new Set(rows.map((row) => row.normalizedAddress)))

    const audit: AuditEntry = {
      id: group.id,
      normalizedAddress: MULTIPLE_ADDRESSES,
      sourceRowCount: rows.length,
      mergedBillingCodes: billingCode,
      mergedFaxNumbers: faxNumbers,
      fieldConflicts: { addresses },
      status: 'KEPT_FIRST_QUARANTINED_OTHERS',
    }

    this.logger.debug('Quarantined identifier group with conflicting addresses', {
      id: group.id,
      rows: rows.length,
      addresses: addresses.length,
    })

    return {
      state: 'conflicting',
      record: {
        ...toCanonicalRecord(representative),
        faxNumbers,
        ...this.serializeKeywords(keywords),
        billingCode,
      },
      audit,
      quarantined: [...rows],
    }
  }

  private mergeFaxNumbers(rows: EstablishmentRow[]): string {
    return mergeFaxNumbers(
      rows.map((row) => row.faxNumbers),
      { phone: this.config.phone, separator: this.config.faxSeparator },
    )
  }

  private mergeKeywords(rows: EstablishmentRow[], faxNumbers: string): FaxKeywordLists {
    return mergeFaxKeywords(rows, faxNumbers, {
      defaults: this.config.defaultKeywords,
      separator: this.config.faxSeparator,
      logger: this.logger,
    })
  }

  private mergeBillingCodes(rows: EstablishmentRow[]): string {
    const result = mergeField(
      rows.map((row) => row.billingCode),
      'union',
      { separator: this.config.billingSeparator },
    )
    return typeof result.value === 'string' ? result.value : ''
  }

  private serializeKeywords(
    keywords: FaxKeywordLists,
  ): Pick<CanonicalRecord, 'faxKeywordsEn' | 'faxKeywordsFr'> {
    return {
      faxKeywordsEn: serializeFaxKeywords(keywords.en, 'en'),
      faxKeywordsFr: serializeFaxKeywords(keywords.fr, 'fr'),
    }
  }
}

/**
 * Reconciles one group with a fresh reconciler
 */
export function reconcileGroup(group: IdentifierGroup, options: ReconcileOptions = {}): GroupOutcome {
  return new GroupReconciler(options).reconcile(group)
}
