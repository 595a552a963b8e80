/**
 * Reconciliation engine type definitions
 * @module reconciliation/types
 */

import type {
  AuditEntry,
  AuditStatus,
  CanonicalRecord,
  EstablishmentRow,
} from '../types/establishment.js'
import type { ReconcileConfigInput } from '../config/reconcile-config.js'
import type { Logger } from '../utils/logger.js'

/**
 * Shape of an identifier group, decided once per group.
 *
 * - `singleton` - one row, passed through with fax fields normalized
 * - `homogeneous` - several rows, one address key: fields are merged
 * - `conflicting` - several address keys: first row by key is kept, all rows quarantined
 */
export type GroupState = 'singleton' | 'homogeneous' | 'conflicting'

/**
 * What the reconciler produced for one group
 */
export interface GroupOutcome {
  state: GroupState

  /** The canonical record for the clean stream */
  record: CanonicalRecord

  /** Audit entry; absent for singletons */
  audit?: AuditEntry

  /** Rows sent to quarantine; empty unless the group is conflicting */
  quarantined: EstablishmentRow[]
}

/**
 * Options accepted by the reconciler and driver
 */
export interface ReconcileOptions {
  /** Configuration overrides */
  config?: ReconcileConfigInput

  /** Logger for debug and progress output */
  logger?: Logger
}

/**
 * Running counts collected by the driver, used for reporting
 */
export interface ReconciliationStats {
  /** Rows handed to the driver */
  inputRows: number
  /** Rows without identifier, sent to rejects */
  missingIdRows: number
  /** Rows carrying an identifier */
  rowsWithId: number
  /** Distinct identifiers */
  uniqueIds: number
  /** Groups of exactly one row */
  singletonCount: number
  /** Same-address groups merged into one record */
  mergedGroupCount: number
  /** Groups with conflicting addresses */
  quarantinedGroupCount: number
  /** Rows written to quarantine */
  quarantinedRowCount: number
  /** Records in the clean stream */
  cleanRecordCount: number
}

/**
 * Merge preview for one same-address subset of a conflicting group
 */
export interface SubgroupPreview {
  normalizedAddress: string
  sourceRowCount: number
  billingCodes: string
  faxNumbers: string
}

/**
 * Detailed account of how one identifier group was handled.
 * Collected only for identifiers listed in the `trace` configuration.
 */
export interface GroupTrace {
  id: string
  state: GroupState
  status?: AuditStatus
  reason: string
  totalRows: number
  uniqueAddresses: number
  rows: Array<{
    billingCode: string
    address: string
    normalizedAddress: string
  }>
  kept: {
    billingCode: string
    address: string
  }
  /** Same-address subsets of two or more rows, for conflicting groups */
  subgroupPreviews: SubgroupPreview[]
}

/**
 * The full output of a reconciliation pass
 */
export interface ReconciliationResult {
  /** One canonical record per identifier, in group order */
  clean: CanonicalRecord[]

  /** Rows without identifier, unchanged */
  rejects: EstablishmentRow[]

  /** Every row of every conflicting group */
  quarantine: EstablishmentRow[]

  /** One entry per merged or conflicting group */
  audit: AuditEntry[]

  stats: ReconciliationStats

  /** Traces for the configured identifiers that were present */
  traces: GroupTrace[]
}
