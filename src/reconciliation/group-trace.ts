/**
 * Detail traces for selected identifiers
 * @module reconciliation/group-trace
 */

import type { EstablishmentRow, IdentifierGroup } from '../types/establishment.js'
import type { GroupReconciler } from './group-reconciler.js'
import type { GroupOutcome, GroupTrace, SubgroupPreview } from './types.js'

const REASONS: Record<GroupOutcome['state'], string> = {
  singleton: 'Single row for this identifier',
  homogeneous: 'All rows share one normalized address',
  conflicting: 'Multiple different normalized addresses in group',
}

function groupByAddressKey(rows: EstablishmentRow[]): Map<string, EstablishmentRow[]> {
  const byKey = new Map<string, EstablishmentRow[]>()
  for (const row of rows) {
    const bucket = byKey.get(row.normalizedAddress)
    if (bucket) {
      bucket.push(row)
    } else {
      byKey.set(row.normalizedAddress, [row])
    }
  }
  return byKey
}

/**
 * Builds the trace of one group after it was reconciled.
 * For conflicting groups every same-address subset of two or more rows is
 * reconciled on its own to show what a merge would have produced; those
 * previews never reach the output streams.
 */
export function buildGroupTrace(
  group: IdentifierGroup,
  outcome: GroupOutcome,
  reconciler: GroupReconciler,
): GroupTrace {
  const byKey = groupByAddressKey(group.rows)
  const subgroupPreviews: SubgroupPreview[] = []

  if (outcome.state === 'conflicting') {
    for (const [normalizedAddress, rows] of byKey) {
      if (rows.length < 2) continue
      const preview = reconciler.reconcile({ id: group.id, rows })
      subgroupPreviews.push({
        normalizedAddress,
        sourceRowCount: rows.length,
        billingCodes: preview.record.billingCode,
        faxNumbers: preview.record.faxNumbers,
      })
    }
  }

  return {
    id: group.id,
    state: outcome.state,
    status: outcome.audit?.status,
    reason: REASONS[outcome.state],
    totalRows: group.rows.length,
    uniqueAddresses: byKey.size,
    rows: group.rows.map((row) => ({
      billingCode: row.billingCode,
      address: row.address,
      normalizedAddress: row.normalizedAddress,
    })),
    kept: {
      billingCode: outcome.record.billingCode,
      address: outcome.record.address,
    },
    subgroupPreviews,
  }
}
