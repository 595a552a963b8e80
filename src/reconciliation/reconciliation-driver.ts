/**
 * Drives a full reconciliation pass over a batch of normalized rows
 * @module reconciliation/reconciliation-driver
 */

import type { EstablishmentRow, IdentifierGroup } from '../types/establishment.js'
import type { Logger } from '../utils/logger.js'
import { silentLogger } from '../utils/logger.js'
import { GroupReconciler } from './group-reconciler.js'
import { buildGroupTrace } from './group-trace.js'
import type {
  ReconcileOptions,
  ReconciliationResult,
  ReconciliationStats,
} from './types.js'

/**
 * True when a row carries no usable identifier
 */
export function hasMissingId(row: EstablishmentRow): boolean {
  return row.id == null || row.id.trim() === ''
}

/**
 * Splits rows into those without identifier and those with one
 */
export function partitionByIdentifier(rows: EstablishmentRow[]): {
  missing: EstablishmentRow[]
  withId: EstablishmentRow[]
} {
  const missing: EstablishmentRow[] = []
  const withId: EstablishmentRow[] = []
  for (const row of rows) {
    if (hasMissingId(row)) {
      missing.push(row)
    } else {
      withId.push(row)
    }
  }
  return { missing, withId }
}

/**
 * Groups rows by trimmed identifier. Groups come out in order of first
 * appearance, rows within a group keep their input order and carry the
 * trimmed identifier.
 */
export function groupByIdentifier(rows: EstablishmentRow[]): IdentifierGroup[] {
  const groups = new Map<string, EstablishmentRow[]>()
  for (const row of rows) {
    const id = row.id.trim()
    const keyed = row.id === id ? row : { ...row, id }
    const bucket = groups.get(id)
    if (bucket) {
      bucket.push(keyed)
    } else {
      groups.set(id, [keyed])
    }
  }
  return Array.from(groups, ([id, groupRows]) => ({ id, rows: groupRows }))
}

/**
 * Creates a zeroed statistics object
 */
export function createStats(): ReconciliationStats {
  return {
    inputRows: 0,
    missingIdRows: 0,
    rowsWithId: 0,
    uniqueIds: 0,
    singletonCount: 0,
    mergedGroupCount: 0,
    quarantinedGroupCount: 0,
    quarantinedRowCount: 0,
    cleanRecordCount: 0,
  }
}

/**
 * Reconciliation driver.
 *
 * Rows without identifier go to rejects untouched. The remaining rows are
 * grouped by identifier and each group is handed to the {@link GroupReconciler};
 * outputs accumulate in group order. The pass never fails on data: every row
 * is routed and the pass completes.
 *
 * @example
 * ```typescript
 * const driver = new ReconciliationDriver({ config: { trace: ['X2'] } })
 * const result = driver.run(rows)
 * result.stats.quarantinedGroupCount // 1
 * ```
 */
export class ReconciliationDriver {
  private readonly reconciler: GroupReconciler
  private readonly logger: Logger

  constructor(options: ReconcileOptions = {}) {
    this.reconciler = new GroupReconciler(options)
    this.logger = options.logger ?? silentLogger
  }

  /**
   * Runs one reconciliation pass
   */
  run(rows: EstablishmentRow[]): ReconciliationResult {
    const stats = createStats()
    const traced = new Set(this.reconciler.getConfig().trace)
    const result: ReconciliationResult = {
      clean: [],
      rejects: [],
      quarantine: [],
      audit: [],
      stats,
      traces: [],
    }

    const { missing, withId } = partitionByIdentifier(rows)
    result.rejects.push(...missing)

    const groups = groupByIdentifier(withId)

    stats.inputRows = rows.length
    stats.missingIdRows = missing.length
    stats.rowsWithId = withId.length
    stats.uniqueIds = groups.length

    this.logger.info('Partitioned rows by identifier', {
      missingId: missing.length,
      withId: withId.length,
      groups: groups.length,
    })

    for (const group of groups) {
      const outcome = this.reconciler.reconcile(group)

      result.clean.push(outcome.record)
      if (outcome.audit) result.audit.push(outcome.audit)
      result.quarantine.push(...outcome.quarantined)

      switch (outcome.state) {
        case 'singleton':
          stats.singletonCount++
          break
        case 'homogeneous':
          stats.mergedGroupCount++
          break
        case 'conflicting':
          stats.quarantinedGroupCount++
          stats.quarantinedRowCount += outcome.quarantined.length
          break
      }

      if (traced.has(group.id)) {
        const trace = buildGroupTrace(group, outcome, this.reconciler)
        result.traces.push(trace)
        this.logger.debug('Traced identifier group', {
          id: trace.id,
          state: trace.state,
          uniqueAddresses: trace.uniqueAddresses,
        })
      }
    }

    stats.cleanRecordCount = result.clean.length

    this.logger.info('Reconciliation complete', {
      singletons: stats.singletonCount,
      merged: stats.mergedGroupCount,
      quarantined: stats.quarantinedGroupCount,
    })

    return result
  }
}

/**
 * Runs a reconciliation pass with a fresh driver
 */
export function reconcileEstablishments(
  rows: EstablishmentRow[],
  options: ReconcileOptions = {},
): ReconciliationResult {
  return new ReconciliationDriver(options).run(rows)
}
