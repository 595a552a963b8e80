/**
 * Record reconciliation engine
 * @module reconciliation
 */

export type {
  GroupState,
  GroupOutcome,
  GroupTrace,
  SubgroupPreview,
  ReconcileOptions,
  ReconciliationStats,
  ReconciliationResult,
} from './types.js'

export {
  GroupReconciler,
  reconcileGroup,
  classifyGroup,
  toCanonicalRecord,
} from './group-reconciler.js'
export { buildGroupTrace } from './group-trace.js'
export {
  ReconciliationDriver,
  reconcileEstablishments,
  partitionByIdentifier,
  groupByIdentifier,
  hasMissingId,
  createStats,
} from './reconciliation-driver.js'
