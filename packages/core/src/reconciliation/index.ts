export {
  OUTCOMES,
  type ReconciliationOutcome,
  type AcceptedSource,
  type AcceptedFact,
  type Discrepancy,
  type PlacementSource,
  type ConceptOutcome,
  type ReconciliationStatistics,
  type StatementReconciliation,
  type StatementFacts,
  type ReconciliationResult,
  type ConceptExclusions,
  type ReconcileOptions,
} from './types.js';

export { DEFAULT_CONCEPT_EXCLUSIONS, isExcludedConcept, createConceptFilter } from './concept-filter.js';
export {
  emptyStatistics,
  recordOutcome,
  sumStatistics,
  outcomeTotal,
  assertBucketsSum,
  agreementRate,
} from './statistics.js';
export { reconcileStatement, reconcileStatements, type ReconcileStatementsOptions } from './reconciler.js';
