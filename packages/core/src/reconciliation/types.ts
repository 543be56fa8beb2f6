import type { ConceptId } from '../concepts/types.js';
import type { FieldAliases, RawFact } from '../facts/types.js';
import type { StatementType } from '../taxonomy/types.js';

export const OUTCOMES = [
  'CORRECT_BOTH',
  'CORRECT_A_ONLY',
  'CORRECT_B_ONLY',
  'CORRECT_NEITHER',
  'NOT_IN_TAXONOMY',
] as const;

export type ReconciliationOutcome = (typeof OUTCOMES)[number];

/** Which mapper an accepted fact was taken from. `both` means A's instance, confirmed by B. */
export type AcceptedSource = 'both' | 'mapper_a' | 'mapper_b';

export interface AcceptedFact {
  concept: ConceptId;
  value: string | null;
  context: string;
  unit?: string;
  decimals?: string;
  sourceMapper: AcceptedSource;
}

export interface Discrepancy {
  concept: ConceptId;
  expectedStatement: StatementType;
  actualStatement: StatementType;
  inMapperA: boolean;
  inMapperB: boolean;
  reason: string;
}

/** How the expected statement was found. */
export type PlacementSource = 'taxonomy' | 'extension' | 'none';

export interface ConceptOutcome {
  concept: ConceptId;
  outcome: ReconciliationOutcome;
  expectedStatement?: StatementType;
  placement: PlacementSource;
  inMapperA: boolean;
  inMapperB: boolean;
}

export interface ReconciliationStatistics {
  totalConcepts: number;
  correctBoth: number;
  correctAOnly: number;
  correctBOnly: number;
  correctNeither: number;
  notInTaxonomy: number;
  /** Records mapper A reported for the statement, keyable or not. */
  factsA: number;
  factsB: number;
}

export interface StatementReconciliation {
  statementType: StatementType;
  acceptedFacts: AcceptedFact[];
  statistics: ReconciliationStatistics;
  discrepancies: Discrepancy[];
  outcomes: ConceptOutcome[];
  /** Concepts dropped by the non-financial filter, sorted. */
  excludedConcepts: ConceptId[];
  /** Records without a concept or context, both mappers together. */
  skippedFacts: number;
}

export type StatementFacts = Partial<Record<StatementType, readonly RawFact[]>>;

export interface ReconciliationResult {
  statements: Record<StatementType, StatementReconciliation>;
  overall: ReconciliationStatistics;
}

/** Non-financial concept denylist. Matching is on the local name unless noted. */
export interface ConceptExclusions {
  /** Whole namespaces, compared case-insensitively after year stripping. */
  namespaces: readonly string[];
  suffixes: readonly string[];
  prefixes: readonly string[];
  /** Substrings anywhere in the local name. */
  patterns: readonly string[];
}

export interface ReconcileOptions {
  exclusions?: ConceptExclusions;
  aliases?: FieldAliases;
  filingId?: string;
}
