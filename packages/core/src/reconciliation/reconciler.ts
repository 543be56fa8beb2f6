/**
 * Concept reconciler.
 *
 * Grades each mapper's statement placement against the taxonomy. The mappers
 * are never compared with each other directly: a concept is accepted when the
 * taxonomy (or a resolved extension) agrees it belongs on the statement under
 * review, or when the taxonomy has never heard of it. Unknown concepts pass
 * through so genuine filer-specific disclosures are not lost.
 */

import type { ConceptId } from '../concepts/types.js';
import type { ExtensionMap } from '../extensions/types.js';
import { DEFAULT_FIELD_ALIASES, extractFacts } from '../facts/fields.js';
import type { Fact, RawFact } from '../facts/types.js';
import { STATEMENT_TYPES, type ConceptIndex, type StatementType } from '../taxonomy/types.js';
import { createConceptFilter } from './concept-filter.js';
import { assertBucketsSum, emptyStatistics, recordOutcome, sumStatistics } from './statistics.js';
import type {
  AcceptedFact,
  AcceptedSource,
  ConceptOutcome,
  Discrepancy,
  PlacementSource,
  ReconcileOptions,
  ReconciliationOutcome,
  ReconciliationResult,
  StatementFacts,
  StatementReconciliation,
} from './types.js';

type StatementLookup = Pick<ConceptIndex, 'statementOf'>;

interface Placement {
  statementType?: StatementType;
  source: PlacementSource;
}

export function reconcileStatement(
  statementType: StatementType,
  factsA: readonly RawFact[],
  factsB: readonly RawFact[],
  index: StatementLookup,
  extensionMap: ExtensionMap,
  options: ReconcileOptions = {},
): StatementReconciliation {
  const aliases = options.aliases ?? DEFAULT_FIELD_ALIASES;
  const isExcluded = createConceptFilter(options.exclusions);

  const extractedA = extractFacts(factsA, 'mapper_a', aliases);
  const extractedB = extractFacts(factsB, 'mapper_b', aliases);
  const byConceptA = groupByConcept(extractedA.facts);
  const byConceptB = groupByConcept(extractedB.facts);

  const statistics = emptyStatistics();
  statistics.factsA = factsA.length;
  statistics.factsB = factsB.length;

  const acceptedFacts: AcceptedFact[] = [];
  const discrepancies: Discrepancy[] = [];
  const outcomes: ConceptOutcome[] = [];
  const excludedConcepts: ConceptId[] = [];

  const concepts = [...new Set([...byConceptA.keys(), ...byConceptB.keys()])].sort();

  for (const concept of concepts) {
    if (isExcluded(concept)) {
      excludedConcepts.push(concept);
      continue;
    }

    const instancesA = byConceptA.get(concept);
    const instancesB = byConceptB.get(concept);
    const inMapperA = instancesA !== undefined;
    const inMapperB = instancesB !== undefined;

    const placement = placementOf(concept, index, extensionMap);
    const outcome = classify(statementType, placement, inMapperA, inMapperB);
    recordOutcome(statistics, outcome);
    outcomes.push({
      concept,
      outcome,
      ...(placement.statementType ? { expectedStatement: placement.statementType } : {}),
      placement: placement.source,
      inMapperA,
      inMapperB,
    });

    if (outcome === 'CORRECT_NEITHER') {
      discrepancies.push({
        concept,
        expectedStatement: placement.statementType ?? 'other',
        actualStatement: statementType,
        inMapperA,
        inMapperB,
        reason: describeMismatch(concept, statementType, placement),
      });
      continue;
    }

    if (instancesA) {
      acceptedFacts.push(...instancesA.map(fact => toAccepted(fact, inMapperB ? 'both' : 'mapper_a')));
    } else if (instancesB) {
      acceptedFacts.push(...instancesB.map(fact => toAccepted(fact, 'mapper_b')));
    }
  }

  assertBucketsSum(statistics, options.filingId);

  return {
    statementType,
    acceptedFacts,
    statistics,
    discrepancies,
    outcomes,
    excludedConcepts,
    skippedFacts: extractedA.skipped + extractedB.skipped,
  };
}

export interface ReconcileStatementsOptions extends ReconcileOptions {
  onStatement?: (result: StatementReconciliation) => void;
}

/** Reconcile every statement type and aggregate the overall statistics. */
export function reconcileStatements(
  statementsA: StatementFacts,
  statementsB: StatementFacts,
  index: StatementLookup,
  extensionMap: ExtensionMap,
  options: ReconcileStatementsOptions = {},
): ReconciliationResult {
  const results = STATEMENT_TYPES.map(statementType => {
    const result = reconcileStatement(
      statementType,
      statementsA[statementType] ?? [],
      statementsB[statementType] ?? [],
      index,
      extensionMap,
      options,
    );
    options.onStatement?.(result);
    return result;
  });

  const [balanceSheet, incomeStatement, cashFlow, other] = results;
  return {
    statements: {
      balance_sheet: balanceSheet,
      income_statement: incomeStatement,
      cash_flow: cashFlow,
      other,
    },
    overall: sumStatistics(results.map(result => result.statistics)),
  };
}

function placementOf(concept: ConceptId, index: StatementLookup, extensionMap: ExtensionMap): Placement {
  const direct = index.statementOf(concept);
  if (direct) return { statementType: direct, source: 'taxonomy' };

  const resolution = extensionMap.get(concept);
  if (resolution?.status === 'VALID') {
    return { statementType: resolution.statementType, source: 'extension' };
  }
  return { source: 'none' };
}

function classify(
  statementType: StatementType,
  placement: Placement,
  inMapperA: boolean,
  inMapperB: boolean,
): ReconciliationOutcome {
  if (!placement.statementType) return 'NOT_IN_TAXONOMY';
  if (placement.statementType !== statementType) return 'CORRECT_NEITHER';
  if (inMapperA && inMapperB) return 'CORRECT_BOTH';
  return inMapperA ? 'CORRECT_A_ONLY' : 'CORRECT_B_ONLY';
}

function describeMismatch(concept: ConceptId, actual: StatementType, placement: Placement): string {
  const via = placement.source === 'extension' ? ' via its substitution group' : '';
  return `Taxonomy places ${concept} on ${placement.statementType ?? 'other'}${via}, not ${actual}`;
}

function groupByConcept(facts: readonly Fact[]): Map<ConceptId, Fact[]> {
  const groups = new Map<ConceptId, Fact[]>();
  for (const fact of facts) {
    const group = groups.get(fact.concept);
    if (group) {
      group.push(fact);
    } else {
      groups.set(fact.concept, [fact]);
    }
  }
  return groups;
}

function toAccepted(fact: Fact, sourceMapper: AcceptedSource): AcceptedFact {
  return {
    concept: fact.concept,
    value: fact.value,
    context: fact.context,
    ...(fact.unit !== undefined ? { unit: fact.unit } : {}),
    ...(fact.decimals !== undefined ? { decimals: fact.decimals } : {}),
    sourceMapper,
  };
}
