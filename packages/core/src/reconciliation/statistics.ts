import { InvariantViolationError } from '../errors.js';
import type { ReconciliationOutcome, ReconciliationStatistics } from './types.js';

const OUTCOME_FIELD: Record<ReconciliationOutcome, keyof ReconciliationStatistics> = {
  CORRECT_BOTH: 'correctBoth',
  CORRECT_A_ONLY: 'correctAOnly',
  CORRECT_B_ONLY: 'correctBOnly',
  CORRECT_NEITHER: 'correctNeither',
  NOT_IN_TAXONOMY: 'notInTaxonomy',
};

export function emptyStatistics(): ReconciliationStatistics {
  return {
    totalConcepts: 0,
    correctBoth: 0,
    correctAOnly: 0,
    correctBOnly: 0,
    correctNeither: 0,
    notInTaxonomy: 0,
    factsA: 0,
    factsB: 0,
  };
}

export function recordOutcome(statistics: ReconciliationStatistics, outcome: ReconciliationOutcome): void {
  statistics[OUTCOME_FIELD[outcome]]++;
  statistics.totalConcepts++;
}

export function sumStatistics(parts: Iterable<ReconciliationStatistics>): ReconciliationStatistics {
  const total = emptyStatistics();
  for (const part of parts) {
    total.totalConcepts += part.totalConcepts;
    total.correctBoth += part.correctBoth;
    total.correctAOnly += part.correctAOnly;
    total.correctBOnly += part.correctBOnly;
    total.correctNeither += part.correctNeither;
    total.notInTaxonomy += part.notInTaxonomy;
    total.factsA += part.factsA;
    total.factsB += part.factsB;
  }
  return total;
}

export function outcomeTotal(statistics: ReconciliationStatistics): number {
  return (
    statistics.correctBoth +
    statistics.correctAOnly +
    statistics.correctBOnly +
    statistics.correctNeither +
    statistics.notInTaxonomy
  );
}

/** The five outcome buckets must account for every concept exactly once. */
export function assertBucketsSum(statistics: ReconciliationStatistics, filingId = 'unknown'): void {
  const sum = outcomeTotal(statistics);
  if (sum !== statistics.totalConcepts) {
    throw new InvariantViolationError(
      `Outcome buckets sum to ${sum} but ${statistics.totalConcepts} concepts were classified`,
      filingId,
    );
  }
}

/** Share of classified concepts the taxonomy placed where the mappers did. */
export function agreementRate(statistics: ReconciliationStatistics): number {
  if (statistics.totalConcepts === 0) return 0;
  const correct = statistics.correctBoth + statistics.correctAOnly + statistics.correctBOnly;
  return correct / statistics.totalConcepts;
}
