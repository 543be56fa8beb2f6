import type { ReconciliationStatistics } from '../reconciliation/types.js';

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  const seconds = ms / 1000;
  if (seconds < 60) return `${seconds.toFixed(1)}s`;
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = Math.round(seconds % 60);
  return `${minutes}m ${remainingSeconds}s`;
}

export function formatPercent(ratio: number, digits = 2): string {
  return `${(ratio * 100).toFixed(digits)}%`;
}

/** Statistics with the outcome keys in their published snake_case form. */
export interface JsonStatistics {
  total_concepts: number;
  correct_both: number;
  correct_a_only: number;
  correct_b_only: number;
  correct_neither: number;
  not_in_taxonomy: number;
  factsA: number;
  factsB: number;
}

export function toJsonStatistics(statistics: ReconciliationStatistics): JsonStatistics {
  return {
    total_concepts: statistics.totalConcepts,
    correct_both: statistics.correctBoth,
    correct_a_only: statistics.correctAOnly,
    correct_b_only: statistics.correctBOnly,
    correct_neither: statistics.correctNeither,
    not_in_taxonomy: statistics.notInTaxonomy,
    factsA: statistics.factsA,
    factsB: statistics.factsB,
  };
}
