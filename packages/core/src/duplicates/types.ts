import type { ConceptId } from '../concepts/types.js';
import type { Fact, FieldAliases, MapperTag } from '../facts/types.js';

/** Most severe first; also the report ordering. */
export const SEVERITIES = ['CRITICAL', 'MAJOR', 'MINOR', 'REDUNDANT'] as const;
export type Severity = (typeof SEVERITIES)[number];

export type DuplicateOrigin = 'SOURCE_DATA' | 'MAPPING_INTRODUCED' | 'UNKNOWN';

/** How many of a group's values parsed as exact decimals. */
export type NumericCoverage = 'all' | 'partial' | 'none';

export interface SeverityThresholds {
  /** Variance ratio at or above which a group is CRITICAL. */
  critical: number;
  major: number;
}

export interface VarianceResult {
  /** |max − min| / max(|min|, |max|); 0 with fewer than two numeric values. */
  ratio: number;
  /** Exact |max − min|. */
  amount: string;
  numeric: NumericCoverage;
  numericCount: number;
  min?: string;
  max?: string;
}

export interface DuplicateGroup {
  concept: ConceptId;
  context: string;
  facts: readonly Fact[];
  count: number;
  /** Distinct raw values in first-seen order. */
  uniqueValues: (string | null)[];
  varianceRatio: number;
  varianceAmount: string;
  severity: Severity;
  origin: DuplicateOrigin;
  /** Occurrences of the same key in the source facts, when they were supplied. */
  sourceCount?: number;
  numeric: NumericCoverage;
  note?: string;
}

export interface CopyDistribution {
  twoCopies: number;
  threeCopies: number;
  fourCopies: number;
  fivePlusCopies: number;
}

export interface OriginBreakdown {
  sourceData: number;
  mappingIntroduced: number;
  unknown: number;
}

export interface DuplicateReport {
  totalFactsAnalyzed: number;
  skippedFacts: number;
  totalGroups: number;
  totalDuplicateFacts: number;
  duplicatePercentage: number;
  averageCopiesPerGroup: number;
  severityCounts: Record<Severity, number>;
  originBreakdown: OriginBreakdown;
  distribution: CopyDistribution;
  hasCritical: boolean;
  hasMajor: boolean;
  qualityAssessment: string;
  perGroupDetail: DuplicateGroup[];
}

export interface DetectDuplicatesOptions {
  thresholds?: Partial<SeverityThresholds>;
  aliases?: FieldAliases;
  sourceMapper?: MapperTag;
  filingId?: string;
}
