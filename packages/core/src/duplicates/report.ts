import {
  SEVERITIES,
  type CopyDistribution,
  type DuplicateGroup,
  type DuplicateReport,
  type OriginBreakdown,
  type Severity,
} from './types.js';

export interface ReportTotals {
  totalFactsAnalyzed: number;
  skippedFacts: number;
}

export function countSeverities(groups: readonly DuplicateGroup[]): Record<Severity, number> {
  const counts: Record<Severity, number> = { CRITICAL: 0, MAJOR: 0, MINOR: 0, REDUNDANT: 0 };
  for (const group of groups) {
    counts[group.severity]++;
  }
  return counts;
}

export function countOrigins(groups: readonly DuplicateGroup[]): OriginBreakdown {
  const breakdown: OriginBreakdown = { sourceData: 0, mappingIntroduced: 0, unknown: 0 };
  for (const group of groups) {
    if (group.origin === 'SOURCE_DATA') breakdown.sourceData++;
    else if (group.origin === 'MAPPING_INTRODUCED') breakdown.mappingIntroduced++;
    else breakdown.unknown++;
  }
  return breakdown;
}

export function copyDistribution(groups: readonly DuplicateGroup[]): CopyDistribution {
  const distribution: CopyDistribution = { twoCopies: 0, threeCopies: 0, fourCopies: 0, fivePlusCopies: 0 };
  for (const group of groups) {
    if (group.count === 2) distribution.twoCopies++;
    else if (group.count === 3) distribution.threeCopies++;
    else if (group.count === 4) distribution.fourCopies++;
    else if (group.count >= 5) distribution.fivePlusCopies++;
  }
  return distribution;
}

export function assessQuality(severityCounts: Record<Severity, number>, totalGroups: number): string {
  if (totalGroups === 0) {
    return 'No duplicates detected.';
  }
  if (severityCounts.CRITICAL > 0) {
    return (
      `Severe integrity issues: ${severityCounts.CRITICAL} critical duplicate(s) with material variance. ` +
      'Exclude the filing from analysis until resolved.'
    );
  }
  if (severityCounts.MAJOR > 0) {
    return (
      `Significant quality concerns: ${severityCounts.MAJOR} major duplicate(s) with notable variance. ` +
      'Review manually before analysis.'
    );
  }
  if (severityCounts.MINOR > 0) {
    return 'Minor duplicate variances only, most likely formatting or rounding differences.';
  }
  return 'Redundant duplicates only, no integrity concerns.';
}

/** Most severe first, then by concept and context. */
export function compareGroups(a: DuplicateGroup, b: DuplicateGroup): number {
  const bySeverity = SEVERITIES.indexOf(a.severity) - SEVERITIES.indexOf(b.severity);
  if (bySeverity !== 0) return bySeverity;
  if (a.concept !== b.concept) return a.concept < b.concept ? -1 : 1;
  if (a.context !== b.context) return a.context < b.context ? -1 : 1;
  return 0;
}

export function buildDuplicateReport(groups: readonly DuplicateGroup[], totals: ReportTotals): DuplicateReport {
  const perGroupDetail = [...groups].sort(compareGroups);
  const severityCounts = countSeverities(perGroupDetail);
  const totalGroups = perGroupDetail.length;
  const totalDuplicateFacts = perGroupDetail.reduce((sum, group) => sum + group.count, 0);

  return {
    totalFactsAnalyzed: totals.totalFactsAnalyzed,
    skippedFacts: totals.skippedFacts,
    totalGroups,
    totalDuplicateFacts,
    duplicatePercentage:
      totals.totalFactsAnalyzed > 0 ? round2((totalDuplicateFacts / totals.totalFactsAnalyzed) * 100) : 0,
    averageCopiesPerGroup: totalGroups > 0 ? round2(totalDuplicateFacts / totalGroups) : 0,
    severityCounts,
    originBreakdown: countOrigins(perGroupDetail),
    distribution: copyDistribution(perGroupDetail),
    hasCritical: severityCounts.CRITICAL > 0,
    hasMajor: severityCounts.MAJOR > 0,
    qualityAssessment: assessQuality(severityCounts, totalGroups),
    perGroupDetail,
  };
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}
