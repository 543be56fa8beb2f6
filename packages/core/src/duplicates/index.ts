export {
  SEVERITIES,
  type Severity,
  type DuplicateOrigin,
  type NumericCoverage,
  type SeverityThresholds,
  type VarianceResult,
  type DuplicateGroup,
  type CopyDistribution,
  type OriginBreakdown,
  type DuplicateReport,
  type DetectDuplicatesOptions,
} from './types.js';

export {
  parseExactDecimal,
  formatDecimal,
  compareDecimals,
  subtractDecimals,
  ratioOf,
  type ExactDecimal,
} from './decimal.js';
export { DEFAULT_THRESHOLDS, computeVariance, classifySeverity, allTextuallyIdentical, uniqueTextValues } from './variance.js';
export { groupFacts, groupKey, countByKey, type FactGroup } from './grouper.js';
export { attributeOrigin } from './origin.js';
export {
  buildDuplicateReport,
  assessQuality,
  compareGroups,
  countSeverities,
  countOrigins,
  copyDistribution,
  type ReportTotals,
} from './report.js';
export { detectDuplicates } from './detector.js';
