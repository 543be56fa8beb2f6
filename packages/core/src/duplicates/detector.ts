/**
 * Duplicate-integrity analyzer.
 *
 * Works directly on one mapper's raw facts, independent of the taxonomy.
 * Diagnostic only: it reports (concept, context) collisions and never removes
 * or rewrites a fact.
 */

import { MissingInputError } from '../errors.js';
import { DEFAULT_FIELD_ALIASES, extractFacts } from '../facts/fields.js';
import type { RawFact } from '../facts/types.js';
import { countByKey, groupFacts } from './grouper.js';
import { attributeOrigin } from './origin.js';
import { buildDuplicateReport } from './report.js';
import type { DetectDuplicatesOptions, DuplicateGroup, DuplicateReport, NumericCoverage, SeverityThresholds } from './types.js';
import { DEFAULT_THRESHOLDS, classifySeverity, computeVariance, uniqueTextValues } from './variance.js';

export function detectDuplicates(
  facts: readonly RawFact[] | null | undefined,
  sourceFacts?: readonly RawFact[],
  options: DetectDuplicatesOptions = {},
): DuplicateReport {
  const filingId = options.filingId ?? 'unknown';
  if (!facts) {
    throw new MissingInputError('No fact list supplied for duplicate detection', filingId, 'facts');
  }

  const aliases = options.aliases ?? DEFAULT_FIELD_ALIASES;
  const thresholds: SeverityThresholds = {
    critical: options.thresholds?.critical ?? DEFAULT_THRESHOLDS.critical,
    major: options.thresholds?.major ?? DEFAULT_THRESHOLDS.major,
  };

  const extracted = extractFacts(facts, options.sourceMapper ?? 'mapper_a', aliases);
  const sourceCounts = sourceFacts ? countByKey(extractFacts(sourceFacts, 'source', aliases).facts) : undefined;

  const groups: DuplicateGroup[] = [];
  for (const [key, group] of groupFacts(extracted.facts)) {
    if (group.facts.length < 2) continue;

    const values = group.facts.map(fact => fact.value);
    const variance = computeVariance(values);
    const sourceCount = sourceCounts ? (sourceCounts.get(key) ?? 0) : undefined;
    const note = coverageNote(variance.numeric, values.length - variance.numericCount);

    groups.push({
      concept: group.concept,
      context: group.context,
      facts: group.facts,
      count: group.facts.length,
      uniqueValues: uniqueTextValues(values),
      varianceRatio: variance.ratio,
      varianceAmount: variance.amount,
      severity: classifySeverity(values, variance.ratio, thresholds),
      origin: attributeOrigin(group.facts.length, sourceCount),
      ...(sourceCount !== undefined ? { sourceCount } : {}),
      numeric: variance.numeric,
      ...(note ? { note } : {}),
    });
  }

  return buildDuplicateReport(groups, {
    totalFactsAnalyzed: extracted.facts.length,
    skippedFacts: extracted.skipped,
  });
}

function coverageNote(numeric: NumericCoverage, nonNumeric: number): string | undefined {
  if (numeric === 'none') return 'non-numeric values; variance not computed';
  if (numeric === 'partial') return `${nonNumeric} non-numeric value(s) left out of variance`;
  return undefined;
}
