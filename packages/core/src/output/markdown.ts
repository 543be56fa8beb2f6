/**
 * Markdown report formatter.
 *
 * Produces a review memo with:
 * - YAML frontmatter (filing, taxonomy, date, agreement rate)
 * - Outcome tables per statement and overall
 * - Extension resolution results and discrepancy tables
 * - Duplicate-integrity summaries per mapper
 */

import type { DuplicateReport } from '../duplicates/types.js';
import type { FilingResult } from '../engine/types.js';
import type { InvalidResolution } from '../extensions/types.js';
import { agreementRate } from '../reconciliation/statistics.js';
import type { ReconciliationStatistics } from '../reconciliation/types.js';
import { STATEMENT_TYPES } from '../taxonomy/types.js';
import { formatDuration, formatPercent } from './format.js';

export interface MarkdownFormatOptions {
  /** Date shown in the frontmatter; defaults to today. */
  generatedAt?: Date;
}

export function renderReconciliationMarkdown(result: FilingResult, options: MarkdownFormatOptions = {}): string {
  const lines: string[] = [];

  lines.push(buildFrontmatter(result, options.generatedAt ?? new Date()));
  lines.push(`# Reconciliation: ${result.filingId}`);
  lines.push('');
  lines.push(buildOutcomeTable(result));
  lines.push('');
  lines.push(buildExtensionSection(result));
  lines.push('');
  lines.push(buildDiscrepancySection(result));
  lines.push('');
  lines.push('## Duplicates');
  lines.push('');
  lines.push(renderDuplicateMarkdown(result.duplicates.mapperA, 'mapper A', { level: 3 }));
  lines.push('');
  lines.push(renderDuplicateMarkdown(result.duplicates.mapperB, 'mapper B', { level: 3 }));
  lines.push('');
  lines.push(buildMetadataFooter(result));

  return lines.join('\n');
}

export interface DuplicateMarkdownOptions {
  /** Heading level of the report title. */
  level?: number;
}

export function renderDuplicateMarkdown(
  report: DuplicateReport,
  mapper: string,
  options: DuplicateMarkdownOptions = {},
): string {
  const level = options.level ?? 1;
  const heading = '#'.repeat(level);
  const lines: string[] = [];

  lines.push(`${heading} Duplicate Integrity: ${mapper}`);
  lines.push('');
  lines.push(report.qualityAssessment);
  lines.push('');
  lines.push('| Metric | Value |');
  lines.push('|--------|-------|');
  lines.push(`| Facts analyzed | ${report.totalFactsAnalyzed} |`);
  lines.push(`| Skipped facts | ${report.skippedFacts} |`);
  lines.push(`| Duplicate groups | ${report.totalGroups} |`);
  lines.push(`| Duplicate facts | ${report.totalDuplicateFacts} (${report.duplicatePercentage}%) |`);
  lines.push(`| Critical | ${report.severityCounts.CRITICAL} |`);
  lines.push(`| Major | ${report.severityCounts.MAJOR} |`);
  lines.push(`| Minor | ${report.severityCounts.MINOR} |`);
  lines.push(`| Redundant | ${report.severityCounts.REDUNDANT} |`);
  lines.push(
    `| Origin | ${report.originBreakdown.sourceData} source, ` +
      `${report.originBreakdown.mappingIntroduced} mapping, ${report.originBreakdown.unknown} unknown |`,
  );

  if (report.perGroupDetail.length > 0) {
    lines.push('');
    lines.push(`${heading}# Groups`);
    lines.push('');
    lines.push('| Concept | Context | Copies | Severity | Variance | Amount | Origin |');
    lines.push('|---------|---------|--------|----------|----------|--------|--------|');
    for (const group of report.perGroupDetail) {
      const variance = group.numeric === 'none' ? 'n/a' : formatPercent(group.varianceRatio);
      lines.push(
        `| ${group.concept} | ${escapeCell(group.context)} | ${group.count} | ${group.severity} | ` +
          `${variance} | ${group.varianceAmount} | ${group.origin} |`,
      );
    }
  }

  return lines.join('\n');
}

function buildFrontmatter(result: FilingResult, generatedAt: Date): string {
  const fields: string[] = [];
  fields.push('---');
  fields.push(`filing: ${result.filingId}`);
  fields.push(`taxonomy: ${result.taxonomy.name} ${result.taxonomy.version}`);
  fields.push(`date: ${generatedAt.toISOString().split('T')[0]}`);
  fields.push(`concepts: ${result.reconciliation.overall.totalConcepts}`);
  fields.push(`agreement: ${formatPercent(agreementRate(result.reconciliation.overall))}`);
  fields.push('---');
  fields.push('');
  return fields.join('\n');
}

function statisticsRow(label: string, stats: ReconciliationStatistics): string {
  return (
    `| ${label} | ${stats.totalConcepts} | ${stats.correctBoth} | ${stats.correctAOnly} | ` +
    `${stats.correctBOnly} | ${stats.correctNeither} | ${stats.notInTaxonomy} |`
  );
}

function buildOutcomeTable(result: FilingResult): string {
  const lines: string[] = [];
  lines.push('## Outcomes');
  lines.push('');
  lines.push('| Statement | Concepts | Both | A only | B only | Neither | Not in taxonomy |');
  lines.push('|-----------|----------|------|--------|--------|---------|-----------------|');
  for (const type of STATEMENT_TYPES) {
    lines.push(statisticsRow(type, result.reconciliation.statements[type].statistics));
  }
  lines.push(statisticsRow('**overall**', result.reconciliation.overall));
  return lines.join('\n');
}

function buildExtensionSection(result: FilingResult): string {
  const { summary, resolutions } = result.extensions;
  const lines: string[] = [];
  lines.push('## Extensions');
  lines.push('');
  lines.push(`${summary.total} with a substitution group: ${summary.valid} resolved, ${summary.invalid} invalid.`);

  const invalid = resolutions.filter((resolution): resolution is InvalidResolution => resolution.status === 'INVALID');
  if (invalid.length > 0) {
    lines.push('');
    for (const resolution of invalid) {
      lines.push(`- \`${resolution.concept}\`: ${resolution.reason} (${resolution.chain.join(' -> ')})`);
    }
  }
  return lines.join('\n');
}

function buildDiscrepancySection(result: FilingResult): string {
  const lines: string[] = [];
  lines.push('## Discrepancies');

  let total = 0;
  for (const type of STATEMENT_TYPES) {
    const discrepancies = result.reconciliation.statements[type].discrepancies;
    if (discrepancies.length === 0) continue;
    total += discrepancies.length;

    lines.push('');
    lines.push(`### ${type}`);
    lines.push('');
    lines.push('| Concept | Expected | Mapper A | Mapper B |');
    lines.push('|---------|----------|----------|----------|');
    for (const d of discrepancies) {
      lines.push(`| ${d.concept} | ${d.expectedStatement} | ${yesNo(d.inMapperA)} | ${yesNo(d.inMapperB)} |`);
    }
  }

  if (total === 0) {
    lines.push('');
    lines.push('No discrepancies.');
  }
  return lines.join('\n');
}

function buildMetadataFooter(result: FilingResult): string {
  const lines: string[] = [];
  lines.push('---');
  lines.push('');
  lines.push('## Execution Details');
  lines.push('');
  lines.push('| Parameter | Value |');
  lines.push('|-----------|-------|');
  lines.push(`| Index | ${result.indexSize} concepts${result.indexCached ? ' (cached)' : ''} |`);
  lines.push(`| Index warnings | ${result.indexWarnings.length} |`);
  lines.push(`| Duration | ${formatDuration(result.durationMs)} |`);
  return lines.join('\n');
}

function yesNo(value: boolean): string {
  return value ? 'yes' : 'no';
}

function escapeCell(text: string): string {
  return text.replace(/\|/g, '\\|');
}
