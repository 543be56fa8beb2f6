import chalk from 'chalk';
import { agreementRate, formatDuration, formatPercent, type DuplicateReport, type FilingResult } from '@arbiter/core';

function describeDuplicates(report: DuplicateReport): string {
  if (report.totalGroups === 0) return 'none';
  const { CRITICAL, MAJOR } = report.severityCounts;
  const flagged: string[] = [];
  if (CRITICAL > 0) flagged.push(chalk.red(`${CRITICAL} critical`));
  if (MAJOR > 0) flagged.push(chalk.yellow(`${MAJOR} major`));
  const suffix = flagged.length > 0 ? ` (${flagged.join(', ')})` : '';
  return `${report.totalGroups} group(s)${suffix}`;
}

/** Human-readable lines for one filing, printed after the report is written. */
export function formatFilingSummary(result: FilingResult): string[] {
  const overall = result.reconciliation.overall;
  const { valid, invalid } = result.extensions.summary;

  return [
    `${chalk.bold(result.filingId)}  ${chalk.dim(`${result.taxonomy.name} ${result.taxonomy.version}`)}`,
    `  concepts ${overall.totalConcepts}  both ${overall.correctBoth}  A only ${overall.correctAOnly}  ` +
      `B only ${overall.correctBOnly}  neither ${overall.correctNeither}  not in taxonomy ${overall.notInTaxonomy}`,
    `  agreement ${formatPercent(agreementRate(overall))}  extensions ${valid} resolved / ${invalid} invalid`,
    `  duplicates  A: ${describeDuplicates(result.duplicates.mapperA)}  B: ${describeDuplicates(result.duplicates.mapperB)}`,
    chalk.dim(`  ${formatDuration(result.durationMs)}`),
  ];
}

/** Compact record for --json output. */
export function toSummaryRecord(result: FilingResult, reportPath?: string) {
  const overall = result.reconciliation.overall;
  return {
    filing_id: result.filingId,
    ...(reportPath ? { report: reportPath } : {}),
    total_concepts: overall.totalConcepts,
    agreement: Math.round(agreementRate(overall) * 10000) / 10000,
    discrepancies: overall.correctNeither,
    invalid_extensions: result.extensions.summary.invalid,
    critical_duplicates: {
      mapper_a: result.duplicates.mapperA.severityCounts.CRITICAL,
      mapper_b: result.duplicates.mapperB.severityCounts.CRITICAL,
    },
  };
}
