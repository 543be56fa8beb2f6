/**
 * Machine-readable JSON output.
 *
 * Statistics use the snake_case outcome keys downstream scorers read; every
 * other record keeps its in-memory field names.
 */

import type { DuplicateGroup, DuplicateReport } from '../duplicates/types.js';
import type { FilingResult } from '../engine/types.js';
import type { ExtensionResolution } from '../extensions/types.js';
import type { AcceptedFact, Discrepancy } from '../reconciliation/types.js';
import type { StatementType } from '../taxonomy/types.js';
import { formatDuration, toJsonStatistics, type JsonStatistics } from './format.js';

export interface JsonFormatOptions {
  /** Timestamp recorded in the metadata block; defaults to now. */
  generatedAt?: Date;
}

export interface JsonOutputMetadata {
  filing_id: string;
  taxonomy: { name: string; version: string };
  generated_at: string;
  duration_ms: number;
  duration_formatted: string;
}

export interface JsonStatementOutput {
  statistics: JsonStatistics;
  accepted_facts: AcceptedFact[];
  discrepancies: Discrepancy[];
  excluded_concepts: string[];
  skipped_facts: number;
}

export type JsonDuplicateGroup = Omit<DuplicateGroup, 'facts'>;

export type JsonDuplicateReport = Omit<DuplicateReport, 'perGroupDetail'> & {
  perGroupDetail: JsonDuplicateGroup[];
};

export interface JsonOutput {
  metadata: JsonOutputMetadata;
  index: { size: number; cached: boolean; warnings: number };
  extensions: { total: number; valid: number; invalid: number; resolutions: ExtensionResolution[] };
  statistics: { overall: JsonStatistics } & Record<StatementType, JsonStatistics>;
  statements: Record<StatementType, JsonStatementOutput>;
  duplicates: { mapper_a: JsonDuplicateReport; mapper_b: JsonDuplicateReport };
}

export function toJsonOutput(result: FilingResult, options: JsonFormatOptions = {}): JsonOutput {
  const { statements, overall } = result.reconciliation;
  const perStatement = (type: StatementType): JsonStatementOutput => ({
    statistics: toJsonStatistics(statements[type].statistics),
    accepted_facts: statements[type].acceptedFacts,
    discrepancies: statements[type].discrepancies,
    excluded_concepts: statements[type].excludedConcepts,
    skipped_facts: statements[type].skippedFacts,
  });

  return {
    metadata: {
      filing_id: result.filingId,
      taxonomy: { name: result.taxonomy.name, version: result.taxonomy.version },
      generated_at: (options.generatedAt ?? new Date()).toISOString(),
      duration_ms: result.durationMs,
      duration_formatted: formatDuration(result.durationMs),
    },
    index: { size: result.indexSize, cached: result.indexCached, warnings: result.indexWarnings.length },
    extensions: { ...result.extensions.summary, resolutions: result.extensions.resolutions },
    statistics: {
      overall: toJsonStatistics(overall),
      balance_sheet: toJsonStatistics(statements.balance_sheet.statistics),
      income_statement: toJsonStatistics(statements.income_statement.statistics),
      cash_flow: toJsonStatistics(statements.cash_flow.statistics),
      other: toJsonStatistics(statements.other.statistics),
    },
    statements: {
      balance_sheet: perStatement('balance_sheet'),
      income_statement: perStatement('income_statement'),
      cash_flow: perStatement('cash_flow'),
      other: perStatement('other'),
    },
    duplicates: {
      mapper_a: toJsonDuplicateReport(result.duplicates.mapperA),
      mapper_b: toJsonDuplicateReport(result.duplicates.mapperB),
    },
  };
}

/** Format a filing result as a JSON document. */
export function renderFilingJSON(result: FilingResult, options: JsonFormatOptions = {}): string {
  return JSON.stringify(toJsonOutput(result, options), null, 2);
}

/** Drop the raw fact instances; groups already carry their values. */
export function toJsonDuplicateReport(report: DuplicateReport): JsonDuplicateReport {
  return {
    ...report,
    perGroupDetail: report.perGroupDetail.map(({ facts: _facts, ...group }) => group),
  };
}

export function renderDuplicateJSON(report: DuplicateReport): string {
  return JSON.stringify(toJsonDuplicateReport(report), null, 2);
}
