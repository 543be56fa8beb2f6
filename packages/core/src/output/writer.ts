import { mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import type { FilingResult } from '../engine/types.js';
import { renderFilingJSON } from './json.js';
import { renderReconciliationMarkdown } from './markdown.js';

export type ReportFormat = 'markdown' | 'json';

export interface WriteReportOptions {
  outputDir: string;
  format?: ReportFormat;
  generatedAt?: Date;
}

/** Filing ids become file names; anything outside [A-Za-z0-9._-] is replaced. */
export function reportBaseName(filingId: string): string {
  const safe = filingId.trim().replace(/[^A-Za-z0-9._-]/g, '_');
  return safe || 'filing';
}

export function resolveReportPath(filingId: string, outputDir: string, format: ReportFormat = 'markdown'): string {
  const extension = format === 'json' ? 'json' : 'md';
  return join(outputDir, `${reportBaseName(filingId)}.reconciliation.${extension}`);
}

/** Write one filing's report, creating the output directory if needed. */
export function writeFilingReport(result: FilingResult, options: WriteReportOptions): string {
  const format = options.format ?? 'markdown';
  const path = resolveReportPath(result.filingId, options.outputDir, format);

  mkdirSync(options.outputDir, { recursive: true });
  const content = format === 'json'
    ? renderFilingJSON(result, { generatedAt: options.generatedAt })
    : renderReconciliationMarkdown(result, { generatedAt: options.generatedAt });
  writeFileSync(path, content, 'utf-8');

  return path;
}
