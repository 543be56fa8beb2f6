import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, readFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { reportBaseName, resolveReportPath, writeFilingReport } from './writer.js';
import { FilingEngine } from '../engine/engine.js';
import type { FilingResult } from '../engine/types.js';

let tempDir: string;

function makeResult(filingId = 'acme-10k'): FilingResult {
  return new FilingEngine({ cache: false }).run({
    filingId,
    taxonomy: {
      elements: { 'us-gaap:Assets': {} },
      roles: { 'urn:role:bs': { definition: 'Balance Sheet', memberConcepts: ['us-gaap:Assets'] } },
    },
    mapperA: { balance_sheet: [{ concept: 'us-gaap:Assets', value: '1', context: 'c' }] },
    mapperB: {},
  });
}

beforeEach(() => {
  tempDir = mkdtempSync(join(tmpdir(), 'arbiter-output-'));
});

afterEach(() => {
  rmSync(tempDir, { recursive: true, force: true });
});

describe('reportBaseName', () => {
  it('replaces characters unsafe in file names', () => {
    expect(reportBaseName('sec/0000320193-24')).toBe('sec_0000320193-24');
    expect(reportBaseName('  ')).toBe('filing');
  });
});

describe('resolveReportPath', () => {
  it('uses the format extension', () => {
    expect(resolveReportPath('acme', '/out')).toBe(join('/out', 'acme.reconciliation.md'));
    expect(resolveReportPath('acme', '/out', 'json')).toBe(join('/out', 'acme.reconciliation.json'));
  });
});

describe('writeFilingReport', () => {
  it('writes markdown by default', () => {
    const path = writeFilingReport(makeResult(), { outputDir: tempDir });
    expect(path).toBe(join(tempDir, 'acme-10k.reconciliation.md'));
    expect(readFileSync(path, 'utf-8').startsWith('---\nfiling: acme-10k\ntaxonomy: unknown unknown\n')).toBe(true);
  });

  it('writes JSON when asked', () => {
    const path = writeFilingReport(makeResult(), { outputDir: tempDir, format: 'json' });
    const parsed = JSON.parse(readFileSync(path, 'utf-8'));
    expect(parsed.metadata.filing_id).toBe('acme-10k');
    expect(parsed.statistics.balance_sheet.correct_a_only).toBe(1);
  });

  it('creates missing output directories', () => {
    const outputDir = join(tempDir, 'reports', '2024');
    const path = writeFilingReport(makeResult(), { outputDir });
    expect(existsSync(path)).toBe(true);
  });
});
