import { describe, it, expect } from 'vitest';
import { renderDuplicateMarkdown, renderReconciliationMarkdown } from './markdown.js';
import { FilingEngine } from '../engine/engine.js';
import type { FilingInput, FilingResult } from '../engine/types.js';
import { detectDuplicates } from '../duplicates/detector.js';

const generatedAt = new Date('2024-03-01T12:00:00Z');

function makeResult(overrides: Partial<FilingInput> = {}): FilingResult {
  const input: FilingInput = {
    filingId: 'acme-10k',
    taxonomy: {
      name: 'us-gaap',
      version: '2024',
      elements: {
        'us-gaap:Assets': { periodType: 'instant' },
        'us-gaap:Liabilities': { periodType: 'instant' },
        'us-gaap:Revenues': { periodType: 'duration' },
      },
      roles: {
        'urn:role:bs': { definition: 'Balance Sheet', memberConcepts: ['us-gaap:Assets', 'us-gaap:Liabilities'] },
        'urn:role:is': { definition: 'Statements of Income', memberConcepts: ['us-gaap:Revenues'] },
      },
    },
    extensions: { prefix: 'aci', elements: [{ name: 'Loop', substitutionGroup: 'aci:Loop' }] },
    mapperA: {
      balance_sheet: [{ concept: 'us-gaap:Assets', value: '100', context: 'FY24' }],
      income_statement: [
        { concept: 'us-gaap:Revenues', value: '70', context: 'FY24' },
        { concept: 'us-gaap:Revenues', value: '75', context: 'FY24' },
      ],
    },
    mapperB: {
      balance_sheet: [{ concept: 'us-gaap:Assets', value: '100', context: 'FY24' }],
      income_statement: [{ concept: 'us-gaap:Liabilities', value: '40', context: 'FY24' }],
    },
    ...overrides,
  };
  return { ...new FilingEngine({ cache: false }).run(input), durationMs: 1500 };
}

describe('renderReconciliationMarkdown', () => {
  it('starts with YAML frontmatter', () => {
    const md = renderReconciliationMarkdown(makeResult(), { generatedAt });
    expect(md.startsWith(
      '---\nfiling: acme-10k\ntaxonomy: us-gaap 2024\ndate: 2024-03-01\nconcepts: 3\nagreement: 66.67%\n---\n',
    )).toBe(true);
  });

  it('tabulates outcomes per statement and overall', () => {
    const lines = renderReconciliationMarkdown(makeResult(), { generatedAt }).split('\n');
    expect(lines).toContain('| balance_sheet | 1 | 1 | 0 | 0 | 0 | 0 |');
    expect(lines).toContain('| income_statement | 2 | 0 | 1 | 0 | 1 | 0 |');
    expect(lines).toContain('| cash_flow | 0 | 0 | 0 | 0 | 0 | 0 |');
    expect(lines).toContain('| **overall** | 3 | 1 | 1 | 0 | 1 | 0 |');
  });

  it('lists invalid extension chains', () => {
    const lines = renderReconciliationMarkdown(makeResult(), { generatedAt }).split('\n');
    expect(lines).toContain('1 with a substitution group: 0 resolved, 1 invalid.');
    expect(lines).toContain('- `aci:Loop`: cycle or chain too deep (aci:Loop -> aci:Loop)');
  });

  it('groups discrepancies by statement', () => {
    const md = renderReconciliationMarkdown(makeResult(), { generatedAt });
    expect(md).toContain(
      '### income_statement\n\n| Concept | Expected | Mapper A | Mapper B |\n' +
        '|---------|----------|----------|----------|\n| us-gaap:Liabilities | balance_sheet | no | yes |',
    );
    expect(md).not.toContain('No discrepancies.');
  });

  it('says so when there are no discrepancies', () => {
    const md = renderReconciliationMarkdown(makeResult({ mapperB: {} }), { generatedAt });
    expect(md).toContain('## Discrepancies\n\nNo discrepancies.');
  });

  it('embeds both duplicate reports and the execution footer', () => {
    const lines = renderReconciliationMarkdown(makeResult(), { generatedAt }).split('\n');
    expect(lines).toContain('### Duplicate Integrity: mapper A');
    expect(lines).toContain('### Duplicate Integrity: mapper B');
    expect(lines).toContain('| us-gaap:Revenues | FY24 | 2 | CRITICAL | 6.67% | 5 | UNKNOWN |');
    expect(lines).toContain('| Index | 3 concepts |');
    expect(lines).toContain('| Duration | 1.5s |');
  });
});

describe('renderDuplicateMarkdown', () => {
  it('renders a standalone report', () => {
    const report = detectDuplicates([
      { concept: 'us-gaap:Cash', value: '10', context: 'a|b' },
      { concept: 'us-gaap:Cash', value: '10', context: 'a|b' },
      { concept: 'us-gaap:Note', value: 'x', context: 'c' },
      { concept: 'us-gaap:Note', value: 'y', context: 'c' },
    ]);
    const md = renderDuplicateMarkdown(report, 'mapper B');
    const lines = md.split('\n');

    expect(lines[0]).toBe('# Duplicate Integrity: mapper B');
    expect(lines[2]).toBe('Minor duplicate variances only, most likely formatting or rounding differences.');
    expect(lines).toContain('| Duplicate facts | 4 (100%) |');
    expect(lines).toContain('| Origin | 0 source, 0 mapping, 2 unknown |');
    expect(lines).toContain('## Groups');
    expect(lines).toContain('| us-gaap:Note | c | 2 | MINOR | n/a | 0 | UNKNOWN |');
    expect(lines).toContain('| us-gaap:Cash | a\\|b | 2 | REDUNDANT | 0.00% | 0 | UNKNOWN |');
  });

  it('omits the group table for a clean report', () => {
    const md = renderDuplicateMarkdown(detectDuplicates([]), 'mapper A');
    expect(md).toContain('No duplicates detected.');
    expect(md).not.toContain('Groups');
  });
});
