import { describe, it, expect } from 'vitest';
import { classifyRole, keywordTableKey, validateKeywordTable, DEFAULT_ROLE_KEYWORDS } from './role-classifier.js';
import { InvariantViolationError } from '../errors.js';

describe('classifyRole', () => {
  it('recognises balance sheet phrasing', () => {
    expect(classifyRole('104000 - Statement - Statement of Financial Position, Classified')).toBe('balance_sheet');
    expect(classifyRole('Consolidated Balance Sheets')).toBe('balance_sheet');
  });

  it('recognises income statement phrasing', () => {
    expect(classifyRole('Consolidated Statements of Operations')).toBe('income_statement');
    expect(classifyRole('Statement of Comprehensive Income')).toBe('income_statement');
  });

  it('recognises cash flow phrasing', () => {
    expect(classifyRole('Consolidated Statements of Cash Flows')).toBe('cash_flow');
  });

  it('prefers cash flow over income when both match', () => {
    expect(classifyRole('Cash Flows from Operations')).toBe('cash_flow');
  });

  it('prefers balance sheet over every other match', () => {
    expect(classifyRole('Balance Sheet (Parenthetical) - Income Taxes')).toBe('balance_sheet');
  });

  it('falls back to other', () => {
    expect(classifyRole('Document and Entity Information')).toBe('other');
    expect(classifyRole('Stockholders Equity Note')).toBe('other');
  });

  it('uses a supplied keyword table', () => {
    const ifrs = {
      balance_sheet: ['financial position'],
      cash_flow: ['cash flows'],
      income_statement: ['profit or loss'],
    };
    expect(classifyRole('Statement of profit or loss', ifrs)).toBe('income_statement');
    expect(classifyRole('Statement of operations', ifrs)).toBe('other');
  });
});

describe('validateKeywordTable', () => {
  it('lower-cases and trims keywords', () => {
    const table = validateKeywordTable({
      balance_sheet: ['  Balance Sheet '],
      cash_flow: ['Cash Flow'],
      income_statement: ['', 'Income'],
    });
    expect(table).toEqual({
      balance_sheet: ['balance sheet'],
      cash_flow: ['cash flow'],
      income_statement: ['income'],
    });
  });

  it('accepts the default table', () => {
    expect(validateKeywordTable(DEFAULT_ROLE_KEYWORDS).balance_sheet).toEqual(['balance sheet', 'financial position']);
  });

  it('throws when a keyword implies two statement types', () => {
    const table = {
      balance_sheet: ['position'],
      cash_flow: ['cash flow'],
      income_statement: ['Position'],
    };
    expect(() => validateKeywordTable(table, 'filing-7')).toThrow(InvariantViolationError);
    try {
      validateKeywordTable(table, 'filing-7');
    } catch (error) {
      expect(error).toBeInstanceOf(InvariantViolationError);
      if (error instanceof InvariantViolationError) {
        expect(error.filingId).toBe('filing-7');
        expect(error.concept).toBe('position');
      }
    }
  });
});

describe('keywordTableKey', () => {
  it('describes the default table', () => {
    expect(keywordTableKey()).toBe(
      'balance_sheet=balance sheet|financial position;cash_flow=cash flow;income_statement=income|operations|comprehensive',
    );
  });

  it('ignores case and surrounding whitespace', () => {
    const table = { balance_sheet: [' Net Worth '], cash_flow: ['cash flow'], income_statement: ['income'] };
    expect(keywordTableKey(table)).toBe('balance_sheet=net worth;cash_flow=cash flow;income_statement=income');
  });
});
