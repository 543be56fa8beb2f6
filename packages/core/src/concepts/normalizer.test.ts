import { describe, it, expect } from 'vitest';
import {
  normalizeConceptId,
  splitConceptId,
  localNameOf,
  namespaceOf,
  createConcept,
  toPeriodType,
  toBalanceType,
  toAbstractFlag,
} from './normalizer.js';

describe('normalizeConceptId', () => {
  it('strips the filing-year suffix from the namespace', () => {
    expect(normalizeConceptId('us-gaap-2024:Assets')).toBe('us-gaap:Assets');
    expect(normalizeConceptId('dei-2023:EntityRegistrantName')).toBe('dei:EntityRegistrantName');
  });

  it('leaves canonical ids unchanged', () => {
    expect(normalizeConceptId('us-gaap:Assets')).toBe('us-gaap:Assets');
    expect(normalizeConceptId('ifrs-full:Revenue')).toBe('ifrs-full:Revenue');
  });

  it('trims surrounding whitespace', () => {
    expect(normalizeConceptId('  us-gaap:Assets ')).toBe('us-gaap:Assets');
  });

  it('accepts linkbase locator form', () => {
    expect(normalizeConceptId('us-gaap_Assets')).toBe('us-gaap:Assets');
    expect(normalizeConceptId('aci_CustomLiability')).toBe('aci:CustomLiability');
  });

  it('returns ids without a namespace as-is', () => {
    expect(normalizeConceptId('Assets')).toBe('Assets');
  });

  it('does not strip year-like text from the local name', () => {
    expect(normalizeConceptId('aci:Notes-2030')).toBe('aci:Notes-2030');
  });
});

describe('splitConceptId', () => {
  it('splits namespace and local name', () => {
    expect(splitConceptId('us-gaap-2024:Liabilities')).toEqual({
      namespace: 'us-gaap',
      localName: 'Liabilities',
    });
  });

  it('returns null for empty or dangling separators', () => {
    expect(splitConceptId('')).toBeNull();
    expect(splitConceptId('us-gaap:')).toBeNull();
    expect(splitConceptId(':Assets')).toBeNull();
  });
});

describe('localNameOf / namespaceOf', () => {
  it('extracts parts', () => {
    expect(localNameOf('us-gaap:RevenueTextBlock')).toBe('RevenueTextBlock');
    expect(namespaceOf('us-gaap-2022:Assets')).toBe('us-gaap');
    expect(namespaceOf('Assets')).toBeUndefined();
  });
});

describe('attribute coercion', () => {
  it('maps period and balance types', () => {
    expect(toPeriodType('Instant')).toBe('instant');
    expect(toPeriodType('duration')).toBe('duration');
    expect(toPeriodType('forever')).toBe('unknown');
    expect(toPeriodType(undefined)).toBe('unknown');
    expect(toBalanceType('credit')).toBe('credit');
    expect(toBalanceType(null)).toBe('none');
  });

  it('reads abstract flags from booleans and strings', () => {
    expect(toAbstractFlag(true)).toBe(true);
    expect(toAbstractFlag('true')).toBe(true);
    expect(toAbstractFlag('false')).toBe(false);
    expect(toAbstractFlag(1)).toBe(false);
  });
});

describe('createConcept', () => {
  it('builds a frozen concept', () => {
    const concept = createConcept(
      { namespace: 'us-gaap', localName: 'Assets' },
      { periodType: 'instant', balanceType: 'debit', abstract: false },
    );
    expect(concept).toEqual({
      id: 'us-gaap:Assets',
      namespace: 'us-gaap',
      localName: 'Assets',
      periodType: 'instant',
      balanceType: 'debit',
      isAbstract: false,
    });
    expect(Object.isFrozen(concept)).toBe(true);
  });
});
