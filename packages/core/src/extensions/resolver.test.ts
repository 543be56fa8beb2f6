import { describe, it, expect } from 'vitest';
import { createConcept } from '../concepts/normalizer.js';
import { buildConceptIndex } from '../taxonomy/concept-index.js';
import { resolveExtensions, summarizeResolutions } from './resolver.js';
import type { ExtensionConcept } from './types.js';

const index = buildConceptIndex(
  {
    'us-gaap:Liabilities': { periodType: 'instant', balanceType: 'credit' },
    'us-gaap:Revenues': { periodType: 'duration', balanceType: 'credit' },
  },
  {
    'urn:role:bs': { definition: 'Statement of Financial Position', memberConcepts: ['us-gaap:Liabilities'] },
    'urn:role:is': { definition: 'Statements of Operations', memberConcepts: ['us-gaap:Revenues'] },
  },
);

function ext(localName: string, substitutionGroup?: string): ExtensionConcept {
  const concept = createConcept({ namespace: 'aci', localName });
  return substitutionGroup ? { ...concept, substitutionGroup } : concept;
}

describe('resolveExtensions', () => {
  it('resolves a direct pointer to an indexed concept', () => {
    const result = resolveExtensions([ext('CustomLiability', 'us-gaap:Liabilities')], index);
    expect(result.get('aci:CustomLiability')).toEqual({
      status: 'VALID',
      concept: 'aci:CustomLiability',
      baseConcept: 'us-gaap:Liabilities',
      statementType: 'balance_sheet',
      chain: ['aci:CustomLiability', 'us-gaap:Liabilities'],
    });
  });

  it('resolves through chained extensions', () => {
    const result = resolveExtensions(
      [ext('Outer', 'aci:Middle'), ext('Middle', 'aci:Inner'), ext('Inner', 'us-gaap:Revenues')],
      index,
    );
    const outer = result.get('aci:Outer');
    expect(outer?.status).toBe('VALID');
    expect(outer?.chain).toEqual(['aci:Outer', 'aci:Middle', 'aci:Inner', 'us-gaap:Revenues']);
    if (outer?.status === 'VALID') {
      expect(outer.statementType).toBe('income_statement');
    }
  });

  it('terminates a cycle as INVALID', () => {
    const result = resolveExtensions([ext('A', 'aci:B'), ext('B', 'aci:A')], index);
    expect(result.get('aci:A')).toEqual({
      status: 'INVALID',
      concept: 'aci:A',
      reason: 'cycle or chain too deep',
      chain: ['aci:A', 'aci:B', 'aci:A'],
    });
    expect(result.get('aci:B')).toMatchObject({ status: 'INVALID', reason: 'cycle or chain too deep' });
  });

  it('terminates a self-reference as INVALID', () => {
    const result = resolveExtensions([ext('Self', 'aci:Self')], index);
    expect(result.get('aci:Self')).toMatchObject({ status: 'INVALID', reason: 'cycle or chain too deep' });
  });

  it('rejects chains longer than maxDepth', () => {
    // E0 -> E1 -> E2 -> E3 -> us-gaap:Liabilities is four hops
    const chain = [
      ext('E0', 'aci:E1'),
      ext('E1', 'aci:E2'),
      ext('E2', 'aci:E3'),
      ext('E3', 'us-gaap:Liabilities'),
    ];
    expect(resolveExtensions(chain, index, { maxDepth: 4 }).get('aci:E0')?.status).toBe('VALID');
    expect(resolveExtensions(chain, index, { maxDepth: 3 }).get('aci:E0')).toMatchObject({
      status: 'INVALID',
      reason: 'cycle or chain too deep',
      chain: ['aci:E0', 'aci:E1', 'aci:E2', 'aci:E3'],
    });
  });

  it('reports a dangling pointer on the last allowed hop as base concept not found', () => {
    const chain = [ext('E0', 'aci:E1'), ext('E1', 'aci:E2'), ext('E2', 'us-gaap:NoSuchThing')];
    expect(resolveExtensions(chain, index, { maxDepth: 3 }).get('aci:E0')).toEqual({
      status: 'INVALID',
      concept: 'aci:E0',
      reason: 'base concept not found',
      chain: ['aci:E0', 'aci:E1', 'aci:E2', 'us-gaap:NoSuchThing'],
    });
  });

  it('reports dangling pointers as base concept not found', () => {
    const result = resolveExtensions([ext('Orphan', 'us-gaap:NoSuchThing'), ext('Stub'), ext('ToStub', 'aci:Stub')], index);
    expect(result.get('aci:Orphan')).toMatchObject({ status: 'INVALID', reason: 'base concept not found' });
    expect(result.get('aci:ToStub')).toMatchObject({
      status: 'INVALID',
      reason: 'base concept not found',
      chain: ['aci:ToStub', 'aci:Stub'],
    });
  });

  it('leaves extensions without a pointer unmapped', () => {
    const result = resolveExtensions([ext('Plain'), ext('Item', 'xbrli:item')], index);
    expect(result.has('aci:Plain')).toBe(false);
    expect(result.has('aci:Item')).toBe(false);
    expect(result.size).toBe(0);
  });

  it('honours a custom structural group list', () => {
    const result = resolveExtensions([ext('Item', 'xbrli:item')], index, { structuralGroups: [] });
    expect(result.get('aci:Item')).toMatchObject({ status: 'INVALID', reason: 'base concept not found' });
  });

  it('rejects a non-positive maxDepth', () => {
    expect(() => resolveExtensions([], index, { maxDepth: 0 })).toThrow(RangeError);
  });
});

describe('summarizeResolutions', () => {
  it('counts valid and invalid resolutions', () => {
    const result = resolveExtensions(
      [ext('Good', 'us-gaap:Liabilities'), ext('Bad', 'us-gaap:Missing'), ext('None')],
      index,
    );
    expect(summarizeResolutions(result)).toEqual({ total: 2, valid: 1, invalid: 1 });
  });
});
