import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ConceptIndexCache, getConceptIndexCache, resetConceptIndexCache } from './cache.js';
import { buildConceptIndex } from './concept-index.js';

const build = () => buildConceptIndex(
  { 'us-gaap:Assets': { periodType: 'instant' } },
  { 'urn:role:bs': { definition: 'Balance Sheet', memberConcepts: ['us-gaap:Assets'] } },
);

beforeEach(() => {
  resetConceptIndexCache();
});

describe('ConceptIndexCache', () => {
  it('builds once per taxonomy name and version', () => {
    const cache = new ConceptIndexCache();
    const builder = vi.fn(build);

    const first = cache.getOrBuild('us-gaap', '2024', builder);
    const second = cache.getOrBuild('us-gaap', '2024', builder);

    expect(second).toBe(first);
    expect(builder).toHaveBeenCalledTimes(1);
    expect(cache.stats()).toEqual({ hits: 1, misses: 1, size: 1 });
  });

  it('keeps versions apart', () => {
    const cache = new ConceptIndexCache();
    const a = cache.getOrBuild('us-gaap', '2023', build);
    const b = cache.getOrBuild('us-gaap', '2024', build);
    expect(a).not.toBe(b);
    expect(cache.size).toBe(2);
  });

  it('keeps variants of one version apart', () => {
    const cache = new ConceptIndexCache();
    const plain = cache.getOrBuild('ifrs-full', '2024', build);
    const market = cache.getOrBuild('ifrs-full', '2024', build, 'balance_sheet=net worth');

    expect(market).not.toBe(plain);
    expect(cache.get('ifrs-full', '2024', 'balance_sheet=net worth')).toBe(market);
    expect(ConceptIndexCache.keyOf('ifrs-full', '2024', 'balance_sheet=net worth')).toBe('ifrs-full@2024#balance_sheet=net worth');
    expect(ConceptIndexCache.keyOf('ifrs-full', '2024')).toBe('ifrs-full@2024');
  });

  it('evicts the least recently used entry past capacity', () => {
    const cache = new ConceptIndexCache(2);
    cache.getOrBuild('a', '1', build);
    cache.getOrBuild('b', '1', build);
    cache.get('a', '1');
    cache.getOrBuild('c', '1', build);

    expect(cache.get('a', '1')).toBeDefined();
    expect(cache.get('b', '1')).toBeUndefined();
    expect(cache.get('c', '1')).toBeDefined();
  });

  it('rejects a capacity below 1', () => {
    expect(() => new ConceptIndexCache(0)).toThrow('capacity must be at least 1');
  });

  it('clears entries and counters', () => {
    const cache = new ConceptIndexCache();
    cache.getOrBuild('a', '1', build);
    cache.clear();
    expect(cache.stats()).toEqual({ hits: 0, misses: 0, size: 0 });
  });
});

describe('getConceptIndexCache', () => {
  it('returns the same instance until reset', () => {
    const first = getConceptIndexCache();
    expect(getConceptIndexCache()).toBe(first);
    resetConceptIndexCache();
    expect(getConceptIndexCache()).not.toBe(first);
  });
});
