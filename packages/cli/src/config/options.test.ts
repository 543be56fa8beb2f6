import { describe, it, expect } from 'vitest';
import { ConceptIndexCache } from '@arbiter/core';
import { ConfigDefaults } from './schema.js';
import { toEngineOptions } from './options.js';

describe('toEngineOptions', () => {
  it('maps every configured section onto the engine', () => {
    const options = toEngineOptions(ConfigDefaults);

    expect(options.maxDepth).toBe(10);
    expect(options.thresholds).toEqual({ critical: 0.05, major: 0.01 });
    expect(options.exclusions?.namespaces).toEqual(['dei']);
    expect(options.aliases?.value).toEqual(['fact_value', 'value']);
    expect(options.roleKeywords?.cash_flow).toEqual(['cash flow']);
    expect(options.cache).toBeInstanceOf(ConceptIndexCache);
  });

  it('uses a supplied cache', () => {
    const cache = new ConceptIndexCache(2);
    expect(toEngineOptions(ConfigDefaults, cache).cache).toBe(cache);
  });
});
