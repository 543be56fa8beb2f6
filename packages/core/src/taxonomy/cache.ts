import type { TaxonomyConceptIndex } from './concept-index.js';

export const DEFAULT_CACHE_CAPACITY = 8;

/**
 * Process-wide cache of concept indexes keyed by taxonomy name and version,
 * plus a variant for anything else the index was built from (the role
 * keyword table). Indexes are immutable after construction, so concurrent
 * filing workers can share one instance. Least-recently-used entries are
 * evicted past capacity.
 */
export class ConceptIndexCache {
  private readonly entries = new Map<string, TaxonomyConceptIndex>();
  private hits = 0;
  private misses = 0;

  constructor(private readonly capacity = DEFAULT_CACHE_CAPACITY) {
    if (capacity < 1) {
      throw new Error('ConceptIndexCache capacity must be at least 1');
    }
  }

  static keyOf(name: string, version: string, variant = ''): string {
    return variant ? `${name}@${version}#${variant}` : `${name}@${version}`;
  }

  get(name: string, version: string, variant = ''): TaxonomyConceptIndex | undefined {
    const key = ConceptIndexCache.keyOf(name, version, variant);
    const index = this.entries.get(key);
    if (index) {
      // Re-insert to mark as most recently used
      this.entries.delete(key);
      this.entries.set(key, index);
    }
    return index;
  }

  set(name: string, version: string, index: TaxonomyConceptIndex, variant = ''): void {
    const key = ConceptIndexCache.keyOf(name, version, variant);
    this.entries.delete(key);
    this.entries.set(key, index);
    while (this.entries.size > this.capacity) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  getOrBuild(
    name: string,
    version: string,
    build: () => TaxonomyConceptIndex,
    variant = '',
  ): TaxonomyConceptIndex {
    const cached = this.get(name, version, variant);
    if (cached) {
      this.hits++;
      return cached;
    }
    this.misses++;
    const index = build();
    this.set(name, version, index, variant);
    return index;
  }

  get size(): number {
    return this.entries.size;
  }

  stats(): { hits: number; misses: number; size: number } {
    return { hits: this.hits, misses: this.misses, size: this.entries.size };
  }

  clear(): void {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
  }
}

// ---------------------------------------------------------------------------
// Singleton access
// ---------------------------------------------------------------------------

let defaultCache: ConceptIndexCache | null = null;

export function getConceptIndexCache(): ConceptIndexCache {
  if (!defaultCache) {
    defaultCache = new ConceptIndexCache();
  }
  return defaultCache;
}

export function setConceptIndexCache(cache: ConceptIndexCache): void {
  defaultCache = cache;
}

export function resetConceptIndexCache(): void {
  defaultCache = null;
}
