import { ConceptIndexCache, type FilingEngineOptions } from '@arbiter/core';
import type { Config } from './schema.js';

/** Translate the loaded configuration into filing engine options. */
export function toEngineOptions(config: Config, cache?: ConceptIndexCache): FilingEngineOptions {
  return {
    roleKeywords: config.taxonomy.role_keywords,
    cache: cache ?? new ConceptIndexCache(config.taxonomy.cache_size),
    standardNamespaces: config.extensions.standard_namespaces,
    structuralGroups: config.extensions.structural_groups,
    maxDepth: config.extensions.max_depth,
    exclusions: config.reconciliation.exclude,
    aliases: config.duplicates.field_aliases,
    thresholds: config.duplicates.thresholds,
  };
}
