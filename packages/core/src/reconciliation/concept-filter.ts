import { splitConceptId, stripYearSuffix } from '../concepts/normalizer.js';
import type { ConceptId } from '../concepts/types.js';
import type { ConceptExclusions } from './types.js';

/**
 * Cover-page and dimensional metadata the taxonomy cannot meaningfully place
 * on a statement. Left in, these show up as spurious discrepancies.
 */
export const DEFAULT_CONCEPT_EXCLUSIONS: ConceptExclusions = {
  namespaces: ['dei'],
  suffixes: ['TextBlock', 'Axis', 'Domain', 'Member', 'LineItems', 'Abstract', 'Table'],
  prefixes: ['NumberOf', 'ScheduleOf'],
  patterns: ['Percentage', 'Description', 'ExtensibleList', 'ExtensibleEnumeration'],
};

export function isExcludedConcept(id: ConceptId, exclusions: ConceptExclusions = DEFAULT_CONCEPT_EXCLUSIONS): boolean {
  return createConceptFilter(exclusions)(id);
}

/** Build a reusable predicate; true means the concept is excluded. */
export function createConceptFilter(exclusions: ConceptExclusions = DEFAULT_CONCEPT_EXCLUSIONS): (id: ConceptId) => boolean {
  const namespaces = new Set(exclusions.namespaces.map(ns => stripYearSuffix(ns.trim()).toLowerCase()));
  const suffixes = exclusions.suffixes.filter(Boolean);
  const prefixes = exclusions.prefixes.filter(Boolean);
  const patterns = exclusions.patterns.filter(Boolean);

  return (id: ConceptId): boolean => {
    const name = splitConceptId(id);
    const localName = name?.localName ?? id.trim();
    if (name && namespaces.has(name.namespace.toLowerCase())) return true;
    return (
      suffixes.some(suffix => localName.endsWith(suffix)) ||
      prefixes.some(prefix => localName.startsWith(prefix)) ||
      patterns.some(pattern => localName.includes(pattern))
    );
  };
}
