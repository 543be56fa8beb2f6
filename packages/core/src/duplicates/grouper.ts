import type { ConceptId } from '../concepts/types.js';
import type { Fact } from '../facts/types.js';

export interface FactGroup {
  concept: ConceptId;
  context: string;
  facts: Fact[];
}

export function groupKey(concept: ConceptId, context: string): string {
  return JSON.stringify([concept, context]);
}

/** Group facts by (concept, context), keeping first-seen order within a group. */
export function groupFacts(facts: readonly Fact[]): Map<string, FactGroup> {
  const groups = new Map<string, FactGroup>();
  for (const fact of facts) {
    const key = groupKey(fact.concept, fact.context);
    const group = groups.get(key);
    if (group) {
      group.facts.push(fact);
    } else {
      groups.set(key, { concept: fact.concept, context: fact.context, facts: [fact] });
    }
  }
  return groups;
}

/** Occurrence count per (concept, context) key. */
export function countByKey(facts: readonly Fact[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const fact of facts) {
    const key = groupKey(fact.concept, fact.context);
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  return counts;
}
