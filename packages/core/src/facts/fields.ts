import { normalizeConceptId } from '../concepts/normalizer.js';
import type { Fact, FieldAliases, MapperTag, RawFact } from './types.js';

export const DEFAULT_FIELD_ALIASES: FieldAliases = {
  concept: ['concept_qname', 'qname', 'concept', 'concept_local_name'],
  value: ['fact_value', 'value'],
  context: ['context_ref', 'contextRef', 'context'],
  unit: ['unit_ref', 'unit'],
  decimals: ['decimals'],
};

/** Fill any alias list the caller left out with the defaults. */
export function resolveFieldAliases(aliases: Partial<FieldAliases> = {}): FieldAliases {
  return {
    concept: aliases.concept ?? DEFAULT_FIELD_ALIASES.concept,
    value: aliases.value ?? DEFAULT_FIELD_ALIASES.value,
    context: aliases.context ?? DEFAULT_FIELD_ALIASES.context,
    unit: aliases.unit ?? DEFAULT_FIELD_ALIASES.unit,
    decimals: aliases.decimals ?? DEFAULT_FIELD_ALIASES.decimals,
  };
}

/**
 * Return the first alias value present on the record as a string.
 * Absent means undefined or null; numbers and bigints are stringified,
 * anything else (objects, booleans) counts as absent.
 */
export function extractField(record: RawFact, aliases: readonly string[]): string | undefined {
  for (const alias of aliases) {
    const value = record[alias];
    if (value === undefined || value === null) continue;
    if (typeof value === 'string') return value;
    if (typeof value === 'number' && Number.isFinite(value)) return String(value);
    if (typeof value === 'bigint') return value.toString();
  }
  return undefined;
}

/**
 * Build a Fact from a raw record. Returns null when the record has no
 * concept or no context, since it cannot be keyed.
 */
export function toFact(record: RawFact, sourceMapper: MapperTag, aliases: FieldAliases = DEFAULT_FIELD_ALIASES): Fact | null {
  const rawConcept = extractField(record, aliases.concept)?.trim();
  const context = extractField(record, aliases.context)?.trim();
  if (!rawConcept || !context) return null;

  const fact: Fact = {
    concept: normalizeConceptId(rawConcept),
    context,
    value: extractField(record, aliases.value) ?? null,
    sourceMapper,
  };
  const unit = extractField(record, aliases.unit);
  const decimals = extractField(record, aliases.decimals);

  return {
    ...fact,
    ...(unit !== undefined ? { unit } : {}),
    ...(decimals !== undefined ? { decimals } : {}),
  };
}

export interface FactExtraction {
  facts: Fact[];
  /** Records dropped for lacking a concept or context. */
  skipped: number;
}

export function extractFacts(
  records: readonly RawFact[],
  sourceMapper: MapperTag,
  aliases: FieldAliases = DEFAULT_FIELD_ALIASES,
): FactExtraction {
  const facts: Fact[] = [];
  let skipped = 0;

  for (const record of records) {
    if (typeof record !== 'object' || record === null) {
      skipped++;
      continue;
    }
    const fact = toFact(record, sourceMapper, aliases);
    if (fact) {
      facts.push(fact);
    } else {
      skipped++;
    }
  }

  return { facts, skipped };
}
