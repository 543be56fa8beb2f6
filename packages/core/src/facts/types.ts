import type { ConceptId } from '../concepts/types.js';

/** A raw fact record as emitted by a mapper or the parser. Field names vary by source. */
export type RawFact = Readonly<Record<string, unknown>>;

export type MapperTag = 'mapper_a' | 'mapper_b' | 'source';

export interface Fact {
  readonly concept: ConceptId;
  readonly context: string;
  readonly value: string | null;
  readonly unit?: string;
  readonly decimals?: string;
  readonly sourceMapper: MapperTag;
}

/**
 * Ordered field-name aliases. Each mapper and market names fact fields
 * differently; the first alias present on a record wins.
 */
export interface FieldAliases {
  concept: readonly string[];
  value: readonly string[];
  context: readonly string[];
  unit: readonly string[];
  decimals: readonly string[];
}
