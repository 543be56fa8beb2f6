import type { Concept, ConceptId } from '../concepts/types.js';
import type { StatementType } from '../taxonomy/types.js';

/** A filer-defined concept outside the standard taxonomy namespaces. */
export interface ExtensionConcept extends Concept {
  /** Concept id this extension declares it substitutes for, if any. */
  readonly substitutionGroup?: ConceptId;
}

/** Parsed extension schema: elements namespaced under the filer's prefix. */
export interface ExtensionSchema {
  prefix?: string;
  elements: readonly unknown[];
}

export const INVALID_REASONS = {
  cycle: 'cycle or chain too deep',
  notFound: 'base concept not found',
} as const;

export type InvalidReason = (typeof INVALID_REASONS)[keyof typeof INVALID_REASONS];

export interface ValidResolution {
  status: 'VALID';
  concept: ConceptId;
  baseConcept: ConceptId;
  statementType: StatementType;
  /** The extension, every intermediate hop, then the base concept. */
  chain: readonly ConceptId[];
}

export interface InvalidResolution {
  status: 'INVALID';
  concept: ConceptId;
  reason: InvalidReason;
  /** Ids walked before the chain broke, the offending id last. */
  chain: readonly ConceptId[];
}

export type ExtensionResolution = ValidResolution | InvalidResolution;

export type ExtensionMap = ReadonlyMap<ConceptId, ExtensionResolution>;

export type ExtensionWarningKind = 'standard_namespace' | 'malformed_element' | 'duplicate_element';

export interface ExtensionWarning {
  kind: ExtensionWarningKind;
  message: string;
  concept?: string;
}

export interface ResolutionSummary {
  total: number;
  valid: number;
  invalid: number;
}
