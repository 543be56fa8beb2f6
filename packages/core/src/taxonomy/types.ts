/**
 * Taxonomy index types.
 *
 * The parsed taxonomy is the authority for statement placement: each concept
 * that appears in a presentation role inherits that role's statement type.
 */

import type { Concept, ConceptId } from '../concepts/types.js';

export const STATEMENT_TYPES = ['balance_sheet', 'income_statement', 'cash_flow', 'other'] as const;

export type StatementType = (typeof STATEMENT_TYPES)[number];

/** Resolution order when a concept sits in several roles, most authoritative first. */
export const STATEMENT_PRIORITY: readonly StatementType[] = [
  'balance_sheet',
  'cash_flow',
  'income_statement',
  'other',
];

export type ClassifiedStatementType = Exclude<StatementType, 'other'>;

/** Lower-case keywords searched in role definitions, per statement type. */
export type RoleKeywordTable = Readonly<Record<ClassifiedStatementType, readonly string[]>>;

// ---------------------------------------------------------------------------
// Parsed taxonomy input
// ---------------------------------------------------------------------------

export interface TaxonomyElement {
  periodType?: unknown;
  balanceType?: unknown;
  abstract?: unknown;
  type?: unknown;
}

export interface PresentationRole {
  definition?: unknown;
  memberConcepts?: unknown;
}

/**
 * Element and role bodies are left as `unknown` on purpose: a malformed entry
 * must reach the index builder so it can be reported and skipped.
 */
export interface ParsedTaxonomy {
  name?: string;
  version?: string;
  elements: Readonly<Record<string, unknown>>;
  roles: Readonly<Record<string, unknown>>;
}

// ---------------------------------------------------------------------------
// Warnings
// ---------------------------------------------------------------------------

export type IndexWarningKind =
  | 'malformed_role'
  | 'malformed_member'
  | 'malformed_element'
  | 'missing_element';

export interface IndexWarning {
  kind: IndexWarningKind;
  message: string;
  roleUri?: string;
  concept?: string;
}

// ---------------------------------------------------------------------------
// Index
// ---------------------------------------------------------------------------

export interface TaxonomyIdentity {
  name: string;
  version: string;
}

export interface IndexedConcept {
  concept: Concept;
  statementType: StatementType;
  /** Role URIs the concept appears in, sorted. */
  roles: readonly string[];
}

export interface ConceptIndex {
  readonly taxonomy: TaxonomyIdentity;
  readonly size: number;
  readonly warnings: readonly IndexWarning[];
  statementOf(id: ConceptId): StatementType | undefined;
  has(id: ConceptId): boolean;
  concept(id: ConceptId): Concept | undefined;
  rolesOf(id: ConceptId): readonly string[];
  conceptsFor(statementType: StatementType): ConceptId[];
  countsByStatement(): Record<StatementType, number>;
  entries(): IterableIterator<[ConceptId, IndexedConcept]>;
}
