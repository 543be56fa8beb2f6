/**
 * Taxonomy concept index: the authoritative concept to statement mapping.
 *
 * Built once per taxonomy from the parsed element table and presentation
 * roles. Every member of a role inherits the role's statement type; a concept
 * appearing under several roles keeps the highest-priority type. Malformed
 * roles, members and elements are reported as warnings and skipped.
 */

import { createConcept, normalizeConceptId, splitConceptId } from '../concepts/normalizer.js';
import type { Concept, ConceptAttributes, ConceptId, ConceptName } from '../concepts/index.js';
import { classifyRole, DEFAULT_ROLE_KEYWORDS, validateKeywordTable } from './role-classifier.js';
import {
  STATEMENT_PRIORITY,
  type ConceptIndex,
  type IndexedConcept,
  type IndexWarning,
  type ParsedTaxonomy,
  type RoleKeywordTable,
  type StatementType,
  type TaxonomyIdentity,
} from './types.js';

export interface BuildConceptIndexOptions {
  keywords?: RoleKeywordTable;
  taxonomy?: Partial<TaxonomyIdentity>;
  /** Carried on any error raised while building. */
  filingId?: string;
  onWarning?: (warning: IndexWarning) => void;
}

export class TaxonomyConceptIndex implements ConceptIndex {
  readonly taxonomy: TaxonomyIdentity;
  readonly warnings: readonly IndexWarning[];
  private readonly byId: ReadonlyMap<ConceptId, IndexedConcept>;

  constructor(taxonomy: TaxonomyIdentity, entries: Map<ConceptId, IndexedConcept>, warnings: IndexWarning[]) {
    this.taxonomy = Object.freeze({ ...taxonomy });
    this.byId = entries;
    this.warnings = Object.freeze([...warnings]);
  }

  get size(): number {
    return this.byId.size;
  }

  statementOf(id: ConceptId): StatementType | undefined {
    return this.lookup(id)?.statementType;
  }

  has(id: ConceptId): boolean {
    return this.lookup(id) !== undefined;
  }

  concept(id: ConceptId): Concept | undefined {
    return this.lookup(id)?.concept;
  }

  rolesOf(id: ConceptId): readonly string[] {
    return this.lookup(id)?.roles ?? [];
  }

  conceptsFor(statementType: StatementType): ConceptId[] {
    const ids: ConceptId[] = [];
    for (const [id, entry] of this.byId) {
      if (entry.statementType === statementType) ids.push(id);
    }
    return ids;
  }

  countsByStatement(): Record<StatementType, number> {
    const counts: Record<StatementType, number> = {
      balance_sheet: 0,
      income_statement: 0,
      cash_flow: 0,
      other: 0,
    };
    for (const entry of this.byId.values()) {
      counts[entry.statementType]++;
    }
    return counts;
  }

  entries(): IterableIterator<[ConceptId, IndexedConcept]> {
    return this.byId.entries();
  }

  private lookup(id: ConceptId): IndexedConcept | undefined {
    return this.byId.get(id) ?? this.byId.get(normalizeConceptId(id));
  }
}

/**
 * Build the concept index from a parsed element table and presentation roles.
 * Pure and deterministic: roles are visited in sorted URI order.
 */
export function buildConceptIndex(
  elements: Readonly<Record<string, unknown>>,
  roles: Readonly<Record<string, unknown>>,
  options: BuildConceptIndexOptions = {},
): TaxonomyConceptIndex {
  const keywords = validateKeywordTable(options.keywords ?? DEFAULT_ROLE_KEYWORDS, options.filingId);
  const warnings: IndexWarning[] = [];
  const warn = (warning: IndexWarning): void => {
    warnings.push(warning);
    options.onWarning?.(warning);
  };

  const attributes = readElements(elements, warn);
  const assignments = new Map<ConceptId, { name: ConceptName; statementType: StatementType; roles: Set<string> }>();

  for (const roleUri of Object.keys(roles).sort()) {
    const role = roles[roleUri];
    if (!isRecord(role)) {
      warn({ kind: 'malformed_role', roleUri, message: `Role ${roleUri} is not an object` });
      continue;
    }

    const { definition, memberConcepts } = role;
    if (typeof definition !== 'string' || definition.trim() === '') {
      warn({ kind: 'malformed_role', roleUri, message: `Role ${roleUri} has no definition` });
      continue;
    }
    if (!Array.isArray(memberConcepts)) {
      warn({ kind: 'malformed_role', roleUri, message: `Role ${roleUri} has no member concept list` });
      continue;
    }

    const statementType = classifyRole(definition, keywords);

    for (const member of memberConcepts) {
      const name = typeof member === 'string' ? splitConceptId(member) : null;
      if (!name) {
        warn({
          kind: 'malformed_member',
          roleUri,
          concept: typeof member === 'string' ? member : undefined,
          message: `Role ${roleUri} lists an unusable member: ${JSON.stringify(member)}`,
        });
        continue;
      }

      const id = `${name.namespace}:${name.localName}`;
      const existing = assignments.get(id);
      if (!existing) {
        assignments.set(id, { name, statementType, roles: new Set([roleUri]) });
        continue;
      }
      existing.roles.add(roleUri);
      if (priorityOf(statementType) < priorityOf(existing.statementType)) {
        existing.statementType = statementType;
      }
    }
  }

  const entries = new Map<ConceptId, IndexedConcept>();
  for (const id of [...assignments.keys()].sort()) {
    const assignment = assignments.get(id);
    if (!assignment) continue;

    const elementAttributes = attributes.get(id);
    if (!elementAttributes) {
      warn({ kind: 'missing_element', concept: id, message: `No element metadata for ${id}` });
    }

    entries.set(id, Object.freeze({
      concept: createConcept(assignment.name, elementAttributes),
      statementType: assignment.statementType,
      roles: Object.freeze([...assignment.roles].sort()),
    }));
  }

  return new TaxonomyConceptIndex(
    {
      name: options.taxonomy?.name ?? 'unknown',
      version: options.taxonomy?.version ?? 'unknown',
    },
    entries,
    warnings,
  );
}

/** Convenience wrapper taking the whole parsed taxonomy document. */
export function buildConceptIndexFromTaxonomy(
  taxonomy: ParsedTaxonomy,
  options: Omit<BuildConceptIndexOptions, 'taxonomy'> = {},
): TaxonomyConceptIndex {
  return buildConceptIndex(taxonomy.elements, taxonomy.roles, {
    ...options,
    taxonomy: { name: taxonomy.name, version: taxonomy.version },
  });
}

function readElements(
  elements: Readonly<Record<string, unknown>>,
  warn: (warning: IndexWarning) => void,
): Map<ConceptId, ConceptAttributes> {
  const result = new Map<ConceptId, ConceptAttributes>();

  for (const [qname, body] of Object.entries(elements)) {
    const name = splitConceptId(qname);
    if (!name || !isRecord(body)) {
      warn({ kind: 'malformed_element', concept: qname, message: `Element ${qname} is malformed` });
      continue;
    }
    result.set(`${name.namespace}:${name.localName}`, {
      periodType: body.periodType ?? body.period_type,
      balanceType: body.balanceType ?? body.balance,
      abstract: body.abstract,
    });
  }

  return result;
}

function priorityOf(statementType: StatementType): number {
  return STATEMENT_PRIORITY.indexOf(statementType);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
