import type { BalanceType, Concept, ConceptId, ConceptName, PeriodType } from './types.js';

const YEAR_SUFFIX = /-\d{4}$/;
// Linkbase locator style: `us-gaap_Assets`, `aci_CustomLiability`
const LOCATOR_FORM = /^([A-Za-z][\w.-]*?)_([A-Z]\w*)$/;

/**
 * Split a concept id into namespace and local name.
 * Returns null when the id has no recognisable namespace separator.
 */
export function splitConceptId(id: string): ConceptName | null {
  const trimmed = id.trim();
  if (!trimmed) return null;

  const colon = trimmed.indexOf(':');
  if (colon > 0 && colon < trimmed.length - 1) {
    return {
      namespace: stripYearSuffix(trimmed.slice(0, colon)),
      localName: trimmed.slice(colon + 1),
    };
  }
  if (colon !== -1) return null;

  const locator = LOCATOR_FORM.exec(trimmed);
  if (locator) {
    return { namespace: stripYearSuffix(locator[1]), localName: locator[2] };
  }
  return null;
}

/**
 * Canonicalize a concept id: `us-gaap-2024:Assets` → `us-gaap:Assets`.
 * Ids without a namespace come back trimmed and otherwise untouched.
 */
export function normalizeConceptId(id: string): ConceptId {
  const name = splitConceptId(id);
  if (!name) return id.trim();
  return `${name.namespace}:${name.localName}`;
}

export function stripYearSuffix(namespace: string): string {
  return namespace.replace(YEAR_SUFFIX, '');
}

export function localNameOf(id: string): string {
  return splitConceptId(id)?.localName ?? id.trim();
}

export function namespaceOf(id: string): string | undefined {
  return splitConceptId(id)?.namespace;
}

export function toPeriodType(value: unknown): PeriodType {
  if (typeof value !== 'string') return 'unknown';
  const lower = value.trim().toLowerCase();
  return lower === 'instant' || lower === 'duration' ? lower : 'unknown';
}

export function toBalanceType(value: unknown): BalanceType {
  if (typeof value !== 'string') return 'none';
  const lower = value.trim().toLowerCase();
  return lower === 'debit' || lower === 'credit' ? lower : 'none';
}

export function toAbstractFlag(value: unknown): boolean {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'string') return value.trim().toLowerCase() === 'true';
  return false;
}

export interface ConceptAttributes {
  periodType?: unknown;
  balanceType?: unknown;
  abstract?: unknown;
}

/** Build a frozen Concept from a name and loosely-typed attributes. */
export function createConcept(name: ConceptName, attributes: ConceptAttributes = {}): Concept {
  return Object.freeze({
    id: `${name.namespace}:${name.localName}`,
    namespace: name.namespace,
    localName: name.localName,
    periodType: toPeriodType(attributes.periodType),
    balanceType: toBalanceType(attributes.balanceType),
    isAbstract: toAbstractFlag(attributes.abstract),
  });
}
