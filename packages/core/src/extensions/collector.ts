import { createConcept, splitConceptId, normalizeConceptId } from '../concepts/normalizer.js';
import type { ConceptName } from '../concepts/types.js';
import { DEFAULT_STANDARD_NAMESPACES, isExtensionNamespace } from './namespaces.js';
import type { ExtensionConcept, ExtensionSchema, ExtensionWarning } from './types.js';

export interface CollectExtensionOptions {
  standardNamespaces?: readonly string[];
  onWarning?: (warning: ExtensionWarning) => void;
}

export interface ExtensionCollection {
  concepts: ExtensionConcept[];
  warnings: ExtensionWarning[];
}

/**
 * Turn a parsed extension schema into extension concepts.
 *
 * Element names may be qualified (`aci:CustomLiability`), in locator form
 * (`aci_CustomLiability`), or bare, in which case the schema prefix is applied.
 * Elements in a standard namespace are skipped; the first of several elements
 * with the same id wins.
 */
export function collectExtensionConcepts(
  schema: ExtensionSchema,
  options: CollectExtensionOptions = {},
): ExtensionCollection {
  const standardNamespaces = options.standardNamespaces ?? DEFAULT_STANDARD_NAMESPACES;
  const prefix = schema.prefix?.trim() || undefined;
  const warnings: ExtensionWarning[] = [];
  const warn = (warning: ExtensionWarning): void => {
    warnings.push(warning);
    options.onWarning?.(warning);
  };

  const concepts: ExtensionConcept[] = [];
  const seen = new Set<string>();

  schema.elements.forEach((element, position) => {
    if (!isRecord(element)) {
      warn({ kind: 'malformed_element', message: `Extension element #${position} is not an object` });
      return;
    }

    const rawName = element.name ?? element.id;
    const name = typeof rawName === 'string' ? qualify(rawName, prefix) : null;
    if (!name) {
      warn({
        kind: 'malformed_element',
        concept: typeof rawName === 'string' ? rawName : undefined,
        message: `Extension element #${position} has no usable name`,
      });
      return;
    }

    const id = `${name.namespace}:${name.localName}`;
    if (!isExtensionNamespace(name.namespace, standardNamespaces)) {
      warn({ kind: 'standard_namespace', concept: id, message: `${id} is in a standard namespace, not an extension` });
      return;
    }
    if (seen.has(id)) {
      warn({ kind: 'duplicate_element', concept: id, message: `${id} is declared more than once` });
      return;
    }
    seen.add(id);

    const base = createConcept(name, {
      periodType: element.periodType ?? element.period_type,
      balanceType: element.balance ?? element.balanceType ?? element.balance_type,
      abstract: element.abstract,
    });
    const group = element.substitutionGroup ?? element.substitution_group;
    const substitutionGroup = typeof group === 'string' && group.trim() ? normalizeConceptId(group) : undefined;

    concepts.push(Object.freeze(substitutionGroup ? { ...base, substitutionGroup } : { ...base }));
  });

  return { concepts, warnings };
}

function qualify(raw: string, prefix: string | undefined): ConceptName | null {
  const trimmed = raw.trim();
  if (!trimmed) return null;
  if (trimmed.includes(':')) return splitConceptId(trimmed);

  if (prefix) {
    const local = trimmed.startsWith(`${prefix}_`) ? trimmed.slice(prefix.length + 1) : trimmed;
    return local ? splitConceptId(`${prefix}:${local}`) : null;
  }
  return splitConceptId(trimmed);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
