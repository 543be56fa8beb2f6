/**
 * Extension resolver.
 *
 * Places filer extensions on a statement by following substitutionGroup
 * pointers until they reach a concept the taxonomy index knows. The walk keeps
 * a visited set and a hop limit, so cyclic or runaway chains end as INVALID
 * resolutions rather than errors.
 */

import type { ConceptId } from '../concepts/types.js';
import type { ConceptIndex } from '../taxonomy/types.js';
import { DEFAULT_STRUCTURAL_GROUPS } from './namespaces.js';
import {
  INVALID_REASONS,
  type ExtensionConcept,
  type ExtensionResolution,
  type InvalidReason,
  type ResolutionSummary,
} from './types.js';

export const DEFAULT_MAX_DEPTH = 10;

export interface ResolveExtensionOptions {
  /** Maximum substitutionGroup hops from the extension to its base. */
  maxDepth?: number;
  /** Pointers to these ids count as no pointer at all. */
  structuralGroups?: readonly string[];
}

export function resolveExtensions(
  extensions: readonly ExtensionConcept[],
  index: Pick<ConceptIndex, 'statementOf'>,
  options: ResolveExtensionOptions = {},
): Map<ConceptId, ExtensionResolution> {
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  if (!Number.isInteger(maxDepth) || maxDepth < 1) {
    throw new RangeError(`maxDepth must be a positive integer, got ${maxDepth}`);
  }
  const structural = new Set((options.structuralGroups ?? DEFAULT_STRUCTURAL_GROUPS).map(id => id.toLowerCase()));
  const pointerOf = (concept: ExtensionConcept | undefined): ConceptId | undefined => {
    const group = concept?.substitutionGroup;
    return group && !structural.has(group.toLowerCase()) ? group : undefined;
  };

  const byId = new Map<ConceptId, ExtensionConcept>();
  for (const extension of extensions) {
    if (!byId.has(extension.id)) byId.set(extension.id, extension);
  }

  const resolutions = new Map<ConceptId, ExtensionResolution>();
  for (const id of [...byId.keys()].sort()) {
    const pointer = pointerOf(byId.get(id));
    if (!pointer) continue;

    const chain: ConceptId[] = [id];
    const visited = new Set<ConceptId>([id]);
    const invalid = (reason: InvalidReason): ExtensionResolution => ({ status: 'INVALID', concept: id, reason, chain });

    let current = pointer;
    for (let hops = 1; ; hops++) {
      chain.push(current);

      const statementType = index.statementOf(current);
      if (statementType) {
        resolutions.set(id, { status: 'VALID', concept: id, baseConcept: current, statementType, chain });
        break;
      }
      if (visited.has(current)) {
        resolutions.set(id, invalid(INVALID_REASONS.cycle));
        break;
      }
      visited.add(current);

      const next = pointerOf(byId.get(current));
      if (!next) {
        resolutions.set(id, invalid(INVALID_REASONS.notFound));
        break;
      }
      if (hops >= maxDepth) {
        resolutions.set(id, invalid(INVALID_REASONS.cycle));
        break;
      }
      current = next;
    }
  }

  return resolutions;
}

export function summarizeResolutions(resolutions: ReadonlyMap<ConceptId, ExtensionResolution>): ResolutionSummary {
  let valid = 0;
  for (const resolution of resolutions.values()) {
    if (resolution.status === 'VALID') valid++;
  }
  return { total: resolutions.size, valid, invalid: resolutions.size - valid };
}
