import { stripYearSuffix } from '../concepts/normalizer.js';

/** Namespaces published by standard setters. Anything else is a filer extension. */
export const DEFAULT_STANDARD_NAMESPACES: readonly string[] = [
  'us-gaap',
  'ifrs-full',
  'ifrs',
  'dei',
  'srt',
  'country',
  'currency',
  'exch',
  'stpr',
  'naics',
  'sic',
  'uk-gaap',
  'frc',
  'esef',
];

/**
 * Schema head elements every item or tuple substitutes for. A pointer to one
 * of these says nothing about statement placement.
 */
export const DEFAULT_STRUCTURAL_GROUPS: readonly string[] = [
  'xbrli:item',
  'xbrli:tuple',
  'xbrldt:dimensionItem',
  'xbrldt:hypercubeItem',
];

export function isExtensionNamespace(
  namespace: string,
  standardNamespaces: readonly string[] = DEFAULT_STANDARD_NAMESPACES,
): boolean {
  const ns = stripYearSuffix(namespace.trim()).toLowerCase();
  if (!ns) return false;
  return !standardNamespaces.some(standard => stripYearSuffix(standard.trim()).toLowerCase() === ns);
}
