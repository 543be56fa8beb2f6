export {
  INVALID_REASONS,
  type ExtensionConcept,
  type ExtensionSchema,
  type InvalidReason,
  type ValidResolution,
  type InvalidResolution,
  type ExtensionResolution,
  type ExtensionMap,
  type ExtensionWarningKind,
  type ExtensionWarning,
  type ResolutionSummary,
} from './types.js';

export { DEFAULT_STANDARD_NAMESPACES, DEFAULT_STRUCTURAL_GROUPS, isExtensionNamespace } from './namespaces.js';
export { collectExtensionConcepts, type CollectExtensionOptions, type ExtensionCollection } from './collector.js';
export {
  DEFAULT_MAX_DEPTH,
  resolveExtensions,
  summarizeResolutions,
  type ResolveExtensionOptions,
} from './resolver.js';
