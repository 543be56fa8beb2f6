// Types
export {
  STATEMENT_TYPES,
  STATEMENT_PRIORITY,
  type StatementType,
  type ClassifiedStatementType,
  type RoleKeywordTable,
  type TaxonomyElement,
  type PresentationRole,
  type ParsedTaxonomy,
  type IndexWarningKind,
  type IndexWarning,
  type TaxonomyIdentity,
  type IndexedConcept,
  type ConceptIndex,
} from './types.js';

// Role classification
export { DEFAULT_ROLE_KEYWORDS, classifyRole, keywordTableKey, validateKeywordTable } from './role-classifier.js';

// Index
export {
  TaxonomyConceptIndex,
  buildConceptIndex,
  buildConceptIndexFromTaxonomy,
  type BuildConceptIndexOptions,
} from './concept-index.js';

// Cache
export {
  ConceptIndexCache,
  DEFAULT_CACHE_CAPACITY,
  getConceptIndexCache,
  setConceptIndexCache,
  resetConceptIndexCache,
} from './cache.js';
