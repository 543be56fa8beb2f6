export {
  type ConceptId,
  type PeriodType,
  type BalanceType,
  type ConceptName,
  type Concept,
} from './types.js';

export {
  splitConceptId,
  normalizeConceptId,
  stripYearSuffix,
  localNameOf,
  namespaceOf,
  toPeriodType,
  toBalanceType,
  toAbstractFlag,
  createConcept,
  type ConceptAttributes,
} from './normalizer.js';
