export { type RawFact, type MapperTag, type Fact, type FieldAliases } from './types.js';
export {
  DEFAULT_FIELD_ALIASES,
  resolveFieldAliases,
  extractField,
  toFact,
  extractFacts,
  type FactExtraction,
} from './fields.js';
