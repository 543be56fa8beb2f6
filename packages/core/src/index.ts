// Errors
export {
  ArbiterError,
  FilingError,
  MissingInputError,
  InvariantViolationError,
  isFilingError,
} from './errors.js';

// Concepts and facts
export * from './concepts/index.js';
export * from './facts/index.js';

// Taxonomy index
export * from './taxonomy/index.js';

// Extension resolution
export * from './extensions/index.js';

// Reconciliation
export * from './reconciliation/index.js';

// Duplicate integrity
export * from './duplicates/index.js';

// Engine
export * from './engine/index.js';

// Output
export * from './output/index.js';
