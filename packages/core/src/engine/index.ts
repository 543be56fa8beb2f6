export {
  type FilingInput,
  type FilingEngineOptions,
  type FilingResult,
  type IndexReadyEvent,
  type ExtensionsResolvedEvent,
  type StatementCompleteEvent,
  type DuplicatesCompleteEvent,
  type FilingWarningEvent,
  type FilingEvents,
  type BatchFailure,
  type BatchResult,
} from './types.js';
export { FilingEngine } from './engine.js';
export { runBatch, DEFAULT_BATCH_CONCURRENCY, type BatchOptions } from './batch.js';
export { Semaphore } from './semaphore.js';
