import { FilingEngine } from './engine.js';
import { Semaphore } from './semaphore.js';
import type { BatchFailure, BatchResult, FilingInput, FilingResult } from './types.js';

export const DEFAULT_BATCH_CONCURRENCY = 4;

export interface BatchOptions {
  concurrency?: number;
  /** Engine to run filings on; its listeners see every filing in the batch. */
  engine?: FilingEngine;
  onFilingComplete?: (result: FilingResult) => void;
  onFilingError?: (failure: BatchFailure) => void;
}

/**
 * Process many filings with bounded concurrency. `load` performs the I/O for
 * one filing. A filing that fails to load or run is recorded in `failures`
 * and the batch continues. Results and failures keep input order.
 */
export async function runBatch(
  filingIds: readonly string[],
  load: (filingId: string) => Promise<FilingInput>,
  options: BatchOptions = {},
): Promise<BatchResult> {
  const semaphore = new Semaphore(options.concurrency ?? DEFAULT_BATCH_CONCURRENCY);
  const engine = options.engine ?? new FilingEngine();

  const outcomes = await Promise.all(
    filingIds.map(filingId => semaphore.run(async (): Promise<FilingResult | BatchFailure> => {
      try {
        const input = await load(filingId);
        const result = engine.run(input);
        options.onFilingComplete?.(result);
        return result;
      } catch (err) {
        const failure: BatchFailure = {
          filingId,
          error: err instanceof Error ? err : new Error(String(err)),
        };
        options.onFilingError?.(failure);
        return failure;
      }
    })),
  );

  const results: FilingResult[] = [];
  const failures: BatchFailure[] = [];
  for (const outcome of outcomes) {
    if ('error' in outcome) {
      failures.push(outcome);
    } else {
      results.push(outcome);
    }
  }
  return { results, failures };
}
