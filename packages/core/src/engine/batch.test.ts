import { describe, it, expect, vi } from 'vitest';
import { runBatch } from './batch.js';
import { FilingEngine } from './engine.js';
import type { BatchFailure, FilingInput } from './types.js';
import { MissingInputError } from '../errors.js';

function input(filingId: string): FilingInput {
  return {
    filingId,
    taxonomy: {
      elements: { 'us-gaap:Assets': { periodType: 'instant' } },
      roles: { 'urn:role:bs': { definition: 'Balance Sheet', memberConcepts: ['us-gaap:Assets'] } },
    },
    mapperA: { balance_sheet: [{ concept: 'us-gaap:Assets', value: '1', context: 'c' }] },
    mapperB: { balance_sheet: [] },
  };
}

describe('runBatch', () => {
  it('processes every filing and keeps input order', async () => {
    const load = async (id: string) => {
      await new Promise(resolve => setTimeout(resolve, id === 'a' ? 15 : 1));
      return input(id);
    };
    const { results, failures } = await runBatch(['a', 'b', 'c'], load, { engine: new FilingEngine({ cache: false }) });

    expect(results.map(r => r.filingId)).toEqual(['a', 'b', 'c']);
    expect(failures).toEqual([]);
  });

  it('records a failing filing and continues', async () => {
    const onFilingError = vi.fn<(failure: BatchFailure) => void>();
    const load = async (id: string): Promise<FilingInput> => {
      if (id === 'broken') return { ...input(id), mapperB: undefined };
      if (id === 'unreadable') throw new Error('ENOENT: taxonomy.json');
      return input(id);
    };

    const { results, failures } = await runBatch(['ok-1', 'broken', 'unreadable', 'ok-2'], load, {
      engine: new FilingEngine({ cache: false }),
      onFilingError,
    });

    expect(results.map(r => r.filingId)).toEqual(['ok-1', 'ok-2']);
    expect(failures.map(f => f.filingId)).toEqual(['broken', 'unreadable']);
    expect(failures[0].error).toBeInstanceOf(MissingInputError);
    expect(failures[1].error.message).toBe('ENOENT: taxonomy.json');
    expect(onFilingError).toHaveBeenCalledTimes(2);
  });

  it('wraps non-Error rejections', async () => {
    const { failures } = await runBatch(['x'], () => Promise.reject('disk gone'), {
      engine: new FilingEngine({ cache: false }),
    });
    expect(failures[0].error.message).toBe('disk gone');
  });

  it('never exceeds the concurrency limit', async () => {
    let active = 0;
    let peak = 0;
    const load = async (id: string) => {
      active++;
      peak = Math.max(peak, active);
      await new Promise(resolve => setTimeout(resolve, 5));
      active--;
      return input(id);
    };

    await runBatch(['1', '2', '3', '4', '5', '6'], load, {
      concurrency: 2,
      engine: new FilingEngine({ cache: false }),
    });
    expect(peak).toBe(2);
  });
});
