import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { MissingInputError } from '@arbiter/core';
import {
  InputLoadError,
  listFilingDirectories,
  loadFactList,
  loadFilingInput,
} from './filing.js';

let tempDir: string;
let filingDir: string;

const taxonomy = {
  name: 'us-gaap',
  version: '2024',
  elements: { 'us-gaap:Assets': { periodType: 'instant' } },
  roles: { 'urn:role:bs': { definition: 'Balance Sheet', memberConcepts: ['us-gaap:Assets'] } },
};

function writeJson(path: string, data: unknown): void {
  writeFileSync(path, JSON.stringify(data), 'utf-8');
}

function writeRequiredFiles(): void {
  writeJson(join(filingDir, 'taxonomy.json'), taxonomy);
  writeJson(join(filingDir, 'mapper-a.json'), {
    statements: { balance_sheet: { facts: [{ concept: 'us-gaap:Assets', value: '10', context: 'c1' }] } },
  });
  writeJson(join(filingDir, 'mapper-b.json'), {
    statements: { balance_sheet: [{ qname: 'us-gaap:Assets', fact_value: '10', context_ref: 'c1' }] },
  });
}

beforeEach(() => {
  tempDir = mkdtempSync(join(tmpdir(), 'arbiter-loader-'));
  filingDir = join(tempDir, 'acme-10k');
  mkdirSync(filingDir);
});

afterEach(() => {
  rmSync(tempDir, { recursive: true, force: true });
});

describe('loadFilingInput', () => {
  it('loads the required files and names the filing after its directory', async () => {
    writeRequiredFiles();

    const input = await loadFilingInput(filingDir);

    expect(input.filingId).toBe('acme-10k');
    expect(input.taxonomy.name).toBe('us-gaap');
    expect(input.mapperA).toEqual({
      balance_sheet: [{ concept: 'us-gaap:Assets', value: '10', context: 'c1' }],
    });
    expect(input.mapperB?.balance_sheet).toEqual([{ qname: 'us-gaap:Assets', fact_value: '10', context_ref: 'c1' }]);
    expect('extensions' in input).toBe(false);
    expect('sourceFacts' in input).toBe(false);
    expect('factsA' in input).toBe(false);
  });

  it('picks up the optional files', async () => {
    writeRequiredFiles();
    writeJson(join(filingDir, 'extensions.json'), { prefix: 'acme', elements: [{ name: 'CustomDebt' }] });
    writeJson(join(filingDir, 'source-facts.json'), { facts: [{ concept: 'us-gaap:Assets', value: '10', context: 'c1' }] });
    writeJson(join(filingDir, 'mapper-a.json'), {
      statements: {},
      facts: [
        { concept: 'us-gaap:Assets', value: '10', context: 'c1' },
        { concept: 'us-gaap:Assets', value: '10', context: 'c1' },
      ],
    });

    const input = await loadFilingInput(filingDir, { filingId: 'custom-id' });

    expect(input.filingId).toBe('custom-id');
    expect(input.extensions).toEqual({ prefix: 'acme', elements: [{ name: 'CustomDebt' }] });
    expect(input.sourceFacts).toHaveLength(1);
    expect(input.factsA).toHaveLength(2);
    expect(input.mapperA).toEqual({});
  });

  it('uses a shared taxonomy when one is supplied', async () => {
    writeRequiredFiles();
    rmSync(join(filingDir, 'taxonomy.json'));

    const shared = { name: 'ifrs-full', version: '2023', elements: {}, roles: {} };
    const input = await loadFilingInput(filingDir, { taxonomy: shared });

    expect(input.taxonomy).toBe(shared);
  });

  it('reads the taxonomy from an explicit path', async () => {
    writeRequiredFiles();
    const taxonomyPath = join(tempDir, 'shared-taxonomy.json');
    writeJson(taxonomyPath, { ...taxonomy, version: '2025' });

    const input = await loadFilingInput(filingDir, { taxonomyPath });

    expect(input.taxonomy.version).toBe('2025');
  });

  it('rejects a filing without a second mapper', async () => {
    writeRequiredFiles();
    rmSync(join(filingDir, 'mapper-b.json'));

    const loading = loadFilingInput(filingDir);

    await expect(loading).rejects.toBeInstanceOf(MissingInputError);
    await expect(loading).rejects.toMatchObject({
      name: 'InputLoadError',
      filingId: 'acme-10k',
      input: 'mapper_b',
      filePath: join(filingDir, 'mapper-b.json'),
    });
  });

  it('rejects files that are not JSON', async () => {
    writeRequiredFiles();
    writeFileSync(join(filingDir, 'taxonomy.json'), '{ not json', 'utf-8');

    await expect(loadFilingInput(filingDir)).rejects.toThrow(
      `Invalid JSON in ${join(filingDir, 'taxonomy.json')}`,
    );
  });

  it('reports schema violations with their paths', async () => {
    writeRequiredFiles();
    writeJson(join(filingDir, 'mapper-a.json'), { statements: { equity: [] } });

    const error = await loadFilingInput(filingDir).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(InputLoadError);
    if (!(error instanceof InputLoadError)) return;
    expect(error.input).toBe('mapper_a');
    expect(error.issues.length).toBeGreaterThan(0);
    expect(error.message).toContain(`Invalid mapper_a file ${join(filingDir, 'mapper-a.json')}: statements`);
  });

  it('rejects a taxonomy without roles', async () => {
    writeRequiredFiles();
    writeJson(join(filingDir, 'taxonomy.json'), { elements: {} });

    await expect(loadFilingInput(filingDir)).rejects.toMatchObject({ input: 'taxonomy' });
  });
});

describe('loadFactList', () => {
  it('accepts a bare array', async () => {
    const path = join(tempDir, 'facts.json');
    writeJson(path, [{ concept: 'us-gaap:Cash', value: '1', context: 'c' }]);

    expect(await loadFactList(path)).toEqual([{ concept: 'us-gaap:Cash', value: '1', context: 'c' }]);
  });

  it('accepts an object with a facts array', async () => {
    const path = join(tempDir, 'facts.json');
    writeJson(path, { facts: [{ concept: 'us-gaap:Cash' }] });

    expect(await loadFactList(path)).toEqual([{ concept: 'us-gaap:Cash' }]);
  });

  it('rejects a missing file', async () => {
    await expect(loadFactList(join(tempDir, 'absent.json'), 'f-1')).rejects.toThrow(
      `Cannot read facts file ${join(tempDir, 'absent.json')}: not found`,
    );
  });
});

describe('listFilingDirectories', () => {
  it('lists visible subdirectories in name order', async () => {
    mkdirSync(join(tempDir, 'beta-10q'));
    mkdirSync(join(tempDir, '.cache'));
    writeFileSync(join(tempDir, 'notes.txt'), 'x', 'utf-8');

    expect(await listFilingDirectories(tempDir)).toEqual(['acme-10k', 'beta-10q']);
  });
});
