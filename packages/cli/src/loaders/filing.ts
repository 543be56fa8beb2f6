import { readFile, readdir } from 'node:fs/promises';
import { basename, join, resolve } from 'node:path';
import type { ZodIssue, ZodTypeAny, output } from 'zod';
import {
  MissingInputError,
  type ExtensionSchema,
  type FilingInput,
  type ParsedTaxonomy,
  type RawFact,
  type StatementFacts,
} from '@arbiter/core';
import { ExtensionSchemaFile, FactListSchema, MapperFileSchema, TaxonomySchema } from './schema.js';

// ---------------------------------------------------------------------------
// Error classes
// ---------------------------------------------------------------------------

/** A filing input file is missing, is not JSON, or does not match its schema. */
export class InputLoadError extends MissingInputError {
  constructor(
    message: string,
    filingId: string,
    input: string,
    public readonly filePath: string,
    public readonly issues: ZodIssue[] = [],
  ) {
    super(message, filingId, input);
    this.name = 'InputLoadError';
  }
}

// ---------------------------------------------------------------------------
// Filing directory layout
// ---------------------------------------------------------------------------

export const FILING_FILES = {
  taxonomy: 'taxonomy.json',
  extensions: 'extensions.json',
  mapperA: 'mapper-a.json',
  mapperB: 'mapper-b.json',
  sourceFacts: 'source-facts.json',
} as const;

export interface MapperStatements {
  statements: StatementFacts;
  facts?: readonly RawFact[];
}

interface FileTarget {
  path: string;
  filingId: string;
  input: string;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

async function readJson(target: FileTarget, optional: boolean): Promise<unknown> {
  let content: string;
  try {
    content = await readFile(target.path, 'utf-8');
  } catch (error) {
    if (optional && isNotFound(error)) return undefined;
    const reason = isNotFound(error) ? 'not found' : error instanceof Error ? error.message : String(error);
    throw new InputLoadError(`Cannot read ${target.input} file ${target.path}: ${reason}`, target.filingId, target.input, target.path);
  }

  try {
    return JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InputLoadError(`Invalid JSON in ${target.path}: ${reason}`, target.filingId, target.input, target.path);
  }
}

function validate<S extends ZodTypeAny>(schema: S, data: unknown, target: FileTarget): output<S> {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    const summary = parsed.error.issues
      .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
      .join('; ');
    throw new InputLoadError(
      `Invalid ${target.input} file ${target.path}: ${summary}`,
      target.filingId,
      target.input,
      target.path,
      parsed.error.issues,
    );
  }
  return parsed.data;
}

// ---------------------------------------------------------------------------
// Individual files
// ---------------------------------------------------------------------------

export async function loadTaxonomy(path: string, filingId = 'unknown'): Promise<ParsedTaxonomy> {
  const target = { path, filingId, input: 'taxonomy' };
  return validate(TaxonomySchema, await readJson(target, false), target);
}

export async function loadExtensions(path: string, filingId = 'unknown'): Promise<ExtensionSchema | undefined> {
  const target = { path, filingId, input: 'extensions' };
  const data = await readJson(target, true);
  return data === undefined ? undefined : validate(ExtensionSchemaFile, data, target);
}

export async function loadMapperFile(path: string, filingId: string, input: string): Promise<MapperStatements> {
  const target = { path, filingId, input };
  const file = validate(MapperFileSchema, await readJson(target, false), target);
  return file.facts ? { statements: file.statements, facts: file.facts } : { statements: file.statements };
}

/** Read a fact list file, either a bare array or `{facts: [...]}`. */
export async function loadFactList(path: string, filingId = 'unknown', input = 'facts'): Promise<RawFact[]> {
  const target = { path, filingId, input };
  return validate(FactListSchema, await readJson(target, false), target);
}

async function loadOptionalFactList(path: string, filingId: string, input: string): Promise<RawFact[] | undefined> {
  const target = { path, filingId, input };
  const data = await readJson(target, true);
  return data === undefined ? undefined : validate(FactListSchema, data, target);
}

// ---------------------------------------------------------------------------
// Whole filing
// ---------------------------------------------------------------------------

export interface LoadFilingOptions {
  /** Defaults to the directory name. */
  filingId?: string;
  /** Taxonomy file to use instead of the one in the filing directory. */
  taxonomyPath?: string;
  /** Already-parsed taxonomy shared by several filings. */
  taxonomy?: ParsedTaxonomy;
}

/**
 * Load one filing directory. The taxonomy and both mapper files are
 * required; the extension schema and source facts are optional.
 */
export async function loadFilingInput(dir: string, options: LoadFilingOptions = {}): Promise<FilingInput> {
  const root = resolve(dir);
  const filingId = options.filingId ?? basename(root);

  const [taxonomy, extensions, mapperA, mapperB, sourceFacts] = await Promise.all([
    options.taxonomy ?? loadTaxonomy(options.taxonomyPath ?? join(root, FILING_FILES.taxonomy), filingId),
    loadExtensions(join(root, FILING_FILES.extensions), filingId),
    loadMapperFile(join(root, FILING_FILES.mapperA), filingId, 'mapper_a'),
    loadMapperFile(join(root, FILING_FILES.mapperB), filingId, 'mapper_b'),
    loadOptionalFactList(join(root, FILING_FILES.sourceFacts), filingId, 'source_facts'),
  ]);

  return {
    filingId,
    taxonomy,
    ...(extensions ? { extensions } : {}),
    mapperA: mapperA.statements,
    mapperB: mapperB.statements,
    ...(mapperA.facts ? { factsA: mapperA.facts } : {}),
    ...(mapperB.facts ? { factsB: mapperB.facts } : {}),
    ...(sourceFacts ? { sourceFacts } : {}),
  };
}

/** Subdirectories of a batch root, sorted by name; each one is a filing. */
export async function listFilingDirectories(root: string): Promise<string[]> {
  const entries = await readdir(root, { withFileTypes: true });
  return entries
    .filter(entry => entry.isDirectory() && !entry.name.startsWith('.'))
    .map(entry => entry.name)
    .sort();
}
