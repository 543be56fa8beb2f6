import { EventEmitter } from 'eventemitter3';
import { detectDuplicates } from '../duplicates/detector.js';
import { MissingInputError } from '../errors.js';
import { collectExtensionConcepts } from '../extensions/collector.js';
import { resolveExtensions, summarizeResolutions } from '../extensions/resolver.js';
import type { RawFact } from '../facts/types.js';
import { reconcileStatements } from '../reconciliation/reconciler.js';
import type { StatementFacts } from '../reconciliation/types.js';
import { getConceptIndexCache } from '../taxonomy/cache.js';
import { buildConceptIndexFromTaxonomy, type TaxonomyConceptIndex } from '../taxonomy/concept-index.js';
import { keywordTableKey } from '../taxonomy/role-classifier.js';
import { STATEMENT_TYPES } from '../taxonomy/types.js';
import type { FilingEngineOptions, FilingEvents, FilingInput, FilingResult } from './types.js';

// ---------------------------------------------------------------------------
// Filing engine
// ---------------------------------------------------------------------------

/**
 * Runs one filing end to end: concept index, extension resolution,
 * reconciliation of every statement, then duplicate detection per mapper.
 *
 * Synchronous; progress and warnings are reported as events so callers can
 * log them without the core depending on a logger.
 */
export class FilingEngine extends EventEmitter<FilingEvents> {
  constructor(private readonly options: FilingEngineOptions = {}) {
    super();
  }

  run(input: FilingInput): FilingResult {
    const started = Date.now();
    const { filingId } = input;
    const mapperA = requireStatements(input.mapperA, filingId, 'mapper_a');
    const mapperB = requireStatements(input.mapperB, filingId, 'mapper_b');

    const { index, cached } = this.indexFor(input);
    for (const warning of index.warnings) {
      this.emit('warning', { filingId, source: 'taxonomy', ...warning });
    }
    this.emit('index:ready', {
      filingId,
      taxonomy: index.taxonomy,
      size: index.size,
      cached,
      counts: index.countsByStatement(),
    });

    const collected = collectExtensionConcepts(input.extensions ?? { elements: [] }, {
      standardNamespaces: this.options.standardNamespaces,
      onWarning: warning => this.emit('warning', { filingId, source: 'extensions', ...warning }),
    });
    const resolutions = resolveExtensions(collected.concepts, index, {
      maxDepth: this.options.maxDepth,
      structuralGroups: this.options.structuralGroups,
    });
    const summary = summarizeResolutions(resolutions);
    this.emit('extensions:resolved', { filingId, summary });

    const reconciliation = reconcileStatements(mapperA, mapperB, index, resolutions, {
      exclusions: this.options.exclusions,
      aliases: this.options.aliases,
      filingId,
      onStatement: result => this.emit('statement:complete', { filingId, result }),
    });

    const duplicateOptions = {
      aliases: this.options.aliases,
      thresholds: this.options.thresholds,
      filingId,
    };
    const duplicatesA = detectDuplicates(input.factsA ?? flatten(mapperA), input.sourceFacts, { ...duplicateOptions, sourceMapper: 'mapper_a' });
    this.emit('duplicates:complete', { filingId, mapper: 'mapper_a', report: duplicatesA });
    const duplicatesB = detectDuplicates(input.factsB ?? flatten(mapperB), input.sourceFacts, { ...duplicateOptions, sourceMapper: 'mapper_b' });
    this.emit('duplicates:complete', { filingId, mapper: 'mapper_b', report: duplicatesB });

    const result: FilingResult = {
      filingId,
      taxonomy: index.taxonomy,
      indexSize: index.size,
      indexCached: cached,
      indexWarnings: index.warnings,
      extensions: {
        summary,
        resolutions: [...resolutions.values()],
        warnings: collected.warnings,
      },
      reconciliation,
      duplicates: { mapperA: duplicatesA, mapperB: duplicatesB },
      durationMs: Date.now() - started,
    };
    this.emit('filing:complete', result);
    return result;
  }

  /**
   * Taxonomies without a name and version cannot be keyed, so they are
   * never cached.
   */
  private indexFor(input: FilingInput): { index: TaxonomyConceptIndex; cached: boolean } {
    const build = () => buildConceptIndexFromTaxonomy(input.taxonomy, {
      keywords: this.options.roleKeywords,
      filingId: input.filingId,
    });

    const cache = this.options.cache === false ? undefined : this.options.cache ?? getConceptIndexCache();
    const { name, version } = input.taxonomy;
    if (!cache || !name || !version) {
      return { index: build(), cached: false };
    }

    const variant = keywordTableKey(this.options.roleKeywords, input.filingId);
    const cached = cache.get(name, version, variant) !== undefined;
    return { index: cache.getOrBuild(name, version, build, variant), cached };
  }
}

function requireStatements(statements: StatementFacts | undefined, filingId: string, mapper: string): StatementFacts {
  if (!statements) {
    throw new MissingInputError(`Filing ${filingId} has no statement set for ${mapper}`, filingId, mapper);
  }
  return statements;
}

function flatten(statements: StatementFacts): RawFact[] {
  return STATEMENT_TYPES.flatMap(type => statements[type] ?? []);
}
