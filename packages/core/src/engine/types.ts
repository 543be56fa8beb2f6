import type { ExtensionResolution, ExtensionSchema, ExtensionWarning, ResolutionSummary } from '../extensions/types.js';
import type { DuplicateReport, SeverityThresholds } from '../duplicates/types.js';
import type { FieldAliases, RawFact } from '../facts/types.js';
import type {
  ConceptExclusions,
  ReconciliationResult,
  StatementFacts,
  StatementReconciliation,
} from '../reconciliation/types.js';
import type { ConceptIndexCache } from '../taxonomy/cache.js';
import type {
  IndexWarning,
  ParsedTaxonomy,
  RoleKeywordTable,
  StatementType,
  TaxonomyIdentity,
} from '../taxonomy/types.js';

// ---------------------------------------------------------------------------
// Input
// ---------------------------------------------------------------------------

export interface FilingInput {
  filingId: string;
  taxonomy: ParsedTaxonomy;
  extensions?: ExtensionSchema;
  /** Statement sets per mapper. Both are required. */
  mapperA?: StatementFacts;
  mapperB?: StatementFacts;
  /**
   * Each mapper's full fact list for duplicate detection. Defaults to the
   * facts of every statement in its set.
   */
  factsA?: readonly RawFact[];
  factsB?: readonly RawFact[];
  /** Pre-mapping facts, used to attribute duplicate origin. */
  sourceFacts?: readonly RawFact[];
}

export interface FilingEngineOptions {
  roleKeywords?: RoleKeywordTable;
  /** Index cache to share across filings; `false` builds a fresh index every run. */
  cache?: ConceptIndexCache | false;
  standardNamespaces?: readonly string[];
  structuralGroups?: readonly string[];
  maxDepth?: number;
  exclusions?: ConceptExclusions;
  aliases?: FieldAliases;
  thresholds?: Partial<SeverityThresholds>;
}

// ---------------------------------------------------------------------------
// Result
// ---------------------------------------------------------------------------

export interface FilingResult {
  filingId: string;
  taxonomy: TaxonomyIdentity;
  indexSize: number;
  indexCached: boolean;
  indexWarnings: readonly IndexWarning[];
  extensions: {
    summary: ResolutionSummary;
    resolutions: ExtensionResolution[];
    warnings: ExtensionWarning[];
  };
  reconciliation: ReconciliationResult;
  duplicates: {
    mapperA: DuplicateReport;
    mapperB: DuplicateReport;
  };
  durationMs: number;
}

// ---------------------------------------------------------------------------
// Events
// ---------------------------------------------------------------------------

export interface IndexReadyEvent {
  filingId: string;
  taxonomy: TaxonomyIdentity;
  size: number;
  cached: boolean;
  counts: Record<StatementType, number>;
}

export interface ExtensionsResolvedEvent {
  filingId: string;
  summary: ResolutionSummary;
}

export interface StatementCompleteEvent {
  filingId: string;
  result: StatementReconciliation;
}

export interface DuplicatesCompleteEvent {
  filingId: string;
  mapper: 'mapper_a' | 'mapper_b';
  report: DuplicateReport;
}

export interface FilingWarningEvent {
  filingId: string;
  source: 'taxonomy' | 'extensions';
  kind: string;
  message: string;
  concept?: string;
}

export interface FilingEvents {
  'index:ready': (event: IndexReadyEvent) => void;
  'extensions:resolved': (event: ExtensionsResolvedEvent) => void;
  'statement:complete': (event: StatementCompleteEvent) => void;
  'duplicates:complete': (event: DuplicatesCompleteEvent) => void;
  'warning': (event: FilingWarningEvent) => void;
  'filing:complete': (result: FilingResult) => void;
}

// ---------------------------------------------------------------------------
// Batch
// ---------------------------------------------------------------------------

export interface BatchFailure {
  filingId: string;
  error: Error;
}

export interface BatchResult {
  results: FilingResult[];
  failures: BatchFailure[];
}
