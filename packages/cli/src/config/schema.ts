import { z } from 'zod';
import {
  DEFAULT_BATCH_CONCURRENCY,
  DEFAULT_CACHE_CAPACITY,
  DEFAULT_CONCEPT_EXCLUSIONS,
  DEFAULT_FIELD_ALIASES,
  DEFAULT_MAX_DEPTH,
  DEFAULT_ROLE_KEYWORDS,
  DEFAULT_STANDARD_NAMESPACES,
  DEFAULT_STRUCTURAL_GROUPS,
  DEFAULT_THRESHOLDS,
} from '@arbiter/core';

const keywordListSchema = z.array(z.string().min(1));
const nameListSchema = z.array(z.string().min(1));

const taxonomySchema = z.object({
  role_keywords: z.object({
    balance_sheet: keywordListSchema.optional(),
    income_statement: keywordListSchema.optional(),
    cash_flow: keywordListSchema.optional(),
  }).strict().optional(),
  cache_size: z.number().int().positive().optional(),
}).strict();

const extensionsSchema = z.object({
  standard_namespaces: nameListSchema.optional(),
  structural_groups: nameListSchema.optional(),
  max_depth: z.number().int().positive().optional(),
}).strict();

const reconciliationSchema = z.object({
  exclude: z.object({
    namespaces: nameListSchema.optional(),
    suffixes: nameListSchema.optional(),
    prefixes: nameListSchema.optional(),
    patterns: nameListSchema.optional(),
  }).strict().optional(),
}).strict();

const ratioSchema = z.number().min(0).max(1);

const duplicatesSchema = z.object({
  thresholds: z.object({
    critical: ratioSchema.optional(),
    major: ratioSchema.optional(),
  }).strict().optional(),
  field_aliases: z.object({
    concept: nameListSchema.min(1).optional(),
    value: nameListSchema.min(1).optional(),
    context: nameListSchema.min(1).optional(),
    unit: nameListSchema.optional(),
    decimals: nameListSchema.optional(),
  }).strict().optional(),
}).strict();

const batchSchema = z.object({
  concurrency: z.number().int().positive().optional(),
}).strict();

const defaultsSchema = z.object({
  output_format: z.enum(['markdown', 'json']).optional(),
  output_dir: z.string().min(1).optional(),
}).strict();

const ConfigSchema = z.object({
  taxonomy: taxonomySchema.optional(),
  extensions: extensionsSchema.optional(),
  reconciliation: reconciliationSchema.optional(),
  duplicates: duplicatesSchema.optional(),
  batch: batchSchema.optional(),
  defaults: defaultsSchema.optional(),
}).strict();

export type RawConfig = z.infer<typeof ConfigSchema>;

export type OutputFormat = 'markdown' | 'json';

export interface Config {
  taxonomy: {
    role_keywords: {
      balance_sheet: string[];
      income_statement: string[];
      cash_flow: string[];
    };
    cache_size: number;
  };
  extensions: {
    standard_namespaces: string[];
    structural_groups: string[];
    max_depth: number;
  };
  reconciliation: {
    exclude: {
      namespaces: string[];
      suffixes: string[];
      prefixes: string[];
      patterns: string[];
    };
  };
  duplicates: {
    thresholds: {
      critical: number;
      major: number;
    };
    field_aliases: {
      concept: string[];
      value: string[];
      context: string[];
      unit: string[];
      decimals: string[];
    };
  };
  batch: {
    concurrency: number;
  };
  defaults: {
    output_format: OutputFormat;
    output_dir: string;
  };
}

export const ConfigDefaults: Config = {
  taxonomy: {
    role_keywords: {
      balance_sheet: [...DEFAULT_ROLE_KEYWORDS.balance_sheet],
      income_statement: [...DEFAULT_ROLE_KEYWORDS.income_statement],
      cash_flow: [...DEFAULT_ROLE_KEYWORDS.cash_flow],
    },
    cache_size: DEFAULT_CACHE_CAPACITY,
  },
  extensions: {
    standard_namespaces: [...DEFAULT_STANDARD_NAMESPACES],
    structural_groups: [...DEFAULT_STRUCTURAL_GROUPS],
    max_depth: DEFAULT_MAX_DEPTH,
  },
  reconciliation: {
    exclude: {
      namespaces: [...DEFAULT_CONCEPT_EXCLUSIONS.namespaces],
      suffixes: [...DEFAULT_CONCEPT_EXCLUSIONS.suffixes],
      prefixes: [...DEFAULT_CONCEPT_EXCLUSIONS.prefixes],
      patterns: [...DEFAULT_CONCEPT_EXCLUSIONS.patterns],
    },
  },
  duplicates: {
    thresholds: { ...DEFAULT_THRESHOLDS },
    field_aliases: {
      concept: [...DEFAULT_FIELD_ALIASES.concept],
      value: [...DEFAULT_FIELD_ALIASES.value],
      context: [...DEFAULT_FIELD_ALIASES.context],
      unit: [...DEFAULT_FIELD_ALIASES.unit],
      decimals: [...DEFAULT_FIELD_ALIASES.decimals],
    },
  },
  batch: {
    concurrency: DEFAULT_BATCH_CONCURRENCY,
  },
  defaults: {
    output_format: 'markdown',
    output_dir: './output',
  },
};

export { ConfigSchema };
