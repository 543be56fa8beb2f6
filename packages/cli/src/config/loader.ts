import { readFileSync, existsSync, writeFileSync } from 'fs';
import { homedir } from 'os';
import { resolve } from 'path';
import { parse, stringify } from 'yaml';
import { validateKeywordTable } from '@arbiter/core';
import { ConfigSchema, ConfigDefaults, type RawConfig, type Config } from './schema.js';

const DEFAULT_CONFIG_PATH = '.arbiter/config.yaml';

function getDefaultConfigPath(): string {
  return resolve(homedir(), DEFAULT_CONFIG_PATH);
}

export function expandTilde(path: string, homeDirectory: string = homedir()): string {
  if (path.startsWith('~/') || path === '~') {
    return resolve(homeDirectory, path.slice(2));
  }
  return path;
}

function resolveEnvVar(value: string): string {
  if (value.startsWith('env:')) {
    const envKey = value.slice(4);
    const envVal = process.env[envKey];
    return envVal ? envVal : value;
  }
  if (value.startsWith('${') && value.endsWith('}')) {
    const envKey = value.slice(2, -1);
    const envVal = process.env[envKey];
    return envVal ? envVal : value;
  }
  if (value.startsWith('$')) {
    const envKey = value.slice(1);
    const envVal = process.env[envKey];
    return envVal ? envVal : value;
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stripNullValues(obj: unknown): unknown {
  if (obj === null || obj === undefined) {
    return undefined;
  }
  if (Array.isArray(obj)) {
    return obj.filter(item => item !== null).map(stripNullValues);
  }
  if (isRecord(obj)) {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      if (value !== null) {
        result[key] = stripNullValues(value);
      }
    }
    return result;
  }
  return obj;
}

function resolveEnvVarsInObject(obj: unknown): unknown {
  if (obj === null || obj === undefined) {
    return obj;
  }
  if (typeof obj === 'string') {
    return resolveEnvVar(obj);
  }
  if (Array.isArray(obj)) {
    return obj.map(resolveEnvVarsInObject);
  }
  if (isRecord(obj)) {
    const resolved: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      resolved[key] = resolveEnvVarsInObject(value);
    }
    return resolved;
  }
  return obj;
}

export interface LoadConfigOptions {
  configPath?: string;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function formatIssues(error: { issues: { path: (string | number)[]; message: string }[] }): string {
  return error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', ');
}

/** Lists replace the default list; scalars override it. */
function mergeConfig(base: Config, raw: RawConfig): Config {
  const result = structuredClone(base);

  if (raw.taxonomy) {
    const keywords = raw.taxonomy.role_keywords;
    result.taxonomy = {
      role_keywords: {
        balance_sheet: keywords?.balance_sheet ?? result.taxonomy.role_keywords.balance_sheet,
        income_statement: keywords?.income_statement ?? result.taxonomy.role_keywords.income_statement,
        cash_flow: keywords?.cash_flow ?? result.taxonomy.role_keywords.cash_flow,
      },
      cache_size: raw.taxonomy.cache_size ?? result.taxonomy.cache_size,
    };
  }
  if (raw.extensions) {
    result.extensions = {
      standard_namespaces: raw.extensions.standard_namespaces ?? result.extensions.standard_namespaces,
      structural_groups: raw.extensions.structural_groups ?? result.extensions.structural_groups,
      max_depth: raw.extensions.max_depth ?? result.extensions.max_depth,
    };
  }
  if (raw.reconciliation?.exclude) {
    const exclude = raw.reconciliation.exclude;
    const current = result.reconciliation.exclude;
    result.reconciliation.exclude = {
      namespaces: exclude.namespaces ?? current.namespaces,
      suffixes: exclude.suffixes ?? current.suffixes,
      prefixes: exclude.prefixes ?? current.prefixes,
      patterns: exclude.patterns ?? current.patterns,
    };
  }
  if (raw.duplicates) {
    const thresholds = raw.duplicates.thresholds;
    const aliases = raw.duplicates.field_aliases;
    const current = result.duplicates;
    result.duplicates = {
      thresholds: {
        critical: thresholds?.critical ?? current.thresholds.critical,
        major: thresholds?.major ?? current.thresholds.major,
      },
      field_aliases: {
        concept: aliases?.concept ?? current.field_aliases.concept,
        value: aliases?.value ?? current.field_aliases.value,
        context: aliases?.context ?? current.field_aliases.context,
        unit: aliases?.unit ?? current.field_aliases.unit,
        decimals: aliases?.decimals ?? current.field_aliases.decimals,
      },
    };
  }
  if (raw.batch?.concurrency) {
    result.batch.concurrency = raw.batch.concurrency;
  }
  if (raw.defaults) {
    result.defaults = {
      output_format: raw.defaults.output_format ?? result.defaults.output_format,
      output_dir: raw.defaults.output_dir ?? result.defaults.output_dir,
    };
  }

  return result;
}

/** Checks that span several fields and so cannot live in the schema. */
function validateMerged(config: Config): void {
  const { critical, major } = config.duplicates.thresholds;
  if (major >= critical) {
    throw new ConfigError(
      `Invalid config: duplicates.thresholds.major (${major}) must be below duplicates.thresholds.critical (${critical})`,
    );
  }

  try {
    validateKeywordTable(config.taxonomy.role_keywords);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Invalid config: taxonomy.role_keywords: ${message}`);
  }
}

export interface LoadConfigResult {
  config: Config;
  configFileExists: boolean;
  configPath: string;
}

export function loadConfig(options: LoadConfigOptions = {}): Config {
  return loadConfigWithMeta(options).config;
}

export function loadConfigWithMeta(options: LoadConfigOptions = {}): LoadConfigResult {
  const configPath = getConfigPath(options.configPath);
  const configFileExists = existsSync(configPath);

  if (!configFileExists) {
    return { config: structuredClone(ConfigDefaults), configFileExists, configPath };
  }

  let fileContent: string;
  try {
    fileContent = readFileSync(configPath, 'utf-8');
  } catch {
    throw new ConfigError(`Failed to read config file: ${configPath}`);
  }

  let rawConfig: unknown;
  try {
    rawConfig = parse(fileContent);
  } catch {
    throw new ConfigError(`Failed to parse config file: ${configPath}`);
  }

  if (rawConfig === null || rawConfig === undefined) {
    return { config: structuredClone(ConfigDefaults), configFileExists, configPath };
  }

  const validated = ConfigSchema.safeParse(resolveEnvVarsInObject(stripNullValues(rawConfig)));
  if (!validated.success) {
    throw new ConfigError(`Invalid config: ${formatIssues(validated.error)}`);
  }

  const config = mergeConfig(ConfigDefaults, validated.data);
  validateMerged(config);
  return { config, configFileExists, configPath };
}

export function getConfigPath(configPath?: string): string {
  if (configPath) {
    return expandTilde(configPath);
  }
  return getDefaultConfigPath();
}

function coerceValue(value: string): unknown {
  const numValue = Number(value);
  if (!isNaN(numValue) && value.trim() !== '') return numValue;
  if (value === 'true') return true;
  if (value === 'false') return false;
  if (value.includes(',')) return value.split(',').map(item => item.trim()).filter(Boolean);
  return value;
}

/**
 * Set one dot-notation key in the config file. Numbers and booleans are
 * coerced; a comma-separated value becomes a list.
 */
export function setConfigValue(key: string, value: string, options: LoadConfigOptions = {}): void {
  const configPath = getConfigPath(options.configPath);

  if (!existsSync(configPath)) {
    throw new ConfigError(`Config file not found: ${configPath}. Run 'arbiter config init' first.`);
  }

  let fileContent: string;
  try {
    fileContent = readFileSync(configPath, 'utf-8');
  } catch {
    throw new ConfigError(`Failed to read config file: ${configPath}`);
  }

  let parsed: unknown;
  try {
    parsed = parse(fileContent);
  } catch {
    throw new ConfigError(`Failed to parse config file: ${configPath}`);
  }
  const doc: Record<string, unknown> = isRecord(parsed) ? parsed : {};

  const keys = key.split('.');
  const lastKey = keys.pop();
  if (!lastKey || keys.some(k => !k)) {
    throw new ConfigError(`Invalid config key: ${key}`);
  }

  let current = doc;
  for (const k of keys) {
    const next = current[k];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[k] = created;
      current = created;
    }
  }
  current[lastKey] = coerceValue(value);

  // Validate modified config (strip nulls from YAML comments)
  const validated = ConfigSchema.safeParse(stripNullValues(doc));
  if (!validated.success) {
    throw new ConfigError(`Invalid config after setting ${key}: ${formatIssues(validated.error)}`);
  }
  validateMerged(mergeConfig(ConfigDefaults, validated.data));

  writeFileSync(configPath, stringify(doc), 'utf-8');
}
