import chalk from 'chalk';
import { existsSync, mkdirSync, writeFileSync } from 'fs';
import { homedir } from 'os';
import { dirname, resolve } from 'path';
import { expandTilde } from '../config/loader.js';

export interface InitCommandOptions {
  configPath?: string;
  homeDir?: string;
  logger?: (...args: unknown[]) => void;
}

function resolveConfigPath(configPath: string | undefined, homeDirectory: string): string {
  if (configPath) {
    return expandTilde(configPath, homeDirectory);
  }
  return resolve(homeDirectory, '.arbiter', 'config.yaml');
}

export const CONFIG_TEMPLATE = `# Arbiter Configuration
# String values may reference the environment: env:VAR, $VAR or \${VAR}

# Report output
defaults:
  output_format: markdown      # markdown | json
  output_dir: "./output"

# Presentation roles are classified by keywords in their definitions.
# Replace a list to adapt the classifier to another market's phrasing.
taxonomy:
  cache_size: 8                # concept indexes kept in memory per process
  # role_keywords:
  #   balance_sheet: ["balance sheet", "financial position"]
  #   cash_flow: ["cash flow"]
  #   income_statement: ["income", "operations", "comprehensive"]

extensions:
  max_depth: 10                # substitution-group hops before a chain is invalid
  # standard_namespaces: [us-gaap, ifrs-full, dei, srt]
  # structural_groups: [xbrli:item, xbrli:tuple]

# Concepts left out of reconciliation (cover page and dimensional metadata)
# reconciliation:
#   exclude:
#     namespaces: [dei]
#     suffixes: [TextBlock, Axis, Domain, Member]
#     prefixes: [NumberOf]
#     patterns: [Description]

duplicates:
  thresholds:
    critical: 0.05             # relative variance at or above this is CRITICAL
    major: 0.01                # at or above this is MAJOR
  # field_aliases:
  #   concept: [concept_qname, qname, concept]
  #   value: [fact_value, value]
  #   context: [context_ref, contextRef, context]

batch:
  concurrency: 4
`;

export async function initCommand(options: InitCommandOptions = {}): Promise<void> {
  const log = options.logger ?? console.log;
  const homeDirectory = options.homeDir ?? homedir();

  const configPath = resolveConfigPath(options.configPath, homeDirectory);
  const configDir = dirname(configPath);

  if (!existsSync(configDir)) {
    mkdirSync(configDir, { recursive: true });
    log(chalk.green('Created directory:'), configDir);
  }

  if (existsSync(configPath)) {
    log(chalk.yellow('Config already exists at:'), configPath);
    log(chalk.yellow('Run with --config <path> to use a different location.'));
    return;
  }

  writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
  log(chalk.green('Created config file:'), configPath);
  log('');
  log(chalk.cyan('Next steps:'));
  log('  1. Edit', configPath);
  log('  2. Adjust role keywords or exclusions for your market');
  log('  3. Run', chalk.green('arbiter reconcile <filing-dir>'));
}
