import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfigWithMeta } from './config/index.js';
import { setConfig, type GlobalOptions } from './context.js';
import { registerReconcileCommand } from './commands/reconcile.js';
import { registerDuplicatesCommand } from './commands/duplicates.js';
import { registerBatchCommand } from './commands/batch.js';
import { registerConfigCommand } from './commands/config.js';

export const VERSION = '0.1.0';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('arbiter')
    .description('Grade two XBRL fact mappers against the taxonomy and check their duplicate integrity')
    .version(VERSION)
    .option('-v, --verbose', 'Enable verbose output')
    .option('--json', 'Machine-readable JSON output')
    .option('-c, --config <path>', 'Path to config file');

  registerReconcileCommand(program);
  registerDuplicatesCommand(program);
  registerBatchCommand(program);
  registerConfigCommand(program);

  program.hook('preAction', (_thisCommand, actionCommand) => {
    const chain = getCommandChain(actionCommand, program);

    // Skip config loading for 'config init'
    if (chain[0] === 'config' && chain[1] === 'init') {
      return;
    }

    const opts = actionCommand.optsWithGlobals<GlobalOptions>();
    const { config, configFileExists, configPath } = loadConfigWithMeta({ configPath: opts.config });

    if (opts.verbose && !opts.json) {
      console.error(chalk.dim(configFileExists ? `  Config: ${configPath}` : '  No config file found, using defaults.'));
    }

    setConfig(config);
  });

  return program;
}

export function getCommandChain(cmd: Command, root: Command): string[] {
  const chain: string[] = [];
  let current: Command | null = cmd;
  while (current && current !== root) {
    chain.unshift(current.name());
    current = current.parent;
  }
  return chain;
}
