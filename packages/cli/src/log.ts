import chalk from 'chalk';
import type { FilingEngine, FilingWarningEvent } from '@arbiter/core';

// Diagnostics go to stderr; stdout carries reports and --json output.

export function info(message: string): void {
  console.error(chalk.cyan(message));
}

export function detail(message: string): void {
  console.error(chalk.dim(message));
}

export function warn(message: string): void {
  console.error(chalk.yellow(`Warning: ${message}`));
}

export function error(message: string): void {
  console.error(chalk.red(message));
}

export function formatWarning(event: FilingWarningEvent): string {
  const subject = event.concept ? ` ${event.concept}` : '';
  return `[${event.filingId}] ${event.source}/${event.kind}${subject}: ${event.message}`;
}

export interface EngineLogOptions {
  verbose?: boolean;
}

/**
 * Forward engine events to the log helpers. Warnings are printed one by one
 * in verbose mode and otherwise summarized per filing.
 */
export function attachEngineLogging(engine: FilingEngine, options: EngineLogOptions = {}): void {
  const warningCounts = new Map<string, number>();

  engine.on('warning', event => {
    warningCounts.set(event.filingId, (warningCounts.get(event.filingId) ?? 0) + 1);
    if (options.verbose) warn(formatWarning(event));
  });

  engine.on('index:ready', event => {
    if (!options.verbose) return;
    const source = event.cached ? 'cached' : 'built';
    detail(`  [${event.filingId}] index ${source}: ${event.size} concepts (${event.taxonomy.name} ${event.taxonomy.version})`);
  });

  engine.on('extensions:resolved', event => {
    if (!options.verbose) return;
    const { total, valid, invalid } = event.summary;
    detail(`  [${event.filingId}] extensions: ${total} total, ${valid} resolved, ${invalid} invalid`);
  });

  engine.on('filing:complete', result => {
    const count = warningCounts.get(result.filingId) ?? 0;
    warningCounts.delete(result.filingId);
    if (count > 0 && !options.verbose) {
      warn(`${result.filingId}: ${count} input warning(s); rerun with --verbose for details`);
    }
  });
}
