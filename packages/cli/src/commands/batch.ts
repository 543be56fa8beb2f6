import { Command } from 'commander';
import { join, resolve } from 'path';
import ora from 'ora';
import {
  FilingEngine,
  runBatch,
  writeFilingReport,
  type ParsedTaxonomy,
  type ReportFormat,
} from '@arbiter/core';
import { getConfig, type GlobalOptions } from '../context.js';
import { toEngineOptions } from '../config/index.js';
import { listFilingDirectories, loadFilingInput, loadTaxonomy } from '../loaders/index.js';
import { attachEngineLogging, detail, error, info } from '../log.js';
import { parseReportFormat } from './reconcile.js';
import { toSummaryRecord } from './summary.js';

interface BatchCommandOptions {
  taxonomy?: string;
  concurrency?: string;
  format?: string;
  outputDir?: string;
}

export function parseConcurrency(value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new Error(`Concurrency must be a positive integer, got "${value}"`);
  }
  return parsed;
}

export function registerBatchCommand(program: Command): void {
  program
    .command('batch')
    .description('Reconcile every filing directory under a root directory')
    .argument('<root>', 'Directory whose subdirectories are filings')
    .option('-t, --taxonomy <path>', 'Taxonomy file shared by all filings')
    .option('--concurrency <n>', 'Filings processed at once')
    .option('-f, --format <format>', 'Report format (markdown|json)')
    .option('-o, --output-dir <dir>', 'Report directory')
    .action(async (root: string, options: BatchCommandOptions, command: Command) => {
      const globalOpts = command.optsWithGlobals<GlobalOptions>();
      const config = getConfig();
      const rootDir = resolve(root);

      let format: ReportFormat;
      let concurrency: number;
      let filingIds: string[];
      let sharedTaxonomy: ParsedTaxonomy | undefined;
      try {
        format = parseReportFormat(options.format, config.defaults.output_format);
        concurrency = parseConcurrency(options.concurrency, config.batch.concurrency);
        filingIds = await listFilingDirectories(rootDir);
        sharedTaxonomy = options.taxonomy ? await loadTaxonomy(resolve(options.taxonomy)) : undefined;
      } catch (err) {
        error(err instanceof Error ? err.message : String(err));
        process.exitCode = 1;
        return;
      }

      if (filingIds.length === 0) {
        error(`No filing directories found in ${rootDir}`);
        process.exitCode = 1;
        return;
      }

      const outputDir = resolve(options.outputDir ?? config.defaults.output_dir);
      const engine = new FilingEngine(toEngineOptions(config));
      attachEngineLogging(engine, { verbose: globalOpts.verbose });

      const reportPaths = new Map<string, string>();
      let done = 0;
      const spinner = ora({ text: `Reconciling 0/${filingIds.length}`, isSilent: globalOpts.json }).start();
      const progress = (): void => {
        done++;
        spinner.text = `Reconciling ${done}/${filingIds.length}`;
      };

      const { results, failures } = await runBatch(
        filingIds,
        filingId => loadFilingInput(join(rootDir, filingId), { filingId, taxonomy: sharedTaxonomy }),
        {
          concurrency,
          engine,
          onFilingComplete: result => {
            reportPaths.set(result.filingId, writeFilingReport(result, { outputDir, format }));
            progress();
          },
          onFilingError: () => progress(),
        },
      );

      if (failures.length > 0) {
        spinner.warn(`Reconciled ${results.length} of ${filingIds.length} filings`);
        process.exitCode = 1;
      } else {
        spinner.succeed(`Reconciled ${results.length} filings`);
      }

      if (globalOpts.json) {
        console.log(JSON.stringify({
          command: 'batch',
          processed: results.length,
          failed: failures.length,
          results: results.map(result => toSummaryRecord(result, reportPaths.get(result.filingId))),
          failures: failures.map(failure => ({ filing_id: failure.filingId, error: failure.error.message })),
        }, null, 2));
        return;
      }

      for (const failure of failures) {
        error(`  ${failure.filingId}: ${failure.error.message}`);
      }
      info(`Reports: ${outputDir}`);
      for (const result of results) {
        const summary = toSummaryRecord(result);
        detail(`  ${result.filingId}: ${(summary.agreement * 100).toFixed(2)}% agreement, ${summary.discrepancies} discrepancies`);
      }
    });
}
