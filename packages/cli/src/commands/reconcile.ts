import { Command } from 'commander';
import { resolve } from 'path';
import ora from 'ora';
import {
  FilingEngine,
  renderFilingJSON,
  renderReconciliationMarkdown,
  writeFilingReport,
  type ReportFormat,
} from '@arbiter/core';
import { getConfig, type GlobalOptions } from '../context.js';
import { toEngineOptions } from '../config/index.js';
import { loadFilingInput } from '../loaders/index.js';
import { attachEngineLogging, error } from '../log.js';
import { formatFilingSummary, toSummaryRecord } from './summary.js';

interface ReconcileOptions {
  taxonomy?: string;
  id?: string;
  format?: string;
  outputDir?: string;
  stdout?: boolean;
}

export function parseReportFormat(value: string | undefined, fallback: ReportFormat): ReportFormat {
  if (value === undefined) return fallback;
  if (value === 'markdown' || value === 'json') return value;
  throw new Error(`Unknown report format "${value}" (expected markdown or json)`);
}

export function registerReconcileCommand(program: Command): void {
  program
    .command('reconcile')
    .description('Reconcile one filing directory against its taxonomy')
    .argument('<dir>', 'Filing directory (taxonomy.json, mapper-a.json, mapper-b.json, ...)')
    .option('-t, --taxonomy <path>', 'Taxonomy file to use instead of <dir>/taxonomy.json')
    .option('--id <filing-id>', 'Filing id (defaults to the directory name)')
    .option('-f, --format <format>', 'Report format (markdown|json)')
    .option('-o, --output-dir <dir>', 'Report directory')
    .option('--stdout', 'Print the report instead of writing it')
    .action(async (dir: string, options: ReconcileOptions, command: Command) => {
      const globalOpts = command.optsWithGlobals<GlobalOptions>();
      const config = getConfig();

      let format: ReportFormat;
      try {
        format = parseReportFormat(options.format, config.defaults.output_format);
      } catch (err) {
        error(err instanceof Error ? err.message : String(err));
        process.exitCode = 1;
        return;
      }

      const engine = new FilingEngine(toEngineOptions(config));
      attachEngineLogging(engine, { verbose: globalOpts.verbose });
      const spinner = ora({ text: `Reconciling ${dir}`, isSilent: globalOpts.json || options.stdout }).start();

      try {
        const input = await loadFilingInput(dir, {
          filingId: options.id,
          taxonomyPath: options.taxonomy ? resolve(options.taxonomy) : undefined,
        });
        const result = engine.run(input);

        if (options.stdout) {
          spinner.stop();
          console.log(format === 'json' ? renderFilingJSON(result) : renderReconciliationMarkdown(result));
          return;
        }

        const reportPath = writeFilingReport(result, { outputDir: resolve(options.outputDir ?? config.defaults.output_dir), format });
        spinner.succeed(`Reconciled ${result.filingId}`);

        if (globalOpts.json) {
          console.log(JSON.stringify({ command: 'reconcile', ...toSummaryRecord(result, reportPath) }, null, 2));
        } else {
          for (const line of formatFilingSummary(result)) console.log(line);
          console.log(`  Report: ${reportPath}`);
        }
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        spinner.fail('Reconciliation failed');
        if (globalOpts.json) {
          console.error(JSON.stringify({ error: message }));
        } else {
          error(message);
        }
        process.exitCode = 1;
      }
    });
}
