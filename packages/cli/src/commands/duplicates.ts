import { Command } from 'commander';
import { writeFileSync } from 'fs';
import { basename, resolve } from 'path';
import { detectDuplicates, renderDuplicateJSON, renderDuplicateMarkdown } from '@arbiter/core';
import { getConfig, type GlobalOptions } from '../context.js';
import { loadFactList } from '../loaders/index.js';
import { error, info } from '../log.js';
import { parseReportFormat } from './reconcile.js';

interface DuplicatesOptions {
  source?: string;
  label?: string;
  format?: string;
  output?: string;
}

export function registerDuplicatesCommand(program: Command): void {
  program
    .command('duplicates')
    .description('Check one fact list for duplicate (concept, context) facts')
    .argument('<facts>', 'JSON fact list (bare array or {"facts": [...]})')
    .option('-s, --source <path>', 'Pre-mapping fact list, used to attribute duplicate origin')
    .option('-l, --label <name>', 'Name shown in the report title')
    .option('-f, --format <format>', 'Report format (markdown|json)')
    .option('-o, --output <file>', 'Write the report to a file instead of stdout')
    .action(async (factsPath: string, options: DuplicatesOptions, command: Command) => {
      const globalOpts = command.optsWithGlobals<GlobalOptions>();
      const config = getConfig();
      const filingId = basename(factsPath);

      try {
        const format = globalOpts.json ? 'json' : parseReportFormat(options.format, config.defaults.output_format);
        const [facts, sourceFacts] = await Promise.all([
          loadFactList(resolve(factsPath), filingId),
          options.source ? loadFactList(resolve(options.source), filingId, 'source_facts') : Promise.resolve(undefined),
        ]);

        const report = detectDuplicates(facts, sourceFacts, {
          thresholds: config.duplicates.thresholds,
          aliases: config.duplicates.field_aliases,
          filingId,
        });
        const content = format === 'json'
          ? renderDuplicateJSON(report)
          : renderDuplicateMarkdown(report, options.label ?? filingId);

        if (options.output) {
          const outputPath = resolve(options.output);
          writeFileSync(outputPath, content, 'utf-8');
          info(`Report: ${outputPath}`);
        } else {
          console.log(content);
        }
      } catch (err) {
        error(err instanceof Error ? err.message : String(err));
        process.exitCode = 1;
      }
    });
}
