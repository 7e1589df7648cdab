/**
 * Merge Command
 *
 * Combine a directory of monthly crime CSV exports into a single CSV.
 * Columns keep their first-seen order; rows keep file order.
 *
 * Usage:
 *   crime-lens merge <dir> [options]
 *
 * Options:
 *   -o, --output <file>   Merged file (default: <dir>/merged.csv)
 *
 * @module cli/commands/merge
 */

import type { Command } from 'commander';
import { join } from 'node:path';
import { MERGED_FILE_NAME } from '../../core/constants.js';
import { ConfigError, IngestionError } from '../../core/errors.js';
import { formatCount } from '../../core/utils/format.js';
import { mergeCrimeCsvFiles } from '../../ingestion/csv-sources.js';
import { createCommandContext, reportConfigError, type CommandOptions, type GlobalOptions } from '../lib/context.js';
import { EXIT_CODES, type ExitCode } from '../lib/exit-codes.js';
import { printJson } from '../lib/output.js';

export interface MergeOptions extends CommandOptions {
  readonly dir: string;
  /** Merged file path (default: <dir>/merged.csv) */
  readonly file?: string;
}

export interface MergeResult {
  readonly exitCode: ExitCode;
  readonly outputPath: string | null;
  readonly rows: number;
}

/**
 * Run the merge command
 */
export async function runMerge(options: MergeOptions): Promise<MergeResult> {
  const context = await createCommandContext(options);
  if (context instanceof ConfigError) {
    reportConfigError(context, options.json ?? false);
    return { exitCode: EXIT_CODES.CONFIG_ERROR, outputPath: null, rows: 0 };
  }

  const { config, logger } = context;
  const outputPath = options.file ?? join(options.dir, MERGED_FILE_NAME);

  try {
    const merged = await mergeCrimeCsvFiles(options.dir, outputPath);
    logger.info('Merged CSV files', { files: merged.sources.length, rows: merged.rows.length, outputPath });

    if (config.json) {
      printJson({ success: true, outputPath, files: merged.sources, rows: merged.rows.length });
    } else {
      console.log(`Merged ${merged.sources.length} file(s), ${formatCount(merged.rows.length)} row(s) into ${outputPath}`);
    }
    return { exitCode: EXIT_CODES.SUCCESS, outputPath, rows: merged.rows.length };
  } catch (error) {
    if (!(error instanceof IngestionError)) throw error;

    if (config.json) {
      printJson({ success: false, error: error.message, missingColumns: error.missingColumns });
    } else {
      console.error(`Merge failed: ${error.message}`);
    }
    return { exitCode: EXIT_CODES.ERRORS, outputPath: null, rows: 0 };
  }
}

/**
 * Register the merge command
 */
export function registerMergeCommand(program: Command): void {
  program
    .command('merge <dir>')
    .description('Combine monthly crime CSV files into one file')
    .option('-o, --output <file>', 'Merged file (default: <dir>/merged.csv)')
    .action(async (dir: string, options: { output?: string }, command: Command) => {
      const globals = command.optsWithGlobals<GlobalOptions>();
      const { exitCode } = await runMerge({
        config: globals.config,
        logLevel: globals.logLevel,
        json: globals.json,
        dir,
        ...(options.output !== undefined && { file: options.output }),
      });
      process.exitCode = exitCode;
    });
}
