/**
 * Analyze Command
 *
 * Full run: load, analyze, and write charts, maps, tables and the text
 * summary under the output directory.
 *
 * Usage:
 *   crime-lens analyze [input] [options]
 *
 * Options:
 *   -o, --output <dir>    Output directory (default: ./output)
 *   --title <title>       Heading used in charts, maps and the report
 *
 * Examples:
 *   crime-lens analyze ./data/raw
 *   crime-lens analyze street.csv --output ./out --json
 *
 * @module cli/commands/analyze
 */

import type { Command } from 'commander';
import { ConfigError } from '../../core/errors.js';
import { formatDuration } from '../../core/utils/format.js';
import { runPipeline, type PipelineRun } from '../../pipeline/crime-pipeline.js';
import { FileRenderer } from '../../rendering/file-renderer.js';
import type { Renderer } from '../../rendering/types.js';
import { formatSummaryReport } from '../../report/summary-text.js';
import { createCommandContext, reportConfigError, type CommandOptions, type GlobalOptions } from '../lib/context.js';
import { EXIT_CODES, exitCodeFor, type ExitCode } from '../lib/exit-codes.js';
import { outcomeToJson, printFailure, printJson } from '../lib/output.js';

export interface AnalyzeOptions extends CommandOptions {
  /** Replaces the file renderer */
  readonly renderer?: Renderer;
}

export interface AnalyzeResult {
  readonly exitCode: ExitCode;
  readonly run: PipelineRun | null;
}

/**
 * Run the analyze command
 */
export async function runAnalyze(options: AnalyzeOptions = {}): Promise<AnalyzeResult> {
  const context = await createCommandContext(options);
  if (context instanceof ConfigError) {
    reportConfigError(context, options.json ?? false);
    return { exitCode: EXIT_CODES.CONFIG_ERROR, run: null };
  }

  const { config, logger } = context;
  const renderer = options.renderer ?? new FileRenderer(config.pipeline.paths.output, { logger });
  const run = await runPipeline(config.pipeline, renderer, { logger });
  const exitCode = exitCodeFor(run.outcome);

  if (config.json) {
    printJson({
      ...outcomeToJson(run.outcome),
      artifacts: run.artifacts.map((artifact) => ({ kind: artifact.kind, files: artifact.files })),
      durationMs: run.durationMs,
    });
    return { exitCode, run };
  }

  if (run.outcome.status === 'failure') {
    printFailure(run.outcome.reason);
    return { exitCode, run };
  }

  console.log(formatSummaryReport(run.outcome.summary, `${config.pipeline.title.toUpperCase()} - SUMMARY REPORT`));
  console.log(`Artifacts written to ${config.pipeline.paths.output}:`);
  for (const artifact of run.artifacts) {
    console.log(`  ${artifact.kind.padEnd(20)} ${artifact.path}`);
  }
  console.log('');
  console.log(`Completed in ${formatDuration(run.durationMs)}`);

  return { exitCode, run };
}

/**
 * Register the analyze command
 */
export function registerAnalyzeCommand(program: Command): void {
  program
    .command('analyze [input]')
    .description('Analyze a crime CSV file or directory and write charts, maps and reports')
    .option('-o, --output <dir>', 'Output directory')
    .option('--title <title>', 'Heading used in charts, maps and the report')
    .action(async (input: string | undefined, options: { output?: string; title?: string }, command: Command) => {
      const globals = command.optsWithGlobals<GlobalOptions>();
      const { exitCode } = await runAnalyze({
        ...globals,
        ...(input !== undefined && { input }),
        ...(options.output !== undefined && { output: options.output }),
        ...(options.title !== undefined && { title: options.title }),
      });
      process.exitCode = exitCode;
    });
}
