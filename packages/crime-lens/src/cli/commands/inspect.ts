/**
 * Inspect Command
 *
 * Ingest and clean the input and print the headline facts, rankings and
 * warnings. Nothing is written to disk.
 *
 * Usage:
 *   crime-lens inspect [input] [options]
 *
 * Options:
 *   --top <n>             Rows shown per ranking (default: 10)
 *
 * @module cli/commands/inspect
 */

import { InvalidArgumentError, type Command } from 'commander';
import { ConfigError } from '../../core/errors.js';
import type { PipelineOutcome } from '../../core/types.js';
import { loadCrimeCsvSources } from '../../ingestion/csv-sources.js';
import { analyze, failureFrom } from '../../pipeline/crime-pipeline.js';
import { formatSummaryReport } from '../../report/summary-text.js';
import { createCommandContext, reportConfigError, type CommandOptions, type GlobalOptions } from '../lib/context.js';
import { EXIT_CODES, exitCodeFor, type ExitCode } from '../lib/exit-codes.js';
import { formatRanking, outcomeToJson, printFailure, printJson } from '../lib/output.js';

export interface InspectOptions extends CommandOptions {
  readonly top?: number;
}

export interface InspectResult {
  readonly exitCode: ExitCode;
  readonly outcome: PipelineOutcome | null;
}

const DEFAULT_TOP = 10;

/**
 * Run the inspect command
 */
export async function runInspect(options: InspectOptions = {}): Promise<InspectResult> {
  const context = await createCommandContext(options);
  if (context instanceof ConfigError) {
    reportConfigError(context, options.json ?? false);
    return { exitCode: EXIT_CODES.CONFIG_ERROR, outcome: null };
  }

  const { config, logger } = context;
  const top = options.top ?? DEFAULT_TOP;

  let outcome: PipelineOutcome;
  try {
    const table = await loadCrimeCsvSources(config.pipeline.paths.input);
    outcome = analyze(table, config.pipeline, { logger });
  } catch (error) {
    const reason = failureFrom(error);
    if (!reason) throw error;
    outcome = { status: 'failure', reason };
  }
  const exitCode = exitCodeFor(outcome);

  if (config.json) {
    printJson(outcomeToJson(outcome));
    return { exitCode, outcome };
  }

  if (outcome.status === 'failure') {
    printFailure(outcome.reason);
    return { exitCode, outcome };
  }

  const { summary } = outcome;
  console.log(formatSummaryReport(summary, `${config.pipeline.title.toUpperCase()} - INSPECTION`));
  console.log('Crime types:');
  console.log(formatRanking(summary.crimeTypes.ranking.slice(0, top)));
  console.log('');
  console.log('Areas:');
  console.log(formatRanking(summary.areas.ranking.slice(0, top)));
  console.log('');
  console.log('Outcomes:');
  console.log(formatRanking(summary.outcomes.ranking.slice(0, top)));

  return { exitCode, outcome };
}

function parseTop(value: string): number {
  const top = Number.parseInt(value, 10);
  if (!Number.isInteger(top) || top < 0) {
    throw new InvalidArgumentError('must be a non-negative integer');
  }
  return top;
}

/**
 * Register the inspect command
 */
export function registerInspectCommand(program: Command): void {
  program
    .command('inspect [input]')
    .description('Print headline facts and rankings without writing any files')
    .option('--top <n>', 'Rows shown per ranking', parseTop, DEFAULT_TOP)
    .action(async (input: string | undefined, options: { top: number }, command: Command) => {
      const globals = command.optsWithGlobals<GlobalOptions>();
      const { exitCode } = await runInspect({
        ...globals,
        ...(input !== undefined && { input }),
        top: options.top,
      });
      process.exitCode = exitCode;
    });
}
