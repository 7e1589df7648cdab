/**
 * Commands Index
 *
 * Registers every crime-lens subcommand.
 *
 * @module cli/commands
 */

import type { Command } from 'commander';
import { registerAnalyzeCommand } from './analyze.js';
import { registerInspectCommand } from './inspect.js';
import { registerMergeCommand } from './merge.js';

export { runAnalyze, registerAnalyzeCommand, type AnalyzeOptions, type AnalyzeResult } from './analyze.js';
export { runInspect, registerInspectCommand, type InspectOptions, type InspectResult } from './inspect.js';
export { runMerge, registerMergeCommand, type MergeOptions, type MergeResult } from './merge.js';

/**
 * Register all subcommands
 *
 * @param program - Commander program instance
 */
export function registerCommands(program: Command): void {
  registerAnalyzeCommand(program);
  registerInspectCommand(program);
  registerMergeCommand(program);
}
