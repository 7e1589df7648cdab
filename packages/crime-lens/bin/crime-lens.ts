#!/usr/bin/env tsx
/**
 * Crime Lens CLI Entry Point
 *
 * @module crime-lens-cli
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { CLI_NAME, EXIT_CODES, registerCommands } from '../src/cli/index.js';
import { errorMessage } from '../src/core/errors.js';

function getVersion(): string {
  const __dirname = dirname(fileURLToPath(import.meta.url));
  const packageJsonPath = join(__dirname, '..', 'package.json');
  try {
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson) {
      return String(packageJson.version);
    }
    return '0.0.0';
  } catch {
    return '0.0.0';
  }
}

function createProgram(): Command {
  const program = new Command();

  program
    .name(CLI_NAME)
    .description('Crime Lens - street-level crime data analysis, charts and maps')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('--config <path>', 'Path to config file (default: .crime-lensrc)')
    .option('--log-level <level>', 'Log level: debug|info|warn|error')
    .option('--json', 'Output as JSON (machine-readable)');

  registerCommands(program);
  return program;
}

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(`Unexpected error: ${errorMessage(error)}`);
    process.exitCode = EXIT_CODES.ERRORS;
  });
