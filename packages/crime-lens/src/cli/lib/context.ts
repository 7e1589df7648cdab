/**
 * Per-command setup shared by every CLI command
 *
 * @module cli/lib/context
 */

import { ConfigError } from '../../core/errors.js';
import { Logger } from '../../core/utils/logger.js';
import { loadConfig, type CLIConfig, type LoadConfigOptions } from './config.js';

/**
 * Flags declared on the program itself
 */
export interface GlobalOptions {
  readonly config?: string;
  readonly logLevel?: string;
  readonly json?: boolean;
}

/**
 * Options every command accepts (global flags plus per-command paths)
 */
export interface CommandOptions extends GlobalOptions {
  readonly input?: string;
  readonly output?: string;
  readonly title?: string;
  /** Environment override, used by tests */
  readonly env?: NodeJS.ProcessEnv;
  /** Working directory override, used by tests */
  readonly cwd?: string;
}

export interface CommandContext {
  readonly config: CLIConfig;
  readonly logger: Logger;
}

/**
 * Load configuration and build the command logger
 *
 * In JSON mode progress logging drops to errors only so that stdout
 * carries a single JSON document.
 *
 * @returns the context, or the ConfigError to report
 */
export async function createCommandContext(options: CommandOptions): Promise<CommandContext | ConfigError> {
  const loadOptions: LoadConfigOptions = {
    ...(options.config !== undefined && { configPath: options.config }),
    ...(options.env !== undefined && { env: options.env }),
    ...(options.cwd !== undefined && { cwd: options.cwd }),
    overrides: {
      ...(options.input !== undefined && { input: options.input }),
      ...(options.output !== undefined && { output: options.output }),
      ...(options.title !== undefined && { title: options.title }),
      ...(options.logLevel !== undefined && { logLevel: options.logLevel }),
      ...(options.json !== undefined && { json: options.json }),
    },
  };

  let config: CLIConfig;
  try {
    config = await loadConfig(loadOptions);
  } catch (error) {
    if (error instanceof ConfigError) return error;
    throw error;
  }

  const logger = new Logger({
    level: config.json ? 'error' : config.logLevel,
    service: 'crime-lens',
    pretty: !config.json,
  });
  if (config.configPath) {
    logger.debug('Using config file', { path: config.configPath });
  }
  return { config, logger };
}

/**
 * Print a configuration error the way the CLI reports it
 */
export function reportConfigError(error: ConfigError, json: boolean): void {
  if (json) {
    console.log(
      JSON.stringify(
        { success: false, error: error.message, configPath: error.configPath, issues: error.issues },
        null,
        2
      )
    );
    return;
  }
  console.error(`Configuration error: ${error.getSummary()}`);
}
