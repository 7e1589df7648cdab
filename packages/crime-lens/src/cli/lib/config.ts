/**
 * Crime Lens CLI Configuration Management
 *
 * Loads configuration from .crime-lensrc (YAML or JSON) with environment
 * variable overrides and defaults, and produces the frozen `PipelineConfig`
 * handed to the pipeline.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (CRIME_LENS_*)
 * 3. Config file (.crime-lensrc or --config path)
 * 4. Default values
 *
 * @module cli/lib/config
 */

import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { createPipelineConfig, type PipelineConfig } from '../../core/config.js';
import { ConfigError, errorMessage } from '../../core/errors.js';
import { parseLogLevel, type LogLevel } from '../../core/utils/logger.js';

// ============================================================================
// Configuration Types
// ============================================================================

export interface CLIConfig {
  readonly pipeline: PipelineConfig;
  readonly logLevel: LogLevel;
  /** Machine-readable output */
  readonly json: boolean;
  /** Resolved config file path */
  readonly configPath: string | null;
}

// ============================================================================
// Config File Schema
// ============================================================================

const countSchema = z.number().int().min(0);
const rateSchema = z.number().min(0).max(1);

const BoundsSchema = z
  .object({
    minLat: z.number().min(-90).max(90),
    maxLat: z.number().min(-90).max(90),
    minLon: z.number().min(-180).max(180),
    maxLon: z.number().min(-180).max(180),
  })
  .partial()
  .strict();

export const ConfigFileSchema = z
  .object({
    version: z.literal(1).optional(),
    title: z.string().min(1).optional(),
    logLevel: z.enum(['debug', 'info', 'warn', 'error']).optional(),
    paths: z
      .object({
        input: z.string().min(1),
        output: z.string().min(1),
      })
      .partial()
      .strict()
      .optional(),
    analysis: z
      .object({
        topCrimeTypes: countSchema,
        trendTypes: countSchema,
        topAreas: countSchema,
        topLocations: countSchema,
        markerPrecision: z.number().int().min(0).max(10),
        clusterSampleSize: countSchema,
        bounds: BoundsSchema,
      })
      .partial()
      .strict()
      .optional(),
    thresholds: z
      .object({
        rejectRate: rateSchema,
        exclusionRate: rateSchema,
      })
      .partial()
      .strict()
      .optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ============================================================================
// Configuration Loading
// ============================================================================

/**
 * Standard config file names to search for
 */
const CONFIG_FILE_NAMES = [
  '.crime-lensrc',
  '.crime-lensrc.yaml',
  '.crime-lensrc.yml',
  '.crime-lensrc.json',
];

/**
 * Find config file in the start directory or its parents
 */
export function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    const parent = resolve(dir, '..');
    if (parent === dir) return null;
    dir = parent;
  }
}

/**
 * Read and validate a config file
 *
 * @throws ConfigError on unreadable, malformed or invalid content
 */
export function parseConfigFile(filePath: string): ConfigFile {
  let raw: unknown;
  try {
    const content = readFileSync(filePath, 'utf-8');
    // YAML is a superset of JSON, but JSON files get JSON's error messages
    raw = filePath.endsWith('.json') ? JSON.parse(content) : parseYaml(content);
  } catch (error) {
    throw new ConfigError(`Cannot read config file ${filePath}: ${errorMessage(error)}`, filePath);
  }

  // An empty YAML document parses to null
  const result = ConfigFileSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigError(
      `Invalid config file ${filePath}`,
      filePath,
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return result.data;
}

/**
 * Load configuration options
 */
export interface LoadConfigOptions {
  /** Explicit config file path */
  readonly configPath?: string;
  /** CLI flag overrides */
  readonly overrides?: {
    readonly input?: string;
    readonly output?: string;
    readonly title?: string;
    readonly logLevel?: string;
    readonly json?: boolean;
  };
  /** Environment to read CRIME_LENS_* from (default: process.env) */
  readonly env?: NodeJS.ProcessEnv;
  /** Directory the config search starts from (default: process.cwd()) */
  readonly cwd?: string;
}

function resolveConfigPath(options: LoadConfigOptions, env: NodeJS.ProcessEnv): string | null {
  const cwd = options.cwd ?? process.cwd();
  const explicit = options.configPath ?? env.CRIME_LENS_CONFIG;

  if (explicit) {
    const configPath = resolve(cwd, explicit);
    if (!existsSync(configPath)) {
      throw new ConfigError(`Config file not found: ${configPath}`, configPath);
    }
    return configPath;
  }
  return findConfigFile(cwd);
}

function resolveLogLevel(value: string | undefined, source: string, configPath: string | null): LogLevel | undefined {
  if (value === undefined) return undefined;
  const level = parseLogLevel(value);
  if (!level) {
    throw new ConfigError(`Invalid log level from ${source}: ${value}`, configPath, [
      'expected one of: debug, info, warn, error',
    ]);
  }
  return level;
}

/**
 * Load and merge configuration from all sources
 *
 * @throws ConfigError when a file or override is invalid
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<CLIConfig> {
  const env = options.env ?? process.env;
  const overrides = options.overrides ?? {};

  const configPath = resolveConfigPath(options, env);
  const fileConfig: ConfigFile = configPath ? parseConfigFile(configPath) : {};

  const input = overrides.input ?? env.CRIME_LENS_INPUT ?? fileConfig.paths?.input;
  const output = overrides.output ?? env.CRIME_LENS_OUTPUT_DIR ?? fileConfig.paths?.output;
  const title = overrides.title ?? fileConfig.title;

  const pipeline = createPipelineConfig({
    ...(title !== undefined && { title }),
    paths: {
      ...(input !== undefined && { input }),
      ...(output !== undefined && { output }),
    },
    ...(fileConfig.analysis && { analysis: fileConfig.analysis }),
    ...(fileConfig.thresholds && { thresholds: fileConfig.thresholds }),
  });

  const { bounds } = pipeline.analysis;
  if (bounds.minLat > bounds.maxLat || bounds.minLon > bounds.maxLon) {
    throw new ConfigError('Invalid study bounds', configPath, [
      `analysis.bounds: minimum exceeds maximum (${bounds.minLat}..${bounds.maxLat}, ${bounds.minLon}..${bounds.maxLon})`,
    ]);
  }

  const logLevel =
    resolveLogLevel(overrides.logLevel, 'command line', configPath) ??
    resolveLogLevel(env.CRIME_LENS_LOG_LEVEL, 'CRIME_LENS_LOG_LEVEL', configPath) ??
    fileConfig.logLevel ??
    'info';

  return Object.freeze({
    pipeline,
    logLevel,
    json: overrides.json ?? false,
    configPath,
  });
}
