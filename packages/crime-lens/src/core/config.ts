/**
 * Pipeline configuration value
 *
 * The pipeline receives one frozen `PipelineConfig`; nothing reads
 * configuration from process-wide state. See `cli/lib/config.ts` for the
 * file/env/flag loader that produces it.
 */

import {
  DANGEROUS_LOCATIONS_LIMIT,
  DEFAULT_MARKER_PRECISION,
  DEFAULT_STUDY_BOUNDS,
} from './constants.js';
import type { StudyBounds } from './types.js';

export interface PathsConfig {
  /** CSV file, or directory of monthly CSV files */
  readonly input: string;
  /** Root of charts/, maps/, data/ and reports/ */
  readonly output: string;
}

export interface AnalysisConfig {
  /** Bars on the crime type chart */
  readonly topCrimeTypes: number;
  /** Series on the monthly trend chart */
  readonly trendTypes: number;
  /** Bars on the area chart */
  readonly topAreas: number;
  /** Markers on the marker map */
  readonly topLocations: number;
  /** Decimal places used to merge near-duplicate geocodes */
  readonly markerPrecision: number;
  /** Individual points drawn on the cluster map */
  readonly clusterSampleSize: number;
  readonly bounds: StudyBounds;
}

export interface ThresholdsConfig {
  /** Rejected / processed above which a warning is raised */
  readonly rejectRate: number;
  /** Excluded / accepted, per dimension, above which a warning is raised */
  readonly exclusionRate: number;
}

export interface PipelineConfig {
  /** Heading used in reports, charts and maps */
  readonly title: string;
  readonly paths: PathsConfig;
  readonly analysis: AnalysisConfig;
  readonly thresholds: ThresholdsConfig;
}

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = Object.freeze({
  title: 'Crime Analysis',
  paths: Object.freeze({
    input: './data/raw',
    output: './output',
  }),
  analysis: Object.freeze({
    topCrimeTypes: 10,
    trendTypes: 5,
    topAreas: 15,
    topLocations: DANGEROUS_LOCATIONS_LIMIT,
    markerPrecision: DEFAULT_MARKER_PRECISION,
    clusterSampleSize: 5000,
    bounds: DEFAULT_STUDY_BOUNDS,
  }),
  thresholds: Object.freeze({
    rejectRate: 0.05,
    exclusionRate: 0.25,
  }),
});

/**
 * Partial overrides, merged section by section
 */
export interface PipelineConfigOverrides {
  readonly title?: string;
  readonly paths?: Partial<PathsConfig>;
  readonly analysis?: Partial<Omit<AnalysisConfig, 'bounds'>> & { readonly bounds?: Partial<StudyBounds> };
  readonly thresholds?: Partial<ThresholdsConfig>;
}

/**
 * Merge overrides onto a base config and freeze the result
 */
export function createPipelineConfig(
  overrides: PipelineConfigOverrides = {},
  base: PipelineConfig = DEFAULT_PIPELINE_CONFIG
): PipelineConfig {
  return Object.freeze({
    title: overrides.title ?? base.title,
    paths: Object.freeze({ ...base.paths, ...overrides.paths }),
    analysis: Object.freeze({
      ...base.analysis,
      ...overrides.analysis,
      bounds: Object.freeze({ ...base.analysis.bounds, ...overrides.analysis?.bounds }),
    }),
    thresholds: Object.freeze({ ...base.thresholds, ...overrides.thresholds }),
  });
}
