/**
 * Crime Lens
 *
 * Street-level crime CSV ingestion, cleaning, aggregation, geospatial
 * summaries and chart/map artifact generation.
 *
 * @packageDocumentation
 */

// Core
export * from './core/types.js';
export * from './core/errors.js';
export * from './core/constants.js';
export { DEFAULT_PIPELINE_CONFIG, createPipelineConfig } from './core/config.js';
export type {
  AnalysisConfig,
  PathsConfig,
  PipelineConfig,
  PipelineConfigOverrides,
  ThresholdsConfig,
} from './core/config.js';
export { Logger, createLogger, logger, type LogLevel } from './core/utils/logger.js';

// Stages
export { readCrimeCsv, parseCsvRecords } from './ingestion/csv-reader.js';
export { ingest, parseMonth, parseCoordinate, findMissingColumns } from './ingestion/record-ingestor.js';
export { loadCrimeCsvSources, mergeCrimeCsvFiles, findCsvFiles } from './ingestion/csv-sources.js';
export { clean, normalizeLabel } from './cleaning/cleaner.js';
export { crimeTypeCounts, monthlyTrend, areaCounts, outcomeDistribution } from './aggregation/aggregator.js';
export {
  densityPoints,
  markerPoints,
  areaClusters,
  describeLocations,
  samplePoints,
} from './geo/geo-summarizer.js';
export { toPointCollection, toAreaCollection } from './geo/geojson.js';
export { assemble, buildDangerousLocations } from './report/report-assembler.js';
export { formatSummaryReport, describeWarning } from './report/summary-text.js';

// Pipeline
export {
  analyze,
  collectWarnings,
  renderArtifacts,
  runPipeline,
  type PipelineOptions,
  type PipelineRun,
} from './pipeline/crime-pipeline.js';

// Rendering
export * from './rendering/types.js';
export { FileRenderer, type FileRendererOptions } from './rendering/file-renderer.js';
export { buildChartSpec, type ChartSpec } from './rendering/chart-spec.js';
export { buildMapSpec, type MapSpec } from './rendering/map-spec.js';

// Configuration loading
export { loadConfig, type CLIConfig, type LoadConfigOptions } from './cli/lib/config.js';
