/**
 * Crime Analysis Pipeline
 *
 * Ingestor → Cleaner → {Aggregator, Geospatial Summarizer} → Report Assembler
 * → renderers. `analyze` is synchronous and pure apart from logging;
 * `runPipeline` adds source loading and artifact rendering.
 *
 * Fatal conditions (missing columns, unreadable input, zero accepted
 * records) become a `failure` outcome. Everything else is accumulated as
 * warnings on the summary.
 *
 * @module pipeline/crime-pipeline
 */

import { areaCounts, crimeTypeCounts, monthlyTrend, outcomeDistribution } from '../aggregation/aggregator.js';
import { clean } from '../cleaning/cleaner.js';
import { DEFAULT_PIPELINE_CONFIG, type PipelineConfig, type ThresholdsConfig } from '../core/config.js';
import { EmptyDatasetError, IngestionError } from '../core/errors.js';
import type {
  AnalysisDimension,
  CleanedRecords,
  FailureReason,
  GeoSummary,
  IngestionResult,
  PipelineOutcome,
  PipelineWarning,
  RawTable,
  RejectReason,
  Summary,
} from '../core/types.js';
import { formatDuration } from '../core/utils/format.js';
import { logger as defaultLogger, type Logger } from '../core/utils/logger.js';
import { areaClusters, densityPoints, describeLocations, markerPoints, samplePoints } from '../geo/geo-summarizer.js';
import { loadCrimeCsvSources } from '../ingestion/csv-sources.js';
import { ingest } from '../ingestion/record-ingestor.js';
import { assemble } from '../report/report-assembler.js';
import type { Artifact, Renderer } from '../rendering/types.js';

const DIMENSIONS: readonly AnalysisDimension[] = ['type', 'geo', 'area'];

export interface PipelineOptions {
  readonly logger?: Logger;
}

export interface PipelineRun {
  readonly outcome: PipelineOutcome;
  readonly artifacts: readonly Artifact[];
  readonly durationMs: number;
}

// ============================================================================
// Warnings
// ============================================================================

function usableCount(cleaned: CleanedRecords, dimension: AnalysisDimension): number {
  switch (dimension) {
    case 'type':
      return cleaned.forTypeAnalysis.length;
    case 'geo':
      return cleaned.forGeoAnalysis.length;
    case 'area':
      return cleaned.forAreaAnalysis.length;
  }
}

/**
 * Non-fatal conditions worth surfacing for a run
 */
export function collectWarnings(
  ingestion: IngestionResult,
  cleaned: CleanedRecords,
  thresholds: ThresholdsConfig
): PipelineWarning[] {
  const warnings: PipelineWarning[] = [];
  const rejected = ingestion.rejects.length;
  const processed = rejected + ingestion.records.length;

  if (rejected > 0) {
    const reasons: Partial<Record<RejectReason, number>> = {};
    for (const reject of ingestion.rejects) {
      reasons[reject.reason] = (reasons[reject.reason] ?? 0) + 1;
    }
    warnings.push({ kind: 'rows-rejected', count: rejected, reasons });

    const rate = rejected / processed;
    if (rate > thresholds.rejectRate) {
      warnings.push({ kind: 'high-reject-rate', rate, threshold: thresholds.rejectRate });
    }
  }

  const accepted = cleaned.all.length;
  if (accepted === 0) return warnings;

  for (const dimension of DIMENSIONS) {
    if (usableCount(cleaned, dimension) === 0) {
      warnings.push({ kind: 'empty-aggregation', dimension });
      continue;
    }
    const excluded = cleaned.exclusions[dimension];
    const rate = excluded / accepted;
    if (rate > thresholds.exclusionRate) {
      warnings.push({
        kind: 'dimension-excluded',
        dimension,
        excluded,
        rate,
        threshold: thresholds.exclusionRate,
      });
    }
  }

  return warnings;
}

/**
 * Map a fatal data error to the failure it reports; null for anything else
 */
export function failureFrom(error: unknown): FailureReason | null {
  if (error instanceof IngestionError) {
    return error.code === 'UNREADABLE_INPUT'
      ? { kind: 'unreadable-input', message: error.message }
      : { kind: 'ingestion', message: error.message, missingColumns: error.missingColumns };
  }
  if (error instanceof EmptyDatasetError) {
    return { kind: 'empty-dataset', message: error.message, rejected: error.rejected };
  }
  return null;
}

// ============================================================================
// Analyze
// ============================================================================

/**
 * Run ingestion through report assembly on an in-memory table
 *
 * @throws only for unexpected (programming) errors; data problems are
 *   returned as a `failure` outcome or as warnings
 */
export function analyze(
  table: RawTable,
  config: PipelineConfig = DEFAULT_PIPELINE_CONFIG,
  options: PipelineOptions = {}
): PipelineOutcome {
  const log = (options.logger ?? defaultLogger).child({ stage: 'analyze' });
  const { analysis, thresholds } = config;

  let ingestion: IngestionResult;
  try {
    ingestion = ingest(table.rows, { columns: table.columns, source: table.sources.join(', ') || undefined });
  } catch (error) {
    const reason = failureFrom(error);
    if (!reason) throw error;
    log.error('Ingestion failed', { reason: reason.message });
    return { status: 'failure', reason };
  }

  const processed = table.rows.length;
  const rejected = ingestion.rejects.length;
  log.info('Ingested records', { processed, accepted: ingestion.records.length, rejected });
  for (const reject of ingestion.rejects) {
    log.debug('Row rejected', { rowNumber: reject.rowNumber, reason: reject.reason });
  }

  if (ingestion.records.length === 0) {
    const message = `No usable records: ${processed} row(s) read, ${rejected} rejected`;
    log.error('Empty dataset', { processed, rejected });
    return { status: 'failure', reason: { kind: 'empty-dataset', message, rejected } };
  }

  const cleaned = clean(ingestion.records, { bounds: analysis.bounds });
  log.info('Cleaned records', {
    forTypeAnalysis: cleaned.forTypeAnalysis.length,
    forGeoAnalysis: cleaned.forGeoAnalysis.length,
    forAreaAnalysis: cleaned.forAreaAnalysis.length,
  });
  for (const issue of cleaned.issues) {
    log.debug('Field unusable', { recordIndex: issue.recordIndex, dimension: issue.dimension, reason: issue.reason });
  }

  const crimeTypes = crimeTypeCounts(cleaned);
  const trend = monthlyTrend(cleaned, analysis.trendTypes);
  const areas = areaCounts(cleaned, analysis.topAreas);
  const outcomes = outcomeDistribution(cleaned);

  const density = densityPoints(cleaned);
  const markers = markerPoints(cleaned, analysis.topLocations, analysis.markerPrecision);
  const geo: GeoSummary = {
    densityPoints: density,
    markerPoints: markers,
    areaClusters: areaClusters(cleaned),
    clusterSample: samplePoints(density, analysis.clusterSampleSize),
  };

  const warnings = collectWarnings(ingestion, cleaned, thresholds);
  for (const warning of warnings) {
    log.warn('Pipeline warning', { ...warning });
  }

  let summary: Summary;
  try {
    summary = assemble({
      crimeTypes,
      monthlyTrend: trend,
      areas,
      outcomes,
      markers,
      ingestion: { processed, accepted: ingestion.records.length, rejected },
      cleaned,
      locationDetails: describeLocations(cleaned, markers, analysis.markerPrecision),
      markerPrecision: analysis.markerPrecision,
      warnings,
    });
  } catch (error) {
    const reason = failureFrom(error);
    if (!reason) throw error;
    return { status: 'failure', reason };
  }

  return warnings.length > 0
    ? { status: 'partial-success', summary, geo, warnings }
    : { status: 'success', summary, geo };
}

// ============================================================================
// Rendering
// ============================================================================

/**
 * Render every artifact whose underlying aggregation has data
 */
export async function renderArtifacts(
  outcome: Exclude<PipelineOutcome, { status: 'failure' }>,
  renderer: Renderer,
  config: PipelineConfig = DEFAULT_PIPELINE_CONFIG
): Promise<Artifact[]> {
  const { summary, geo } = outcome;
  const { title } = config;
  const usable = summary.accounting.usable;
  const artifacts: Artifact[] = [];

  if (usable.type > 0) {
    artifacts.push(
      await renderer.renderChart({
        kind: 'crime_type_bar',
        title: `Top ${config.analysis.topCrimeTypes} Crime Types - ${title}`,
        data: summary.crimeTypes,
        limit: config.analysis.topCrimeTypes,
      })
    );
    artifacts.push(
      await renderer.renderChart({
        kind: 'monthly_trend_lines',
        title: `Monthly Crime Trends - Top ${summary.monthlyTrend.series.size} Crime Types`,
        data: summary.monthlyTrend,
      })
    );
  }

  if (usable.area > 0) {
    artifacts.push(
      await renderer.renderChart({
        kind: 'area_bar',
        title: `Top ${summary.areas.ranking.length} High-Crime Areas - ${title}`,
        data: summary.areas,
      })
    );
  }

  artifacts.push(
    await renderer.renderChart({
      kind: 'outcome_pie',
      title: 'Distribution of Crime Outcomes',
      data: summary.outcomes,
    })
  );

  if (usable.geo > 0) {
    artifacts.push(
      await renderer.renderMap({ kind: 'heatmap', title: `Crime Density - ${title}`, points: geo.densityPoints })
    );
    artifacts.push(
      await renderer.renderMap({
        kind: 'markers',
        title: `High-Crime Locations - ${title}`,
        locations: summary.dangerousLocations,
      })
    );
    artifacts.push(await renderer.writeTable({ kind: 'dangerous-locations', rows: summary.dangerousLocations }));
  }

  if (geo.areaClusters.length > 0) {
    artifacts.push(
      await renderer.renderMap({
        kind: 'clusters',
        title: `Crime Clusters by Area - ${title}`,
        areas: geo.areaClusters,
        points: geo.clusterSample,
      })
    );
  }

  artifacts.push(
    await renderer.writeTable({ kind: 'summary', title: `${title.toUpperCase()} - SUMMARY REPORT`, summary })
  );

  return artifacts;
}

/**
 * Load sources, analyze and render
 */
export async function runPipeline(
  config: PipelineConfig,
  renderer: Renderer,
  options: PipelineOptions = {}
): Promise<PipelineRun> {
  const log = (options.logger ?? defaultLogger).child({ stage: 'run' });
  const startTime = Date.now();

  let table: RawTable;
  try {
    log.info('Loading data', { input: config.paths.input });
    table = await loadCrimeCsvSources(config.paths.input);
  } catch (error) {
    const reason = failureFrom(error);
    if (!reason) throw error;
    log.error('Cannot load input', { reason: reason.message });
    return { outcome: { status: 'failure', reason }, artifacts: [], durationMs: Date.now() - startTime };
  }

  log.info('Loaded sources', { files: table.sources.length, rows: table.rows.length });
  const outcome = analyze(table, config, options);
  if (outcome.status === 'failure') {
    return { outcome, artifacts: [], durationMs: Date.now() - startTime };
  }

  const artifacts = await renderArtifacts(outcome, renderer, config);
  const durationMs = Date.now() - startTime;
  log.info('Pipeline complete', {
    status: outcome.status,
    artifacts: artifacts.length,
    duration: formatDuration(durationMs),
  });

  return { outcome, artifacts, durationMs };
}
