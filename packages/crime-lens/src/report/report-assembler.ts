/**
 * Report Assembler
 *
 * Merges aggregation outputs into the run `Summary`: headline facts, the
 * dangerous-locations table and per-dimension record accounting.
 *
 * @module report/report-assembler
 */

import { DANGEROUS_LOCATIONS_LIMIT, DEFAULT_MARKER_PRECISION } from '../core/constants.js';
import { EmptyDatasetError } from '../core/errors.js';
import type {
  AggregationResult,
  CleanedRecords,
  DangerousLocation,
  GeoPoint,
  LocationDetail,
  MonthlyTrend,
  PipelineWarning,
  RankedEntry,
  RecordAccounting,
  Summary,
  SummaryFacts,
} from '../core/types.js';
import { compareGeoPoints, coordinateKey } from '../geo/geo-summarizer.js';

export interface IngestionCounts {
  /** Rows read from the source */
  readonly processed: number;
  readonly accepted: number;
  readonly rejected: number;
}

export interface AssembleInput {
  readonly crimeTypes: AggregationResult;
  readonly monthlyTrend: MonthlyTrend;
  readonly areas: AggregationResult;
  readonly outcomes: AggregationResult;
  readonly markers: readonly GeoPoint[];
  readonly ingestion: IngestionCounts;
  readonly cleaned: CleanedRecords;
  /** Keyed by `coordinateKey(lat, lon, markerPrecision)` */
  readonly locationDetails?: ReadonlyMap<string, LocationDetail>;
  readonly markerPrecision?: number;
  readonly warnings?: readonly PipelineWarning[];
}

/**
 * Top 20 marker points, weight descending, ties by coordinate
 */
export function buildDangerousLocations(
  markers: readonly GeoPoint[],
  details?: ReadonlyMap<string, LocationDetail>,
  precision: number = DEFAULT_MARKER_PRECISION
): DangerousLocation[] {
  return [...markers]
    .sort(compareGeoPoints)
    .slice(0, DANGEROUS_LOCATIONS_LIMIT)
    .map((point, index) => {
      const detail = details?.get(coordinateKey(point.latitude, point.longitude, precision));
      return {
        rank: index + 1,
        latitude: point.latitude,
        longitude: point.longitude,
        weight: point.weight,
        areaName: detail?.areaName ?? null,
        topCrimeType: detail?.topCrimeType ?? null,
      };
    });
}

function leader(result: AggregationResult): RankedEntry | null {
  return result.ranking[0] ?? null;
}

/**
 * Assemble the run summary
 *
 * @throws EmptyDatasetError when no record survived ingestion
 */
export function assemble(input: AssembleInput): Summary {
  const { ingestion, cleaned, monthlyTrend } = input;

  if (ingestion.accepted === 0 || cleaned.all.length === 0) {
    throw new EmptyDatasetError(
      `No usable records: ${ingestion.processed} row(s) read, ${ingestion.rejected} rejected`,
      ingestion.rejected
    );
  }

  const first = monthlyTrend.months[0];
  const last = monthlyTrend.months[monthlyTrend.months.length - 1];

  const facts: SummaryFacts = {
    totalRecordsProcessed: ingestion.processed,
    totalAccepted: ingestion.accepted,
    totalRejected: ingestion.rejected,
    mostCommonCrimeType: leader(input.crimeTypes),
    mostAffectedArea: leader(input.areas),
    mostCommonOutcome: leader(input.outcomes),
    dateRange: first !== undefined && last !== undefined ? { first, last } : null,
    distinctCrimeTypes: input.crimeTypes.distinctKeys,
    distinctAreas: input.areas.distinctKeys,
    recordsWithCoordinates: cleaned.forGeoAnalysis.length,
  };

  const accounting: RecordAccounting = {
    processed: ingestion.processed,
    accepted: ingestion.accepted,
    rejected: ingestion.rejected,
    excluded: { ...cleaned.exclusions },
    usable: {
      type: cleaned.forTypeAnalysis.length,
      geo: cleaned.forGeoAnalysis.length,
      area: cleaned.forAreaAnalysis.length,
    },
  };

  return {
    facts,
    accounting,
    dangerousLocations: buildDangerousLocations(
      input.markers,
      input.locationDetails,
      input.markerPrecision
    ),
    crimeTypes: input.crimeTypes,
    monthlyTrend,
    areas: input.areas,
    outcomes: input.outcomes,
    warnings: input.warnings ?? [],
  };
}
