/**
 * Crime Lens Core Types
 *
 * Shared data model for the ingestion → cleaning → aggregation → reporting
 * pipeline. Every value here is a derived, read-only snapshot computed once
 * per pipeline run.
 *
 * TYPE SAFETY: No `any`, no loose casts. Absent coordinates are `null`.
 */

// ============================================================================
// Raw Input
// ============================================================================

/**
 * One raw input row: column header → cell text
 */
export type RawRow = Readonly<Record<string, string>>;

/**
 * Parsed tabular input (header order preserved)
 */
export interface RawTable {
  readonly columns: readonly string[];
  readonly rows: readonly RawRow[];
  /** Files the table was read from (empty for in-memory input) */
  readonly sources: readonly string[];
}

// ============================================================================
// Records
// ============================================================================

/**
 * Calendar month in `YYYY-MM` form (sorts chronologically as a string)
 */
export type YearMonth = string;

/**
 * One crime incident after type coercion
 */
export interface CrimeRecord {
  /** Opaque source identifier; may be empty or repeated */
  readonly id: string;
  readonly month: YearMonth;
  readonly crimeType: string;
  readonly locationText: string;
  /** LSOA (statistical area) label */
  readonly areaName: string;
  /** `null` when the source value is absent or not a finite number */
  readonly latitude: number | null;
  readonly longitude: number | null;
  readonly outcome: string;
}

/**
 * A row the ingestor refused to admit
 */
export interface RowRejected {
  readonly row: RawRow;
  /** 1-based data row number (header excluded) */
  readonly rowNumber: number;
  readonly reason: RejectReason;
}

export type RejectReason = 'unparseable date';

export interface IngestionResult {
  readonly records: readonly CrimeRecord[];
  readonly rejects: readonly RowRejected[];
}

// ============================================================================
// Cleaning
// ============================================================================

/**
 * Aggregation dimensions a record may be excluded from
 */
export type AnalysisDimension = 'type' | 'geo' | 'area';

export type UnusableReason =
  | 'missing crime type'
  | 'missing coordinates'
  | 'coordinates out of bounds'
  | 'missing area name';

/**
 * A record excluded from one dimension (non-fatal)
 */
export interface FieldUnusable {
  /** Index into `CleanedRecords.all` */
  readonly recordIndex: number;
  readonly dimension: AnalysisDimension;
  readonly reason: UnusableReason;
}

/**
 * Inclusive latitude/longitude box of the study region
 */
export interface StudyBounds {
  readonly minLat: number;
  readonly maxLat: number;
  readonly minLon: number;
  readonly maxLon: number;
}

export interface CleanedRecords {
  readonly all: readonly CrimeRecord[];
  readonly forTypeAnalysis: readonly CrimeRecord[];
  readonly forGeoAnalysis: readonly CrimeRecord[];
  readonly forAreaAnalysis: readonly CrimeRecord[];
  readonly exclusions: Readonly<Record<AnalysisDimension, number>>;
  readonly issues: readonly FieldUnusable[];
}

// ============================================================================
// Aggregation
// ============================================================================

export type AggregationDimension = 'crime-type' | 'area' | 'outcome';

/**
 * One ranked group
 */
export interface RankedEntry {
  readonly key: string;
  readonly count: number;
  /** Percentage of the result total, rounded to 2 decimal places */
  readonly share: number;
}

export interface AggregationResult {
  readonly dimension: AggregationDimension;
  /** Group key → count for every entry in `ranking` */
  readonly counts: ReadonlyMap<string, number>;
  /** Count descending, ties by key */
  readonly ranking: readonly RankedEntry[];
  /** Number of records aggregated (before any top-N truncation) */
  readonly total: number;
  /** Number of distinct groups (before any top-N truncation) */
  readonly distinctKeys: number;
}

export interface MonthCount {
  readonly month: YearMonth;
  readonly count: number;
}

export interface MonthlyTrend {
  /** Every distinct month present in the cleaned dataset, ascending */
  readonly months: readonly YearMonth[];
  /** Crime type → one entry per month; insertion order is rank order */
  readonly series: ReadonlyMap<string, readonly MonthCount[]>;
}

// ============================================================================
// Geospatial
// ============================================================================

export interface GeoPoint {
  readonly latitude: number;
  readonly longitude: number;
  readonly weight: number;
}

export interface AreaStat {
  readonly areaName: string;
  readonly centroidLat: number;
  readonly centroidLon: number;
  readonly totalCount: number;
  /** Mode of member crime types; `null` when no member carries one */
  readonly topCrimeType: string | null;
  /** Up to five most frequent crime types in the area */
  readonly breakdown: readonly RankedEntry[];
}

/**
 * Most common area/crime type observed at a rounded coordinate
 */
export interface LocationDetail {
  readonly areaName: string | null;
  readonly topCrimeType: string | null;
}

// ============================================================================
// Report
// ============================================================================

export interface DangerousLocation {
  readonly rank: number;
  readonly latitude: number;
  readonly longitude: number;
  readonly weight: number;
  readonly areaName: string | null;
  readonly topCrimeType: string | null;
}

export interface SummaryFacts {
  readonly totalRecordsProcessed: number;
  readonly totalAccepted: number;
  readonly totalRejected: number;
  readonly mostCommonCrimeType: RankedEntry | null;
  readonly mostAffectedArea: RankedEntry | null;
  readonly mostCommonOutcome: RankedEntry | null;
  readonly dateRange: { readonly first: YearMonth; readonly last: YearMonth } | null;
  readonly distinctCrimeTypes: number;
  readonly distinctAreas: number;
  readonly recordsWithCoordinates: number;
}

/**
 * Accepted/rejected/excluded counts so no record disappears silently
 */
export interface RecordAccounting {
  readonly processed: number;
  readonly accepted: number;
  readonly rejected: number;
  readonly excluded: Readonly<Record<AnalysisDimension, number>>;
  readonly usable: Readonly<Record<AnalysisDimension, number>>;
}

export interface Summary {
  readonly facts: SummaryFacts;
  readonly accounting: RecordAccounting;
  readonly dangerousLocations: readonly DangerousLocation[];
  readonly crimeTypes: AggregationResult;
  readonly monthlyTrend: MonthlyTrend;
  readonly areas: AggregationResult;
  readonly outcomes: AggregationResult;
  readonly warnings: readonly PipelineWarning[];
}

// ============================================================================
// Pipeline Outcome
// ============================================================================

export type PipelineWarning =
  | {
      readonly kind: 'rows-rejected';
      readonly count: number;
      readonly reasons: Readonly<Partial<Record<RejectReason, number>>>;
    }
  | {
      readonly kind: 'high-reject-rate';
      readonly rate: number;
      readonly threshold: number;
    }
  | {
      readonly kind: 'dimension-excluded';
      readonly dimension: AnalysisDimension;
      readonly excluded: number;
      readonly rate: number;
      readonly threshold: number;
    }
  | {
      readonly kind: 'empty-aggregation';
      readonly dimension: AnalysisDimension;
    };

export type FailureReason =
  | { readonly kind: 'ingestion'; readonly message: string; readonly missingColumns: readonly string[] }
  | { readonly kind: 'unreadable-input'; readonly message: string }
  | { readonly kind: 'empty-dataset'; readonly message: string; readonly rejected: number };

/**
 * Everything the renderers need beyond the summary itself
 */
export interface GeoSummary {
  readonly densityPoints: readonly GeoPoint[];
  readonly markerPoints: readonly GeoPoint[];
  readonly areaClusters: readonly AreaStat[];
  readonly clusterSample: readonly GeoPoint[];
}

export type PipelineOutcome =
  | { readonly status: 'success'; readonly summary: Summary; readonly geo: GeoSummary }
  | {
      readonly status: 'partial-success';
      readonly summary: Summary;
      readonly geo: GeoSummary;
      readonly warnings: readonly PipelineWarning[];
    }
  | { readonly status: 'failure'; readonly reason: FailureReason };
