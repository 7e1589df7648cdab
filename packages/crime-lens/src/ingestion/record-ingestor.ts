/**
 * Record Ingestor
 *
 * Coerces raw rows into `CrimeRecord`s. Rows without a parseable month are
 * rejected; every other row is admitted, with unparseable coordinates set
 * to `null` so that each downstream aggregation decides exclusion itself.
 *
 * @module ingestion/record-ingestor
 */

import { COLUMNS, REQUIRED_COLUMNS } from '../core/constants.js';
import { IngestionError } from '../core/errors.js';
import type {
  CrimeRecord,
  IngestionResult,
  RawRow,
  RowRejected,
  YearMonth,
} from '../core/types.js';

export interface IngestOptions {
  /** Table header; defaults to the keys of the first row */
  readonly columns?: readonly string[];
  /** Source label used in error messages */
  readonly source?: string;
}

// ============================================================================
// Column Checks
// ============================================================================

/**
 * Required columns absent from `columns`
 */
export function findMissingColumns(columns: readonly string[]): string[] {
  const present = new Set(columns.map((c) => c.trim()));
  return REQUIRED_COLUMNS.filter((column) => !present.has(column));
}

/**
 * @throws IngestionError (MISSING_COLUMNS) naming every absent column
 */
export function assertRequiredColumns(columns: readonly string[], source?: string): void {
  const missing = findMissingColumns(columns);
  if (missing.length > 0) {
    const where = source ? ` in ${source}` : '';
    throw new IngestionError(
      `Missing required column(s)${where}: ${missing.join(', ')}`,
      'MISSING_COLUMNS',
      missing,
      source
    );
  }
}

// ============================================================================
// Field Coercion
// ============================================================================

const YEAR_MONTH = /^(\d{4})[-/](\d{1,2})$/;
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})(?:[T ][\d:.]+(?:Z|[+-]\d{2}:?\d{2})?)?$/;
const DECIMAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?$/i;

/**
 * Parse a month cell to `YYYY-MM`, or null when it is not a valid month
 */
export function parseMonth(value: string): YearMonth | null {
  const text = value.trim();
  const match = YEAR_MONTH.exec(text) ?? ISO_DATE.exec(text);
  if (!match) return null;

  const [, year, month, day] = match;
  if (year === undefined || month === undefined) return null;

  const monthNumber = Number(month);
  if (monthNumber < 1 || monthNumber > 12) return null;
  if (day !== undefined) {
    const dayNumber = Number(day);
    if (dayNumber < 1 || dayNumber > 31) return null;
  }

  return `${year}-${String(monthNumber).padStart(2, '0')}`;
}

/**
 * Parse a coordinate cell, or null when absent or not a finite decimal
 */
export function parseCoordinate(value: string): number | null {
  const text = value.trim();
  if (!DECIMAL.test(text)) return null;
  const parsed = Number(text);
  return Number.isFinite(parsed) ? parsed : null;
}

function field(row: RawRow, column: string): string {
  return (row[column] ?? '').trim();
}

// ============================================================================
// Ingest
// ============================================================================

/**
 * Validate and coerce raw rows
 *
 * @throws IngestionError when a required column is missing; checked before
 *   any row is processed
 */
export function ingest(rows: readonly RawRow[], options: IngestOptions = {}): IngestionResult {
  const firstRow = rows[0];
  const columns = options.columns ?? (firstRow ? Object.keys(firstRow) : []);
  if (columns.length > 0 || rows.length > 0) {
    assertRequiredColumns(columns, options.source);
  }

  const records: CrimeRecord[] = [];
  const rejects: RowRejected[] = [];

  rows.forEach((row, index) => {
    const month = parseMonth(field(row, COLUMNS.month));
    if (month === null) {
      rejects.push({ row, rowNumber: index + 1, reason: 'unparseable date' });
      return;
    }

    records.push({
      id: field(row, COLUMNS.id),
      month,
      crimeType: field(row, COLUMNS.crimeType),
      locationText: field(row, COLUMNS.location),
      areaName: field(row, COLUMNS.areaName),
      latitude: parseCoordinate(field(row, COLUMNS.latitude)),
      longitude: parseCoordinate(field(row, COLUMNS.longitude)),
      outcome: field(row, COLUMNS.outcome),
    });
  });

  return { records, rejects };
}
