/**
 * Cleaner
 *
 * Normalizes category labels and splits ingested records into one view per
 * analysis dimension. A record failing one usability predicate is excluded
 * from that dimension only.
 *
 * @module cleaning/cleaner
 */

import { DEFAULT_STUDY_BOUNDS } from '../core/constants.js';
import type {
  AnalysisDimension,
  CleanedRecords,
  CrimeRecord,
  FieldUnusable,
  StudyBounds,
  UnusableReason,
} from '../core/types.js';

export interface CleanOptions {
  readonly bounds?: StudyBounds;
}

/**
 * Trim and collapse internal whitespace
 */
export function normalizeLabel(value: string): string {
  return value.trim().replace(/\s+/g, ' ');
}

function normalizeRecord(record: CrimeRecord): CrimeRecord {
  return {
    ...record,
    crimeType: normalizeLabel(record.crimeType),
    locationText: normalizeLabel(record.locationText),
    areaName: normalizeLabel(record.areaName),
    outcome: normalizeLabel(record.outcome),
  };
}

// ============================================================================
// Usability Predicates
// ============================================================================

/**
 * Why a record cannot be placed on a map, or null when it can
 */
export function geoUnusableReason(
  record: CrimeRecord,
  bounds: StudyBounds = DEFAULT_STUDY_BOUNDS
): UnusableReason | null {
  const { latitude, longitude } = record;
  if (latitude === null || longitude === null) {
    return 'missing coordinates';
  }
  if (
    latitude < bounds.minLat ||
    latitude > bounds.maxLat ||
    longitude < bounds.minLon ||
    longitude > bounds.maxLon
  ) {
    return 'coordinates out of bounds';
  }
  return null;
}

export function isGeoUsable(record: CrimeRecord, bounds: StudyBounds = DEFAULT_STUDY_BOUNDS): boolean {
  return geoUnusableReason(record, bounds) === null;
}

export function isAreaUsable(record: CrimeRecord): boolean {
  return record.areaName !== '';
}

export function isTypeUsable(record: CrimeRecord): boolean {
  return record.crimeType !== '';
}

// ============================================================================
// Clean
// ============================================================================

/**
 * Build the per-dimension views. Input order is preserved in every view.
 */
export function clean(records: readonly CrimeRecord[], options: CleanOptions = {}): CleanedRecords {
  const bounds = options.bounds ?? DEFAULT_STUDY_BOUNDS;
  const all = records.map(normalizeRecord);

  const forTypeAnalysis: CrimeRecord[] = [];
  const forGeoAnalysis: CrimeRecord[] = [];
  const forAreaAnalysis: CrimeRecord[] = [];
  const issues: FieldUnusable[] = [];
  const exclusions: Record<AnalysisDimension, number> = { type: 0, geo: 0, area: 0 };

  const exclude = (recordIndex: number, dimension: AnalysisDimension, reason: UnusableReason): void => {
    exclusions[dimension]++;
    issues.push({ recordIndex, dimension, reason });
  };

  all.forEach((record, index) => {
    if (isTypeUsable(record)) {
      forTypeAnalysis.push(record);
    } else {
      exclude(index, 'type', 'missing crime type');
    }

    const geoReason = geoUnusableReason(record, bounds);
    if (geoReason === null) {
      forGeoAnalysis.push(record);
    } else {
      exclude(index, 'geo', geoReason);
    }

    if (isAreaUsable(record)) {
      forAreaAnalysis.push(record);
    } else {
      exclude(index, 'area', 'missing area name');
    }
  });

  return { all, forTypeAnalysis, forGeoAnalysis, forAreaAnalysis, exclusions, issues };
}
