/**
 * Crime Lens Constants
 *
 * Column names follow the police.uk street-level crime CSV export.
 */

import type { StudyBounds } from './types.js';

// ============================================================================
// Input Columns
// ============================================================================

export const COLUMNS = {
  id: 'Crime ID',
  month: 'Month',
  crimeType: 'Crime type',
  location: 'Location',
  areaName: 'LSOA name',
  latitude: 'Latitude',
  longitude: 'Longitude',
  outcome: 'Last outcome category',
} as const;

/**
 * Columns that must be present in every input table
 */
export const REQUIRED_COLUMNS: readonly string[] = Object.values(COLUMNS);

// ============================================================================
// Analysis Defaults
// ============================================================================

/**
 * Bucket used for records with no outcome
 */
export const OUTCOME_NOT_SPECIFIED = 'Not specified';

/**
 * Decimal places used to merge near-duplicate geocodes
 */
export const DEFAULT_MARKER_PRECISION = 5;

/**
 * Default file name written by `merge` into the input directory
 */
export const MERGED_FILE_NAME = 'merged.csv';

/**
 * Rows in the dangerous-locations table
 */
export const DANGEROUS_LOCATIONS_LIMIT = 20;

/**
 * Crime types listed in an area cluster popup
 */
export const AREA_BREAKDOWN_SIZE = 5;

/**
 * Cambridgeshire, with margin
 */
export const DEFAULT_STUDY_BOUNDS: StudyBounds = {
  minLat: 51.9,
  maxLat: 52.8,
  minLon: -0.6,
  maxLon: 0.6,
};
