/**
 * Geospatial Summarizer
 *
 * Derives map-ready structures from geo-usable records:
 * - densityPoints: raw point multiplicity for heatmaps
 * - markerPoints: incident counts per rounded coordinate
 * - areaClusters: per-area centroid, count and dominant crime type
 *
 * All functions are pure.
 *
 * @module geo/geo-summarizer
 */

import { AREA_BREAKDOWN_SIZE, DEFAULT_MARKER_PRECISION } from '../core/constants.js';
import type {
  AreaStat,
  CleanedRecords,
  CrimeRecord,
  GeoPoint,
  LocationDetail,
} from '../core/types.js';
import { assertTopN, compareKeys, modeOf, rankCounts } from '../core/utils/ranking.js';
import { isAreaUsable } from '../cleaning/cleaner.js';

// ============================================================================
// Coordinate Rounding
// ============================================================================

/**
 * Round to `precision` decimal places (negative zero becomes zero)
 */
export function roundCoordinate(value: number, precision: number = DEFAULT_MARKER_PRECISION): number {
  const rounded = Number(value.toFixed(precision));
  return rounded === 0 ? 0 : rounded;
}

/**
 * Grouping key for a rounded coordinate pair
 */
export function coordinateKey(
  latitude: number,
  longitude: number,
  precision: number = DEFAULT_MARKER_PRECISION
): string {
  return `${roundCoordinate(latitude, precision).toFixed(precision)},${roundCoordinate(longitude, precision).toFixed(precision)}`;
}

/**
 * Weight descending, then latitude, then longitude ascending
 */
export function compareGeoPoints(a: GeoPoint, b: GeoPoint): number {
  return b.weight - a.weight || a.latitude - b.latitude || a.longitude - b.longitude;
}

/**
 * Coordinates of a geo-usable record
 */
function coordinatesOf(record: CrimeRecord): [number, number] | null {
  if (record.latitude === null || record.longitude === null) return null;
  return [record.latitude, record.longitude];
}

// ============================================================================
// Density / Markers
// ============================================================================

/**
 * One weight-1 point per geo-usable record, in input order
 */
export function densityPoints(cleaned: CleanedRecords): GeoPoint[] {
  const points: GeoPoint[] = [];
  for (const record of cleaned.forGeoAnalysis) {
    const coords = coordinatesOf(record);
    if (coords) {
      points.push({ latitude: coords[0], longitude: coords[1], weight: 1 });
    }
  }
  return points;
}

/**
 * Incident counts per rounded coordinate, top `topN` by weight
 *
 * Near-duplicate geocodes (equal after rounding to `precision` places) are
 * merged into one point; no two returned points share a coordinate.
 */
export function markerPoints(
  cleaned: CleanedRecords,
  topN: number,
  precision: number = DEFAULT_MARKER_PRECISION
): GeoPoint[] {
  assertTopN(topN);
  const grouped = new Map<string, GeoPoint>();

  for (const record of cleaned.forGeoAnalysis) {
    const coords = coordinatesOf(record);
    if (!coords) continue;
    const key = coordinateKey(coords[0], coords[1], precision);
    const existing = grouped.get(key);
    grouped.set(key, {
      latitude: roundCoordinate(coords[0], precision),
      longitude: roundCoordinate(coords[1], precision),
      weight: (existing?.weight ?? 0) + 1,
    });
  }

  return [...grouped.values()].sort(compareGeoPoints).slice(0, topN);
}

// ============================================================================
// Area Clusters
// ============================================================================

interface AreaAccumulator {
  latSum: number;
  lonSum: number;
  count: number;
  types: Map<string, number>;
}

/**
 * Per-area centroid and statistics for records usable on both the geo and
 * area dimensions. Sorted by count descending, then area name.
 */
export function areaClusters(cleaned: CleanedRecords): AreaStat[] {
  const areas = new Map<string, AreaAccumulator>();

  for (const record of cleaned.forGeoAnalysis) {
    const coords = coordinatesOf(record);
    if (!coords || !isAreaUsable(record)) continue;

    let acc = areas.get(record.areaName);
    if (!acc) {
      acc = { latSum: 0, lonSum: 0, count: 0, types: new Map() };
      areas.set(record.areaName, acc);
    }
    acc.latSum += coords[0];
    acc.lonSum += coords[1];
    acc.count++;
    if (record.crimeType !== '') {
      acc.types.set(record.crimeType, (acc.types.get(record.crimeType) ?? 0) + 1);
    }
  }

  const stats: AreaStat[] = [];
  for (const [areaName, acc] of areas) {
    stats.push({
      areaName,
      centroidLat: acc.latSum / acc.count,
      centroidLon: acc.lonSum / acc.count,
      totalCount: acc.count,
      topCrimeType: modeOf(acc.types),
      breakdown: rankCounts(acc.types, acc.count, AREA_BREAKDOWN_SIZE),
    });
  }

  return stats.sort((a, b) => b.totalCount - a.totalCount || compareKeys(a.areaName, b.areaName));
}

// ============================================================================
// Location Annotation / Sampling
// ============================================================================

/**
 * Most common area and crime type at each of the given points
 *
 * @returns Map keyed by `coordinateKey`
 */
export function describeLocations(
  cleaned: CleanedRecords,
  points: readonly GeoPoint[],
  precision: number = DEFAULT_MARKER_PRECISION
): Map<string, LocationDetail> {
  const wanted = new Map<string, { areas: Map<string, number>; types: Map<string, number> }>();
  for (const point of points) {
    wanted.set(coordinateKey(point.latitude, point.longitude, precision), {
      areas: new Map(),
      types: new Map(),
    });
  }

  for (const record of cleaned.forGeoAnalysis) {
    const coords = coordinatesOf(record);
    if (!coords) continue;
    const tally = wanted.get(coordinateKey(coords[0], coords[1], precision));
    if (!tally) continue;
    if (record.areaName !== '') {
      tally.areas.set(record.areaName, (tally.areas.get(record.areaName) ?? 0) + 1);
    }
    if (record.crimeType !== '') {
      tally.types.set(record.crimeType, (tally.types.get(record.crimeType) ?? 0) + 1);
    }
  }

  const details = new Map<string, LocationDetail>();
  for (const [key, tally] of wanted) {
    details.set(key, { areaName: modeOf(tally.areas), topCrimeType: modeOf(tally.types) });
  }
  return details;
}

/**
 * Evenly spaced subset of at most `limit` points (deterministic)
 */
export function samplePoints<T>(points: readonly T[], limit: number): T[] {
  assertTopN(limit, 'limit');
  if (points.length <= limit) return [...points];
  if (limit === 0) return [];

  const stride = points.length / limit;
  const sample: T[] = [];
  for (let i = 0; i < limit; i++) {
    const point = points[Math.floor(i * stride)];
    if (point !== undefined) sample.push(point);
  }
  return sample;
}
