/**
 * GeoJSON conversion for map artifacts
 *
 * GeoJSON positions are [longitude, latitude]; the rest of the pipeline
 * uses latitude-first fields.
 */

import * as turf from '@turf/turf';
import type { BBox, Feature, FeatureCollection, Point } from 'geojson';
import type { AreaStat, GeoPoint } from '../core/types.js';

// Type aliases (not interfaces) so they satisfy GeoJsonProperties
export type PointProperties = {
  readonly weight: number;
};

export type AreaProperties = {
  readonly areaName: string;
  readonly totalCount: number;
  readonly topCrimeType: string | null;
  readonly breakdown: readonly { readonly crimeType: string; readonly count: number }[];
};

export function toPointCollection(
  points: readonly GeoPoint[]
): FeatureCollection<Point, PointProperties> {
  return turf.featureCollection(
    points.map((p) => turf.point([p.longitude, p.latitude], { weight: p.weight }))
  );
}

export function toAreaFeature(area: AreaStat): Feature<Point, AreaProperties> {
  return turf.point([area.centroidLon, area.centroidLat], {
    areaName: area.areaName,
    totalCount: area.totalCount,
    topCrimeType: area.topCrimeType,
    breakdown: area.breakdown.map((entry) => ({ crimeType: entry.key, count: entry.count })),
  });
}

export function toAreaCollection(
  areas: readonly AreaStat[]
): FeatureCollection<Point, AreaProperties> {
  return turf.featureCollection(areas.map(toAreaFeature));
}

/**
 * [minLon, minLat, maxLon, maxLat] of the points, or null when empty
 */
export function boundsOf(points: readonly GeoPoint[]): BBox | null {
  if (points.length === 0) return null;
  return turf.bbox(toPointCollection(points));
}

/**
 * Arithmetic mean of the points (unweighted), or null when empty
 */
export function centerOf(points: readonly GeoPoint[]): { latitude: number; longitude: number } | null {
  if (points.length === 0) return null;
  let latSum = 0;
  let lonSum = 0;
  for (const p of points) {
    latSum += p.latitude;
    lonSum += p.longitude;
  }
  return { latitude: latSum / points.length, longitude: lonSum / points.length };
}
