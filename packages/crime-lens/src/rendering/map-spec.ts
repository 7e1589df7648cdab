/**
 * Leaflet map specifications
 *
 * Every presentation decision (centre, tier colours, popup markup) is made
 * here so the HTML template only draws what it is given.
 */

import { AREA_BREAKDOWN_SIZE } from '../core/constants.js';
import type { AreaStat, GeoPoint } from '../core/types.js';
import { boundsOf, centerOf } from '../geo/geojson.js';
import { escapeHtml } from './html.js';
import {
  DENSITY_TIERS,
  TIER_STYLES,
  areaRadius,
  densityTier,
  tierThresholds,
  type DensityTier,
} from './map-style.js';
import type { MapKind, MapRequest } from './types.js';

export type LatLng = readonly [number, number];

export interface MapMarker {
  readonly position: LatLng;
  readonly tier: DensityTier;
  readonly color: string;
  readonly tooltip: string;
  readonly popup: string;
}

export interface MapArea {
  readonly position: LatLng;
  readonly radius: number;
  readonly tier: DensityTier;
  readonly color: string;
  readonly fillColor: string;
  readonly tooltip: string;
  readonly popup: string;
  /** Count label drawn on the ten largest areas */
  readonly label: string | null;
}

export interface MapSpec {
  readonly kind: MapKind;
  readonly title: string;
  readonly center: LatLng;
  readonly zoom: number;
  /** [[south, west], [north, east]] */
  readonly bounds: readonly [LatLng, LatLng] | null;
  readonly heat: readonly (readonly [number, number, number])[];
  readonly markers: readonly MapMarker[];
  readonly areas: readonly MapArea[];
  readonly clusterPoints: readonly LatLng[];
  readonly legend: readonly { readonly label: string; readonly color: string }[];
}

const DEFAULT_ZOOM = 13;
const LABELLED_AREAS = 10;

const LEGEND = DENSITY_TIERS.map((tier) => ({
  label: TIER_STYLES[tier].label,
  color: TIER_STYLES[tier].color,
}));

function viewport(points: readonly GeoPoint[]): Pick<MapSpec, 'center' | 'bounds'> {
  const center = centerOf(points);
  const bbox = boundsOf(points);
  return {
    center: center ? [center.latitude, center.longitude] : [0, 0],
    bounds: bbox ? [[bbox[1], bbox[0]], [bbox[3], bbox[2]]] : null,
  };
}

function areaPopup(area: AreaStat): string {
  const breakdown = area.breakdown
    .slice(0, AREA_BREAKDOWN_SIZE)
    .map((entry) => `&bull; ${escapeHtml(entry.key)}: ${entry.count}`)
    .join('<br>');
  return [
    `<h4>${escapeHtml(area.areaName)}</h4>`,
    `<p><b>Total Crimes:</b> ${area.totalCount}</p>`,
    `<p><b>Top Crime Types:</b></p>`,
    `<div class="breakdown">${breakdown}</div>`,
  ].join('');
}

export function buildMapSpec(request: MapRequest): MapSpec {
  const base = {
    kind: request.kind,
    title: request.title,
    zoom: DEFAULT_ZOOM,
    heat: [],
    markers: [],
    areas: [],
    clusterPoints: [],
    legend: [],
  };

  switch (request.kind) {
    case 'heatmap':
      return {
        ...base,
        ...viewport(request.points),
        heat: request.points.map((p) => [p.latitude, p.longitude, p.weight] as const),
      };

    case 'markers': {
      const thresholds = tierThresholds(request.locations.map((l) => l.weight));
      const points = request.locations.map((l) => ({ latitude: l.latitude, longitude: l.longitude, weight: l.weight }));
      return {
        ...base,
        ...viewport(points),
        legend: LEGEND,
        markers: request.locations.map((location) => {
          const tier = densityTier(location.weight, thresholds);
          const details = [
            location.areaName ? `<br>Area: ${escapeHtml(location.areaName)}` : '',
            location.topCrimeType ? `<br>Most common: ${escapeHtml(location.topCrimeType)}` : '',
          ].join('');
          return {
            position: [location.latitude, location.longitude] as const,
            tier,
            color: TIER_STYLES[tier].fillColor,
            tooltip: `${location.weight} crimes`,
            popup: `<b>HIGH CRIME AREA</b><br>Total Crimes: ${location.weight}${details}`,
          };
        }),
      };
    }

    case 'clusters': {
      const thresholds = tierThresholds(request.areas.map((a) => a.totalCount));
      const centroids = request.areas.map((a) => ({
        latitude: a.centroidLat,
        longitude: a.centroidLon,
        weight: a.totalCount,
      }));
      return {
        ...base,
        ...viewport(request.points.length > 0 ? request.points : centroids),
        legend: LEGEND,
        clusterPoints: request.points.map((p) => [p.latitude, p.longitude] as const),
        areas: request.areas.map((area, index) => {
          const tier = densityTier(area.totalCount, thresholds);
          return {
            position: [area.centroidLat, area.centroidLon] as const,
            radius: areaRadius(area.totalCount),
            tier,
            color: TIER_STYLES[tier].color,
            fillColor: TIER_STYLES[tier].fillColor,
            tooltip: `${area.areaName}: ${area.totalCount} crimes`,
            popup: areaPopup(area),
            label: index < LABELLED_AREAS ? String(area.totalCount) : null,
          };
        }),
      };
    }
  }
}
