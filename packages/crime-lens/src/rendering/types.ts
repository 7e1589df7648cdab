/**
 * Rendering collaborator contract
 *
 * The pipeline hands the renderer fully specified structured data; the
 * renderer owns every presentation decision (file format, colours, layout).
 */

import type {
  AggregationResult,
  AreaStat,
  DangerousLocation,
  GeoPoint,
  MonthlyTrend,
  Summary,
} from '../core/types.js';

export type ChartKind = 'crime_type_bar' | 'monthly_trend_lines' | 'area_bar' | 'outcome_pie';
export type MapKind = 'heatmap' | 'markers' | 'clusters';
export type TableKind = 'dangerous-locations' | 'summary';
export type ArtifactKind = ChartKind | MapKind | TableKind;

export type ChartRequest =
  | { readonly kind: 'crime_type_bar'; readonly title: string; readonly data: AggregationResult; readonly limit: number }
  | { readonly kind: 'monthly_trend_lines'; readonly title: string; readonly data: MonthlyTrend }
  | { readonly kind: 'area_bar'; readonly title: string; readonly data: AggregationResult }
  | { readonly kind: 'outcome_pie'; readonly title: string; readonly data: AggregationResult };

export type MapRequest =
  | { readonly kind: 'heatmap'; readonly title: string; readonly points: readonly GeoPoint[] }
  | {
      readonly kind: 'markers';
      readonly title: string;
      readonly locations: readonly DangerousLocation[];
    }
  | {
      readonly kind: 'clusters';
      readonly title: string;
      readonly areas: readonly AreaStat[];
      /** Individual incidents drawn inside the marker cluster layer */
      readonly points: readonly GeoPoint[];
    };

export type TableRequest =
  | { readonly kind: 'dangerous-locations'; readonly rows: readonly DangerousLocation[] }
  | { readonly kind: 'summary'; readonly title: string; readonly summary: Summary };

export interface Artifact {
  readonly kind: ArtifactKind;
  /** Primary file */
  readonly path: string;
  /** Every file written for this artifact, primary first */
  readonly files: readonly string[];
}

export interface Renderer {
  renderChart(request: ChartRequest): Promise<Artifact>;
  renderMap(request: MapRequest): Promise<Artifact>;
  writeTable(request: TableRequest): Promise<Artifact>;
}
