/**
 * Renderer-agnostic chart specifications
 *
 * A `ChartSpec` is plain JSON: labels plus numeric datasets. The HTML page
 * feeds it to Chart.js; the same spec is written beside it for reuse.
 */

import type { ChartKind, ChartRequest } from './types.js';

export interface ChartDataset {
  readonly label: string;
  readonly data: readonly number[];
}

export interface ChartSpec {
  readonly kind: ChartKind;
  readonly title: string;
  readonly type: 'bar' | 'line' | 'pie';
  /** Horizontal bars, largest first from the top */
  readonly horizontal: boolean;
  readonly labels: readonly string[];
  readonly datasets: readonly ChartDataset[];
  readonly xLabel: string | null;
  readonly yLabel: string | null;
}

export function buildChartSpec(request: ChartRequest): ChartSpec {
  switch (request.kind) {
    case 'crime_type_bar': {
      const top = request.data.ranking.slice(0, request.limit);
      return {
        kind: request.kind,
        title: request.title,
        type: 'bar',
        horizontal: true,
        labels: top.map((entry) => entry.key),
        datasets: [{ label: 'Number of Crimes', data: top.map((entry) => entry.count) }],
        xLabel: 'Number of Crimes',
        yLabel: null,
      };
    }
    case 'area_bar':
      return {
        kind: request.kind,
        title: request.title,
        type: 'bar',
        horizontal: true,
        labels: request.data.ranking.map((entry) => entry.key),
        datasets: [{ label: 'Number of Crimes', data: request.data.ranking.map((entry) => entry.count) }],
        xLabel: 'Number of Crimes',
        yLabel: null,
      };
    case 'monthly_trend_lines':
      return {
        kind: request.kind,
        title: request.title,
        type: 'line',
        horizontal: false,
        labels: [...request.data.months],
        datasets: [...request.data.series].map(([crimeType, points]) => ({
          label: crimeType,
          data: points.map((point) => point.count),
        })),
        xLabel: 'Month',
        yLabel: 'Number of Crimes',
      };
    case 'outcome_pie':
      return {
        kind: request.kind,
        title: request.title,
        type: 'pie',
        horizontal: false,
        labels: request.data.ranking.map((entry) => entry.key),
        datasets: [{ label: 'Outcomes', data: request.data.ranking.map((entry) => entry.count) }],
        xLabel: null,
        yLabel: null,
      };
  }
}
