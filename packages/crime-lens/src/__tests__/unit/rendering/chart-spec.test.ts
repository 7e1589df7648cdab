/**
 * Chart Spec Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { buildChartSpec } from '../../../rendering/chart-spec.js';
import { sampleSummary } from '../../utils/summaries.js';

describe('buildChartSpec', () => {
  const summary = sampleSummary();

  it('builds a horizontal bar chart of the top crime types', () => {
    expect(buildChartSpec({ kind: 'crime_type_bar', title: 'Top Crime Types', data: summary.crimeTypes, limit: 1 })).toEqual({
      kind: 'crime_type_bar',
      title: 'Top Crime Types',
      type: 'bar',
      horizontal: true,
      labels: ['Burglary'],
      datasets: [{ label: 'Number of Crimes', data: [2] }],
      xLabel: 'Number of Crimes',
      yLabel: null,
    });
  });

  it('builds one line per trend series', () => {
    const spec = buildChartSpec({ kind: 'monthly_trend_lines', title: 'Trends', data: summary.monthlyTrend });

    expect(spec.type).toBe('line');
    expect(spec.labels).toEqual(['2024-01', '2024-02']);
    expect(spec.datasets).toEqual([
      { label: 'Burglary', data: [1, 1] },
      { label: 'Theft', data: [1, 0] },
    ]);
    expect(spec.xLabel).toBe('Month');
  });

  it('builds an area bar chart from the ranking', () => {
    const spec = buildChartSpec({ kind: 'area_bar', title: 'Areas', data: summary.areas });

    expect(spec.labels).toEqual(['A', 'B']);
    expect(spec.datasets).toEqual([{ label: 'Number of Crimes', data: [2, 1] }]);
  });

  it('builds an outcome pie chart', () => {
    const spec = buildChartSpec({ kind: 'outcome_pie', title: 'Outcomes', data: summary.outcomes });

    expect(spec.type).toBe('pie');
    expect(spec.labels).toEqual(['Under investigation', 'Not specified']);
    expect(spec.datasets).toEqual([{ label: 'Outcomes', data: [2, 1] }]);
  });
});
