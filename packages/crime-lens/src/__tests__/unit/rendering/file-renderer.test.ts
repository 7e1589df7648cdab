/**
 * File Renderer Unit Tests
 *
 * Writes into a temporary output directory using the packaged templates.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { Logger } from '../../../core/utils/logger.js';
import { buildChartSpec } from '../../../rendering/chart-spec.js';
import { FileRenderer } from '../../../rendering/file-renderer.js';
import type { ChartRequest } from '../../../rendering/types.js';
import { formatSummaryReport } from '../../../report/summary-text.js';
import { makeTempDir, removeTempDir } from '../../utils/fixtures.js';
import { sampleSummary } from '../../utils/summaries.js';

const quiet = new Logger({ level: 'error', service: 'crime-lens-test', pretty: true });

describe('FileRenderer', () => {
  let dir: string;
  let renderer: FileRenderer;

  beforeEach(async () => {
    dir = await makeTempDir();
    renderer = new FileRenderer(dir, { logger: quiet });
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  describe('renderChart', () => {
    const request: ChartRequest = {
      kind: 'crime_type_bar',
      title: 'Top Crimes & More',
      data: sampleSummary().crimeTypes,
      limit: 10,
    };

    it('writes the chart page and its spec', async () => {
      const artifact = await renderer.renderChart(request);

      const htmlPath = join(dir, 'charts', 'crime_type_bar.html');
      const jsonPath = join(dir, 'charts', 'crime_type_bar.json');
      expect(artifact).toEqual({ kind: 'crime_type_bar', path: htmlPath, files: [htmlPath, jsonPath] });

      const spec: unknown = JSON.parse(await readFile(jsonPath, 'utf-8'));
      expect(spec).toEqual(buildChartSpec(request));

      const html = await readFile(htmlPath, 'utf-8');
      expect(html).toContain('<title>Top Crimes &amp; More</title>');
      expect(html).not.toContain('{{spec}}');
      expect(html).toContain('"labels":["Burglary","Theft"]');
    });

    it('fails when the template directory has no template', async () => {
      const broken = new FileRenderer(dir, { logger: quiet, templatesDir: join(dir, 'no-templates') });

      await expect(broken.renderChart(request)).rejects.toThrow();
    });
  });

  describe('renderMap', () => {
    it('writes the map page and point features', async () => {
      const artifact = await renderer.renderMap({
        kind: 'heatmap',
        title: 'Density',
        points: [
          { latitude: 52.2, longitude: 0.12, weight: 1 },
          { latitude: 52.21, longitude: 0.13, weight: 1 },
        ],
      });

      expect(artifact.path).toBe(join(dir, 'maps', 'heatmap.html'));
      const geojson: unknown = JSON.parse(await readFile(join(dir, 'maps', 'heatmap.geojson'), 'utf-8'));
      expect(geojson).toMatchObject({
        type: 'FeatureCollection',
        features: [
          { geometry: { type: 'Point', coordinates: [0.12, 52.2] }, properties: { weight: 1 } },
          { geometry: { type: 'Point', coordinates: [0.13, 52.21] }, properties: { weight: 1 } },
        ],
      });
      expect(await readFile(artifact.path, 'utf-8')).toContain('"heat":[[52.2,0.12,1],[52.21,0.13,1]]');
    });

    it('writes area features for the cluster map', async () => {
      await renderer.renderMap({
        kind: 'clusters',
        title: 'Areas',
        areas: [
          {
            areaName: 'A',
            centroidLat: 52.2,
            centroidLon: 0.12,
            totalCount: 2,
            topCrimeType: 'Burglary',
            breakdown: [{ key: 'Burglary', count: 2, share: 100 }],
          },
        ],
        points: [],
      });

      const geojson: unknown = JSON.parse(await readFile(join(dir, 'maps', 'clusters.geojson'), 'utf-8'));
      expect(geojson).toMatchObject({
        features: [
          {
            properties: {
              areaName: 'A',
              totalCount: 2,
              topCrimeType: 'Burglary',
              breakdown: [{ crimeType: 'Burglary', count: 2 }],
            },
          },
        ],
      });
    });
  });

  describe('writeTable', () => {
    it('writes dangerous locations as CSV', async () => {
      const artifact = await renderer.writeTable({
        kind: 'dangerous-locations',
        rows: [
          { rank: 1, latitude: 52.2, longitude: 0.12, weight: 3, areaName: 'A', topCrimeType: 'Burglary' },
          { rank: 2, latitude: 52.21, longitude: 0.13, weight: 1, areaName: null, topCrimeType: null },
        ],
      });

      expect(artifact.path).toBe(join(dir, 'data', 'dangerous-locations.csv'));
      expect(await readFile(artifact.path, 'utf-8')).toBe(
        'Rank,Latitude,Longitude,Crime Count,Area,Most Common Crime\n' +
          '1,52.2,0.12,3,A,Burglary\n' +
          '2,52.21,0.13,1,,\n'
      );
    });

    it('writes the summary report', async () => {
      const summary = sampleSummary();
      const artifact = await renderer.writeTable({ kind: 'summary', title: 'TEST - SUMMARY REPORT', summary });

      expect(artifact.path).toBe(join(dir, 'reports', 'summary.txt'));
      expect(await readFile(artifact.path, 'utf-8')).toBe(formatSummaryReport(summary, 'TEST - SUMMARY REPORT'));
    });

    it('replaces an existing file on a re-run', async () => {
      const summary = sampleSummary();
      await renderer.writeTable({ kind: 'summary', title: 'FIRST', summary });
      const artifact = await renderer.writeTable({ kind: 'summary', title: 'SECOND', summary });

      expect((await readFile(artifact.path, 'utf-8')).split('\n')[1]).toBe('SECOND');
    });
  });
});
