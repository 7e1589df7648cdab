/**
 * File Renderer
 *
 * Writes every artifact under one output directory:
 *
 *   charts/<kind>.html  + charts/<kind>.json    (Chart.js page + spec)
 *   maps/<kind>.html    + maps/<kind>.geojson   (Leaflet page + features)
 *   data/dangerous-locations.csv
 *   reports/summary.txt
 *
 * All writes are atomic, so re-running over the same directory replaces
 * artifacts in place.
 *
 * @module rendering/file-renderer
 */

import type { FeatureCollection, Point } from 'geojson';
import { join } from 'path';
import type { DangerousLocation } from '../core/types.js';
import { atomicWriteFile, atomicWriteJSON } from '../core/utils/atomic-write.js';
import { formatCsv, type TableColumn } from '../core/utils/format.js';
import { createLogger, type Logger } from '../core/utils/logger.js';
import {
  toAreaCollection,
  toPointCollection,
  type AreaProperties,
  type PointProperties,
} from '../geo/geojson.js';
import { formatSummaryReport } from '../report/summary-text.js';
import { buildChartSpec } from './chart-spec.js';
import { DEFAULT_TEMPLATES_DIR, escapeHtml, fillTemplate, loadTemplate, scriptJson } from './html.js';
import { buildMapSpec } from './map-spec.js';
import type { Artifact, ChartRequest, MapRequest, Renderer, TableRequest } from './types.js';

export interface FileRendererOptions {
  /** Directory holding chart.html and map.html */
  readonly templatesDir?: string;
  readonly logger?: Logger;
}

export const DANGEROUS_LOCATION_COLUMNS: readonly TableColumn<DangerousLocation>[] = [
  { key: 'rank', header: 'Rank', align: 'right' },
  { key: 'latitude', header: 'Latitude', align: 'right' },
  { key: 'longitude', header: 'Longitude', align: 'right' },
  { key: 'weight', header: 'Crime Count', align: 'right' },
  { key: 'areaName', header: 'Area' },
  { key: 'topCrimeType', header: 'Most Common Crime' },
];

export class FileRenderer implements Renderer {
  private readonly templatesDir: string;
  private readonly logger: Logger;
  private readonly templates = new Map<string, Promise<string>>();

  constructor(
    private readonly outputDir: string,
    options: FileRendererOptions = {}
  ) {
    this.templatesDir = options.templatesDir ?? DEFAULT_TEMPLATES_DIR;
    this.logger = options.logger ?? createLogger({ module: 'file-renderer' });
  }

  async renderChart(request: ChartRequest): Promise<Artifact> {
    const spec = buildChartSpec(request);
    const htmlPath = join(this.outputDir, 'charts', `${request.kind}.html`);
    const jsonPath = join(this.outputDir, 'charts', `${request.kind}.json`);

    await atomicWriteFile(htmlPath, await this.page('chart.html', request.title, scriptJson(spec)));
    await atomicWriteJSON(jsonPath, spec);

    this.logger.info('Chart written', { kind: request.kind, path: htmlPath });
    return { kind: request.kind, path: htmlPath, files: [htmlPath, jsonPath] };
  }

  async renderMap(request: MapRequest): Promise<Artifact> {
    const spec = buildMapSpec(request);
    const htmlPath = join(this.outputDir, 'maps', `${request.kind}.html`);
    const geoJsonPath = join(this.outputDir, 'maps', `${request.kind}.geojson`);

    await atomicWriteFile(htmlPath, await this.page('map.html', request.title, scriptJson(spec)));
    await atomicWriteJSON(geoJsonPath, mapFeatures(request));

    this.logger.info('Map written', { kind: request.kind, path: htmlPath });
    return { kind: request.kind, path: htmlPath, files: [htmlPath, geoJsonPath] };
  }

  async writeTable(request: TableRequest): Promise<Artifact> {
    const path = tablePath(this.outputDir, request);
    const content =
      request.kind === 'summary'
        ? formatSummaryReport(request.summary, request.title)
        : formatCsv(request.rows, DANGEROUS_LOCATION_COLUMNS);
    await atomicWriteFile(path, content);

    this.logger.info('Table written', { kind: request.kind, path });
    return { kind: request.kind, path, files: [path] };
  }

  private async page(templateName: string, title: string, specJson: string): Promise<string> {
    let template = this.templates.get(templateName);
    if (!template) {
      template = loadTemplate(this.templatesDir, templateName);
      this.templates.set(templateName, template);
    }
    return fillTemplate(await template, { title: escapeHtml(title), spec: specJson });
  }
}

function tablePath(outputDir: string, request: TableRequest): string {
  return request.kind === 'summary'
    ? join(outputDir, 'reports', 'summary.txt')
    : join(outputDir, 'data', 'dangerous-locations.csv');
}

function mapFeatures(
  request: MapRequest
): FeatureCollection<Point, PointProperties> | FeatureCollection<Point, AreaProperties> {
  switch (request.kind) {
    case 'heatmap':
      return toPointCollection(request.points);
    case 'markers':
      return toPointCollection(
        request.locations.map((l) => ({ latitude: l.latitude, longitude: l.longitude, weight: l.weight }))
      );
    case 'clusters':
      return toAreaCollection(request.areas);
  }
}
