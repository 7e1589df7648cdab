/**
 * CSV Source Loading Unit Tests
 *
 * Uses a temporary directory per test.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { MERGED_FILE_NAME, REQUIRED_COLUMNS } from '../../../core/constants.js';
import { IngestionError } from '../../../core/errors.js';
import {
  concatTables,
  findCsvFiles,
  loadCrimeCsvSources,
  mergeCrimeCsvFiles,
  withoutMergedOutput,
} from '../../../ingestion/csv-sources.js';
import { analyze } from '../../../pipeline/crime-pipeline.js';
import { makeRow, makeTempDir, removeTempDir, toCsv } from '../../utils/fixtures.js';

describe('CSV sources', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  async function writeMonth(month: string, rows = [makeRow({ month })]): Promise<string> {
    const monthDir = join(dir, month);
    await mkdir(monthDir, { recursive: true });
    const filePath = join(monthDir, 'street.csv');
    await writeFile(filePath, toCsv(rows), 'utf-8');
    return filePath;
  }

  describe('findCsvFiles', () => {
    it('finds CSV files recursively in path order and ignores other files', async () => {
      const feb = await writeMonth('2024-02');
      const jan = await writeMonth('2024-01');
      await writeFile(join(dir, 'notes.txt'), 'ignore me', 'utf-8');

      expect(await findCsvFiles(dir)).toEqual([jan, feb]);
    });
  });

  describe('concatTables', () => {
    it('keeps columns in first-seen order', () => {
      const merged = concatTables([
        { columns: ['a', 'b'], rows: [{ a: '1', b: '2' }], sources: ['one.csv'] },
        { columns: ['b', 'c'], rows: [{ b: '3', c: '4' }], sources: ['two.csv'] },
      ]);

      expect(merged.columns).toEqual(['a', 'b', 'c']);
      expect(merged.rows).toHaveLength(2);
      expect(merged.sources).toEqual(['one.csv', 'two.csv']);
    });

    it('handles a single table larger than the call argument limit', () => {
      const row = makeRow();
      const rows = Array.from({ length: 200_000 }, () => row);

      const merged = concatTables([{ columns: [...REQUIRED_COLUMNS], rows, sources: ['big.csv'] }]);

      expect(merged.rows).toHaveLength(200_000);
    });
  });

  describe('withoutMergedOutput', () => {
    it('drops merged files next to monthly files', () => {
      expect(withoutMergedOutput(['/d/2024-01/street.csv', `/d/${MERGED_FILE_NAME}`])).toEqual([
        '/d/2024-01/street.csv',
      ]);
    });

    it('keeps a merged file that is the only source', () => {
      expect(withoutMergedOutput([`/d/${MERGED_FILE_NAME}`])).toEqual([`/d/${MERGED_FILE_NAME}`]);
    });
  });

  describe('loadCrimeCsvSources', () => {
    it('loads a single file', async () => {
      const file = await writeMonth('2024-01');
      const table = await loadCrimeCsvSources(file);

      expect(table.columns).toEqual([...REQUIRED_COLUMNS]);
      expect(table.rows).toEqual([makeRow({ month: '2024-01' })]);
      expect(table.sources).toEqual([file]);
    });

    it('concatenates every monthly file under a directory', async () => {
      const jan = await writeMonth('2024-01');
      const feb = await writeMonth('2024-02');
      const table = await loadCrimeCsvSources(dir);

      expect(table.rows.map((row) => row['Month'])).toEqual(['2024-01', '2024-02']);
      expect(table.sources).toEqual([jan, feb]);
    });

    it('skips the merge output so rows are counted once', async () => {
      const jan = await writeMonth('2024-01');
      const feb = await writeMonth('2024-02');
      await mergeCrimeCsvFiles(dir, join(dir, MERGED_FILE_NAME));

      const table = await loadCrimeCsvSources(dir);
      const outcome = analyze(table);

      expect(table.sources).toEqual([jan, feb]);
      expect(outcome.status).toBe('success');
      if (outcome.status === 'failure') return;
      expect(outcome.summary.crimeTypes.counts.get('Burglary')).toBe(2);
      expect(outcome.summary.facts.totalRecordsProcessed).toBe(2);
    });

    it('loads a directory holding only a merged file', async () => {
      const merged = join(dir, MERGED_FILE_NAME);
      await writeFile(merged, toCsv([makeRow({ month: '2024-01' }), makeRow({ month: '2024-02' })]), 'utf-8');

      const table = await loadCrimeCsvSources(dir);

      expect(table.sources).toEqual([merged]);
      expect(table.rows).toHaveLength(2);
    });

    it('fails with UNREADABLE_INPUT for a missing path', async () => {
      const missing = join(dir, 'nope.csv');

      await expect(loadCrimeCsvSources(missing)).rejects.toMatchObject({
        name: 'IngestionError',
        code: 'UNREADABLE_INPUT',
      });
    });

    it('fails with UNREADABLE_INPUT for a directory without CSV files', async () => {
      await expect(loadCrimeCsvSources(dir)).rejects.toThrow(`No CSV files found under ${dir}`);
    });

    it('fails with MISSING_COLUMNS when one file lacks a column', async () => {
      await writeMonth('2024-01');
      const broken = join(dir, '2024-02.csv');
      await writeFile(broken, 'Month,Crime type\n2024-02,Burglary\n', 'utf-8');

      const error: unknown = await loadCrimeCsvSources(dir).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(IngestionError);
      if (!(error instanceof IngestionError)) return;
      expect(error.code).toBe('MISSING_COLUMNS');
      expect(error.source).toBe(broken);
      expect(error.missingColumns).toContain('Latitude');
    });
  });

  describe('mergeCrimeCsvFiles', () => {
    it('writes one CSV holding every row', async () => {
      await writeMonth('2024-01');
      await writeMonth('2024-02');
      const output = join(dir, 'merged.csv');

      const merged = await mergeCrimeCsvFiles(dir, output);

      expect(merged.rows).toHaveLength(2);
      expect(await readFile(output, 'utf-8')).toBe(
        toCsv([makeRow({ month: '2024-01' }), makeRow({ month: '2024-02' })])
      );
    });

    it('does not read its own previous output on a re-run', async () => {
      await writeMonth('2024-01');
      const output = join(dir, 'merged.csv');

      await mergeCrimeCsvFiles(dir, output);
      const second = await mergeCrimeCsvFiles(dir, output);

      expect(second.rows).toHaveLength(1);
    });

    it('skips an earlier merge output when writing elsewhere', async () => {
      await writeMonth('2024-01');
      await mergeCrimeCsvFiles(dir, join(dir, MERGED_FILE_NAME));

      const second = await mergeCrimeCsvFiles(dir, join(dir, 'all.csv'));

      expect(second.rows).toHaveLength(1);
    });

    it('fails when the directory holds no CSV files', async () => {
      await expect(mergeCrimeCsvFiles(dir, join(dir, 'merged.csv'))).rejects.toBeInstanceOf(IngestionError);
    });
  });
});
