/**
 * CSV source loading
 *
 * Police data is published as one CSV per month. The input path may be a
 * single (already merged) file or a directory tree of monthly files, which
 * are read in path order and concatenated into one table.
 *
 * @module ingestion/csv-sources
 */

import { readFile, readdir, stat } from 'fs/promises';
import { basename, extname, join, resolve } from 'path';
import { MERGED_FILE_NAME } from '../core/constants.js';
import { IngestionError, errorMessage } from '../core/errors.js';
import type { RawRow, RawTable } from '../core/types.js';
import { atomicWriteFile } from '../core/utils/atomic-write.js';
import { formatRawCsv } from '../core/utils/format.js';
import { readCrimeCsv } from './csv-reader.js';
import { assertRequiredColumns } from './record-ingestor.js';

/**
 * Recursively list `*.csv` files under `dir`, sorted by path
 */
export async function findCsvFiles(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  const files: string[] = [];

  for (const entry of entries) {
    const fullPath = join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await findCsvFiles(fullPath)));
    } else if (entry.isFile() && extname(entry.name).toLowerCase() === '.csv') {
      files.push(fullPath);
    }
  }

  return files.sort();
}

/**
 * Drop `merged.csv` files unless they are the only CSV files
 */
export function withoutMergedOutput(files: readonly string[]): string[] {
  const monthly = files.filter((file) => basename(file) !== MERGED_FILE_NAME);
  return monthly.length > 0 ? monthly : [...files];
}

/**
 * Concatenate tables. Columns keep first-seen order.
 */
export function concatTables(tables: readonly RawTable[]): RawTable {
  const columns: string[] = [];
  const seen = new Set<string>();
  const rows: RawRow[] = [];
  const sources: string[] = [];

  for (const table of tables) {
    for (const column of table.columns) {
      if (!seen.has(column)) {
        seen.add(column);
        columns.push(column);
      }
    }
    for (const row of table.rows) {
      rows.push(row);
    }
    sources.push(...table.sources);
  }

  return { columns, rows, sources };
}

async function readSourceFile(filePath: string): Promise<RawTable> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    throw new IngestionError(
      `Cannot read ${filePath}: ${errorMessage(error)}`,
      'UNREADABLE_INPUT',
      [],
      filePath
    );
  }

  const table = readCrimeCsv(content, filePath);
  if (table.columns.length > 0) {
    assertRequiredColumns(table.columns, filePath);
  }
  return table;
}

/**
 * Load a CSV file, or every CSV under a directory
 *
 * A directory holding monthly files skips any `merged.csv` in it; a
 * directory holding only a merged file loads that file.
 *
 * @throws IngestionError (UNREADABLE_INPUT) when the path is missing or a
 *   directory holds no CSV files; (MISSING_COLUMNS) when any file lacks a
 *   required column
 */
export async function loadCrimeCsvSources(inputPath: string): Promise<RawTable> {
  let isDirectory: boolean;
  try {
    isDirectory = (await stat(inputPath)).isDirectory();
  } catch (error) {
    throw new IngestionError(
      `Input not found: ${inputPath} (${errorMessage(error)})`,
      'UNREADABLE_INPUT',
      [],
      inputPath
    );
  }

  if (!isDirectory) {
    return readSourceFile(inputPath);
  }

  const files = withoutMergedOutput(await findCsvFiles(inputPath));
  if (files.length === 0) {
    throw new IngestionError(
      `No CSV files found under ${inputPath}`,
      'UNREADABLE_INPUT',
      [],
      inputPath
    );
  }

  const tables: RawTable[] = [];
  for (const file of files) {
    tables.push(await readSourceFile(file));
  }
  return concatTables(tables);
}

/**
 * Merge every CSV under `inputDir` into a single file
 *
 * @returns The merged table that was written
 */
export async function mergeCrimeCsvFiles(inputDir: string, outputPath: string): Promise<RawTable> {
  const target = resolve(outputPath);
  let found: string[];
  try {
    found = await findCsvFiles(inputDir);
  } catch (error) {
    throw new IngestionError(
      `Cannot read directory ${inputDir}: ${errorMessage(error)}`,
      'UNREADABLE_INPUT',
      [],
      inputDir
    );
  }
  const files = withoutMergedOutput(found.filter((file) => resolve(file) !== target));
  if (files.length === 0) {
    throw new IngestionError(
      `No CSV files found under ${inputDir}`,
      'UNREADABLE_INPUT',
      [],
      inputDir
    );
  }

  const tables: RawTable[] = [];
  for (const file of files) {
    tables.push(await readSourceFile(file));
  }
  const merged = concatTables(tables);

  await atomicWriteFile(outputPath, formatRawCsv(merged.columns, merged.rows));
  return merged;
}
