/**
 * Test Fixtures
 *
 * Builders for raw rows, ingested records and CSV text. Values are made up;
 * coordinates sit inside the default study bounds unless a test overrides
 * them.
 */

import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { COLUMNS, REQUIRED_COLUMNS } from '../../core/constants.js';
import type { CrimeRecord, RawRow, RawTable } from '../../core/types.js';
import { formatRawCsv } from '../../core/utils/format.js';

export type RowFields = Partial<Record<keyof typeof COLUMNS, string>>;

/**
 * Raw row with every required column
 */
export function makeRow(fields: RowFields = {}): RawRow {
  return {
    [COLUMNS.id]: fields.id ?? 'crime-0001',
    [COLUMNS.month]: fields.month ?? '2024-01',
    [COLUMNS.crimeType]: fields.crimeType ?? 'Burglary',
    [COLUMNS.location]: fields.location ?? 'On or near Mill Road',
    [COLUMNS.areaName]: fields.areaName ?? 'Cambridge 001A',
    [COLUMNS.latitude]: fields.latitude ?? '52.2',
    [COLUMNS.longitude]: fields.longitude ?? '0.12',
    [COLUMNS.outcome]: fields.outcome ?? 'Under investigation',
  };
}

export function makeTable(rows: readonly RawRow[], source = 'test.csv'): RawTable {
  return { columns: [...REQUIRED_COLUMNS], rows, sources: [source] };
}

export function makeRecord(overrides: Partial<CrimeRecord> = {}): CrimeRecord {
  return {
    id: 'crime-0001',
    month: '2024-01',
    crimeType: 'Burglary',
    locationText: 'On or near Mill Road',
    areaName: 'Cambridge 001A',
    latitude: 52.2,
    longitude: 0.12,
    outcome: 'Under investigation',
    ...overrides,
  };
}

/**
 * CSV text with the standard header
 */
export function toCsv(rows: readonly RawRow[], columns: readonly string[] = REQUIRED_COLUMNS): string {
  return formatRawCsv(columns, rows);
}

/**
 * Fresh directory under the OS temp dir; remove with `removeTempDir`
 */
export async function makeTempDir(prefix = 'crime-lens-'): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}
