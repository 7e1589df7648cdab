/**
 * Cleaner Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { clean, geoUnusableReason, normalizeLabel } from '../../../cleaning/cleaner.js';
import { makeRecord } from '../../utils/fixtures.js';

describe('normalizeLabel', () => {
  it('trims and collapses internal whitespace', () => {
    expect(normalizeLabel('  Anti-social \t  behaviour ')).toBe('Anti-social behaviour');
  });
});

describe('geoUnusableReason', () => {
  it('flags missing coordinates before bounds', () => {
    expect(geoUnusableReason(makeRecord({ latitude: null }))).toBe('missing coordinates');
    expect(geoUnusableReason(makeRecord({ longitude: null }))).toBe('missing coordinates');
  });

  it('treats bounds as inclusive', () => {
    expect(geoUnusableReason(makeRecord({ latitude: 51.9, longitude: -0.6 }))).toBeNull();
    expect(geoUnusableReason(makeRecord({ latitude: 52.8, longitude: 0.6 }))).toBeNull();
    expect(geoUnusableReason(makeRecord({ latitude: 52.81 }))).toBe('coordinates out of bounds');
  });

  it('uses the bounds it is given', () => {
    const london = { minLat: 51.3, maxLat: 51.7, minLon: -0.5, maxLon: 0.3 };

    expect(geoUnusableReason(makeRecord({ latitude: 51.5, longitude: -0.1 }), london)).toBeNull();
    expect(geoUnusableReason(makeRecord(), london)).toBe('coordinates out of bounds');
  });
});

describe('clean', () => {
  const records = [
    makeRecord({ id: 'r0' }),
    makeRecord({ id: 'r1', crimeType: '' }),
    makeRecord({ id: 'r2', latitude: null }),
    makeRecord({ id: 'r3', latitude: 53.5 }),
    makeRecord({ id: 'r4', areaName: '   ' }),
  ];

  it('excludes a record only from the dimension it fails', () => {
    const cleaned = clean(records);

    expect(cleaned.all.map((r) => r.id)).toEqual(['r0', 'r1', 'r2', 'r3', 'r4']);
    expect(cleaned.forTypeAnalysis.map((r) => r.id)).toEqual(['r0', 'r2', 'r3', 'r4']);
    expect(cleaned.forGeoAnalysis.map((r) => r.id)).toEqual(['r0', 'r1', 'r4']);
    expect(cleaned.forAreaAnalysis.map((r) => r.id)).toEqual(['r0', 'r1', 'r2', 'r3']);
    expect(cleaned.exclusions).toEqual({ type: 1, geo: 2, area: 1 });
  });

  it('records why each field was unusable', () => {
    expect(clean(records).issues).toEqual([
      { recordIndex: 1, dimension: 'type', reason: 'missing crime type' },
      { recordIndex: 2, dimension: 'geo', reason: 'missing coordinates' },
      { recordIndex: 3, dimension: 'geo', reason: 'coordinates out of bounds' },
      { recordIndex: 4, dimension: 'area', reason: 'missing area name' },
    ]);
  });

  it('normalizes labels so variants group together', () => {
    const cleaned = clean([makeRecord({ crimeType: ' Vehicle   crime', outcome: 'Unable to  prosecute ' })]);

    expect(cleaned.all[0]?.crimeType).toBe('Vehicle crime');
    expect(cleaned.all[0]?.outcome).toBe('Unable to prosecute');
  });

  it('does not modify its input', () => {
    const input = [makeRecord({ crimeType: ' Burglary ' })];
    clean(input);

    expect(input[0]?.crimeType).toBe(' Burglary ');
  });

  it('returns empty views for no records', () => {
    const cleaned = clean([]);

    expect(cleaned.all).toEqual([]);
    expect(cleaned.exclusions).toEqual({ type: 0, geo: 0, area: 0 });
  });
});
