/**
 * GeoJSON Conversion Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { boundsOf, centerOf, toAreaFeature, toPointCollection } from '../../../geo/geojson.js';

describe('toPointCollection', () => {
  it('writes longitude before latitude', () => {
    const collection = toPointCollection([{ latitude: 52.2, longitude: 0.12, weight: 2 }]);

    expect(collection.type).toBe('FeatureCollection');
    expect(collection.features).toHaveLength(1);
    expect(collection.features[0]?.geometry.coordinates).toEqual([0.12, 52.2]);
    expect(collection.features[0]?.properties).toEqual({ weight: 2 });
  });
});

describe('toAreaFeature', () => {
  it('carries the area statistics as properties', () => {
    const feature = toAreaFeature({
      areaName: 'Cambridge 001A',
      centroidLat: 52.2,
      centroidLon: 0.12,
      totalCount: 3,
      topCrimeType: 'Burglary',
      breakdown: [{ key: 'Burglary', count: 3, share: 100 }],
    });

    expect(feature.geometry.coordinates).toEqual([0.12, 52.2]);
    expect(feature.properties).toEqual({
      areaName: 'Cambridge 001A',
      totalCount: 3,
      topCrimeType: 'Burglary',
      breakdown: [{ crimeType: 'Burglary', count: 3 }],
    });
  });
});

describe('boundsOf / centerOf', () => {
  const points = [
    { latitude: 52.1, longitude: 0.1, weight: 1 },
    { latitude: 52.3, longitude: 0.2, weight: 1 },
  ];

  it('returns [minLon, minLat, maxLon, maxLat]', () => {
    expect(boundsOf(points)).toEqual([0.1, 52.1, 0.2, 52.3]);
  });

  it('returns the mean position', () => {
    const center = centerOf(points);

    expect(center?.latitude).toBeCloseTo(52.2, 10);
    expect(center?.longitude).toBeCloseTo(0.15, 10);
  });

  it('returns null for no points', () => {
    expect(boundsOf([])).toBeNull();
    expect(centerOf([])).toBeNull();
  });
});
