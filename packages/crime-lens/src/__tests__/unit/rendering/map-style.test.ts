/**
 * Map Style Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { areaRadius, densityTier, quantile, tierThresholds } from '../../../rendering/map-style.js';

describe('quantile', () => {
  it('interpolates between closest ranks', () => {
    expect(quantile([4, 1, 3, 2], 0.5)).toBe(2.5);
    expect(quantile([1, 2, 3, 4], 0.75)).toBe(3.25);
    expect(quantile([1, 2, 3, 4], 0)).toBe(1);
    expect(quantile([1, 2, 3, 4], 1)).toBe(4);
  });

  it('handles single and empty samples', () => {
    expect(quantile([5], 0.75)).toBe(5);
    expect(quantile([], 0.5)).toBeNaN();
  });
});

describe('densityTier', () => {
  const thresholds = tierThresholds([1, 2, 3, 4]);

  it('splits on the median and upper quartile, exclusive', () => {
    expect(thresholds).toEqual({ median: 2.5, upperQuartile: 3.25 });
    expect(densityTier(4, thresholds)).toBe('very-high');
    expect(densityTier(3.25, thresholds)).toBe('high');
    expect(densityTier(3, thresholds)).toBe('high');
    expect(densityTier(2.5, thresholds)).toBe('moderate');
    expect(densityTier(1, thresholds)).toBe('moderate');
  });
});

describe('areaRadius', () => {
  it('grows with the square root of the count', () => {
    expect(areaRadius(25)).toBe(100);
    expect(areaRadius(0)).toBe(0);
  });
});
