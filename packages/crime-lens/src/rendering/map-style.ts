/**
 * Marker and area styling by quartile of incident count
 */

export const DENSITY_TIERS = ['very-high', 'high', 'moderate'] as const;

export type DensityTier = (typeof DENSITY_TIERS)[number];

export interface TierStyle {
  readonly label: string;
  readonly color: string;
  readonly fillColor: string;
}

export const TIER_STYLES: Record<DensityTier, TierStyle> = {
  'very-high': { label: 'Very High (Top 25%)', color: 'darkred', fillColor: 'red' },
  high: { label: 'High (25-50%)', color: 'orange', fillColor: 'orange' },
  moderate: { label: 'Moderate (Below 50%)', color: 'gold', fillColor: 'yellow' },
};

/**
 * Quantile with linear interpolation between closest ranks
 *
 * @param values - Sample (any order)
 * @param q - Quantile in [0, 1]
 * @returns NaN for an empty sample
 */
export function quantile(values: readonly number[], q: number): number {
  if (values.length === 0) return Number.NaN;
  const sorted = [...values].sort((a, b) => a - b);
  const position = (sorted.length - 1) * Math.min(Math.max(q, 0), 1);
  const lower = Math.floor(position);
  const upper = Math.ceil(position);
  const lowValue = sorted[lower] ?? 0;
  const highValue = sorted[upper] ?? lowValue;
  return lowValue + (highValue - lowValue) * (position - lower);
}

export interface TierThresholds {
  readonly median: number;
  readonly upperQuartile: number;
}

export function tierThresholds(values: readonly number[]): TierThresholds {
  return { median: quantile(values, 0.5), upperQuartile: quantile(values, 0.75) };
}

/**
 * Strictly above the upper quartile is very high, strictly above the
 * median is high, anything else moderate
 */
export function densityTier(value: number, thresholds: TierThresholds): DensityTier {
  if (value > thresholds.upperQuartile) return 'very-high';
  if (value > thresholds.median) return 'high';
  return 'moderate';
}

/**
 * Area circle radius in metres
 */
export function areaRadius(count: number): number {
  return Math.sqrt(count) * 20;
}
