/**
 * Ranking helpers shared by the aggregator and the geospatial summarizer.
 *
 * Ordering is count descending with ties broken by code-unit string order
 * (not locale order), so repeated runs produce identical sequences.
 */

import type { RankedEntry } from '../types.js';

/**
 * Locale-independent string comparison
 */
export function compareKeys(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Percentage of `total`, rounded to 2 decimal places (0 when total is 0)
 */
export function shareOf(count: number, total: number): number {
  if (total <= 0) return 0;
  return Math.round((count / total) * 10000) / 100;
}

/**
 * Count items by key. Items whose key is `null` are skipped.
 */
export function countBy<T>(
  items: readonly T[],
  keyOf: (item: T) => string | null
): Map<string, number> {
  const counts = new Map<string, number>();
  for (const item of items) {
    const key = keyOf(item);
    if (key === null) continue;
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  return counts;
}

/**
 * Rank counted groups, optionally truncated to `limit` entries
 *
 * @param counts - Group key → count
 * @param total - Denominator for `share`
 * @param limit - Maximum entries to return (all when omitted)
 */
export function rankCounts(
  counts: ReadonlyMap<string, number>,
  total: number,
  limit?: number
): RankedEntry[] {
  const ranked = [...counts.entries()]
    .sort(([keyA, countA], [keyB, countB]) => countB - countA || compareKeys(keyA, keyB))
    .map(([key, count]) => ({ key, count, share: shareOf(count, total) }));

  return limit === undefined ? ranked : ranked.slice(0, limit);
}

/**
 * Mode of a counted group (ties: smallest key), or null when empty
 */
export function modeOf(counts: ReadonlyMap<string, number>): string | null {
  const [first] = rankCounts(counts, 0, 1);
  return first?.key ?? null;
}

/**
 * Validate a top-N argument
 *
 * @throws RangeError for negative or non-integer values
 */
export function assertTopN(topN: number, name = 'topN'): void {
  if (!Number.isInteger(topN) || topN < 0) {
    throw new RangeError(`${name} must be a non-negative integer, got ${topN}`);
  }
}
