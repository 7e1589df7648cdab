/**
 * Aggregator
 *
 * Grouped counts over cleaned records. Every function is pure: it reads its
 * input and returns new structures, so independent aggregations can run in
 * any order.
 *
 * @module aggregation/aggregator
 */

import { OUTCOME_NOT_SPECIFIED } from '../core/constants.js';
import type {
  AggregationDimension,
  AggregationResult,
  CleanedRecords,
  MonthCount,
  MonthlyTrend,
  YearMonth,
} from '../core/types.js';
import { assertTopN, countBy, rankCounts } from '../core/utils/ranking.js';

/**
 * Build an AggregationResult from counted groups
 */
function toResult(
  dimension: AggregationDimension,
  counts: ReadonlyMap<string, number>,
  total: number,
  topN?: number
): AggregationResult {
  const ranking = rankCounts(counts, total, topN);
  return {
    dimension,
    counts: new Map(ranking.map((entry): [string, number] => [entry.key, entry.count])),
    ranking,
    total,
    distinctKeys: counts.size,
  };
}

/**
 * Incidents per crime type
 */
export function crimeTypeCounts(cleaned: CleanedRecords): AggregationResult {
  const records = cleaned.forTypeAnalysis;
  return toResult('crime-type', countBy(records, (r) => r.crimeType), records.length);
}

/**
 * Distinct months present anywhere in the dataset, ascending
 */
export function observedMonths(cleaned: CleanedRecords): YearMonth[] {
  return [...new Set(cleaned.all.map((r) => r.month))].sort();
}

/**
 * Monthly counts for the `topN` most common crime types
 *
 * Every series spans all observed months; months without incidents of that
 * type are present with count 0.
 */
export function monthlyTrend(cleaned: CleanedRecords, topN: number): MonthlyTrend {
  assertTopN(topN);
  const months = observedMonths(cleaned);
  const topTypes = crimeTypeCounts(cleaned).ranking.slice(0, topN).map((entry) => entry.key);

  const perType = new Map<string, Map<YearMonth, number>>(
    topTypes.map((type): [string, Map<YearMonth, number>] => [type, new Map()])
  );
  for (const record of cleaned.forTypeAnalysis) {
    const byMonth = perType.get(record.crimeType);
    if (!byMonth) continue;
    byMonth.set(record.month, (byMonth.get(record.month) ?? 0) + 1);
  }

  const series = new Map<string, readonly MonthCount[]>();
  for (const type of topTypes) {
    const byMonth = perType.get(type);
    series.set(
      type,
      months.map((month) => ({ month, count: byMonth?.get(month) ?? 0 }))
    );
  }

  return { months, series };
}

/**
 * Incidents per area, ranking truncated to `topN`
 */
export function areaCounts(cleaned: CleanedRecords, topN: number): AggregationResult {
  assertTopN(topN);
  const records = cleaned.forAreaAnalysis;
  return toResult('area', countBy(records, (r) => r.areaName), records.length, topN);
}

/**
 * Incidents per last outcome; empty outcomes count as "Not specified"
 */
export function outcomeDistribution(cleaned: CleanedRecords): AggregationResult {
  const records = cleaned.all;
  return toResult(
    'outcome',
    countBy(records, (r) => (r.outcome === '' ? OUTCOME_NOT_SPECIFIED : r.outcome)),
    records.length
  );
}
