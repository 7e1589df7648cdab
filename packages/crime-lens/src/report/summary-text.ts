/**
 * Plain-text summary report
 *
 * @module report/summary-text
 */

import type { AnalysisDimension, PipelineWarning, RankedEntry, Summary } from '../core/types.js';
import { formatCount } from '../core/utils/format.js';

const RULE = '='.repeat(60);

const DIMENSION_LABELS: Record<AnalysisDimension, string> = {
  type: 'Crime type analysis',
  geo: 'Map analysis',
  area: 'Area analysis',
};

function percent(rate: number): string {
  return `${(rate * 100).toFixed(1)}%`;
}

/**
 * One-line description of a warning
 */
export function describeWarning(warning: PipelineWarning): string {
  switch (warning.kind) {
    case 'rows-rejected': {
      const reasons = Object.entries(warning.reasons)
        .map(([reason, count]) => `${reason}: ${count}`)
        .join(', ');
      return `${formatCount(warning.count)} row(s) rejected (${reasons})`;
    }
    case 'high-reject-rate':
      return `Reject rate ${percent(warning.rate)} exceeds ${percent(warning.threshold)}`;
    case 'dimension-excluded':
      return `${DIMENSION_LABELS[warning.dimension]}: ${formatCount(warning.excluded)} record(s) excluded (${percent(warning.rate)}, threshold ${percent(warning.threshold)})`;
    case 'empty-aggregation':
      return `${DIMENSION_LABELS[warning.dimension]}: no usable records, output skipped`;
  }
}

function factLines(label: string, entry: RankedEntry | null): string[] {
  if (!entry) {
    return [`${label}: n/a`, ''];
  }
  return [
    `${label}: ${entry.key}`,
    `  Count: ${formatCount(entry.count)} (${entry.share.toFixed(1)}%)`,
    '',
  ];
}

/**
 * Render the summary as the text report written next to the charts
 */
export function formatSummaryReport(summary: Summary, title = 'CRIME ANALYSIS - SUMMARY REPORT'): string {
  const { facts, accounting } = summary;
  const lines: string[] = [RULE, title, RULE, ''];

  lines.push(`Total records processed: ${formatCount(facts.totalRecordsProcessed)}`);
  lines.push(`  Accepted: ${formatCount(facts.totalAccepted)}`);
  lines.push(`  Rejected: ${formatCount(facts.totalRejected)}`);
  lines.push(
    facts.dateRange
      ? `Date range: ${facts.dateRange.first} to ${facts.dateRange.last}`
      : 'Date range: n/a'
  );
  lines.push('');

  lines.push(...factLines('Most common crime', facts.mostCommonCrimeType));
  lines.push(...factLines('Highest crime area', facts.mostAffectedArea));
  lines.push(...factLines('Most common outcome', facts.mostCommonOutcome));

  lines.push(`Distinct crime types: ${formatCount(facts.distinctCrimeTypes)}`);
  lines.push(`Distinct areas: ${formatCount(facts.distinctAreas)}`);
  lines.push(`Records with usable coordinates: ${formatCount(facts.recordsWithCoordinates)}`);
  lines.push('');

  lines.push('Excluded records:');
  for (const dimension of ['type', 'geo', 'area'] as const) {
    lines.push(
      `  ${DIMENSION_LABELS[dimension]}: ${formatCount(accounting.excluded[dimension])} excluded, ${formatCount(accounting.usable[dimension])} used`
    );
  }

  if (summary.warnings.length > 0) {
    lines.push('');
    lines.push('Warnings:');
    for (const warning of summary.warnings) {
      lines.push(`  - ${describeWarning(warning)}`);
    }
  }

  return lines.join('\n') + '\n';
}
