/**
 * Summary Text Unit Tests
 */

import { describe, it, expect } from 'vitest';
import type { Summary } from '../../../core/types.js';
import { describeWarning, formatSummaryReport } from '../../../report/summary-text.js';
import { sampleSummary } from '../../utils/summaries.js';

const RULE = '='.repeat(60);

describe('describeWarning', () => {
  it('describes each warning kind', () => {
    expect(describeWarning({ kind: 'rows-rejected', count: 3, reasons: { 'unparseable date': 3 } })).toBe(
      '3 row(s) rejected (unparseable date: 3)'
    );
    expect(describeWarning({ kind: 'high-reject-rate', rate: 0.25, threshold: 0.05 })).toBe(
      'Reject rate 25.0% exceeds 5.0%'
    );
    expect(
      describeWarning({ kind: 'dimension-excluded', dimension: 'geo', excluded: 40, rate: 0.5, threshold: 0.25 })
    ).toBe('Map analysis: 40 record(s) excluded (50.0%, threshold 25.0%)');
    expect(describeWarning({ kind: 'empty-aggregation', dimension: 'area' })).toBe(
      'Area analysis: no usable records, output skipped'
    );
  });
});

describe('formatSummaryReport', () => {
  it('renders the full report', () => {
    const expected = [
      RULE,
      'CRIME ANALYSIS - SUMMARY REPORT',
      RULE,
      '',
      'Total records processed: 4',
      '  Accepted: 3',
      '  Rejected: 1',
      'Date range: 2024-01 to 2024-02',
      '',
      'Most common crime: Burglary',
      '  Count: 2 (66.7%)',
      '',
      'Highest crime area: A',
      '  Count: 2 (66.7%)',
      '',
      'Most common outcome: Under investigation',
      '  Count: 2 (66.7%)',
      '',
      'Distinct crime types: 2',
      'Distinct areas: 2',
      'Records with usable coordinates: 3',
      '',
      'Excluded records:',
      '  Crime type analysis: 0 excluded, 3 used',
      '  Map analysis: 0 excluded, 3 used',
      '  Area analysis: 0 excluded, 3 used',
    ].join('\n') + '\n';

    expect(formatSummaryReport(sampleSummary())).toBe(expected);
  });

  it('uses the given title', () => {
    const lines = formatSummaryReport(sampleSummary(), 'CAMBRIDGE - SUMMARY REPORT').split('\n');

    expect(lines[1]).toBe('CAMBRIDGE - SUMMARY REPORT');
  });

  it('appends warnings', () => {
    const summary: Summary = {
      ...sampleSummary(),
      warnings: [{ kind: 'empty-aggregation', dimension: 'area' }],
    };

    const lines = formatSummaryReport(summary).trimEnd().split('\n');

    expect(lines.slice(-3)).toEqual(['', 'Warnings:', '  - Area analysis: no usable records, output skipped']);
  });

  it('prints n/a for missing facts', () => {
    const base = sampleSummary();
    const summary: Summary = {
      ...base,
      facts: { ...base.facts, mostAffectedArea: null, dateRange: null },
    };

    const text = formatSummaryReport(summary);

    expect(text).toContain('\nHighest crime area: n/a\n\nMost common outcome');
    expect(text).toContain('\nDate range: n/a\n');
  });
});
