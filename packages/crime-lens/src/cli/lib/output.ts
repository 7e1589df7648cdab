/**
 * CLI output formatting
 *
 * `--json` prints one document per command; the Maps inside a `Summary`
 * are flattened to arrays for it.
 *
 * @module cli/lib/output
 */

import type { FailureReason, PipelineOutcome, RankedEntry, RecordAccounting, SummaryFacts } from '../../core/types.js';
import { formatTable, type TableColumn } from '../../core/utils/format.js';
import { describeWarning } from '../../report/summary-text.js';

export interface OutcomeJson {
  readonly status: PipelineOutcome['status'];
  readonly facts?: SummaryFacts;
  readonly accounting?: RecordAccounting;
  readonly crimeTypes?: readonly RankedEntry[];
  readonly areas?: readonly RankedEntry[];
  readonly outcomes?: readonly RankedEntry[];
  readonly warnings?: readonly string[];
  readonly failure?: FailureReason;
}

export function outcomeToJson(outcome: PipelineOutcome): OutcomeJson {
  if (outcome.status === 'failure') {
    return { status: outcome.status, failure: outcome.reason };
  }
  const { summary } = outcome;
  return {
    status: outcome.status,
    facts: summary.facts,
    accounting: summary.accounting,
    crimeTypes: summary.crimeTypes.ranking,
    areas: summary.areas.ranking,
    outcomes: summary.outcomes.ranking,
    warnings: summary.warnings.map(describeWarning),
  };
}

export const RANKING_COLUMNS: readonly TableColumn<RankedEntry>[] = [
  { key: 'key', header: 'Name' },
  { key: 'count', header: 'Count', align: 'right' },
  { key: 'share', header: 'Share %', align: 'right', formatter: (value) => Number(value).toFixed(1) },
];

export function formatRanking(entries: readonly RankedEntry[]): string {
  return formatTable(entries, RANKING_COLUMNS);
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

export function printFailure(reason: FailureReason): void {
  console.error(`Analysis failed: ${reason.message}`);
  if (reason.kind === 'ingestion' && reason.missingColumns.length > 0) {
    console.error(`Missing columns: ${reason.missingColumns.join(', ')}`);
  }
}
