/**
 * Process exit codes
 *
 * @module cli/lib/exit-codes
 */

import type { PipelineOutcome } from '../../core/types.js';

export const EXIT_CODES = {
  SUCCESS: 0,
  WARNINGS: 1,
  ERRORS: 2,
  CONFIG_ERROR: 3,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export function exitCodeFor(outcome: PipelineOutcome): ExitCode {
  switch (outcome.status) {
    case 'success':
      return EXIT_CODES.SUCCESS;
    case 'partial-success':
      return EXIT_CODES.WARNINGS;
    case 'failure':
      return EXIT_CODES.ERRORS;
  }
}
