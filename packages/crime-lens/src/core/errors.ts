/**
 * Crime Lens Error Types
 *
 * Fatal conditions are thrown as these classes and converted into a
 * `Failure` outcome by the pipeline. Per-row and per-field problems are
 * never thrown; they are collected as `RowRejected` / `FieldUnusable` data.
 */

/**
 * Ingestion failure codes
 */
export type IngestionErrorCode = 'MISSING_COLUMNS' | 'UNREADABLE_INPUT';

/**
 * Error thrown when the input cannot be ingested at all.
 *
 * Raised before any row is processed: a table that lacks a required
 * column, or a source path that cannot be read.
 *
 * RECOVERY:
 * - Check the CSV header against REQUIRED_COLUMNS
 * - Check the configured input path exists and is readable
 */
export class IngestionError extends Error {
  public readonly name = 'IngestionError' as const;

  constructor(
    message: string,
    public readonly code: IngestionErrorCode,
    public readonly missingColumns: readonly string[] = [],
    public readonly source?: string
  ) {
    super(message);
    Object.setPrototypeOf(this, IngestionError.prototype);
  }
}

/**
 * Error thrown when no record survived ingestion.
 *
 * Reported as a `Failure` outcome rather than crashing the process, so
 * that no chart is rendered from an empty aggregation.
 */
export class EmptyDatasetError extends Error {
  public readonly name = 'EmptyDatasetError' as const;

  constructor(
    message: string,
    public readonly rejected: number = 0
  ) {
    super(message);
    Object.setPrototypeOf(this, EmptyDatasetError.prototype);
  }
}

/**
 * Error thrown for an invalid configuration file or override
 */
export class ConfigError extends Error {
  public readonly name = 'ConfigError' as const;

  constructor(
    message: string,
    public readonly configPath: string | null,
    public readonly issues: readonly string[] = []
  ) {
    super(message);
    Object.setPrototypeOf(this, ConfigError.prototype);
  }

  /**
   * Get formatted issue list
   */
  getSummary(): string {
    const lines = [this.message];
    for (const issue of this.issues) {
      lines.push(`  - ${issue}`);
    }
    return lines.join('\n');
  }
}

/**
 * Extract a printable message from an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
