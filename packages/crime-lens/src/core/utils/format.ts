/**
 * Table formatting shared by the CLI and the file renderer.
 *
 * Supports: aligned text tables and RFC 4180 CSV.
 *
 * @module core/utils/format
 */

/**
 * Column definition for table/CSV output
 */
export interface TableColumn<T> {
  readonly key: keyof T & string;
  readonly header: string;
  readonly align?: 'left' | 'right';
  readonly formatter?: (value: T[keyof T & string]) => string;
}

function cellText<T>(row: T, column: TableColumn<T>): string {
  const value = row[column.key];
  if (column.formatter) return column.formatter(value);
  return value === null || value === undefined ? '' : String(value);
}

/**
 * Format rows as an aligned text table
 */
export function formatTable<T>(data: readonly T[], columns: readonly TableColumn<T>[]): string {
  if (data.length === 0) {
    return 'No entries found.';
  }

  const widths = columns.map((col) =>
    Math.max(col.header.length, ...data.map((row) => cellText(row, col).length))
  );

  const pad = (value: string, i: number, align: 'left' | 'right' = 'left'): string => {
    const width = widths[i] ?? value.length;
    return align === 'right' ? value.padStart(width) : value.padEnd(width);
  };

  const headerRow = columns.map((col, i) => pad(col.header, i, col.align)).join(' | ');
  const separator = widths.map((w) => '-'.repeat(w)).join('-+-');
  const dataRows = data.map((row) =>
    columns.map((col, i) => pad(cellText(row, col), i, col.align)).join(' | ')
  );

  return [headerRow, separator, ...dataRows].join('\n');
}

/**
 * Escape a value for CSV output
 */
export function escapeCsv(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Format rows as CSV with a header line
 */
export function formatCsv<T>(data: readonly T[], columns: readonly TableColumn<T>[]): string {
  const headerRow = columns.map((c) => escapeCsv(c.header)).join(',');
  const dataRows = data.map((row) =>
    columns.map((col) => escapeCsv(cellText(row, col))).join(',')
  );
  return [headerRow, ...dataRows].join('\n') + '\n';
}

/**
 * Format a plain string-keyed table (header order given) as CSV
 */
export function formatRawCsv(
  columns: readonly string[],
  rows: readonly Readonly<Record<string, string>>[]
): string {
  const lines = [columns.map(escapeCsv).join(',')];
  for (const row of rows) {
    lines.push(columns.map((column) => escapeCsv(row[column] ?? '')).join(','));
  }
  return lines.join('\n') + '\n';
}

/**
 * Format a duration in milliseconds for display
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  } else if (ms < 60000) {
    return `${(ms / 1000).toFixed(2)}s`;
  }
  const minutes = Math.floor(ms / 60000);
  const seconds = ((ms % 60000) / 1000).toFixed(1);
  return `${minutes}m ${seconds}s`;
}

/**
 * Thousands-separated integer (en-GB)
 */
export function formatCount(value: number): string {
  return value.toLocaleString('en-GB');
}
