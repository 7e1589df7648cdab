/**
 * CSV parsing for crime exports
 *
 * Handles quoted values (including embedded commas, newlines and doubled
 * quotes), CRLF or LF line endings and a leading byte-order mark. Fully
 * blank lines are skipped. Cell text is returned untrimmed; trimming is
 * the ingestor's job.
 *
 * @module ingestion/csv-reader
 */

import type { RawRow, RawTable } from '../core/types.js';

/**
 * Split CSV text into records of cells
 */
export function parseCsvRecords(content: string): string[][] {
  const text = content.charCodeAt(0) === 0xfeff ? content.slice(1) : content;
  const records: string[][] = [];
  let record: string[] = [];
  let current = '';
  let inQuotes = false;

  const endRecord = (): void => {
    record.push(current);
    // A lone empty cell is a blank line
    if (record.length > 1 || record[0] !== '') {
      records.push(record);
    }
    record = [];
    current = '';
  };

  for (let i = 0; i < text.length; i++) {
    const char = text[i];

    if (inQuotes) {
      if (char === '"') {
        if (text[i + 1] === '"') {
          current += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        current += char;
      }
      continue;
    }

    if (char === '"') {
      inQuotes = true;
    } else if (char === ',') {
      record.push(current);
      current = '';
    } else if (char === '\n') {
      endRecord();
    } else if (char === '\r') {
      if (text[i + 1] === '\n') i++;
      endRecord();
    } else {
      current += char;
    }
  }

  if (current !== '' || record.length > 0) {
    endRecord();
  }

  return records;
}

/**
 * Parse a crime CSV export into header + row mappings
 *
 * Short rows are padded with empty cells; cells beyond the header are dropped.
 *
 * @param content - CSV text
 * @param source - File the text came from, recorded on the table
 */
export function readCrimeCsv(content: string, source?: string): RawTable {
  const [header, ...body] = parseCsvRecords(content);
  if (!header) {
    return { columns: [], rows: [], sources: source ? [source] : [] };
  }

  const columns = header.map((h) => h.trim());
  const rows: RawRow[] = body.map((cells) => {
    const row: Record<string, string> = {};
    columns.forEach((column, j) => {
      row[column] = cells[j] ?? '';
    });
    return row;
  });

  return { columns, rows, sources: source ? [source] : [] };
}
