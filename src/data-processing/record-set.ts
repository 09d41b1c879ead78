// Record Set Helpers — cell access, type coercion, and column classification

import { MISSING_MARKERS, NUMERIC_PATTERN } from '../constants';
import type { CellValue, ColumnClassification, RawRecord, RecordSet, Row } from '../types';

/** True for null/undefined and NaN (a number that carries no value) */
export function isMissing(value: unknown): value is null | undefined {
  return value === null || value === undefined || (typeof value === 'number' && Number.isNaN(value));
}

/** Read a cell, treating a column absent from the row as missing */
export function cellOf(row: Row, column: string): CellValue {
  const value = row[column];
  return isMissing(value) ? null : value;
}

/**
 * Coerce one CSV cell. Missing markers become null, decimal numbers become
 * numbers, everything else stays text exactly as written.
 *
 * @example
 * coerceCell('12.5')  // => 12.5
 * coerceCell(' NA ')  // => null
 * coerceCell('2024-01-05') // => '2024-01-05'
 */
export function coerceCell(raw: string): CellValue {
  const trimmed = raw.trim();
  if (MISSING_MARKERS.has(trimmed)) return null;
  if (NUMERIC_PATTERN.test(trimmed)) return Number(trimmed);
  return raw;
}

/** Coerce a JSON value from an API response into a cell */
export function coerceRawValue(value: unknown): CellValue {
  if (isMissing(value)) return null;
  if (typeof value === 'number') return value;
  if (typeof value === 'string') return coerceCell(value);
  if (value instanceof Date) return value;
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

/** Build a record set from API records; columns follow first-seen key order */
export function toRecordSet(records: RawRecord[]): RecordSet {
  const columns: string[] = [];
  const seen = new Set<string>();
  for (const record of records) {
    for (const key of Object.keys(record)) {
      if (!seen.has(key)) {
        seen.add(key);
        columns.push(key);
      }
    }
  }

  const rows = records.map((record) => {
    const row: Row = {};
    for (const column of columns) {
      row[column] = coerceRawValue(record[column]);
    }
    return row;
  });

  return { columns, rows };
}

/**
 * Split the non-date columns into numeric and text.
 * A column is numeric when every non-missing value is a number; a column with
 * no values at all counts as numeric.
 */
export function classifyColumns(records: RecordSet, dateColumn: string): ColumnClassification {
  const numeric: string[] = [];
  const text: string[] = [];
  for (const column of records.columns) {
    if (column === dateColumn) continue;
    const allNumbers = records.rows.every((row) => {
      const value = cellOf(row, column);
      return value === null || typeof value === 'number';
    });
    (allNumbers ? numeric : text).push(column);
  }
  return { numeric, text };
}

/** Arithmetic mean over the non-missing numbers of a column, or null when there are none */
export function columnMean(rows: Row[], column: string): number | null {
  let sum = 0;
  let count = 0;
  for (const row of rows) {
    const value = cellOf(row, column);
    if (typeof value === 'number') {
      sum += value;
      count++;
    }
  }
  return count === 0 ? null : sum / count;
}
