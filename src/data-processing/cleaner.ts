// Cleaner — normalizes one record set: date parsing, numeric mean imputation,
// and removal of rows with missing text values. Pure: the input is not mutated.

import { EmptyColumnError, MissingColumnError, ParseError } from '../errors';
import Logger from '../logger';
import type { CleanedRecordSet, CleanReport, RecordSet, Row } from '../types';
import { parseTimestamp } from './dates';
import { cellOf, classifyColumns, columnMean, isMissing } from './record-set';

export interface CleanResult {
  records: CleanedRecordSet;
  report: CleanReport;
}

/** Parse every value of the date column, failing on the first one that is not a timestamp */
function parseDateColumn(records: RecordSet, dateColumn: string): Date[] {
  return records.rows.map((row, index) => {
    const value = cellOf(row, dateColumn);
    const parsed = parseTimestamp(value);
    if (!parsed) throw new ParseError(dateColumn, index, value);
    return parsed;
  });
}

/** Means of the numeric columns, computed before any cell is filled */
function computeMeans(records: RecordSet, numericColumns: string[]): Map<string, number> {
  const means = new Map<string, number>();
  if (records.rows.length === 0) return means;
  for (const column of numericColumns) {
    const mean = columnMean(records.rows, column);
    if (mean === null) throw new EmptyColumnError(column);
    means.set(column, mean);
  }
  return means;
}

/**
 * Clean a record set and report what changed.
 *
 * 1. Every date value is parsed (ParseError on the first failure).
 * 2. Missing numeric cells are filled with their column's mean over the original data.
 * 3. Rows with a missing value in any text column are dropped.
 */
export function cleanWithReport(records: RecordSet, dateColumn: string): CleanResult {
  if (!records.columns.includes(dateColumn)) {
    throw new MissingColumnError(dateColumn, records.columns);
  }

  const dates = parseDateColumn(records, dateColumn);
  const { numeric, text } = classifyColumns(records, dateColumn);
  const means = computeMeans(records, numeric);

  const imputed: Record<string, number> = {};
  for (const column of numeric) imputed[column] = 0;

  const rows: Row[] = [];
  records.rows.forEach((row, index) => {
    if (text.some((column) => isMissing(cellOf(row, column)))) return;

    const cleaned: Row = {};
    for (const column of records.columns) {
      const value = cellOf(row, column);
      const mean = means.get(column);
      if (column === dateColumn) {
        cleaned[column] = dates[index];
      } else if (mean !== undefined && value === null) {
        cleaned[column] = mean;
        imputed[column]++;
      } else {
        cleaned[column] = value;
      }
    }
    rows.push(cleaned);
  });

  const report: CleanReport = {
    inputRows: records.rows.length,
    outputRows: rows.length,
    droppedRows: records.rows.length - rows.length,
    imputed,
    numericColumns: numeric,
    textColumns: text
  };

  return {
    records: { columns: [...records.columns], rows, dateColumn, numericColumns: [...numeric] },
    report
  };
}

/** Clean a record set (see cleanWithReport) */
export function clean(records: RecordSet, dateColumn: string): CleanedRecordSet {
  const { records: cleaned, report } = cleanWithReport(records, dateColumn);
  if (report.droppedRows > 0) {
    Logger.debug(`Dropped ${report.droppedRows} row(s) with missing text values`, { dateColumn });
  }
  return cleaned;
}
