// Aggregator — resamples the three cleaned record sets to calendar months
// and outer-joins them into one zero-filled monthly table.

import { AIR_PREFIX, DATA_SOURCES, DATE_COLUMNS, MONTHLY_COLUMNS } from '../constants';
import { MissingColumnError, ParseError } from '../errors';
import type { CleanedRecordSet, MonthlyRow, MonthlyTable, RecordSet, Row } from '../types';
import { monthEndKey } from './dates';
import { cellOf } from './record-set';

/** Monthly series: month key → column → value */
type MonthlySeries = Map<string, Record<string, number>>;

interface ResampledMeans {
  columns: string[];
  series: MonthlySeries;
}

function requireDateColumn(records: RecordSet, dateColumn: string): void {
  if (!records.columns.includes(dateColumn)) {
    throw new MissingColumnError(dateColumn, records.columns);
  }
}

/** Month bucket of a cleaned row; the date cell must already be a Date */
function monthOf(row: Row, dateColumn: string, index: number): string {
  const value = cellOf(row, dateColumn);
  if (!(value instanceof Date) || Number.isNaN(value.getTime())) {
    throw new ParseError(dateColumn, index, value);
  }
  return monthEndKey(value);
}

/**
 * Per-month mean of every column the Cleaner classified as numeric, renamed
 * with the given prefix.
 */
export function resampleMeans(records: CleanedRecordSet, dateColumn: string, prefix: string): ResampledMeans {
  requireDateColumn(records, dateColumn);
  const sourceColumns = records.numericColumns.filter((column) => column !== dateColumn);
  const sums = new Map<string, { count: number; totals: Record<string, number> }>();

  records.rows.forEach((row, index) => {
    const month = monthOf(row, dateColumn, index);
    let bucket = sums.get(month);
    if (!bucket) {
      bucket = { count: 0, totals: {} };
      for (const column of sourceColumns) bucket.totals[column] = 0;
      sums.set(month, bucket);
    }
    bucket.count++;
    for (const column of sourceColumns) {
      const value = cellOf(row, column);
      bucket.totals[column] += typeof value === 'number' ? value : 0;
    }
  });

  const series: MonthlySeries = new Map();
  for (const [month, bucket] of sums) {
    const means: Record<string, number> = {};
    for (const column of sourceColumns) {
      means[`${prefix}${column}`] = bucket.totals[column] / bucket.count;
    }
    series.set(month, means);
  }

  return { columns: sourceColumns.map((column) => `${prefix}${column}`), series };
}

/** Per-month row count, as a single named column */
export function resampleCounts(records: RecordSet, dateColumn: string, column: string): MonthlySeries {
  requireDateColumn(records, dateColumn);
  const counts = new Map<string, number>();
  records.rows.forEach((row, index) => {
    const month = monthOf(row, dateColumn, index);
    counts.set(month, (counts.get(month) ?? 0) + 1);
  });

  const series: MonthlySeries = new Map();
  for (const [month, count] of counts) {
    series.set(month, { [column]: count });
  }
  return series;
}

/**
 * Outer-join monthly series on the month key. Months come out ascending and
 * every column absent for a month is filled with 0.
 */
export function joinMonthly(columns: string[], seriesList: MonthlySeries[]): MonthlyTable {
  const months = new Set<string>();
  for (const series of seriesList) {
    for (const month of series.keys()) months.add(month);
  }

  const rows: MonthlyRow[] = [...months].sort().map((month) => {
    const values: Record<string, number> = {};
    for (const column of columns) values[column] = 0;
    for (const series of seriesList) {
      const entry = series.get(month);
      if (entry) Object.assign(values, entry);
    }
    return { month, values };
  });

  return { columns, rows };
}

/**
 * Build the monthly table from cleaned air-quality, all-cause hospitalization
 * and filtered hospitalization record sets.
 */
export function aggregate(air: CleanedRecordSet, allHosp: RecordSet, filteredHosp: RecordSet): MonthlyTable {
  const airMonthly = resampleMeans(air, DATE_COLUMNS[DATA_SOURCES.AIR_QUALITY], AIR_PREFIX);
  const hospMonthly = resampleCounts(allHosp, DATE_COLUMNS[DATA_SOURCES.HOSPITALIZATIONS], MONTHLY_COLUMNS.HOSPITALIZATIONS_TOTAL);
  const filteredMonthly = resampleCounts(
    filteredHosp,
    DATE_COLUMNS[DATA_SOURCES.HOSPITALIZATIONS_FILTERED],
    MONTHLY_COLUMNS.HOSPITALIZATIONS_FILTERED
  );

  const columns = [...airMonthly.columns, MONTHLY_COLUMNS.HOSPITALIZATIONS_TOTAL, MONTHLY_COLUMNS.HOSPITALIZATIONS_FILTERED];
  return joinMonthly(columns, [airMonthly.series, hospMonthly, filteredMonthly]);
}
