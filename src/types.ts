// Core Type Definitions for the monthly air-quality / hospitalization pipeline
// Single source of truth for all data structure types

import type { DataSource } from './constants';

// ============================================================================
// TABULAR RECORD SETS
// ============================================================================

/** A single cell: timestamp, number, text, or missing (null) */
export type CellValue = Date | number | string | null;

/**
 * One row of a record set. A column listed in the record set but absent
 * from the row reads as missing.
 */
export type Row = Record<string, CellValue>;

/** Ordered rows over a fixed, ordered column set */
export interface RecordSet {
  columns: string[];
  rows: Row[];
}

/**
 * Record set that went through the Cleaner: the date column holds only Date
 * values and no cell is missing.
 */
export interface CleanedRecordSet extends RecordSet {
  dateColumn: string;
  /** Columns the Cleaner classified as numeric (imputed, averaged when aggregated) */
  numericColumns: string[];
}

/** Column split made by the Cleaner */
export interface ColumnClassification {
  numeric: string[];
  text: string[];
}

export interface CleanReport {
  inputRows: number;
  outputRows: number;
  droppedRows: number;
  /** Number of cells filled with the column mean, per numeric column */
  imputed: Record<string, number>;
  numericColumns: string[];
  textColumns: string[];
}

// ============================================================================
// MONTHLY AGGREGATE TABLE
// ============================================================================

export interface MonthlyRow {
  /** Last calendar day of the month, YYYY-MM-DD */
  month: string;
  values: Record<string, number>;
}

export interface MonthlyTable {
  /** Value columns in output order (the month key is not listed) */
  columns: string[];
  rows: MonthlyRow[];
}

// ============================================================================
// PERIODS
// ============================================================================

/** A requested calendar month, e.g. { year: 2024, month: 1, key: '2024-01' } */
export interface Period {
  year: number;
  month: number;
  key: string;
}

// ============================================================================
// CONFIGURATION
// ============================================================================

export interface HospitalizationFilter {
  city: string;
  cidStart: string;
  cidEnd: string;
}

export interface PipelineConfig {
  airQualityUrl: string;
  hospitalizationsUrl: string;
  stations: number[];
  filteredHospitalizations: HospitalizationFilter;
  /** Relative paths resolve against the data directory */
  rawDir: string;
  processedDir: string;
  writeXlsx: boolean;
  requestTimeoutMs: number;
}

// ============================================================================
// FETCH LAYER
// ============================================================================

export type FetchStatus = 'fetching' | 'fetched' | 'error';

export interface FetchProgress {
  source: DataSource;
  status: FetchStatus;
  rows?: number;
  durationMs?: number;
  error?: string;
}

export type ProgressCallback = ((progress: FetchProgress) => void) | null;

/** A raw record as returned by a remote API (one reading or one admission) */
export type RawRecord = Record<string, unknown>;

export type RawRecordSets = Record<DataSource, RecordSet>;

export interface FetchResults {
  period: string;
  files: Record<DataSource, string>;
  rows: Record<DataSource, number>;
}

// ============================================================================
// PIPELINE RESULTS
// ============================================================================

export interface ProcessResult {
  period: string;
  table: MonthlyTable;
  reports: Record<DataSource, CleanReport>;
  outputs: { csv: string; xlsx: string | null };
}
