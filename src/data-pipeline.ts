// Data Pipeline — fetch → raw CSV, then raw CSV → clean ×3 → aggregate → monthly outputs.
// Every step runs to completion before the next one starts.

import ConfigManager from './config-manager';
import { DATA_SOURCES, DATE_COLUMNS, type DataSource } from './constants';
import { aggregate } from './data-processing/aggregator';
import { cleanWithReport } from './data-processing/cleaner';
import Logger from './logger';
import { monthlyFilePath, writeMonthlyCsv, writeMonthlyXlsx } from './monthly-writer';
import { parsePeriod } from './period';
import { loadRawRecordSet, rawFilePath, saveRawRecordSet } from './raw-store';
import SourceOrchestrator from './sources';
import type { CleanReport, FetchResults, MonthlyTable, PipelineConfig, ProcessResult, ProgressCallback, RawRecordSets } from './types';

// ============================================================================
// IN-MEMORY PROCESSING
// ============================================================================

/** Build a per-source record by calling fn for each source in pipeline order */
export function mapSources<T>(fn: (source: DataSource) => T): Record<DataSource, T> {
  return {
    [DATA_SOURCES.AIR_QUALITY]: fn(DATA_SOURCES.AIR_QUALITY),
    [DATA_SOURCES.HOSPITALIZATIONS]: fn(DATA_SOURCES.HOSPITALIZATIONS),
    [DATA_SOURCES.HOSPITALIZATIONS_FILTERED]: fn(DATA_SOURCES.HOSPITALIZATIONS_FILTERED)
  };
}

export interface ProcessedRecordSets {
  table: MonthlyTable;
  reports: Record<DataSource, CleanReport>;
}

/** Clean each source on its designated date column, then build the monthly table */
export function processRecordSets(sets: RawRecordSets): ProcessedRecordSets {
  const cleaned = mapSources((source) => {
    const result = cleanWithReport(sets[source], DATE_COLUMNS[source]);
    const { inputRows, outputRows, imputed } = result.report;
    Logger.info(`${source}: cleaned ${inputRows} → ${outputRows} row(s)`, { imputed });
    return result;
  });

  const table = aggregate(
    cleaned.air_quality.records,
    cleaned.hospitalizations.records,
    cleaned.hospitalizations_filtered.records
  );
  Logger.info(`Aggregated ${table.rows.length} month(s)`, { columns: table.columns });
  return { table, reports: mapSources((source) => cleaned[source].report) };
}

// ============================================================================
// FILE-BACKED STEPS
// ============================================================================

export interface PipelineContext {
  dataDir: string;
  config: PipelineConfig;
  rawDir: string;
  processedDir: string;
}

/** Load (or create) config.json under dataDir and resolve its directories */
export function createContext(dataDir: string): PipelineContext {
  const configManager = new ConfigManager(dataDir);
  const config = configManager.loadConfig();
  return { dataDir, config, ...configManager.resolveDirs(config) };
}

export function loadRawRecordSets(rawDir: string, period: string): RawRecordSets {
  return mapSources((source) => loadRawRecordSet(rawFilePath(rawDir, source, period)));
}

/** Fetch all three sources for a period and store them as raw CSV files */
export async function fetchPeriod(
  context: PipelineContext,
  periodValue: string,
  orchestrator: SourceOrchestrator = new SourceOrchestrator(context.config),
  progressCallback: ProgressCallback = null
): Promise<FetchResults> {
  const period = parsePeriod(periodValue);
  orchestrator.setProgressCallback(progressCallback);
  const sets = await orchestrator.fetchAll(period);

  const files = mapSources((source) => {
    const filePath = rawFilePath(context.rawDir, source, period.key);
    saveRawRecordSet(filePath, sets[source]);
    return filePath;
  });

  return { period: period.key, files, rows: mapSources((source) => sets[source].rows.length) };
}

/** Load the raw files for a period, clean and aggregate them, and write the monthly outputs */
export async function processPeriod(context: PipelineContext, periodValue: string): Promise<ProcessResult> {
  const period = parsePeriod(periodValue);
  const { table, reports } = processRecordSets(loadRawRecordSets(context.rawDir, period.key));

  const csv = monthlyFilePath(context.processedDir, period.key, 'csv');
  writeMonthlyCsv(csv, table);

  let xlsx: string | null = null;
  if (context.config.writeXlsx) {
    xlsx = monthlyFilePath(context.processedDir, period.key, 'xlsx');
    await writeMonthlyXlsx(xlsx, table);
  }

  return { period: period.key, table, reports, outputs: { csv, xlsx } };
}
