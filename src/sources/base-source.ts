// Base Source — shared axios client, progress reporting, and record-set conversion

import axios, { type AxiosInstance } from 'axios';
import { DATE_COLUMNS, type DataSource } from '../constants';
import { toRecordSet } from '../data-processing/record-set';
import Logger, { getErrorMessage } from '../logger';
import type { FetchStatus, Period, PipelineConfig, ProgressCallback, RawRecord, RecordSet } from '../types';

export interface SourceOptions {
  /** Pre-built client (tests pass one with an in-process adapter) */
  client?: AxiosInstance;
  progressCallback?: ProgressCallback;
}

export function createHttpClient(config: PipelineConfig): AxiosInstance {
  return axios.create({
    timeout: config.requestTimeoutMs,
    headers: { Accept: 'application/json' }
  });
}

export abstract class BaseSource {
  readonly source: DataSource;
  protected config: PipelineConfig;
  protected client: AxiosInstance;
  progressCallback: ProgressCallback;

  constructor(source: DataSource, config: PipelineConfig, options: SourceOptions = {}) {
    this.source = source;
    this.config = config;
    this.client = options.client ?? createHttpClient(config);
    this.progressCallback = options.progressCallback ?? null;
  }

  sendStatus(status: FetchStatus, details: { rows?: number; durationMs?: number; error?: string } = {}): void {
    if (this.progressCallback) {
      this.progressCallback({ source: this.source, status, ...details });
    }
  }

  /**
   * Fetch the records for one period as a record set.
   * Transport and HTTP errors are reported, logged, and rethrown unchanged.
   */
  async fetch(period: Period): Promise<RecordSet> {
    this.sendStatus('fetching');
    const start = Date.now();
    try {
      const records = await this.fetchRecords(period);
      const recordSet = toRecordSet(records);
      // An empty response still needs its date column so the set can be cleaned
      const dateColumn = DATE_COLUMNS[this.source];
      if (recordSet.rows.length === 0 && !recordSet.columns.includes(dateColumn)) {
        recordSet.columns.push(dateColumn);
      }
      const durationMs = Date.now() - start;
      this.sendStatus('fetched', { rows: recordSet.rows.length, durationMs });
      Logger.info(`${this.source}: fetched ${recordSet.rows.length} record(s) for ${period.key} in ${durationMs}ms`);
      return recordSet;
    } catch (error) {
      this.sendStatus('error', { durationMs: Date.now() - start, error: getErrorMessage(error) });
      Logger.error(`${this.source}: fetch failed for ${period.key}:`, error);
      throw error;
    }
  }

  protected async getJson(url: string, params: Record<string, string | number>): Promise<unknown> {
    const response = await this.client.get<unknown>(url, { params });
    return response.data;
  }

  protected abstract fetchRecords(period: Period): Promise<RawRecord[]>;
}
