// Raw Store — persists fetched record sets as CSV and loads them back with type coercion

import * as fs from 'node:fs';
import * as path from 'node:path';
import Papa from 'papaparse';
import { type DataSource, rawFileName } from './constants';
import { coerceCell } from './data-processing/record-set';
import { RawFileError } from './errors';
import { writeFileAtomic } from './json-file-utils';
import Logger from './logger';
import type { CellValue, RecordSet, Row } from './types';

export function rawFilePath(rawDir: string, source: DataSource, period: string): string {
  return path.join(rawDir, rawFileName(source, period));
}

/** Serialize a cell for CSV: missing → empty, Date → ISO string */
export function formatCell(value: CellValue): string {
  if (value === null) return '';
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

/** Render a record set as CSV text (header row, then one line per row) */
export function recordSetToCsv(records: RecordSet): string {
  if (records.columns.length === 0) return '';
  const data = records.rows.map((row) => records.columns.map((column) => formatCell(row[column] ?? null)));
  return `${Papa.unparse({ fields: records.columns, data }, { newline: '\n' })}\n`;
}

/** Parse CSV text into a record set; cells are coerced to numbers or missing where they read as such */
export function csvToRecordSet(text: string): RecordSet {
  const parsed = Papa.parse<string[]>(text.replace(/^\uFEFF/, ''), { header: false, delimiter: ',', skipEmptyLines: true });
  if (parsed.errors.length > 0) {
    Logger.warn('CSV parse issues:', parsed.errors.map((e) => `row ${e.row}: ${e.message}`));
  }

  const [header = [], ...body] = parsed.data;
  const columns = header.map((name) => name.trim());
  const rows = body.map((cells) => {
    const row: Row = {};
    columns.forEach((column, index) => {
      const cell = cells[index];
      row[column] = cell === undefined ? null : coerceCell(cell);
    });
    return row;
  });

  return { columns, rows };
}

export function saveRawRecordSet(filePath: string, records: RecordSet): void {
  writeFileAtomic(filePath, recordSetToCsv(records));
  Logger.info(`Raw data saved to: ${filePath}`, { rows: records.rows.length });
}

export function loadRawRecordSet(filePath: string): RecordSet {
  if (!fs.existsSync(filePath)) throw new RawFileError(filePath);
  const records = csvToRecordSet(fs.readFileSync(filePath, 'utf8'));
  Logger.debug(`Loaded ${path.basename(filePath)}`, { rows: records.rows.length, columns: records.columns.length });
  return records;
}
