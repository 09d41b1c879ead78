// Monthly Writer — persists the monthly aggregate table as CSV and, optionally, XLSX

import * as fs from 'node:fs';
import * as path from 'node:path';
import ExcelJS from 'exceljs';
import Papa from 'papaparse';
import { MONTHLY_COLUMNS, MONTHLY_FILE_BASENAME, MONTHLY_SHEET_NAME } from './constants';
import { writeFileAtomic } from './json-file-utils';
import Logger from './logger';
import type { MonthlyTable } from './types';

export function monthlyFilePath(processedDir: string, period: string, extension: 'csv' | 'xlsx'): string {
  return path.join(processedDir, `${MONTHLY_FILE_BASENAME}_${period}.${extension}`);
}

/** Header row: the month key followed by the value columns */
export function monthlyHeader(table: MonthlyTable): string[] {
  return [MONTHLY_COLUMNS.MONTH, ...table.columns];
}

/** Table as rows of cells, month first */
export function monthlyRows(table: MonthlyTable): Array<Array<string | number>> {
  return table.rows.map((row) => [row.month, ...table.columns.map((column) => row.values[column] ?? 0)]);
}

export function monthlyTableToCsv(table: MonthlyTable): string {
  return `${Papa.unparse({ fields: monthlyHeader(table), data: monthlyRows(table) }, { newline: '\n' })}\n`;
}

export function writeMonthlyCsv(filePath: string, table: MonthlyTable): void {
  writeFileAtomic(filePath, monthlyTableToCsv(table));
  Logger.info(`Monthly merged data saved to: ${filePath}`, { months: table.rows.length });
}

export async function writeMonthlyXlsx(filePath: string, table: MonthlyTable): Promise<void> {
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet(MONTHLY_SHEET_NAME);
  sheet.addRow(monthlyHeader(table));
  for (const row of monthlyRows(table)) {
    sheet.addRow(row);
  }
  sheet.getRow(1).font = { bold: true };

  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  await workbook.xlsx.writeFile(filePath);
  Logger.info(`Monthly workbook saved to: ${filePath}`);
}
