export { aggregate, joinMonthly, resampleCounts, resampleMeans } from './aggregator';
export { clean, cleanWithReport } from './cleaner';
export type { CleanResult } from './cleaner';
export { daysInMonth, monthEndKey, parseTimestamp, ZonedDate } from './dates';
export { cellOf, classifyColumns, coerceCell, coerceRawValue, columnMean, isMissing, toRecordSet } from './record-set';
