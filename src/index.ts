/**
 * Air Health Monthly
 *
 * Fetches air-quality readings and hospital admissions for a month,
 * cleans them, and joins them into one monthly table.
 */

export { default as ConfigManager } from './config-manager';
export * from './constants';
export * from './data-pipeline';
export * from './data-processing';
export * from './errors';
export { default as Logger, getErrorMessage } from './logger';
export * from './monthly-writer';
export { parsePeriod } from './period';
export * from './raw-store';
export { default as SourceOrchestrator } from './sources';
export { default as AirQualitySource } from './sources/air-quality';
export { BaseSource, createHttpClient } from './sources/base-source';
export type { SourceOptions } from './sources/base-source';
export { default as HospitalizationsSource } from './sources/hospitalizations';
export * from './types';
