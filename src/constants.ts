// Application-wide Constants
// Single source of truth for column names, file names, and configuration defaults

// ============================================================================
// DATA SOURCE IDENTIFIERS
// ============================================================================

export const DATA_SOURCES = {
  AIR_QUALITY: 'air_quality',
  HOSPITALIZATIONS: 'hospitalizations',
  HOSPITALIZATIONS_FILTERED: 'hospitalizations_filtered'
} as const;

export type DataSource = (typeof DATA_SOURCES)[keyof typeof DATA_SOURCES];

// ============================================================================
// DESIGNATED DATE COLUMNS
// ============================================================================

export const DATE_COLUMNS: Record<DataSource, string> = {
  [DATA_SOURCES.AIR_QUALITY]: 'timestamp',
  [DATA_SOURCES.HOSPITALIZATIONS]: 'admission_date',
  [DATA_SOURCES.HOSPITALIZATIONS_FILTERED]: 'admission_date'
};

// ============================================================================
// MONTHLY TABLE COLUMNS
// ============================================================================

/** Namespace tag for averaged air-quality columns (pm25 → air_pm25) */
export const AIR_PREFIX = 'air_';

export const MONTHLY_COLUMNS = {
  MONTH: 'month',
  HOSPITALIZATIONS_TOTAL: 'hospitalizations_total',
  HOSPITALIZATIONS_FILTERED: 'hospitalizations_jp'
} as const;

// ============================================================================
// TYPE COERCION
// ============================================================================

/** Cell contents read as missing when loading raw CSV files (compared after trimming) */
export const MISSING_MARKERS: ReadonlySet<string> = new Set(['', 'NA', 'N/A', 'NaN', 'nan', 'null', 'NULL']);

export const NUMERIC_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

// ============================================================================
// FILES
// ============================================================================

/** Raw file name for a source and period, e.g. air_quality_2024-01.csv */
export function rawFileName(source: DataSource, period: string): string {
  return `${source}_${period}.csv`;
}

export const MONTHLY_FILE_BASENAME = 'merged_monthly';

export const MONTHLY_SHEET_NAME = 'monthly';

export const CONFIG_FILE = 'config.json';

export const DEFAULT_DATA_DIR = 'data';

// ============================================================================
// REMOTE API DEFAULTS
// ============================================================================

export const DEFAULT_AIR_QUALITY_URL = 'https://api.municipal.gov.br/qualidade_ar';

export const DEFAULT_HOSPITALIZATIONS_URL = 'https://datasus.saude.gov.br/api/internacoes';

export const DEFAULT_STATIONS: readonly number[] = [101, 102, 103, 104];

export const DEFAULT_HOSPITALIZATION_FILTER = {
  city: 'João Pessoa',
  cidStart: 'J00',
  cidEnd: 'J99'
} as const;

export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;
