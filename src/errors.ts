// Pipeline Errors — every failure the pipeline raises on purpose carries a stable code.
// Transport errors from axios are not wrapped; they propagate as-is.

export const ERROR_CODE = {
  PARSE_ERROR: 'PARSE_ERROR',
  EMPTY_COLUMN: 'EMPTY_COLUMN',
  MISSING_COLUMN: 'MISSING_COLUMN',
  SOURCE_ERROR: 'SOURCE_ERROR',
  CONFIG_ERROR: 'CONFIG_ERROR',
  RAW_FILE_MISSING: 'RAW_FILE_MISSING'
} as const;

export type ErrorCode = (typeof ERROR_CODE)[keyof typeof ERROR_CODE];

export class PipelineError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** A designated date value could not be turned into a timestamp */
export class ParseError extends PipelineError {
  readonly column: string;
  readonly rowIndex: number;
  readonly value: unknown;

  constructor(column: string, rowIndex: number, value: unknown) {
    super(ERROR_CODE.PARSE_ERROR, `Cannot parse "${column}" at row ${rowIndex} as a date: ${describeValue(value)}`);
    this.column = column;
    this.rowIndex = rowIndex;
    this.value = value;
  }
}

/** A numeric column has no values to average, so its gaps cannot be imputed */
export class EmptyColumnError extends PipelineError {
  readonly column: string;

  constructor(column: string) {
    super(ERROR_CODE.EMPTY_COLUMN, `Column "${column}" has no values to compute a mean from`);
    this.column = column;
  }
}

export class MissingColumnError extends PipelineError {
  readonly column: string;
  readonly available: string[];

  constructor(column: string, available: string[]) {
    super(ERROR_CODE.MISSING_COLUMN, `Column "${column}" not found (available: ${available.join(', ') || 'none'})`);
    this.column = column;
    this.available = available;
  }
}

export class SourceError extends PipelineError {
  readonly source: string;

  constructor(source: string, message: string) {
    super(ERROR_CODE.SOURCE_ERROR, `${source}: ${message}`);
    this.source = source;
  }
}

export class ConfigError extends PipelineError {
  constructor(message: string) {
    super(ERROR_CODE.CONFIG_ERROR, message);
  }
}

export class RawFileError extends PipelineError {
  readonly filePath: string;

  constructor(filePath: string) {
    super(ERROR_CODE.RAW_FILE_MISSING, `Raw data file not found: ${filePath}. Run "fetch" for this period first.`);
    this.filePath = filePath;
  }
}

function describeValue(value: unknown): string {
  if (value === null || value === undefined) return 'missing value';
  if (value instanceof Date) return 'invalid Date';
  return `"${String(value)}"`;
}
