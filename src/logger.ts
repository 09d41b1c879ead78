/**
 * Logger — writes to the console and to a log file in the data directory.
 *
 * The log file is truncated each time Logger.init() is called,
 * so it always contains only the current run's logs.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

let logStream: fs.WriteStream | null = null;
let consoleEnabled = true;

/** Get error message from unknown error */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function formatData(data: unknown): string {
  if (data === null || data === undefined) return '';
  if (data instanceof Error) return ` ${data.message}`;
  if (typeof data === 'string') return ` ${data}`;
  try {
    return ` ${JSON.stringify(data)}`;
  } catch {
    return ` ${String(data)}`;
  }
}

function timestamp(): string {
  const d = new Date();
  const hh = String(d.getHours()).padStart(2, '0');
  const mm = String(d.getMinutes()).padStart(2, '0');
  const ss = String(d.getSeconds()).padStart(2, '0');
  const ms = String(d.getMilliseconds()).padStart(3, '0');
  return `${hh}:${mm}:${ss}.${ms}`;
}

/** Scrub keys a configured API URL can carry in its query string */
export function redact(text: string): string {
  return text.replace(/([?&](?:api_?key|key|token|access_token)=)[^&\s"']+/gi, '$1***');
}

function writeLine(level: string, message: string, data: unknown): void {
  const line = `${timestamp()} [${level}] ${message}${redact(formatData(data))}\n`;

  if (consoleEnabled) {
    if (level === 'ERROR') console.error(line.trimEnd());
    else if (level === 'WARN') console.warn(line.trimEnd());
    else console.log(line.trimEnd());
  }

  if (logStream) {
    logStream.write(line);
  }
}

const Logger = {
  /**
   * Initialize file logging. Call once at startup.
   * Truncates the log file so only the current run is kept.
   */
  init(dataDir: string): void {
    const logFilePath = path.join(dataDir, 'pipeline.log');
    if (logStream) {
      logStream.end();
      logStream = null;
    }
    try {
      fs.mkdirSync(dataDir, { recursive: true });
      logStream = fs.createWriteStream(logFilePath, { flags: 'w' });
      logStream.on('error', (err) => {
        console.error('Log stream error:', err);
        logStream = null;
      });
    } catch (err) {
      console.error('Failed to create log file:', err);
    }
    writeLine('INFO', `=== Run started (${new Date().toISOString()}) ===`, null);
  },

  /** Turn console output on or off; the log file is always written */
  setConsole(enabled: boolean): void {
    consoleEnabled = enabled;
  },

  debug(message: string, data: unknown = null): void {
    writeLine('DEBUG', message, data);
  },

  info(message: string, data: unknown = null): void {
    writeLine('INFO', message, data);
  },

  warn(message: string, data: unknown = null): void {
    writeLine('WARN', message, data);
  },

  error(message: string, error: unknown = null): void {
    writeLine('ERROR', message, error);
  },

  /** Flush and close the log stream (call before the process exits) */
  close(): Promise<void> {
    const stream = logStream;
    logStream = null;
    if (!stream) return Promise.resolve();
    return new Promise((resolve) => {
      stream.end(`${timestamp()} [INFO] === Run ended ===\n`, () => resolve());
    });
  }
};

export default Logger;
