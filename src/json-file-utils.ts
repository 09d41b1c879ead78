import * as fs from 'node:fs';
import * as path from 'node:path';
import Logger, { getErrorMessage } from './logger';

/** Load and parse a JSON file, returning null if missing or invalid */
export function loadJsonFile(filePath: string): unknown {
  try {
    if (!fs.existsSync(filePath)) return null;
    const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    return parsed;
  } catch (err) {
    Logger.warn(`Could not load ${path.basename(filePath)}:`, getErrorMessage(err));
    return null;
  }
}

/** Write a file, creating parent directories if needed.
 *  Uses atomic write (temp file + rename) to prevent partial writes. */
export function writeFileAtomic(filePath: string, contents: string): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const tmp = `${filePath}.tmp`;
  fs.writeFileSync(tmp, contents, 'utf8');
  fs.renameSync(tmp, filePath);
}

/** Save data as JSON, logging (not throwing) on failure */
export function saveJsonFile(filePath: string, data: unknown): void {
  try {
    writeFileAtomic(filePath, `${JSON.stringify(data, null, 2)}\n`);
  } catch (err) {
    Logger.warn(`Could not save ${path.basename(filePath)}:`, getErrorMessage(err));
  }
}
