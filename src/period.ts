import { ConfigError } from './errors';
import type { Period } from './types';

const PERIOD_PATTERN = /^(\d{4})-(\d{2})$/;

/**
 * Parse a requested period in YYYY-MM form.
 *
 * @example
 * parsePeriod('2024-01') // => { year: 2024, month: 1, key: '2024-01' }
 * parsePeriod('2024-13') // throws ConfigError
 */
export function parsePeriod(value: string): Period {
  const match = PERIOD_PATTERN.exec(value.trim());
  if (!match) {
    throw new ConfigError(`Invalid period "${value}". Expected YYYY-MM`);
  }
  const year = Number(match[1]);
  const month = Number(match[2]);
  if (month < 1 || month > 12) {
    throw new ConfigError(`Invalid month in period "${value}"`);
  }
  return { year, month, key: `${match[1]}-${match[2]}` };
}
