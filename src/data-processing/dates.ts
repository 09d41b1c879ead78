// Date helpers — ISO timestamp parsing and calendar-month buckets

import type { CellValue } from '../types';

const MS_PER_MINUTE = 60_000;

// YYYY-MM-DD, optionally followed by a time (T or space) and a zone (Z, +HH:mm, +HHmm)
const ISO_PATTERN = /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d+))?)?(Z|[+-]\d{2}:?\d{2})?)?$/;

/** Number of days in a month (month is 1-based) */
export function daysInMonth(year: number, month: number): number {
  if (month === 2) {
    const leap = (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
    return leap ? 29 : 28;
  }
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

/** A timestamp that keeps the UTC offset it was written with, in minutes */
export class ZonedDate extends Date {
  readonly offsetMinutes: number;

  constructor(time: number, offsetMinutes: number) {
    super(time);
    this.offsetMinutes = offsetMinutes;
  }
}

function zoneOffsetMinutes(zone: string | undefined): number {
  if (!zone || zone === 'Z') return 0;
  const sign = zone.startsWith('-') ? -1 : 1;
  const digits = zone.slice(1).replace(':', '');
  return sign * (Number(digits.slice(0, 2)) * 60 + Number(digits.slice(2, 4)));
}

function parseIsoString(text: string): ZonedDate | null {
  const match = ISO_PATTERN.exec(text.trim());
  if (!match) return null;

  const [, y, mo, d, h = '0', mi = '0', s = '0', frac = '', zone] = match;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hours = Number(h);
  const minutes = Number(mi);
  const seconds = Number(s);

  if (month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;
  if (hours > 23 || minutes > 59 || seconds > 59) return null;

  const millis = Number(frac.slice(0, 3).padEnd(3, '0'));
  // Date.UTC maps years 0-99 to 1900-1999; setUTCFullYear keeps the literal year
  const utc = new Date(Date.UTC(2000, month - 1, day, hours, minutes, seconds, millis));
  utc.setUTCFullYear(year);
  const offset = zoneOffsetMinutes(zone);
  return new ZonedDate(utc.getTime() - offset * MS_PER_MINUTE, offset);
}

/**
 * Parse a date cell into a timestamp.
 * Accepts valid Date instances and ISO-8601 strings; strings without a zone
 * are read as UTC. The written offset is kept on the result (see ZonedDate).
 * Returns null for anything else (including missing).
 *
 * @example
 * parseTimestamp('2024-01-05')           // => 2024-01-05T00:00:00.000Z
 * parseTimestamp('2024-01-05T10:30-03:00') // => 2024-01-05T13:30:00.000Z
 * parseTimestamp('2024-02-30')           // => null
 */
export function parseTimestamp(value: CellValue): Date | null {
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) return null;
    return new ZonedDate(value.getTime(), value instanceof ZonedDate ? value.offsetMinutes : 0);
  }
  if (typeof value === 'string') return parseIsoString(value);
  return null;
}

/**
 * Bucket label for a timestamp: last calendar day of its month, as YYYY-MM-DD.
 * The month is read in the offset the timestamp was written with; plain Dates are read in UTC.
 */
export function monthEndKey(date: Date): string {
  const offset = date instanceof ZonedDate ? date.offsetMinutes : 0;
  const local = new Date(date.getTime() + offset * MS_PER_MINUTE);
  const year = local.getUTCFullYear();
  const month = local.getUTCMonth() + 1;
  return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}-${String(daysInMonth(year, month)).padStart(2, '0')}`;
}
