import { describe, expect, it } from 'vitest';
import { ConfigError } from '../errors';
import { parsePeriod } from '../period';

describe('parsePeriod', () => {
  it('parses YYYY-MM', () => {
    expect(parsePeriod('2024-01')).toEqual({ year: 2024, month: 1, key: '2024-01' });
    expect(parsePeriod(' 2023-12 ')).toEqual({ year: 2023, month: 12, key: '2023-12' });
  });

  it('rejects months outside 01-12', () => {
    expect(() => parsePeriod('2024-13')).toThrow(ConfigError);
    expect(() => parsePeriod('2024-00')).toThrow('Invalid month in period "2024-00"');
  });

  it('rejects other shapes', () => {
    expect(() => parsePeriod('2024-1')).toThrow('Invalid period "2024-1". Expected YYYY-MM');
    expect(() => parsePeriod('2024-01-05')).toThrow(ConfigError);
    expect(() => parsePeriod('')).toThrow(ConfigError);
  });
});
