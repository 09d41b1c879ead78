import { describe, expect, it } from 'vitest';
import {
  parseAirQualityResponse,
  parseHospitalizationsResponse,
  PIPELINE_CONFIG_DEFAULTS,
  validatePipelineConfig
} from '../validators';

// ============================================================================
// parseAirQualityResponse
// ============================================================================

describe('parseAirQualityResponse', () => {
  it('returns the readings', () => {
    const result = parseAirQualityResponse({ readings: [{ timestamp: '2024-01-05', pm25: 10 }] });
    expect(result).toEqual({ ok: true, records: [{ timestamp: '2024-01-05', pm25: 10 }] });
  });

  it('reads an absent readings key as no readings', () => {
    expect(parseAirQualityResponse({ station: 101 })).toEqual({ ok: true, records: [] });
  });

  it('rejects a non-array readings value', () => {
    const result = parseAirQualityResponse({ readings: 'none' });
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.issues[0]).toMatch(/^readings: /);
  });

  it('rejects readings that are not objects', () => {
    const result = parseAirQualityResponse({ readings: [1] });
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.issues[0]).toMatch(/^readings\.0: /);
  });

  it('rejects null and array bodies', () => {
    const fromNull = parseAirQualityResponse(null);
    expect(fromNull.ok).toBe(false);
    if (!fromNull.ok) expect(fromNull.issues[0]).toMatch(/^\(root\): /);
    expect(parseAirQualityResponse([]).ok).toBe(false);
  });
});

// ============================================================================
// parseHospitalizationsResponse
// ============================================================================

describe('parseHospitalizationsResponse', () => {
  it('returns the result list and ignores extra fields', () => {
    const result = parseHospitalizationsResponse({ result: [{ admission_date: '2024-01-02' }], total: 1 });
    expect(result).toEqual({ ok: true, records: [{ admission_date: '2024-01-02' }] });
  });

  it('reads an absent result key as no admissions', () => {
    expect(parseHospitalizationsResponse({})).toEqual({ ok: true, records: [] });
  });

  it('rejects a string body', () => {
    expect(parseHospitalizationsResponse('<html>').ok).toBe(false);
  });
});

// ============================================================================
// validatePipelineConfig
// ============================================================================

describe('validatePipelineConfig', () => {
  it('accepts the defaults', () => {
    expect(validatePipelineConfig(PIPELINE_CONFIG_DEFAULTS)).toEqual({ valid: true, issues: [] });
  });

  it('rejects unknown keys', () => {
    expect(validatePipelineConfig({ ...PIPELINE_CONFIG_DEFAULTS, extra: true }).valid).toBe(false);
  });

  it('rejects non-integer station ids', () => {
    const result = validatePipelineConfig({ ...PIPELINE_CONFIG_DEFAULTS, stations: ['101'] });
    expect(result.valid).toBe(false);
    expect(result.issues[0]).toMatch(/^stations\.0: /);
  });

  it('rejects a non-positive request timeout', () => {
    expect(validatePipelineConfig({ ...PIPELINE_CONFIG_DEFAULTS, requestTimeoutMs: 0 }).valid).toBe(false);
  });
});
