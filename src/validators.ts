// Runtime validators for external data at the JSON parse boundary.
// Only response envelopes and config files are checked; records stay untyped.

import { z } from 'zod';
import {
  DEFAULT_AIR_QUALITY_URL,
  DEFAULT_HOSPITALIZATION_FILTER,
  DEFAULT_HOSPITALIZATIONS_URL,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_STATIONS
} from './constants';
import type { PipelineConfig, RawRecord } from './types';

export interface ValidationResult {
  valid: boolean;
  issues: string[];
}

function fromZodResult(result: {
  success: boolean;
  error?: { issues: Array<{ path: PropertyKey[]; message: string }> };
}): ValidationResult {
  if (result.success) return { valid: true, issues: [] };
  const issues = (result.error?.issues ?? []).map((i) => `${i.path.map(String).join('.') || '(root)'}: ${i.message}`);
  return { valid: false, issues };
}

// ============================================================================
// API response envelopes
// ============================================================================

const rawRecordSchema = z.record(z.string(), z.unknown());

const airQualityResponseSchema = z
  .object({
    readings: z.array(rawRecordSchema).default([])
  })
  .passthrough();

const hospitalizationsResponseSchema = z
  .object({
    result: z.array(rawRecordSchema).default([])
  })
  .passthrough();

export type EnvelopeResult = { ok: true; records: RawRecord[] } | { ok: false; issues: string[] };

/** Extract `readings` from an air-quality response (absent key → empty list) */
export function parseAirQualityResponse(data: unknown): EnvelopeResult {
  const result = airQualityResponseSchema.safeParse(data);
  if (result.success) return { ok: true, records: result.data.readings };
  return { ok: false, issues: fromZodResult(result).issues };
}

/** Extract `result` from a hospitalizations response (absent key → empty list) */
export function parseHospitalizationsResponse(data: unknown): EnvelopeResult {
  const result = hospitalizationsResponseSchema.safeParse(data);
  if (result.success) return { ok: true, records: result.data.result };
  return { ok: false, issues: fromZodResult(result).issues };
}

// ============================================================================
// Pipeline configuration
// ============================================================================

export const PIPELINE_CONFIG_DEFAULTS: PipelineConfig = {
  airQualityUrl: DEFAULT_AIR_QUALITY_URL,
  hospitalizationsUrl: DEFAULT_HOSPITALIZATIONS_URL,
  stations: [...DEFAULT_STATIONS],
  filteredHospitalizations: { ...DEFAULT_HOSPITALIZATION_FILTER },
  rawDir: 'raw',
  processedDir: 'processed',
  writeXlsx: false,
  requestTimeoutMs: DEFAULT_REQUEST_TIMEOUT_MS
};

const hospitalizationFilterSchema = z
  .object({
    city: z.string().min(1),
    cidStart: z.string().min(1),
    cidEnd: z.string().min(1)
  })
  .strict();

/** Field-by-field schemas, so a bad field can be healed without discarding the rest */
export const configFieldSchemas: { [K in keyof PipelineConfig]: z.ZodType<PipelineConfig[K]> } = {
  airQualityUrl: z.string().url(),
  hospitalizationsUrl: z.string().url(),
  stations: z.array(z.number().int()),
  filteredHospitalizations: hospitalizationFilterSchema,
  rawDir: z.string().min(1),
  processedDir: z.string().min(1),
  writeXlsx: z.boolean(),
  requestTimeoutMs: z.number().int().positive()
};

const pipelineConfigSchema = z.object(configFieldSchemas).strict();

/** Validate a complete pipeline config */
export function validatePipelineConfig(data: unknown): ValidationResult {
  return fromZodResult(pipelineConfigSchema.safeParse(data));
}
