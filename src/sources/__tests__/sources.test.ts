import { AxiosError } from 'axios';
import { describe, expect, it } from 'vitest';
import { ConfigError, SourceError } from '../../errors';
import { parsePeriod } from '../../period';
import type { FetchProgress, PipelineConfig } from '../../types';
import { PIPELINE_CONFIG_DEFAULTS } from '../../validators';
import SourceOrchestrator from '../index';
import AirQualitySource from '../air-quality';
import HospitalizationsSource from '../hospitalizations';
import { AIR_URL, createStubClient, HOSPITAL_URL } from './stub-client';

const config: PipelineConfig = {
  ...PIPELINE_CONFIG_DEFAULTS,
  airQualityUrl: AIR_URL,
  hospitalizationsUrl: HOSPITAL_URL,
  stations: [101, 102]
};

const january = parsePeriod('2024-01');

// ============================================================================
// AirQualitySource
// ============================================================================

describe('AirQualitySource', () => {
  it('requests each station and tags its readings', async () => {
    const { client, requests } = createStubClient((_url, params) =>
      params.station === 101
        ? { readings: [{ timestamp: '2024-01-05', pm25: 10 }] }
        : { readings: [{ timestamp: '2024-01-06', pm25: 'NA', no2: 4 }] }
    );

    const set = await new AirQualitySource(config, { client }).fetch(january);

    expect(requests).toEqual([
      { url: AIR_URL, params: { station: 101, month: '2024-01' } },
      { url: AIR_URL, params: { station: 102, month: '2024-01' } }
    ]);
    expect(set).toEqual({
      columns: ['timestamp', 'pm25', 'station', 'no2'],
      rows: [
        { timestamp: '2024-01-05', pm25: 10, station: 101, no2: null },
        { timestamp: '2024-01-06', pm25: null, station: 102, no2: 4 }
      ]
    });
  });

  it('keeps the date column when no station returns readings', async () => {
    const { client } = createStubClient(() => ({}));
    const set = await new AirQualitySource(config, { client }).fetch(january);
    expect(set).toEqual({ columns: ['timestamp'], rows: [] });
  });

  it('rejects an unexpected response body', async () => {
    const { client } = createStubClient(() => ({ readings: 'unavailable' }));
    await expect(new AirQualitySource(config, { client }).fetch(january)).rejects.toThrow(SourceError);
  });

  it('reports progress', async () => {
    const events: FetchProgress[] = [];
    const { client } = createStubClient(() => ({ readings: [{ timestamp: '2024-01-05', pm25: 1 }] }));
    await new AirQualitySource(config, { client, progressCallback: (p) => events.push(p) }).fetch(january);

    expect(events.map((e) => e.status)).toEqual(['fetching', 'fetched']);
    expect(events[1].rows).toBe(2);
    expect(events[1].source).toBe('air_quality');
  });
});

// ============================================================================
// HospitalizationsSource
// ============================================================================

describe('HospitalizationsSource', () => {
  it('requests all-cause admissions for the month', async () => {
    const { client, requests } = createStubClient(() => ({ result: [{ admission_date: '2024-01-02', cid: 'J45' }] }));
    const source = new HospitalizationsSource(config, null, { client });
    const set = await source.fetch(january);

    expect(source.source).toBe('hospitalizations');
    expect(requests).toEqual([{ url: HOSPITAL_URL, params: { month: '2024-01' } }]);
    expect(set).toEqual({ columns: ['admission_date', 'cid'], rows: [{ admission_date: '2024-01-02', cid: 'J45' }] });
  });

  it('sends the city and ICD range when filtered', async () => {
    const { client, requests } = createStubClient(() => ({ result: [] }));
    const source = new HospitalizationsSource(config, config.filteredHospitalizations, { client });
    const set = await source.fetch(january);

    expect(source.source).toBe('hospitalizations_filtered');
    expect(requests[0].params).toEqual({ month: '2024-01', city: 'João Pessoa', cid_start: 'J00', cid_end: 'J99' });
    expect(set).toEqual({ columns: ['admission_date'], rows: [] });
  });

  it('propagates HTTP failures unchanged', async () => {
    const failure = new AxiosError('Request failed with status code 503', AxiosError.ERR_BAD_RESPONSE);
    const events: FetchProgress[] = [];
    const { client } = createStubClient(() => {
      throw failure;
    });
    const source = new HospitalizationsSource(config, null, { client, progressCallback: (p) => events.push(p) });

    await expect(source.fetch(january)).rejects.toBe(failure);
    expect(events.map((e) => e.status)).toEqual(['fetching', 'error']);
    expect(events[1].error).toBe('Request failed with status code 503');
  });
});

// ============================================================================
// SourceOrchestrator
// ============================================================================

describe('SourceOrchestrator', () => {
  const handler = (url: string, params: Record<string, unknown>): unknown => {
    if (url === AIR_URL) return { readings: [{ timestamp: '2024-01-05', pm25: Number(params.station) / 10 }] };
    if (params.city) return { result: [{ admission_date: '2024-01-03', cid: 'J45' }] };
    return { result: [{ admission_date: '2024-01-03', cid: 'J45' }, { admission_date: '2024-01-04', cid: 'I21' }] };
  };

  it('fetches the three sources one after another', async () => {
    const { client, requests } = createStubClient(handler);
    const events: FetchProgress[] = [];
    const orchestrator = new SourceOrchestrator(config, client);
    orchestrator.setProgressCallback((progress) => events.push(progress));
    const sets = await orchestrator.fetchAll(january);

    expect(requests.map((r) => [r.url, r.params.station ?? r.params.city ?? null])).toEqual([
      [AIR_URL, 101],
      [AIR_URL, 102],
      [HOSPITAL_URL, null],
      [HOSPITAL_URL, 'João Pessoa']
    ]);
    expect(sets.air_quality.rows).toHaveLength(2);
    expect(sets.hospitalizations.rows).toHaveLength(2);
    expect(sets.hospitalizations_filtered.rows).toHaveLength(1);
    expect(events.filter((e) => e.status !== 'fetching').map((e) => [e.source, e.status, e.rows])).toEqual([
      ['air_quality', 'fetched', 2],
      ['hospitalizations', 'fetched', 2],
      ['hospitalizations_filtered', 'fetched', 1]
    ]);
  });

  it('stops at the first failing source', async () => {
    const { client, requests } = createStubClient((url, params) => {
      if (url === HOSPITAL_URL && !params.city) throw new AxiosError('timeout of 30000ms exceeded', AxiosError.ECONNABORTED);
      return handler(url, params);
    });
    const events: FetchProgress[] = [];
    const orchestrator = new SourceOrchestrator(config, client);
    orchestrator.setProgressCallback((progress) => events.push(progress));

    await expect(orchestrator.fetchAll(january)).rejects.toThrow('timeout of 30000ms exceeded');
    expect(requests).toHaveLength(3);
    expect(events.map((e) => [e.source, e.status])).toEqual([
      ['air_quality', 'fetching'],
      ['air_quality', 'fetched'],
      ['hospitalizations', 'fetching'],
      ['hospitalizations', 'error']
    ]);
  });

  it('rejects an invalid config built in code', () => {
    const { client } = createStubClient(handler);
    const invalid: PipelineConfig = { ...config, requestTimeoutMs: 0, hospitalizationsUrl: 'not a url' };

    expect(() => new SourceOrchestrator(invalid, client)).toThrow(ConfigError);
    expect(() => new SourceOrchestrator(invalid, client)).toThrow(
      'Invalid pipeline config: hospitalizationsUrl: Invalid url; requestTimeoutMs: Number must be greater than 0'
    );
  });
});
