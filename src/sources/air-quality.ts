import { DATA_SOURCES } from '../constants';
import { SourceError } from '../errors';
import Logger from '../logger';
import type { Period, PipelineConfig, RawRecord } from '../types';
import { parseAirQualityResponse } from '../validators';
import { BaseSource, type SourceOptions } from './base-source';

/**
 * Air Quality Source — one request per monitoring station.
 * Every reading is tagged with the station it came from.
 */
class AirQualitySource extends BaseSource {
  constructor(config: PipelineConfig, options: SourceOptions = {}) {
    super(DATA_SOURCES.AIR_QUALITY, config, options);
  }

  protected async fetchRecords(period: Period): Promise<RawRecord[]> {
    const records: RawRecord[] = [];
    for (const station of this.config.stations) {
      const data = await this.getJson(this.config.airQualityUrl, { station, month: period.key });
      const envelope = parseAirQualityResponse(data);
      if (!envelope.ok) {
        throw new SourceError(this.source, `unexpected response for station ${station}: ${envelope.issues.join('; ')}`);
      }
      Logger.debug(`${this.source}: station ${station} returned ${envelope.records.length} reading(s)`);
      for (const reading of envelope.records) {
        records.push({ ...reading, station });
      }
    }
    return records;
  }
}

export default AirQualitySource;
