import { DATA_SOURCES } from '../constants';
import { SourceError } from '../errors';
import type { HospitalizationFilter, Period, PipelineConfig, RawRecord } from '../types';
import { parseHospitalizationsResponse } from '../validators';
import { BaseSource, type SourceOptions } from './base-source';

/**
 * Hospitalizations Source — admissions for a month, either all-cause or
 * restricted to one city and an ICD-10 code range.
 */
class HospitalizationsSource extends BaseSource {
  private filter: HospitalizationFilter | null;

  constructor(config: PipelineConfig, filter: HospitalizationFilter | null = null, options: SourceOptions = {}) {
    super(filter ? DATA_SOURCES.HOSPITALIZATIONS_FILTERED : DATA_SOURCES.HOSPITALIZATIONS, config, options);
    this.filter = filter;
  }

  buildParams(period: Period): Record<string, string> {
    if (!this.filter) return { month: period.key };
    return {
      month: period.key,
      city: this.filter.city,
      cid_start: this.filter.cidStart,
      cid_end: this.filter.cidEnd
    };
  }

  protected async fetchRecords(period: Period): Promise<RawRecord[]> {
    const data = await this.getJson(this.config.hospitalizationsUrl, this.buildParams(period));
    const envelope = parseHospitalizationsResponse(data);
    if (!envelope.ok) {
      throw new SourceError(this.source, `unexpected response: ${envelope.issues.join('; ')}`);
    }
    return envelope.records;
  }
}

export default HospitalizationsSource;
