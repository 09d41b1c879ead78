import type { AxiosInstance } from 'axios';
import { DATA_SOURCES } from '../constants';
import { ConfigError } from '../errors';
import type { Period, PipelineConfig, ProgressCallback, RawRecordSets } from '../types';
import { validatePipelineConfig } from '../validators';
import AirQualitySource from './air-quality';
import { createHttpClient } from './base-source';
import HospitalizationsSource from './hospitalizations';

/**
 * Source Orchestrator - fetches the three sources for a period, one after another.
 * The config is validated up front, since it may be built in code rather than loaded by ConfigManager.
 */
class SourceOrchestrator {
  private config: PipelineConfig;
  private client: AxiosInstance;
  progressCallback: ProgressCallback;

  constructor(config: PipelineConfig, client?: AxiosInstance) {
    const validation = validatePipelineConfig(config);
    if (!validation.valid) {
      throw new ConfigError(`Invalid pipeline config: ${validation.issues.join('; ')}`);
    }
    this.config = config;
    this.client = client ?? createHttpClient(config);
    this.progressCallback = null;
  }

  setProgressCallback(callback: ProgressCallback): void {
    this.progressCallback = callback;
  }

  private createSources(): { air: AirQualitySource; hospitalizations: HospitalizationsSource; filtered: HospitalizationsSource } {
    const options = { client: this.client, progressCallback: this.progressCallback };
    return {
      air: new AirQualitySource(this.config, options),
      hospitalizations: new HospitalizationsSource(this.config, null, options),
      filtered: new HospitalizationsSource(this.config, this.config.filteredHospitalizations, options)
    };
  }

  /** Fetch every source in turn; the first failure rejects and skips the remaining fetches */
  async fetchAll(period: Period): Promise<RawRecordSets> {
    const sources = this.createSources();
    return {
      [DATA_SOURCES.AIR_QUALITY]: await sources.air.fetch(period),
      [DATA_SOURCES.HOSPITALIZATIONS]: await sources.hospitalizations.fetch(period),
      [DATA_SOURCES.HOSPITALIZATIONS_FILTERED]: await sources.filtered.fetch(period)
    };
  }
}

export default SourceOrchestrator;
