import * as path from 'node:path';
import { CONFIG_FILE } from './constants';
import { loadJsonFile, saveJsonFile } from './json-file-utils';
import Logger from './logger';
import type { PipelineConfig } from './types';
import { configFieldSchemas, PIPELINE_CONFIG_DEFAULTS } from './validators';

function isPlainObject(data: unknown): data is Record<string, unknown> {
  return typeof data === 'object' && data !== null && !Array.isArray(data);
}

function isConfigKey(key: string): key is keyof PipelineConfig {
  return key in PIPELINE_CONFIG_DEFAULTS;
}

/**
 * Copy each valid field from disk over the defaults. Returns the merged config
 * and whether anything had to be dropped (wrong type or unknown key).
 */
function healConfig(disk: Record<string, unknown>, defaults: PipelineConfig): { config: PipelineConfig; healed: boolean } {
  let healed = false;
  const config: PipelineConfig = { ...defaults };

  const assign = <K extends keyof PipelineConfig>(key: K): void => {
    const parsed = configFieldSchemas[key].safeParse(disk[key]);
    if (parsed.success) {
      config[key] = parsed.data;
    } else {
      Logger.warn(`Config field "${key}" is invalid, using default`);
      healed = true;
    }
  };

  for (const key of Object.keys(disk)) {
    if (isConfigKey(key)) {
      assign(key);
    } else {
      Logger.warn(`Unknown config key "${key}" removed`);
      healed = true;
    }
  }

  return { config, healed };
}

class ConfigManager {
  private dataDir: string;
  private configPath: string;

  constructor(dataDir: string) {
    this.dataDir = dataDir;
    this.configPath = path.join(dataDir, CONFIG_FILE);
  }

  getDefaults(): PipelineConfig {
    return {
      ...PIPELINE_CONFIG_DEFAULTS,
      stations: [...PIPELINE_CONFIG_DEFAULTS.stations],
      filteredHospitalizations: { ...PIPELINE_CONFIG_DEFAULTS.filteredHospitalizations }
    };
  }

  /** Load config.json, writing defaults when absent and healing invalid fields */
  loadConfig(): PipelineConfig {
    const defaults = this.getDefaults();
    const disk = loadJsonFile(this.configPath);
    if (disk === null) {
      this.saveConfig(defaults);
      return defaults;
    }
    if (!isPlainObject(disk)) {
      Logger.warn('config.json is not an object, resetting to defaults');
      this.saveConfig(defaults);
      return defaults;
    }

    const { config, healed } = healConfig(disk, defaults);
    if (healed) this.saveConfig(config);
    return config;
  }

  saveConfig(config: PipelineConfig): void {
    saveJsonFile(this.configPath, config);
  }

  /** Absolute raw and processed directories for a config */
  resolveDirs(config: PipelineConfig): { rawDir: string; processedDir: string } {
    return {
      rawDir: path.resolve(this.dataDir, config.rawDir),
      processedDir: path.resolve(this.dataDir, config.processedDir)
    };
  }
}

export default ConfigManager;
