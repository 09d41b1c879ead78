#!/usr/bin/env node

import * as path from 'node:path';
import { Command } from 'commander';
import { DEFAULT_DATA_DIR } from './constants';
import { createContext, fetchPeriod, processPeriod } from './data-pipeline';
import Logger, { getErrorMessage } from './logger';
import type { FetchProgress } from './types';

type GlobalOptions = {
  dataDir: string;
  quiet: boolean;
};

type PeriodOptions = {
  period: string;
};

function logProgress(progress: FetchProgress): void {
  if (progress.status === 'fetching') Logger.debug(`${progress.source}: fetching...`);
}

async function runFetch(dataDir: string, period: string): Promise<void> {
  const context = createContext(dataDir);
  const result = await fetchPeriod(context, period, undefined, logProgress);
  for (const filePath of Object.values(result.files)) {
    console.log(filePath);
  }
}

async function runProcess(dataDir: string, period: string): Promise<void> {
  const context = createContext(dataDir);
  const result = await processPeriod(context, period);
  console.log(result.outputs.csv);
  if (result.outputs.xlsx) console.log(result.outputs.xlsx);
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('air-health-monthly')
    .description('Fetch air-quality and hospitalization data and build a monthly joined table')
    .version('1.0.0')
    .option('-d, --data-dir <dir>', 'directory holding config.json, raw/ and processed/', DEFAULT_DATA_DIR)
    .option('-q, --quiet', 'print only the written file paths; log lines go to pipeline.log', false);

  // Opens the run log; with --quiet stdout carries only the file paths
  const startRun = (): string => {
    const { dataDir, quiet } = program.opts<GlobalOptions>();
    const resolved = path.resolve(dataDir);
    Logger.setConsole(!quiet);
    Logger.init(resolved);
    return resolved;
  };

  program
    .command('fetch')
    .description('fetch the three sources for a month and store them as raw CSV files')
    .requiredOption('-p, --period <YYYY-MM>', 'month to fetch')
    .action(async (options: PeriodOptions) => {
      const dataDir = startRun();
      await runFetch(dataDir, options.period);
    });

  program
    .command('process')
    .description('clean and aggregate the raw files of a month into the monthly table')
    .requiredOption('-p, --period <YYYY-MM>', 'month to process')
    .action(async (options: PeriodOptions) => {
      const dataDir = startRun();
      await runProcess(dataDir, options.period);
    });

  program
    .command('run')
    .description('fetch, then process, a month')
    .requiredOption('-p, --period <YYYY-MM>', 'month to fetch and process')
    .action(async (options: PeriodOptions) => {
      const dataDir = startRun();
      await runFetch(dataDir, options.period);
      await runProcess(dataDir, options.period);
    });

  return program;
}

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    // Failures reach stderr even under --quiet
    Logger.setConsole(true);
    Logger.error('Pipeline failed:', getErrorMessage(err));
    process.exitCode = 1;
  } finally {
    await Logger.close();
  }
}

if (require.main === module) {
  void main();
}
