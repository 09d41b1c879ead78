import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { CommanderError } from 'commander';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { ConfigError } from '../errors';
import Logger from '../logger';
import { createProgram } from '../main';

function quietProgram(): ReturnType<typeof createProgram> {
  const program = createProgram();
  for (const command of [program, ...program.commands]) {
    command.exitOverride().configureOutput({ writeOut: () => {}, writeErr: () => {} });
  }
  return program;
}

describe('createProgram', () => {
  it('exposes the fetch, process and run commands', () => {
    expect(createProgram().commands.map((command) => command.name())).toEqual(['fetch', 'process', 'run']);
  });

  it('defaults the data directory', () => {
    const option = createProgram().options.find((candidate) => candidate.long === '--data-dir');
    expect(option?.defaultValue).toBe('data');
  });

  it('requires a period', async () => {
    const error = await quietProgram()
      .parseAsync(['node', 'air-health-monthly', 'process'])
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(CommanderError);
    expect(error).toMatchObject({ code: 'commander.missingMandatoryOptionValue' });
  });
});

describe('--quiet', () => {
  let dataDir: string | null = null;

  afterEach(async () => {
    await Logger.close();
    Logger.setConsole(true);
    vi.restoreAllMocks();
    if (dataDir) fs.rmSync(dataDir, { recursive: true, force: true });
    dataDir = null;
  });

  it('keeps log lines off stdout and in pipeline.log', async () => {
    dataDir = fs.mkdtempSync(path.join(os.tmpdir(), 'air-health-cli-'));
    const stdout = vi.spyOn(console, 'log').mockImplementation(() => {});

    await expect(
      quietProgram().parseAsync(['node', 'air-health-monthly', '-q', '-d', dataDir, 'process', '-p', '2024-13'])
    ).rejects.toThrow(ConfigError);
    await Logger.close();

    expect(stdout).not.toHaveBeenCalled();
    expect(fs.readFileSync(path.join(dataDir, 'pipeline.log'), 'utf8')).toMatch(/\[INFO\] === Run started/);
  });
});
