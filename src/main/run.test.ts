import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { mockSpawn, mockExecFile, answerExecFile } from '../test-utils/spawn-mocks';
import { EXIT_CODES } from '../utils/errors';
import { logger } from '../utils/log';
import { HELP_TEXT } from './cli';
import { runCli, type CliEnvironment } from './run';

vi.mock('node:child_process', () => ({
  spawn: mockSpawn,
  execFile: mockExecFile,
}));

describe('runCli', () => {
  let dir: string;
  let output: string[];

  function cli(overrides: Partial<CliEnvironment> = {}): CliEnvironment {
    return {
      argv: [],
      env: {},
      platform: 'linux',
      stdout: {
        write: (chunk: string | Uint8Array) => {
          output.push(String(chunk));
          return true;
        },
      },
      signal: new AbortController().signal,
      installDir: join(dir, 'install'),
      homeDir: join(dir, 'home'),
      ...overrides,
    };
  }

  beforeEach(async () => {
    vi.clearAllMocks();
    answerExecFile(() => false);
    vi.spyOn(logger, 'log').mockImplementation(() => undefined);
    vi.spyOn(logger, 'warn').mockImplementation(() => undefined);
    vi.spyOn(logger, 'error').mockImplementation(() => undefined);
    dir = await mkdtemp(join(tmpdir(), 'cli-test-'));
    output = [];
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it('should print the help text to stdout', async () => {
    await expect(runCli(cli({ argv: ['--help'] }))).resolves.toBe(EXIT_CODES.SUCCESS);
    expect(output).toEqual([HELP_TEXT]);
  });

  it('should exit with a configuration error for bad flags', async () => {
    await expect(runCli(cli({ argv: ['--max-duration', '900'] }))).resolves.toBe(
      EXIT_CODES.CONFIGURATION,
    );
    expect(logger.error).toHaveBeenCalledWith(
      "voxpaste: --max-duration must be a whole number of seconds between 1 and 300, got '900'",
    );
    expect(output).toEqual([]);
  });

  it('should refuse to run on Windows', async () => {
    await expect(runCli(cli({ platform: 'win32' }))).resolves.toBe(EXIT_CODES.CONFIGURATION);
    expect(logger.error).toHaveBeenCalledWith('voxpaste: Platform win32 is not supported.');
    expect(mockSpawn).not.toHaveBeenCalled();
  });

  it('should fail before recording when no config file exists', async () => {
    await expect(runCli(cli())).resolves.toBe(EXIT_CODES.CONFIGURATION);
    expect(logger.log).toHaveBeenCalledWith(
      '[NOTIFICATION] Error - .env file not found in any expected location.',
    );
    expect(mockSpawn).not.toHaveBeenCalled();
  });

  it('should fail before recording when the key is still the placeholder', async () => {
    const envFile = join(dir, 'voxpaste.env');
    await writeFile(envFile, 'GROQ_API_KEY=your_api_key_here\n', { mode: 0o600 });

    await expect(runCli(cli({ env: { VOXPASTE_ENV_FILE: envFile } }))).resolves.toBe(
      EXIT_CODES.CONFIGURATION,
    );
    expect(logger.error).toHaveBeenCalledWith(
      "voxpaste: Please replace 'your_api_key_here' with your actual Groq API key.",
    );
    expect(mockSpawn).not.toHaveBeenCalled();
  });

  it('should stop with no_backend when no recorder is installed', async () => {
    const envFile = join(dir, 'voxpaste.env');
    await writeFile(envFile, 'GROQ_API_KEY=test-secret\n', { mode: 0o600 });

    await expect(runCli(cli({ env: { VOXPASTE_ENV_FILE: envFile } }))).resolves.toBe(
      EXIT_CODES.NO_BACKEND,
    );
    expect(output).toEqual([]);
  });
});
