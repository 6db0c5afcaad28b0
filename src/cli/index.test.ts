import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import * as path from 'node:path';
import * as os from 'node:os';
import { fileURLToPath } from 'node:url';
import { CLI, parseArgs } from './index.js';
import { analyseLogFile } from '../analyzer/index.js';
import { renderReport } from '../reporter/index.js';
import { LogFileNotFoundError } from '../analyzer/errors.js';
import { logger, LogLevel } from '../logging/index.js';
import pkg from '../../package.json' with { type: 'json' };

const FIXTURE_PATH = fileURLToPath(new URL('../analyzer/__fixtures__/llm-review.log', import.meta.url));

describe('parseArgs', () => {
  it('should take the first positional argument as the log file', () => {
    expect(parseArgs(['logs/llm-review.log'])).toEqual({
      logFile: 'logs/llm-review.log',
      args: [],
      options: {},
    });
  });

  it('should parse options with values', () => {
    const parsed = parseArgs(['--config', 'logsift.yaml', 'run.log']);

    expect(parsed.logFile).toBe('run.log');
    expect(parsed.options.config).toBe('logsift.yaml');
  });

  it('should treat help and version as flags even before a positional', () => {
    expect(parseArgs(['--help', 'run.log'])).toEqual({
      logFile: 'run.log',
      args: [],
      options: { help: true },
    });
  });

  it('should parse short flags', () => {
    expect(parseArgs(['-v']).options).toEqual({ v: true });
  });

  it('should mark an option with no following value as a flag', () => {
    expect(parseArgs(['run.log', '--config']).options).toEqual({ config: true });
  });

  it('should collect extra positionals', () => {
    expect(parseArgs(['a.log', 'b.log']).args).toEqual(['b.log']);
  });
});

describe('CLI', () => {
  let logSpy: MockInstance<typeof console.log>;
  let errorSpy: MockInstance<typeof console.error>;
  let originalEnv: NodeJS.ProcessEnv;

  beforeEach(() => {
    originalEnv = { ...process.env };
    delete process.env.LOGSIFT_LOG_LEVEL;
    delete process.env.LOGSIFT_LOG_FORMAT;
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    process.env = originalEnv;
    vi.restoreAllMocks();
  });

  it('should print the rendered report and exit 0', async () => {
    const exitCode = await CLI.run([FIXTURE_PATH]);

    expect(exitCode).toBe(0);
    expect(logSpy).toHaveBeenCalledTimes(1);
    expect(logSpy).toHaveBeenCalledWith(renderReport(analyseLogFile(FIXTURE_PATH)));
  });

  it('should propagate a missing log file to the caller', async () => {
    const missing = path.join(os.tmpdir(), 'logsift-missing', 'llm-review.log');

    await expect(CLI.run([missing])).rejects.toBeInstanceOf(LogFileNotFoundError);
    expect(logSpy).not.toHaveBeenCalled();
  });

  it('should exit 2 with usage when the log file argument is missing', async () => {
    const exitCode = await CLI.run([]);

    expect(exitCode).toBe(2);
    expect(errorSpy).toHaveBeenCalledWith('Error: missing required argument <log_file>\n');
    expect(logSpy).not.toHaveBeenCalled();
  });

  it('should exit 2 on unexpected extra arguments', async () => {
    const exitCode = await CLI.run([FIXTURE_PATH, 'other.log']);

    expect(exitCode).toBe(2);
    expect(errorSpy).toHaveBeenCalledWith('Error: unexpected arguments: other.log');
  });

  it('should exit 2 when --config has no path', async () => {
    const exitCode = await CLI.run([FIXTURE_PATH, '--config']);

    expect(exitCode).toBe(2);
    expect(errorSpy).toHaveBeenCalledWith('Error: --config requires a path\n');
    expect(logSpy).not.toHaveBeenCalled();
  });

  it('should show help', async () => {
    const exitCode = await CLI.run(['--help']);

    expect(exitCode).toBe(0);
    expect(String(logSpy.mock.calls[0][0])).toContain('Usage:\n  logsift <log_file> [options]');
  });

  it('should show the package version', async () => {
    const exitCode = await CLI.run(['-v']);

    expect(exitCode).toBe(0);
    expect(logSpy).toHaveBeenCalledWith(`logsift v${pkg.version}`);
  });

  it('should configure the logger from the environment', async () => {
    process.env.LOGSIFT_LOG_LEVEL = 'error';
    process.env.LOGSIFT_LOG_FORMAT = 'json';

    await CLI.run([FIXTURE_PATH]);

    expect(logger.getLevel()).toBe(LogLevel.ERROR);
    expect(logger.getFormat()).toBe('json');
  });

  it('should fail on an invalid configured log format', async () => {
    process.env.LOGSIFT_LOG_FORMAT = 'xml';

    await expect(CLI.run([FIXTURE_PATH])).rejects.toThrow('logFormat must be one of json, pretty');
  });
});
