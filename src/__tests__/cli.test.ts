/**
 * Event Log Digest - CLI Tests
 */

import * as path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { helpText, parseCliArgs, runCli, type CliIO } from '../cli';
import {
  createMockRawRecord,
  FakeEventSource,
  HOUR_MS,
  isoAgo,
  makeTempDir,
  MINUTE_MS,
  NOW,
  removeTempDir,
} from './helpers';

// =============================================================================
// TEST FIXTURES
// =============================================================================

interface CapturedIO {
  io: CliIO;
  stdout: string[];
  stderr: string[];
}

const createMockIO = (env: NodeJS.ProcessEnv = {}): CapturedIO => {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const io: CliIO = {
    stdout: (text) => stdout.push(text),
    stderr: (text) => stderr.push(text),
    env,
    now: () => NOW,
    createSource: () =>
      new FakeEventSource({
        records: {
          System: [
            createMockRawRecord({
              logName: 'System',
              level: 3,
              eventId: 7036,
              providerName: 'Service Control Manager',
              message: 'The service entered the stopped state.',
              timeCreated: isoAgo(2 * HOUR_MS),
            }),
          ],
          Application: [
            createMockRawRecord({ timeCreated: isoAgo(30 * MINUTE_MS) }),
            createMockRawRecord({ timeCreated: isoAgo(10 * MINUTE_MS) }),
          ],
        },
      }),
  };
  return { io, stdout, stderr };
};

// =============================================================================
// ARGUMENT PARSING
// =============================================================================

describe('parseCliArgs', () => {
  it('should default to the collect command', () => {
    expect(parseCliArgs([])).toEqual({ command: 'collect', overrides: {} });
  });

  it('should map collection flags to config overrides', () => {
    expect(
      parseCliArgs(['collect', '--hours', '24', '--max-events', '100', '--no-security', '--aggregate', '--quiet'])
    ).toEqual({
      command: 'collect',
      overrides: {
        hoursBack: 24,
        maxRecords: 100,
        includeSecurity: false,
        aggregate: true,
        logLevel: 'error',
      },
    });
  });

  it('should read the reading options', () => {
    expect(parseCliArgs(['digest', '--input', 'saved.json', '--max-chars', '2000'])).toEqual({
      command: 'digest',
      overrides: {},
      input: 'saved.json',
      maxChars: 2000,
    });
  });

  it('should switch to help on --help anywhere', () => {
    expect(parseCliArgs(['status', '-h']).command).toBe('help');
  });

  it('should reject unknown arguments and bad values', () => {
    expect(() => parseCliArgs(['--bogus'])).toThrow('Invalid configuration: Unknown argument: --bogus');
    expect(() => parseCliArgs(['--hours'])).toThrow('Invalid configuration: --hours requires a value');
    expect(() => parseCliArgs(['--output', '--aggregate'])).toThrow(
      'Invalid configuration: --output requires a value'
    );
    expect(() => parseCliArgs(['--hours', '0'])).toThrow(
      'Invalid configuration: --hours must be a positive integer'
    );
    expect(() => parseCliArgs(['--timeout-ms', '3000000000'])).toThrow(
      'Invalid configuration: --timeout-ms must be at most 2147483647'
    );
    expect(() => parseCliArgs(['--hours', '87601'])).toThrow('Invalid configuration: --hours must be at most 87600');
    expect(() => parseCliArgs(['--sample-cap', '1.5'])).toThrow(
      'Invalid configuration: --sample-cap must be a positive integer'
    );
  });
});

// =============================================================================
// COMMANDS
// =============================================================================

describe('runCli', () => {
  let dir: string;
  let outputPath: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    outputPath = path.join(dir, 'logs', 'eventlog.json');
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('should print help and exit 0', async () => {
    const { io, stdout } = createMockIO();

    expect(await runCli(['--help'], io)).toBe(0);
    expect(stdout).toEqual([helpText()]);
  });

  it('should collect into the configured output path', async () => {
    const { io, stdout, stderr } = createMockIO({ EVENTLOG_OUTPUT: outputPath });

    const code = await runCli(['collect', '--no-security', '--hours', '24'], io);

    expect(code).toBe(0);
    expect(stdout).toEqual([
      `Collection written to ${outputPath}`,
      'Events: System=1, Application=2, Security=0, Total=3',
    ]);
    expect(stderr.filter((line) => line.startsWith('Error:'))).toEqual([]);
  });

  it('should print the status of a written document', async () => {
    const { io, stdout } = createMockIO({ EVENTLOG_OUTPUT: outputPath });
    await runCli(['--no-security', '--hours', '24', '--quiet'], io);
    stdout.length = 0;

    const code = await runCli(['status', '--input', outputPath], io);

    expect(code).toBe(0);
    expect(stdout).toEqual([
      '--- Log Status ---',
      'Collected: 2024-05-01T12:00:00.000Z',
      'Range: 2024-04-30T12:00:00.000Z - 2024-05-01T12:00:00.000Z',
      'Events: Total=3, Errors=2, Warnings=1',
      'System: Microsoft Windows 11 Pro on TEST-PC (Desk 9000), Uptime: 36 hours',
      '------------------',
    ]);
  });

  it('should render a truncated digest', async () => {
    const { io, stdout } = createMockIO({ EVENTLOG_OUTPUT: outputPath, LOG_LEVEL: 'silent' });
    await runCli(['--no-security'], io);
    stdout.length = 0;

    const code = await runCli(['digest', '--max-chars', '21'], io);

    expect(code).toBe(0);
    expect(stdout).toEqual(['## SYSTEM INFORMATION\n... [truncated due to size limits]']);
  });

  it('should report a missing document and exit 1', async () => {
    const { io, stderr } = createMockIO();
    const missing = path.join(dir, 'missing.json');

    expect(await runCli(['digest', '--input', missing], io)).toBe(1);
    expect(stderr).toEqual([`Error: Log file not found: ${missing}`]);
  });

  it('should reject a configuration with no sources', async () => {
    const { io, stdout, stderr } = createMockIO({ EVENTLOG_OUTPUT: outputPath });

    const code = await runCli(['--no-system', '--no-application', '--no-security'], io);

    expect(code).toBe(1);
    expect(stdout).toEqual([]);
    expect(stderr).toEqual(['Error: Invalid configuration: At least one log source must be enabled']);
  });

  it('should log ignored environment values', async () => {
    const { io, stderr } = createMockIO({ EVENTLOG_HOURS_BACK: 'abc' });
    const missing = path.join(dir, 'missing.json');

    await runCli(['status', '--input', missing], io);

    expect(JSON.parse(stderr[0]).message).toBe(
      'Invalid integer value for EVENTLOG_HOURS_BACK: abc, using default: 48'
    );
    expect(stderr[1]).toBe(`Error: Log file not found: ${missing}`);
  });
});
