/**
 * Event Log Digest - PowerShell Source Tests
 *
 * The command runner is replaced with vi.fn, so no PowerShell process is
 * started.
 */

import * as os from 'os';
import { describe, it, expect, vi } from 'vitest';
import {
  buildQueryScript,
  encodeScriptArgs,
  parseEventRows,
  parseHostInfo,
  PowerShellEventSource,
  type CommandRunner,
} from '../powershell';
import { EventSubsystemError, SourceAccessError, TimeoutError } from '../../utils/errors';
import { createMemoryLogger, HOUR_MS, NOW } from '../../__tests__/helpers';

// =============================================================================
// TEST FIXTURES
// =============================================================================

function decodeScript(args: readonly string[]): string {
  return Buffer.from(args[args.length - 1], 'base64').toString('utf16le');
}

const SAMPLE_ROW = {
  TimeCreated: '/Date(1714564800000)/',
  LogName: 'System',
  Level: 2,
  LevelDisplayName: 'Error',
  EventID: 7,
  ProviderName: 'Disk',
  Message: 'Bad block',
  MachineName: 'TEST-PC',
  ProcessId: 4,
  ThreadId: 'x',
};

const SAMPLE_HOST = {
  ComputerName: 'TEST-PC',
  OSName: 'Microsoft Windows 11 Pro',
  OSVersion: '10.0.22631',
  OSBuildNumber: 22631,
  OSArchitecture: '64-bit',
  InstallDate: '2023-01-15T08:00:00.000Z',
  LastBootUpTime: '2024-04-30T00:00:00.000Z',
  Manufacturer: 'Contoso',
  Model: 'Desk 9000',
  TotalPhysicalMemory: 17179869184,
  Processor: { Name: 'Test CPU 3000', NumberOfCores: 8, NumberOfLogicalProcessors: 16, MaxClockSpeed: null },
  Disks: [{ DeviceID: 'C:', FileSystem: 'NTFS', Size: 1000, FreeSpace: -1 }],
};

function createSource(runner: CommandRunner) {
  const memory = createMemoryLogger();
  const source = new PowerShellEventSource({ timeoutMs: 5000, runner, logger: memory.logger });
  return { source, ...memory };
}

function failure(message: string, props: Record<string, unknown>): Error {
  return Object.assign(new Error(message), props);
}

// =============================================================================
// SCRIPTS
// =============================================================================

describe('encodeScriptArgs', () => {
  it('should pass the script as base64 UTF-16LE', () => {
    const args = encodeScriptArgs('Get-Date');

    expect(args.slice(0, 5)).toEqual([
      '-NoProfile',
      '-NonInteractive',
      '-ExecutionPolicy',
      'Bypass',
      '-EncodedCommand',
    ]);
    expect(decodeScript(args)).toBe('Get-Date');
  });
});

describe('buildQueryScript', () => {
  it('should filter by log, start time and count', () => {
    const script = buildQueryScript('Security', 1714564800000.7, 25);

    expect(script).toContain('FromUnixTimeMilliseconds(1714564800000)');
    expect(script).toContain("LogName = 'Security'; StartTime = $start } -MaxEvents 25)");
  });
});

// =============================================================================
// OUTPUT PARSING
// =============================================================================

describe('parseEventRows', () => {
  it('should map rows to raw records and tolerate a BOM', () => {
    expect(parseEventRows('\uFEFF' + JSON.stringify([SAMPLE_ROW]))).toEqual([
      {
        timeCreated: '/Date(1714564800000)/',
        logName: 'System',
        level: 2,
        levelDisplayName: 'Error',
        eventId: 7,
        providerName: 'Disk',
        message: 'Bad block',
        machineName: 'TEST-PC',
        processId: 4,
        threadId: undefined,
      },
    ]);
  });

  it('should accept a single object in place of an array', () => {
    expect(parseEventRows(JSON.stringify(SAMPLE_ROW))).toHaveLength(1);
  });

  it('should read empty output as no records', () => {
    expect(parseEventRows('  \r\n')).toEqual([]);
  });

  it('should turn non-object rows into empty records', () => {
    expect(parseEventRows('[1, "x"]')).toEqual([{}, {}]);
  });

  it('should throw on output that is not JSON', () => {
    expect(() => parseEventRows('Get-WinEvent : oops')).toThrow(SyntaxError);
  });
});

describe('parseHostInfo', () => {
  it('should build a host snapshot', () => {
    const host = parseHostInfo(JSON.stringify(SAMPLE_HOST), NOW);

    expect(host).toEqual({
      computerName: 'TEST-PC',
      osName: 'Microsoft Windows 11 Pro',
      osVersion: '10.0.22631',
      osBuildNumber: '22631',
      architecture: '64-bit',
      manufacturer: 'Contoso',
      model: 'Desk 9000',
      totalMemoryBytes: 17179869184,
      installDateMs: Date.parse('2023-01-15T08:00:00.000Z'),
      lastBootTimeMs: NOW - 36 * HOUR_MS,
      uptimeHours: 36,
      processor: { name: 'Test CPU 3000', cores: 8, logicalProcessors: 16, maxClockSpeedMhz: null },
      disks: [{ deviceId: 'C:', fileSystem: 'NTFS', sizeBytes: 1000, freeSpaceBytes: null }],
    });
  });

  it('should fill missing values', () => {
    const host = parseHostInfo(JSON.stringify({ ComputerName: '' }), NOW);

    expect(host.computerName).toBe(os.hostname());
    expect(host.osName).toBe('Unknown');
    expect(host.uptimeHours).toBeNull();
    expect(host.disks).toEqual([]);
  });
});

// =============================================================================
// SOURCE
// =============================================================================

describe('PowerShellEventSource', () => {
  it('should run the query script and parse its output', async () => {
    const runner = vi.fn<CommandRunner>(async () => ({ stdout: JSON.stringify([SAMPLE_ROW]), stderr: '' }));
    const { source } = createSource(runner);

    const records = await source.queryEvents('System', NOW - HOUR_MS, 10);

    expect(records).toHaveLength(1);
    expect(runner).toHaveBeenCalledTimes(1);
    const [file, args, options] = runner.mock.calls[0];
    expect(file).toBe('powershell.exe');
    expect(options).toEqual({ timeoutMs: 5000 });
    expect(decodeScript(args)).toBe(buildQueryScript('System', NOW - HOUR_MS, 10));
  });

  it('should log stderr output at debug level', async () => {
    const runner = vi.fn<CommandRunner>(async () => ({ stdout: '[]', stderr: 'WARNING: slow\n' }));
    const { source, entries } = createSource(runner);

    await source.queryEvents('Application', NOW - HOUR_MS, 10);

    expect(entries()).toEqual([
      {
        level: 'debug',
        message: 'PowerShell wrote to stderr',
        context: { operation: 'query Application', stderr: 'WARNING: slow' },
      },
    ]);
  });

  it('should report a missing executable as a subsystem failure', async () => {
    const runner = vi.fn<CommandRunner>(async () => {
      throw failure('spawn powershell.exe ENOENT', { code: 'ENOENT' });
    });
    const { source } = createSource(runner);

    await expect(source.queryEvents('System', NOW, 10)).rejects.toThrow(
      new EventSubsystemError('powershell.exe was not found. Is PowerShell installed and in PATH?')
    );
    await expect(source.probe()).rejects.toBeInstanceOf(EventSubsystemError);
  });

  it('should report a killed query as a timeout', async () => {
    const runner = vi.fn<CommandRunner>(async () => {
      throw failure('Command failed', { killed: true, signal: 'SIGTERM' });
    });
    const { source } = createSource(runner);

    await expect(source.queryEvents('System', NOW, 10)).rejects.toThrow(
      new TimeoutError('query System', 5000)
    );
  });

  it('should report an access failure with the first stderr line', async () => {
    const runner = vi.fn<CommandRunner>(async () => {
      throw failure('Command failed', {
        code: 1,
        stderr: '\r\nGet-WinEvent : Attempted to perform an unauthorized operation.\r\nAt line:4 char:3\r\n',
      });
    });
    const { source } = createSource(runner);

    const error = await source.queryEvents('Security', NOW, 10).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(SourceAccessError);
    expect(error).toMatchObject({
      message: 'Security: Get-WinEvent : Attempted to perform an unauthorized operation.',
      source: 'Security',
      details: { exitCode: 1, source: 'Security' },
    });
  });

  it('should report unreadable output as an access failure', async () => {
    const runner = vi.fn<CommandRunner>(async () => ({ stdout: '{not json', stderr: '' }));
    const { source } = createSource(runner);

    await expect(source.queryEvents('Application', NOW, 10)).rejects.toThrow(
      /^Application: unreadable output \(/
    );
  });

  it('should wrap a failed probe', async () => {
    const runner = vi.fn<CommandRunner>(async () => {
      throw failure('Command failed', { code: 1, stderr: 'Get-Command : not recognized' });
    });
    const { source } = createSource(runner);

    await expect(source.probe()).rejects.toThrow(
      new EventSubsystemError('Get-WinEvent is not available: Get-Command : not recognized')
    );
  });

  it('should read the host snapshot', async () => {
    const runner = vi.fn<CommandRunner>(async () => ({ stdout: JSON.stringify(SAMPLE_HOST), stderr: '' }));
    const { source } = createSource(runner);

    const host = await source.getHostSnapshot(NOW);

    expect(host.computerName).toBe('TEST-PC');
    expect(host.uptimeHours).toBe(36);
  });
});
