/**
 * Event Log Digest - PowerShell Event Source
 *
 * Reads Windows Event Logs and host metadata by running short scripts in
 * powershell.exe. Scripts are passed with -EncodedCommand so no quoting of
 * the script text is needed, and every script prints one JSON value.
 */

import { execFile } from 'child_process';
import { promisify } from 'util';

import type { LogSource } from '../types/eventRecord';
import type { RawRecord } from '../types/rawRecord';
import type { HostSnapshot } from '../types/host';
import {
  errorMessage,
  EventSubsystemError,
  SourceAccessError,
  TimeoutError,
} from '../utils/errors';
import type { LoggerLike } from '../utils/logger';
import { hoursBetween, parseEventTime } from '../utils/time';
import {
  EventRowSchema,
  EventRowsOutputSchema,
  HostInfoOutputSchema,
  type EventRow,
} from '../utils/validation';
import { unknownHostSnapshot } from './collector';
import type { EventSource, HostInfoProvider } from './eventSource';

// =============================================================================
// COMMAND RUNNER
// =============================================================================

export interface CommandResult {
  stdout: string;
  stderr: string;
}

export type CommandRunner = (
  file: string,
  args: string[],
  options: { timeoutMs: number }
) => Promise<CommandResult>;

const execFileAsync = promisify(execFile);

const MAX_OUTPUT_BYTES = 256 * 1024 * 1024;

/**
 * Runs a command with child_process.execFile. The child is killed when the
 * timeout expires.
 */
export const execFileRunner: CommandRunner = async (file, args, options) => {
  const { stdout, stderr } = await execFileAsync(file, args, {
    encoding: 'utf8',
    timeout: options.timeoutMs,
    maxBuffer: MAX_OUTPUT_BYTES,
    windowsHide: true,
  });
  return { stdout, stderr };
};

function failureCode(error: unknown): string | number | undefined {
  if (error instanceof Error && 'code' in error) {
    const code = error.code;
    if (typeof code === 'string' || typeof code === 'number') {
      return code;
    }
  }
  return undefined;
}

function failureWasKilled(error: unknown): boolean {
  return error instanceof Error && 'killed' in error && error.killed === true;
}

/**
 * First meaningful line PowerShell wrote to stderr, or the error message.
 */
export function describeFailure(error: unknown): string {
  if (error instanceof Error && 'stderr' in error && typeof error.stderr === 'string') {
    const line = error.stderr
      .split(/\r?\n/)
      .map((part) => part.trim())
      .find((part) => part !== '');
    if (line) {
      return line;
    }
  }
  return errorMessage(error);
}

// =============================================================================
// SCRIPTS
// =============================================================================

const SCRIPT_PRELUDE = [
  "$ErrorActionPreference = 'Stop'",
  '[Console]::OutputEncoding = [System.Text.Encoding]::UTF8',
];

export const PROBE_SCRIPT = [
  ...SCRIPT_PRELUDE,
  'Get-Command -Name Get-WinEvent | Out-Null',
  "ConvertTo-Json -InputObject @{ ok = $true } -Compress",
].join('\n');

/**
 * Script printing the records of one log as a JSON array, newest first.
 * An empty result is "[]", not an error.
 */
export function buildQueryScript(logName: LogSource, sinceMs: number, maxCount: number): string {
  const since = Math.floor(sinceMs);
  const limit = Math.max(1, Math.floor(maxCount));

  return [
    ...SCRIPT_PRELUDE,
    `$start = [DateTimeOffset]::FromUnixTimeMilliseconds(${since}).LocalDateTime`,
    'try {',
    `  $events = @(Get-WinEvent -FilterHashtable @{ LogName = '${logName}'; StartTime = $start } -MaxEvents ${limit})`,
    '} catch {',
    "  if ($_.FullyQualifiedErrorId -like 'NoMatchingEventsFound*') { $events = @() } else { throw }",
    '}',
    '$rows = @($events | ForEach-Object {',
    '  [pscustomobject]@{',
    "    TimeCreated = $_.TimeCreated.ToUniversalTime().ToString('o')",
    '    LogName = $_.LogName',
    '    Level = [int]$_.Level',
    '    LevelDisplayName = $_.LevelDisplayName',
    '    EventID = $_.Id',
    '    ProviderName = $_.ProviderName',
    '    Message = $_.Message',
    '    MachineName = $_.MachineName',
    '    ProcessId = $_.ProcessId',
    '    ThreadId = $_.ThreadId',
    '  }',
    '})',
    'ConvertTo-Json -InputObject $rows -Depth 3 -Compress',
  ].join('\n');
}

export const HOST_SCRIPT = [
  ...SCRIPT_PRELUDE,
  'function ConvertTo-IsoTime($value) { if ($value) { $value.ToUniversalTime().ToString(\'o\') } else { $null } }',
  '$os = Get-CimInstance -ClassName Win32_OperatingSystem',
  '$cs = Get-CimInstance -ClassName Win32_ComputerSystem',
  '$cpu = Get-CimInstance -ClassName Win32_Processor | Select-Object -First 1',
  "$disks = @(Get-CimInstance -ClassName Win32_LogicalDisk -Filter 'DriveType=3')",
  '$info = [pscustomobject]@{',
  '  ComputerName = $env:COMPUTERNAME',
  '  OSName = $os.Caption',
  '  OSVersion = $os.Version',
  '  OSBuildNumber = $os.BuildNumber',
  '  OSArchitecture = $os.OSArchitecture',
  '  InstallDate = ConvertTo-IsoTime $os.InstallDate',
  '  LastBootUpTime = ConvertTo-IsoTime $os.LastBootUpTime',
  '  Manufacturer = $cs.Manufacturer',
  '  Model = $cs.Model',
  '  TotalPhysicalMemory = [int64]$cs.TotalPhysicalMemory',
  '  Processor = [pscustomobject]@{',
  '    Name = $cpu.Name',
  '    NumberOfCores = $cpu.NumberOfCores',
  '    NumberOfLogicalProcessors = $cpu.NumberOfLogicalProcessors',
  '    MaxClockSpeed = $cpu.MaxClockSpeed',
  '  }',
  '  Disks = @($disks | ForEach-Object {',
  '    [pscustomobject]@{ DeviceID = $_.DeviceID; FileSystem = $_.FileSystem; Size = [int64]$_.Size; FreeSpace = [int64]$_.FreeSpace }',
  '  })',
  '}',
  'ConvertTo-Json -InputObject $info -Depth 4 -Compress',
].join('\n');

/**
 * powershell.exe arguments for a script.
 */
export function encodeScriptArgs(script: string): string[] {
  return [
    '-NoProfile',
    '-NonInteractive',
    '-ExecutionPolicy',
    'Bypass',
    '-EncodedCommand',
    Buffer.from(script, 'utf16le').toString('base64'),
  ];
}

// =============================================================================
// OUTPUT PARSING
// =============================================================================

function rowToRawRecord(row: EventRow): RawRecord {
  return {
    timeCreated: row.TimeCreated,
    logName: row.LogName,
    level: row.Level,
    levelDisplayName: row.LevelDisplayName,
    eventId: row.EventID,
    providerName: row.ProviderName,
    message: row.Message,
    machineName: row.MachineName,
    processId: row.ProcessId,
    threadId: row.ThreadId,
  };
}

function parseJsonOutput(stdout: string): unknown {
  const trimmed = stdout.replace(/^\uFEFF/, '').trim();
  if (trimmed === '') {
    return [];
  }
  return JSON.parse(trimmed);
}

/**
 * Parse the query script's output into raw records. Rows that are not
 * objects become empty records so the normalizer counts them as malformed.
 */
export function parseEventRows(stdout: string): RawRecord[] {
  const rows = EventRowsOutputSchema.parse(parseJsonOutput(stdout));
  return rows.map((row) => {
    const parsed = EventRowSchema.safeParse(row);
    return parsed.success ? rowToRawRecord(parsed.data) : {};
  });
}

function text(value: string | number | null | undefined, fallback: string = 'Unknown'): string {
  if (typeof value === 'number') {
    return String(value);
  }
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : fallback;
}

function count(value: number | null | undefined): number | null {
  return typeof value === 'number' && value >= 0 ? value : null;
}

/**
 * Parse the host script's output into a snapshot taken at nowMs.
 */
export function parseHostInfo(stdout: string, nowMs: number): HostSnapshot {
  const info = HostInfoOutputSchema.parse(parseJsonOutput(stdout));
  const fallback = unknownHostSnapshot();

  const lastBootTimeMs = parseEventTime(info.LastBootUpTime);
  const installDateMs = parseEventTime(info.InstallDate);

  return {
    computerName: text(info.ComputerName, fallback.computerName),
    osName: text(info.OSName),
    osVersion: text(info.OSVersion),
    osBuildNumber: text(info.OSBuildNumber),
    architecture: text(info.OSArchitecture),
    manufacturer: text(info.Manufacturer),
    model: text(info.Model),
    totalMemoryBytes: count(info.TotalPhysicalMemory),
    installDateMs,
    lastBootTimeMs,
    uptimeHours: lastBootTimeMs === null ? null : hoursBetween(lastBootTimeMs, nowMs),
    processor: {
      name: text(info.Processor?.Name),
      cores: count(info.Processor?.NumberOfCores),
      logicalProcessors: count(info.Processor?.NumberOfLogicalProcessors),
      maxClockSpeedMhz: count(info.Processor?.MaxClockSpeed),
    },
    disks: (info.Disks ?? []).map((disk) => ({
      deviceId: text(disk.DeviceID),
      fileSystem: text(disk.FileSystem),
      sizeBytes: count(disk.Size),
      freeSpaceBytes: count(disk.FreeSpace),
    })),
  };
}

// =============================================================================
// SOURCE
// =============================================================================

export interface PowerShellSourceOptions {
  /** Executable to run (default: powershell.exe) */
  executable?: string;

  /** Kill a script that runs longer than this */
  timeoutMs: number;

  runner?: CommandRunner;

  logger: LoggerLike;
}

export class PowerShellEventSource implements EventSource, HostInfoProvider {
  readonly name = 'powershell';

  private readonly executable: string;
  private readonly timeoutMs: number;
  private readonly runner: CommandRunner;
  private readonly logger: LoggerLike;

  constructor(options: PowerShellSourceOptions) {
    this.executable = options.executable ?? 'powershell.exe';
    this.timeoutMs = options.timeoutMs;
    this.runner = options.runner ?? execFileRunner;
    this.logger = options.logger;
  }

  /**
   * Run a script. A missing executable is reported as EventSubsystemError,
   * an expired timeout as TimeoutError; other failures are rethrown.
   */
  private async run(script: string, operation: string): Promise<string> {
    try {
      const { stdout, stderr } = await this.runner(this.executable, encodeScriptArgs(script), {
        timeoutMs: this.timeoutMs,
      });
      if (stderr.trim() !== '') {
        this.logger.debug('PowerShell wrote to stderr', { operation, stderr: stderr.trim() });
      }
      return stdout;
    } catch (error) {
      if (failureCode(error) === 'ENOENT') {
        throw new EventSubsystemError(
          `${this.executable} was not found. Is PowerShell installed and in PATH?`,
          error instanceof Error ? error : undefined
        );
      }
      if (failureWasKilled(error)) {
        throw new TimeoutError(operation, this.timeoutMs);
      }
      throw error;
    }
  }

  async probe(): Promise<void> {
    try {
      await this.run(PROBE_SCRIPT, 'probe');
    } catch (error) {
      if (error instanceof EventSubsystemError) {
        throw error;
      }
      throw new EventSubsystemError(
        `Get-WinEvent is not available: ${describeFailure(error)}`,
        error instanceof Error ? error : undefined
      );
    }
  }

  async queryEvents(logName: LogSource, sinceMs: number, maxCount: number): Promise<RawRecord[]> {
    let stdout: string;
    try {
      stdout = await this.run(buildQueryScript(logName, sinceMs, maxCount), `query ${logName}`);
    } catch (error) {
      if (error instanceof EventSubsystemError || error instanceof TimeoutError) {
        throw error;
      }
      throw new SourceAccessError(logName, describeFailure(error), {
        exitCode: failureCode(error),
      });
    }

    try {
      return parseEventRows(stdout);
    } catch (error) {
      throw new SourceAccessError(logName, `unreadable output (${errorMessage(error)})`);
    }
  }

  async getHostSnapshot(nowMs: number): Promise<HostSnapshot> {
    const stdout = await this.run(HOST_SCRIPT, 'host snapshot');
    return parseHostInfo(stdout, nowMs);
  }
}
