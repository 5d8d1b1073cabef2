#!/usr/bin/env node
/**
 * Event Log Digest - Command Line Interface
 *
 * Usage:
 *   eventlog-digest [collect] [options]
 *   eventlog-digest digest [--input <path>] [--max-chars <n>]
 *   eventlog-digest status [--input <path>]
 *
 * Settings not given as flags come from the environment (a .env file is
 * loaded first), then from defaults.
 *
 * @version 0.1.0
 */

import { config as loadDotenv } from 'dotenv';

import type { EventSource, HostInfoProvider } from './collector/eventSource';
import {
  assertValidConfig,
  loadCollectorConfig,
  type CollectorConfig,
} from './collector/config';
import { PowerShellEventSource } from './collector/powershell';
import { documentToAggregates, readCollectionDocument } from './output/reader';
import { renderDigest } from './pipeline/digest';
import { runCollection } from './pipeline/run';
import { summarizeEvents } from './pipeline/summary';
import { ConfigError, errorMessage } from './utils/errors';
import { Logger, type LoggerLike } from './utils/logger';
import { MAX_HOURS_BACK, MAX_TIMEOUT_MS } from './utils/validation';

// =============================================================================
// TYPE DEFINITIONS
// =============================================================================

export type CliCommand = 'collect' | 'digest' | 'status' | 'help';

export interface CliArgs {
  command: CliCommand;
  overrides: Partial<CollectorConfig>;
  /** Document to read for digest and status; defaults to the output path */
  input?: string;
  maxChars?: number;
}

/**
 * Process surface of the CLI, replaced in tests.
 */
export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  env: NodeJS.ProcessEnv;
  now?: () => number;
  createSource?: (config: CollectorConfig, logger: LoggerLike) => EventSource & HostInfoProvider;
}

const COMMANDS: readonly CliCommand[] = ['collect', 'digest', 'status'];

// =============================================================================
// ARGUMENT PARSING
// =============================================================================

function isCommand(value: string): value is CliCommand {
  return COMMANDS.some((command) => command === value);
}

function takeValue(args: readonly string[], index: number, flag: string): string {
  const value = args[index];
  if (value === undefined || value.startsWith('--')) {
    throw new ConfigError([`${flag} requires a value`]);
  }
  return value;
}

function parsePositiveInt(value: string, flag: string, max: number = Number.MAX_SAFE_INTEGER): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new ConfigError([`${flag} must be a positive integer`]);
  }
  if (parsed > max) {
    throw new ConfigError([`${flag} must be at most ${max}`]);
  }
  return parsed;
}

/**
 * Parses command line arguments.
 *
 * @throws ConfigError on an unknown argument or a bad flag value
 */
export function parseCliArgs(argv: readonly string[]): CliArgs {
  const args = [...argv];
  const result: CliArgs = { command: 'collect', overrides: {} };

  const first = args[0];
  if (first !== undefined && isCommand(first)) {
    result.command = first;
    args.shift();
  }

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '--hours':
        result.overrides.hoursBack = parsePositiveInt(takeValue(args, ++i, arg), arg, MAX_HOURS_BACK);
        break;

      case '--max-events':
        result.overrides.maxRecords = parsePositiveInt(takeValue(args, ++i, arg), arg);
        break;

      case '--output':
        result.overrides.outputPath = takeValue(args, ++i, arg);
        break;

      case '--no-system':
        result.overrides.includeSystem = false;
        break;

      case '--no-application':
        result.overrides.includeApplication = false;
        break;

      case '--no-security':
        result.overrides.includeSecurity = false;
        break;

      case '--aggregate':
        result.overrides.aggregate = true;
        break;

      case '--sample-cap':
        result.overrides.sampleCap = parsePositiveInt(takeValue(args, ++i, arg), arg);
        break;

      case '--timeout-ms':
        result.overrides.sourceTimeoutMs = parsePositiveInt(takeValue(args, ++i, arg), arg, MAX_TIMEOUT_MS);
        break;

      case '--verbose':
        result.overrides.logLevel = 'debug';
        break;

      case '--quiet':
        result.overrides.logLevel = 'error';
        break;

      case '--input':
        result.input = takeValue(args, ++i, arg);
        break;

      case '--max-chars':
        result.maxChars = parsePositiveInt(takeValue(args, ++i, arg), arg);
        break;

      case '--help':
      case '-h':
        result.command = 'help';
        break;

      default:
        throw new ConfigError([`Unknown argument: ${arg}`]);
    }
  }

  return result;
}

/**
 * Help text.
 */
export function helpText(): string {
  return `
Event Log Digest

Collects Windows Event Log records into one JSON document and renders a
compact text digest of it.

Usage:
  eventlog-digest [collect] [options]
  eventlog-digest digest [--input <path>] [--max-chars <n>]
  eventlog-digest status [--input <path>]

Collection options:
  --hours <n>           Hours to look back (default: 48)
  --max-events <n>      Maximum records per log (default: 500)
  --output <path>       Output document (default: %LOCALAPPDATA%\\EventlogDigest\\logs\\eventlog.json)
  --no-system           Skip the System log
  --no-application      Skip the Application log
  --no-security         Skip the Security log
  --aggregate           Collapse repeated events into groups
  --sample-cap <n>      Sample messages kept per group (default: 3)
  --timeout-ms <n>      Budget for each log query (default: 120000)

Reading options:
  --input <path>        Document to read (default: the output path)
  --max-chars <n>       Digest length limit (default: 100000)

Other:
  --verbose             Log debug detail to stderr
  --quiet               Log errors only
  --help, -h            Show this help message
`;
}

// =============================================================================
// COMMANDS
// =============================================================================

function defaultSource(config: CollectorConfig, logger: LoggerLike): EventSource & HostInfoProvider {
  return new PowerShellEventSource({ timeoutMs: config.sourceTimeoutMs, logger });
}

async function commandCollect(config: CollectorConfig, logger: LoggerLike, io: CliIO): Promise<void> {
  const source = (io.createSource ?? defaultSource)(config, logger);
  const { result, output } = await runCollection(
    { source, hostInfo: source, logger, now: io.now },
    config
  );

  const counts = output.document.CollectionInfo.EventCounts;
  io.stdout(`Collection written to ${output.path}`);
  io.stdout(
    `Events: System=${counts.SystemEvents}, Application=${counts.ApplicationEvents}, Security=${counts.SecurityEvents}, Total=${counts.TotalEvents}`
  );
  if (result.droppedRecords > 0) {
    io.stdout(`Dropped records: ${result.droppedRecords}`);
  }
  for (const warning of output.document.CollectionInfo.Warnings) {
    io.stdout(`Warning: ${warning}`);
  }
}

async function commandDigest(args: CliArgs, config: CollectorConfig, io: CliIO): Promise<void> {
  const document = await readCollectionDocument(args.input ?? config.outputPath);
  io.stdout(renderDigest(document, { maxChars: args.maxChars, sampleCap: config.sampleCap }));
}

async function commandStatus(args: CliArgs, config: CollectorConfig, io: CliIO): Promise<void> {
  const document = await readCollectionDocument(args.input ?? config.outputPath);
  const summary = summarizeEvents(documentToAggregates(document, { sampleCap: config.sampleCap }));
  const info = document.CollectionInfo;
  const os = document.SystemInfo.OS;
  const computer = document.SystemInfo.Computer;
  const uptime = os?.UpTime;

  io.stdout('--- Log Status ---');
  io.stdout(`Collected: ${info.CollectionTime}`);
  io.stdout(`Range: ${info.TimeRange.StartTime} - ${info.TimeRange.EndTime}`);
  io.stdout(
    `Events: Total=${summary.totalEvents}, Errors=${summary.byLevel.Critical + summary.byLevel.Error}, Warnings=${summary.byLevel.Warning}`
  );
  io.stdout(
    `System: ${os?.Caption ?? 'Unknown'} on ${computer?.Name ?? 'Unknown'} (${computer?.Model ?? 'Unknown'}), Uptime: ${
      uptime === null || uptime === undefined ? 'Unknown' : `${uptime} hours`
    }`
  );
  if (info.Warnings.length > 0) {
    io.stdout(`Collection warnings: ${info.Warnings.length}`);
  }
  io.stdout('------------------');
}

// =============================================================================
// ENTRY
// =============================================================================

/**
 * Run the CLI and return the process exit code.
 */
export async function runCli(argv: readonly string[], io: CliIO): Promise<number> {
  try {
    const args = parseCliArgs(argv);
    if (args.command === 'help') {
      io.stdout(helpText());
      return 0;
    }

    const envWarnings: string[] = [];
    const config = loadCollectorConfig(args.overrides, {
      env: io.env,
      onWarning: (message) => envWarnings.push(message),
    });

    const logger = new Logger({ minLevel: config.logLevel, sink: io.stderr });
    for (const warning of envWarnings) {
      logger.warn(warning);
    }
    assertValidConfig(config, logger);

    switch (args.command) {
      case 'collect':
        await commandCollect(config, logger, io);
        break;
      case 'digest':
        await commandDigest(args, config, io);
        break;
      case 'status':
        await commandStatus(args, config, io);
        break;
    }
    return 0;
  } catch (error) {
    io.stderr(`Error: ${errorMessage(error)}`);
    return 1;
  }
}

async function main(): Promise<void> {
  loadDotenv();

  process.exitCode = await runCli(process.argv.slice(2), {
    stdout: (text) => process.stdout.write(`${text}\n`),
    stderr: (text) => process.stderr.write(`${text}\n`),
    env: process.env,
  });
}

if (require.main === module) {
  main().catch((error: unknown) => {
    process.stderr.write(`Fatal error: ${errorMessage(error)}\n`);
    process.exit(1);
  });
}
