/**
 * Event Log Digest - Test Helpers
 *
 * In-process stand-ins for the event log facility and factories for test
 * records. Nothing here starts a process or touches the network.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import type { EventSource, HostInfoProvider } from '../collector/eventSource';
import type { CollectionResult } from '../types/collection';
import type { EventRecord, LogSource } from '../types/eventRecord';
import type { HostSnapshot } from '../types/host';
import type { RawRecord } from '../types/rawRecord';
import { Logger } from '../utils/logger';

// =============================================================================
// CLOCK
// =============================================================================

/** Fixed collection time used across tests: 2024-05-01T12:00:00.000Z */
export const NOW = Date.parse('2024-05-01T12:00:00.000Z');

export const MINUTE_MS = 60 * 1000;
export const HOUR_MS = 60 * MINUTE_MS;

export function isoAgo(ms: number): string {
  return new Date(NOW - ms).toISOString();
}

// =============================================================================
// FACTORIES
// =============================================================================

export const createMockRawRecord = (overrides: Partial<RawRecord> = {}): RawRecord => ({
  timeCreated: isoAgo(30 * MINUTE_MS),
  logName: 'Application',
  level: 2,
  levelDisplayName: 'Error',
  eventId: 1000,
  providerName: 'MyApp',
  message: 'Faulting module app.dll',
  machineName: 'TEST-PC',
  processId: 4321,
  threadId: 12,
  ...overrides,
});

export const createMockEventRecord = (overrides: Partial<EventRecord> = {}): EventRecord => ({
  timestampMs: NOW - 30 * MINUTE_MS,
  logSource: 'Application',
  level: { kind: 'Error' },
  providerName: 'MyApp',
  eventId: 1000,
  message: 'Faulting module app.dll',
  ...overrides,
});

export const createMockHost = (overrides: Partial<HostSnapshot> = {}): HostSnapshot => ({
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
  processor: {
    name: 'Test CPU 3000',
    cores: 8,
    logicalProcessors: 16,
    maxClockSpeedMhz: 3600,
  },
  disks: [
    {
      deviceId: 'C:',
      fileSystem: 'NTFS',
      sizeBytes: 536870912000,
      freeSpaceBytes: 107374182400,
    },
  ],
  ...overrides,
});

export const createMockCollectionResult = (
  overrides: Partial<CollectionResult> = {}
): CollectionResult => ({
  collectionId: 'test-collection',
  collectionTimeMs: NOW,
  windowStartMs: NOW - 48 * HOUR_MS,
  windowEndMs: NOW,
  hoursBack: 48,
  maxRecords: 500,
  sources: ['System', 'Application', 'Security'],
  host: createMockHost(),
  events: {
    aggregated: false,
    bySource: {
      System: [],
      Application: [createMockEventRecord()],
      Security: [],
    },
  },
  warnings: [],
  droppedRecords: 0,
  ...overrides,
});

// =============================================================================
// FAKE EVENT SOURCE
// =============================================================================

export interface FakeSourceOptions {
  records?: Partial<Record<LogSource, RawRecord[]>>;
  /** Errors thrown by queryEvents for a given log */
  failures?: Partial<Record<LogSource, Error>>;
  probeError?: Error;
  hostError?: Error;
  host?: HostSnapshot;
  /** Never settle the query for these logs */
  hangingSources?: LogSource[];
}

export class FakeEventSource implements EventSource, HostInfoProvider {
  readonly name = 'fake';
  readonly queries: Array<{ logName: LogSource; sinceMs: number; maxCount: number }> = [];
  probeCalls = 0;

  constructor(private readonly options: FakeSourceOptions = {}) {}

  async probe(): Promise<void> {
    this.probeCalls++;
    if (this.options.probeError) {
      throw this.options.probeError;
    }
  }

  queryEvents(logName: LogSource, sinceMs: number, maxCount: number): Promise<RawRecord[]> {
    this.queries.push({ logName, sinceMs, maxCount });

    if (this.options.hangingSources?.includes(logName)) {
      return new Promise<RawRecord[]>(() => undefined);
    }
    const failure = this.options.failures?.[logName];
    if (failure) {
      return Promise.reject(failure);
    }
    return Promise.resolve([...(this.options.records?.[logName] ?? [])]);
  }

  async getHostSnapshot(): Promise<HostSnapshot> {
    if (this.options.hostError) {
      throw this.options.hostError;
    }
    return this.options.host ?? createMockHost();
  }
}

// =============================================================================
// LOGGER & FILESYSTEM
// =============================================================================

export interface CapturedLog {
  level: string;
  message: string;
  context?: Record<string, unknown>;
}

/**
 * Logger at debug level whose lines are kept in memory.
 */
export function createMemoryLogger(): { logger: Logger; lines: string[]; entries: () => CapturedLog[] } {
  const lines: string[] = [];
  const logger = new Logger({ minLevel: 'debug', sink: (line) => lines.push(line) });

  const entries = (): CapturedLog[] =>
    lines.map((line) => {
      const parsed: unknown = JSON.parse(line);
      if (typeof parsed !== 'object' || parsed === null) {
        throw new Error(`Log line is not an object: ${line}`);
      }
      const level = 'level' in parsed && typeof parsed.level === 'string' ? parsed.level : '';
      const message = 'message' in parsed && typeof parsed.message === 'string' ? parsed.message : '';
      const context =
        'context' in parsed && typeof parsed.context === 'object' && parsed.context !== null
          ? Object.fromEntries(Object.entries(parsed.context))
          : undefined;
      return { level, message, context };
    });

  return { logger, lines, entries };
}

export async function makeTempDir(): Promise<string> {
  return fs.promises.mkdtemp(path.join(os.tmpdir(), 'eventlog-digest-'));
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.promises.rm(dir, { recursive: true, force: true });
}
