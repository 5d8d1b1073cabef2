import * as os from 'os';

import type { LogSource } from '../types/eventRecord';
import { LOG_SOURCES } from '../types/eventRecord';
import type { RawRecord } from '../types/rawRecord';
import type { HostSnapshot } from '../types/host';
import {
  ConfigError,
  errorMessage,
  EventSubsystemError,
  withTimeout,
} from '../utils/errors';
import type { LoggerLike } from '../utils/logger';
import { hoursToMs, parseEventTime } from '../utils/time';
import { MAX_HOURS_BACK, MAX_TIMEOUT_MS } from '../utils/validation';
import type { EventSource, HostInfoProvider } from './eventSource';

export const DEFAULT_SOURCE_TIMEOUT_MS = 120000;

export interface CollectorOptions {
  /** Budget for each source query, the probe and the host query */
  sourceTimeoutMs?: number;
}

export interface CollectRequest {
  hoursBack: number;
  maxRecords: number;
  sources: readonly LogSource[];
}

/**
 * Raw records of one run, already limited to the window and the per-source cap.
 */
export interface RawCollection {
  windowStartMs: number;
  windowEndMs: number;
  bySource: Record<LogSource, RawRecord[]>;
  host: HostSnapshot;
  /** Records dropped because their creation time could not be read */
  unreadable: number;
  warnings: string[];
}

/**
 * Host snapshot used when the host query fails.
 */
export function unknownHostSnapshot(computerName: string = os.hostname()): HostSnapshot {
  return {
    computerName,
    osName: 'Unknown',
    osVersion: 'Unknown',
    osBuildNumber: 'Unknown',
    architecture: 'Unknown',
    manufacturer: 'Unknown',
    model: 'Unknown',
    totalMemoryBytes: null,
    installDateMs: null,
    lastBootTimeMs: null,
    uptimeHours: null,
    processor: {
      name: 'Unknown',
      cores: null,
      logicalProcessors: null,
      maxClockSpeedMhz: null,
    },
    disks: [],
  };
}

/**
 * Keep records created inside [startMs, endMs], newest first, at most maxRecords.
 */
export function selectWindow(
  raws: readonly RawRecord[],
  startMs: number,
  endMs: number,
  maxRecords: number
): { records: RawRecord[]; unreadable: number } {
  const timed: Array<{ raw: RawRecord; ms: number }> = [];
  let unreadable = 0;

  for (const raw of raws) {
    const ms = parseEventTime(raw.timeCreated);
    if (ms === null) {
      unreadable++;
      continue;
    }
    if (ms >= startMs && ms <= endMs) {
      timed.push({ raw, ms });
    }
  }

  timed.sort((a, b) => b.ms - a.ms);
  return { records: timed.slice(0, maxRecords).map((entry) => entry.raw), unreadable };
}

function validateRequest(request: CollectRequest): void {
  const issues: string[] = [];
  if (!Number.isInteger(request.hoursBack) || request.hoursBack < 1) {
    issues.push(`hoursBack must be a positive integer, got ${request.hoursBack}`);
  } else if (request.hoursBack > MAX_HOURS_BACK) {
    issues.push(`hoursBack must be at most ${MAX_HOURS_BACK}, got ${request.hoursBack}`);
  }
  if (!Number.isInteger(request.maxRecords) || request.maxRecords < 1) {
    issues.push(`maxRecords must be a positive integer, got ${request.maxRecords}`);
  }
  if (request.sources.length === 0) {
    issues.push('At least one log source must be requested');
  }
  if (issues.length > 0) {
    throw new ConfigError(issues);
  }
}

/**
 * Reads each requested log in turn. A log that cannot be read degrades to an
 * empty list and a warning; only an unreachable event facility is fatal.
 */
export class EventCollector {
  private readonly source: EventSource;
  private readonly hostInfo: HostInfoProvider;
  private readonly logger: LoggerLike;
  private readonly sourceTimeoutMs: number;

  constructor(
    source: EventSource,
    hostInfo: HostInfoProvider,
    logger: LoggerLike,
    options: CollectorOptions = {}
  ) {
    this.source = source;
    this.hostInfo = hostInfo;
    this.logger = logger;
    this.sourceTimeoutMs = options.sourceTimeoutMs ?? DEFAULT_SOURCE_TIMEOUT_MS;
    if (
      !Number.isInteger(this.sourceTimeoutMs) ||
      this.sourceTimeoutMs < 1 ||
      this.sourceTimeoutMs > MAX_TIMEOUT_MS
    ) {
      throw new ConfigError([
        `sourceTimeoutMs must be an integer from 1 to ${MAX_TIMEOUT_MS}, got ${this.sourceTimeoutMs}`,
      ]);
    }
  }

  async collect(request: CollectRequest, nowMs: number = Date.now()): Promise<RawCollection> {
    validateRequest(request);

    const windowStartMs = nowMs - hoursToMs(request.hoursBack);
    const warnings: string[] = [];
    const bySource: Record<LogSource, RawRecord[]> = { System: [], Application: [], Security: [] };
    let unreadable = 0;

    await this.probe();

    const requested = LOG_SOURCES.filter((source) => request.sources.includes(source));
    for (const logName of requested) {
      const raws = await this.querySource(logName, windowStartMs, request.maxRecords, warnings);
      const selected = selectWindow(raws, windowStartMs, nowMs, request.maxRecords);

      bySource[logName] = selected.records;
      unreadable += selected.unreadable;

      this.logger.info('Collected log source', {
        source: logName,
        returned: raws.length,
        kept: selected.records.length,
        unreadable: selected.unreadable,
      });
    }

    const host = await this.captureHost(nowMs, warnings);

    return { windowStartMs, windowEndMs: nowMs, bySource, host, unreadable, warnings };
  }

  private async probe(): Promise<void> {
    try {
      await withTimeout(() => this.source.probe(), this.sourceTimeoutMs, `${this.source.name} probe`);
    } catch (error) {
      if (error instanceof EventSubsystemError) {
        throw error;
      }
      throw new EventSubsystemError(
        `Event log facility is not reachable: ${errorMessage(error)}`,
        error instanceof Error ? error : undefined
      );
    }
  }

  private async querySource(
    logName: LogSource,
    sinceMs: number,
    maxRecords: number,
    warnings: string[]
  ): Promise<RawRecord[]> {
    this.logger.debug('Querying log source', { source: logName, sinceMs, maxRecords });

    try {
      return await withTimeout(
        () => this.source.queryEvents(logName, sinceMs, maxRecords),
        this.sourceTimeoutMs,
        `query ${logName}`
      );
    } catch (error) {
      if (error instanceof EventSubsystemError) {
        throw error;
      }
      const warning = `${logName} log unavailable: ${errorMessage(error)}`;
      warnings.push(warning);
      this.logger.warn('Log source skipped', { source: logName, reason: errorMessage(error) });
      return [];
    }
  }

  private async captureHost(nowMs: number, warnings: string[]): Promise<HostSnapshot> {
    try {
      return await withTimeout(
        () => this.hostInfo.getHostSnapshot(nowMs),
        this.sourceTimeoutMs,
        'host snapshot'
      );
    } catch (error) {
      if (error instanceof EventSubsystemError) {
        throw error;
      }
      warnings.push(`Host information unavailable: ${errorMessage(error)}`);
      this.logger.warn('Host snapshot failed', { reason: errorMessage(error) });
      return unknownHostSnapshot();
    }
  }
}
