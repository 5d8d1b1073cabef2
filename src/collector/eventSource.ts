import type { LogSource } from '../types/eventRecord';
import type { RawRecord } from '../types/rawRecord';
import type { HostSnapshot } from '../types/host';

/**
 * Access to the operating system's event log facility.
 */
export interface EventSource {
  /** Short name used in log lines */
  readonly name: string;

  /**
   * Check that the facility can be reached at all.
   * Rejects with EventSubsystemError when it cannot.
   */
  probe(): Promise<void>;

  /**
   * Read up to maxCount records of one log created at or after sinceMs.
   * Rejects with SourceAccessError when this log alone cannot be read, and
   * with EventSubsystemError when the facility itself is gone.
   */
  queryEvents(logName: LogSource, sinceMs: number, maxCount: number): Promise<RawRecord[]>;
}

/**
 * Source of host metadata.
 */
export interface HostInfoProvider {
  getHostSnapshot(nowMs: number): Promise<HostSnapshot>;
}
