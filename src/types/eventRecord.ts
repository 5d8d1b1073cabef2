/**
 * Canonical event types produced by the normalizer and aggregator.
 */

export const LOG_SOURCES = ['System', 'Application', 'Security'] as const;

/** One named category of event records */
export type LogSource = (typeof LOG_SOURCES)[number];

export const KNOWN_EVENT_LEVELS = [
  'Critical',
  'Error',
  'Warning',
  'Information',
  'Verbose',
] as const;

export type KnownEventLevel = (typeof KNOWN_EVENT_LEVELS)[number];

/**
 * Severity of a record. Codes outside 1-5 keep their original number so the
 * mapping stays total.
 */
export type EventLevel =
  | { kind: KnownEventLevel }
  | { kind: 'Unknown'; code: number };

/**
 * Normalized event record. Frozen once produced.
 */
export interface EventRecord {
  /** Unix timestamp in milliseconds when the record was created */
  readonly timestampMs: number;

  readonly logSource: LogSource;

  readonly level: EventLevel;

  readonly providerName: string;

  readonly eventId: number;

  /** Sanitized, single-line-safe message text */
  readonly message: string;

  readonly machineName?: string;

  readonly processId?: number;

  readonly threadId?: number;
}

/**
 * Repeated records collapsed under one (logSource, providerName, eventId, level) key.
 */
export interface AggregatedEvent {
  readonly logSource: LogSource;

  readonly providerName: string;

  readonly eventId: number;

  readonly level: EventLevel;

  /** Number of records folded into this group (at least 1) */
  readonly occurrenceCount: number;

  readonly firstSeenMs: number;

  readonly lastSeenMs: number;

  /** Distinct messages in first-seen order, bounded by the sample cap */
  readonly sampleMessages: readonly string[];
}

/** Events of one collection run, keyed by source */
export type EventsBySource<T> = Record<LogSource, T[]>;
