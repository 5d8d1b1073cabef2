/**
 * Raw event record as returned by an event source.
 * This is the unprocessed OS record before normalization. Every field is
 * optional because the platform does not guarantee any of them.
 */
export interface RawRecord {
  /** Creation time: ISO-8601 string, epoch milliseconds, or the legacy "/Date(ms)/" form */
  timeCreated?: string | number | null;

  /** Name of the log the record was read from (e.g., "System") */
  logName?: string | null;

  /** Numeric severity code (1 = Critical ... 5 = Verbose) */
  level?: number | string | null;

  /** Localized severity name, used when no numeric code is present */
  levelDisplayName?: string | null;

  /** Numeric event identifier */
  eventId?: number | string | null;

  /** Provider (source) that wrote the record */
  providerName?: string | null;

  /** Rendered message text, unsanitized */
  message?: string | null;

  /** Machine that produced the record */
  machineName?: string | null;

  /** Process that wrote the record */
  processId?: number | null;

  /** Thread that wrote the record */
  threadId?: number | null;
}
