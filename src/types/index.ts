/**
 * Event Log Digest - Core Type Definitions
 */

export { LOG_SOURCES, KNOWN_EVENT_LEVELS } from './eventRecord';

export type {
  LogSource,
  KnownEventLevel,
  EventLevel,
  EventRecord,
  AggregatedEvent,
  EventsBySource,
} from './eventRecord';

export type { RawRecord } from './rawRecord';

export type { HostSnapshot, ProcessorInfo, DiskInfo } from './host';

export type { CollectedEvents, CollectionResult } from './collection';
