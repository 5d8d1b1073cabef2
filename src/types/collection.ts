import type {
  AggregatedEvent,
  EventRecord,
  EventsBySource,
  LogSource,
} from './eventRecord';
import type { HostSnapshot } from './host';

/**
 * Events of a run: either every normalized record, or one entry per group.
 */
export type CollectedEvents =
  | { aggregated: false; bySource: EventsBySource<EventRecord> }
  | { aggregated: true; bySource: EventsBySource<AggregatedEvent> };

/**
 * Root object of one collection run, serialized to the output file.
 */
export interface CollectionResult {
  collectionId: string;
  collectionTimeMs: number;
  windowStartMs: number;
  windowEndMs: number;
  hoursBack: number;
  maxRecords: number;
  /** Sources that were requested for this run */
  sources: LogSource[];
  host: HostSnapshot;
  events: CollectedEvents;
  /** Non-fatal conditions (unreadable sources, host query failure) */
  warnings: string[];
  /** Records dropped because they could not be normalized */
  droppedRecords: number;
}
