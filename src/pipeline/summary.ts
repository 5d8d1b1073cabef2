/**
 * Event Log Digest - Event Summary
 *
 * Statistics over aggregated events. Every count is weighted by
 * occurrenceCount, so plain and aggregated documents summarize alike.
 */

import type { AggregatedEvent, EventsBySource, KnownEventLevel, LogSource } from '../types/eventRecord';
import { KNOWN_EVENT_LEVELS, LOG_SOURCES } from '../types/eventRecord';

// =============================================================================
// TYPES
// =============================================================================

export type LevelBucket = KnownEventLevel | 'Unknown';

export interface TopSourceEntry {
  source: string;
  logSource: LogSource;
  count: number;
}

export interface TopEventIdEntry {
  eventId: number;
  logSource: LogSource;
  count: number;
}

export interface EventSummary {
  totalEvents: number;
  byLogType: Record<LogSource, number>;
  byLevel: Record<LevelBucket, number>;
  topSources: TopSourceEntry[];
  topEventIds: TopEventIdEntry[];
}

/** Entries kept per log source before merging */
export const TOP_PER_SOURCE = 5;

/** Entries kept overall */
export const TOP_OVERALL = 10;

// =============================================================================
// HELPERS
// =============================================================================

function emptyLevelCounts(): Record<LevelBucket, number> {
  return {
    Critical: 0,
    Error: 0,
    Warning: 0,
    Information: 0,
    Verbose: 0,
    Unknown: 0,
  };
}

/**
 * Highest counts first; ties keep first-seen order.
 */
function topCounts<K>(counts: Map<K, number>, limit: number): Array<[K, number]> {
  return [...counts.entries()].sort((a, b) => b[1] - a[1]).slice(0, limit);
}

function addCount<K>(counts: Map<K, number>, key: K, amount: number): void {
  counts.set(key, (counts.get(key) ?? 0) + amount);
}

// =============================================================================
// SUMMARY
// =============================================================================

/**
 * Summarize aggregated events per source.
 *
 * Top lists take the five most frequent providers and event IDs of each
 * source, drop those seen only once, then keep the ten most frequent overall.
 */
export function summarizeEvents(eventsBySource: EventsBySource<AggregatedEvent>): EventSummary {
  const byLogType: Record<LogSource, number> = { System: 0, Application: 0, Security: 0 };
  const byLevel = emptyLevelCounts();
  const topSources: TopSourceEntry[] = [];
  const topEventIds: TopEventIdEntry[] = [];
  let totalEvents = 0;

  for (const logSource of LOG_SOURCES) {
    const providers = new Map<string, number>();
    const eventIds = new Map<number, number>();

    for (const event of eventsBySource[logSource]) {
      const count = event.occurrenceCount;
      byLogType[logSource] += count;
      totalEvents += count;

      const level = event.level;
      const bucket: LevelBucket = level.kind === 'Unknown' ? 'Unknown' : level.kind;
      byLevel[bucket] += count;

      if (event.providerName !== '') {
        addCount(providers, event.providerName, count);
      }
      addCount(eventIds, event.eventId, count);
    }

    for (const [source, count] of topCounts(providers, TOP_PER_SOURCE)) {
      if (count > 1) topSources.push({ source, logSource, count });
    }
    for (const [eventId, count] of topCounts(eventIds, TOP_PER_SOURCE)) {
      if (count > 1) topEventIds.push({ eventId, logSource, count });
    }
  }

  return {
    totalEvents,
    byLogType,
    byLevel,
    topSources: [...topSources].sort((a, b) => b.count - a.count).slice(0, TOP_OVERALL),
    topEventIds: [...topEventIds].sort((a, b) => b.count - a.count).slice(0, TOP_OVERALL),
  };
}

/**
 * Level buckets in severity order, for rendering.
 */
export const LEVEL_BUCKETS: readonly LevelBucket[] = [...KNOWN_EVENT_LEVELS, 'Unknown'];
