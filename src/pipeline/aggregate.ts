import type { AggregatedEvent, EventRecord } from '../types/eventRecord';
import { ConfigError } from '../utils/errors';
import { levelLabel } from './normalize';

export const DEFAULT_SAMPLE_CAP = 3;

export interface AggregateOptions {
  /** Maximum number of distinct sample messages kept per group */
  sampleCap?: number;
}

/**
 * Grouping key: exact match on source, provider, event ID and level.
 */
export function groupKeyOf(
  event: Pick<EventRecord, 'logSource' | 'providerName' | 'eventId' | 'level'>
): string {
  return JSON.stringify([event.logSource, event.providerName, event.eventId, levelLabel(event.level)]);
}

interface GroupAccumulator {
  first: EventRecord;
  occurrenceCount: number;
  firstSeenMs: number;
  lastSeenMs: number;
  sampleMessages: string[];
}

function resolveSampleCap(options: AggregateOptions): number {
  const sampleCap = options.sampleCap ?? DEFAULT_SAMPLE_CAP;
  if (!Number.isInteger(sampleCap) || sampleCap < 1) {
    throw new ConfigError([`sampleCap must be a positive integer, got ${sampleCap}`]);
  }
  return sampleCap;
}

function freezeGroup(group: GroupAccumulator): AggregatedEvent {
  return Object.freeze({
    logSource: group.first.logSource,
    providerName: group.first.providerName,
    eventId: group.first.eventId,
    level: group.first.level,
    occurrenceCount: group.occurrenceCount,
    firstSeenMs: group.firstSeenMs,
    lastSeenMs: group.lastSeenMs,
    sampleMessages: Object.freeze([...group.sampleMessages]),
  });
}

/**
 * Fold records into one AggregatedEvent per group key.
 * Input order does not need to be chronological.
 */
export function foldEvents(
  records: Iterable<EventRecord>,
  options: AggregateOptions = {}
): Map<string, AggregatedEvent> {
  const sampleCap = resolveSampleCap(options);
  const groups = new Map<string, GroupAccumulator>();

  for (const record of records) {
    const key = groupKeyOf(record);
    const group = groups.get(key);

    if (!group) {
      groups.set(key, {
        first: record,
        occurrenceCount: 1,
        firstSeenMs: record.timestampMs,
        lastSeenMs: record.timestampMs,
        sampleMessages: [record.message],
      });
      continue;
    }

    group.occurrenceCount++;
    group.firstSeenMs = Math.min(group.firstSeenMs, record.timestampMs);
    group.lastSeenMs = Math.max(group.lastSeenMs, record.timestampMs);
    if (
      group.sampleMessages.length < sampleCap &&
      !group.sampleMessages.includes(record.message)
    ) {
      group.sampleMessages.push(record.message);
    }
  }

  const result = new Map<string, AggregatedEvent>();
  for (const [key, group] of groups) {
    result.set(key, freezeGroup(group));
  }
  return result;
}

/**
 * Most frequent first, then most recent, then by key so output is stable.
 */
export function compareAggregated(a: AggregatedEvent, b: AggregatedEvent): number {
  if (a.occurrenceCount !== b.occurrenceCount) {
    return b.occurrenceCount - a.occurrenceCount;
  }
  if (a.lastSeenMs !== b.lastSeenMs) {
    return b.lastSeenMs - a.lastSeenMs;
  }
  const keyA = groupKeyOf(a);
  const keyB = groupKeyOf(b);
  return keyA < keyB ? -1 : keyA > keyB ? 1 : 0;
}

/**
 * Aggregate records and return groups ordered for a reader with limited attention.
 */
export function aggregateEvents(
  records: Iterable<EventRecord>,
  options: AggregateOptions = {}
): AggregatedEvent[] {
  return [...foldEvents(records, options).values()].sort(compareAggregated);
}
