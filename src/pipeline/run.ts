import { v4 as uuidv4 } from 'uuid';

import type { AggregatedEvent, EventRecord, EventsBySource } from '../types/eventRecord';
import { LOG_SOURCES } from '../types/eventRecord';
import type { CollectedEvents, CollectionResult } from '../types/collection';
import type { EventSource, HostInfoProvider } from '../collector/eventSource';
import { EventCollector, type RawCollection } from '../collector/collector';
import { enabledSources, getLoggableConfig, type CollectorConfig } from '../collector/config';
import { writeCollectionDocument, type WriteOutcome } from '../output/writer';
import type { LoggerLike } from '../utils/logger';
import { aggregateEvents } from './aggregate';
import { normalizeBatch } from './normalize';

/**
 * Collaborators of one collection run.
 */
export interface RunDependencies {
  source: EventSource;
  hostInfo: HostInfoProvider;
  logger: LoggerLike;

  /** Clock, replaced in tests */
  now?: () => number;

  /** Collection ID generator, replaced in tests */
  newId?: () => string;
}

/**
 * Result of a collection run.
 */
export interface RunResult {
  result: CollectionResult;
  output: WriteOutcome;
}

function normalizeCollection(
  raw: RawCollection,
  logger: LoggerLike
): { bySource: EventsBySource<EventRecord>; dropped: number } {
  const bySource: EventsBySource<EventRecord> = { System: [], Application: [], Security: [] };
  let dropped = 0;

  for (const source of LOG_SOURCES) {
    const batch = normalizeBatch(raw.bySource[source], logger, source);
    bySource[source] = batch.records;
    dropped += batch.dropped;
  }

  return { bySource, dropped };
}

function aggregateCollection(
  bySource: EventsBySource<EventRecord>,
  sampleCap: number
): EventsBySource<AggregatedEvent> {
  return {
    System: aggregateEvents(bySource.System, { sampleCap }),
    Application: aggregateEvents(bySource.Application, { sampleCap }),
    Security: aggregateEvents(bySource.Security, { sampleCap }),
  };
}

/**
 * Build the CollectionResult of a run without writing it.
 */
export async function collectEvents(
  deps: RunDependencies,
  config: CollectorConfig
): Promise<CollectionResult> {
  const { logger } = deps;
  const nowMs = (deps.now ?? Date.now)();
  const sources = enabledSources(config);

  logger.info('Starting collection', getLoggableConfig(config));

  const collector = new EventCollector(deps.source, deps.hostInfo, logger, {
    sourceTimeoutMs: config.sourceTimeoutMs,
  });
  const raw = await collector.collect(
    { hoursBack: config.hoursBack, maxRecords: config.maxRecords, sources },
    nowMs
  );

  const normalized = normalizeCollection(raw, logger);
  const events: CollectedEvents = config.aggregate
    ? { aggregated: true, bySource: aggregateCollection(normalized.bySource, config.sampleCap) }
    : { aggregated: false, bySource: normalized.bySource };

  const droppedRecords = raw.unreadable + normalized.dropped;
  if (droppedRecords > 0) {
    logger.warn('Dropped malformed records', { count: droppedRecords });
  }

  return {
    collectionId: (deps.newId ?? uuidv4)(),
    collectionTimeMs: raw.windowEndMs,
    windowStartMs: raw.windowStartMs,
    windowEndMs: raw.windowEndMs,
    hoursBack: config.hoursBack,
    maxRecords: config.maxRecords,
    sources,
    host: raw.host,
    events,
    warnings: raw.warnings,
    droppedRecords,
  };
}

/**
 * Collect, normalize, optionally aggregate, and write one document.
 *
 * @throws EventSubsystemError when the event log facility is unreachable
 * @throws OutputWriteError when the document cannot be written
 */
export async function runCollection(
  deps: RunDependencies,
  config: CollectorConfig
): Promise<RunResult> {
  const result = await collectEvents(deps, config);
  const output = await writeCollectionDocument(config.outputPath, result, deps.logger);
  return { result, output };
}
