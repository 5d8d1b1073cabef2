import * as fs from 'fs';

import type { AggregatedEvent, EventRecord, EventsBySource } from '../types/eventRecord';
import { LOG_SOURCES } from '../types/eventRecord';
import {
  CollectionDocumentSchema,
  type AggregatedEventEntry,
  type CollectionDocument,
  type EventEntry,
} from '../schemas/collectionDocument';
import { aggregateEvents, type AggregateOptions } from '../pipeline/aggregate';
import { parseLevelLabel } from '../pipeline/normalize';
import { DocumentReadError, errorMessage, MalformedRecordError } from '../utils/errors';

const BOM = '\uFEFF';

/**
 * Parse document text. A leading byte-order mark is tolerated because older
 * collectors wrote one.
 *
 * @throws DocumentReadError
 */
export function parseCollectionDocument(text: string, source: string = '<input>'): CollectionDocument {
  const body = text.startsWith(BOM) ? text.slice(BOM.length) : text;

  if (body.trim() === '') {
    throw new DocumentReadError(source, 'Log file is empty');
  }

  let data: unknown;
  try {
    data = JSON.parse(body);
  } catch (error) {
    throw new DocumentReadError(source, `Invalid JSON (${errorMessage(error)})`);
  }

  const parsed = CollectionDocumentSchema.safeParse(data);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const where = first ? `${first.path.join('.')}: ${first.message}` : 'unknown issue';
    throw new DocumentReadError(source, `Unexpected document shape (${where})`);
  }

  return parsed.data;
}

/**
 * Load a document written by a previous collection run.
 *
 * @throws DocumentReadError
 */
export async function readCollectionDocument(filePath: string): Promise<CollectionDocument> {
  let text: string;
  try {
    text = await fs.promises.readFile(filePath, 'utf8');
  } catch (error) {
    const missing = error instanceof Error && 'code' in error && error.code === 'ENOENT';
    throw new DocumentReadError(
      filePath,
      missing ? 'Log file not found' : `Cannot read log file (${errorMessage(error)})`
    );
  }

  return parseCollectionDocument(text, filePath);
}

function entryLevel(entry: EventEntry | AggregatedEventEntry) {
  const level = parseLevelLabel(entry.Level);
  if (level === null) {
    throw new MalformedRecordError('Level', `Unrecognized level label: ${entry.Level}`);
  }
  return level;
}

/**
 * Rebuild an EventRecord from a plain document entry.
 */
export function entryToRecord(entry: EventEntry): EventRecord {
  return Object.freeze({
    timestampMs: Date.parse(entry.TimeCreated),
    logSource: entry.LogName,
    level: entryLevel(entry),
    providerName: entry.ProviderName,
    eventId: entry.EventID,
    message: entry.Message,
    machineName: entry.MachineName,
    processId: entry.ProcessId,
    threadId: entry.ThreadId,
  });
}

/**
 * Rebuild an AggregatedEvent from an aggregated document entry.
 */
export function entryToAggregate(entry: AggregatedEventEntry): AggregatedEvent {
  return Object.freeze({
    logSource: entry.LogName,
    providerName: entry.ProviderName,
    eventId: entry.EventID,
    level: entryLevel(entry),
    occurrenceCount: entry.OccurrenceCount,
    firstSeenMs: Date.parse(entry.FirstSeen),
    lastSeenMs: Date.parse(entry.LastSeen),
    sampleMessages: Object.freeze([...entry.SampleMessages]),
  });
}

/**
 * Aggregated view of either document variant, per source. Plain documents
 * are folded here; aggregated documents are read as they are.
 */
export function documentToAggregates(
  document: CollectionDocument,
  options: AggregateOptions = {}
): EventsBySource<AggregatedEvent> {
  const result: EventsBySource<AggregatedEvent> = { System: [], Application: [], Security: [] };

  for (const source of LOG_SOURCES) {
    const aggregated: AggregatedEvent[] = [];
    const plain: EventRecord[] = [];

    for (const entry of document.Events[source]) {
      if ('OccurrenceCount' in entry) {
        aggregated.push(entryToAggregate(entry));
      } else {
        plain.push(entryToRecord(entry));
      }
    }

    result[source] = [...aggregated, ...aggregateEvents(plain, options)];
  }

  return result;
}
