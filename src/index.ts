/**
 * Event Log Digest
 *
 * Collects Windows Event Log records from a time window, normalizes and
 * optionally aggregates them, and writes one JSON document for a
 * question-answering layer.
 *
 * @version 0.1.0
 */

export * from './types';
export * from './collector';
export * from './pipeline';

export {
  type WriteOutcome,
  serializeDocument,
  writeFileAtomic,
  writeCollectionDocument,
} from './output/writer';

export {
  toEventEntry,
  toAggregatedEntry,
  toSystemInfo,
  buildCollectionDocument,
  buildMinimalDocument,
} from './output/serialize';

export {
  parseCollectionDocument,
  readCollectionDocument,
  documentToAggregates,
} from './output/reader';

export {
  CollectionDocumentSchema,
  type CollectionDocument,
  type EventEntry,
  type AggregatedEventEntry,
} from './schemas/collectionDocument';

export * from './utils/errors';
export { Logger, ChildLogger, silentLogger, type LogLevel, type LoggerLike, type LogSink } from './utils/logger';

export { parseCliArgs, runCli, type CliArgs, type CliIO } from './cli';
