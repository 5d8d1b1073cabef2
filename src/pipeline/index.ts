/**
 * Event Log Digest - Pipeline Module
 *
 * Normalization, aggregation, summary and digest stages, and the run that
 * wires them to the collector and the writer.
 *
 * @version 0.1.0
 */

// =============================================================================
// NORMALIZE
// =============================================================================

export {
  type NormalizedBatch,
  levelFromCode,
  levelLabel,
  parseLevelLabel,
  toLogSource,
  sanitizeMessage,
  normalizeRecord,
  normalizeBatch,
} from './normalize';

// =============================================================================
// AGGREGATE
// =============================================================================

export {
  type AggregateOptions,
  DEFAULT_SAMPLE_CAP,
  groupKeyOf,
  foldEvents,
  compareAggregated,
  aggregateEvents,
} from './aggregate';

// =============================================================================
// SUMMARY & DIGEST
// =============================================================================

export {
  type EventSummary,
  type LevelBucket,
  type TopSourceEntry,
  type TopEventIdEntry,
  summarizeEvents,
} from './summary';

export {
  type DigestOptions,
  DEFAULT_MAX_CHARS,
  flattenMessage,
  renderDigest,
} from './digest';

// =============================================================================
// RUN
// =============================================================================

export {
  type RunDependencies,
  type RunResult,
  collectEvents,
  runCollection,
} from './run';
