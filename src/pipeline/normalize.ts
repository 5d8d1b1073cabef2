import type { RawRecord } from '../types/rawRecord';
import type {
  EventLevel,
  EventRecord,
  KnownEventLevel,
  LogSource,
} from '../types/eventRecord';
import { LOG_SOURCES } from '../types/eventRecord';
import { MalformedRecordError } from '../utils/errors';
import type { LoggerLike } from '../utils/logger';
import { parseEventTime } from '../utils/time';

const LEVEL_BY_CODE = new Map<number, KnownEventLevel>([
  [1, 'Critical'],
  [2, 'Error'],
  [3, 'Warning'],
  [4, 'Information'],
  [5, 'Verbose'],
]);

const LEVEL_BY_NAME = new Map<string, KnownEventLevel>([
  ['critical', 'Critical'],
  ['error', 'Error'],
  ['warning', 'Warning'],
  ['information', 'Information'],
  ['info', 'Information'],
  ['verbose', 'Verbose'],
]);

/**
 * Map a numeric severity code to a level. Total: codes outside 1-5 become
 * Unknown and keep the code.
 */
export function levelFromCode(code: number): EventLevel {
  const known = LEVEL_BY_CODE.get(code);
  return known ? { kind: known } : { kind: 'Unknown', code };
}

/**
 * Render a level the way it appears in the output document.
 */
export function levelLabel(level: EventLevel): string {
  return level.kind === 'Unknown' ? `Unknown(${level.code})` : level.kind;
}

/**
 * Inverse of levelLabel. Also accepts the localized names and bare codes.
 */
export function parseLevelLabel(label: string): EventLevel | null {
  const trimmed = label.trim();
  const unknown = /^Unknown\((-?\d+)\)$/.exec(trimmed);
  if (unknown) {
    return { kind: 'Unknown', code: parseInt(unknown[1], 10) };
  }
  if (/^-?\d+$/.test(trimmed)) {
    return levelFromCode(parseInt(trimmed, 10));
  }
  const named = LEVEL_BY_NAME.get(trimmed.toLowerCase());
  return named ? { kind: named } : null;
}

/**
 * Ensure a value is an integer, or null.
 */
function ensureInteger(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isInteger(value) ? value : null;
  }
  if (typeof value === 'string' && /^\s*-?\d+\s*$/.test(value)) {
    return parseInt(value, 10);
  }
  return null;
}

function optionalString(value: string | null | undefined): string | undefined {
  return typeof value === 'string' && value !== '' ? value : undefined;
}

function optionalInteger(value: unknown): number | undefined {
  const parsed = ensureInteger(value);
  return parsed === null ? undefined : parsed;
}

function resolveLevel(raw: RawRecord): EventLevel {
  if (raw.level !== undefined && raw.level !== null) {
    const code = ensureInteger(raw.level);
    if (code === null) {
      throw new MalformedRecordError('level', `Level is not an integer: ${String(raw.level)}`);
    }
    return levelFromCode(code);
  }

  if (typeof raw.levelDisplayName === 'string') {
    const named = LEVEL_BY_NAME.get(raw.levelDisplayName.trim().toLowerCase());
    if (named) {
      return { kind: named };
    }
  }

  throw new MalformedRecordError('level', 'Record has no usable level');
}

/**
 * Match a log name against the known sources, ignoring case.
 */
export function toLogSource(name: unknown): LogSource | null {
  if (typeof name !== 'string') {
    return null;
  }
  const lower = name.trim().toLowerCase();
  return LOG_SOURCES.find((source) => source.toLowerCase() === lower) ?? null;
}

/**
 * Make message text safe for a JSON string and a plain-text prompt.
 * CRLF and lone CR become "\n", tabs become a space, anything outside
 * printable ASCII and "\n" is removed. The transform is one-way.
 */
export function sanitizeMessage(message: string | null | undefined): string {
  if (typeof message !== 'string') {
    return '';
  }
  return message
    .replace(/\r\n?/g, '\n')
    .replace(/\t/g, ' ')
    .replace(/[^\x20-\x7E\n]/g, '')
    .trim();
}

/**
 * Convert one raw record into a frozen EventRecord.
 *
 * @param raw - Record as returned by the event source
 * @param expectedSource - Source the record was queried from; used when the
 *   record does not name its log
 * @throws MalformedRecordError when a required field cannot be read
 */
export function normalizeRecord(raw: RawRecord, expectedSource?: LogSource): EventRecord {
  const timestampMs = parseEventTime(raw.timeCreated);
  if (timestampMs === null) {
    throw new MalformedRecordError(
      'timeCreated',
      `Unreadable creation time: ${String(raw.timeCreated)}`
    );
  }

  const logSource =
    raw.logName === undefined || raw.logName === null
      ? expectedSource ?? null
      : toLogSource(raw.logName);
  if (logSource === null) {
    throw new MalformedRecordError('logName', `Unknown log name: ${String(raw.logName)}`);
  }

  const eventId = ensureInteger(raw.eventId);
  if (eventId === null) {
    throw new MalformedRecordError('eventId', `Event ID is not an integer: ${String(raw.eventId)}`);
  }

  const record: EventRecord = {
    timestampMs,
    logSource,
    level: resolveLevel(raw),
    providerName: typeof raw.providerName === 'string' ? raw.providerName.trim() : '',
    eventId,
    message: sanitizeMessage(raw.message),
    machineName: optionalString(raw.machineName),
    processId: optionalInteger(raw.processId),
    threadId: optionalInteger(raw.threadId),
  };

  return Object.freeze(record);
}

/**
 * Result of normalizing a batch of raw records.
 */
export interface NormalizedBatch {
  records: EventRecord[];

  /** Records that failed to normalize and were left out */
  dropped: number;
}

/**
 * Normalize a batch, dropping and counting records that fail.
 */
export function normalizeBatch(
  raws: readonly RawRecord[],
  logger: LoggerLike,
  expectedSource?: LogSource
): NormalizedBatch {
  const records: EventRecord[] = [];
  let dropped = 0;

  for (const raw of raws) {
    try {
      records.push(normalizeRecord(raw, expectedSource));
    } catch (error) {
      if (!(error instanceof MalformedRecordError)) {
        throw error;
      }
      dropped++;
      logger.debug('Dropped malformed record', {
        field: error.field,
        reason: error.message,
        source: expectedSource,
      });
    }
  }

  return { records, dropped };
}
