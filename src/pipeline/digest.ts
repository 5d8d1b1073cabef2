/**
 * Event Log Digest - Text Digest
 *
 * Plain-text rendering of a collection document for token-limited readers
 * such as a language model prompt. Severe groups come first; routine
 * information is included only as context for sources that had problems.
 */

import type { AggregatedEvent, LogSource } from '../types/eventRecord';
import { LOG_SOURCES } from '../types/eventRecord';
import type { CollectionDocument, SystemInfoSection } from '../schemas/collectionDocument';
import { documentToAggregates } from '../output/reader';
import { ConfigError } from '../utils/errors';
import { toIsoUtc } from '../utils/time';
import { levelLabel } from './normalize';
import { LEVEL_BUCKETS, summarizeEvents, type EventSummary } from './summary';

// =============================================================================
// CONSTANTS
// =============================================================================

export const DEFAULT_MAX_CHARS = 100000;

export const MAX_MESSAGE_CHARS = 200;

export const TRUNCATION_MARKER = '\n... [truncated due to size limits]';

const MAX_SEVERE_GROUPS = 10;
const MAX_WARNING_GROUPS = 5;
const MAX_CONTEXT_GROUPS = 3;

export interface DigestOptions {
  /** Upper bound on the digest length before the truncation marker */
  maxChars?: number;

  /** Sample cap used when a plain document has to be aggregated first */
  sampleCap?: number;
}

// =============================================================================
// FORMATTING HELPERS
// =============================================================================

/**
 * One-line message, cut to MAX_MESSAGE_CHARS with a trailing ellipsis.
 */
export function flattenMessage(message: string): string {
  const line = message.replace(/\r?\n/g, ' ').replace(/\r/g, '');
  if (line.length <= MAX_MESSAGE_CHARS) {
    return line;
  }
  return line.slice(0, MAX_MESSAGE_CHARS - 3) + '...';
}

function formatBytes(bytes: number | null | undefined): string {
  if (bytes === null || bytes === undefined) {
    return 'Unknown';
  }
  return `${(bytes / 1024 ** 3).toFixed(1)} GB`;
}

function formatEvent(event: AggregatedEvent, lines: string[]): void {
  lines.push(
    `${levelLabel(event.level)} | ${event.providerName || 'Unknown'} | Event ID: ${event.eventId} | Count: ${event.occurrenceCount}`
  );
  lines.push(`Message: ${flattenMessage(event.sampleMessages[0] ?? 'No message')}`);

  const first = toIsoUtc(event.firstSeenMs);
  const last = toIsoUtc(event.lastSeenMs);
  lines.push(first === last ? `When: ${last}` : `When: ${first} to ${last}`);
  lines.push('');
}

// =============================================================================
// SECTIONS
// =============================================================================

function renderSystemInfo(info: SystemInfoSection, lines: string[]): void {
  if (!info.OS && !info.Computer && !info.Processor) {
    return;
  }

  lines.push('## SYSTEM INFORMATION');
  lines.push(`OS: ${info.OS ? `${info.OS.Caption} (${info.OS.Version})` : 'Unknown'}`);
  lines.push(`Computer: ${info.Computer ? `${info.Computer.Name} (${info.Computer.Manufacturer} ${info.Computer.Model})` : 'Unknown'}`);

  const uptime = info.OS?.UpTime;
  lines.push(`Uptime: ${uptime === null || uptime === undefined ? 'Unknown' : `${uptime} hours`}`);
  lines.push(`CPU: ${info.Processor?.Name ?? 'Unknown'}`);
  lines.push(`Memory: ${formatBytes(info.Computer?.TotalPhysicalMemory)}`);

  for (const disk of info.Disks ?? []) {
    lines.push(`Disk ${disk.DeviceID} ${formatBytes(disk.FreeSpace)} free of ${formatBytes(disk.Size)}`);
  }
  lines.push('');
}

function renderCollectionInfo(document: CollectionDocument, lines: string[]): void {
  const info = document.CollectionInfo;

  lines.push('## COLLECTION INFORMATION');
  lines.push(`Collection Time: ${info.CollectionTime}`);
  lines.push(
    `Time Range: ${info.TimeRange.StartTime} to ${info.TimeRange.EndTime} (${info.TimeRange.HoursBack} hours)`
  );
  lines.push(`Max Events Per Log: ${info.MaxEventsPerLog}`);
  if (info.DroppedRecords > 0) {
    lines.push(`Dropped Records: ${info.DroppedRecords}`);
  }
  if (info.Warnings.length > 0) {
    lines.push('Warnings:');
    for (const warning of info.Warnings) {
      lines.push(`- ${warning}`);
    }
  }
  lines.push('');
}

function renderSummary(summary: EventSummary, lines: string[]): void {
  lines.push('## EVENT SUMMARY');
  lines.push(`Total Events: ${summary.totalEvents}`);

  lines.push('Events by Log Type:');
  for (const source of LOG_SOURCES) {
    lines.push(`- ${source}: ${summary.byLogType[source]}`);
  }

  lines.push('Events by Severity Level:');
  for (const bucket of LEVEL_BUCKETS) {
    const count = summary.byLevel[bucket];
    if (count > 0) {
      lines.push(`- ${bucket}: ${count}`);
    }
  }

  if (summary.topSources.length > 0) {
    lines.push('Top Event Sources:');
    for (const entry of summary.topSources) {
      lines.push(`- ${entry.source} (${entry.logSource}): ${entry.count} events`);
    }
  }

  if (summary.topEventIds.length > 0) {
    lines.push('Top Event IDs:');
    for (const entry of summary.topEventIds) {
      lines.push(`- Event ID ${entry.eventId} (${entry.logSource}): ${entry.count} occurrences`);
    }
  }
  lines.push('');
}

function renderSource(source: LogSource, events: readonly AggregatedEvent[], lines: string[]): void {
  const severe = events.filter((e) => e.level.kind === 'Critical' || e.level.kind === 'Error');
  const warnings = events.filter((e) => e.level.kind === 'Warning');

  if (severe.length > 0) {
    lines.push('', `### ${source} Critical/Error Events:`);
    severe.slice(0, MAX_SEVERE_GROUPS).forEach((event) => formatEvent(event, lines));
  }

  if (warnings.length > 0) {
    lines.push('', `### ${source} Warning Events:`);
    warnings.slice(0, MAX_WARNING_GROUPS).forEach((event) => formatEvent(event, lines));
  }

  if (severe.length === 0 && warnings.length === 0) {
    return;
  }

  const context = events
    .filter((e) => e.level.kind === 'Information' || e.level.kind === 'Verbose')
    .sort((a, b) => b.occurrenceCount - a.occurrenceCount);
  if (context.length > 0) {
    lines.push('', `### ${source} Information Events (selected):`);
    context.slice(0, MAX_CONTEXT_GROUPS).forEach((event) => formatEvent(event, lines));
  }
}

// =============================================================================
// DIGEST
// =============================================================================

/**
 * Render a collection document as a plain-text digest.
 *
 * @throws ConfigError when maxChars is not a positive integer
 */
export function renderDigest(document: CollectionDocument, options: DigestOptions = {}): string {
  const maxChars = options.maxChars ?? DEFAULT_MAX_CHARS;
  if (!Number.isInteger(maxChars) || maxChars < 1) {
    throw new ConfigError([`maxChars must be a positive integer, got ${maxChars}`]);
  }

  const bySource = documentToAggregates(document, { sampleCap: options.sampleCap });
  const lines: string[] = [];

  renderSystemInfo(document.SystemInfo, lines);
  renderCollectionInfo(document, lines);
  renderSummary(summarizeEvents(bySource), lines);

  if (LOG_SOURCES.some((source) => bySource[source].length > 0)) {
    lines.push('## SIGNIFICANT EVENTS');
    for (const source of LOG_SOURCES) {
      renderSource(source, bySource[source], lines);
    }
  }

  const text = lines.join('\n');
  if (text.length <= maxChars) {
    return text;
  }
  return text.slice(0, maxChars) + TRUNCATION_MARKER;
}
