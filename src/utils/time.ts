/**
 * Timestamp helpers shared by the collector, normalizer and serializer.
 */

const MS_PER_HOUR = 60 * 60 * 1000;

// ConvertTo-Json on Windows PowerShell 5.1 renders DateTime as "/Date(1700000000000)/"
const LEGACY_DATE_PATTERN = /^\/Date\((-?\d+)(?:[+-]\d{4})?\)\/$/;

/**
 * Read a creation time into epoch milliseconds.
 * Returns null when the value cannot be read as an instant.
 */
export function parseEventTime(value: unknown): number | null {
  if (value instanceof Date) {
    const ms = value.getTime();
    return Number.isFinite(ms) ? ms : null;
  }

  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }

  if (typeof value !== 'string') {
    return null;
  }

  const trimmed = value.trim();
  if (trimmed === '') {
    return null;
  }

  const legacy = LEGACY_DATE_PATTERN.exec(trimmed);
  if (legacy) {
    return parseInt(legacy[1], 10);
  }

  const parsed = Date.parse(trimmed);
  return Number.isNaN(parsed) ? null : parsed;
}

/**
 * Render epoch milliseconds as UTC ISO-8601.
 */
export function toIsoUtc(ms: number): string {
  return new Date(ms).toISOString();
}

export function hoursToMs(hours: number): number {
  return hours * MS_PER_HOUR;
}

/**
 * Hours elapsed between two instants, rounded to two decimals.
 */
export function hoursBetween(startMs: number, endMs: number): number {
  return Math.round(((endMs - startMs) / MS_PER_HOUR) * 100) / 100;
}
