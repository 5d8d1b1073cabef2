/**
 * Event Log Digest - Time Utility Tests
 */

import { describe, it, expect } from 'vitest';
import { hoursBetween, hoursToMs, parseEventTime, toIsoUtc } from '../time';

describe('parseEventTime', () => {
  it('should read ISO strings, epoch numbers and the legacy form', () => {
    expect(parseEventTime('2024-05-01T12:00:00.000Z')).toBe(1714564800000);
    expect(parseEventTime(1714564800000)).toBe(1714564800000);
    expect(parseEventTime('/Date(1714564800000)/')).toBe(1714564800000);
    expect(parseEventTime('/Date(1714564800000+0200)/')).toBe(1714564800000);
    expect(parseEventTime(new Date(1714564800000))).toBe(1714564800000);
  });

  it('should return null for unreadable values', () => {
    expect(parseEventTime('')).toBeNull();
    expect(parseEventTime('not a date')).toBeNull();
    expect(parseEventTime(Number.NaN)).toBeNull();
    expect(parseEventTime(null)).toBeNull();
    expect(parseEventTime({})).toBeNull();
  });
});

describe('toIsoUtc', () => {
  it('should render UTC with milliseconds', () => {
    expect(toIsoUtc(1714564800000)).toBe('2024-05-01T12:00:00.000Z');
  });
});

describe('hoursToMs / hoursBetween', () => {
  it('should convert hours', () => {
    expect(hoursToMs(2)).toBe(7200000);
    expect(hoursBetween(0, 5400000)).toBe(1.5);
    expect(hoursBetween(0, 1000)).toBe(0);
  });
});
