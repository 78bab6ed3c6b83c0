import { describe, it, expect } from 'vitest';
import { toUtcDate } from './datetime.js';

describe('toUtcDate', () => {
  it('reads naive strings as UTC', () => {
    expect(toUtcDate('2024-06-01T08:30:00')?.toISOString()).toBe('2024-06-01T08:30:00.000Z');
  });

  it('converts zoned strings to UTC', () => {
    expect(toUtcDate('2024-06-01T08:30:00+02:00')?.toISOString()).toBe(
      '2024-06-01T06:30:00.000Z'
    );
    expect(toUtcDate('2024-06-01T08:30:00Z')?.toISOString()).toBe('2024-06-01T08:30:00.000Z');
  });

  it('accepts offsets without minutes or without a colon', () => {
    expect(toUtcDate('2024-01-01T10:00:00+02')?.toISOString()).toBe('2024-01-01T08:00:00.000Z');
    expect(toUtcDate('2024-01-01T10:00:00-0530')?.toISOString()).toBe(
      '2024-01-01T15:30:00.000Z'
    );
  });

  it('reads Unix timestamps in seconds or milliseconds', () => {
    expect(toUtcDate(1704067200)?.toISOString()).toBe('2024-01-01T00:00:00.000Z');
    expect(toUtcDate(1704067200500)?.toISOString()).toBe('2024-01-01T00:00:00.500Z');
    expect(toUtcDate(Number.POSITIVE_INFINITY)).toBeNull();
  });

  it('reads date-only strings as UTC midnight', () => {
    expect(toUtcDate('2024-06-01')?.toISOString()).toBe('2024-06-01T00:00:00.000Z');
  });

  it('copies Date instances', () => {
    const input = new Date(Date.UTC(2024, 0, 15, 12, 0, 0));
    const result = toUtcDate(input);

    expect(result).not.toBe(input);
    expect(result?.toISOString()).toBe('2024-01-15T12:00:00.000Z');
  });

  it('returns null for invalid input', () => {
    expect(toUtcDate('yesterday')).toBeNull();
    expect(toUtcDate(new Date(Number.NaN))).toBeNull();
  });
});
