// UTC normalization for timestamps entering the store

/**
 * Dates as accepted at the repository boundary: a Date (an absolute
 * instant), an ISO 8601 string with or without a zone designator, or a Unix
 * timestamp.
 */
export type DateTimeInput = Date | string | number;

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;
const UTC_DESIGNATOR = /Z$/i;
const NUMERIC_OFFSET = /([+-])(\d{2}):?(\d{2})?$/;

// Larger magnitudes are read as milliseconds
const MAX_TIMESTAMP_SECONDS = 2e10;

function fromTimestamp(value: number): Date | null {
  if (!Number.isFinite(value)) return null;
  const millis = Math.abs(value) > MAX_TIMESTAMP_SECONDS ? value : value * 1000;
  const date = new Date(millis);
  return Number.isNaN(date.getTime()) ? null : date;
}

/**
 * Convert a datetime input to a Date.
 *
 * Strings without a zone designator are read as UTC, never as local time.
 * Offsets may be written `+HH`, `+HHMM` or `+HH:MM`. Returns null when the
 * input does not describe a valid instant.
 */
export function toUtcDate(value: DateTimeInput): Date | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : new Date(value.getTime());
  }
  if (typeof value === 'number') {
    return fromTimestamp(value);
  }

  const text = value.trim();
  let iso: string;
  if (DATE_ONLY.test(text)) {
    iso = `${text}T00:00:00Z`;
  } else if (UTC_DESIGNATOR.test(text)) {
    iso = text;
  } else {
    const offset = NUMERIC_OFFSET.exec(text);
    iso = offset
      ? `${text.slice(0, offset.index)}${offset[1]}${offset[2]}:${offset[3] ?? '00'}`
      : `${text}Z`;
  }

  const parsed = new Date(iso);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}
