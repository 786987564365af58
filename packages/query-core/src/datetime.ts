/**
 * @fileoverview API datetime helpers.
 *
 * The API exchanges instants as `YYYYMMDDHHMM` strings interpreted in UTC.
 * Internally every instant is epoch milliseconds.
 */

import { ValidationError } from '@gridfeed/contracts';

const API_DATETIME_PATTERN = /^(\d{4})(\d{2})(\d{2})(\d{2})(\d{2})$/;

/** An ISO date-time without `Z` or a numeric offset */
const ISO_LOCAL_DATETIME_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?$/;

/**
 * Anything accepted where the public API takes an instant:
 * a Date, epoch milliseconds, a `YYYYMMDDHHMM` string, or an ISO 8601 string.
 */
export type InstantInput = Date | number | string;

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * Formats an instant as `YYYYMMDDHHMM` (UTC).
 *
 * @example
 * ```typescript
 * formatApiDateTime(Date.UTC(2020, 11, 31, 23, 0)); // '202012312300'
 * ```
 */
export function formatApiDateTime(instant: number): string {
  const date = new Date(instant);
  return (
    pad(date.getUTCFullYear(), 4) +
    pad(date.getUTCMonth() + 1) +
    pad(date.getUTCDate()) +
    pad(date.getUTCHours()) +
    pad(date.getUTCMinutes())
  );
}

/**
 * Parses a `YYYYMMDDHHMM` string (UTC) into epoch milliseconds.
 *
 * @throws ValidationError when the value is not a real calendar minute
 */
export function parseApiDateTime(value: string): number {
  const match = API_DATETIME_PATTERN.exec(value);
  if (!match) {
    throw new ValidationError(`Invalid datetime '${value}': expected YYYYMMDDHHMM`, { value });
  }

  const part = (index: number): number => Number(match[index]);
  const instant = Date.UTC(part(1), part(2) - 1, part(3), part(4), part(5));

  // Date.UTC rolls over out-of-range fields (month 13, hour 25), so compare the round trip
  if (formatApiDateTime(instant) !== value) {
    throw new ValidationError(`Invalid datetime '${value}': not a calendar date`, { value });
  }

  return instant;
}

/**
 * Normalizes an {@link InstantInput} to epoch milliseconds.
 *
 * Numbers are always epoch milliseconds; pass API datetimes as strings.
 * ISO date-times without an offset are read as UTC.
 */
export function toInstant(value: InstantInput): number {
  if (value instanceof Date) {
    const time = value.getTime();
    if (Number.isNaN(time)) {
      throw new ValidationError('Invalid Date', { value: String(value) });
    }
    return time;
  }

  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new ValidationError(`Invalid instant ${value}`, { value });
    }
    return value;
  }

  if (API_DATETIME_PATTERN.test(value)) {
    return parseApiDateTime(value);
  }

  const parsed = Date.parse(ISO_LOCAL_DATETIME_PATTERN.test(value) ? `${value}Z` : value);
  if (Number.isNaN(parsed)) {
    throw new ValidationError(`Invalid datetime '${value}'`, { value });
  }
  return parsed;
}

/**
 * ISO 8601 representation used in logs and failure reports.
 */
export function toIsoString(instant: number): string {
  return new Date(instant).toISOString();
}
