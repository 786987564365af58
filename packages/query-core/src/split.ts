/**
 * @fileoverview Span splitting.
 *
 * Splits a requested range into contiguous chunks no longer than an
 * endpoint's maximum span.
 */

import type { Chunk } from '@gridfeed/contracts';
import { ValidationError } from '@gridfeed/contracts';

export const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Converts an endpoint's maximum span in days to milliseconds.
 */
export function daysToMs(days: number): number {
  if (!Number.isFinite(days) || days <= 0) {
    throw new ValidationError(`Maximum span must be a positive number of days, got ${days}`, {
      maxSpanDays: days,
    });
  }
  return days * MS_PER_DAY;
}

/**
 * Split [periodStart, periodEnd) into chunks of at most maxSpanMs.
 *
 * Chunks are disjoint, contiguous and numbered 0..N-1 in order; their union is
 * exactly the input range and N = ceil((periodEnd - periodStart) / maxSpanMs).
 * The last chunk may be shorter. A range no longer than maxSpanMs yields a
 * single chunk equal to the full range.
 *
 * @param periodStart - Start instant (ms)
 * @param periodEnd - End instant (ms), exclusive
 * @param maxSpanMs - Maximum chunk length (ms)
 *
 * @example
 * ```typescript
 * splitSpan(Date.UTC(2020, 11, 31, 23), Date.UTC(2021, 0, 2, 23), MS_PER_DAY);
 * // [{ sequenceIndex: 0, start: ..., end: ... }, { sequenceIndex: 1, ... }]
 * ```
 */
export function splitSpan(periodStart: number, periodEnd: number, maxSpanMs: number): Chunk[] {
  if (!Number.isFinite(maxSpanMs) || maxSpanMs <= 0) {
    throw new ValidationError(`maxSpanMs must be positive, got ${maxSpanMs}`, { maxSpanMs });
  }
  if (!Number.isFinite(periodStart) || !Number.isFinite(periodEnd) || periodEnd <= periodStart) {
    throw new ValidationError('periodEnd must be after periodStart', { periodStart, periodEnd });
  }

  const chunks: Chunk[] = [];
  let cursor = periodStart;

  while (cursor < periodEnd) {
    const end = Math.min(cursor + maxSpanMs, periodEnd);
    if (end <= cursor) {
      throw new ValidationError(`maxSpanMs ${maxSpanMs} is too small to advance past ${cursor}`, {
        maxSpanMs,
        cursor,
      });
    }
    chunks.push({ sequenceIndex: chunks.length, start: cursor, end });
    cursor = end;
  }

  return chunks;
}
