/**
 * @fileoverview Timestamp derivation for flat records.
 *
 * Time series points carry a period start, a resolution and a 1-based
 * position instead of an absolute instant. The instant of a point is
 * `start + (position - 1) * resolution`.
 */

import type { FlatRecord, FlatValue } from '@gridfeed/contracts';
import { UnknownResolutionError, ValidationError } from '@gridfeed/contracts';
import type { Logger } from '@gridfeed/logger';
import { toInstant } from './datetime.js';
import { advanceByResolution, getResolution } from './resolution.js';

/**
 * - 'start': the instant at which the point's interval begins
 * - 'end': the instant at which it ends (one resolution step later)
 */
export type IntervalType = 'start' | 'end';

/**
 * Inputs of one timestamp calculation.
 */
export interface ResolutionSpec {
  /** Period start: ISO 8601 string, `YYYYMMDDHHMM` string, or epoch ms */
  periodStart: string | number;

  /** Resolution code, e.g. 'PT15M' */
  resolution: string;

  /** 1-based position within the period */
  position: number;
}

export interface TimestampOptions {
  /** @default 'period.time_interval.start' */
  startField?: string;

  /** @default 'period.resolution' */
  resolutionField?: string;

  /** @default 'period.point.position' */
  positionField?: string;

  /** Field the derived instant is written to. @default 'timestamp' */
  timestampField?: string;

  /** @default 'start' */
  intervalType?: IntervalType;

  logger?: Logger;
}

/**
 * A record whose timestamp could not be derived. The record itself is
 * returned unchanged in the output.
 */
export interface TimestampFailure {
  /** Index of the record in the input */
  index: number;
  error: UnknownResolutionError | ValidationError;
}

export interface DeriveTimestampsResult {
  records: FlatRecord[];
  failures: TimestampFailure[];
}

/**
 * Computes the absolute instant of one point as an ISO 8601 UTC string.
 *
 * @throws UnknownResolutionError if the resolution code is not in the table
 * @throws ValidationError if the start or position is invalid
 *
 * @example
 * ```typescript
 * calculateTimestamp({ periodStart: '2018-09-30T22:00Z', resolution: 'PT15M', position: 3 });
 * // '2018-09-30T22:30:00.000Z'
 * ```
 */
export function calculateTimestamp(spec: ResolutionSpec, intervalType: IntervalType = 'start'): string {
  const step = getResolution(spec.resolution);
  if (!step) {
    throw new UnknownResolutionError(`Unknown resolution '${spec.resolution}'`, {
      resolution: spec.resolution,
    });
  }

  if (!Number.isInteger(spec.position) || spec.position < 1) {
    throw new ValidationError(`Position must be a positive integer, got ${spec.position}`, {
      position: spec.position,
    });
  }

  const start = toInstant(spec.periodStart);
  const steps = intervalType === 'end' ? spec.position : spec.position - 1;

  return new Date(advanceByResolution(start, step, steps)).toISOString();
}

/**
 * Finds a field by exact key, else by the first key ending in `.${field}`.
 * Lets 'period.resolution' match 'time_series.period.resolution'.
 */
export function findFieldKey(record: FlatRecord, field: string): string | undefined {
  if (field in record) {
    return field;
  }
  const suffix = `.${field}`;
  return Object.keys(record).find((key) => key.endsWith(suffix));
}

function toSpec(start: FlatValue, resolution: FlatValue, position: FlatValue): ResolutionSpec {
  if (typeof start !== 'string' && typeof start !== 'number') {
    throw new ValidationError(`Invalid period start ${String(start)}`, { periodStart: start });
  }
  if (typeof resolution !== 'string') {
    throw new UnknownResolutionError(`Unknown resolution '${String(resolution)}'`, { resolution });
  }
  return {
    periodStart: start,
    resolution,
    position: typeof position === 'number' ? position : typeof position === 'string' ? Number(position) : NaN,
  };
}

/**
 * Adds a derived timestamp to every record that carries a period start,
 * resolution and position.
 *
 * Records missing any of the three fields pass through unchanged. Records
 * whose values cannot be used pass through unchanged and are reported in
 * `failures`; the rest of the batch is unaffected. Input records are not
 * modified. Running it again over its own output yields the same values.
 */
export function deriveTimestamps(records: FlatRecord[], options: TimestampOptions = {}): DeriveTimestampsResult {
  const {
    startField = 'period.time_interval.start',
    resolutionField = 'period.resolution',
    positionField = 'period.point.position',
    timestampField = 'timestamp',
    intervalType = 'start',
    logger,
  } = options;

  const output: FlatRecord[] = [];
  const failures: TimestampFailure[] = [];
  let missingFieldsLogged = false;

  records.forEach((record, index) => {
    const startKey = findFieldKey(record, startField);
    const resolutionKey = findFieldKey(record, resolutionField);
    const positionKey = findFieldKey(record, positionField);

    if (startKey === undefined || resolutionKey === undefined || positionKey === undefined) {
      if (!missingFieldsLogged) {
        logger?.debug('Skipping timestamp derivation: record lacks period fields', {
          start_field: startField,
          resolution_field: resolutionField,
          position_field: positionField,
          available_keys: Object.keys(record).slice(0, 3),
        });
        missingFieldsLogged = true;
      }
      output.push({ ...record });
      return;
    }

    try {
      const spec = toSpec(record[startKey] ?? null, record[resolutionKey] ?? null, record[positionKey] ?? null);
      output.push({ ...record, [timestampField]: calculateTimestamp(spec, intervalType) });
    } catch (error) {
      if (!(error instanceof UnknownResolutionError || error instanceof ValidationError)) {
        throw error;
      }
      failures.push({ index, error });
      output.push({ ...record });
    }
  });

  return { records: output, failures };
}

/**
 * Like {@link deriveTimestamps}, but returns only the records and logs each
 * per-record failure as a warning.
 *
 * @example
 * ```typescript
 * const rows = addTimestamps(extractRecords(result), { logger });
 * rows[0]?.['timestamp']; // '2020-12-31T23:00:00.000Z'
 * ```
 */
export function addTimestamps(records: FlatRecord[], options: TimestampOptions = {}): FlatRecord[] {
  const { records: enriched, failures } = deriveTimestamps(records, options);

  for (const { index, error } of failures) {
    options.logger?.warn('Failed to derive timestamp', {
      record_index: index,
      error_code: error.code,
      error: error.message,
    });
  }

  return enriched;
}
