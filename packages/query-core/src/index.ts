/**
 * @fileoverview Public API exports for @gridfeed/query-core
 * Pure, synchronous building blocks: datetime handling, span splitting,
 * record flattening and timestamp derivation.
 */

// Datetime
export { formatApiDateTime, parseApiDateTime, toInstant, toIsoString } from './datetime.js';
export type { InstantInput } from './datetime.js';

// Query construction
export { createQuery } from './query.js';
export type { QueryInput } from './query.js';

// Span splitting
export { splitSpan, daysToMs, MS_PER_DAY } from './split.js';

// Flattening
export { extractRecords, flattenValue, deduplicateRecords, DEFAULT_IGNORE_FIELDS } from './flatten.js';
export type { ExtractRecordsOptions } from './flatten.js';

// Resolutions and timestamps
export { getResolution, listResolutionCodes, advanceByResolution } from './resolution.js';
export type { ResolutionStep, ResolutionUnit } from './resolution.js';
export { calculateTimestamp, deriveTimestamps, addTimestamps, findFieldKey } from './timestamps.js';
export type {
  IntervalType,
  ResolutionSpec,
  TimestampOptions,
  TimestampFailure,
  DeriveTimestampsResult,
} from './timestamps.js';
