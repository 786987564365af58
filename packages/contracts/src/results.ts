/**
 * @fileoverview Per-chunk outcomes and aggregated query results.
 *
 * @module @gridfeed/contracts/results
 */

import type { Chunk } from './query.js';
import type { MarketDocument } from './documents.js';

/**
 * Terminal failure classes for a chunk.
 * - 'TransientNetwork': retries exhausted on network errors, 5xx or 429
 * - 'ClientError': request rejected by the API (4xx), not retried
 * - 'DecodeError': response body could not be decoded, not retried
 * - 'Cancelled': query was cancelled before the chunk completed
 */
export type FetchErrorKind = 'TransientNetwork' | 'ClientError' | 'DecodeError' | 'Cancelled';

/**
 * A chunk that could not be fetched, with enough context to retry it manually.
 */
export interface ChunkFailure {
  chunk: Chunk;
  kind: FetchErrorKind;
  message: string;
  /** HTTP status of the last response, when there was one */
  statusCode?: number;
}

export interface FetchSuccess {
  status: 'success';
  chunk: Chunk;
  /**
   * Documents decoded for this chunk. Empty when the API reported no data;
   * several when the response was an archive or the chunk was paged.
   */
  documents: MarketDocument[];
  /** Transport calls made, across all pages */
  attempts: number;
}

export interface FetchFailure {
  status: 'failure';
  chunk: Chunk;
  failure: ChunkFailure;
  attempts: number;
}

/** Result of fetching one chunk */
export type FetchOutcome = FetchSuccess | FetchFailure;

/**
 * 'complete' when every chunk succeeded, otherwise 'partial'.
 */
export type Coverage = 'complete' | 'partial';

/**
 * Aggregated result of one query.
 *
 * @invariant documents are ordered by chunk sequenceIndex
 * @invariant coverage === 'complete' iff failures.length === 0
 */
export interface LogicalResult {
  documents: MarketDocument[];
  failures: ChunkFailure[];
  chunkCount: number;
  coverage: Coverage;
}

export function isFetchSuccess(outcome: FetchOutcome): outcome is FetchSuccess {
  return outcome.status === 'success';
}

/**
 * Type guard distinguishing an aggregated result from a bare document list.
 */
export function isLogicalResult(value: LogicalResult | MarketDocument[]): value is LogicalResult {
  return !Array.isArray(value);
}
