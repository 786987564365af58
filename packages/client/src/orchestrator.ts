/**
 * @fileoverview Request orchestration.
 *
 * Splits a query into chunks, drives them through the fetcher on a fixed
 * pool of workers and folds the outcomes into one result ordered by chunk.
 *
 * @module @gridfeed/client/orchestrator
 */

import type { Chunk, ChunkFailure, FetchOutcome, LogicalResult, Query } from '@gridfeed/contracts';
import type { Logger } from '@gridfeed/logger';
import { startTimer } from '@gridfeed/logger';
import { daysToMs, splitSpan, toInstant } from '@gridfeed/query-core';
import { validateApiKey, type ClientConfig } from './config.js';
import { getEndpoint, hasUpdateWindow, validateQuery } from './endpoints.js';
import { fetchChunk } from './fetcher.js';
import type { Decoder, SleepFn, Transport } from './types.js';

export interface ExecutionContext {
  config: ClientConfig;
  transport: Transport;
  decoder: Decoder;
  logger?: Logger;
  signal?: AbortSignal;
  sleep?: SleepFn;
}

/**
 * Range the query is split over: the update window when the query has
 * one, the main period otherwise.
 */
function splitRange(query: Query): { start: number; end: number } {
  if (hasUpdateWindow(query)) {
    return {
      start: toInstant(query.params['periodStartUpdate'] ?? ''),
      end: toInstant(query.params['periodEndUpdate'] ?? ''),
    };
  }
  return { start: query.periodStart, end: query.periodEnd };
}

/**
 * Folds per-chunk outcomes into a {@link LogicalResult}.
 *
 * Documents and failures are ordered by sequence index regardless of the
 * order the outcomes completed in.
 */
export function aggregateOutcomes(outcomes: FetchOutcome[], chunkCount: number): LogicalResult {
  const ordered = [...outcomes].sort((a, b) => a.chunk.sequenceIndex - b.chunk.sequenceIndex);

  const documents = ordered.flatMap((outcome) => (outcome.status === 'success' ? outcome.documents : []));
  const failures = ordered.flatMap((outcome) => (outcome.status === 'failure' ? [outcome.failure] : []));

  return {
    documents,
    failures,
    chunkCount,
    coverage: failures.length === 0 ? 'complete' : 'partial',
  };
}

function cancelledOutcome(chunk: Chunk): FetchOutcome {
  const failure: ChunkFailure = {
    chunk,
    kind: 'Cancelled',
    message: 'Query cancelled before the chunk was dispatched',
  };
  return { status: 'failure', chunk, failure, attempts: 0 };
}

/**
 * Runs a query to completion.
 *
 * The endpoint, the query's parameters and the API key are checked before
 * any request is sent. Chunks are then handed out in sequence order to
 * `config.workerCount` workers; each worker finishes a chunk, backoff waits
 * included, before taking the next. Chunk failures never stop sibling
 * chunks, and whatever succeeded is returned.
 *
 * Once `signal` aborts, no further chunk is dispatched and the undispatched
 * ones are reported as 'Cancelled'.
 *
 * @throws ValidationError for an unknown endpoint or an invalid query
 * @throws AuthenticationError when the API key is missing or malformed
 */
export async function executeQuery(query: Query, context: ExecutionContext): Promise<LogicalResult> {
  const { config, transport, decoder, logger, signal, sleep } = context;

  const endpoint = getEndpoint(query.endpoint);
  validateQuery(query, endpoint);
  const apiKey = validateApiKey(config.apiKey);

  const range = splitRange(query);
  const chunks = splitSpan(range.start, range.end, daysToMs(endpoint.maxSpanDays));
  const workerCount = Math.min(config.workerCount, chunks.length);
  const timer = startTimer();

  logger?.info('Query started', {
    endpoint: endpoint.kind,
    chunk_count: chunks.length,
    worker_count: workerCount,
  });

  const outcomes: FetchOutcome[] = [];
  let cursor = 0;

  const worker = async (): Promise<void> => {
    while (cursor < chunks.length && !signal?.aborted) {
      const chunk = chunks[cursor];
      cursor++;
      if (chunk === undefined) {
        return;
      }
      outcomes.push(
        await fetchChunk(chunk, query, {
          config,
          endpoint,
          apiKey,
          transport,
          decoder,
          ...(logger ? { logger } : {}),
          ...(signal ? { signal } : {}),
          ...(sleep ? { sleep } : {}),
        })
      );
    }
  };

  await Promise.all(Array.from({ length: workerCount }, () => worker()));

  for (const chunk of chunks.slice(cursor)) {
    outcomes.push(cancelledOutcome(chunk));
  }

  const result = aggregateOutcomes(outcomes, chunks.length);

  logger?.info('Query finished', {
    endpoint: endpoint.kind,
    document_count: result.documents.length,
    failure_count: result.failures.length,
    coverage: result.coverage,
    duration_ms: timer.stop(),
  });

  return result;
}
