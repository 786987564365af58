/**
 * @fileoverview Retrying fetcher.
 *
 * Fetches one chunk: builds its parameters, sends them through the
 * transport, classifies the response and retries transient failures with
 * backoff. Paged endpoints are walked page by page, each page with its own
 * retry loop; a failed page fails the whole chunk.
 *
 * @module @gridfeed/client/fetcher
 */

import type {
  Chunk,
  ChunkFailure,
  EndpointSpec,
  FetchErrorKind,
  FetchOutcome,
  MarketDocument,
  Query,
} from '@gridfeed/contracts';
import {
  ClientRequestError,
  TransientNetworkError,
  isClientRequestError,
  isGridfeedError,
  isTransientNetworkError,
} from '@gridfeed/contracts';
import type { Logger } from '@gridfeed/logger';
import { startTimer } from '@gridfeed/logger';
import { toIsoString } from '@gridfeed/query-core';
import type { ClientConfig } from './config.js';
import { readAcknowledgementReason } from './decode.js';
import { MAX_OFFSET, buildRequestParams, pageIncrement } from './endpoints.js';
import { classifyStatus, isRetryableError, toFailureKind } from './errors.js';
import type { Decoder, SleepFn, Transport, TransportResponse } from './types.js';

export interface FetchContext {
  config: ClientConfig;
  endpoint: EndpointSpec;
  /** Validated API key, sent as securityToken */
  apiKey: string;
  transport: Transport;
  decoder: Decoder;
  logger?: Logger;
  signal?: AbortSignal;
  /** Replaces the backoff wait, mainly for tests */
  sleep?: SleepFn;
}

type PageResult =
  | { ok: true; documents: MarketDocument[]; attempts: number }
  | { ok: false; failure: ChunkFailure; attempts: number };

type AttemptOutcome = 'Success' | FetchErrorKind;

/**
 * Waits `ms` milliseconds or until the signal aborts, whichever comes first.
 */
export const abortableSleep: SleepFn = (ms, signal) =>
  new Promise<void>((resolve) => {
    if (ms <= 0 || signal?.aborted) {
      resolve();
      return;
    }

    let timer: NodeJS.Timeout | undefined;
    const finish = (): void => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', finish);
      resolve();
    };

    timer = setTimeout(finish, ms);
    signal?.addEventListener('abort', finish, { once: true });
  });

function cancelled(chunk: Chunk, attempts: number): PageResult {
  return {
    ok: false,
    failure: { chunk, kind: 'Cancelled', message: 'Query cancelled before the chunk completed' },
    attempts,
  };
}

function statusCodeOf(error: unknown): number | undefined {
  if (isClientRequestError(error) || isTransientNetworkError(error)) {
    return error.statusCode;
  }
  return undefined;
}

function logAttempt(
  context: FetchContext,
  chunk: Chunk,
  fields: {
    attempt: number;
    outcome: AttemptOutcome;
    durationMs: number;
    statusCode?: number;
    offset?: number;
    error?: string;
  }
): void {
  context.logger?.log(fields.outcome === 'Success' ? 'debug' : 'warn', 'Fetch attempt', {
    endpoint: context.endpoint.kind,
    chunk_start: toIsoString(chunk.start),
    chunk_end: toIsoString(chunk.end),
    sequence_index: chunk.sequenceIndex,
    attempt: fields.attempt,
    outcome: fields.outcome,
    duration_ms: fields.durationMs,
    ...(fields.statusCode !== undefined ? { status_code: fields.statusCode } : {}),
    ...(fields.offset !== undefined ? { offset: fields.offset } : {}),
    ...(fields.error !== undefined ? { error: fields.error } : {}),
  });
}

/**
 * One transport call and its interpretation. Throws the classified error.
 */
async function sendOnce(params: Record<string, string>, context: FetchContext): Promise<MarketDocument[]> {
  const { config, endpoint, transport, decoder, signal } = context;

  let response: TransportResponse;
  try {
    response = await transport.send({
      method: endpoint.httpMethod,
      url: config.baseUrl,
      params,
      headers: {},
      timeoutMs: config.timeoutMs,
      signal,
    });
  } catch (error) {
    if (isGridfeedError(error)) {
      throw error;
    }
    throw new TransientNetworkError(`Network error: ${error instanceof Error ? error.message : String(error)}`, {
      cause: error instanceof Error ? error.name : 'unknown',
    });
  }

  const statusClass = classifyStatus(response.status);
  if (statusClass !== 'Success') {
    const reason = readAcknowledgementReason(response.body);
    const message = reason ? `HTTP ${response.status}: ${reason}` : `HTTP ${response.status}`;
    throw statusClass === 'TransientNetwork'
      ? new TransientNetworkError(message, { statusCode: response.status })
      : new ClientRequestError(message, { statusCode: response.status });
  }

  return decoder.decode(response.body, {
    endpoint: endpoint.kind,
    contentType: response.headers['content-type'],
  });
}

/**
 * Fetches one page with retries.
 */
async function fetchPage(
  chunk: Chunk,
  params: Record<string, string>,
  context: FetchContext,
  offset?: number
): Promise<PageResult> {
  const { config, signal, sleep = abortableSleep } = context;

  for (let attempt = 1; ; attempt++) {
    if (signal?.aborted) {
      return cancelled(chunk, attempt - 1);
    }

    const timer = startTimer();
    try {
      const documents = await sendOnce(params, context);
      logAttempt(context, chunk, { attempt, outcome: 'Success', durationMs: timer.stop(), offset });
      return { ok: true, documents, attempts: attempt };
    } catch (error) {
      const durationMs = timer.stop();
      const message = error instanceof Error ? error.message : String(error);

      if (signal?.aborted) {
        logAttempt(context, chunk, { attempt, outcome: 'Cancelled', durationMs, offset });
        return cancelled(chunk, attempt);
      }

      const kind = toFailureKind(error);
      const statusCode = statusCodeOf(error);
      logAttempt(context, chunk, { attempt, outcome: kind, durationMs, statusCode, offset, error: message });

      if (!isRetryableError(error) || attempt > config.maxRetries) {
        return {
          ok: false,
          failure: { chunk, kind, message, ...(statusCode !== undefined ? { statusCode } : {}) },
          attempts: attempt,
        };
      }
    }

    await sleep(config.backoff(attempt), signal);
  }
}

/**
 * Fetches one chunk of a query.
 *
 * Never throws for request failures: every way a chunk can end is reported
 * as a {@link FetchOutcome}. Transient failures are retried up to
 * `config.maxRetries` times; client and decode errors end the chunk at once.
 * An aborted signal stops retries and interrupts backoff waits, yielding a
 * 'Cancelled' failure.
 *
 * @example
 * ```typescript
 * const outcome = await fetchChunk(chunk, query, { config, endpoint, apiKey, transport, decoder });
 * if (outcome.status === 'success') {
 *   console.log(outcome.documents.length);
 * }
 * ```
 */
export async function fetchChunk(chunk: Chunk, query: Query, context: FetchContext): Promise<FetchOutcome> {
  const params = buildRequestParams(query, context.endpoint, chunk, context.apiKey);
  const increment = pageIncrement(query, context.endpoint);

  if (increment === undefined) {
    const page = await fetchPage(chunk, params, context);
    return page.ok
      ? { status: 'success', chunk, documents: page.documents, attempts: page.attempts }
      : { status: 'failure', chunk, failure: page.failure, attempts: page.attempts };
  }

  const documents: MarketDocument[] = [];
  let attempts = 0;

  for (let offset = 0; offset <= MAX_OFFSET; offset += increment) {
    const page = await fetchPage(chunk, { ...params, offset: String(offset) }, context, offset);
    attempts += page.attempts;

    if (!page.ok) {
      return { status: 'failure', chunk, failure: page.failure, attempts };
    }
    if (page.documents.length === 0) {
      break;
    }
    documents.push(...page.documents);
  }

  return { status: 'success', chunk, documents, attempts };
}
