/**
 * @fileoverview Seams of the client: transport, decoder and backoff.
 *
 * Everything that touches the network or parses bytes sits behind one of
 * these interfaces so the fetcher and orchestrator can be driven by stubs.
 *
 * @module @gridfeed/client/types
 */

import type { HttpMethod, MarketDocument } from '@gridfeed/contracts';

/**
 * One HTTP request, fully resolved.
 */
export interface TransportRequest {
  method: HttpMethod;
  url: string;
  /** Query string (GET) or form body (POST) parameters */
  params: Record<string, string>;
  headers: Record<string, string>;
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface TransportResponse {
  status: number;
  /** Lower-cased header names */
  headers: Record<string, string>;
  body: Uint8Array;
}

/**
 * Sends requests. A rejected promise means the request never produced a
 * response (connection failure, timeout, abort).
 */
export interface Transport {
  send(request: TransportRequest): Promise<TransportResponse>;
}

export interface DecodeContext {
  /** Registry kind of the endpoint that produced the body */
  endpoint: string;
  contentType?: string;
}

/**
 * Turns a response body into documents.
 *
 * Returns an empty list when the API reports that no data matches, and one
 * document per archive entry for ZIP bodies.
 */
export interface Decoder {
  decode(body: Uint8Array, context: DecodeContext): MarketDocument[];
}

/**
 * Delay in milliseconds before retry attempt `attempt` (1-based).
 */
export type BackoffStrategy = (attempt: number) => number;

/**
 * Waits `ms` milliseconds, resolving early (without error) when `signal` aborts.
 */
export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;
