/**
 * @fileoverview Public API exports for @gridfeed/client
 */

// Client facade
export { GridfeedClient, queryApi } from './client.js';
export type { GridfeedClientOptions, QueryOptions } from './client.js';

// Orchestration and fetching
export { executeQuery, aggregateOutcomes } from './orchestrator.js';
export type { ExecutionContext } from './orchestrator.js';
export { fetchChunk, abortableSleep } from './fetcher.js';
export type { FetchContext } from './fetcher.js';

// Configuration
export {
  resolveConfig,
  configSchema,
  envMapping,
  exponentialBackoff,
  constantBackoff,
  validateApiKey,
  DEFAULT_BASE_URL,
} from './config.js';
export type { ClientConfig, ConfigOverrides, ExponentialBackoffOptions } from './config.js';

// Endpoint registry
export {
  getEndpoint,
  listEndpoints,
  validateQuery,
  buildRequestParams,
  pageIncrement,
  hasUpdateWindow,
  DEFAULT_MAX_SPAN_DAYS,
  DEFAULT_OFFSET_INCREMENT,
  MAX_OFFSET,
} from './endpoints.js';

// Transport and decoding
export { createFetchTransport } from './transport.js';
export {
  createXmlDecoder,
  parseXmlDocument,
  readAcknowledgementReason,
  isZipArchive,
  toSnakeCase,
} from './decode.js';

// Errors
export { classifyStatus, isRetryableError, toFailureKind } from './errors.js';
export type { StatusClass } from './errors.js';

export type {
  Transport,
  TransportRequest,
  TransportResponse,
  Decoder,
  DecodeContext,
  BackoffStrategy,
  SleepFn,
} from './types.js';
