/**
 * @fileoverview Main entry point for @gridfeed/contracts package.
 *
 * Exports all types, errors, and guards shared across gridfeed packages.
 *
 * @module @gridfeed/contracts
 */

// Query types
export type { Query, Chunk } from './query.js';

// Document types
export type {
  DocumentScalar,
  DocumentValue,
  DocumentNode,
  MarketDocument,
  FlatValue,
  FlatRecord,
} from './documents.js';

// Outcome and result types
export type {
  FetchErrorKind,
  ChunkFailure,
  FetchSuccess,
  FetchFailure,
  FetchOutcome,
  Coverage,
  LogicalResult,
} from './results.js';

export { isFetchSuccess, isLogicalResult } from './results.js';

// Endpoint registry types
export type { HttpMethod, DomainRule, EndpointSpec } from './endpoints.js';

// Error classes and guards
export {
  GridfeedError,
  TransientNetworkError,
  ClientRequestError,
  DecodeError,
  AuthenticationError,
  ValidationError,
  UnknownResolutionError,
  isGridfeedError,
  isTransientNetworkError,
  isClientRequestError,
  isDecodeError,
  isAuthenticationError,
  isValidationError,
  isUnknownResolutionError,
} from './errors.js';
