/**
 * @fileoverview Error taxonomy for gridfeed.
 *
 * Defines a hierarchy of structured error classes with machine-readable codes
 * and contextual data for retry decisions and failure reports.
 *
 * All errors extend GridfeedError and include:
 * - Unique error code (string constant)
 * - Structured data payload
 * - ISO timestamp
 *
 * @module @gridfeed/contracts/errors
 */

/**
 * Base error class for all gridfeed errors.
 *
 * @invariant code is non-empty string
 * @invariant timestamp is valid ISO 8601 string
 *
 * @example
 * ```typescript
 * throw new GridfeedError('CUSTOM_ERROR', 'Something went wrong', { context: 'value' });
 * ```
 */
export class GridfeedError extends Error {
  /**
   * Machine-readable error code (e.g., 'TRANSIENT_NETWORK').
   */
  readonly code: string;

  /**
   * Structured error data for debugging and retry logic.
   * Format varies by error type.
   */
  readonly data?: Record<string, unknown>;

  /**
   * ISO 8601 timestamp when error was created.
   */
  readonly timestamp: string;

  /**
   * @param code - Error code constant
   * @param message - Human-readable error message
   * @param data - Optional structured context data
   */
  constructor(code: string, message: string, data?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    if (data !== undefined) {
      this.data = data;
    }
    this.timestamp = new Date().toISOString();
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Serializes error to JSON-safe object.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      data: this.data,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }
}

/**
 * Thrown when a request fails for a reason that may succeed on retry:
 * connection reset, timeout, HTTP 5xx, HTTP 429, or a server-side
 * "unexpected error" acknowledgement.
 */
export class TransientNetworkError extends GridfeedError {
  constructor(
    message: string,
    data: {
      statusCode?: number;
      cause?: string;
      [key: string]: unknown;
    } = {}
  ) {
    super('TRANSIENT_NETWORK', message, data);
  }

  get statusCode(): number | undefined {
    const value = this.data?.['statusCode'];
    return typeof value === 'number' ? value : undefined;
  }
}

/**
 * Thrown when the API rejects a request (4xx other than 429).
 *
 * Typically malformed parameters or an authorization failure. Never retried.
 *
 * @example
 * ```typescript
 * throw new ClientRequestError('Invalid bidding zone', { statusCode: 400 });
 * ```
 */
export class ClientRequestError extends GridfeedError {
  readonly statusCode: number;

  constructor(
    message: string,
    data: {
      statusCode: number;
      [key: string]: unknown;
    }
  ) {
    super('CLIENT_ERROR', message, data);
    this.statusCode = data.statusCode;
  }
}

/**
 * Thrown when a response body cannot be decoded into a document.
 *
 * Indicates a schema mismatch; the chunk range is attached by the fetcher.
 */
export class DecodeError extends GridfeedError {
  constructor(message: string, data: Record<string, unknown> = {}) {
    super('DECODE_ERROR', message, data);
  }
}

/**
 * Thrown before any request is sent when the API key is missing or malformed.
 * Fails the whole query rather than individual chunks.
 */
export class AuthenticationError extends GridfeedError {
  constructor(message: string, data: Record<string, unknown> = {}) {
    super('AUTHENTICATION_ERROR', message, data);
  }
}

/**
 * Thrown for invalid queries, options or configuration values.
 *
 * @example
 * ```typescript
 * throw new ValidationError('periodEnd must be after periodStart', {
 *   field: 'periodEnd',
 * });
 * ```
 */
export class ValidationError extends GridfeedError {
  constructor(message: string, data: Record<string, unknown> = {}) {
    super('VALIDATION_ERROR', message, data);
  }
}

/**
 * Reported per record when a resolution code is not in the resolution table,
 * or when the period start or position cannot be used.
 */
export class UnknownResolutionError extends GridfeedError {
  constructor(
    message: string,
    data: {
      resolution: unknown;
      [key: string]: unknown;
    }
  ) {
    super('UNKNOWN_RESOLUTION', message, data);
  }
}

/**
 * Type guard to check if an error is a GridfeedError.
 *
 * @example
 * ```typescript
 * try {
 *   await client.query(query);
 * } catch (err) {
 *   if (isGridfeedError(err)) {
 *     console.error(`[${err.code}]`, err.message);
 *   }
 * }
 * ```
 */
export function isGridfeedError(error: unknown): error is GridfeedError {
  return error instanceof GridfeedError;
}

export function isTransientNetworkError(error: unknown): error is TransientNetworkError {
  return error instanceof TransientNetworkError;
}

export function isClientRequestError(error: unknown): error is ClientRequestError {
  return error instanceof ClientRequestError;
}

export function isDecodeError(error: unknown): error is DecodeError {
  return error instanceof DecodeError;
}

export function isAuthenticationError(error: unknown): error is AuthenticationError {
  return error instanceof AuthenticationError;
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

export function isUnknownResolutionError(error: unknown): error is UnknownResolutionError {
  return error instanceof UnknownResolutionError;
}
