/**
 * @fileoverview Status classification and retry decisions.
 *
 * @module @gridfeed/client/errors
 */

import type { FetchErrorKind } from '@gridfeed/contracts';
import { isClientRequestError, isTransientNetworkError } from '@gridfeed/contracts';

export type StatusClass = 'Success' | 'TransientNetwork' | 'ClientError';

/**
 * Classifies an HTTP status code.
 *
 * 5xx and 429 are transient; every other non-2xx status is a client error.
 *
 * @example
 * ```typescript
 * classifyStatus(503); // 'TransientNetwork'
 * classifyStatus(404); // 'ClientError'
 * ```
 */
export function classifyStatus(status: number): StatusClass {
  if (status >= 200 && status < 300) {
    return 'Success';
  }
  if (status >= 500 || status === 429) {
    return 'TransientNetwork';
  }
  return 'ClientError';
}

/**
 * Checks if an error is worth another attempt.
 */
export function isRetryableError(error: unknown): boolean {
  return isTransientNetworkError(error);
}

/**
 * Maps a thrown error to the failure kind reported for a chunk.
 *
 * Anything that is neither transient nor a client error was raised while
 * decoding the body.
 */
export function toFailureKind(error: unknown): Exclude<FetchErrorKind, 'Cancelled'> {
  if (isTransientNetworkError(error)) {
    return 'TransientNetwork';
  }
  if (isClientRequestError(error)) {
    return 'ClientError';
  }
  return 'DecodeError';
}
