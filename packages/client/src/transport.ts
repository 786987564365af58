/**
 * @fileoverview HTTP transport built on the global fetch.
 *
 * @module @gridfeed/client/transport
 */

import { TransientNetworkError } from '@gridfeed/contracts';
import type { Transport, TransportRequest, TransportResponse } from './types.js';

/**
 * Creates the default transport.
 *
 * GET parameters go in the query string, POST parameters in a form-encoded
 * body. Requests are aborted after `timeoutMs` or when the caller's signal
 * fires; both surface as {@link TransientNetworkError}, as do connection
 * failures. HTTP error statuses are returned, not thrown.
 *
 * @example
 * ```typescript
 * const transport = createFetchTransport();
 * const response = await transport.send({
 *   method: 'GET',
 *   url: 'https://web-api.tp.entsoe.eu/api',
 *   params: { documentType: 'A44' },
 *   headers: {},
 *   timeoutMs: 5000,
 * });
 * ```
 */
export function createFetchTransport(): Transport {
  return {
    async send(request: TransportRequest): Promise<TransportResponse> {
      const controller = new AbortController();
      const timeout = setTimeout(() => controller.abort(), request.timeoutMs);
      const onAbort = (): void => controller.abort();
      request.signal?.addEventListener('abort', onAbort, { once: true });

      const query = new URLSearchParams(request.params);
      const url = request.method === 'GET' ? `${request.url}?${query.toString()}` : request.url;

      try {
        const response = await fetch(url, {
          method: request.method,
          headers:
            request.method === 'POST'
              ? { 'Content-Type': 'application/x-www-form-urlencoded', ...request.headers }
              : request.headers,
          ...(request.method === 'POST' ? { body: query.toString() } : {}),
          signal: controller.signal,
        });

        const headers: Record<string, string> = {};
        response.headers.forEach((value, key) => {
          headers[key.toLowerCase()] = value;
        });

        return {
          status: response.status,
          headers,
          body: new Uint8Array(await response.arrayBuffer()),
        };
      } catch (error) {
        if (request.signal?.aborted) {
          throw new TransientNetworkError('Request aborted', { cause: 'aborted' });
        }
        if (controller.signal.aborted) {
          throw new TransientNetworkError(`Request timed out after ${request.timeoutMs}ms`, {
            cause: 'timeout',
          });
        }
        throw new TransientNetworkError(
          `Network error: ${error instanceof Error ? error.message : String(error)}`,
          { cause: error instanceof Error ? error.name : 'unknown' }
        );
      } finally {
        clearTimeout(timeout);
        request.signal?.removeEventListener('abort', onAbort);
      }
    },
  };
}
