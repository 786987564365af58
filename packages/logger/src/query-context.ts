/**
 * @fileoverview Query context management using AsyncLocalStorage
 * Propagates a query id through every async operation of one query
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

/**
 * Query context structure
 */
export interface QueryContext {
  /** Unique query identifier (UUID v4) */
  query_id: string;

  /** Optional additional context fields */
  [key: string]: unknown;
}

const queryContextStorage = new AsyncLocalStorage<QueryContext>();

/**
 * Generate a new unique query ID (UUID v4 format)
 */
export function generateQueryId(): string {
  return randomUUID();
}

/**
 * Get the current query context, or undefined outside of one
 */
export function getQueryContext(): QueryContext | undefined {
  return queryContextStorage.getStore();
}

/**
 * Get the current query ID from the active context
 *
 * @example
 * ```typescript
 * const queryId = getQueryId();
 * logger.info('Processing', { query_id: queryId });
 * ```
 */
export function getQueryId(): string | undefined {
  return queryContextStorage.getStore()?.query_id;
}

/**
 * Execute a function within a new query context.
 * The query ID is propagated through all async operations started by `fn`.
 *
 * @param fn - Function to execute within the query context
 * @param queryId - Optional query ID to use (generates new one if not provided)
 * @param additionalContext - Optional additional context fields
 *
 * @example
 * ```typescript
 * await withQueryContext(async () => {
 *   logger.info('Fetching'); // includes query_id
 * }, undefined, { endpoint: 'day_ahead_prices' });
 * ```
 */
export async function withQueryContext<T>(
  fn: () => Promise<T> | T,
  queryId?: string,
  additionalContext?: Record<string, unknown>
): Promise<T> {
  const context: QueryContext = {
    ...additionalContext,
    query_id: queryId ?? generateQueryId(),
  };

  return queryContextStorage.run(context, fn);
}
