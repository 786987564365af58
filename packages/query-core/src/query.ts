/**
 * @fileoverview Query construction and validation.
 */

import type { Query } from '@gridfeed/contracts';
import { ValidationError } from '@gridfeed/contracts';
import { toInstant, type InstantInput } from './datetime.js';

export interface QueryInput {
  endpoint: string;
  inDomain?: string;
  outDomain?: string;
  periodStart: InstantInput;
  periodEnd: InstantInput;
  params?: Record<string, string>;
}

/**
 * Builds an immutable {@link Query}.
 *
 * @throws ValidationError when the endpoint is empty or the period is empty or reversed
 *
 * @example
 * ```typescript
 * const query = createQuery({
 *   endpoint: 'day_ahead_prices',
 *   inDomain: '10YCZ-CEPS-----N',
 *   outDomain: '10YCZ-CEPS-----N',
 *   periodStart: '202012312300',
 *   periodEnd: '202101022300',
 * });
 * ```
 */
export function createQuery(input: QueryInput): Query {
  if (input.endpoint.trim() === '') {
    throw new ValidationError('Query endpoint must not be empty', { field: 'endpoint' });
  }

  const periodStart = toInstant(input.periodStart);
  const periodEnd = toInstant(input.periodEnd);

  if (periodEnd <= periodStart) {
    throw new ValidationError('periodEnd must be after periodStart', {
      field: 'periodEnd',
      periodStart,
      periodEnd,
    });
  }

  return Object.freeze({
    endpoint: input.endpoint,
    ...(input.inDomain !== undefined ? { inDomain: input.inDomain } : {}),
    ...(input.outDomain !== undefined ? { outDomain: input.outDomain } : {}),
    periodStart,
    periodEnd,
    params: Object.freeze({ ...input.params }),
  });
}
