/**
 * @fileoverview Query and chunk types.
 *
 * All instants are epoch milliseconds (UTC). Ranges are half-open: [start, end).
 *
 * @module @gridfeed/contracts/query
 */

/**
 * A user request against one endpoint.
 *
 * @invariant periodStart < periodEnd
 *
 * @example
 * ```typescript
 * const query: Query = {
 *   endpoint: 'day_ahead_prices',
 *   inDomain: '10YCZ-CEPS-----N',
 *   outDomain: '10YCZ-CEPS-----N',
 *   periodStart: Date.UTC(2020, 11, 31, 23),
 *   periodEnd: Date.UTC(2021, 0, 2, 23),
 *   params: {},
 * };
 * ```
 */
export interface Query {
  /** Endpoint kind, a key of the endpoint registry */
  readonly endpoint: string;

  /** Input domain code (EIC) */
  readonly inDomain?: string;

  /** Output domain code (EIC) */
  readonly outDomain?: string;

  /** Inclusive start instant, epoch ms */
  readonly periodStart: number;

  /** Exclusive end instant, epoch ms */
  readonly periodEnd: number;

  /** Extra API parameters passed through verbatim */
  readonly params: Readonly<Record<string, string>>;
}

/**
 * One sub-range of a query, produced by the span splitter.
 *
 * @invariant start < end
 */
export interface Chunk {
  /** Position of this chunk in emission order, starting at 0 */
  readonly sequenceIndex: number;

  /** Inclusive start instant, epoch ms */
  readonly start: number;

  /** Exclusive end instant, epoch ms */
  readonly end: number;
}
