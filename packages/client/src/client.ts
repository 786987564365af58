/**
 * @fileoverview Client facade.
 *
 * @module @gridfeed/client/client
 */

import type { LogicalResult, Query } from '@gridfeed/contracts';
import type { Logger } from '@gridfeed/logger';
import { createChildLogger, createLogger, withQueryContext } from '@gridfeed/logger';
import { createQuery, type QueryInput } from '@gridfeed/query-core';
import { resolveConfig, type ClientConfig, type ConfigOverrides } from './config.js';
import { createXmlDecoder } from './decode.js';
import { executeQuery } from './orchestrator.js';
import { createFetchTransport } from './transport.js';
import type { Decoder, SleepFn, Transport } from './types.js';

export interface GridfeedClientOptions {
  /** Resolved configuration; resolveConfig() from the environment by default */
  config?: ClientConfig;
  transport?: Transport;
  decoder?: Decoder;
  /** Defaults to a console logger at config.logLevel */
  logger?: Logger;
  sleep?: SleepFn;
}

export interface QueryOptions {
  signal?: AbortSignal;
  /** Correlation id for the query's log lines; generated when omitted */
  queryId?: string;
}

/**
 * Chunked, retrying client for the transparency platform API.
 *
 * @example
 * ```typescript
 * const client = new GridfeedClient({ config: resolveConfig({ workerCount: 2 }) });
 * const result = await client.query(
 *   createQuery({
 *     endpoint: 'day_ahead_prices',
 *     inDomain: '10YCZ-CEPS-----N',
 *     outDomain: '10YCZ-CEPS-----N',
 *     periodStart: '202012312300',
 *     periodEnd: '202101022300',
 *   })
 * );
 * if (result.coverage === 'partial') {
 *   console.warn(result.failures);
 * }
 * ```
 */
export class GridfeedClient {
  readonly config: ClientConfig;
  private readonly transport: Transport;
  private readonly decoder: Decoder;
  private readonly logger: Logger;
  private readonly sleep: SleepFn | undefined;

  constructor(options: GridfeedClientOptions = {}) {
    this.config = options.config ?? resolveConfig();
    this.transport = options.transport ?? createFetchTransport();
    this.decoder = options.decoder ?? createXmlDecoder();
    this.logger = createChildLogger(options.logger ?? createLogger({ level: this.config.logLevel }), {
      component: 'gridfeed-client',
    });
    this.sleep = options.sleep;
  }

  /**
   * Runs a query. Every log line it produces carries the same query_id.
   *
   * @throws ValidationError for an unknown endpoint or an invalid query
   * @throws AuthenticationError when the API key is missing or malformed
   */
  async query(query: Query, options: QueryOptions = {}): Promise<LogicalResult> {
    return withQueryContext(
      () =>
        executeQuery(query, {
          config: this.config,
          transport: this.transport,
          decoder: this.decoder,
          logger: this.logger,
          ...(options.signal ? { signal: options.signal } : {}),
          ...(this.sleep ? { sleep: this.sleep } : {}),
        }),
      options.queryId,
      { endpoint: query.endpoint }
    );
  }
}

/**
 * One-shot query with configuration resolved from `overrides` and the environment.
 *
 * @example
 * ```typescript
 * const result = await queryApi(
 *   { endpoint: 'actual_total_load', outDomain: '10YBE----------2', periodStart: '202401010000', periodEnd: '202401020000' },
 *   { maxRetries: 2 }
 * );
 * ```
 */
export async function queryApi(input: QueryInput, overrides: ConfigOverrides = {}): Promise<LogicalResult> {
  const client = new GridfeedClient({ config: resolveConfig(overrides) });
  return client.query(createQuery(input));
}
