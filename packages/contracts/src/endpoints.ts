/**
 * @fileoverview Endpoint registry entry type.
 *
 * @module @gridfeed/contracts/endpoints
 */

export type HttpMethod = 'GET' | 'POST';

/**
 * Constraint between the in and out domain of a query.
 * - 'equal': both must name the same area (e.g. day-ahead prices)
 * - 'different': they must differ (e.g. cross-border capacity)
 */
export type DomainRule = 'equal' | 'different';

/**
 * Describes one queryable endpoint. Registry entries are frozen.
 *
 * @invariant maxSpanDays > 0
 */
export interface EndpointSpec {
  /** Registry key, e.g. 'day_ahead_prices' */
  readonly kind: string;

  /** Human-readable description */
  readonly title: string;

  /** Transparency platform article reference, e.g. '12.1.D' */
  readonly article: string;

  /** Value of the documentType parameter */
  readonly documentType: string;

  /** Parameters always sent for this endpoint (processType, businessType, ...) */
  readonly fixedParams: Readonly<Record<string, string>>;

  /** Longest range a single request may cover */
  readonly maxSpanDays: number;

  readonly httpMethod: HttpMethod;

  /** API parameter names the query's in/out domains are sent as */
  readonly domainParams: {
    readonly in?: string;
    readonly out?: string;
  };

  readonly domainRule?: DomainRule;

  /** Parameter names that must be present in the query's params */
  readonly requiredParams: readonly string[];

  /** Page size when the endpoint is paged by offset */
  readonly offsetIncrement?: number;
}
