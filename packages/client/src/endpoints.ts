/**
 * @fileoverview Endpoint registry.
 *
 * The registry is loaded from data/endpoints.json and describes, per
 * endpoint kind, the document type and fixed parameters to send, the
 * longest span a single request may cover, how the query's domains map to
 * API parameters and whether the endpoint is paged.
 *
 * @module @gridfeed/client/endpoints
 */

import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import type { Chunk, EndpointSpec, Query } from '@gridfeed/contracts';
import { ValidationError } from '@gridfeed/contracts';
import { formatApiDateTime } from '@gridfeed/query-core';

/** Applies when an entry does not set its own limit */
export const DEFAULT_MAX_SPAN_DAYS = 365;

/** Page size for endpoints paged only because the query sets `offset` */
export const DEFAULT_OFFSET_INCREMENT = 100;

/** The API serves at most 5000 documents per query: offsets 0..4800 */
export const MAX_OFFSET = 4800;

const endpointSchema = z.object({
  kind: z.string().min(1),
  title: z.string(),
  article: z.string(),
  documentType: z.string().min(1),
  fixedParams: z.record(z.string()).default({}),
  maxSpanDays: z.number().positive().default(DEFAULT_MAX_SPAN_DAYS),
  httpMethod: z.enum(['GET', 'POST']).default('GET'),
  domainParams: z.object({
    in: z.string().optional(),
    out: z.string().optional(),
  }),
  domainRule: z.enum(['equal', 'different']).optional(),
  requiredParams: z.array(z.string()).default([]),
  offsetIncrement: z.number().int().positive().optional(),
});

const registrySchema = z.array(endpointSchema);

let cachedRegistry: Map<string, EndpointSpec> | undefined;

function toEndpointSpec(entry: z.infer<typeof endpointSchema>): EndpointSpec {
  const { domainParams, domainRule, offsetIncrement, fixedParams, requiredParams, ...rest } = entry;
  return Object.freeze({
    ...rest,
    fixedParams: Object.freeze(fixedParams),
    requiredParams: Object.freeze(requiredParams),
    domainParams: Object.freeze({
      ...(domainParams.in !== undefined ? { in: domainParams.in } : {}),
      ...(domainParams.out !== undefined ? { out: domainParams.out } : {}),
    }),
    ...(domainRule !== undefined ? { domainRule } : {}),
    ...(offsetIncrement !== undefined ? { offsetIncrement } : {}),
  });
}

function loadRegistry(): Map<string, EndpointSpec> {
  if (cachedRegistry) {
    return cachedRegistry;
  }

  const moduleDir = dirname(fileURLToPath(import.meta.url));
  const raw: unknown = JSON.parse(readFileSync(join(moduleDir, '..', 'data', 'endpoints.json'), 'utf-8'));
  const entries = registrySchema.parse(raw);

  cachedRegistry = new Map(entries.map((entry) => [entry.kind, toEndpointSpec(entry)]));
  return cachedRegistry;
}

/**
 * Looks up an endpoint by kind.
 *
 * @throws ValidationError for unknown kinds
 */
export function getEndpoint(kind: string): EndpointSpec {
  const endpoint = loadRegistry().get(kind);
  if (!endpoint) {
    throw new ValidationError(`Unknown endpoint '${kind}'`, {
      endpoint: kind,
      available: [...loadRegistry().keys()],
    });
  }
  return endpoint;
}

export function listEndpoints(): EndpointSpec[] {
  return [...loadRegistry().values()];
}

/**
 * Checks a query against its endpoint before anything is sent.
 *
 * @throws ValidationError when a required parameter or domain is missing, or
 * the domains break the endpoint's equality rule
 */
export function validateQuery(query: Query, endpoint: EndpointSpec): void {
  const missing = endpoint.requiredParams.filter((name) => !(name in query.params));
  if (missing.length > 0) {
    throw new ValidationError(`Missing required parameters for ${endpoint.kind}: ${missing.join(', ')}`, {
      endpoint: endpoint.kind,
      missing,
    });
  }

  if (endpoint.domainParams.in !== undefined && query.inDomain === undefined) {
    throw new ValidationError(`${endpoint.kind} requires inDomain (sent as ${endpoint.domainParams.in})`, {
      endpoint: endpoint.kind,
      field: 'inDomain',
    });
  }

  if (endpoint.domainParams.out !== undefined && query.outDomain === undefined) {
    throw new ValidationError(`${endpoint.kind} requires outDomain (sent as ${endpoint.domainParams.out})`, {
      endpoint: endpoint.kind,
      field: 'outDomain',
    });
  }

  if (endpoint.domainRule === 'equal' && query.inDomain !== query.outDomain) {
    throw new ValidationError(`${endpoint.kind} requires inDomain and outDomain to be equal`, {
      endpoint: endpoint.kind,
      inDomain: query.inDomain,
      outDomain: query.outDomain,
    });
  }

  if (endpoint.domainRule === 'different' && query.inDomain === query.outDomain) {
    throw new ValidationError(`${endpoint.kind} requires inDomain and outDomain to differ`, {
      endpoint: endpoint.kind,
      inDomain: query.inDomain,
      outDomain: query.outDomain,
    });
  }
}

/**
 * Whether a chunk of this query is fetched page by page, and with which page size.
 */
export function pageIncrement(query: Query, endpoint: EndpointSpec): number | undefined {
  if (endpoint.offsetIncrement !== undefined) {
    return endpoint.offsetIncrement;
  }
  return 'offset' in query.params ? DEFAULT_OFFSET_INCREMENT : undefined;
}

/**
 * Splits over the update window when the query sets both update bounds.
 */
export function hasUpdateWindow(query: Query): boolean {
  return 'periodStartUpdate' in query.params && 'periodEndUpdate' in query.params;
}

/**
 * Builds the request parameters for one chunk.
 *
 * Order: document type, fixed parameters, domains, query params, period,
 * security token. The chunk range replaces the update window when the query
 * has one, otherwise the main period.
 *
 * @example
 * ```typescript
 * buildRequestParams(query, getEndpoint('day_ahead_prices'), chunk, apiKey);
 * // { documentType: 'A44', in_Domain: '...', out_Domain: '...',
 * //   periodStart: '202012312300', periodEnd: '202101012300', securityToken: '...' }
 * ```
 */
export function buildRequestParams(
  query: Query,
  endpoint: EndpointSpec,
  chunk: Chunk,
  apiKey: string
): Record<string, string> {
  const params: Record<string, string> = {
    documentType: endpoint.documentType,
    ...endpoint.fixedParams,
  };

  if (endpoint.domainParams.in !== undefined && query.inDomain !== undefined) {
    params[endpoint.domainParams.in] = query.inDomain;
  }
  if (endpoint.domainParams.out !== undefined && query.outDomain !== undefined) {
    params[endpoint.domainParams.out] = query.outDomain;
  }

  Object.assign(params, query.params);

  if (hasUpdateWindow(query)) {
    params['periodStart'] = formatApiDateTime(query.periodStart);
    params['periodEnd'] = formatApiDateTime(query.periodEnd);
    params['periodStartUpdate'] = formatApiDateTime(chunk.start);
    params['periodEndUpdate'] = formatApiDateTime(chunk.end);
  } else {
    params['periodStart'] = formatApiDateTime(chunk.start);
    params['periodEnd'] = formatApiDateTime(chunk.end);
  }

  params['securityToken'] = apiKey;
  return params;
}
