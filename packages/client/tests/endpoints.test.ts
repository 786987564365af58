/**
 * @fileoverview Tests for the endpoint registry and request parameters
 */

import { describe, it, expect } from 'vitest';
import { ValidationError } from '@gridfeed/contracts';
import { createQuery } from '@gridfeed/query-core';
import {
  buildRequestParams,
  getEndpoint,
  listEndpoints,
  pageIncrement,
  validateQuery,
} from '../src/endpoints.js';
import { TEST_API_KEY } from './helpers.js';

const CZ = '10YCZ-CEPS-----N';
const DE = '10Y1001A1001A83F';

describe('endpoint registry', () => {
  it('should load every entry with defaults applied', () => {
    const endpoints = listEndpoints();

    expect(endpoints).toHaveLength(67);
    expect(new Set(endpoints.map((endpoint) => endpoint.kind)).size).toBe(endpoints.length);
  });

  it('should describe day-ahead prices', () => {
    expect(getEndpoint('day_ahead_prices')).toEqual({
      kind: 'day_ahead_prices',
      title: 'Energy prices (day-ahead)',
      article: '12.1.D',
      documentType: 'A44',
      fixedParams: {},
      maxSpanDays: 365,
      httpMethod: 'GET',
      domainParams: { in: 'in_Domain', out: 'out_Domain' },
      domainRule: 'equal',
      requiredParams: [],
    });
  });

  it('should carry endpoint-specific span limits and page sizes', () => {
    expect(getEndpoint('actual_generation_per_generation_unit').maxSpanDays).toBe(1);
    expect(getEndpoint('installed_capacity_per_production_type').maxSpanDays).toBe(36500);
    expect(getEndpoint('production_and_generation_units').maxSpanDays).toBe(36500);
    expect(getEndpoint('generation_unit_unavailability').offsetIncrement).toBe(200);
  });

  it('should cover reserve capacity and implementation framework endpoints', () => {
    expect(getEndpoint('fcr_total_capacity')).toMatchObject({
      article: '187.2',
      documentType: 'A26',
      fixedParams: { businessType: 'A25' },
      domainParams: { in: 'area_Domain' },
    });
    expect(getEndpoint('exchanged_reserve_capacity')).toMatchObject({
      fixedParams: { processType: 'A46', businessType: 'C21' },
      domainParams: { in: 'acquiring_Domain', out: 'connecting_Domain' },
      domainRule: 'different',
      offsetIncrement: 100,
    });
    expect(getEndpoint('bid_availability_changes').domainParams).toEqual({ in: 'Domain' });
    expect(getEndpoint('frr_rr_actual_capacity').requiredParams).toEqual(['processType', 'businessType']);
    expect(getEndpoint('implicit_auction_net_positions')).toMatchObject({
      documentType: 'A25',
      fixedParams: { businessType: 'B09', 'contract_MarketAgreement.Type': 'A07' },
      domainRule: 'equal',
    });
  });

  it('should hand out entries that cannot be changed', () => {
    const endpoint = getEndpoint('day_ahead_prices');

    expect(Object.isFrozen(endpoint)).toBe(true);
    expect(Object.isFrozen(endpoint.fixedParams)).toBe(true);
    expect(Object.isFrozen(endpoint.domainParams)).toBe(true);
    expect(Object.isFrozen(endpoint.requiredParams)).toBe(true);
    expect(Reflect.set(endpoint, 'maxSpanDays', 1)).toBe(false);
    expect(getEndpoint('day_ahead_prices').maxSpanDays).toBe(365);
  });

  it('should let query params override a default sent with the endpoint', () => {
    const query = createQuery({
      endpoint: 'implicit_auction_net_positions',
      inDomain: CZ,
      outDomain: CZ,
      periodStart: '202101010000',
      periodEnd: '202101020000',
      params: { 'contract_MarketAgreement.Type': 'A01' },
    });
    const chunk = { sequenceIndex: 0, start: query.periodStart, end: query.periodEnd };

    expect(
      buildRequestParams(query, getEndpoint('implicit_auction_net_positions'), chunk, TEST_API_KEY)[
        'contract_MarketAgreement.Type'
      ]
    ).toBe('A01');
  });

  it('should reject unknown kinds', () => {
    expect(() => getEndpoint('weather')).toThrow("Unknown endpoint 'weather'");
  });
});

describe('validateQuery', () => {
  const period = { periodStart: '202012312300', periodEnd: '202101022300' };

  it('should accept equal domains where they must match', () => {
    const query = createQuery({ endpoint: 'day_ahead_prices', inDomain: CZ, outDomain: CZ, ...period });

    expect(() => validateQuery(query, getEndpoint('day_ahead_prices'))).not.toThrow();
  });

  it('should reject differing domains where they must match', () => {
    const query = createQuery({ endpoint: 'day_ahead_prices', inDomain: CZ, outDomain: DE, ...period });

    expect(() => validateQuery(query, getEndpoint('day_ahead_prices'))).toThrow(
      'day_ahead_prices requires inDomain and outDomain to be equal'
    );
  });

  it('should reject equal domains where they must differ', () => {
    const query = createQuery({ endpoint: 'cross_border_physical_flows', inDomain: CZ, outDomain: CZ, ...period });

    expect(() => validateQuery(query, getEndpoint('cross_border_physical_flows'))).toThrow(
      'cross_border_physical_flows requires inDomain and outDomain to differ'
    );
  });

  it('should require the domains the endpoint sends', () => {
    const query = createQuery({ endpoint: 'actual_total_load', ...period });

    expect(() => validateQuery(query, getEndpoint('actual_total_load'))).toThrow(
      'actual_total_load requires outDomain (sent as outBiddingZone_Domain)'
    );
  });

  it('should list missing required parameters', () => {
    const query = createQuery({ endpoint: 'contracted_reserves', inDomain: CZ, ...period });

    try {
      validateQuery(query, getEndpoint('contracted_reserves'));
      expect.unreachable('validateQuery should throw');
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.message).toBe(
          'Missing required parameters for contracted_reserves: processType, type_MarketAgreement.Type'
        );
      }
    }
  });
});

describe('buildRequestParams', () => {
  it('should send the chunk range, domains and security token', () => {
    const query = createQuery({
      endpoint: 'actual_total_load',
      outDomain: CZ,
      periodStart: '202012312300',
      periodEnd: '202101022300',
    });
    const chunk = { sequenceIndex: 1, start: Date.UTC(2021, 0, 1, 23), end: Date.UTC(2021, 0, 2, 23) };

    expect(buildRequestParams(query, getEndpoint('actual_total_load'), chunk, TEST_API_KEY)).toEqual({
      documentType: 'A65',
      processType: 'A16',
      outBiddingZone_Domain: CZ,
      periodStart: '202101012300',
      periodEnd: '202101022300',
      securityToken: TEST_API_KEY,
    });
  });

  it('should pass query params through', () => {
    const query = createQuery({
      endpoint: 'generation_forecast_wind_solar',
      inDomain: DE,
      periodStart: '202101010000',
      periodEnd: '202101020000',
      params: { processType: 'A18', psrType: 'B16' },
    });
    const chunk = { sequenceIndex: 0, start: query.periodStart, end: query.periodEnd };
    const params = buildRequestParams(query, getEndpoint('generation_forecast_wind_solar'), chunk, TEST_API_KEY);

    expect(params['processType']).toBe('A18');
    expect(params['psrType']).toBe('B16');
    expect(params['in_Domain']).toBe(DE);
  });

  it('should place the chunk in the update window when the query has one', () => {
    const query = createQuery({
      endpoint: 'generation_unit_unavailability',
      inDomain: DE,
      periodStart: '202101010000',
      periodEnd: '202112310000',
      params: { periodStartUpdate: '202106010000', periodEndUpdate: '202106030000' },
    });
    const chunk = { sequenceIndex: 0, start: Date.UTC(2021, 5, 1), end: Date.UTC(2021, 5, 2) };
    const params = buildRequestParams(query, getEndpoint('generation_unit_unavailability'), chunk, TEST_API_KEY);

    expect(params['periodStart']).toBe('202101010000');
    expect(params['periodEnd']).toBe('202112310000');
    expect(params['periodStartUpdate']).toBe('202106010000');
    expect(params['periodEndUpdate']).toBe('202106020000');
  });
});

describe('pageIncrement', () => {
  const period = { periodStart: '202101010000', periodEnd: '202101020000' };

  it('should page endpoints with an offset increment', () => {
    const query = createQuery({ endpoint: 'generation_unit_unavailability', inDomain: DE, ...period });

    expect(pageIncrement(query, getEndpoint('generation_unit_unavailability'))).toBe(200);
  });

  it('should page other endpoints only when the query sets an offset', () => {
    const plain = createQuery({ endpoint: 'imbalance_prices', inDomain: DE, ...period });
    const paged = createQuery({ endpoint: 'imbalance_prices', inDomain: DE, ...period, params: { offset: '0' } });

    expect(pageIncrement(plain, getEndpoint('imbalance_prices'))).toBeUndefined();
    expect(pageIncrement(paged, getEndpoint('imbalance_prices'))).toBe(100);
  });
});
