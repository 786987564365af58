/**
 * @fileoverview Tests for configuration resolution and backoff strategies
 */

import { describe, it, expect } from 'vitest';
import { AuthenticationError, ValidationError } from '@gridfeed/contracts';
import {
  DEFAULT_BASE_URL,
  constantBackoff,
  exponentialBackoff,
  resolveConfig,
  validateApiKey,
} from '../src/config.js';
import { TEST_API_KEY } from './helpers.js';

describe('resolveConfig', () => {
  it('should apply defaults', () => {
    const config = resolveConfig({}, {});

    expect(config.apiKey).toBeUndefined();
    expect(config.baseUrl).toBe(DEFAULT_BASE_URL);
    expect(config.timeoutMs).toBe(5000);
    expect(config.maxRetries).toBe(5);
    expect(config.workerCount).toBe(4);
    expect(config.logLevel).toBe('warn');
    expect([1, 2, 3, 7].map(config.backoff)).toEqual([1000, 2000, 4000, 60000]);
  });

  it('should read the environment', () => {
    const config = resolveConfig(
      {},
      {
        GRIDFEED_API_KEY: TEST_API_KEY,
        GRIDFEED_TIMEOUT_MS: '2500',
        GRIDFEED_MAX_RETRIES: '2',
        GRIDFEED_RETRY_BASE_MS: '10',
        GRIDFEED_RETRY_MAX_MS: '30',
        GRIDFEED_WORKERS: '8',
        LOG_LEVEL: 'debug',
      }
    );

    expect(config.apiKey).toBe(TEST_API_KEY);
    expect(config.timeoutMs).toBe(2500);
    expect(config.maxRetries).toBe(2);
    expect(config.workerCount).toBe(8);
    expect(config.logLevel).toBe('debug');
    expect([1, 2, 3].map(config.backoff)).toEqual([10, 20, 30]);
  });

  it('should prefer explicit settings over the environment', () => {
    const config = resolveConfig(
      { maxRetries: 0, workerCount: 1 },
      { GRIDFEED_MAX_RETRIES: '9', GRIDFEED_WORKERS: '16' }
    );

    expect(config.maxRetries).toBe(0);
    expect(config.workerCount).toBe(1);
  });

  it('should ignore empty environment values', () => {
    const config = resolveConfig({}, { GRIDFEED_BASE_URL: '', GRIDFEED_WORKERS: '' });

    expect(config.baseUrl).toBe(DEFAULT_BASE_URL);
    expect(config.workerCount).toBe(4);
  });

  it('should accept a constant delay or a custom strategy', () => {
    expect(resolveConfig({ backoff: 250 }, {}).backoff(4)).toBe(250);
    expect(resolveConfig({ backoff: (attempt) => attempt * 7 }, {}).backoff(3)).toBe(21);
  });

  it('should return a frozen value', () => {
    expect(Object.isFrozen(resolveConfig({}, {}))).toBe(true);
  });

  it('should list every invalid field', () => {
    try {
      resolveConfig({ workerCount: 0 }, { GRIDFEED_TIMEOUT_MS: 'soon', LOG_LEVEL: 'verbose' });
      expect.unreachable('resolveConfig should throw');
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.message).toMatch(/^Configuration validation failed:/);
        expect(error.message).toContain('timeoutMs:');
        expect(error.message).toContain('workerCount:');
        expect(error.message).toContain('logLevel:');
      }
    }
  });
});

describe('exponentialBackoff', () => {
  it('should double from the base and cap at the maximum', () => {
    const backoff = exponentialBackoff({ baseDelayMs: 100, maxDelayMs: 500 });

    expect([1, 2, 3, 4, 5].map(backoff)).toEqual([100, 200, 400, 500, 500]);
  });

  it('should scale by a jitter factor between 0.5 and 1', () => {
    const low = exponentialBackoff({ baseDelayMs: 100, maxDelayMs: 1000, jitter: true, random: () => 0 });
    const high = exponentialBackoff({ baseDelayMs: 100, maxDelayMs: 1000, jitter: true, random: () => 0.5 });

    expect(low(2)).toBe(100);
    expect(high(2)).toBe(150);
  });
});

describe('constantBackoff', () => {
  it('should return the same delay for every attempt', () => {
    const backoff = constantBackoff(30);

    expect([1, 2, 10].map(backoff)).toEqual([30, 30, 30]);
  });
});

describe('validateApiKey', () => {
  it('should accept a UUID', () => {
    expect(validateApiKey(TEST_API_KEY)).toBe(TEST_API_KEY);
    expect(validateApiKey(`  ${TEST_API_KEY} `)).toBe(TEST_API_KEY);
  });

  it('should reject a missing key', () => {
    expect(() => validateApiKey(undefined)).toThrow(AuthenticationError);
    expect(() => validateApiKey('   ')).toThrow('API key is missing; set GRIDFEED_API_KEY or pass apiKey');
  });

  it('should reject a key that is not a UUID', () => {
    expect(() => validateApiKey('test-secret')).toThrow('API key must be a UUID');
  });
});
