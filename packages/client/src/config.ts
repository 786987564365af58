/**
 * @fileoverview Client configuration.
 *
 * Values are resolved in order: explicit overrides, then environment
 * variables, then schema defaults. The result is frozen and passed
 * explicitly into every query; nothing reads it from global state.
 *
 * @module @gridfeed/client/config
 */

import { z } from 'zod';
import { AuthenticationError, ValidationError } from '@gridfeed/contracts';
import { LOG_LEVELS, type LogLevel } from '@gridfeed/logger';
import type { BackoffStrategy } from './types.js';

export const DEFAULT_BASE_URL = 'https://web-api.tp.entsoe.eu/api';

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

const booleanFromEnv = z.preprocess(
  (value) => (value === 'true' ? true : value === 'false' ? false : value),
  z.boolean()
);

/**
 * Client configuration schema
 */
export const configSchema = z.object({
  apiKey: z.string().min(1).optional(),
  baseUrl: z.string().url().default(DEFAULT_BASE_URL),
  timeoutMs: z.coerce.number().int().positive().default(5000),
  maxRetries: z.coerce.number().int().min(0).default(5),
  retryBaseDelayMs: z.coerce.number().min(0).default(1000),
  retryMaxDelayMs: z.coerce.number().min(0).default(60000),
  retryJitter: booleanFromEnv.default(false),
  workerCount: z.coerce.number().int().min(1).max(64).default(4),
  logLevel: z.enum(LOG_LEVELS).default('warn'),
});

type RawConfig = z.input<typeof configSchema>;
type ConfigField = keyof RawConfig;

/**
 * Environment variable to config field mapping
 */
export const envMapping: Readonly<Record<string, ConfigField>> = {
  GRIDFEED_API_KEY: 'apiKey',
  GRIDFEED_BASE_URL: 'baseUrl',
  GRIDFEED_TIMEOUT_MS: 'timeoutMs',
  GRIDFEED_MAX_RETRIES: 'maxRetries',
  GRIDFEED_RETRY_BASE_MS: 'retryBaseDelayMs',
  GRIDFEED_RETRY_MAX_MS: 'retryMaxDelayMs',
  GRIDFEED_RETRY_JITTER: 'retryJitter',
  GRIDFEED_WORKERS: 'workerCount',
  LOG_LEVEL: 'logLevel',
};

/**
 * Resolved, immutable configuration.
 */
export interface ClientConfig {
  readonly apiKey: string | undefined;
  readonly baseUrl: string;
  readonly timeoutMs: number;
  /** Retries after the first attempt; a chunk makes at most maxRetries + 1 calls */
  readonly maxRetries: number;
  readonly backoff: BackoffStrategy;
  readonly workerCount: number;
  readonly logLevel: LogLevel;
}

export interface ConfigOverrides {
  apiKey?: string;
  baseUrl?: string;
  timeoutMs?: number;
  maxRetries?: number;
  /** A strategy, or a constant delay in milliseconds */
  backoff?: BackoffStrategy | number;
  retryBaseDelayMs?: number;
  retryMaxDelayMs?: number;
  retryJitter?: boolean;
  workerCount?: number;
  logLevel?: LogLevel;
}

export interface ExponentialBackoffOptions {
  baseDelayMs: number;
  maxDelayMs: number;
  /** Scale each delay by a random factor in [0.5, 1) */
  jitter?: boolean;
  /** Source of randomness in [0, 1) */
  random?: () => number;
}

/**
 * `min(base * 2^(attempt - 1), max)`, optionally jittered.
 *
 * @example
 * ```typescript
 * const backoff = exponentialBackoff({ baseDelayMs: 1000, maxDelayMs: 60000 });
 * backoff(1); // 1000
 * backoff(3); // 4000
 * ```
 */
export function exponentialBackoff(options: ExponentialBackoffOptions): BackoffStrategy {
  const { baseDelayMs, maxDelayMs, jitter = false, random = Math.random } = options;

  return (attempt: number): number => {
    const delay = Math.min(baseDelayMs * Math.pow(2, Math.max(attempt - 1, 0)), maxDelayMs);
    return jitter ? delay * (0.5 + random() / 2) : delay;
  };
}

export function constantBackoff(delayMs: number): BackoffStrategy {
  return () => delayMs;
}

/**
 * Checks that an API key is present and has the UUID shape the platform issues.
 *
 * @throws AuthenticationError when the key is missing or malformed
 */
export function validateApiKey(apiKey: string | undefined): string {
  if (apiKey === undefined || apiKey.trim() === '') {
    throw new AuthenticationError('API key is missing; set GRIDFEED_API_KEY or pass apiKey');
  }
  if (!UUID_PATTERN.test(apiKey.trim())) {
    throw new AuthenticationError('API key must be a UUID');
  }
  return apiKey.trim();
}

/**
 * Resolves the client configuration.
 *
 * @param overrides - Explicit settings; undefined fields fall through
 * @param env - Environment to read, process.env by default
 * @throws ValidationError listing every invalid field
 *
 * @example
 * ```typescript
 * const config = resolveConfig({ workerCount: 2 });
 * config.maxRetries; // 5, unless GRIDFEED_MAX_RETRIES is set
 * ```
 */
export function resolveConfig(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): ClientConfig {
  const raw: Record<string, unknown> = {};

  for (const [envKey, field] of Object.entries(envMapping)) {
    const value = env[envKey];
    if (value !== undefined && value !== '') {
      raw[field] = value;
    }
  }

  const { backoff, ...settings } = overrides;
  for (const [field, value] of Object.entries(settings)) {
    if (value !== undefined) {
      raw[field] = value;
    }
  }

  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.errors.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ValidationError(`Configuration validation failed:\n${issues.join('\n')}`, { issues });
  }

  const config = result.data;

  return Object.freeze({
    apiKey: config.apiKey,
    baseUrl: config.baseUrl,
    timeoutMs: config.timeoutMs,
    maxRetries: config.maxRetries,
    backoff:
      typeof backoff === 'function'
        ? backoff
        : typeof backoff === 'number'
          ? constantBackoff(backoff)
          : exponentialBackoff({
              baseDelayMs: config.retryBaseDelayMs,
              maxDelayMs: config.retryMaxDelayMs,
              jitter: config.retryJitter,
            }),
    workerCount: config.workerCount,
    logLevel: config.logLevel,
  });
}
