/**
 * @fileoverview Custom Winston formats for the gridfeed logger
 * Includes secret redaction, field normalization, output formatting, and query context injection.
 */

import { format } from 'winston';
import { getQueryContext } from './query-context.js';

/**
 * Field name patterns whose values must never reach a log sink.
 * Matching is case-insensitive, so `securityToken`, `apiKey` and `API_KEY` are all caught.
 */
const SENSITIVE_FIELD_PATTERNS = [
  /password/i,
  /passwd/i,
  /secret/i,
  /api[_-]?key/i,
  /token/i,
  /authorization/i,
  /private[_-]?key/i,
];

const REDACTED = '[REDACTED]';

/**
 * Core Winston fields that are never redacted.
 */
const CORE_FIELDS = ['level', 'message', 'timestamp', 'label'];

export function isSensitiveFieldName(key: string): boolean {
  return SENSITIVE_FIELD_PATTERNS.some((pattern) => pattern.test(key));
}

/**
 * Returns a copy of `value` with sensitive fields replaced, recursing into
 * arrays and plain objects. Errors are passed through untouched.
 *
 * @example
 * ```typescript
 * redactSensitiveFields({ documentType: 'A44', securityToken: 'test-secret' });
 * // { documentType: 'A44', securityToken: '[REDACTED]' }
 * ```
 */
export function redactSensitiveFields(value: unknown): unknown {
  if (value === null || typeof value !== 'object' || value instanceof Error) {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map((item: unknown) => redactSensitiveFields(item));
  }

  const redacted: Record<string, unknown> = {};
  for (const [key, item] of Object.entries(value)) {
    redacted[key] = isSensitiveFieldName(key) ? REDACTED : redactSensitiveFields(item);
  }
  return redacted;
}

/**
 * Winston format that redacts sensitive fields from log metadata.
 * Must run first in the format chain.
 *
 * @example
 * ```typescript
 * logger.debug('Sending request', { params: { securityToken: 'test-secret' } });
 * // {"level":"debug","message":"Sending request","params":{"securityToken":"[REDACTED]"}}
 * ```
 */
export const redactPII = format((info) => {
  const redacted = { ...info };

  for (const key of Object.keys(redacted)) {
    if (CORE_FIELDS.includes(key)) {
      continue;
    }
    redacted[key] = isSensitiveFieldName(key) ? REDACTED : redactSensitiveFields(redacted[key]);
  }

  return redacted;
});

/**
 * Winston format that adds the timestamp, expands errors, and injects the
 * fields of the active query context (query_id, endpoint).
 */
export const standardFields = format.combine(
  format.timestamp(),

  format.errors({ stack: true }),

  format((info) => {
    const context = getQueryContext();
    if (context) {
      for (const [key, value] of Object.entries(context)) {
        if (info[key] === undefined) {
          info[key] = value;
        }
      }
    }
    return info;
  })()
);

/**
 * Winston format for human-readable output.
 *
 * @example
 * ```typescript
 * // [2025-01-15T12:34:56.789Z] debug: Fetch attempt query_id=4f1c... attempt=1 outcome="Success"
 * ```
 */
export const prettyPrint = format.combine(
  format.colorize(),
  format.printf((info) => {
    const { timestamp, level, message, component, query_id, stack, ...rest } = info;

    const context: string[] = [];
    if (component) context.push(`component=${String(component)}`);
    if (query_id) context.push(`query_id=${String(query_id)}`);

    for (const [key, value] of Object.entries(rest)) {
      context.push(`${key}=${JSON.stringify(value)}`);
    }

    const contextStr = context.length > 0 ? ` ${context.join(' ')}` : '';
    const baseMsg = `[${String(timestamp)}] ${level}: ${String(message)}${contextStr}`;

    if (typeof stack === 'string') {
      return `${baseMsg}\n${stack}`;
    }

    return baseMsg;
  })
);
