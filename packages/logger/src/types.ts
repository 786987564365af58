/**
 * @fileoverview Type definitions for the gridfeed logger.
 */

import type { Logger as WinstonLogger } from 'winston';

/**
 * Supported log levels, most severe first.
 */
export const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;

/**
 * Log level determines the minimum severity of messages that will be logged.
 * - 'error': Failures that abort a query
 * - 'warn': Chunk failures, retries, records that could not be timestamped
 * - 'info': Query start/finish summaries
 * - 'debug': Every transport attempt and decoder decision
 */
export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Configuration options for creating a logger instance.
 *
 * @example
 * ```typescript
 * const config: LoggerConfig = {
 *   level: 'info',
 *   json: process.env['NODE_ENV'] === 'production',
 *   filePath: './logs/gridfeed.log'
 * };
 * ```
 */
export interface LoggerConfig {
  /**
   * Minimum log level to output.
   */
  level: LogLevel;

  /**
   * Whether to output logs in JSON format.
   * @default true in production, false otherwise
   */
  json?: boolean;

  /**
   * Optional file path for file transport.
   */
  filePath?: string;

  /**
   * Whether to enable console output. Console output goes to stderr so that
   * stdout stays free for query results.
   * @default true
   */
  console?: boolean;

  /**
   * Optional writable stream that receives every formatted log line.
   */
  stream?: NodeJS.WritableStream;
}

/**
 * Structured log entry with standard fields.
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;

  /** Correlation id shared by every log line of one query */
  query_id?: string;

  /** Component or module name (typically from child logger) */
  component?: string;

  /** Endpoint kind being queried */
  endpoint?: string;

  /** Chunk range, ISO 8601 */
  chunk_start?: string;
  chunk_end?: string;

  sequence_index?: number;

  /** 1-based transport attempt number */
  attempt?: number;

  /** Attempt or query outcome (e.g., 'Success', 'TransientNetwork', 'partial') */
  outcome?: string;

  duration_ms?: number;

  status_code?: number;

  [key: string]: unknown;
}

/**
 * Re-export Winston's Logger type for convenience.
 */
export type Logger = WinstonLogger;
