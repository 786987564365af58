/**
 * @fileoverview Public API exports for @gridfeed/logger
 */

// Core logger creation
export { createLogger, createChildLogger } from './createLogger.js';

// Formats
export { redactPII, redactSensitiveFields, isSensitiveFieldName } from './formats.js';

// Query context management
export {
  generateQueryId,
  getQueryContext,
  getQueryId,
  withQueryContext,
} from './query-context.js';

// Performance timing
export { startTimer } from './perf-timer.js';

export { LOG_LEVELS } from './types.js';

export type { Logger, LoggerConfig, LogLevel, LogEntry } from './types.js';
export type { QueryContext } from './query-context.js';
export type { PerfTimer } from './perf-timer.js';
