/**
 * @fileoverview Main logger factory for gridfeed
 * Creates configured Winston logger instances with structured logging,
 * secret redaction, and flexible transport options.
 */

import winston, { format } from 'winston';
import type { LoggerConfig, Logger } from './types.js';
import { LOG_LEVELS } from './types.js';
import { redactPII, standardFields, prettyPrint } from './formats.js';

/**
 * Creates a configured logger instance.
 *
 * - Standard fields (timestamp, level, message, query_id)
 * - Redaction of tokens, keys and secrets in metadata
 * - Console (stderr), file and stream transports
 * - JSON in production, pretty-print otherwise
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info', json: true });
 * logger.info('Query finished', { documents: 2, failures: 0 });
 * ```
 *
 * @example
 * ```typescript
 * const fetchLogger = createChildLogger(logger, { component: 'fetcher' });
 * fetchLogger.debug('Fetch attempt', { attempt: 1, outcome: 'Success' });
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
  const {
    level,
    json = process.env['NODE_ENV'] === 'production',
    filePath,
    console: enableConsole = true,
    stream,
  } = config;

  // Redaction must run before anything else sees the metadata
  const baseFormat = format.combine(redactPII(), standardFields);
  const outputFormat = json ? format.json() : prettyPrint;

  const transports: winston.transport[] = [];

  if (enableConsole) {
    transports.push(
      new winston.transports.Console({
        level,
        format: outputFormat,
        stderrLevels: [...LOG_LEVELS],
      })
    );
  }

  if (filePath) {
    transports.push(
      new winston.transports.File({
        filename: filePath,
        level,
        format: outputFormat,
        handleExceptions: false,
        handleRejections: false,
      })
    );
  }

  if (stream) {
    transports.push(
      new winston.transports.Stream({
        stream,
        level,
        format: outputFormat,
      })
    );
  }

  return winston.createLogger({
    level,
    format: baseFormat,
    transports,
    // A logger with every output disabled stays silent instead of warning about missing transports
    silent: transports.length === 0,
    exitOnError: false,
  });
}

/**
 * Creates a child logger with additional context fields included in every entry.
 *
 * @example
 * ```typescript
 * const orchestratorLogger = createChildLogger(logger, { component: 'orchestrator' });
 * ```
 */
export function createChildLogger(logger: Logger, context: Record<string, unknown>): Logger {
  return logger.child(context);
}
