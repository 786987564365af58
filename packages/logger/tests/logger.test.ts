/**
 * @fileoverview Tests for logger creation and basic functionality
 */

import { describe, it, expect } from 'vitest';
import { createLogger, createChildLogger } from '../src/createLogger.js';
import { withQueryContext } from '../src/query-context.js';
import type { LoggerConfig } from '../src/types.js';
import { createLineSink, flushLogs } from './helpers.js';

describe('createLogger', () => {
  it('should create a logger with basic configuration', () => {
    const config: LoggerConfig = {
      level: 'info',
      json: true,
      console: false,
    };

    const logger = createLogger(config);

    expect(logger.level).toBe('info');
  });

  it('should create a logger with all log levels', () => {
    const levels: LoggerConfig['level'][] = ['error', 'warn', 'info', 'debug'];

    for (const level of levels) {
      expect(createLogger({ level, console: false }).level).toBe(level);
    }
  });

  it('should write JSON lines with custom fields to a stream', async () => {
    const sink = createLineSink();
    const logger = createLogger({ level: 'info', json: true, console: false, stream: sink.stream });

    logger.info('Test message', { foo: 'bar' });
    await flushLogs();

    const [entry] = sink.entries();
    expect(sink.lines).toHaveLength(1);
    expect(entry?.message).toBe('Test message');
    expect(entry?.level).toBe('info');
    expect(entry?.['foo']).toBe('bar');
    expect(typeof entry?.timestamp).toBe('string');
  });

  it('should drop entries below the configured level', async () => {
    const sink = createLineSink();
    const logger = createLogger({ level: 'warn', json: true, console: false, stream: sink.stream });

    logger.debug('Hidden');
    logger.info('Hidden too');
    logger.warn('Shown');
    await flushLogs();

    expect(sink.entries().map((entry) => entry.message)).toEqual(['Shown']);
  });

  it('should create child logger with context', async () => {
    const sink = createLineSink();
    const logger = createLogger({ level: 'info', json: true, console: false, stream: sink.stream });

    createChildLogger(logger, { component: 'fetcher' }).info('Child log message');
    await flushLogs();

    expect(sink.entries()[0]?.component).toBe('fetcher');
  });

  it('should inject the active query context', async () => {
    const sink = createLineSink();
    const logger = createLogger({ level: 'info', json: true, console: false, stream: sink.stream });

    await withQueryContext(
      () => {
        logger.info('Inside query');
      },
      'query-123',
      { endpoint: 'day_ahead_prices' }
    );
    logger.info('Outside query');
    await flushLogs();

    const [inside, outside] = sink.entries();
    expect(inside?.query_id).toBe('query-123');
    expect(inside?.endpoint).toBe('day_ahead_prices');
    expect(outside?.query_id).toBeUndefined();
  });

  it('should not overwrite an explicit query_id', async () => {
    const sink = createLineSink();
    const logger = createLogger({ level: 'info', json: true, console: false, stream: sink.stream });

    await withQueryContext(() => {
      logger.info('Explicit', { query_id: 'explicit-id' });
    }, 'context-id');
    await flushLogs();

    expect(sink.entries()[0]?.query_id).toBe('explicit-id');
  });

  it('should pretty-print when json is disabled', async () => {
    const sink = createLineSink();
    const logger = createLogger({ level: 'info', json: false, console: false, stream: sink.stream });

    logger.info('Pretty message', { component: 'orchestrator', chunks: 2 });
    await flushLogs();

    expect(sink.lines[0]).toContain('Pretty message');
    expect(sink.lines[0]).toContain('component=orchestrator');
    expect(sink.lines[0]).toContain('chunks=2');
  });
});
