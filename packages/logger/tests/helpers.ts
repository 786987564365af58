/**
 * @fileoverview In-memory log sink for tests
 */

import { Writable } from 'node:stream';
import type { LogEntry } from '../src/types.js';

export interface LineSink {
  stream: Writable;
  lines: string[];
  entries(): LogEntry[];
}

export function createLineSink(): LineSink {
  const lines: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      lines.push(...chunk.toString('utf-8').split('\n').filter((line) => line.length > 0));
      callback();
    },
  });

  return {
    stream,
    lines,
    entries: () => lines.map((line): LogEntry => JSON.parse(line)),
  };
}

/** Winston hands entries to its transports asynchronously */
export function flushLogs(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 20));
}
