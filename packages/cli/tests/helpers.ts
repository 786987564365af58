/**
 * @fileoverview In-memory IO and a canned transport for CLI tests
 */

import { GridfeedClient, type Transport, type TransportRequest } from '@gridfeed/client';
import { createLogger } from '@gridfeed/logger';
import type { CliIO } from '../src/program.js';

export const TEST_API_KEY = '00000000-0000-4000-8000-000000000000';

const ANSI = /\u001b\[[0-9;]*m/g;

export function stripAnsi(text: string): string {
  return text.replace(ANSI, '');
}

export interface CapturedIO {
  io: CliIO;
  stdout: string[];
  stderr: string[];
  requests: TransportRequest[];
}

/**
 * Captures output and builds every client on `respond`, with a silent logger.
 */
export function captureIO(respond: (request: TransportRequest) => string, env: NodeJS.ProcessEnv = {}): CapturedIO {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const requests: TransportRequest[] = [];

  const transport: Transport = {
    async send(request) {
      requests.push(request);
      return {
        status: 200,
        headers: { 'content-type': 'text/xml' },
        body: new TextEncoder().encode(respond(request)),
      };
    },
  };

  return {
    stdout,
    stderr,
    requests,
    io: {
      stdout: (text) => stdout.push(text),
      stderr: (text) => stderr.push(stripAnsi(text)),
      env: { GRIDFEED_API_KEY: TEST_API_KEY, ...env },
      createClient: (config) =>
        new GridfeedClient({
          config,
          transport,
          logger: createLogger({ level: 'error', console: false }),
        }),
    },
  };
}

export function seriesXml(start: string, end: string, quantities: number[]): string {
  const points = quantities
    .map((quantity, index) => `<Point><position>${index + 1}</position><quantity>${quantity}</quantity></Point>`)
    .join('');

  return `<GL_MarketDocument>
  <mRID>doc-${start}</mRID>
  <TimeSeries>
    <mRID>1</mRID>
    <businessType>A01</businessType>
    <Period>
      <timeInterval><start>${start}</start><end>${end}</end></timeInterval>
      <resolution>PT60M</resolution>
      ${points}
    </Period>
  </TimeSeries>
</GL_MarketDocument>`;
}
