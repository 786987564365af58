/**
 * @fileoverview Stub transport, XML builders and log sink for client tests
 */

import { Writable } from 'node:stream';
import { resolveConfig, type ClientConfig, type ConfigOverrides } from '../src/config.js';
import type { Transport, TransportRequest, TransportResponse } from '../src/types.js';

/** Placeholder key with the UUID shape the client checks for */
export const TEST_API_KEY = '00000000-0000-4000-8000-000000000000';

/**
 * Resolves a config that ignores the real environment and never waits between retries.
 */
export function testConfig(overrides: ConfigOverrides = {}): ClientConfig {
  return resolveConfig({ apiKey: TEST_API_KEY, backoff: 0, ...overrides }, {});
}

export function xmlResponse(xml: string, status = 200): TransportResponse {
  return {
    status,
    headers: { 'content-type': 'text/xml' },
    body: new TextEncoder().encode(xml),
  };
}

export type StubHandler = (
  request: TransportRequest,
  callIndex: number
) => TransportResponse | Promise<TransportResponse>;

export interface StubTransport {
  transport: Transport;
  calls: TransportRequest[];
}

/**
 * Records every request and answers with `handler`.
 */
export function createStubTransport(handler: StubHandler): StubTransport {
  const calls: TransportRequest[] = [];
  return {
    calls,
    transport: {
      async send(request) {
        calls.push(request);
        return handler(request, calls.length - 1);
      },
    },
  };
}

/**
 * Never answers; rejects once the request's signal aborts, like fetch does.
 */
export function rejectOnAbort(request: TransportRequest): Promise<TransportResponse> {
  return new Promise((_resolve, reject) => {
    request.signal?.addEventListener('abort', () => reject(new Error('This operation was aborted')), { once: true });
  });
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface SeriesOptions {
  mrid: string;
  start: string;
  end: string;
  resolution?: string;
  quantities: number[];
}

/**
 * A generation-style publication document with one time series.
 */
export function seriesXml(options: SeriesOptions): string {
  const points = options.quantities
    .map((quantity, index) => `<Point><position>${index + 1}</position><quantity>${quantity}</quantity></Point>`)
    .join('');

  return `<?xml version="1.0" encoding="UTF-8"?>
<GL_MarketDocument xmlns="urn:iec62325.351:tc57wg16:451-6:generationloaddocument:3:0">
  <mRID>${options.mrid}</mRID>
  <type>A73</type>
  <TimeSeries>
    <mRID>1</mRID>
    <businessType>A01</businessType>
    <quantity_Measure_Unit.name>MAW</quantity_Measure_Unit.name>
    <Period>
      <timeInterval>
        <start>${options.start}</start>
        <end>${options.end}</end>
      </timeInterval>
      <resolution>${options.resolution ?? 'PT60M'}</resolution>
      ${points}
    </Period>
  </TimeSeries>
</GL_MarketDocument>`;
}

export function acknowledgementXml(reason: string): string {
  return `<?xml version="1.0" encoding="UTF-8"?>
<Acknowledgement_MarketDocument xmlns="urn:iec62325.351:tc57wg16:451-1:acknowledgementdocument:7:0">
  <mRID>ack-1</mRID>
  <Reason>
    <code>999</code>
    <text>${reason}</text>
  </Reason>
</Acknowledgement_MarketDocument>`;
}

export interface LineSink {
  stream: Writable;
  entries(): Array<Record<string, unknown>>;
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
    entries: () => lines.map((line): Record<string, unknown> => JSON.parse(line)),
  };
}

/** Winston hands entries to its transports asynchronously */
export function flushLogs(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 20));
}
