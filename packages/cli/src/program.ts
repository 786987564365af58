/**
 * gridfeed command-line program
 *
 * Commands:
 *   gridfeed endpoints [--json]
 *   gridfeed query <endpoint> --start <t> --end <t> [--in <eic>] [--out <eic>]
 *                  [--param k=v ...] [--format json|csv] [--timestamps] [--domain <key>]
 *
 * Records go to stdout; the summary, logs and errors go to stderr.
 *
 * EXIT CODES:
 *   0 - Every chunk succeeded
 *   1 - Error (invalid usage, configuration, authentication, query)
 *   2 - Partial coverage: some chunks failed, the rest were printed
 */

import { Command, CommanderError, InvalidArgumentError, Option } from 'commander';
import chalk from 'chalk';
import {
  GridfeedClient,
  listEndpoints,
  resolveConfig,
  type ClientConfig,
  type ConfigOverrides,
} from '@gridfeed/client';
import { isGridfeedError } from '@gridfeed/contracts';
import { createLogger, type Logger } from '@gridfeed/logger';
import { addTimestamps, createQuery, extractRecords } from '@gridfeed/query-core';
import { formatCsv } from './formatters/csv.js';
import { formatEndpointTable, formatSummary } from './formatters/summary.js';

export const EXIT_COMPLETE = 0;
export const EXIT_ERROR = 1;
export const EXIT_PARTIAL = 2;

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  env: NodeJS.ProcessEnv;
  signal?: AbortSignal;
  /** Builds the client for a resolved config; tests inject a stub transport here */
  createClient?: (config: ClientConfig, logger: Logger) => GridfeedClient;
}

interface QueryCommandOptions {
  start: string;
  end: string;
  in?: string;
  out?: string;
  param: Record<string, string>;
  format: 'json' | 'csv';
  timestamps: boolean;
  domain?: string;
  apiKey?: string;
  workers?: number;
  maxRetries?: number;
  logLevel?: ClientConfig['logLevel'];
}

function collectParam(value: string, previous: Record<string, string>): Record<string, string> {
  const separator = value.indexOf('=');
  if (separator <= 0) {
    throw new InvalidArgumentError(`Expected key=value, got '${value}'`);
  }
  return { ...previous, [value.slice(0, separator)]: value.slice(separator + 1) };
}

function parseCount(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError(`Expected a non-negative integer, got '${value}'`);
  }
  return parsed;
}

function toOverrides(options: QueryCommandOptions): ConfigOverrides {
  return {
    ...(options.apiKey !== undefined ? { apiKey: options.apiKey } : {}),
    ...(options.workers !== undefined ? { workerCount: options.workers } : {}),
    ...(options.maxRetries !== undefined ? { maxRetries: options.maxRetries } : {}),
    ...(options.logLevel !== undefined ? { logLevel: options.logLevel } : {}),
  };
}

async function runQuery(endpoint: string, options: QueryCommandOptions, io: CliIO): Promise<number> {
  const config = resolveConfig(toOverrides(options), io.env);
  const logger = createLogger({ level: config.logLevel });
  const client = io.createClient
    ? io.createClient(config, logger)
    : new GridfeedClient({ config, logger });

  const query = createQuery({
    endpoint,
    inDomain: options.in,
    outDomain: options.out,
    periodStart: options.start,
    periodEnd: options.end,
    params: options.param,
  });

  const result = await client.query(query, io.signal ? { signal: io.signal } : {});

  const extracted = extractRecords(result, {
    logger,
    ...(options.domain !== undefined ? { domain: options.domain } : {}),
  });
  const records = options.timestamps ? addTimestamps(extracted, { logger }) : extracted;

  io.stdout(options.format === 'csv' ? formatCsv(records) : JSON.stringify(records, null, 2));
  io.stderr(formatSummary(result, records.length));

  return result.coverage === 'complete' ? EXIT_COMPLETE : EXIT_PARTIAL;
}

/**
 * Builds the program. The exit code of the last command run is written to
 * `state.exitCode`.
 */
export function createProgram(io: CliIO, state: { exitCode: number }): Command {
  const program = new Command();

  program
    .name('gridfeed')
    .description('Query electricity market time series in chunks, with retries')
    .version('0.1.0')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.stdout(text.trimEnd()),
      writeErr: (text) => io.stderr(text.trimEnd()),
    });

  program
    .command('endpoints')
    .description('List the endpoints that can be queried')
    .option('--json', 'Print the registry as JSON', false)
    .action((options: { json: boolean }) => {
      const endpoints = listEndpoints();
      io.stdout(options.json ? JSON.stringify(endpoints, null, 2) : formatEndpointTable(endpoints));
      state.exitCode = EXIT_COMPLETE;
    });

  program
    .command('query')
    .description('Fetch an endpoint over a period and print flat records')
    .argument('<endpoint>', 'Endpoint kind, see `gridfeed endpoints`')
    .requiredOption('-s, --start <time>', 'Period start: YYYYMMDDHHMM (UTC) or ISO 8601')
    .requiredOption('-e, --end <time>', 'Period end: YYYYMMDDHHMM (UTC) or ISO 8601')
    .option('-i, --in <eic>', 'In domain (area EIC code)')
    .option('-o, --out <eic>', 'Out domain (area EIC code)')
    .option('-p, --param <key=value>', 'Extra API parameter, repeatable', collectParam, {})
    .addOption(new Option('-f, --format <format>', 'Output format').choices(['json', 'csv']).default('json'))
    .option('-t, --timestamps', 'Derive a timestamp for every point', false)
    .option('-d, --domain <key>', 'Flatten from this top-level field, e.g. time_series')
    .option('--api-key <key>', 'API key (defaults to GRIDFEED_API_KEY)')
    .option('--workers <n>', 'Concurrent requests', parseCount)
    .option('--max-retries <n>', 'Retries per chunk on transient failures', parseCount)
    .addOption(new Option('--log-level <level>', 'Log level').choices(['error', 'warn', 'info', 'debug']))
    .action(async (endpoint: string, options: QueryCommandOptions) => {
      state.exitCode = await runQuery(endpoint, options, io);
    });

  return program;
}

/**
 * Runs the CLI and resolves with its exit code. Never throws.
 *
 * @param argv - Arguments after the executable and script name
 */
export async function runCli(argv: string[], io: CliIO): Promise<number> {
  const state = { exitCode: EXIT_COMPLETE };
  const program = createProgram(io, state);

  try {
    await program.parseAsync(argv, { from: 'user' });
    return state.exitCode;
  } catch (error) {
    if (error instanceof CommanderError) {
      // help and version exit through here with code 0
      return error.exitCode === 0 ? EXIT_COMPLETE : EXIT_ERROR;
    }
    if (isGridfeedError(error)) {
      io.stderr(chalk.red(`Error [${error.code}]: ${error.message}`));
      return EXIT_ERROR;
    }
    io.stderr(chalk.red(`Error: ${error instanceof Error ? error.message : String(error)}`));
    return EXIT_ERROR;
  }
}
