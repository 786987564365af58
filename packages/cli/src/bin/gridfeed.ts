#!/usr/bin/env tsx
/**
 * gridfeed executable
 *
 * Loads .env, wires SIGINT to cancellation and exits with the code from runCli.
 */

import 'dotenv/config';
import { runCli } from '../program.js';

const controller = new AbortController();
process.once('SIGINT', () => {
  process.stderr.write('Cancelling query\n');
  controller.abort();
});

process.exitCode = await runCli(process.argv.slice(2), {
  stdout: (text) => process.stdout.write(`${text}\n`),
  stderr: (text) => process.stderr.write(`${text}\n`),
  env: process.env,
  signal: controller.signal,
});
