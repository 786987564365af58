/**
 * @fileoverview Public API exports for @gridfeed/cli
 */

export { runCli, createProgram, EXIT_COMPLETE, EXIT_ERROR, EXIT_PARTIAL } from './program.js';
export type { CliIO } from './program.js';
export { formatCsv } from './formatters/csv.js';
export { formatSummary, formatEndpointTable } from './formatters/summary.js';
