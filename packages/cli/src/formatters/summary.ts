/**
 * Human-readable query summary, written to stderr next to the records
 *
 * @module @gridfeed/cli/formatters/summary
 */

import chalk from 'chalk';
import type { EndpointSpec, LogicalResult } from '@gridfeed/contracts';
import { toIsoString } from '@gridfeed/query-core';

export function formatSummary(result: LogicalResult, recordCount: number): string {
  const status = result.coverage === 'complete' ? chalk.green('complete') : chalk.yellow('partial');
  const lines = [
    `Coverage: ${status} (${result.chunkCount - result.failures.length}/${result.chunkCount} chunks, ` +
      `${result.documents.length} documents, ${recordCount} records)`,
  ];

  for (const failure of result.failures) {
    const range = `${toIsoString(failure.chunk.start)} .. ${toIsoString(failure.chunk.end)}`;
    const code = failure.statusCode !== undefined ? ` [${failure.statusCode}]` : '';
    lines.push(chalk.red(`  chunk ${failure.chunk.sequenceIndex} ${range}: ${failure.kind}${code} ${failure.message}`));
  }

  return lines.join('\n');
}

/**
 * One line per endpoint: kind, article, document type, span limit and title.
 */
export function formatEndpointTable(endpoints: EndpointSpec[]): string {
  const width = Math.max(...endpoints.map((endpoint) => endpoint.kind.length));

  return endpoints
    .map((endpoint) => {
      const paging = endpoint.offsetIncrement !== undefined ? ` paged:${endpoint.offsetIncrement}` : '';
      return (
        `${chalk.bold(endpoint.kind.padEnd(width))}  ${endpoint.article.padEnd(9)}` +
        `${endpoint.documentType}  ${chalk.dim(`max ${endpoint.maxSpanDays}d${paging}`)}  ${endpoint.title}`
      );
    })
    .join('\n');
}
