/**
 * CSV output for flat records
 *
 * Columns are the union of all record keys, in the order they are first
 * seen. Missing and null values are empty cells.
 *
 * @module @gridfeed/cli/formatters/csv
 */

import type { FlatRecord, FlatValue } from '@gridfeed/contracts';

function escapeCell(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

function formatCell(value: FlatValue | undefined): string {
  if (value === undefined || value === null) {
    return '';
  }
  return escapeCell(String(value));
}

/**
 * Format records as CSV with a header row
 *
 * @example
 * formatCsv([{ 'period.point.position': 1, 'period.point.quantity': 100 }]);
 * // period.point.position,period.point.quantity
 * // 1,100
 */
export function formatCsv(records: FlatRecord[]): string {
  if (records.length === 0) {
    return '';
  }

  const columns: string[] = [];
  const seen = new Set<string>();
  for (const record of records) {
    for (const key of Object.keys(record)) {
      if (!seen.has(key)) {
        seen.add(key);
        columns.push(key);
      }
    }
  }

  const header = columns.map(escapeCell).join(',');
  const rows = records.map((record) => columns.map((column) => formatCell(record[column])).join(','));

  return [header, ...rows].join('\n');
}
