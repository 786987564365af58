/**
 * @fileoverview Result flattening.
 *
 * Turns decoded documents into flat records keyed by dotted paths. Lists
 * branch the traversal: every element yields its own records, each carrying a
 * copy of the scalar fields collected on the way down. A time series with N
 * points therefore becomes N records.
 */

import type {
  DocumentNode,
  DocumentValue,
  FlatRecord,
  LogicalResult,
  MarketDocument,
} from '@gridfeed/contracts';
import { ValidationError, isLogicalResult } from '@gridfeed/contracts';
import type { Logger } from '@gridfeed/logger';

/**
 * Identifier fields that differ per response and would defeat deduplication.
 */
export const DEFAULT_IGNORE_FIELDS: readonly string[] = ['m_rid', 'time_series.m_rid'];

export interface ExtractRecordsOptions {
  /**
   * Top-level field to start from (e.g. 'time_series'). Sibling fields are
   * skipped and paths are relative to it.
   */
  domain?: string;

  /**
   * Full dotted paths to drop from every record. Pass an empty list to keep everything.
   * @default DEFAULT_IGNORE_FIELDS
   */
  ignoreFields?: readonly string[];

  /**
   * Drop records identical to an earlier one, keeping order.
   * @default true
   */
  deduplicate?: boolean;

  /** @default '.' */
  separator?: string;

  logger?: Logger;
}

function isNode(value: DocumentValue): value is DocumentNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function cross(left: FlatRecord[], right: FlatRecord[]): FlatRecord[] {
  const combined: FlatRecord[] = [];
  for (const base of left) {
    for (const branch of right) {
      combined.push({ ...base, ...branch });
    }
  }
  return combined;
}

/**
 * Flattens one value depth-first, in field order.
 *
 * - Scalars (including null) become a field at `parentKey`.
 * - Nested nodes extend the path; their records are crossed with the fields collected so far.
 * - Lists contribute the records of all their elements, in order; empty lists contribute nothing.
 * - `undefined` fields are omitted.
 *
 * @example
 * ```typescript
 * flattenValue({ unit: 'MWH', point: [{ position: 1 }, { position: 2 }] }, '', '.');
 * // [{ unit: 'MWH', 'point.position': 1 }, { unit: 'MWH', 'point.position': 2 }]
 * ```
 */
export function flattenValue(value: DocumentValue, parentKey: string, separator: string): FlatRecord[] {
  if (value === undefined) {
    return [];
  }

  if (Array.isArray(value)) {
    return value.flatMap((element) => flattenValue(element, parentKey, separator));
  }

  if (!isNode(value)) {
    return [{ [parentKey]: value }];
  }

  let records: FlatRecord[] = [{}];

  for (const [key, child] of Object.entries(value)) {
    const path = parentKey ? `${parentKey}${separator}${key}` : key;

    if (child === undefined) {
      continue;
    }

    if (Array.isArray(child) || isNode(child)) {
      const branches = flattenValue(child, path, separator);
      if (branches.length > 0) {
        records = cross(records, branches);
      }
      continue;
    }

    for (const record of records) {
      record[path] = child;
    }
  }

  return records;
}

function dropFields(record: FlatRecord, ignored: ReadonlySet<string>): FlatRecord {
  if (ignored.size === 0) {
    return record;
  }
  const kept: FlatRecord = {};
  for (const [key, value] of Object.entries(record)) {
    if (!ignored.has(key)) {
      kept[key] = value;
    }
  }
  return kept;
}

function recordKey(record: FlatRecord): string {
  return JSON.stringify(Object.entries(record).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
}

/**
 * Removes duplicate records (same fields and values, in any order), keeping the first.
 */
export function deduplicateRecords(records: FlatRecord[]): FlatRecord[] {
  const seen = new Set<string>();
  return records.filter((record) => {
    const key = recordKey(record);
    if (seen.has(key)) {
      return false;
    }
    seen.add(key);
    return true;
  });
}

/**
 * Flattens the documents of a query result into records.
 *
 * Accepts a {@link LogicalResult} (only its successful documents are read)
 * or a plain document list. Record order follows document order, then
 * traversal order within each document.
 *
 * @throws ValidationError if `domain` is given and no document has that field
 *
 * @example
 * ```typescript
 * const result = await client.query(query);
 * const records = extractRecords(result, { domain: 'time_series' });
 * ```
 */
export function extractRecords(
  input: LogicalResult | MarketDocument[],
  options: ExtractRecordsOptions = {}
): FlatRecord[] {
  const {
    domain,
    ignoreFields = DEFAULT_IGNORE_FIELDS,
    deduplicate = true,
    separator = '.',
    logger,
  } = options;

  const documents = isLogicalResult(input) ? input.documents : input;

  const types = [...new Set(documents.map((document) => document.type))].sort();
  if (types.length > 1) {
    logger?.warn('Mixed document types detected; records may not share a structure', { types });
  }

  if (domain !== undefined && documents.length > 0) {
    const availableKeys = [...new Set(documents.flatMap((document) => Object.keys(document.content)))];
    if (!availableKeys.includes(domain)) {
      throw new ValidationError(`Domain '${domain}' not found in data. Available keys: ${availableKeys.join(', ')}`, {
        domain,
        availableKeys,
      });
    }
  }

  const ignored = new Set(ignoreFields);
  const records: FlatRecord[] = [];

  for (const document of documents) {
    if (domain === undefined) {
      records.push(...flattenValue(document.content, '', separator));
      continue;
    }

    if (!(domain in document.content)) {
      continue;
    }

    const value = document.content[domain];
    const rootKey = Array.isArray(value) || (typeof value === 'object' && value !== null) ? '' : domain;
    records.push(...flattenValue(value, rootKey, separator));
  }

  // documents with no scalar fields left would yield {}
  const filtered = records
    .map((record) => dropFields(record, ignored))
    .filter((record) => Object.keys(record).length > 0);
  return deduplicate ? deduplicateRecords(filtered) : filtered;
}
