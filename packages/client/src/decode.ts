/**
 * @fileoverview Generic XML decoder for market documents.
 *
 * Bodies are parsed into plain trees rather than per-endpoint classes:
 * element names become snake_case keys, attributes are dropped, numeric text
 * becomes numbers and known repeating elements are always arrays. ZIP bodies
 * are unpacked and every entry decoded in archive order.
 *
 * @module @gridfeed/client/decode
 */

import { TextDecoder } from 'node:util';
import { XMLParser } from 'fast-xml-parser';
import { unzipSync } from 'fflate';
import type { DocumentNode, DocumentValue, MarketDocument } from '@gridfeed/contracts';
import {
  ClientRequestError,
  DecodeError,
  TransientNetworkError,
  isGridfeedError,
} from '@gridfeed/contracts';
import type { DecodeContext, Decoder } from './types.js';

const ACKNOWLEDGEMENT_ROOT = 'Acknowledgement_MarketDocument';
const NO_MATCHING_DATA = 'No matching data found';
const UNEXPECTED_ERROR = 'Unexpected error occurred';

const ZIP_SIGNATURE = [0x50, 0x4b, 0x03, 0x04];

/**
 * Elements that may occur more than once under their parent. They are
 * decoded as arrays even when a response carries a single one.
 */
const REPEATED_ELEMENTS = new Set([
  'TimeSeries',
  'Period',
  'Point',
  'Reason',
  'Available_Period',
  'WindPowerFeedin_Period',
  'Constraint_TimeSeries',
  'Monitored_RegisteredResource',
  'Contingency_RegisteredResource',
  'Asset_RegisteredResource',
  'Financial_Price',
  'Bid_TimeSeries',
  'MktPSRType',
  'GeneratingUnit_PowerSystemResources',
  'Ptdf_Domain',
]);

/**
 * Converts an XML element name to a snake_case key.
 *
 * @example
 * ```typescript
 * toSnakeCase('TimeSeries');      // 'time_series'
 * toSnakeCase('mRID');            // 'm_rid'
 * toSnakeCase('in_Domain.mRID');  // 'in_domain_m_rid'
 * ```
 */
export function toSnakeCase(name: string): string {
  return name
    .replace(/\./g, '_')
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1_$2')
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .replace(/_+/g, '_')
    .toLowerCase();
}

function toDocumentValue(value: unknown): DocumentValue {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map(toDocumentValue);
  }
  if (typeof value === 'object') {
    const node: DocumentNode = {};
    for (const [key, child] of Object.entries(value)) {
      node[toSnakeCase(key)] = toDocumentValue(child);
    }
    return node;
  }
  return String(value);
}

function isNode(value: DocumentValue): value is DocumentNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const parser = new XMLParser({
  ignoreAttributes: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
  removeNSPrefix: true,
  parseTagValue: true,
  trimValues: true,
  numberParseOptions: { leadingZeros: false, hex: false },
  isArray: (tagName: string) => REPEATED_ELEMENTS.has(tagName),
});

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Checks for a ZIP body by content type or local file header signature.
 */
export function isZipArchive(body: Uint8Array, contentType?: string): boolean {
  if (contentType?.toLowerCase().includes('application/zip')) {
    return true;
  }
  return ZIP_SIGNATURE.every((byte, index) => body[index] === byte);
}

/**
 * Parses one XML text into a document: the root element name and its
 * normalized content.
 *
 * @throws DecodeError when the text is not well-formed or has no single root element
 */
export function parseXmlDocument(xml: string): MarketDocument {
  let parsed: unknown;
  try {
    parsed = parser.parse(xml, true);
  } catch (error) {
    throw new DecodeError(`Malformed XML: ${error instanceof Error ? error.message : String(error)}`);
  }

  if (typeof parsed !== 'object' || parsed === null) {
    throw new DecodeError('Response has no root element');
  }

  const roots: Array<[string, unknown]> = Object.entries(parsed);
  const root = roots[0];
  if (roots.length !== 1 || root === undefined) {
    throw new DecodeError(`Expected one root element, found ${roots.length}`, {
      roots: roots.map(([name]) => name),
    });
  }

  const [type, value] = root;
  const content = toDocumentValue(value);
  if (Array.isArray(content)) {
    throw new DecodeError(`Root element '${type}' occurs more than once`);
  }

  return { type, content: isNode(content) ? content : {} };
}

function reasonText(document: MarketDocument): string {
  const reasons = document.content['reason'];
  const first = Array.isArray(reasons) ? reasons[0] : reasons;
  if (first !== undefined && isNode(first)) {
    const text = first['text'];
    if (text !== undefined && text !== null && !isNode(text) && !Array.isArray(text)) {
      return String(text);
    }
  }
  return 'Acknowledgement without reason';
}

/**
 * Returns the reason text of an acknowledgement body, if the body is one.
 * Used to enrich HTTP error messages.
 */
export function readAcknowledgementReason(body: Uint8Array): string | undefined {
  try {
    const document = parseXmlDocument(utf8.decode(body));
    return document.type === ACKNOWLEDGEMENT_ROOT ? reasonText(document) : undefined;
  } catch {
    return undefined;
  }
}

/**
 * Interprets an acknowledgement in place of data.
 *
 * "No matching data" yields no documents; a server-side unexpected error is
 * transient; anything else means the request itself was rejected.
 */
function resolveAcknowledgement(document: MarketDocument): MarketDocument[] {
  const reason = reasonText(document);

  if (reason.includes(NO_MATCHING_DATA)) {
    return [];
  }
  if (reason.includes(UNEXPECTED_ERROR)) {
    throw new TransientNetworkError(reason, { cause: 'acknowledgement' });
  }
  throw new ClientRequestError(reason, { statusCode: 400 });
}

function decodeXml(bytes: Uint8Array): MarketDocument[] {
  let text: string;
  try {
    text = utf8.decode(bytes);
  } catch {
    throw new DecodeError('Response body is not valid UTF-8');
  }

  const document = parseXmlDocument(text);
  return document.type === ACKNOWLEDGEMENT_ROOT ? resolveAcknowledgement(document) : [document];
}

function decodeArchive(body: Uint8Array): MarketDocument[] {
  let entries: Record<string, Uint8Array>;
  try {
    entries = unzipSync(body);
  } catch (error) {
    throw new DecodeError(`Invalid ZIP archive: ${error instanceof Error ? error.message : String(error)}`);
  }

  const documents: MarketDocument[] = [];
  for (const [name, bytes] of Object.entries(entries)) {
    if (name.endsWith('/')) {
      continue;
    }
    try {
      documents.push(...decodeXml(bytes));
    } catch (error) {
      if (error instanceof DecodeError) {
        throw new DecodeError(`Archive entry '${name}': ${error.message}`, { entry: name });
      }
      throw error;
    }
  }
  return documents;
}

/**
 * Creates the default decoder.
 *
 * @example
 * ```typescript
 * const decoder = createXmlDecoder();
 * const [document] = decoder.decode(body, { endpoint: 'day_ahead_prices' });
 * document?.type; // 'Publication_MarketDocument'
 * ```
 */
export function createXmlDecoder(): Decoder {
  return {
    decode(body: Uint8Array, context: DecodeContext): MarketDocument[] {
      try {
        return isZipArchive(body, context.contentType) ? decodeArchive(body) : decodeXml(body);
      } catch (error) {
        if (isGridfeedError(error)) {
          throw error;
        }
        throw new DecodeError(
          `Failed to decode ${context.endpoint} response: ${error instanceof Error ? error.message : String(error)}`,
          { endpoint: context.endpoint }
        );
      }
    },
  };
}
