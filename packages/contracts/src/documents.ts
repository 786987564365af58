/**
 * @fileoverview Decoded document and flat record types.
 *
 * @module @gridfeed/contracts/documents
 */

/** Scalar leaf value of a decoded document */
export type DocumentScalar = string | number | boolean | null;

/**
 * Any value inside a decoded document.
 * `undefined` marks a field the source left unset; it is omitted when flattening.
 */
export type DocumentValue = DocumentScalar | undefined | DocumentNode | DocumentValue[];

/** Nested structure with fields in document order */
export interface DocumentNode {
  [field: string]: DocumentValue;
}

/**
 * One decoded response document.
 *
 * @example
 * ```typescript
 * const doc: MarketDocument = {
 *   type: 'Publication_MarketDocument',
 *   content: { m_rid: 'abc', time_series: [{ period: [] }] },
 * };
 * ```
 */
export interface MarketDocument {
  /** Root element name, e.g. 'Publication_MarketDocument' */
  type: string;

  /** Document body with snake_case field names */
  content: DocumentNode;
}

/** Value of a flattened field */
export type FlatValue = DocumentScalar;

/**
 * Flat mapping from dotted-path field name to scalar value.
 * Field order follows document traversal order.
 */
export type FlatRecord = Record<string, FlatValue>;
