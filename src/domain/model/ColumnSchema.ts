import type { TypeRank } from './TypeRank.js';
import { displayTypeRank } from './TypeRank.js';

/** Per-column type ranks, indexed by column position. Built once, never mutated. */
export type ColumnSchema = readonly TypeRank[];

/** Outcome of the inference pass over the leading sample of a file. */
export interface InferredSchema {
  readonly schema: ColumnSchema;
  /** Number of lines actually read (at most the configured sample size). */
  readonly sampledRows: number;
}

/** Rank recorded for a column so far, or `undefined` when the column has not been seen. */
export function rankAt(schema: ColumnSchema, columnIndex: number): TypeRank | undefined {
  return schema[columnIndex];
}

/** Render a schema as display names, e.g. `['INTEGER', 'STRING']`. */
export function describeSchema(schema: ColumnSchema): readonly string[] {
  return schema.map(displayTypeRank);
}
