import type { TypeRank } from './TypeRank.js';

/** Value returned for a field that is absent, unclassifiable, or looser than its column type. */
export const MISSING_VALUE = '';

/** A single classified field from one line. */
export interface Field {
  /** Observed rank, already promoted against the column's schema rank. */
  readonly rank: TypeRank;
  /** Normalized value. `MISSING_VALUE` when `missing` is `true`. */
  readonly value: string;
  /** `true` for empty or unclassifiable bodies. A quoted empty string (`""`) is not missing. */
  readonly missing: boolean;
}

/** The fields of one line, in left-to-right marker order. */
export type Row = readonly Field[];

export function presentField(rank: TypeRank, value: string): Field {
  return { rank, value, missing: false };
}

export function missingField(rank: TypeRank): Field {
  return { rank, value: MISSING_VALUE, missing: true };
}
