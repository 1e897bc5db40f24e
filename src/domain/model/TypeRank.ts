/**
 * Ordinal classification of a column's values, from most to least specific.
 *
 * Ordering: `BOOL` < `INTEGER` < `FLOAT` < `STRING`. A column's rank is the
 * loosest rank observed for it, so promotion is simply the maximum.
 */
export const TypeRank = {
  BOOL: 0,
  INTEGER: 1,
  FLOAT: 2,
  STRING: 3,
} as const;

export type TypeRank = (typeof TypeRank)[keyof typeof TypeRank];

const DISPLAY_NAMES: Record<TypeRank, string> = {
  [TypeRank.BOOL]: 'BOOL',
  [TypeRank.INTEGER]: 'INTEGER',
  [TypeRank.FLOAT]: 'FLOAT',
  [TypeRank.STRING]: 'STRING',
};

/** Return the looser of two ranks. */
export function promote(a: TypeRank, b: TypeRank): TypeRank {
  return a >= b ? a : b;
}

/** Human-readable name of a rank (`'BOOL'`, `'INTEGER'`, `'FLOAT'`, `'STRING'`). */
export function displayTypeRank(rank: TypeRank): string {
  return DISPLAY_NAMES[rank];
}
