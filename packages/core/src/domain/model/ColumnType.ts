/**
 * Coarse column classification, totally ordered by generality:
 * `UNKNOWN` < `INTEGER` < `REAL` < `TEXT`.
 *
 * A column only ever moves up this order while a file is scanned. `TEXT` is
 * absorbing. `UNKNOWN` never leaves the engine: it resolves to `TEXT` at
 * finalization.
 */
export const ColumnType = {
  UNKNOWN: 'UNKNOWN',
  INTEGER: 'INTEGER',
  REAL: 'REAL',
  TEXT: 'TEXT',
} as const;

export type ColumnType = (typeof ColumnType)[keyof typeof ColumnType];

/** A column type after finalization. These are the labels written to the result. */
export type ResolvedColumnType = Exclude<ColumnType, 'UNKNOWN'>;

const RANK: Record<ColumnType, number> = {
  [ColumnType.UNKNOWN]: 0,
  [ColumnType.INTEGER]: 1,
  [ColumnType.REAL]: 2,
  [ColumnType.TEXT]: 3,
};

/** Position of a type in the generality order. */
export function rankOf(type: ColumnType): number {
  return RANK[type];
}

/** Least upper bound of two types in the generality order. */
export function joinColumnTypes(a: ColumnType, b: ColumnType): ColumnType {
  return RANK[a] >= RANK[b] ? a : b;
}

/** `UNKNOWN` becomes `TEXT`; every other type is kept. */
export function resolveColumnType(type: ColumnType): ResolvedColumnType {
  return type === ColumnType.UNKNOWN ? ColumnType.TEXT : type;
}
