import type { ResolvedColumnType } from './ColumnType.js';

/** One column of an inferred schema. */
export interface ColumnSchema {
  /** Header name as written in the file (BOM removed, quotes decoded). */
  readonly name: string;
  readonly type: ResolvedColumnType;
}

/** Ordered, frozen result of a scan. One entry per header column, in header order. */
export interface InferredSchema {
  readonly columns: readonly ColumnSchema[];
  /** Number of data rows seen after the header (blank lines included). */
  readonly rowCount: number;
}

/** Wire shape consumed by the import pipeline: two parallel arrays of equal length. */
export interface SchemaResult {
  readonly columns: readonly string[];
  readonly types: readonly ResolvedColumnType[];
}

/** Build a frozen schema from parallel name and type arrays. */
export function createSchema(
  names: readonly string[],
  types: readonly ResolvedColumnType[],
  rowCount: number,
): InferredSchema {
  const columns = names.map((name, i) => Object.freeze({ name, type: types[i] ?? 'TEXT' }));
  return Object.freeze({ columns: Object.freeze(columns), rowCount });
}

/** The schema of a file with no readable header. */
export function emptySchema(): InferredSchema {
  return createSchema([], [], 0);
}
