import type { ColumnSchema, InferredSchema } from '../model/Schema.js';

/** How `applySchema()` treats an existing or missing table. */
export interface ApplySchemaOptions {
  /** Create the table when it does not exist. Default: `true`. */
  readonly createIfMissing?: boolean;
  /** Drop the table first so it is recreated from the schema. Default: `false`. */
  readonly replace?: boolean;
}

/** Outcome of `applySchema()`. */
export interface AppliedSchema {
  readonly table: string;
  /** `true` when the table was created by this call. */
  readonly created: boolean;
  /** Columns as stored: names normalized to identifiers, types from the schema. */
  readonly columns: readonly ColumnSchema[];
}

/** A column as reported by the store. */
export interface TableColumn {
  readonly name: string;
  /** Declared type as the database reports it, e.g. `'INTEGER'`. */
  readonly type: string;
  readonly nullable: boolean;
  readonly primaryKey: boolean;
}

/**
 * Port for the relational store that receives inferred schemas.
 *
 * Implement this interface to create import tables in a specific database.
 */
export interface SchemaStore {
  /** Create (or check) `table` so that it matches `schema`. */
  applySchema(table: string, schema: InferredSchema, options?: ApplySchemaOptions): Promise<AppliedSchema>;
  /** Columns of `table`, or `null` if it does not exist. */
  describeTable(table: string): Promise<readonly TableColumn[] | null>;
  /** Columns of every table in the store, keyed by table name. */
  describeAll(): Promise<Readonly<Record<string, readonly TableColumn[]>>>;
}
