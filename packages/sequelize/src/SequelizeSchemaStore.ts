import type { Sequelize, QueryInterface } from 'sequelize';
import type { ApplySchemaOptions, AppliedSchema, InferredSchema, SchemaStore, TableColumn } from '@csvsniff/core';
import { SchemaMismatchError, TableNotFoundError, sameColumns } from '@csvsniff/core';
import * as ColumnMapper from './mappers/ColumnMapper.js';
import { importTableAttributes } from './models/ImportTableAttributes.js';

export interface SequelizeSchemaStoreOptions {
  /** Prepended to every table name passed to the store. Default: `''`. */
  readonly tablePrefix?: string;
}

/**
 * Sequelize-based SchemaStore adapter for `@csvsniff/core`.
 *
 * Turns an inferred schema into a table with one nullable column per CSV
 * header, typed `INTEGER`, `REAL` or `TEXT`. Header names are normalized to
 * plain identifiers first. Works with any dialect supported by Sequelize v6.
 *
 * An existing table is left as it is when its columns match the normalized
 * header names (case-insensitively, in order).
 */
export class SequelizeSchemaStore implements SchemaStore {
  private readonly sequelize: Sequelize;
  private readonly tablePrefix: string;

  constructor(sequelize: Sequelize, options?: SequelizeSchemaStoreOptions) {
    this.sequelize = sequelize;
    this.tablePrefix = options?.tablePrefix ?? '';
  }

  /**
   * @throws TableNotFoundError when the table is missing and `createIfMissing` is `false`.
   * @throws SchemaMismatchError when the existing table has different columns.
   * @throws Error when a table would have to be created from a schema with no columns.
   */
  async applySchema(table: string, schema: InferredSchema, options?: ApplySchemaOptions): Promise<AppliedSchema> {
    const tableName = this.tableName(table);
    const columns = ColumnMapper.toStoredColumns(schema);
    const names = columns.map((c) => c.name);

    if (options?.replace) {
      await this.queryInterface().dropTable(tableName);
    }

    const existing = await this.describeByName(tableName);
    if (existing) {
      const existingNames = existing.map((c) => c.name);
      if (!sameColumns(existingNames, names)) {
        throw new SchemaMismatchError(tableName, existingNames, names);
      }
      return { table: tableName, created: false, columns };
    }

    if (!(options?.createIfMissing ?? true)) {
      throw new TableNotFoundError(tableName);
    }
    if (columns.length === 0) {
      throw new Error(`SequelizeSchemaStore: cannot create table '${tableName}' from a schema with no columns`);
    }

    await this.queryInterface().createTable(tableName, importTableAttributes(columns));
    return { table: tableName, created: true, columns };
  }

  async describeTable(table: string): Promise<readonly TableColumn[] | null> {
    return this.describeByName(this.tableName(table));
  }

  /** Every table whose name starts with the configured prefix, keyed by full table name. */
  async describeAll(): Promise<Readonly<Record<string, readonly TableColumn[]>>> {
    const tables: Record<string, readonly TableColumn[]> = {};
    const names = await this.queryInterface().showAllTables();

    for (const name of names.filter((n) => n.startsWith(this.tablePrefix)).sort()) {
      const columns = await this.describeByName(name);
      if (columns) tables[name] = columns;
    }

    return tables;
  }

  private async describeByName(tableName: string): Promise<readonly TableColumn[] | null> {
    const names = await this.queryInterface().showAllTables();
    if (!names.includes(tableName)) return null;

    const description = await this.queryInterface().describeTable(tableName);
    return Object.entries(description).map(([name, column]) => ColumnMapper.toTableColumn(name, column));
  }

  private tableName(table: string): string {
    return `${this.tablePrefix}${table}`;
  }

  private queryInterface(): QueryInterface {
    return this.sequelize.getQueryInterface();
  }
}
