import { DataTypes } from 'sequelize';
import type { ModelAttributes, DataType } from 'sequelize';
import type { ColumnSchema, ResolvedColumnType } from '@csvsniff/core';

const SQL_TYPES: Record<ResolvedColumnType, DataType> = {
  INTEGER: DataTypes.INTEGER,
  REAL: DataTypes.REAL,
  TEXT: DataTypes.TEXT,
};

/**
 * Attributes of an import table: one nullable column per CSV column and
 * nothing else. Passed straight to `QueryInterface.createTable()`, so no
 * surrogate `id` or timestamps are added and a CSV column may be called `id`.
 */
export function importTableAttributes(columns: readonly ColumnSchema[]): ModelAttributes {
  const attributes: ModelAttributes = {};
  for (const column of columns) {
    attributes[column.name] = { type: SQL_TYPES[column.type], allowNull: true };
  }
  return attributes;
}
