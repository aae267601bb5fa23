import type { ColumnDescription } from 'sequelize';
import type { ColumnSchema, InferredSchema, TableColumn } from '@csvsniff/core';
import { normalizeIdentifier } from '@csvsniff/core';

/**
 * Columns as they will be stored: header names normalized to identifiers and
 * made unique (case-insensitively) by appending `_2`, `_3`, ... to repeats.
 */
export function toStoredColumns(schema: InferredSchema): ColumnSchema[] {
  const seen = new Set<string>();

  return schema.columns.map((column) => {
    const base = normalizeIdentifier(column.name);
    let name = base;
    for (let n = 2; seen.has(name.toLowerCase()); n++) {
      name = `${base}_${String(n)}`;
    }
    seen.add(name.toLowerCase());
    return { name, type: column.type };
  });
}

export function toTableColumn(name: string, description: ColumnDescription): TableColumn {
  return {
    name,
    type: description.type,
    nullable: description.allowNull,
    primaryKey: description.primaryKey,
  };
}
