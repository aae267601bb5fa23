import type { InferredSchema, SchemaResult } from '../model/Schema.js';

/** Split a schema into the two parallel arrays the import pipeline expects. */
export function toSchemaResult(schema: InferredSchema): SchemaResult {
  return {
    columns: schema.columns.map((c) => c.name),
    types: schema.columns.map((c) => c.type),
  };
}

/**
 * Compact JSON for the result, keys in the order `columns`, `types`.
 *
 * Quotes, backslashes and control characters inside column names are escaped.
 */
export function serializeSchemaResult(result: SchemaResult | InferredSchema): string {
  const wire = 'types' in result ? result : toSchemaResult(result);
  return JSON.stringify({ columns: wire.columns, types: wire.types });
}
