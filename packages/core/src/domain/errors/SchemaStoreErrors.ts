/** The target table does not exist and the caller did not allow creating it. */
export class TableNotFoundError extends Error {
  readonly table: string;

  constructor(table: string) {
    super(`Table '${table}' does not exist and createIfMissing is false`);
    this.name = 'TableNotFoundError';
    this.table = table;
  }
}

/** The target table exists but its columns do not line up with the CSV header. */
export class SchemaMismatchError extends Error {
  readonly table: string;
  readonly existing: readonly string[];
  readonly incoming: readonly string[];

  constructor(table: string, existing: readonly string[], incoming: readonly string[]) {
    super(
      `CSV headers do not match existing columns of '${table}': ` +
        `[${existing.join(', ')}] vs [${incoming.join(', ')}]`,
    );
    this.name = 'SchemaMismatchError';
    this.table = table;
    this.existing = existing;
    this.incoming = incoming;
  }
}
