const QUOTE = '"';

/** Default upper bound on the number of fields split out of a single line. */
export const DEFAULT_MAX_COLUMNS = 8192;

export interface SplitOptions {
  /** Single-character field delimiter. Default: `','`. */
  readonly delimiter?: string;
  /** Hard cap on fields per line; input past the cap is not split further. Default: `8192`. */
  readonly maxColumns?: number;
}

export interface SplitResult {
  readonly fields: readonly string[];
  /** `true` when the line held more input after `maxColumns` fields were taken. */
  readonly truncated: boolean;
}

export interface ResolvedSplitOptions {
  readonly delimiter: string;
  readonly maxColumns: number;
}

/**
 * Validate split options and apply defaults.
 *
 * @throws Error when the delimiter is not a single character, is the quote
 * character or a line terminator, or when `maxColumns` is not a positive integer.
 */
export function resolveSplitOptions(options?: SplitOptions): ResolvedSplitOptions {
  const delimiter = options?.delimiter ?? ',';
  const maxColumns = options?.maxColumns ?? DEFAULT_MAX_COLUMNS;

  if (delimiter.length !== 1) {
    throw new Error(`RecordSplitter: delimiter must be a single character, got ${JSON.stringify(delimiter)}`);
  }
  if (delimiter === QUOTE || delimiter === '\n' || delimiter === '\r') {
    throw new Error(`RecordSplitter: ${JSON.stringify(delimiter)} cannot be used as a delimiter`);
  }
  if (!Number.isInteger(maxColumns) || maxColumns < 1) {
    throw new Error(`RecordSplitter: maxColumns must be a positive integer, got ${String(maxColumns)}`);
  }

  return { delimiter, maxColumns };
}

/**
 * Split one line (without its terminator) into field values.
 *
 * Quoted fields start with `"` and end at the first quote that is not part of
 * a `""` pair, which decodes to a single `"`. Anything between a closing quote
 * and the next delimiter is skipped. An unterminated quoted field runs to the
 * end of the line. A trailing delimiter yields a trailing empty field, and an
 * empty line yields no fields at all.
 *
 * Never throws on line content: malformed quoting degrades to the rules above.
 */
export function splitRecordDetailed(line: string, options?: SplitOptions): SplitResult {
  return splitWith(line, resolveSplitOptions(options));
}

/** Field values of `line`. See `splitRecordDetailed` for the quoting rules. */
export function splitRecord(line: string, options?: SplitOptions): string[] {
  return [...splitRecordDetailed(line, options).fields];
}

/** Split with options that have already been validated. */
export function splitWith(line: string, options: ResolvedSplitOptions): SplitResult {
  const { delimiter, maxColumns } = options;
  const fields: string[] = [];
  if (line.length === 0) return { fields, truncated: false };

  let pos = 0;
  for (;;) {
    let value: string;
    let next: number;

    if (line[pos] === QUOTE) {
      const quoted = readQuoted(line, pos + 1);
      value = quoted.value;
      next = line.indexOf(delimiter, quoted.end);
    } else {
      next = line.indexOf(delimiter, pos);
      value = line.slice(pos, next === -1 ? line.length : next);
    }

    fields.push(value);
    if (next === -1) return { fields, truncated: false };
    if (fields.length >= maxColumns) return { fields, truncated: true };
    pos = next + 1;
  }
}

/** Decode a quoted field whose content starts at `start`. `end` is the index just past the closing quote. */
function readQuoted(line: string, start: number): { value: string; end: number } {
  let value = '';
  let pos = start;

  for (;;) {
    const close = line.indexOf(QUOTE, pos);
    if (close === -1) {
      return { value: value + line.slice(pos), end: line.length };
    }
    value += line.slice(pos, close);
    if (line[close + 1] === QUOTE) {
      value += QUOTE;
      pos = close + 2;
    } else {
      return { value, end: close + 1 };
    }
  }
}
