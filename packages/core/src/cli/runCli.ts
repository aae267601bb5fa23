import { SchemaSniffer } from '../SchemaSniffer.js';
import { serializeSchemaResult } from '../domain/services/ResultSerializer.js';
import { InputUnavailableError, UsageError } from '../domain/errors/SniffErrors.js';

/** Process exit statuses of the `csvsniff` command. */
export const ExitCode = {
  OK: 0,
  INPUT_UNAVAILABLE: 1,
  USAGE: 2,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

/** Output channels of the command: the result goes to `stdout`, diagnostics to `stderr`. */
export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
}

const processIO: CliIO = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

const PROGRAM = 'csvsniff';

/**
 * Validate the positional arguments and return the CSV path.
 *
 * @throws UsageError unless exactly one argument is given.
 */
export function parseArgs(args: readonly string[]): string {
  const [path] = args;
  if (args.length !== 1 || path === undefined) {
    throw new UsageError(`usage: ${PROGRAM} <csv_path>`);
  }
  return path;
}

interface WarningTally {
  count: number;
  firstLine: number;
}

/**
 * Run the command: sniff the file named by the single argument and print
 * `{"columns":[...],"types":[...]}`. Resolves to the exit status.
 */
export async function runCli(args: readonly string[], io: CliIO = processIO): Promise<ExitCode> {
  let path: string;
  try {
    path = parseArgs(args);
  } catch (err) {
    if (!(err instanceof UsageError)) throw err;
    io.stderr(`${err.message}\n`);
    return ExitCode.USAGE;
  }

  const overflow: WarningTally = { count: 0, firstLine: 0 };
  const truncated: WarningTally = { count: 0, firstLine: 0 };
  const sniffer = new SchemaSniffer({ delimiter: ',' })
    .on('row:overflow', (e) => tally(overflow, e.lineNumber))
    .on('line:truncated', (e) => tally(truncated, e.lineNumber));

  try {
    const schema = await sniffer.sniffFile(path);
    io.stdout(serializeSchemaResult(schema));
  } catch (err) {
    if (!(err instanceof InputUnavailableError)) throw err;
    io.stderr(`error: ${err.path}: ${err.reason}\n`);
    return ExitCode.INPUT_UNAVAILABLE;
  }

  if (overflow.count > 0) {
    io.stderr(
      `warning: ${String(overflow.count)} row(s) had more fields than the header; ` +
        `extra fields were ignored (first at line ${String(overflow.firstLine)})\n`,
    );
  }
  if (truncated.count > 0) {
    io.stderr(
      `warning: ${String(truncated.count)} line(s) exceeded the maximum line length and were truncated ` +
        `(first at line ${String(truncated.firstLine)})\n`,
    );
  }

  return ExitCode.OK;
}

function tally(warning: WarningTally, lineNumber: number): void {
  if (warning.count === 0) warning.firstLine = lineNumber;
  warning.count++;
}
