/** Invocation arguments are malformed (e.g. wrong argument count). */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/**
 * The input cannot be opened or read: missing file, permission denied or an
 * I/O failure. Carries the system reason so callers can report it verbatim.
 */
export class InputUnavailableError extends Error {
  readonly path: string;
  /** System error code such as `ENOENT` or `EACCES`, when one is known. */
  readonly code: string | undefined;
  readonly reason: string;

  constructor(path: string, reason: string, code?: string, options?: { cause?: unknown }) {
    super(`${path}: ${reason}`, options);
    this.name = 'InputUnavailableError';
    this.path = path;
    this.reason = reason;
    this.code = code;
  }
}

const SYSTEM_REASONS: Readonly<Record<string, string>> = {
  ENOENT: 'No such file or directory',
  EACCES: 'Permission denied',
  EISDIR: 'Is a directory',
  EMFILE: 'Too many open files',
  ENOTDIR: 'Not a directory',
  EIO: 'Input/output error',
};

/** Wrap a file system failure for `path` into an `InputUnavailableError`. */
export function toInputUnavailable(path: string, err: unknown): InputUnavailableError {
  if (err instanceof InputUnavailableError) return err;
  const code = systemErrorCode(err);
  const reason =
    (code !== undefined ? SYSTEM_REASONS[code] : undefined) ?? (err instanceof Error ? err.message : String(err));
  return new InputUnavailableError(path, reason, code, { cause: err });
}

function systemErrorCode(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null || !('code' in err)) return undefined;
  const code = err.code;
  return typeof code === 'string' ? code : undefined;
}
