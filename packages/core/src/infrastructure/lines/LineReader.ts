/** Default longest line kept, in UTF-16 code units. */
export const DEFAULT_MAX_LINE_LENGTH = 1_048_576;

/** Called with the 1-based number of a line that was cut at `maxLineLength`. */
export type TruncationListener = (lineNumber: number) => void;

const TRAILING_TERMINATORS = /[\r\n]+$/;

/**
 * Reassembles lines from arbitrarily sized text chunks.
 *
 * Lines are split on `\n` and lose their trailing `\r`/`\n` characters. The
 * empty remainder after a final newline is not a line. A line longer than
 * `maxLineLength` keeps its first `maxLineLength` characters; the rest of that
 * physical line is dropped, so the following lines stay intact.
 */
export class LineReader {
  private readonly maxLineLength: number;
  private readonly onTruncated: TruncationListener | null;
  private partial = '';
  private overflowing = false;
  private pending = false;
  private lineNumber = 0;

  constructor(maxLineLength: number = DEFAULT_MAX_LINE_LENGTH, onTruncated?: TruncationListener) {
    if (!Number.isInteger(maxLineLength) || maxLineLength < 1) {
      throw new Error(`LineReader: maxLineLength must be a positive integer, got ${String(maxLineLength)}`);
    }
    this.maxLineLength = maxLineLength;
    this.onTruncated = onTruncated ?? null;
  }

  /** Number of lines returned so far. */
  get linesRead(): number {
    return this.lineNumber;
  }

  /** Consume a chunk and return every line it completes. */
  push(chunk: string): string[] {
    const lines: string[] = [];
    let start = 0;

    for (;;) {
      const newline = chunk.indexOf('\n', start);
      this.append(newline === -1 ? chunk.slice(start) : chunk.slice(start, newline));
      if (newline === -1) break;
      lines.push(this.takeLine());
      start = newline + 1;
    }

    return lines;
  }

  /** Flush the last line when the input did not end with a newline. */
  end(): string[] {
    return this.pending ? [this.takeLine()] : [];
  }

  private append(piece: string): void {
    if (piece.length === 0) return;
    this.pending = true;
    if (this.overflowing) return;

    const room = this.maxLineLength - this.partial.length;
    if (piece.length > room) {
      this.partial += piece.slice(0, room);
      this.overflowing = true;
    } else {
      this.partial += piece;
    }
  }

  private takeLine(): string {
    this.lineNumber++;
    if (this.overflowing) this.onTruncated?.(this.lineNumber);

    const line = this.partial.replace(TRAILING_TERMINATORS, '');
    this.partial = '';
    this.overflowing = false;
    this.pending = false;
    return line;
  }
}
