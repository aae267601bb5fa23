import type { DataSource, SourceMetadata } from '../../domain/ports/DataSource.js';

export interface BufferSourceOptions {
  /** File name for metadata. Default: 'buffer-input'. */
  readonly fileName?: string;
  /** Yield the content in pieces of this many characters instead of all at once. Must be a positive integer. */
  readonly chunkSize?: number;
}

/** Data source over in-memory content. */
export class BufferSource implements DataSource {
  private readonly content: string;
  private readonly meta: SourceMetadata;
  private readonly chunkSize: number;

  constructor(data: string | Buffer, options?: BufferSourceOptions) {
    this.content = typeof data === 'string' ? data : data.toString('utf-8');
    const chunkSize = options?.chunkSize ?? Math.max(this.content.length, 1);
    if (!Number.isInteger(chunkSize) || chunkSize < 1) {
      throw new Error(`BufferSource: chunkSize must be a positive integer, got ${String(chunkSize)}`);
    }
    this.chunkSize = chunkSize;
    this.meta = {
      fileName: options?.fileName ?? 'buffer-input',
      fileSize: typeof data === 'string' ? Buffer.byteLength(data) : data.length,
    };
  }

  async *read(): AsyncIterable<string> {
    for (let i = 0; i < this.content.length; i += this.chunkSize) {
      yield await Promise.resolve(this.content.slice(i, i + this.chunkSize));
    }
  }

  metadata(): SourceMetadata {
    return this.meta;
  }
}
