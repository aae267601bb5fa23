import { createReadStream, statSync } from 'node:fs';
import { basename } from 'node:path';
import type { DataSource, SourceMetadata } from '../../domain/ports/DataSource.js';
import { toInputUnavailable } from '../../domain/errors/SniffErrors.js';

export interface FilePathSourceOptions {
  /** Encoding for reading the file. Default: 'utf-8'. */
  readonly encoding?: BufferEncoding;
  /** Chunk size in bytes for streaming reads. Default: 65536 (64KB). */
  readonly highWaterMark?: number;
}

/**
 * Data source that streams from a local file path using `createReadStream`.
 *
 * Open and read failures surface from `read()` as `InputUnavailableError`.
 */
export class FilePathSource implements DataSource {
  private readonly filePath: string;
  private readonly encoding: BufferEncoding;
  private readonly highWaterMark: number;

  constructor(filePath: string, options?: FilePathSourceOptions) {
    this.filePath = filePath;
    this.encoding = options?.encoding ?? 'utf-8';
    this.highWaterMark = options?.highWaterMark ?? 65536;
  }

  async *read(): AsyncIterable<string> {
    const stream = createReadStream(this.filePath, {
      encoding: this.encoding,
      highWaterMark: this.highWaterMark,
    });

    try {
      for await (const chunk of stream) {
        yield typeof chunk === 'string' ? chunk : String(chunk);
      }
    } catch (err) {
      throw toInputUnavailable(this.filePath, err);
    } finally {
      stream.destroy();
    }
  }

  metadata(): SourceMetadata {
    return {
      fileName: basename(this.filePath),
      fileSize: this.fileSize(),
    };
  }

  private fileSize(): number | undefined {
    try {
      return statSync(this.filePath).size;
    } catch {
      // Unknown size; read() reports why the file cannot be opened.
      return undefined;
    }
  }
}
