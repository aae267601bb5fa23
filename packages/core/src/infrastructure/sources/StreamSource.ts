import { StringDecoder } from 'node:string_decoder';
import type { DataSource, SourceMetadata } from '../../domain/ports/DataSource.js';

export interface StreamSourceOptions {
  /** File name for metadata. Default: 'stream-input'. */
  readonly fileName?: string;
  /** File size in bytes for metadata (if known). */
  readonly fileSize?: number;
  /** Encoding for converting Buffer chunks to string. Default: 'utf-8'. */
  readonly encoding?: BufferEncoding;
}

type ChunkStream = AsyncIterable<string | Uint8Array> | ReadableStream<string | Uint8Array>;

/** Data source that wraps an `AsyncIterable` or `ReadableStream`, e.g. an upload body. Single use. */
export class StreamSource implements DataSource {
  private readonly stream: ChunkStream;
  private readonly meta: SourceMetadata;
  private readonly decoder: StringDecoder;
  private consumed = false;

  constructor(stream: ChunkStream, options?: StreamSourceOptions) {
    this.stream = stream;
    // U+FEFF stays in the text so the header line can strip it itself.
    this.decoder = new StringDecoder(options?.encoding ?? 'utf-8');
    this.meta = {
      fileName: options?.fileName ?? 'stream-input',
      fileSize: options?.fileSize,
    };
  }

  async *read(): AsyncIterable<string> {
    if (this.consumed) {
      throw new Error('StreamSource: stream has already been consumed. Streams can only be read once.');
    }
    this.consumed = true;

    const iterable = isReadableStream(this.stream) ? fromReadableStream(this.stream) : this.stream;

    for await (const chunk of iterable) {
      // write() holds back a multi-byte sequence split across chunks.
      yield typeof chunk === 'string' ? chunk : this.decoder.write(chunk);
    }

    const rest = this.decoder.end();
    if (rest.length > 0) yield rest;
  }

  metadata(): SourceMetadata {
    return this.meta;
  }
}

function isReadableStream(stream: ChunkStream): stream is ReadableStream<string | Uint8Array> {
  return 'getReader' in stream && typeof stream.getReader === 'function';
}

async function* fromReadableStream(stream: ReadableStream<string | Uint8Array>): AsyncIterable<string | Uint8Array> {
  const reader = stream.getReader();
  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) break;
      yield value;
    }
  } finally {
    reader.releaseLock();
  }
}
