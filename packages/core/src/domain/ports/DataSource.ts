/** Metadata about the data source (optional, for events and error messages). */
export interface SourceMetadata {
  readonly fileName?: string;
  readonly fileSize?: number;
}

/**
 * Port for reading text from any origin (file, buffer, stream).
 *
 * `read()` yields decoded text chunks in order. Chunk boundaries are arbitrary:
 * a line may be spread over any number of chunks. Implementations that cannot
 * open their input reject from the first iteration with `InputUnavailableError`.
 */
export interface DataSource {
  /** Yield data chunks lazily. */
  read(): AsyncIterable<string>;
  /** Return metadata about the source (file name, size). */
  metadata(): SourceMetadata;
}
