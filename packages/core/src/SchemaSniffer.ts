import type { InferredSchema } from './domain/model/Schema.js';
import type { DataSource } from './domain/ports/DataSource.js';
import type { EventType, EventPayload, DomainEvent } from './domain/events/DomainEvents.js';
import { resolveSplitOptions } from './domain/services/RecordSplitter.js';
import { EventBus } from './application/EventBus.js';
import { ScanContext } from './application/ScanContext.js';
import type { ScanSettings } from './application/ScanContext.js';
import { SniffSchema } from './application/usecases/SniffSchema.js';
import { DEFAULT_MAX_LINE_LENGTH } from './infrastructure/lines/LineReader.js';
import { FilePathSource } from './infrastructure/sources/FilePathSource.js';
import type { FilePathSourceOptions } from './infrastructure/sources/FilePathSource.js';

/** Configuration for a schema sniffer. */
export interface SchemaSnifferConfig {
  /** Single-character field delimiter. Not auto-detected. Default: `','`. */
  readonly delimiter?: string;
  /** Most fields split out of one line; further input on that line is ignored. Default: `8192`. */
  readonly maxColumns?: number;
  /**
   * Longest physical line kept, in characters. Longer lines are cut at this
   * length and a `line:truncated` event is emitted. Default: `1048576`.
   */
  readonly maxLineLength?: number;
  /** Encoding used by `sniffFile()`. Default: `'utf-8'`. */
  readonly encoding?: BufferEncoding;
}

/**
 * Facade for single-pass CSV schema inference: read → split → classify → finalize.
 *
 * Each call to `sniff()`, `sniffFile()` or `sniffText()` runs an independent
 * scan with its own state; only event subscriptions are shared.
 *
 * @example
 * ```typescript
 * const sniffer = new SchemaSniffer();
 * sniffer.on('row:overflow', (e) => console.warn(`line ${e.lineNumber} has extra fields`));
 * const schema = await sniffer.sniffFile('people.csv');
 * console.log(serializeSchemaResult(schema));
 * ```
 */
export class SchemaSniffer {
  private readonly eventBus = new EventBus();
  private readonly settings: ScanSettings;
  private readonly encoding: BufferEncoding;

  /** @throws Error if the delimiter, `maxColumns` or `maxLineLength` is invalid. */
  constructor(config: SchemaSnifferConfig = {}) {
    const maxLineLength = config.maxLineLength ?? DEFAULT_MAX_LINE_LENGTH;
    if (!Number.isInteger(maxLineLength) || maxLineLength < 1) {
      throw new Error(`SchemaSniffer: maxLineLength must be a positive integer, got ${String(maxLineLength)}`);
    }
    this.settings = {
      split: resolveSplitOptions({ delimiter: config.delimiter, maxColumns: config.maxColumns }),
      maxLineLength,
    };
    this.encoding = config.encoding ?? 'utf-8';
  }

  /** Subscribe to a scan event. Returns `this` for chaining. */
  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.eventBus.on(type, handler);
    return this;
  }

  /** Unsubscribe a handler previously registered with `on()`. */
  off<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.eventBus.off(type, handler);
    return this;
  }

  /** Subscribe to all events regardless of type. Returns `this` for chaining. */
  onAny(handler: (event: DomainEvent) => void): this {
    this.eventBus.onAny(handler);
    return this;
  }

  /** Unsubscribe a wildcard handler previously registered with `onAny()`. */
  offAny(handler: (event: DomainEvent) => void): this {
    this.eventBus.offAny(handler);
    return this;
  }

  /**
   * Infer the schema of everything `source` yields.
   *
   * @throws InputUnavailableError when the source cannot be opened or read.
   */
  async sniff(source: DataSource): Promise<InferredSchema> {
    return new SniffSchema(this.createContext()).execute(source);
  }

  /**
   * Infer the schema of a file on disk.
   *
   * @throws InputUnavailableError when the file cannot be opened or read.
   */
  async sniffFile(filePath: string, options?: Omit<FilePathSourceOptions, 'encoding'>): Promise<InferredSchema> {
    return this.sniff(new FilePathSource(filePath, { ...options, encoding: this.encoding }));
  }

  /** Infer the schema of CSV text already in memory. Synchronous. */
  sniffText(text: string): InferredSchema {
    return new SniffSchema(this.createContext()).executeText(text);
  }

  private createContext(): ScanContext {
    return new ScanContext(this.eventBus, this.settings);
  }
}
