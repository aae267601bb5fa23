import type { ScanContext } from '../ScanContext.js';
import type { DataSource } from '../../domain/ports/DataSource.js';
import type { InferredSchema } from '../../domain/model/Schema.js';
import { createSchema, emptySchema } from '../../domain/model/Schema.js';
import { stripBom } from '../../domain/services/ByteOrderMark.js';
import { splitWith } from '../../domain/services/RecordSplitter.js';
import { LineReader } from '../../infrastructure/lines/LineReader.js';

/**
 * Single-pass scan: header line first, then every data row fed column by
 * column into the type tracker.
 *
 * Line handling is synchronous (`pushLine` / `finish`); only chunk reads from
 * a `DataSource` are awaited.
 */
export class SniffSchema {
  private result: InferredSchema | null = null;

  constructor(private readonly ctx: ScanContext) {}

  /** Scan every line of `source` and return the frozen schema. */
  async execute(source: DataSource): Promise<InferredSchema> {
    this.begin(source.metadata().fileName ?? 'unknown');
    const reader = this.createLineReader();

    for await (const chunk of source.read()) {
      for (const line of reader.push(chunk)) {
        this.pushLine(line);
      }
      if (this.ctx.exhausted) return this.finish();
    }
    for (const line of reader.end()) {
      this.pushLine(line);
    }

    return this.finish();
  }

  /** Scan in-memory text synchronously. */
  executeText(text: string, sourceName = 'text-input'): InferredSchema {
    this.begin(sourceName);
    const reader = this.createLineReader();

    for (const line of [...reader.push(text), ...reader.end()]) {
      this.pushLine(line);
      if (this.ctx.exhausted) break;
    }

    return this.finish();
  }

  /** Mark the scan as started. Called once, before the first line. */
  begin(sourceName: string): void {
    this.ctx.startedAt = Date.now();
    this.ctx.emit({ type: 'scan:started', scanId: this.ctx.scanId, source: sourceName, timestamp: Date.now() });
  }

  /** Feed one physical line, without its terminator. */
  pushLine(line: string): void {
    if (this.result) {
      throw new Error('SniffSchema: cannot push lines after the scan has finished');
    }
    this.ctx.lineNumber++;

    if (this.ctx.columns === null) {
      this.readHeader(line);
      return;
    }

    this.ctx.rowCount++;
    const tracker = this.ctx.tracker;
    const columnCount = this.ctx.columns.length;
    if (!tracker || columnCount === 0) return;

    const { fields, truncated } = splitWith(line, this.ctx.settings.split);
    if (truncated || fields.length > columnCount) {
      this.ctx.emit({
        type: 'row:overflow',
        scanId: this.ctx.scanId,
        lineNumber: this.ctx.lineNumber,
        fieldCount: fields.length,
        columnCount,
        capped: truncated,
        timestamp: Date.now(),
      });
    }

    tracker.observeRow(fields);
  }

  /** Resolve the remaining unknown columns and freeze the schema. Idempotent. */
  finish(): InferredSchema {
    if (this.result) return this.result;

    const { columns, tracker } = this.ctx;
    this.result =
      columns === null || tracker === null
        ? emptySchema()
        : createSchema(columns, tracker.finalize(), this.ctx.rowCount);

    this.ctx.emit({
      type: 'scan:completed',
      scanId: this.ctx.scanId,
      schema: this.result,
      durationMs: Date.now() - this.ctx.startedAt,
      timestamp: Date.now(),
    });

    return this.result;
  }

  private readHeader(line: string): void {
    const { fields } = splitWith(stripBom(line), this.ctx.settings.split);
    this.ctx.setHeader(fields);
    this.ctx.emit({ type: 'header:parsed', scanId: this.ctx.scanId, columns: fields, timestamp: Date.now() });
  }

  private createLineReader(): LineReader {
    return new LineReader(this.ctx.settings.maxLineLength, (lineNumber) => {
      this.ctx.emit({
        type: 'line:truncated',
        scanId: this.ctx.scanId,
        lineNumber,
        maxLineLength: this.ctx.settings.maxLineLength,
        timestamp: Date.now(),
      });
    });
  }
}
