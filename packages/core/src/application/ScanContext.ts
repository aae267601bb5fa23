import type { ResolvedSplitOptions } from '../domain/services/RecordSplitter.js';
import { ColumnTypeTracker } from '../domain/services/ColumnTypeTracker.js';
import type { DomainEvent } from '../domain/events/DomainEvents.js';
import type { EventBus } from './EventBus.js';

/** Validated settings shared by every scan of a `SchemaSniffer`. */
export interface ScanSettings {
  readonly split: ResolvedSplitOptions;
  readonly maxLineLength: number;
}

/**
 * Mutable state of a single scan.
 *
 * Internal: not exported from the public API. A fresh context is created for
 * every scan, so concurrent scans never share column names, types or counters.
 */
export class ScanContext {
  readonly scanId: string;
  readonly settings: ScanSettings;
  private readonly eventBus: EventBus;

  /** Header names; `null` until the first line has been read. */
  columns: readonly string[] | null = null;
  tracker: ColumnTypeTracker | null = null;
  /** 1-based number of the last line pushed. */
  lineNumber = 0;
  rowCount = 0;
  startedAt = 0;

  constructor(eventBus: EventBus, settings: ScanSettings) {
    this.eventBus = eventBus;
    this.settings = settings;
    this.scanId = crypto.randomUUID();
  }

  /** `true` once the header is known to have no columns; nothing after it can change the result. */
  get exhausted(): boolean {
    return this.columns !== null && this.columns.length === 0;
  }

  /** Record the header and start tracking one type per column. */
  setHeader(columns: readonly string[]): void {
    this.columns = Object.freeze([...columns]);
    this.tracker = new ColumnTypeTracker(columns.length, (columnIndex, from, to) => {
      this.emit({
        type: 'column:promoted',
        scanId: this.scanId,
        columnIndex,
        column: columns[columnIndex] ?? '',
        from,
        to,
        lineNumber: this.lineNumber,
        timestamp: Date.now(),
      });
    });
  }

  emit(event: DomainEvent): void {
    this.eventBus.emit(event);
  }
}
