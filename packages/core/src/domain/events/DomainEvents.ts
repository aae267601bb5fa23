import type { ColumnType } from '../model/ColumnType.js';
import type { InferredSchema } from '../model/Schema.js';

/** Emitted when a scan begins reading its source. */
export interface ScanStartedEvent {
  readonly type: 'scan:started';
  readonly scanId: string;
  /** Source name from `DataSource.metadata()`, e.g. the file name. */
  readonly source: string;
  readonly timestamp: number;
}

/** Emitted once the header line has been split into column names. */
export interface HeaderParsedEvent {
  readonly type: 'header:parsed';
  readonly scanId: string;
  readonly columns: readonly string[];
  readonly timestamp: number;
}

/** Emitted each time a column moves up the type order. */
export interface ColumnPromotedEvent {
  readonly type: 'column:promoted';
  readonly scanId: string;
  readonly columnIndex: number;
  readonly column: string;
  readonly from: ColumnType;
  readonly to: ColumnType;
  /** 1-based physical line that caused the promotion. */
  readonly lineNumber: number;
  readonly timestamp: number;
}

/**
 * Emitted for a data row whose fields were not all used: more fields than the
 * header declares, or more than `maxColumns` so the line was not split to its end.
 */
export interface RowOverflowEvent {
  readonly type: 'row:overflow';
  readonly scanId: string;
  readonly lineNumber: number;
  /** Fields split out of the line. */
  readonly fieldCount: number;
  /** Header column count. */
  readonly columnCount: number;
  /** `true` when splitting stopped at `maxColumns`. */
  readonly capped: boolean;
  readonly timestamp: number;
}

/** Emitted when a physical line is longer than `maxLineLength` and was cut. */
export interface LineTruncatedEvent {
  readonly type: 'line:truncated';
  readonly scanId: string;
  readonly lineNumber: number;
  readonly maxLineLength: number;
  readonly timestamp: number;
}

/** Emitted when the scan has finished and the schema is frozen. */
export interface ScanCompletedEvent {
  readonly type: 'scan:completed';
  readonly scanId: string;
  readonly schema: InferredSchema;
  readonly durationMs: number;
  readonly timestamp: number;
}

export type DomainEvent =
  | ScanStartedEvent
  | HeaderParsedEvent
  | ColumnPromotedEvent
  | RowOverflowEvent
  | LineTruncatedEvent
  | ScanCompletedEvent;

export type EventType = DomainEvent['type'];

/** Extract the event payload type for a given event type string. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;

/** Narrow a domain event to the payload of `type`. */
export function isEventOfType<T extends EventType>(event: DomainEvent, type: T): event is EventPayload<T> {
  return event.type === type;
}
