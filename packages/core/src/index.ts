// Main entry point
export { SchemaSniffer } from './SchemaSniffer.js';
export type { SchemaSnifferConfig } from './SchemaSniffer.js';

// Domain model
export { ColumnType, joinColumnTypes, resolveColumnType, rankOf } from './domain/model/ColumnType.js';
export type { ResolvedColumnType } from './domain/model/ColumnType.js';
export type { ColumnSchema, InferredSchema, SchemaResult } from './domain/model/Schema.js';
export { createSchema, emptySchema } from './domain/model/Schema.js';

// Errors
export { UsageError, InputUnavailableError, toInputUnavailable } from './domain/errors/SniffErrors.js';
export { TableNotFoundError, SchemaMismatchError } from './domain/errors/SchemaStoreErrors.js';

// Domain services (for building custom pipelines)
export {
  splitRecord,
  splitRecordDetailed,
  resolveSplitOptions,
  DEFAULT_MAX_COLUMNS,
} from './domain/services/RecordSplitter.js';
export type { SplitOptions, SplitResult } from './domain/services/RecordSplitter.js';
export { stripBom, BYTE_ORDER_MARK } from './domain/services/ByteOrderMark.js';
export { isIntegerShaped, isRealShaped, classifyValue, observeValue } from './domain/services/TypeLattice.js';
export { ColumnTypeTracker } from './domain/services/ColumnTypeTracker.js';
export type { PromotionListener } from './domain/services/ColumnTypeTracker.js';
export { toSchemaResult, serializeSchemaResult } from './domain/services/ResultSerializer.js';
export { normalizeIdentifier, sameColumns } from './domain/services/IdentifierNormalizer.js';

// Application internals
export { EventBus } from './application/EventBus.js';

// Ports (for custom implementations)
export type { DataSource, SourceMetadata } from './domain/ports/DataSource.js';
export type { SchemaStore, ApplySchemaOptions, AppliedSchema, TableColumn } from './domain/ports/SchemaStore.js';

// Domain events
export type {
  DomainEvent,
  EventType,
  EventPayload,
  ScanStartedEvent,
  HeaderParsedEvent,
  ColumnPromotedEvent,
  RowOverflowEvent,
  LineTruncatedEvent,
  ScanCompletedEvent,
} from './domain/events/DomainEvents.js';
export { isEventOfType } from './domain/events/DomainEvents.js';

// Infrastructure adapters
export { LineReader, DEFAULT_MAX_LINE_LENGTH } from './infrastructure/lines/LineReader.js';
export type { TruncationListener } from './infrastructure/lines/LineReader.js';
export { BufferSource } from './infrastructure/sources/BufferSource.js';
export type { BufferSourceOptions } from './infrastructure/sources/BufferSource.js';
export { FilePathSource } from './infrastructure/sources/FilePathSource.js';
export type { FilePathSourceOptions } from './infrastructure/sources/FilePathSource.js';
export { StreamSource } from './infrastructure/sources/StreamSource.js';
export type { StreamSourceOptions } from './infrastructure/sources/StreamSource.js';

// Command line
export { runCli, parseArgs, ExitCode } from './cli/runCli.js';
export type { CliIO } from './cli/runCli.js';
