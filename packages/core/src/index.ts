// Domain model
export type { MigrationRecord, RecordFields, FieldValue, FieldList } from './domain/model/Record.js';
export { createRecord, withFields, recordsEqual, fieldValuesEqual, isFieldList } from './domain/model/Record.js';
export type { MigrationSchema, SchemaDefinition, TableMapping, CoercionRules } from './domain/model/Schema.js';
export { defineSchema, findTable, isKnownEntity, isRelationField } from './domain/model/Schema.js';
export type { UnmappedPolicy, RowAlignment } from './domain/model/Policies.js';
export { UNMAPPED_POLICIES, ROW_ALIGNMENTS } from './domain/model/Policies.js';

// Errors
export type { DumpshiftErrorCode } from './domain/errors.js';
export {
  DumpshiftError,
  MalformedInputError,
  UnmappedSchemaError,
  RecordFileFormatError,
  SchemaDefinitionError,
  EntityCollisionError,
  isDumpshiftError,
} from './domain/errors.js';

// Domain services
export { TypeCoercer, parseInteger } from './domain/services/TypeCoercer.js';
export type { CoercionResult } from './domain/services/TypeCoercer.js';
export { parseBooleanLike, canonicalizeTimestamp, isCanonicalTimestamp } from './domain/services/canonical.js';
export type { TimestampRewrite, TimestampShape } from './domain/services/canonical.js';

// Events
export { EventBus } from './application/EventBus.js';
export type {
  DomainEvent,
  EventType,
  EventPayload,
  ExtractSummary,
  BlockStartedEvent,
  BlockCompletedEvent,
  TableUnmappedEvent,
  ColumnUnmappedEvent,
  CoercionFallbackEvent,
  FileWrittenEvent,
  ExtractCompletedEvent,
  FieldRepairedEvent,
  SchemaDriftEvent,
  FileRepairedEvent,
  FileUnchangedEvent,
  FileSkippedEvent,
  FixerAppliedEvent,
} from './domain/events/DomainEvents.js';

// Ports
export type { DataSource, SourceMetadata } from './domain/ports/DataSource.js';

// Infrastructure adapters
export { BufferSource } from './infrastructure/sources/BufferSource.js';
export { FilePathSource } from './infrastructure/sources/FilePathSource.js';
export { StreamSource } from './infrastructure/sources/StreamSource.js';
export type { StreamSourceOptions } from './infrastructure/sources/StreamSource.js';
export { readLines } from './infrastructure/sources/readLines.js';
export { RecordFileStore } from './infrastructure/store/RecordFileStore.js';
export type { RecordFileStoreOptions, LoadedRecordFile } from './infrastructure/store/RecordFileStore.js';
export { serializeRecords, parseRecords } from './infrastructure/store/RecordFileCodec.js';
export { writeFileAtomic } from './infrastructure/store/writeFileAtomic.js';
export { loadSchema, parseSchema, loadBuiltinSchema, BUILTIN_SCHEMA_PATH } from './infrastructure/schema/loadSchema.js';
export { Logger, createLogger, parseLogLevel } from './infrastructure/logging/logger.js';
export type { LogLevel, LogMetadata, LoggerConfig, LogSink } from './infrastructure/logging/logger.js';
export { attachEventLogger } from './infrastructure/logging/attachEventLogger.js';
export type { EventSubscriber } from './infrastructure/logging/attachEventLogger.js';
