import type { FieldValue } from '../model/Record.js';
import type { SourceMetadata } from '../ports/DataSource.js';

/** Emitted when a bulk-copy block header is recognised. */
export interface BlockStartedEvent {
  readonly type: 'block:started';
  readonly table: string;
  readonly columns: readonly string[];
  readonly line: number;
  readonly mapped: boolean;
  readonly timestamp: number;
}

/** Emitted when a block terminator has been consumed. */
export interface BlockCompletedEvent {
  readonly type: 'block:completed';
  readonly table: string;
  readonly rowCount: number;
  readonly recordCount: number;
  readonly timestamp: number;
}

/** Emitted under `drop-with-warning` the first time rows of an unmapped table are dropped. */
export interface TableUnmappedEvent {
  readonly type: 'table:unmapped';
  readonly table: string;
  readonly line: number;
  readonly timestamp: number;
}

/** Emitted under `drop-with-warning` the first time a column of a mapped table is dropped. */
export interface ColumnUnmappedEvent {
  readonly type: 'column:unmapped';
  readonly table: string;
  readonly column: string;
  readonly timestamp: number;
}

/** Emitted when a value could not be coerced and was kept as its original string. */
export interface CoercionFallbackEvent {
  readonly type: 'coercion:fallback';
  readonly entity: string;
  readonly field: string;
  readonly value: string;
  readonly expected: 'integer' | 'relation' | 'boolean';
  readonly timestamp: number;
}

/** Emitted after a record file has been written by the emitter. */
export interface FileWrittenEvent {
  readonly type: 'file:written';
  readonly entity: string;
  readonly path: string;
  readonly recordCount: number;
  readonly timestamp: number;
}

/** Per-run counters reported at the end of an extraction. */
export interface ExtractSummary {
  /** File name and size of the dump, as far as the source knows them. */
  readonly source: SourceMetadata;
  readonly blocks: number;
  readonly rows: number;
  /** Record count per target entity, in first-seen order. */
  readonly records: Readonly<Record<string, number>>;
  /** Dropped row count per unmapped legacy table. */
  readonly unmappedTables: Readonly<Record<string, number>>;
  /** Dropped column names per mapped legacy table. */
  readonly unmappedColumns: Readonly<Record<string, readonly string[]>>;
  readonly coercionFallbacks: number;
}

/** Emitted once the whole dump has been read and mapped. */
export interface ExtractCompletedEvent {
  readonly type: 'extract:completed';
  readonly summary: ExtractSummary;
  readonly timestamp: number;
}

/** Emitted for every field rewritten by the normalizer or a fixer. */
export interface FieldRepairedEvent {
  readonly type: 'field:repaired';
  readonly path: string;
  readonly entity: string;
  readonly primaryKey: number | null;
  readonly field: string;
  readonly before: FieldValue | undefined;
  readonly after: FieldValue | undefined;
  readonly rule: string;
  readonly timestamp: number;
}

/** Emitted for a record whose entity is not known to the schema. Reported, never fixed. */
export interface SchemaDriftEvent {
  readonly type: 'schema:drift';
  readonly path: string;
  readonly entity: string;
  readonly primaryKey: number | null;
  readonly timestamp: number;
}

/** Emitted after a changed record file has been backed up and rewritten (or would have been, in a dry run). */
export interface FileRepairedEvent {
  readonly type: 'file:repaired';
  readonly path: string;
  readonly backupPath: string | null;
  readonly changeCount: number;
  readonly dryRun: boolean;
  readonly timestamp: number;
}

/** Emitted when a repair pass found nothing to change in a record file. */
export interface FileUnchangedEvent {
  readonly type: 'file:unchanged';
  readonly path: string;
  readonly timestamp: number;
}

/** Emitted when a directory sweep skips a record file it cannot read. */
export interface FileSkippedEvent {
  readonly type: 'file:skipped';
  readonly path: string;
  readonly reason: string;
  readonly timestamp: number;
}

/** Emitted once per fixer per file, after the fixer has run. */
export interface FixerAppliedEvent {
  readonly type: 'fixer:applied';
  readonly fixer: string;
  readonly path: string;
  readonly recordsChanged: number;
  readonly timestamp: number;
}

/** Discriminated union of all domain events. */
export type DomainEvent =
  | BlockStartedEvent
  | BlockCompletedEvent
  | TableUnmappedEvent
  | ColumnUnmappedEvent
  | CoercionFallbackEvent
  | FileWrittenEvent
  | ExtractCompletedEvent
  | FieldRepairedEvent
  | SchemaDriftEvent
  | FileRepairedEvent
  | FileUnchangedEvent
  | FileSkippedEvent
  | FixerAppliedEvent;

/** String literal union of all event type discriminators. */
export type EventType = DomainEvent['type'];

/** Extract the event payload type for a given event type string. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;
