/** Machine-readable error codes. */
export type DumpshiftErrorCode =
  | 'MALFORMED_INPUT'
  | 'UNMAPPED_SCHEMA'
  | 'RECORD_FILE_FORMAT'
  | 'SCHEMA_DEFINITION'
  | 'ENTITY_COLLISION';

/** Base class for every fatal error raised by the pipeline or the repair passes. */
export class DumpshiftError extends Error {
  constructor(
    message: string,
    public readonly code: DumpshiftErrorCode,
  ) {
    super(message);
    this.name = 'DumpshiftError';
  }
}

/**
 * The dump does not have the expected shape: a block without a terminator, a
 * row whose cell count differs from the column list under `strict`
 * alignment, a directive without a column list, or a primary key that is not
 * an integer. Aborts the extraction run.
 */
export class MalformedInputError extends DumpshiftError {
  constructor(
    message: string,
    public readonly table: string,
    /** One-based line number in the dump, when known. */
    public readonly line?: number,
  ) {
    super(line !== undefined ? `${message} (table "${table}", line ${String(line)})` : `${message} (table "${table}")`, 'MALFORMED_INPUT');
    this.name = 'MalformedInputError';
  }
}

/** A table or column is not named by the schema mapping and the `fail` policy is active. */
export class UnmappedSchemaError extends DumpshiftError {
  constructor(
    public readonly table: string,
    public readonly column?: string,
  ) {
    super(
      column !== undefined
        ? `Column "${column}" of table "${table}" has no mapping`
        : `Table "${table}" has no mapping`,
      'UNMAPPED_SCHEMA',
    );
    this.name = 'UnmappedSchemaError';
  }
}

/** A record file is not valid JSON or does not hold a list of records. */
export class RecordFileFormatError extends DumpshiftError {
  constructor(
    message: string,
    public readonly filePath: string,
    /** Location of the offending value inside the document (e.g. `3.fields.groups`). */
    public readonly at?: string,
  ) {
    super(at ? `${filePath}: ${message} at ${at}` : `${filePath}: ${message}`, 'RECORD_FILE_FORMAT');
    this.name = 'RecordFileFormatError';
  }
}

/** A schema mapping document is invalid. */
export class SchemaDefinitionError extends DumpshiftError {
  constructor(
    message: string,
    public readonly source: string,
  ) {
    super(`${source}: ${message}`, 'SCHEMA_DEFINITION');
    this.name = 'SchemaDefinitionError';
  }
}

/** Two distinct entities would be written to the same record file. */
export class EntityCollisionError extends DumpshiftError {
  constructor(
    public readonly entities: readonly string[],
    public readonly filePath: string,
  ) {
    super(`Entities ${entities.map((e) => `"${e}"`).join(' and ')} would share the record file ${filePath}`, 'ENTITY_COLLISION');
    this.name = 'EntityCollisionError';
  }
}

/** Narrow an unknown thrown value to a `DumpshiftError`. */
export function isDumpshiftError(error: unknown): error is DumpshiftError {
  return error instanceof DumpshiftError;
}
