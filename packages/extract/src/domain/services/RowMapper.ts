import type { MigrationRecord, MigrationSchema, RecordFields, FieldValue, UnmappedPolicy } from '@dumpshift/core';
import { MalformedInputError, TypeCoercer, UnmappedSchemaError, createRecord, findTable, parseInteger } from '@dumpshift/core';

/** A table or column the mapper dropped. */
export interface DropReport {
  readonly table: string;
  /** Set for a dropped column; absent for a dropped row of an unmapped table. */
  readonly column?: string;
  readonly line?: number;
  /** `true` under the `drop-with-warning` policy. */
  readonly warn: boolean;
}

/** A raw value kept as a string because it could not be coerced. */
export interface FallbackReport {
  readonly entity: string;
  readonly field: string;
  readonly value: string;
  readonly expected: 'integer' | 'relation' | 'boolean';
}

/** Receives the mapper's non-fatal diagnostics. */
export interface MappingListener {
  /** Called for every dropped row of an unmapped table, and once per mapper for every dropped column. */
  onDrop?(report: DropReport): void;
  onFallback?(report: FallbackReport): void;
}

export interface RowMapperOptions {
  /** Default: `'drop-silently'`. */
  readonly unmappedPolicy?: UnmappedPolicy;
  /** A cell exactly equal to this token is treated as empty (e.g. `\N`). */
  readonly nullToken?: string;
  readonly listener?: MappingListener;
}

const DIGITS = /^\d+$/;

/**
 * Translates one legacy row into a record of the target entity.
 *
 * Cells are paired with columns up to the shorter of the two. Empty cells are
 * omitted from `fields`; values are coerced by target field name.
 */
export class RowMapper {
  private readonly coercer: TypeCoercer;
  private readonly policy: UnmappedPolicy;
  private readonly nullToken: string | undefined;
  private readonly listener: MappingListener;
  private readonly reportedColumns = new Set<string>();

  constructor(
    private readonly schema: MigrationSchema,
    options?: RowMapperOptions,
  ) {
    this.coercer = new TypeCoercer(schema.coercion);
    this.policy = options?.unmappedPolicy ?? 'drop-silently';
    this.nullToken = options?.nullToken;
    this.listener = options?.listener ?? {};
  }

  /** Whether rows of this table produce records. */
  isMapped(table: string): boolean {
    return findTable(this.schema, table) !== undefined;
  }

  /**
   * Map a row. Returns `null` when the table has no mapping and the policy
   * drops it; throws `UnmappedSchemaError` under `fail`.
   */
  mapRow(table: string, columns: readonly string[], cells: readonly string[], line?: number): MigrationRecord | null {
    const mapping = findTable(this.schema, table);
    if (!mapping) {
      if (this.policy === 'fail') throw new UnmappedSchemaError(table);
      this.listener.onDrop?.({ table, line, warn: this.policy === 'drop-with-warning' });
      return null;
    }

    const values = new Map<string, string>();
    const width = Math.min(columns.length, cells.length);
    for (let i = 0; i < width; i++) {
      const column = columns[i];
      const cell = cells[i];
      if (column === undefined || cell === undefined) continue;
      values.set(column, cell === this.nullToken ? '' : cell);
    }

    for (const column of columns) {
      if (column !== mapping.primaryKey && !mapping.columns.has(column)) this.dropColumn(table, column, line);
    }

    const fields: Record<string, FieldValue> = {};
    for (const [column, field] of mapping.columns) {
      const raw = values.get(column);
      if (raw === undefined) continue;

      const result = this.coercer.coerce(field, raw);
      if (result.kind === 'absent') continue;
      if (result.kind === 'fallback') {
        this.listener.onFallback?.({ entity: mapping.entity, field, value: result.value, expected: result.expected });
      }
      fields[field] = result.value;
    }

    return createRecord(mapping.entity, this.primaryKey(table, values.get(mapping.primaryKey), line), fields satisfies RecordFields);
  }

  private primaryKey(table: string, raw: string | undefined, line?: number): number | null {
    if (raw === undefined || raw === '') return null;
    const value = parseInteger(raw, DIGITS);
    if (value === undefined) {
      throw new MalformedInputError(`Primary key "${raw}" is not an integer`, table, line);
    }
    return value;
  }

  private dropColumn(table: string, column: string, line?: number): void {
    if (this.policy === 'fail') throw new UnmappedSchemaError(table, column);

    const key = `${table}\u0000${column}`;
    if (this.reportedColumns.has(key)) return;
    this.reportedColumns.add(key);
    this.listener.onDrop?.({ table, column, line, warn: this.policy === 'drop-with-warning' });
  }
}
