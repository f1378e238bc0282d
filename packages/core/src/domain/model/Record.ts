/** A list-valued field, such as a membership list derived by a fixer. */
export type FieldList = readonly (number | string)[];

/** A canonical field value. Absent values are represented by omitting the field, never by `null`. */
export type FieldValue = string | number | boolean | FieldList;

/** Mapping from target field name to coerced value. */
export interface RecordFields {
  readonly [field: string]: FieldValue;
}

/** One row of a target entity, as written to and read from a record file. */
export interface MigrationRecord {
  /** Target entity name (e.g. `games.team`). */
  readonly entity: string;
  /** Primary key taken from the legacy identifier column, or `null` when the column was empty. */
  readonly primary_key: number | null;
  readonly fields: RecordFields;
}

/** Create a record. The field mapping is copied so later edits cannot leak into the caller's object. */
export function createRecord(entity: string, primaryKey: number | null, fields: RecordFields): MigrationRecord {
  return { entity, primary_key: primaryKey, fields: { ...fields } };
}

/** Return a copy of the record with the given field mapping. */
export function withFields(record: MigrationRecord, fields: RecordFields): MigrationRecord {
  return { ...record, fields };
}

/** Narrow a field value to a list. */
export function isFieldList(value: FieldValue | undefined): value is FieldList {
  return Array.isArray(value);
}

/** Check whether two field values are equal. Lists compare element-wise. */
export function fieldValuesEqual(a: FieldValue, b: FieldValue): boolean {
  if (isFieldList(a) && isFieldList(b)) {
    return a.length === b.length && a.every((item, i) => item === b[i]);
  }
  return a === b;
}

/**
 * Field-for-field equality of two records. The order of keys inside `fields`
 * is irrelevant.
 */
export function recordsEqual(a: MigrationRecord, b: MigrationRecord): boolean {
  if (a.entity !== b.entity || a.primary_key !== b.primary_key) return false;

  const aKeys = Object.keys(a.fields);
  if (aKeys.length !== Object.keys(b.fields).length) return false;

  return aKeys.every((key) => {
    const left = a.fields[key];
    const right = b.fields[key];
    return left !== undefined && right !== undefined && fieldValuesEqual(left, right);
  });
}
