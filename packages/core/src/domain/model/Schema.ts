/** How one legacy table maps onto a target entity. */
export interface TableMapping {
  /** Legacy table identifier (last dot-separated segment of the qualified name). */
  readonly table: string;
  /** Target entity name. */
  readonly entity: string;
  /** Legacy column holding the primary key. Default: `'id'`. */
  readonly primaryKey: string;
  /** Ordered legacy column → target field renames. Columns not listed here are dropped. */
  readonly columns: ReadonlyMap<string, string>;
}

/** Field-name driven rules used by the type coercer and the normalizer. */
export interface CoercionRules {
  /** Measurement fields (capacities, seeds, scores, counts) coerced to integers when possible. */
  readonly measurementFields: ReadonlySet<string>;
  /** Relation fields coerced to integers only when the raw value is all decimal digits. */
  readonly relationFields: ReadonlySet<string>;
  /** Any field whose name ends with this suffix is also treated as a relation field. */
  readonly relationSuffix: string;
  /** Fields holding boolean semantics; boolean-like strings become booleans. */
  readonly booleanFields: ReadonlySet<string>;
}

/**
 * Immutable schema mapping passed explicitly into every component.
 * Build it with `defineSchema()` or load it with `loadSchema()`.
 */
export interface MigrationSchema {
  readonly name: string;
  readonly tables: ReadonlyMap<string, TableMapping>;
  /** Every entity a record file may legitimately name: mapped entities plus declared extras. */
  readonly knownEntities: ReadonlySet<string>;
  readonly coercion: CoercionRules;
}

/** Plain-object form of a schema, as written in a schema document. */
export interface SchemaDefinition {
  readonly name: string;
  readonly tables: readonly {
    readonly table: string;
    readonly entity: string;
    readonly primaryKey?: string;
    readonly columns: Readonly<Record<string, string>>;
  }[];
  readonly extraEntities?: readonly string[];
  readonly coercion?: {
    readonly measurementFields?: readonly string[];
    readonly relationFields?: readonly string[];
    readonly relationSuffix?: string;
    readonly booleanFields?: readonly string[];
  };
}

/** Freeze a schema definition into a `MigrationSchema`. Later table entries for the same table replace earlier ones. */
export function defineSchema(definition: SchemaDefinition): MigrationSchema {
  const tables = new Map<string, TableMapping>();
  for (const entry of definition.tables) {
    tables.set(
      entry.table,
      Object.freeze({
        table: entry.table,
        entity: entry.entity,
        primaryKey: entry.primaryKey ?? 'id',
        columns: new Map(Object.entries(entry.columns)),
      }),
    );
  }

  const knownEntities = new Set<string>([...tables.values()].map((t) => t.entity));
  for (const entity of definition.extraEntities ?? []) knownEntities.add(entity);

  return Object.freeze({
    name: definition.name,
    tables,
    knownEntities,
    coercion: Object.freeze({
      measurementFields: new Set(definition.coercion?.measurementFields ?? []),
      relationFields: new Set(definition.coercion?.relationFields ?? []),
      relationSuffix: definition.coercion?.relationSuffix ?? '_id',
      booleanFields: new Set(definition.coercion?.booleanFields ?? []),
    }),
  });
}

/** Look up the mapping for a legacy table, or `undefined` when the table is not mapped. */
export function findTable(schema: MigrationSchema, table: string): TableMapping | undefined {
  return schema.tables.get(table);
}

/** Whether the entity name is known to the schema. */
export function isKnownEntity(schema: MigrationSchema, entity: string): boolean {
  return schema.knownEntities.has(entity);
}

/** Whether the target field carries relation (foreign key) semantics. */
export function isRelationField(rules: CoercionRules, field: string): boolean {
  return rules.relationFields.has(field) || (rules.relationSuffix !== '' && field.endsWith(rules.relationSuffix));
}
