import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import type { MigrationSchema, SchemaDefinition } from '../../domain/model/Schema.js';
import { defineSchema } from '../../domain/model/Schema.js';
import { SchemaDefinitionError } from '../../domain/errors.js';

const identifier = z.string().min(1);

const schemaDocument = z
  .object({
    name: identifier,
    tables: z.array(
      z
        .object({
          table: identifier,
          entity: identifier,
          primaryKey: identifier.optional(),
          columns: z.record(identifier),
        })
        .strict(),
    ),
    extraEntities: z.array(identifier).optional(),
    coercion: z
      .object({
        measurementFields: z.array(identifier).optional(),
        relationFields: z.array(identifier).optional(),
        relationSuffix: z.string().optional(),
        booleanFields: z.array(identifier).optional(),
      })
      .strict()
      .optional(),
  })
  .strict()
  .superRefine((doc, ctx) => {
    doc.tables.forEach((table, index) => {
      const targets = new Set<string>();
      for (const [column, field] of Object.entries(table.columns)) {
        if (column === (table.primaryKey ?? 'id')) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['tables', index, 'columns', column],
            message: 'the primary key column cannot also be renamed',
          });
        }
        if (targets.has(field)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['tables', index, 'columns', column],
            message: `target field "${field}" is mapped more than once`,
          });
        }
        targets.add(field);
      }
    });
  });

/** Validate a parsed schema document and freeze it. `source` names the document in error messages. */
export function parseSchema(document: unknown, source: string): MigrationSchema {
  const result = schemaDocument.safeParse(document);
  if (!result.success) {
    const issue = result.error.issues[0];
    const at = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new SchemaDefinitionError(`${issue?.message ?? 'invalid schema'}${at}`, source);
  }
  const definition: SchemaDefinition = result.data;
  return defineSchema(definition);
}

/** Read, validate and freeze a schema document from a JSON file. */
export async function loadSchema(filePath: string): Promise<MigrationSchema> {
  const content = await readFile(filePath, 'utf-8');
  let document: unknown;
  try {
    document = JSON.parse(content);
  } catch (error) {
    throw new SchemaDefinitionError(`invalid JSON (${error instanceof Error ? error.message : String(error)})`, filePath);
  }
  return parseSchema(document, filePath);
}

/**
 * Path of the schema document describing the legacy league database.
 * `src/` and the built `dist/` sit at the same depth under the package root, so
 * the same relative URL finds `schemas/` from either.
 */
export const BUILTIN_SCHEMA_PATH = fileURLToPath(new URL('../../../schemas/legacy-league.json', import.meta.url));

/** Load the schema mapping for the legacy league database shipped with this package. */
export function loadBuiltinSchema(): Promise<MigrationSchema> {
  return loadSchema(BUILTIN_SCHEMA_PATH);
}
