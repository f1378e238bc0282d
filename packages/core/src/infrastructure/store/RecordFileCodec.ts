import { z } from 'zod';
import type { MigrationRecord } from '../../domain/model/Record.js';
import { RecordFileFormatError } from '../../domain/errors.js';

const fieldValueSchema = z.union([z.string(), z.number(), z.boolean(), z.array(z.union([z.number(), z.string()]))]);

const recordSchema = z
  .object({
    entity: z.string().min(1),
    primary_key: z.number().int().nullable(),
    fields: z.record(fieldValueSchema),
  })
  .strict();

const recordFileSchema = z.array(recordSchema);

/**
 * Serialize records as a pretty-printed JSON array with a trailing newline.
 * Keys are written in the order `entity`, `primary_key`, `fields`; field order is kept as given.
 */
export function serializeRecords(records: readonly MigrationRecord[]): string {
  const ordered = records.map((r) => ({ entity: r.entity, primary_key: r.primary_key, fields: r.fields }));
  return `${JSON.stringify(ordered, null, 2)}\n`;
}

/**
 * Parse the contents of a record file. Throws `RecordFileFormatError` when the
 * text is not JSON or a record does not have the canonical shape.
 */
export function parseRecords(content: string, filePath: string): MigrationRecord[] {
  let document: unknown;
  try {
    document = JSON.parse(content);
  } catch (error) {
    throw new RecordFileFormatError(`invalid JSON (${error instanceof Error ? error.message : String(error)})`, filePath);
  }

  const result = recordFileSchema.safeParse(document);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new RecordFileFormatError(issue?.message ?? 'invalid record file', filePath, issue?.path.join('.'));
  }

  return result.data;
}
