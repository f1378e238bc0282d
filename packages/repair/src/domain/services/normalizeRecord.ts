import type { CoercionRules, FieldValue, MigrationRecord } from '@dumpshift/core';
import { canonicalizeTimestamp, parseBooleanLike, withFields } from '@dumpshift/core';
import type { FieldChange, RepairOutcome, RepairRule } from '../model/FieldChange.js';

const SHAPE_RULES = {
  'naive-spaced': 'naive-timestamp',
  'naive-iso': 'missing-zone',
  'offset-unpadded': 'offset-format',
} as const satisfies Record<string, RepairRule>;

/**
 * Rewrite residual non-canonical encodings in one record:
 *
 * - boolean-like strings in boolean fields become booleans;
 * - `YYYY-MM-DD HH:MM:SS` becomes `YYYY-MM-DDTHH:MM:SSZ`;
 * - `YYYY-MM-DDTHH:MM:SS` without a zone gets `Z`;
 * - offsets written as `+HH` or `+HHMM` become `+HH:MM`.
 *
 * Non-string values and every other string are left alone, so a second
 * application finds nothing to change. The record is returned as-is when
 * nothing changed.
 */
export function normalizeRecord(record: MigrationRecord, rules: CoercionRules): RepairOutcome<MigrationRecord> {
  const changes: FieldChange[] = [];
  const fields: Record<string, FieldValue> = {};

  for (const [field, value] of Object.entries(record.fields)) {
    const rewrite = typeof value === 'string' ? normalizeValue(field, value, rules) : undefined;
    if (!rewrite) {
      fields[field] = value;
      continue;
    }

    fields[field] = rewrite.value;
    changes.push({
      entity: record.entity,
      primaryKey: record.primary_key,
      field,
      before: value,
      after: rewrite.value,
      rule: rewrite.rule,
    });
  }

  return { record: changes.length > 0 ? withFields(record, fields) : record, changes };
}

function normalizeValue(
  field: string,
  value: string,
  rules: CoercionRules,
): { value: FieldValue; rule: RepairRule } | undefined {
  if (rules.booleanFields.has(field)) {
    const flag = parseBooleanLike(value);
    if (flag !== undefined) return { value: flag, rule: 'boolean-string' };
  }

  const timestamp = canonicalizeTimestamp(value);
  if (timestamp) return { value: timestamp.value, rule: SHAPE_RULES[timestamp.shape] };

  return undefined;
}
