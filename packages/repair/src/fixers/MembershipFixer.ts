import type { FieldValue, MigrationRecord } from '@dumpshift/core';
import { isFieldList, parseBooleanLike, withFields } from '@dumpshift/core';
import type { RecordFixer } from '../domain/ports/RecordFixer.js';
import type { RepairOutcome } from '../domain/model/FieldChange.js';

/** Grants `group` when `field` equals `equals`. Boolean conditions also match boolean-like strings. */
export interface MembershipRule {
  readonly field: string;
  readonly equals: string | number | boolean;
  readonly group: number;
}

export interface MembershipFixerOptions {
  /** Default: `'authman.user'`. */
  readonly entity?: string;
  /** List field holding membership ids. Default: `'groups'`. */
  readonly membershipField?: string;
  /** Default: superusers join group 1, team managers join group 2. */
  readonly rules?: readonly MembershipRule[];
}

export const DEFAULT_MEMBERSHIP_RULES: readonly MembershipRule[] = [
  { field: 'is_superuser', equals: true, group: 1 },
  { field: 'role', equals: 'team_manager', group: 2 },
];

/**
 * Derives membership ids from role flags with set-union semantics: a sentinel
 * id is appended only when missing (`"1"` and `1` are the same id), existing ids are kept in place, and the
 * field is only written when the resulting list is non-empty. A membership
 * field that is present but not a list is left untouched.
 */
export class MembershipFixer implements RecordFixer {
  readonly name = 'membership';
  readonly entity: string;
  private readonly membershipField: string;
  private readonly rules: readonly MembershipRule[];

  constructor(options?: MembershipFixerOptions) {
    this.entity = options?.entity ?? 'authman.user';
    this.membershipField = options?.membershipField ?? 'groups';
    this.rules = options?.rules ?? DEFAULT_MEMBERSHIP_RULES;
  }

  fix(record: MigrationRecord): RepairOutcome<MigrationRecord> {
    const current = record.fields[this.membershipField];
    if (current !== undefined && !isFieldList(current)) return { record, changes: [] };

    const groups: (number | string)[] = current ? [...current] : [];
    for (const rule of this.rules) {
      if (matches(record.fields[rule.field], rule.equals) && !groups.some((g) => String(g) === String(rule.group))) {
        groups.push(rule.group);
      }
    }

    if (groups.length === (current?.length ?? 0)) return { record, changes: [] };

    return {
      record: withFields(record, { ...record.fields, [this.membershipField]: groups }),
      changes: [
        {
          entity: record.entity,
          primaryKey: record.primary_key,
          field: this.membershipField,
          before: current,
          after: groups,
          rule: 'membership',
        },
      ],
    };
  }
}

function matches(value: FieldValue | undefined, expected: string | number | boolean): boolean {
  if (value === expected) return true;
  return typeof expected === 'boolean' && typeof value === 'string' && parseBooleanLike(value) === expected;
}
