import type { FieldValue } from '@dumpshift/core';

/** Name of the rule that produced a change. */
export type RepairRule =
  | 'naive-timestamp'
  | 'missing-zone'
  | 'offset-format'
  | 'boolean-string'
  | 'membership'
  | 'rename'
  | 'integer'
  | 'default';

/** One field rewritten by the normalizer or a fixer. `before`/`after` are `undefined` when the field was absent. */
export interface FieldChange {
  readonly entity: string;
  readonly primaryKey: number | null;
  readonly field: string;
  readonly before: FieldValue | undefined;
  readonly after: FieldValue | undefined;
  readonly rule: RepairRule;
}

/** A record after a repair step, with the changes that step made. */
export interface RepairOutcome<R> {
  readonly record: R;
  readonly changes: readonly FieldChange[];
}
