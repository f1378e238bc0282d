import type { MigrationRecord } from '@dumpshift/core';
import type { RepairOutcome } from '../model/FieldChange.js';

/**
 * A targeted repair rule for one entity, run after the generic normalizer.
 *
 * Implementations must be idempotent: fixing an already-fixed record returns
 * it unchanged with no changes. They may add or rename fields but never drop a value.
 */
export interface RecordFixer {
  /** Short name used in events and logs. */
  readonly name: string;
  /** Entity whose records the fixer handles. */
  readonly entity: string;
  fix(record: MigrationRecord): RepairOutcome<MigrationRecord>;
}
