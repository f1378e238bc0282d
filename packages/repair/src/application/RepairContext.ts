import type { MigrationRecord, MigrationSchema, RecordFileStore, LoadedRecordFile } from '@dumpshift/core';
import { EventBus } from '@dumpshift/core';
import type { FieldChange } from '../domain/model/FieldChange.js';
import type { RecordFixer } from '../domain/ports/RecordFixer.js';

/** Outcome of one repair pass over one record file. */
export interface FileRepairResult {
  readonly path: string;
  readonly changed: boolean;
  readonly changes: readonly FieldChange[];
  /** Backup written before the rewrite; `null` when nothing changed or in a dry run. */
  readonly backupPath: string | null;
}

/** Shared state for repair passes: schema, store, fixers, event bus and the dry-run switch. */
export class RepairContext {
  readonly eventBus = new EventBus();

  constructor(
    readonly schema: MigrationSchema,
    readonly store: RecordFileStore,
    readonly fixers: readonly RecordFixer[],
    readonly dryRun: boolean,
  ) {}

  /**
   * Persist a repaired file: back up the prior bytes and rewrite it when
   * something changed, otherwise leave it untouched. Emits the per-field and per-file events.
   */
  async commit(
    file: LoadedRecordFile,
    records: readonly MigrationRecord[],
    changes: readonly FieldChange[],
  ): Promise<FileRepairResult> {
    if (changes.length === 0) {
      this.eventBus.emit({ type: 'file:unchanged', path: file.path, timestamp: Date.now() });
      return { path: file.path, changed: false, changes, backupPath: null };
    }

    for (const change of changes) {
      this.eventBus.emit({ type: 'field:repaired', path: file.path, ...change, timestamp: Date.now() });
    }

    const backupPath = this.dryRun ? null : await this.store.replace(file, records);
    this.eventBus.emit({
      type: 'file:repaired',
      path: file.path,
      backupPath,
      changeCount: changes.length,
      dryRun: this.dryRun,
      timestamp: Date.now(),
    });
    return { path: file.path, changed: true, changes, backupPath };
  }
}
