import type { MigrationRecord } from '@dumpshift/core';
import type { FieldChange } from '../../domain/model/FieldChange.js';
import type { FileRepairResult, RepairContext } from '../RepairContext.js';

/**
 * Use case: run every configured fixer over the records of its entity in one
 * record file, then back up and rewrite the file once if anything changed.
 */
export class ApplyFixers {
  constructor(private readonly ctx: RepairContext) {}

  async execute(filePath: string): Promise<FileRepairResult> {
    const file = await this.ctx.store.read(filePath);
    const changes: FieldChange[] = [];
    const changedByFixer = new Map<string, number>();

    const records = file.records.map((original) => {
      let record: MigrationRecord = original;
      for (const fixer of this.ctx.fixers) {
        if (fixer.entity !== record.entity) continue;

        const outcome = fixer.fix(record);
        if (outcome.changes.length === 0) continue;

        record = outcome.record;
        changes.push(...outcome.changes);
        changedByFixer.set(fixer.name, (changedByFixer.get(fixer.name) ?? 0) + 1);
      }
      return record;
    });

    const entities = new Set(file.records.map((r) => r.entity));
    for (const fixer of this.ctx.fixers) {
      if (!entities.has(fixer.entity)) continue;
      this.ctx.eventBus.emit({
        type: 'fixer:applied',
        fixer: fixer.name,
        path: filePath,
        recordsChanged: changedByFixer.get(fixer.name) ?? 0,
        timestamp: Date.now(),
      });
    }

    return this.ctx.commit(file, records, changes);
  }
}
