import type { MigrationRecord } from '@dumpshift/core';
import { isKnownEntity } from '@dumpshift/core';
import type { FieldChange } from '../../domain/model/FieldChange.js';
import { normalizeRecord } from '../../domain/services/normalizeRecord.js';
import type { FileRepairResult, RepairContext } from '../RepairContext.js';

/** Records naming an entity the schema does not know. */
export interface DriftedRecord {
  readonly entity: string;
  readonly primaryKey: number | null;
}

export interface NormalizeResult extends FileRepairResult {
  readonly drift: readonly DriftedRecord[];
}

/**
 * Use case: the generic repair pass over one record file. Idempotent; a file
 * with nothing to change is not written and gets no backup. Records of unknown
 * entities are reported and still normalized.
 */
export class NormalizeRecordFile {
  constructor(private readonly ctx: RepairContext) {}

  async execute(filePath: string): Promise<NormalizeResult> {
    const file = await this.ctx.store.read(filePath);
    const records: MigrationRecord[] = [];
    const changes: FieldChange[] = [];
    const drift: DriftedRecord[] = [];

    for (const record of file.records) {
      if (!isKnownEntity(this.ctx.schema, record.entity)) {
        drift.push({ entity: record.entity, primaryKey: record.primary_key });
        this.ctx.eventBus.emit({
          type: 'schema:drift',
          path: filePath,
          entity: record.entity,
          primaryKey: record.primary_key,
          timestamp: Date.now(),
        });
      }

      const outcome = normalizeRecord(record, this.ctx.schema.coercion);
      records.push(outcome.record);
      changes.push(...outcome.changes);
    }

    const result = await this.ctx.commit(file, records, changes);
    return { ...result, drift };
  }
}
