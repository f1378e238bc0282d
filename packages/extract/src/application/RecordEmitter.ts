import type { EventBus, MigrationRecord, RecordFileStore } from '@dumpshift/core';
import { EntityCollisionError } from '@dumpshift/core';

/** A record file produced by the emitter. */
export interface EmittedFile {
  readonly entity: string;
  readonly path: string;
  readonly recordCount: number;
}

/**
 * Groups records by entity and writes one record file per entity that
 * received at least one record. Entities without records get no file.
 * Distinct entities whose file names coincide are rejected before anything is written.
 */
export class RecordEmitter {
  constructor(
    private readonly store: RecordFileStore,
    private readonly eventBus?: EventBus,
  ) {}

  async emit(records: AsyncIterable<MigrationRecord> | Iterable<MigrationRecord>): Promise<EmittedFile[]> {
    const groups = new Map<string, MigrationRecord[]>();
    for await (const record of records) {
      const group = groups.get(record.entity);
      if (group) group.push(record);
      else groups.set(record.entity, [record]);
    }

    const owners = new Map<string, string>();
    for (const entity of groups.keys()) {
      const path = this.store.pathFor(entity);
      const owner = owners.get(path);
      if (owner !== undefined) throw new EntityCollisionError([owner, entity], path);
      owners.set(path, entity);
    }

    const files: EmittedFile[] = [];
    for (const [entity, group] of groups) {
      const path = await this.store.write(entity, group);
      files.push({ entity, path, recordCount: group.length });
      this.eventBus?.emit({ type: 'file:written', entity, path, recordCount: group.length, timestamp: Date.now() });
    }
    return files;
  }
}
