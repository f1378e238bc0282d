import { readFile, readdir, mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import type { MigrationRecord } from '../../domain/model/Record.js';
import { parseRecords, serializeRecords } from './RecordFileCodec.js';
import { writeFileAtomic } from './writeFileAtomic.js';

export interface RecordFileStoreOptions {
  /** Directory holding one record file per entity. Default: `'fixtures'`. */
  readonly directory?: string;
  /** Suffix appended to a record file's path to name its backup. Default: `'.bak'`. */
  readonly backupSuffix?: string;
}

/** A record file as read from disk, with its exact bytes kept for backing up. */
export interface LoadedRecordFile {
  readonly path: string;
  readonly bytes: Buffer;
  readonly records: readonly MigrationRecord[];
}

/**
 * File-based store for record files.
 *
 * Each entity is stored in `{directory}/{entity with dots replaced by underscores}.json`.
 * Every write goes through a temporary file and an atomic rename; in-place
 * rewrites first write a byte-for-byte backup to `{path}{backupSuffix}`.
 *
 * Single writer: callers must not run two passes against the same directory at once.
 */
export class RecordFileStore {
  readonly directory: string;
  readonly backupSuffix: string;

  constructor(options?: RecordFileStoreOptions) {
    this.directory = options?.directory ?? 'fixtures';
    this.backupSuffix = options?.backupSuffix ?? '.bak';
  }

  /** Path of the record file for an entity. */
  pathFor(entity: string): string {
    return join(this.directory, `${entity.replace(/[^\w-]/g, '_')}.json`);
  }

  /** Path of the backup kept for a record file. */
  backupPathFor(filePath: string): string {
    return `${filePath}${this.backupSuffix}`;
  }

  /** Overwrite the entity's record file wholesale. Returns the file path. */
  async write(entity: string, records: readonly MigrationRecord[]): Promise<string> {
    await mkdir(this.directory, { recursive: true });
    const filePath = this.pathFor(entity);
    await writeFileAtomic(filePath, serializeRecords(records));
    return filePath;
  }

  /** Read and validate a record file. */
  async read(filePath: string): Promise<LoadedRecordFile> {
    const bytes = await readFile(filePath);
    return { path: filePath, bytes, records: parseRecords(bytes.toString('utf-8'), filePath) };
  }

  /**
   * Back up the file's prior bytes, then atomically replace it with `records`.
   * The rewrite only starts once the backup is on disk. Returns the backup path.
   */
  async replace(file: LoadedRecordFile, records: readonly MigrationRecord[]): Promise<string> {
    const backupPath = this.backupPathFor(file.path);
    await writeFileAtomic(backupPath, file.bytes);
    await writeFileAtomic(file.path, serializeRecords(records));
    return backupPath;
  }

  /** Record files in the directory (`*.json`), sorted by name. Backups and temporary files are excluded. */
  async list(): Promise<string[]> {
    const entries = await readdir(this.directory, { withFileTypes: true });
    return entries
      .filter((e) => e.isFile() && e.name.endsWith('.json'))
      .map((e) => e.name)
      .sort()
      .map((name) => join(this.directory, name));
  }
}
