import type { DomainEvent, EventPayload, EventType, MigrationSchema } from '@dumpshift/core';
import { RecordFileFormatError, RecordFileStore } from '@dumpshift/core';
import type { RecordFixer } from './domain/ports/RecordFixer.js';
import { RepairContext } from './application/RepairContext.js';
import type { FileRepairResult } from './application/RepairContext.js';
import { NormalizeRecordFile } from './application/usecases/NormalizeRecordFile.js';
import type { NormalizeResult } from './application/usecases/NormalizeRecordFile.js';
import { ApplyFixers } from './application/usecases/ApplyFixers.js';
import { MembershipFixer } from './fixers/MembershipFixer.js';
import { GameFieldFixer } from './fixers/GameFieldFixer.js';

/** Configuration for repair passes. */
export interface RepairRunnerConfig {
  /** Schema whose entities and boolean fields the normalizer checks against. */
  readonly schema: MigrationSchema;
  /** Directory scanned by the `*All()` methods. Default: `'fixtures'`. */
  readonly directory?: string;
  /** Suffix of backup files. Default: `'.bak'`. */
  readonly backupSuffix?: string;
  /** Targeted fixers run by `fix()`. Default: membership and game-field fixers. */
  readonly fixers?: readonly RecordFixer[];
  /** When `true`, report changes without writing any file. Default: `false`. */
  readonly dryRun?: boolean;
}

/** A record file a sweep could not read. */
export interface FailedFile {
  readonly path: string;
  readonly reason: string;
}

/** Totals over a directory sweep. */
export interface RepairSummary {
  readonly filesScanned: number;
  readonly filesChanged: number;
  readonly fieldsChanged: number;
  readonly backups: readonly string[];
  readonly driftRecords: number;
  /** Files skipped because they are not valid record files; every other file is still processed. */
  readonly failed: readonly FailedFile[];
}

/** The fixers run when none are configured. */
export function defaultFixers(): RecordFixer[] {
  return [new MembershipFixer(), new GameFieldFixer()];
}

/**
 * Facade for the maintenance passes over already-written record files: the
 * generic normalizer and the targeted fixers. Each pass is independent and
 * repeatable; run them one at a time against a directory.
 *
 * @example
 * ```typescript
 * const runner = new RepairRunner({ schema, directory: 'fixtures' });
 * runner.on('schema:drift', (e) => console.warn(e.entity));
 * await runner.repairAll();
 * ```
 */
export class RepairRunner {
  private readonly ctx: RepairContext;

  constructor(config: RepairRunnerConfig) {
    const store = new RecordFileStore({ directory: config.directory, backupSuffix: config.backupSuffix });
    this.ctx = new RepairContext(config.schema, store, config.fixers ?? defaultFixers(), config.dryRun ?? false);
  }

  /** Subscribe to a domain event. */
  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.eventBus.on(type, handler);
    return this;
  }

  /** Subscribe to all domain events. */
  onAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.onAny(handler);
    return this;
  }

  /** Normalize one record file. */
  normalize(filePath: string): Promise<NormalizeResult> {
    return new NormalizeRecordFile(this.ctx).execute(filePath);
  }

  /** Run the targeted fixers over one record file. */
  fix(filePath: string): Promise<FileRepairResult> {
    return new ApplyFixers(this.ctx).execute(filePath);
  }

  /** Normalize every record file in the directory, in file-name order. */
  normalizeAll(): Promise<RepairSummary> {
    return this.sweep((path) => this.normalize(path));
  }

  /** Run the fixers over every record file in the directory. */
  fixAll(): Promise<RepairSummary> {
    return this.sweep((path) => this.fix(path));
  }

  /** Normalize, then fix, every record file in the directory. */
  async repairAll(): Promise<{ readonly normalized: RepairSummary; readonly fixed: RepairSummary }> {
    const normalized = await this.normalizeAll();
    const fixed = await this.fixAll();
    return { normalized, fixed };
  }

  /** Run `pass` over every record file; unreadable files are reported and skipped. */
  private async sweep(pass: (path: string) => Promise<FileRepairResult | NormalizeResult>): Promise<RepairSummary> {
    const results: (FileRepairResult | NormalizeResult)[] = [];
    const failed: FailedFile[] = [];

    for (const path of await this.ctx.store.list()) {
      try {
        results.push(await pass(path));
      } catch (error) {
        if (!(error instanceof RecordFileFormatError)) throw error;
        failed.push({ path, reason: error.message });
        this.ctx.eventBus.emit({ type: 'file:skipped', path, reason: error.message, timestamp: Date.now() });
      }
    }
    return summarize(results, failed);
  }
}

function summarize(results: readonly (FileRepairResult | NormalizeResult)[], failed: readonly FailedFile[]): RepairSummary {
  return {
    filesScanned: results.length,
    filesChanged: results.filter((r) => r.changed).length,
    fieldsChanged: results.reduce((sum, r) => sum + r.changes.length, 0),
    backups: results.flatMap((r) => (r.backupPath ? [r.backupPath] : [])),
    driftRecords: results.reduce((sum, r) => sum + ('drift' in r ? r.drift.length : 0), 0),
    failed,
  };
}
