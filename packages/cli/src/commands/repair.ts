/**
 * Repair Commands
 *
 * Maintenance passes over record files that already exist:
 * - normalize: rewrite naive timestamps and boolean strings (idempotent, backs up changed files)
 * - fix: run the targeted per-entity fixers
 * - repair: normalize, then fix
 *
 * Each path may be a record file or a directory of record files; with no
 * path the configured output directory is used.
 *
 * EXAMPLES:
 *   dumpshift normalize fixtures
 *   dumpshift fix fixtures/authman_user.json --dry-run
 *   dumpshift repair
 */

import { stat } from 'node:fs/promises';
import type { Command } from 'commander';
import { RecordFileFormatError, attachEventLogger } from '@dumpshift/core';
import type { Logger } from '@dumpshift/core';
import { RepairRunner } from '@dumpshift/repair';
import type { FileRepairResult, NormalizeResult, RepairSummary } from '@dumpshift/repair';
import type { CliConfig, CliFlags } from '../lib/config.js';
import { resolveConfig } from '../lib/config.js';
import type { CliRuntime } from '../lib/runtime.js';
import { schemaFor } from '../lib/runtime.js';

export type RepairMode = 'normalize' | 'fix' | 'repair';

const EMPTY_SUMMARY: RepairSummary = {
  filesScanned: 0,
  filesChanged: 0,
  fieldsChanged: 0,
  backups: [],
  driftRecords: 0,
  failed: [],
};

/** Some record files could not be read; the others were still repaired. */
export class IncompleteRepairError extends Error {
  constructor(
    public readonly mode: RepairMode,
    public readonly failed: RepairSummary['failed'],
  ) {
    super(`${mode} skipped ${failed.length} unreadable record file${failed.length === 1 ? '' : 's'}`);
    this.name = 'IncompleteRepairError';
  }
}

/** Run one maintenance pass over every given path and return the combined totals. */
export async function runRepair(
  mode: RepairMode,
  paths: readonly string[],
  config: CliConfig,
  logger: Logger,
): Promise<RepairSummary> {
  const schema = await schemaFor(config);
  const passLogger = logger.child(mode);
  const targets = paths.length > 0 ? paths : [config.outDir];
  let total = EMPTY_SUMMARY;

  for (const target of targets) {
    const isDirectory = (await stat(target)).isDirectory();
    const runner = new RepairRunner({
      schema,
      directory: isDirectory ? target : undefined,
      backupSuffix: config.backupSuffix,
      dryRun: config.dryRun,
    });
    attachEventLogger(runner, passLogger);

    const summary = isDirectory ? await sweep(runner, mode) : await single(runner, mode, target, passLogger);
    total = combine(total, summary);
  }

  passLogger.info(`${mode} finished`, {
    files: total.filesScanned,
    failed: total.failed.length,
    changed: total.filesChanged,
    fields: total.fieldsChanged,
    drift: total.driftRecords,
    dryRun: config.dryRun,
  });
  return total;
}

async function sweep(runner: RepairRunner, mode: RepairMode): Promise<RepairSummary> {
  switch (mode) {
    case 'normalize':
      return runner.normalizeAll();
    case 'fix':
      return runner.fixAll();
    case 'repair': {
      const { normalized, fixed } = await runner.repairAll();
      return combine(normalized, { ...fixed, filesScanned: 0 });
    }
  }
}

async function single(runner: RepairRunner, mode: RepairMode, path: string, logger: Logger): Promise<RepairSummary> {
  const results: (NormalizeResult | FileRepairResult)[] = [];
  try {
    if (mode !== 'fix') results.push(await runner.normalize(path));
    if (mode !== 'normalize') results.push(await runner.fix(path));
  } catch (error) {
    if (!(error instanceof RecordFileFormatError)) throw error;
    logger.error('Skipped unreadable record file', { path, reason: error.message });
    return { ...EMPTY_SUMMARY, failed: [{ path, reason: error.message }] };
  }

  return {
    filesScanned: 1,
    filesChanged: results.some((r) => r.changed) ? 1 : 0,
    fieldsChanged: results.reduce((sum, r) => sum + r.changes.length, 0),
    backups: [...new Set(results.flatMap((r) => (r.backupPath ? [r.backupPath] : [])))],
    driftRecords: results.reduce((sum, r) => sum + ('drift' in r ? r.drift.length : 0), 0),
    failed: [],
  };
}

function combine(a: RepairSummary, b: RepairSummary): RepairSummary {
  return {
    filesScanned: a.filesScanned + b.filesScanned,
    filesChanged: a.filesChanged + b.filesChanged,
    fieldsChanged: a.fieldsChanged + b.fieldsChanged,
    backups: [...new Set([...a.backups, ...b.backups])],
    driftRecords: a.driftRecords + b.driftRecords,
    failed: [...a.failed, ...b.failed.filter((f) => !a.failed.some((seen) => seen.path === f.path))],
  };
}

const DESCRIPTIONS: Readonly<Record<RepairMode, string>> = {
  normalize: 'Rewrite naive timestamps and boolean strings in record files',
  fix: 'Run the targeted per-entity fixers over record files',
  repair: 'Normalize, then fix, record files',
};

export function registerRepairCommands(program: Command, runtime: CliRuntime): void {
  for (const mode of ['normalize', 'fix', 'repair'] as const) {
    program
      .command(mode)
      .description(DESCRIPTIONS[mode])
      .argument('[paths...]', 'record files or directories (default: the output directory)')
      .option('-o, --out <dir>', 'directory used when no path is given')
      .option('-s, --schema <path>', 'schema mapping document (default: built-in legacy league schema)')
      .option('--backup-suffix <suffix>', 'suffix appended to backup file names')
      .option('--dry-run', 'report changes without writing files')
      .option('--log-level <level>', 'debug | info | warn | error')
      .action(async (paths: string[], flags: CliFlags) => {
        const config = resolveConfig(flags, runtime.env);
        const summary = await runRepair(mode, paths, config, runtime.createLogger(config));
        if (summary.failed.length > 0) throw new IncompleteRepairError(mode, summary.failed);
      });
  }
}
