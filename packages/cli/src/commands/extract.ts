/**
 * Extract Command
 *
 * Read a bulk-copy dump and write one record file per target entity.
 *
 * USAGE:
 *   dumpshift extract <dump> [options]     (use "-" to read stdin)
 *
 * EXAMPLES:
 *   dumpshift extract data.sql --out fixtures
 *   dumpshift extract data.sql --unmapped drop-with-warning --null-token '\N'
 */

import { Option } from 'commander';
import type { Command } from 'commander';
import { FilePathSource, ROW_ALIGNMENTS, StreamSource, UNMAPPED_POLICIES, attachEventLogger } from '@dumpshift/core';
import type { Logger } from '@dumpshift/core';
import { DumpExtractor } from '@dumpshift/extract';
import type { ExtractResult } from '@dumpshift/extract';
import type { CliConfig, CliFlags } from '../lib/config.js';
import { resolveConfig } from '../lib/config.js';
import type { CliRuntime } from '../lib/runtime.js';
import { schemaFor } from '../lib/runtime.js';

export async function runExtract(
  dump: string,
  config: CliConfig,
  logger: Logger,
  stdin: AsyncIterable<string | Buffer>,
): Promise<ExtractResult> {
  const runLogger = logger.child('extract');
  const extractor = new DumpExtractor({
    schema: await schemaFor(config),
    unmappedPolicy: config.unmappedPolicy,
    rowAlignment: config.rowAlignment,
    nullToken: config.nullToken,
  });
  attachEventLogger(extractor, runLogger);

  extractor.from(dump === '-' ? new StreamSource(stdin, { fileName: 'stdin' }) : new FilePathSource(dump));
  const result = await extractor.run(config.outDir);

  if (config.unmappedPolicy === 'drop-silently' && Object.keys(result.summary.unmappedTables).length > 0) {
    runLogger.info('Skipped tables without a mapping', { tables: result.summary.unmappedTables });
  }
  return result;
}

export function registerExtractCommand(program: Command, runtime: CliRuntime): void {
  program
    .command('extract')
    .description('Extract a bulk-copy dump into per-entity record files')
    .argument('<dump>', 'dump file, or "-" for stdin')
    .option('-o, --out <dir>', 'output directory for record files')
    .option('-s, --schema <path>', 'schema mapping document (default: built-in legacy league schema)')
    .addOption(new Option('--unmapped <policy>', 'unmapped table/column policy').choices([...UNMAPPED_POLICIES]))
    .addOption(new Option('--alignment <mode>', 'row cell-count policy').choices([...ROW_ALIGNMENTS]))
    .option('--null-token <token>', 'cell value treated as empty (e.g. \\N)')
    .option('--log-level <level>', 'debug | info | warn | error')
    .action(async (dump: string, flags: CliFlags) => {
      const config = resolveConfig(flags, runtime.env);
      await runExtract(dump, config, runtime.createLogger(config), runtime.stdin);
    });
}
