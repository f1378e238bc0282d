/**
 * CLI configuration.
 *
 * Precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (DUMPSHIFT_*, LOG_LEVEL), optionally from `.env`
 * 3. Defaults
 */

import { z } from 'zod';
import type { RowAlignment, UnmappedPolicy, LogLevel } from '@dumpshift/core';

const configSchema = z.object({
  /** Schema mapping document; the built-in legacy league schema when absent. */
  schema: z.string().min(1).optional(),
  outDir: z.string().min(1).default('fixtures'),
  unmappedPolicy: z.enum(['drop-silently', 'drop-with-warning', 'fail']).default('drop-silently'),
  rowAlignment: z.enum(['strict', 'lenient']).default('strict'),
  nullToken: z.string().min(1).optional(),
  backupSuffix: z.string().min(1).default('.bak'),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  dryRun: z.boolean().default(false),
});

export interface CliConfig {
  readonly schema?: string;
  readonly outDir: string;
  readonly unmappedPolicy: UnmappedPolicy;
  readonly rowAlignment: RowAlignment;
  readonly nullToken?: string;
  readonly backupSuffix: string;
  readonly logLevel: LogLevel;
  readonly dryRun: boolean;
}

/** Options as they arrive from the command line; every value is optional. */
export interface CliFlags {
  readonly schema?: string;
  readonly out?: string;
  readonly unmapped?: string;
  readonly alignment?: string;
  readonly nullToken?: string;
  readonly backupSuffix?: string;
  readonly logLevel?: string;
  readonly dryRun?: boolean;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Merge flags over environment variables and validate the result. Throws `ConfigError`. */
export function resolveConfig(flags: CliFlags, env: NodeJS.ProcessEnv = process.env): CliConfig {
  const result = configSchema.safeParse({
    schema: flags.schema ?? env['DUMPSHIFT_SCHEMA'],
    outDir: flags.out ?? env['DUMPSHIFT_OUT_DIR'],
    unmappedPolicy: flags.unmapped ?? env['DUMPSHIFT_UNMAPPED_POLICY'],
    rowAlignment: flags.alignment ?? env['DUMPSHIFT_ROW_ALIGNMENT'],
    nullToken: flags.nullToken ?? env['DUMPSHIFT_NULL_TOKEN'],
    backupSuffix: flags.backupSuffix ?? env['DUMPSHIFT_BACKUP_SUFFIX'],
    logLevel: (flags.logLevel ?? env['LOG_LEVEL'])?.toLowerCase(),
    dryRun: flags.dryRun,
  });

  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`);
  }
  return result.data;
}
