import type { Logger, MigrationSchema } from '@dumpshift/core';
import { createLogger, loadBuiltinSchema, loadSchema } from '@dumpshift/core';
import type { CliConfig } from './config.js';

/** What every command needs from its surroundings. Tests substitute the logger and environment. */
export interface CliRuntime {
  readonly env: NodeJS.ProcessEnv;
  /** Build the logger once the configured level is known. */
  readonly createLogger: (config: CliConfig) => Logger;
  readonly stdin: AsyncIterable<string | Buffer>;
}

export function defaultRuntime(): CliRuntime {
  return {
    env: process.env,
    createLogger: (config) => createLogger({ level: config.logLevel }),
    stdin: process.stdin,
  };
}

/** The configured schema document, or the built-in legacy league schema. */
export function schemaFor(config: CliConfig): Promise<MigrationSchema> {
  return config.schema ? loadSchema(config.schema) : loadBuiltinSchema();
}
