import { Command, CommanderError } from 'commander';
import { isDumpshiftError } from '@dumpshift/core';
import type { Logger } from '@dumpshift/core';
import { createLogger } from '@dumpshift/core';
import { registerExtractCommand } from './commands/extract.js';
import { IncompleteRepairError, registerRepairCommands } from './commands/repair.js';
import { ConfigError } from './lib/config.js';
import type { CliRuntime } from './lib/runtime.js';
import { defaultRuntime } from './lib/runtime.js';

export const CLI_NAME = 'dumpshift';
export const CLI_VERSION = '0.1.0';

export function createProgram(runtime: CliRuntime): Command {
  const program = new Command()
    .name(CLI_NAME)
    .version(CLI_VERSION)
    .description('Extract a legacy database dump into canonical record files and keep them canonical')
    .exitOverride();

  registerExtractCommand(program, runtime);
  registerRepairCommands(program, runtime);
  return program;
}

/**
 * Run the CLI with the given arguments (without the node and script paths).
 * Resolves to the process exit code; fatal errors are logged, never thrown.
 */
export async function runCli(argv: readonly string[], runtime: CliRuntime = defaultRuntime(), errorLogger?: Logger): Promise<number> {
  const logger = errorLogger ?? createLogger({ service: CLI_NAME });

  try {
    await createProgram(runtime).parseAsync([...argv], { from: 'user' });
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      // Help and version output also arrive here, with exit code 0.
      return error.exitCode;
    }
    if (isDumpshiftError(error)) {
      logger.error(error.message, { code: error.code });
      return 1;
    }
    if (error instanceof ConfigError) {
      logger.error(error.message, { code: 'CONFIG' });
      return 1;
    }
    if (error instanceof IncompleteRepairError) {
      logger.error(error.message, { code: 'REPAIR_INCOMPLETE', files: error.failed.map((f) => f.path) });
      return 1;
    }
    logger.error(error instanceof Error ? error.message : String(error), { code: 'UNEXPECTED' });
    return 1;
  }
}
