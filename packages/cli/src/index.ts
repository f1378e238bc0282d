export { createProgram, runCli, CLI_NAME, CLI_VERSION } from './program.js';
export { resolveConfig, ConfigError } from './lib/config.js';
export type { CliConfig, CliFlags } from './lib/config.js';
export { defaultRuntime, schemaFor } from './lib/runtime.js';
export type { CliRuntime } from './lib/runtime.js';
export { runExtract, registerExtractCommand } from './commands/extract.js';
export { runRepair, registerRepairCommands, IncompleteRepairError } from './commands/repair.js';
export type { RepairMode } from './commands/repair.js';
