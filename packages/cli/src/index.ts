/**
 * Pipewright CLI — command implementations, usable without the binary.
 */

export { check } from './commands/check.js';
export { run, formatRunReport } from './commands/run.js';
export type { RunOptions, RunCommandResult } from './commands/run.js';
export { params } from './commands/params.js';
export {
  parseArgs,
  locateSettings,
  readParameterStore,
  parameterStoreInjector,
  shellInvoker,
} from './utils.js';
export type { CliArgs, ParsedArgs, SettingsLocation, CommandOptions, CommandResult } from './utils.js';
