/**
 * pipewright params — print the parameter set a pipeline would inject
 */

import {
  buildParameters,
  builtinParameters,
  extractParameterDeclarations,
  loadRunnerConfig,
  loadSettingsFile,
} from '@pipewright/core';
import { locateSettings, type CommandOptions, type CommandResult } from '../utils.js';

export async function params(opts: CommandOptions): Promise<CommandResult> {
  const cwd = opts.cwd || process.cwd();
  const config = opts.config ?? loadRunnerConfig();
  const location = locateSettings(opts.target, config, cwd);

  const settings = await loadSettingsFile(location.settingsPath);
  const declarations = extractParameterDeclarations(settings, builtinParameters(config));

  return { ok: true, report: JSON.stringify(buildParameters(declarations.all), null, 2) };
}
