/**
 * pipewright check — validate a pipeline without running it
 *
 * Checks every parameter declaration (built-ins included), its regex keys,
 * and every stage and action. Nothing is executed and the parameter store is untouched.
 */

import {
  builtinParameters,
  extractParameterDeclarations,
  loadRunnerConfig,
  loadSettingsFile,
  parseParameterDeclarations,
  silentSink,
  validate,
  validateParameters,
} from '@pipewright/core';
import { locateSettings, type CommandOptions, type CommandResult } from '../utils.js';

export async function check(opts: CommandOptions): Promise<CommandResult> {
  const cwd = opts.cwd || process.cwd();
  const config = opts.config ?? loadRunnerConfig();
  const sink = opts.sink ?? silentSink;
  const location = locateSettings(opts.target, config, cwd);

  const settings = await loadSettingsFile(location.settingsPath);
  const declarations = extractParameterDeclarations(settings, builtinParameters(config));

  const declarationsOk = validateParameters(declarations.all, sink);
  const regexKeysOk = parseParameterDeclarations(declarations.all, sink).allCorrect;
  const parametersOk = declarationsOk && regexKeysOk;
  const stagesOk = await validate(settings, sink);
  const ok = parametersOk && stagesOk;

  const report = [
    `Pipeline:    ${location.pipelineName}`,
    `Settings:    ${location.settingsPath}`,
    `Parameters:  ${parametersOk ? 'OK' : 'FAIL'}`,
    `Stages:      ${stagesOk ? 'OK' : 'FAIL'}`,
  ].join('\n');

  return { ok, report };
}
