/**
 * pipewright run — run a pipeline on the local host
 *
 * 1. Loads the settings file and the stored parameter set
 * 2. Applies --param values on top of the stored defaults
 * 3. Runs the pipeline, actions as shell commands
 * 4. Stores the parameter set when the run asks for an update
 * 5. Prints the status report
 */

import type { EventBus } from '@pipewright/shared';
import {
  PipelineRunner,
  describeNode,
  formatStatusReport,
  loadRunnerConfig,
  loadSettingsFile,
  silentSink,
  type ActionInvoker,
  type PipelineRunResult,
} from '@pipewright/core';
import {
  locateSettings,
  parameterStoreInjector,
  readParameterStore,
  shellInvoker,
  type CommandOptions,
  type CommandResult,
} from '../utils.js';

export interface RunOptions extends CommandOptions {
  /** Replaces the shell invoker. */
  invoker?: ActionInvoker;
  bus?: EventBus;
}

export interface RunCommandResult extends CommandResult {
  result: PipelineRunResult;
}

export async function run(opts: RunOptions): Promise<RunCommandResult> {
  const cwd = opts.cwd || process.cwd();
  const config = opts.config ?? loadRunnerConfig();
  const sink = opts.sink ?? silentSink;
  const location = locateSettings(opts.target, config, cwd);

  const settings = await loadSettingsFile(location.settingsPath);
  const activeParameters = { ...readParameterStore(location.parameterStorePath), ...opts.params };

  const runner = new PipelineRunner({
    invoker: opts.invoker ?? shellInvoker({ cwd, sink }),
    injectParameters: parameterStoreInjector(location.parameterStorePath),
    sink,
    bus: opts.bus,
    config,
  });

  const result = await runner.run({
    settings,
    activeParameters,
    dryRun: opts.dryRun ? true : undefined,
  });

  return { ok: result.status !== 'failed', report: formatRunReport(location.pipelineName, result), result };
}

export function formatRunReport(pipelineName: string, result: PipelineRunResult): string {
  const lines = [`Pipeline:    ${pipelineName}`, `Node:        ${describeNode(result.node)}`];

  switch (result.status) {
    case 'halted':
      lines.push(
        `Status:      HALTED (${result.parameters.length} parameters ${result.injected ? 'stored' : 'not stored, dry run'})`,
        '',
        'Pipeline parameters were updated. Run again to use them.'
      );
      break;
    case 'completed':
      lines.push(`Status:      ${result.dryRun ? 'COMPLETED (dry run)' : 'COMPLETED'}`, '', formatStatusReport(result.report));
      break;
    case 'failed':
      lines.push('Status:      FAILED', '', formatStatusReport(result.report), '', result.message);
      break;
  }

  return lines.join('\n');
}
