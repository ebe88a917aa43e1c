/**
 * Schema Reconciler — compare declared parameters with the active set.
 *
 * A declared parameter missing from the host's active parameters means the
 * host has to be updated before the pipeline can run with it. The update
 * itself ends the run with a halt, not a failure: the operator re-runs once
 * the parameters are visible.
 */

import type {
  ActiveParameters,
  ParameterInjector,
  ParameterUpdateOutcome,
  ReconcileResult,
  SettingsMap,
} from './types.js';
import type { DiagnosticSink } from './diagnostics.js';
import { report } from './diagnostics.js';
import { isPosixName, isStringConvertible, printableKey, readKey } from './type-predicates.js';
import { buildParameters, resolveParameterKind } from './parameter-schema.js';

const INCORRECT_KEY = 'key for pipeline parameter is undefined or incorrect value specified';

export function reconcileParameters(
  declarations: SettingsMap[],
  activeParameters: ActiveParameters,
  sink: DiagnosticSink
): ReconcileResult {
  let updateRequired = false;
  let allValid = true;

  for (const item of declarations) {
    if (resolveParameterKind(item) === undefined) {
      allValid = report(sink, 'ERROR', 'parameter',
        `Parameter '${printableKey(item)}' from pipeline settings might be ignored: 'type' ${INCORRECT_KEY}.`,
        allValid);
    }

    const name = readKey(item, 'name');
    if (!isPosixName(name)) {
      const posixNote = isStringConvertible(name) ? " (parameter name didn't meet POSIX standards)." : '.';
      sink({
        severity: 'WARNING',
        category: 'parameter',
        message: `Skipping parameter from pipeline settings: 'name' ${INCORRECT_KEY}${posixNote}`,
      });
      continue;
    }

    if (!Object.prototype.hasOwnProperty.call(activeParameters, name)) {
      updateRequired = true;
    }
  }

  return { updateRequired, allValid };
}

/**
 * Build the parameter set and hand it to the injector (skipped on dry run).
 * Valid declarations halt the run; invalid ones fail it.
 */
export async function applyParameterUpdate(
  declarations: SettingsMap[],
  opts: { allValid: boolean; dryRun: boolean },
  inject: ParameterInjector,
  sink: DiagnosticSink
): Promise<ParameterUpdateOutcome> {
  const parameters = buildParameters(declarations);
  sink({
    severity: 'INFO',
    category: 'parameter',
    message: 'Current pipeline parameters require an update from settings. ' +
      `Updating${opts.dryRun ? ' will be skipped in dry-run mode.' : '...'}`,
  });

  if (!opts.dryRun) {
    await inject(parameters);
  }

  if (!opts.allValid) {
    return {
      status: 'failed',
      reason: 'Pipeline parameters injection failed. Check pipeline config and run again.',
      parameters,
    };
  }

  sink({
    severity: 'WARNING',
    category: 'parameter',
    message: opts.dryRun
      ? "Pipeline parameters weren't injected. Disable dry-run mode and run again."
      : 'Pipeline parameters were successfully injected. Run again with the new parameters.',
  });
  return { status: 'halted', injected: !opts.dryRun, parameters };
}
