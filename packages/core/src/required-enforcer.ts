/**
 * Required-Parameter Enforcer — make sure required parameters are set.
 *
 * Per required item, against the resolved environment:
 *   defined                 → nothing to do
 *   undefined, no on_empty  → failure
 *   undefined, no assign    → fail / warn as declared
 *   undefined, assign       → assign a literal or a referenced variable;
 *                             a blank result falls back to fail / warn
 */

import type { EnforceResult, ParameterDeclaration, ResolvedEnvironment } from './types.js';
import type { DiagnosticSink } from './diagnostics.js';

const VARIABLE_SIGIL = '$';

export function isVariableReference(assignment: string): boolean {
  return assignment.startsWith(VARIABLE_SIGIL);
}

/** `$NAME` and `${NAME}` both name NAME. */
export function variableReferenceName(assignment: string): string {
  return assignment.replace(/[${}]/g, '');
}

export function isParameterDefined(name: string, environment: ResolvedEnvironment): boolean {
  const value = environment[name];
  return value !== undefined && value.trim() !== '';
}

/**
 * Resolve an on_empty assignment: variable references are looked up in the
 * environment, anything else is a literal.
 */
export function resolveAssignment(assignment: string, environment: ResolvedEnvironment): string {
  if (!isVariableReference(assignment)) return assignment;
  return environment[variableReferenceName(assignment)] ?? '';
}

export function enforceRequiredParameters(
  required: ParameterDeclaration[],
  environment: ResolvedEnvironment,
  sink: DiagnosticSink
): EnforceResult {
  let allSet = true;
  if (required.length === 0) return { allSet, environment };

  sink({
    severity: 'INFO',
    category: 'required-parameter',
    message: 'Checking that all required pipeline parameters were defined for current run.',
  });

  for (const { name, onEmpty } of required) {
    if (isParameterDefined(name, environment)) continue;

    const policy = onEmpty ?? { fail: true, warn: false };
    let note = '';
    if (policy.assign !== undefined) {
      const value = resolveAssignment(policy.assign, environment);
      if (value.trim() !== '') {
        environment[name] = value;
        sink({
          severity: 'INFO',
          category: 'required-parameter',
          message: `'${name}' pipeline parameter was undefined and assigned from '${policy.assign}'.`,
        });
        continue;
      }
      note = `(can't be assigned with '${policy.assign}' variable) `;
    }

    if (policy.fail) allSet = false;
    if (policy.warn || policy.fail) {
      sink({
        severity: policy.fail ? 'ERROR' : 'WARNING',
        category: 'required-parameter',
        message: `'${name}' pipeline parameter is required, but undefined ${note}for current run. ` +
          'Please specify then re-run again.',
      });
    }
  }

  return { allSet, environment };
}
