/**
 * Parameter Validator — check one settings item for internal consistency.
 *
 * Every rule runs; ERROR diagnostics flip the verdict, WARNING ones don't.
 * Callers AND verdicts across all items so one pass reports every problem.
 */

import type { SettingsMap } from './types.js';
import type { DiagnosticSink } from './diagnostics.js';
import { report } from './diagnostics.js';
import {
  describeValueType,
  hasKey,
  inferParameterKind,
  isBooleanConvertible,
  isPosixName,
  isSettingsMap,
  isStringConvertible,
  printableKey,
  readKey,
  toPrintable,
} from './type-predicates.js';
import { isParameterKind } from './parameter-schema.js';
import { variableReferenceName, isVariableReference } from './required-enforcer.js';

export function validateParameter(item: SettingsMap, sink: DiagnosticSink): boolean {
  const printableName = printableKey(item);
  const fail = (message: string, verdict: boolean): boolean =>
    report(sink, 'ERROR', 'parameter', `Wrong syntax in pipeline parameter '${printableName}': ${message}.`, verdict);

  sink({
    severity: 'DEBUG',
    category: 'parameter',
    message: `Checking pipeline parameter '${printableName}':\n${JSON.stringify(item, null, 2)}`,
  });

  let ok = true;

  // 1. name
  if (!hasKey(item, 'name')) {
    ok = fail("'name' key is required, but undefined", ok);
  } else if (!isPosixName(readKey(item, 'name'))) {
    ok = fail('Invalid parameter name', ok);
  }

  // 2. on_empty.assign variable reference
  const onEmpty = readKey(item, 'on_empty');
  const assign = isSettingsMap(onEmpty) ? readKey(onEmpty, 'assign') : undefined;
  if (typeof assign === 'string' && isVariableReference(assign) && !isPosixName(variableReferenceName(assign))) {
    ok = fail(`Unable to assign due to incorrect variable name: '${assign}'`, ok);
  }

  // 3./4. kind against default and choices, or kind inference
  if (hasKey(item, 'type')) {
    const kind = readKey(item, 'type');
    const choices = readKey(item, 'choices');
    if (!isParameterKind(kind)) {
      ok = fail(`'type' value '${toPrintable(kind)}' is not one of: string, text, password, boolean, choice`, ok);
    } else if (kind === 'choice' && !hasKey(item, 'choices')) {
      ok = fail("'type' set as choice while no 'choices' list defined", ok);
    } else if (kind === 'choice' && Array.isArray(choices) && choices.length === 0) {
      ok = fail("'type' set as choice while 'choices' list is empty", ok);
    } else if (kind === 'boolean' && hasKey(item, 'default') && typeof readKey(item, 'default') !== 'boolean') {
      const value = readKey(item, 'default');
      const convertible = isBooleanConvertible(value) ? ", but it's convertible to boolean" : '';
      ok = fail(
        `'type' set as boolean while 'default' key is not. It's ${describeValueType(value)}${convertible}`,
        ok
      );
    }
  } else {
    const inferred = inferParameterKind(item);
    if (inferred) {
      ok = fail(`'type' key is not defined, but was detected by '${inferred.triggeredBy}' key: ${inferred.kind}`, ok);
    } else {
      const hint = hasKey(item, 'default') && isStringConvertible(readKey(item, 'default'))
        ? ". Probably 'type' is password, string or text"
        : '';
      ok = fail(`'type' is required, but wasn't defined${hint}`, ok);
    }
  }

  // 5./6. choices
  if (hasKey(item, 'choices') && hasKey(item, 'default')) {
    ok = fail("'default' and 'choices' keys are incompatible", ok);
  }
  if (hasKey(item, 'choices') && !Array.isArray(readKey(item, 'choices'))) {
    ok = fail("'choices' value is not a list of items", ok);
  }

  return ok;
}

/**
 * Validate every item; never stops at the first failure.
 */
export function validateParameters(items: SettingsMap[], sink: DiagnosticSink): boolean {
  let allPass = true;
  for (const item of items) {
    allPass = validateParameter(item, sink) && allPass;
  }
  return allPass;
}
