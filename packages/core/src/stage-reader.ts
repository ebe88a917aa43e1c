/**
 * Stage Reader — structural checks for stages and actions.
 *
 * Reads raw settings into strict declarations and a structure verdict.
 * Check mode passes a real sink; execute mode reads the same way with a
 * silent one, so both modes see identical declarations.
 */

import type { ActionDeclaration, SettingsMap, SettingsValue, StageDeclaration } from './types.js';
import type { DiagnosticSink } from './diagnostics.js';
import { report } from './diagnostics.js';
import {
  hasKey,
  isBlank,
  isBooleanConvertible,
  isSettingsMap,
  isStringConvertible,
  printableKey,
  readKey,
  toBooleanValue,
} from './type-predicates.js';
import { ANY_NODE, readNodeSelector } from './node-selector.js';
import { actionLabel } from './status-report.js';

const MESSAGE_KEYS = ['before_message', 'after_message', 'success_message', 'fail_message'] as const;
const FLAG_KEYS = ['ignore_fail', 'stop_on_fail'] as const;

export interface ActionReading {
  action: ActionDeclaration;
  ok: boolean;
}

export interface StageReading {
  stage: StageDeclaration;
  stageOk: boolean;
  /** Structure verdict per action, same order as stage.actions. */
  actionOk: boolean[];
}

export function readStage(raw: SettingsValue, stageIndex: number, sink: DiagnosticSink): StageReading {
  if (!isSettingsMap(raw)) {
    report(sink, 'ERROR', 'structure', `Stage #${stageIndex} should be a map of 'name', 'actions' and 'parallel' keys.`);
    return { stage: { name: '<undefined>', parallel: false, actions: [] }, stageOk: false, actionOk: [] };
  }

  let ok = true;
  if (!isStringConvertible(readKey(raw, 'name')) || isBlank(readKey(raw, 'name'))) {
    ok = report(sink, 'ERROR', 'structure',
      "Unable to convert stage name to a string, probably it's undefined or empty.", ok);
  }
  const name = printableKey(raw);

  const actions = readKey(raw, 'actions');
  if (!Array.isArray(actions) || actions.length === 0) {
    ok = report(sink, 'ERROR', 'structure', `Incorrect or undefined actions for '${name}' stage.`, ok);
  }

  const parallel = readKey(raw, 'parallel');
  if (hasKey(raw, 'parallel') && !isBooleanConvertible(parallel)) {
    ok = report(sink, 'ERROR', 'structure',
      `Unable to determine 'parallel' value for '${name}' stage. Remove them or set as boolean.`, ok);
  }

  const readings = (Array.isArray(actions) ? actions : []).map((action, index) =>
    readAction(action, index, actionLabel(name, index), sink)
  );

  return {
    stage: { name, parallel: toBooleanValue(parallel), actions: readings.map(r => r.action) },
    stageOk: ok,
    actionOk: readings.map(r => r.ok),
  };
}

export function readAction(raw: SettingsValue, index: number, label: string, sink: DiagnosticSink): ActionReading {
  if (!isSettingsMap(raw)) {
    return {
      action: { index, node: ANY_NODE, ignoreFail: false, stopOnFail: false },
      ok: report(sink, 'ERROR', 'structure', `Action '${label}' should be a map.`),
    };
  }

  let ok = true;
  for (const key of MESSAGE_KEYS) {
    ok = checkOptionalKey(raw, key, label, 'string', sink) && ok;
  }
  for (const key of FLAG_KEYS) {
    ok = checkOptionalKey(raw, key, label, 'boolean', sink) && ok;
  }

  const node = readNodeSelector(raw, label, sink);
  ok = node.ok && ok;

  const action = readKey(raw, 'action');
  if (isBlank(action)) {
    ok = report(sink, 'ERROR', 'structure', `No 'action' key specified, nothing to check in '${label}' action.`, ok);
  } else if (!isStringConvertible(action)) {
    ok = report(sink, 'ERROR', 'structure', `'action' key in '${label}' should be a string.`, ok);
  }

  const declaration: ActionDeclaration = {
    index,
    node: node.node,
    ignoreFail: toBooleanValue(readKey(raw, 'ignore_fail')),
    stopOnFail: toBooleanValue(readKey(raw, 'stop_on_fail')),
  };
  if (isStringConvertible(action) && !isBlank(action)) declaration.action = String(action);
  declaration.beforeMessage = readMessage(raw, 'before_message');
  declaration.afterMessage = readMessage(raw, 'after_message');
  declaration.successMessage = readMessage(raw, 'success_message');
  declaration.failMessage = readMessage(raw, 'fail_message');

  return { action: declaration, ok };
}

/**
 * Blank values warn (remove the key), type mismatches are errors.
 */
function checkOptionalKey(
  map: SettingsMap,
  key: string,
  label: string,
  expected: 'string' | 'boolean',
  sink: DiagnosticSink
): boolean {
  if (!hasKey(map, key)) return true;
  const value = readKey(map, key);
  if (isBlank(value)) {
    sink({
      severity: 'WARNING',
      category: 'structure',
      message: `'${key}' key defined for '${label}', but it's empty. Remove a key or define it's value.`,
    });
    return true;
  }
  const typeOk = expected === 'string' ? isStringConvertible(value) : isBooleanConvertible(value);
  return typeOk || report(sink, 'ERROR', 'structure', `'${key}' key in '${label}' should be a ${expected}.`);
}

function readMessage(map: SettingsMap, key: string): string | undefined {
  const value = readKey(map, key);
  return isStringConvertible(value) && !isBlank(value) ? String(value) : undefined;
}
