/**
 * Parameter Schema Builder — turn settings items into typed parameters.
 *
 * Only items with a valid POSIX name produce output. An item whose kind
 * cannot be resolved produces nothing here; the validator reports it.
 */

import type {
  OnEmptyPolicy,
  ParameterDeclaration,
  ParameterDefinition,
  ParameterKind,
  SettingsMap,
  SettingsValue,
} from './types.js';
import { PARAMETER_KINDS } from './types.js';
import type { DiagnosticSink } from './diagnostics.js';
import { readRegexKeys } from './regex-rules.js';
import type { RegexKeys } from './regex-rules.js';
import {
  hasKey,
  inferParameterKind,
  isBlank,
  isPosixName,
  isSettingsMap,
  isStringConvertible,
  readKey,
  toBooleanValue,
  toPrintable,
} from './type-predicates.js';

export function isParameterKind(value: SettingsValue | undefined): value is ParameterKind {
  return typeof value === 'string' && PARAMETER_KINDS.some(kind => kind === value);
}

/**
 * Explicit kind wins, then structural inference (non-empty choices list,
 * then boolean default).
 */
export function resolveParameterKind(item: SettingsMap): ParameterKind | undefined {
  if (hasKey(item, 'type')) {
    const kind = readKey(item, 'type');
    return isParameterKind(kind) ? kind : undefined;
  }
  const inferred = inferParameterKind(item);
  if (inferred?.kind === 'choice' && readChoices(item).length === 0) return undefined;
  return inferred?.kind;
}

/**
 * Build one parameter from a settings item. Returns null when the item
 * has no valid name or no resolvable kind.
 */
export function buildParameter(item: SettingsMap): ParameterDefinition | null {
  const name = readKey(item, 'name');
  if (!isPosixName(name)) return null;

  const kind = resolveParameterKind(item);
  const description = readString(item, 'description') ?? '';
  const rawDefault = readKey(item, 'default');
  const defaultString = hasKey(item, 'default') ? toPrintable(rawDefault) : '';

  switch (kind) {
    case 'string':
      return { kind, name, defaultValue: defaultString, description, trim: toBooleanValue(readKey(item, 'trim')) };
    case 'text':
    case 'password':
      return { kind, name, defaultValue: defaultString, description };
    case 'boolean':
      return { kind, name, defaultValue: toBooleanValue(rawDefault), description };
    case 'choice': {
      const choices = readChoices(item);
      return choices.length > 0 ? { kind, name, choices, description } : null;
    }
    case undefined:
      return null;
  }
}

export function buildParameters(items: SettingsMap[]): ParameterDefinition[] {
  const parameters: ParameterDefinition[] = [];
  for (const item of items) {
    const parameter = buildParameter(item);
    if (parameter) parameters.push(parameter);
  }
  return parameters;
}

// ─── Strict Declarations ─────────────────────────────────────────

export interface ParsedDeclarations {
  declarations: ParameterDeclaration[];
  /** False when any regex rule failed to read. */
  allCorrect: boolean;
}

/**
 * Strict view of settings items, read once per run. Items without a usable
 * name are left out (the validator reports them); malformed regex keys are
 * reported to the sink and left out of their declaration.
 */
export function parseParameterDeclarations(items: SettingsMap[], sink: DiagnosticSink): ParsedDeclarations {
  let allCorrect = true;
  const declarations: ParameterDeclaration[] = [];
  for (const item of items) {
    const regexKeys = readRegexKeys(item, sink);
    allCorrect = regexKeys.ok && allCorrect;
    const declaration = toDeclaration(item, regexKeys);
    if (declaration) declarations.push(declaration);
  }
  return { declarations, allCorrect };
}

function toDeclaration(item: SettingsMap, regexKeys: RegexKeys): ParameterDeclaration | null {
  const name = readKey(item, 'name');
  if (!isPosixName(name)) return null;

  const declaration: ParameterDeclaration = {
    name,
    kind: resolveParameterKind(item) ?? 'unset',
    description: readString(item, 'description') ?? '',
    trim: toBooleanValue(readKey(item, 'trim')),
  };

  const rawDefault = readKey(item, 'default');
  if (typeof rawDefault === 'boolean') declaration.default = rawDefault;
  else if (isStringConvertible(rawDefault)) declaration.default = String(rawDefault);

  if (Array.isArray(readKey(item, 'choices'))) declaration.choices = readChoices(item);
  if (regexKeys.regex !== undefined) declaration.regex = regexKeys.regex;
  if (regexKeys.regexReplace) declaration.regexReplace = regexKeys.regexReplace;

  const onEmpty = readOnEmptyPolicy(item);
  if (onEmpty) declaration.onEmpty = onEmpty;

  return declaration;
}

/**
 * on_empty: { assign?, fail = true, warn = false }. An explicit
 * `fail: false` is honored.
 */
export function readOnEmptyPolicy(item: SettingsMap): OnEmptyPolicy | undefined {
  const raw = readKey(item, 'on_empty');
  if (!isSettingsMap(raw)) return undefined;

  const policy: OnEmptyPolicy = {
    fail: hasKey(raw, 'fail') ? toBooleanValue(readKey(raw, 'fail')) : true,
    warn: toBooleanValue(readKey(raw, 'warn')),
  };
  const assign = readKey(raw, 'assign');
  if (isStringConvertible(assign) && !isBlank(assign)) policy.assign = String(assign);
  return policy;
}

function readChoices(item: SettingsMap): string[] {
  const choices = readKey(item, 'choices');
  return Array.isArray(choices) ? choices.map(toPrintable) : [];
}

function readString(item: SettingsMap, key: string): string | undefined {
  const value = readKey(item, key);
  return isStringConvertible(value) ? String(value) : undefined;
}
