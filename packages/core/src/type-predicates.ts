/**
 * Type Predicates — classify loosely typed settings values.
 *
 * Settings come from YAML, so a key may hold anything. Nothing here coerces
 * silently: callers ask whether a conversion is safe, then convert.
 */

import type { ParameterKind, SettingsMap, SettingsValue } from './types.js';

const POSIX_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

// Settings keys are snake_case; the camelCase spellings are accepted too.
const KEY_ALIASES: Record<string, string> = {
  type: 'kind',
  on_empty: 'onEmpty',
  regex_replace: 'regexReplace',
  before_message: 'beforeMessage',
  after_message: 'afterMessage',
  success_message: 'successMessage',
  fail_message: 'failMessage',
  ignore_fail: 'ignoreFail',
  stop_on_fail: 'stopOnFail',
};

// ─── Boundary Conversion ─────────────────────────────────────────

/**
 * Convert decoder output into a SettingsValue. Total: every input maps to
 * something, unknown leaves become null.
 */
export function toSettingsValue(raw: unknown): SettingsValue {
  if (raw === null || raw === undefined) return null;
  if (typeof raw === 'string' || typeof raw === 'boolean') return raw;
  if (typeof raw === 'number') return raw;
  if (typeof raw === 'bigint') return raw.toString();
  if (raw instanceof Date) return raw.toISOString();
  if (Array.isArray(raw)) return raw.map(toSettingsValue);
  if (typeof raw === 'object') {
    const map: SettingsMap = {};
    for (const [key, value] of Object.entries(raw)) {
      map[key] = toSettingsValue(value);
    }
    return map;
  }
  return null;
}

export function isSettingsMap(value: SettingsValue | undefined): value is SettingsMap {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * True when the map carries the key under its settings name or its alias.
 */
export function hasKey(map: SettingsMap, key: string): boolean {
  const alias = KEY_ALIASES[key];
  return hasOwn(map, key) || (alias !== undefined && hasOwn(map, alias));
}

export function readKey(map: SettingsMap, key: string): SettingsValue | undefined {
  if (hasOwn(map, key)) return map[key];
  const alias = KEY_ALIASES[key];
  return alias !== undefined && hasOwn(map, alias) ? map[alias] : undefined;
}

function hasOwn(map: SettingsMap, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(map, key);
}

// ─── Convertibility ──────────────────────────────────────────────

/**
 * Human readable after conversion to string: strings and numbers only
 * (no lists, maps, booleans or null).
 */
export function isStringConvertible(value: SettingsValue | undefined): value is string | number {
  return typeof value === 'string' || (typeof value === 'number' && Number.isFinite(value));
}

/**
 * Converts to a boolean and back without loss: booleans and the exact
 * strings 'true' / 'false'.
 */
export function isBooleanConvertible(value: SettingsValue | undefined): value is boolean | 'true' | 'false' {
  return typeof value === 'boolean' || value === 'true' || value === 'false';
}

export function toBooleanValue(value: SettingsValue | undefined): boolean {
  return value === true || value === 'true';
}

export function toPrintable(value: SettingsValue | undefined): string {
  if (value === undefined || value === null) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return JSON.stringify(value);
}

/**
 * Absent, null, or whitespace only.
 */
export function isBlank(value: SettingsValue | undefined): boolean {
  return value === undefined || value === null || (typeof value === 'string' && value.trim() === '');
}

export function isPosixName(value: SettingsValue | undefined): value is string {
  return typeof value === 'string' && POSIX_NAME.test(value);
}

/**
 * Printable value of a key when string-convertible, otherwise a placeholder.
 */
export function printableKey(map: SettingsMap, key = 'name', onUndefined = '<undefined>'): string {
  const value = readKey(map, key);
  return isStringConvertible(value) ? String(value) : onUndefined;
}

export function describeValueType(value: SettingsValue | undefined): string {
  if (value === undefined || value === null) return 'null';
  if (Array.isArray(value)) return 'list';
  if (typeof value === 'number') return Number.isInteger(value) ? 'integer' : 'float';
  if (typeof value === 'object') return 'map';
  return typeof value;
}

// ─── Parameter Kind Inference ────────────────────────────────────

export function impliesChoice(item: SettingsMap): boolean {
  return Array.isArray(readKey(item, 'choices'));
}

export function impliesBoolean(item: SettingsMap): boolean {
  return typeof readKey(item, 'default') === 'boolean';
}

export interface KindInference {
  kind: ParameterKind;
  triggeredBy: 'choices' | 'default';
}

/**
 * Structural kind inference: a choices list wins over a boolean default.
 */
export function inferParameterKind(item: SettingsMap): KindInference | undefined {
  if (impliesChoice(item)) return { kind: 'choice', triggeredBy: 'choices' };
  if (impliesBoolean(item)) return { kind: 'boolean', triggeredBy: 'default' };
  return undefined;
}
