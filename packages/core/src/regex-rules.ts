/**
 * Regex Validator/Rewriter — `regex` and `regex_replace` parameter keys.
 *
 * Rules are read from settings items once, with every malformed key
 * reported, and applied after the enforcer against values already in the
 * environment.
 *
 * `regex` must match the whole value; a list of patterns is concatenated
 * (not alternated). `regex_replace` rewrites every match in place.
 */

import type {
  ParameterDeclaration,
  RegexReplaceRule,
  RegexRulesResult,
  ResolvedEnvironment,
  SettingsMap,
  SettingsValue,
} from './types.js';
import type { DiagnosticSink } from './diagnostics.js';
import { report } from './diagnostics.js';
import { errorMessage } from './errors.js';
import {
  hasKey,
  isBlank,
  isPosixName,
  isSettingsMap,
  isStringConvertible,
  printableKey,
  readKey,
} from './type-predicates.js';
import { isParameterDefined } from './required-enforcer.js';

const FIX_OR_SKIP = ' Please fix them. Otherwise, replacement will be skipped with an error.';

/**
 * Apply each pattern globally in order; a pattern without a matching
 * replacement removes its matches.
 */
export function applyReplaceRegexItems(text: string, patterns: string[], replacements: string[] = []): string {
  return patterns.reduce(
    (current, pattern, index) => current.replace(new RegExp(pattern, 'g'), replacements[index] ?? ''),
    text
  );
}

type Compiled = { ok: true; regex: RegExp } | { ok: false; error: string };

function compile(source: string, flags?: string): Compiled {
  try {
    return { ok: true, regex: new RegExp(source, flags) };
  } catch (err) {
    return { ok: false, error: errorMessage(err) };
  }
}

/**
 * Pattern text of a `regex` key: a string, or the concatenation of a list.
 */
export function regexPatternOf(value: SettingsValue | undefined): string | undefined {
  if (Array.isArray(value)) {
    return value.every(isStringConvertible) ? value.map(String).join('') : undefined;
  }
  return isStringConvertible(value) ? String(value) : undefined;
}

export function fullMatch(pattern: string, value: string): { ok: true; matches: boolean } | { ok: false; error: string } {
  const compiled = compile(`^(?:${pattern})$`);
  return compiled.ok ? { ok: true, matches: compiled.regex.test(value) } : compiled;
}

// ─── Reading ─────────────────────────────────────────────────────

export interface RegexKeys {
  ok: boolean;
  regex?: string;
  regexReplace?: RegexReplaceRule;
}

/**
 * Read the `regex` and `regex_replace` keys of a settings item, reporting
 * every malformed key. Rules that fail to read are left out.
 */
export function readRegexKeys(item: SettingsMap, sink: DiagnosticSink): RegexKeys {
  const keys: RegexKeys = { ok: true };

  if (hasKey(item, 'regex') && !isBlank(readKey(item, 'regex'))) {
    const pattern = regexPatternOf(readKey(item, 'regex'));
    if (pattern === undefined) {
      keys.ok = report(sink, 'ERROR', 'regex',
        `Wrong type of 'regex' key for '${printableKey(item)}' pipeline parameter: should be a string or a list of strings.`);
    } else if (pattern.trim() !== '') {
      sink({ severity: 'DEBUG', category: 'regex', message: `Found '${pattern}' regex for pipeline parameter '${printableKey(item)}'.` });
      keys.regex = pattern;
    }
  }

  if (hasKey(item, 'regex_replace')) {
    const rule = readRegexReplace(item, sink);
    if (rule === null) keys.ok = false;
    else keys.regexReplace = rule;
  }

  return keys;
}

function readRegexReplace(item: SettingsMap, sink: DiagnosticSink): RegexReplaceRule | null {
  const printableName = printableKey(item);
  const raw = readKey(item, 'regex_replace');
  if (!isSettingsMap(raw)) {
    report(sink, 'ERROR', 'regex',
      `'regex_replace' key for '${printableName}' pipeline parameter should be a map of 'regex' and 'to' sub-keys.` +
      FIX_OR_SKIP);
    return null;
  }

  const noValue = (key: string, tail: string): string =>
    `'${key}' sub-key value of 'regex_replace' wasn't defined for '${printableName}' pipeline parameter.${tail}`;
  const wrongType = (key: string): string =>
    `Wrong type of '${key}' value sub-key of 'regex_replace' for '${printableName}' pipeline parameter.${FIX_OR_SKIP}`;

  let ok = true;
  const to = readKey(raw, 'to');
  const pattern = readKey(raw, 'regex') ?? readKey(raw, 'pattern');

  if (!isBlank(to) && !isStringConvertible(to)) {
    ok = report(sink, 'ERROR', 'regex', wrongType('to'), ok);
  }
  if (isBlank(pattern)) {
    ok = report(sink, 'ERROR', 'regex', noValue('regex', FIX_OR_SKIP), ok);
  } else if (!isStringConvertible(pattern)) {
    ok = report(sink, 'ERROR', 'regex', wrongType('regex'), ok);
  }
  if (!ok || !isStringConvertible(pattern)) return null;

  let replacement = '';
  if (isStringConvertible(to) && !isBlank(to)) {
    replacement = String(to);
  } else {
    sink({ severity: 'WARNING', category: 'regex', message: noValue('to', ' Regex match(es) will be removed.') });
  }

  if (!isPosixName(readKey(item, 'name'))) {
    report(sink, 'ERROR', 'regex',
      `Replace '${pattern}' regex to '${replacement}' is not possible: 'name' key is not defined for pipeline ` +
      'parameter item. Please fix pipeline config. Otherwise, replacement will be skipped with an error.');
    return null;
  }
  return { pattern: String(pattern), to: replacement };
}

// ─── Applying ────────────────────────────────────────────────────

/**
 * Check then rewrite each declared parameter that is defined in the
 * environment. Malformed keys were reported when the declarations were read.
 */
export function applyRegexRules(
  declarations: ParameterDeclaration[],
  environment: ResolvedEnvironment,
  sink: DiagnosticSink
): RegexRulesResult {
  let allCorrect = true;

  for (const declaration of declarations) {
    if (!isParameterDefined(declaration.name, environment)) continue;
    if (declaration.regex !== undefined) {
      allCorrect = checkRegex(declaration.name, declaration.regex, environment, sink) && allCorrect;
    }
    if (declaration.regexReplace) {
      allCorrect = applyRegexReplace(declaration.name, declaration.regexReplace, environment, sink) && allCorrect;
    }
  }

  return { allCorrect, environment };
}

function checkRegex(name: string, pattern: string, environment: ResolvedEnvironment, sink: DiagnosticSink): boolean {
  const result = fullMatch(pattern, environment[name] ?? '');
  if (!result.ok) {
    return report(sink, 'ERROR', 'regex',
      `Unable to compile '${pattern}' regex for '${name}' pipeline parameter: ${result.error}`);
  }
  if (!result.matches) {
    return report(sink, 'ERROR', 'regex', `${name} parameter is incorrect due to regex mismatch.`);
  }
  return true;
}

function applyRegexReplace(
  name: string,
  rule: RegexReplaceRule,
  environment: ResolvedEnvironment,
  sink: DiagnosticSink
): boolean {
  const compiled = compile(rule.pattern, 'g');
  if (!compiled.ok) {
    return report(sink, 'ERROR', 'regex',
      `Unable to compile '${rule.pattern}' regex for '${name}' pipeline parameter: ${compiled.error}`);
  }

  sink({
    severity: 'DEBUG',
    category: 'regex',
    message: `Replacing '${rule.pattern}' regex to '${rule.to}' in '${name}' pipeline parameter value...`,
  });
  environment[name] = (environment[name] ?? '').replace(compiled.regex, rule.to);
  return true;
}
