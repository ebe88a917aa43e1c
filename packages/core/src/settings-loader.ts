/**
 * Settings Loader — read a pipeline settings document.
 *
 * Documents are YAML (JSON parses too). The decoder's output is converted
 * into SettingsValue at this boundary; everything past it works on
 * SettingsMap only.
 */

import { readFile } from 'fs/promises';
import { join } from 'path';
import yaml from 'js-yaml';
import type { SettingsMap } from './types.js';
import type { RunnerConfig } from './config.js';
import { SettingsLoadError, errorMessage } from './errors.js';
import { isSettingsMap, readKey, toSettingsValue } from './type-predicates.js';
import { applyReplaceRegexItems } from './regex-rules.js';

/** Locator → settings document. Fatal errors are thrown as SettingsLoadError. */
export type ConfigurationLoader = (locator: string) => Promise<SettingsMap>;

/**
 * Parse a settings document. An empty document is an empty map.
 */
export function parseSettings(text: string, locator = '<inline>'): SettingsMap {
  let raw: unknown;
  try {
    raw = yaml.load(text);
  } catch (err) {
    throw new SettingsLoadError(locator, `YAML parse error: ${errorMessage(err)}`);
  }
  if (raw === undefined || raw === null) return {};

  const settings = toSettingsValue(raw);
  if (!isSettingsMap(settings)) {
    throw new SettingsLoadError(locator, 'document root should be a map');
  }
  return settings;
}

export const loadSettingsFile: ConfigurationLoader = async (path: string) => {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (err) {
    throw new SettingsLoadError(path, errorMessage(err));
  }
  return parseSettings(text, path);
};

/**
 * `<settingsDir>/<pipeline name with the configured regexes cut>.yaml`
 */
export function settingsPathFor(pipelineName: string, config: RunnerConfig): string {
  const fileName = applyReplaceRegexItems(pipelineName, config.nameRegexReplace);
  return join(config.settingsDir, `${fileName}.yaml`);
}

export interface ParameterSections {
  required: SettingsMap[];
  optional: SettingsMap[];
  /** required + optional + built-ins, in that order. */
  all: SettingsMap[];
}

/**
 * Split `parameters.required` / `parameters.optional` into declaration
 * lists. Entries that are not maps are dropped.
 */
export function extractParameterDeclarations(settings: SettingsMap, builtins: SettingsMap[] = []): ParameterSections {
  const parameters = readKey(settings, 'parameters');
  const section = (key: string): SettingsMap[] => {
    if (!isSettingsMap(parameters)) return [];
    const items = readKey(parameters, key);
    return Array.isArray(items) ? items.filter(isSettingsMap) : [];
  };

  const required = section('required');
  const optional = section('optional');
  return { required, optional, all: [...required, ...optional, ...builtins] };
}
