/**
 * Runner Configuration — environment-driven settings for a run.
 *
 *   PIPEWRIGHT_SETTINGS_DIR        settings directory (default: settings)
 *   PIPEWRIGHT_NAME_REGEX_REPLACE  comma-separated regexes cut from a pipeline
 *                                  name to get its settings file name
 *   PIPEWRIGHT_NODE_PARAMETER      parameter naming the run's node (NODE_NAME)
 *   PIPEWRIGHT_NODE_TAG_PARAMETER  parameter naming the run's node tag (NODE_TAG)
 *   PIPEWRIGHT_DEFAULT_NODE_TAG    default value of the node tag parameter
 */

import type { SettingsMap } from './types.js';

export interface RunnerConfig {
  settingsDir: string;
  nameRegexReplace: string[];
  nodeParameter: string;
  nodeTagParameter: string;
  defaultNodeTag: string;
}

export const DEFAULT_CONFIG: RunnerConfig = {
  settingsDir: 'settings',
  nameRegexReplace: ['^(admin|devops|qa)_'],
  nodeParameter: 'NODE_NAME',
  nodeTagParameter: 'NODE_TAG',
  defaultNodeTag: '',
};

export const UPDATE_PARAMETERS = 'UPDATE_PARAMETERS';
export const DRY_RUN = 'DRY_RUN';
export const DEBUG_MODE = 'DEBUG_MODE';
export const SETTINGS_BRANCH = 'SETTINGS_BRANCH';

export function loadRunnerConfig(env: Record<string, string | undefined> = process.env): RunnerConfig {
  const nonEmpty = (value: string | undefined): string | undefined =>
    value !== undefined && value.trim() !== '' ? value.trim() : undefined;

  const regexList = nonEmpty(env.PIPEWRIGHT_NAME_REGEX_REPLACE);
  return {
    settingsDir: nonEmpty(env.PIPEWRIGHT_SETTINGS_DIR) ?? DEFAULT_CONFIG.settingsDir,
    nameRegexReplace: regexList
      ? regexList.split(',').map(r => r.trim()).filter(r => r !== '')
      : [...DEFAULT_CONFIG.nameRegexReplace],
    nodeParameter: nonEmpty(env.PIPEWRIGHT_NODE_PARAMETER) ?? DEFAULT_CONFIG.nodeParameter,
    nodeTagParameter: nonEmpty(env.PIPEWRIGHT_NODE_TAG_PARAMETER) ?? DEFAULT_CONFIG.nodeTagParameter,
    defaultNodeTag: env.PIPEWRIGHT_DEFAULT_NODE_TAG ?? DEFAULT_CONFIG.defaultNodeTag,
  };
}

/**
 * Parameters every pipeline gets on top of its own declarations.
 */
export function builtinParameters(config: RunnerConfig): SettingsMap[] {
  return [
    {
      name: UPDATE_PARAMETERS,
      type: 'boolean',
      default: false,
      description: 'Update pipeline parameters from settings file only.',
    },
    {
      name: SETTINGS_BRANCH,
      type: 'string',
      default: '',
      description: 'Branch or revision of the pipeline settings to use.',
    },
    {
      name: config.nodeParameter,
      type: 'string',
      default: '',
      description: 'Node name to run the pipeline on.',
    },
    {
      name: config.nodeTagParameter,
      type: 'string',
      default: config.defaultNodeTag,
      description: 'Node tag to run the pipeline on. Takes priority over the node name.',
    },
    {
      name: DRY_RUN,
      type: 'boolean',
      default: false,
      description: 'Check settings and parameters, skip every action.',
    },
    {
      name: DEBUG_MODE,
      type: 'boolean',
      default: false,
      description: 'Print debug diagnostics.',
    },
  ];
}
