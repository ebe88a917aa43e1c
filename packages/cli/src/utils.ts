/**
 * CLI Utilities — argument parsing, settings lookup, shell actions and the
 * local parameter store.
 *
 * The parameter store stands in for a CI server's job parameters: an
 * injected parameter set is written to
 * <settingsDir>/.pipewright/<pipeline>.parameters.json and read back as the
 * active parameters of later runs.
 */

import { exec as execCallback } from 'child_process';
import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { basename, dirname, extname, join, resolve } from 'path';
import { promisify } from 'util';
import {
  errorMessage,
  settingsPathFor,
  type ActionInvoker,
  type ActiveParameters,
  type DiagnosticSink,
  type ParameterDefinition,
  type ParameterInjector,
  type RunnerConfig,
} from '@pipewright/core';

const exec = promisify(execCallback);

const SETTINGS_EXTENSIONS = ['.yaml', '.yml', '.json'];

// ─── Arguments ───────────────────────────────────────────────────

export interface CliArgs {
  command: string | undefined;
  target: string | undefined;
  params: Record<string, string>;
  dryRun: boolean;
  debug: boolean;
}

export type ParsedArgs = { ok: true; args: CliArgs } | { ok: false; error: string };

export function parseArgs(argv: string[]): ParsedArgs {
  const args: CliArgs = { command: undefined, target: undefined, params: {}, dryRun: false, debug: false };
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--dry-run') {
      args.dryRun = true;
    } else if (arg === '--debug') {
      args.debug = true;
    } else if (arg === '--help' || arg === '-h') {
      positional.unshift('help');
    } else if (arg === '--param' || arg === '-p') {
      const assignment = argv[++i];
      const separator = assignment?.indexOf('=') ?? -1;
      if (assignment === undefined || separator <= 0) {
        return { ok: false, error: `Expected NAME=VALUE after ${arg}` };
      }
      args.params[assignment.slice(0, separator)] = assignment.slice(separator + 1);
    } else if (arg.startsWith('--')) {
      return { ok: false, error: `Unknown option: ${arg}` };
    } else {
      positional.push(arg);
    }
  }

  args.command = positional[0];
  args.target = positional[1];
  return { ok: true, args };
}

// ─── Settings Lookup ─────────────────────────────────────────────

export interface SettingsLocation {
  pipelineName: string;
  settingsPath: string;
  parameterStorePath: string;
}

/**
 * A target with a settings file extension is a path; anything else is a
 * pipeline name looked up in the settings directory.
 */
export function locateSettings(target: string, config: RunnerConfig, cwd: string): SettingsLocation {
  const extension = extname(target);
  if (SETTINGS_EXTENSIONS.includes(extension)) {
    const settingsPath = resolve(cwd, target);
    const pipelineName = basename(target, extension);
    return {
      pipelineName,
      settingsPath,
      parameterStorePath: join(dirname(settingsPath), '.pipewright', `${pipelineName}.parameters.json`),
    };
  }

  return {
    pipelineName: target,
    settingsPath: resolve(cwd, settingsPathFor(target, config)),
    parameterStorePath: resolve(cwd, config.settingsDir, '.pipewright', `${target}.parameters.json`),
  };
}

// ─── Parameter Store ─────────────────────────────────────────────

/**
 * Active parameters from the store: each parameter with its default value
 * (the first choice for choice parameters). A missing store is empty.
 */
export function readParameterStore(path: string): ActiveParameters {
  if (!existsSync(path)) return {};

  let stored: unknown;
  try {
    stored = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new Error(`Failed to read parameter store ${path}: ${errorMessage(err)}`);
  }
  if (!Array.isArray(stored)) return {};

  const active: ActiveParameters = {};
  for (const entry of stored) {
    if (!isRecord(entry) || typeof entry.name !== 'string') continue;
    if (typeof entry.defaultValue === 'string' || typeof entry.defaultValue === 'boolean') {
      active[entry.name] = entry.defaultValue;
    } else if (Array.isArray(entry.choices)) {
      active[entry.name] = typeof entry.choices[0] === 'string' ? entry.choices[0] : '';
    } else {
      active[entry.name] = '';
    }
  }
  return active;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parameterStoreInjector(path: string): ParameterInjector {
  return (parameters: ParameterDefinition[]) => {
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, JSON.stringify(parameters, null, 2) + '\n');
  };
}

// ─── Shell Actions ───────────────────────────────────────────────

/**
 * Run each action as a shell command with the resolved environment on top
 * of the process environment. Every action runs on the local host whatever
 * node it asks for.
 */
export function shellInvoker(opts: { cwd: string; sink: DiagnosticSink; timeoutMs?: number }): ActionInvoker {
  return async request => {
    try {
      const { stdout } = await exec(request.action, {
        cwd: opts.cwd,
        env: { ...process.env, ...request.environment },
        timeout: opts.timeoutMs ?? 0,
      });
      const output = stdout.trim();
      if (output !== '') {
        opts.sink({ severity: 'INFO', category: 'action', message: output });
      }
      const lines = output.split('\n');
      return { ok: true, description: lines[lines.length - 1] ?? '' };
    } catch (err) {
      return { ok: false, description: errorMessage(err).trim() };
    }
  };
}

// ─── Command Options ─────────────────────────────────────────────

export interface CommandOptions {
  target: string;
  params?: Record<string, string>;
  dryRun?: boolean;
  cwd?: string;
  config?: RunnerConfig;
  sink?: DiagnosticSink;
}

export interface CommandResult {
  ok: boolean;
  report: string;
}
