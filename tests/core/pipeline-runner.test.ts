/**
 * Pipeline Runner Test Suite
 *
 * 1. Settings loader & configuration
 * 2. Parameter update — halt, dry run, forced update, invalid declarations
 * 3. Full runs — required parameters, regex rules, stage failures, aborts
 * 4. Integration — EventBus emissions
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';

import { EventBus } from '@pipewright/shared';
import {
  PipelineRunner,
  DEFAULT_CONFIG,
  SettingsLoadError,
  buildParameters,
  builtinParameters,
  collectingSink,
  composeFailureMessage,
  extractParameterDeclarations,
  loadRunnerConfig,
  loadSettingsFile,
  parseSettings,
  settingsPathFor,
  validateParameters,
} from '@pipewright/core';
import type { ActionInvoker, ActiveParameters, SettingsMap } from '@pipewright/core';

// ─── Test Helpers ─────────────────────────────────────────────────

const DEPLOY_YAML = `
parameters:
  required:
    - name: TARGET
      type: string
      default: staging
      regex: (staging|production)
    - name: VERSION
      type: string
      on_empty:
        assign: $DEFAULT_VERSION
  optional:
    - name: NOTIFY
      type: boolean
      default: false
stages:
  - name: Build
    actions:
      - action: compile
  - name: Deploy
    parallel: true
    actions:
      - action: deploy-eu
      - action: deploy-us
`;

/**
 * Every declared parameter (built-ins included) with its default value,
 * as a host would expose them after an update.
 */
function activeFor(settings: SettingsMap, overrides: ActiveParameters = {}): ActiveParameters {
  const active: ActiveParameters = {};
  const declarations = extractParameterDeclarations(settings, builtinParameters(DEFAULT_CONFIG)).all;
  for (const parameter of buildParameters(declarations)) {
    active[parameter.name] = parameter.kind === 'choice' ? parameter.choices[0] ?? '' : parameter.defaultValue;
  }
  return { ...active, ...overrides };
}

function recordingInvoker(failing: string[] = []): { invoker: ActionInvoker; calls: string[]; environments: Record<string, string>[] } {
  const calls: string[] = [];
  const environments: Record<string, string>[] = [];
  const invoker: ActionInvoker = async request => {
    calls.push(request.action);
    environments.push({ ...request.environment });
    const ok = !failing.includes(request.action);
    return { ok, description: ok ? `${request.action} ok` : `${request.action} failed` };
  };
  return { invoker, calls, environments };
}

let tempDir: string;
let bus: EventBus;
let settings: SettingsMap;

beforeEach(() => {
  tempDir = mkdtempSync(join(tmpdir(), 'pipewright-runner-test-'));
  bus = new EventBus();
  settings = parseSettings(DEPLOY_YAML);
});

afterEach(() => {
  rmSync(tempDir, { recursive: true, force: true });
});

// ═══════════════════════════════════════════════════════════════════
// 1. Settings Loader & Configuration
// ═══════════════════════════════════════════════════════════════════

describe('Settings Loader', () => {
  it('parses YAML into a settings map', () => {
    expect(parseSettings('name: x\ncount: 3\nwhen: 2024-01-02\n')).toEqual({
      name: 'x',
      count: 3,
      when: '2024-01-02T00:00:00.000Z',
    });
  });

  it('treats an empty document as an empty map', () => {
    expect(parseSettings('')).toEqual({});
  });

  it('rejects a document whose root is not a map', () => {
    expect(() => parseSettings('- a\n- b\n')).toThrow(
      "Unable to load pipeline settings from '<inline>': document root should be a map"
    );
  });

  it('rejects malformed YAML', () => {
    expect(() => parseSettings('key: [unclosed', 'broken.yaml')).toThrow(SettingsLoadError);
  });

  it('loads a settings file', async () => {
    const path = join(tempDir, 'deploy.yaml');
    writeFileSync(path, DEPLOY_YAML);
    const loaded = await loadSettingsFile(path);
    expect(loaded).toEqual(settings);
  });

  it('fails to load a missing file', async () => {
    await expect(loadSettingsFile(join(tempDir, 'missing.yaml'))).rejects.toThrow(SettingsLoadError);
  });

  it('derives the settings path from the pipeline name', () => {
    expect(settingsPathFor('admin_deploy', DEFAULT_CONFIG)).toBe(join('settings', 'deploy.yaml'));
    expect(settingsPathFor('deploy', { ...DEFAULT_CONFIG, settingsDir: 'conf', nameRegexReplace: [] }))
      .toBe(join('conf', 'deploy.yaml'));
  });

  it('lists required, optional and built-in declarations in order', () => {
    const sections = extractParameterDeclarations(
      { parameters: { required: [{ name: 'A' }, 'junk'], optional: [{ name: 'B' }] } },
      [{ name: 'C' }]
    );
    expect(sections.required).toEqual([{ name: 'A' }]);
    expect(sections.optional).toEqual([{ name: 'B' }]);
    expect(sections.all.map(item => item.name)).toEqual(['A', 'B', 'C']);
    expect(extractParameterDeclarations({}).all).toEqual([]);
  });
});

describe('Runner Configuration', () => {
  it('uses defaults for an empty environment', () => {
    expect(loadRunnerConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it('reads overrides', () => {
    expect(loadRunnerConfig({
      PIPEWRIGHT_SETTINGS_DIR: 'conf',
      PIPEWRIGHT_NAME_REGEX_REPLACE: '^a_, _b$',
      PIPEWRIGHT_NODE_PARAMETER: 'HOST',
      PIPEWRIGHT_NODE_TAG_PARAMETER: 'HOST_TAG',
      PIPEWRIGHT_DEFAULT_NODE_TAG: 'linux',
    })).toEqual({
      settingsDir: 'conf',
      nameRegexReplace: ['^a_', '_b$'],
      nodeParameter: 'HOST',
      nodeTagParameter: 'HOST_TAG',
      defaultNodeTag: 'linux',
    });
  });

  it('declares valid built-in parameters', () => {
    const builtins = builtinParameters(DEFAULT_CONFIG);
    expect(builtins.map(item => item.name)).toEqual([
      'UPDATE_PARAMETERS',
      'SETTINGS_BRANCH',
      'NODE_NAME',
      'NODE_TAG',
      'DRY_RUN',
      'DEBUG_MODE',
    ]);
    expect(validateParameters(builtins, collectingSink().sink)).toBe(true);
  });

  it('composes failure messages from distinct reasons', () => {
    expect(composeFailureMessage(['parameters', 'settings', 'required-parameters', 'stages'])).toBe(
      'Pipeline settings contain error(s). Required parameter(s) not specified or incorrect. ' +
        'Stage execution finished with failure.\nPlease fix then re-run.'
    );
    expect(composeFailureMessage(['stages'])).toBe('Stage execution finished with failure.\nPlease fix then re-run.');
  });
});

// ═══════════════════════════════════════════════════════════════════
// 2. Parameter Update
// ═══════════════════════════════════════════════════════════════════

describe('Parameter Update', () => {
  it('injects parameters and halts on the first run', async () => {
    const inject = vi.fn();
    const { invoker, calls } = recordingInvoker();
    const runner = new PipelineRunner({ invoker, injectParameters: inject, bus });

    const result = await runner.run({ settings, activeParameters: {} });

    expect(result.status).toBe('halted');
    if (result.status !== 'halted') return;
    expect(result.injected).toBe(true);
    expect(result.parameters.map(p => p.name)).toEqual([
      'TARGET', 'VERSION', 'NOTIFY',
      'UPDATE_PARAMETERS', 'SETTINGS_BRANCH', 'NODE_NAME', 'NODE_TAG', 'DRY_RUN', 'DEBUG_MODE',
    ]);
    expect(inject).toHaveBeenCalledWith(result.parameters);
    expect(calls).toEqual([]);
    expect(bus.getHistory('pipeline.parameters_injected')).toHaveLength(1);
    expect(bus.getHistory('pipeline.halted')).toHaveLength(1);
  });

  it('halts without injecting on dry run', async () => {
    const inject = vi.fn();
    const runner = new PipelineRunner({ invoker: recordingInvoker().invoker, injectParameters: inject, bus });

    const result = await runner.run({ settings, activeParameters: {}, dryRun: true });

    expect(result).toMatchObject({ status: 'halted', injected: false });
    expect(inject).not.toHaveBeenCalled();
    expect(bus.getHistory('pipeline.parameters_injected')).toHaveLength(0);
  });

  it('forces an update with UPDATE_PARAMETERS', async () => {
    const inject = vi.fn();
    const runner = new PipelineRunner({ invoker: recordingInvoker().invoker, injectParameters: inject });

    const result = await runner.run({ settings, activeParameters: activeFor(settings, { UPDATE_PARAMETERS: true }) });

    expect(result).toMatchObject({ status: 'halted', injected: true });
    expect(inject).toHaveBeenCalledTimes(1);
  });

  it('fails when an update is needed and declarations are invalid', async () => {
    const broken: SettingsMap = { ...settings, parameters: { optional: [{ name: 'BROKEN', default: 'x' }] } };
    const collected = collectingSink();

    const runner = new PipelineRunner({
      invoker: recordingInvoker().invoker,
      injectParameters: vi.fn(),
      sink: collected.sink,
    });
    const result = await runner.run({ settings: broken, activeParameters: activeFor(broken) });

    expect(result).toMatchObject({
      status: 'failed',
      reasons: ['parameters'],
      message: 'Pipeline settings contain error(s).\nPlease fix then re-run.',
    });
    expect(collected.messages('ERROR')).toContain(
      'Pipeline parameters injection failed. Check pipeline config and run again.'
    );
  });
});

// ═══════════════════════════════════════════════════════════════════
// 3. Full Runs
// ═══════════════════════════════════════════════════════════════════

describe('Full Runs', () => {
  it('completes a run and assigns required parameters', async () => {
    const { invoker, calls, environments } = recordingInvoker();
    const runner = new PipelineRunner({ invoker, injectParameters: vi.fn() });

    const result = await runner.run({
      settings,
      activeParameters: activeFor(settings),
      environment: { DEFAULT_VERSION: '1.2.3' },
    });

    expect(result.status).toBe('completed');
    if (result.status !== 'completed') return;
    expect(calls).toEqual(['compile', 'deploy-eu', 'deploy-us']);
    expect(environments[0]?.VERSION).toBe('1.2.3');
    expect(environments[0]?.TARGET).toBe('staging');
    expect(Object.keys(result.report)).toEqual(['Build[0]', 'Deploy[0]', 'Deploy[1]']);
    expect(result.dryRun).toBe(false);
    expect(result.node).toEqual({ kind: 'any' });
  });

  it('resolves the run node from the node tag parameter', async () => {
    const runner = new PipelineRunner({ invoker: recordingInvoker().invoker, injectParameters: vi.fn() });
    const result = await runner.run({
      settings,
      activeParameters: activeFor(settings, { NODE_NAME: 'builder-1', NODE_TAG: 'linux' }),
      environment: { DEFAULT_VERSION: '1.2.3' },
    });
    expect(result.node).toEqual({ kind: 'label', label: 'linux', pattern: false });
  });

  it('fails without running actions when a required parameter is missing', async () => {
    const { invoker, calls } = recordingInvoker();
    const collected = collectingSink();
    const runner = new PipelineRunner({ invoker, injectParameters: vi.fn(), sink: collected.sink });

    const result = await runner.run({ settings, activeParameters: activeFor(settings) });

    expect(result).toMatchObject({
      status: 'failed',
      reasons: ['required-parameters'],
      message: 'Required parameter(s) not specified or incorrect.\nPlease fix then re-run.',
      report: {},
    });
    expect(calls).toEqual([]);
    expect(collected.messages('ERROR')).toEqual([
      "'VERSION' pipeline parameter is required, but undefined (can't be assigned with '$DEFAULT_VERSION' variable) " +
        'for current run. Please specify then re-run again.',
      'Required parameter(s) not specified or incorrect.\nPlease fix then re-run.',
    ]);
  });

  it('fails on a regex mismatch', async () => {
    const runner = new PipelineRunner({ invoker: recordingInvoker().invoker, injectParameters: vi.fn() });
    const result = await runner.run({
      settings,
      activeParameters: activeFor(settings, { TARGET: 'qa' }),
      environment: { DEFAULT_VERSION: '1.2.3' },
    });
    expect(result).toMatchObject({ status: 'failed', reasons: ['required-parameters'] });
  });

  it('fails without running actions when a declaration is invalid', async () => {
    const { invoker, calls } = recordingInvoker();
    const broken: SettingsMap = { ...settings, parameters: { optional: [{ name: 'BROKEN', default: 'x' }] } };
    const runner = new PipelineRunner({ invoker, injectParameters: vi.fn() });

    const result = await runner.run({ settings: broken, activeParameters: activeFor(broken, { BROKEN: 'x' }) });

    expect(result).toMatchObject({
      status: 'failed',
      reasons: ['parameters'],
      message: 'Pipeline settings contain error(s).\nPlease fix then re-run.',
    });
    expect(calls).toEqual([]);
  });

  it('fails when an action fails', async () => {
    const runner = new PipelineRunner({ invoker: recordingInvoker(['deploy-us']).invoker, injectParameters: vi.fn() });
    const result = await runner.run({
      settings,
      activeParameters: activeFor(settings),
      environment: { DEFAULT_VERSION: '1.2.3' },
    });

    expect(result).toMatchObject({
      status: 'failed',
      reasons: ['stages'],
      message: 'Stage execution finished with failure.\nPlease fix then re-run.',
    });
    if (result.status !== 'failed') return;
    expect(result.report['Deploy[1]']?.state).toBe('fail');
    expect(result.report['Deploy[0]']?.state).toBe('ok');
  });

  it('turns a stop_on_fail abort into a failure with a partial report', async () => {
    const aborting = parseSettings(DEPLOY_YAML.replace('      - action: compile', '      - action: compile\n        stop_on_fail: true'));
    const collected = collectingSink();
    const { invoker, calls } = recordingInvoker(['compile']);
    const runner = new PipelineRunner({ invoker, injectParameters: vi.fn(), sink: collected.sink });

    const result = await runner.run({
      settings: aborting,
      activeParameters: activeFor(aborting),
      environment: { DEFAULT_VERSION: '1.2.3' },
    });

    expect(result).toMatchObject({ status: 'failed', reasons: ['stages'] });
    if (result.status !== 'failed') return;
    expect(Object.keys(result.report)).toEqual(['Build[0]']);
    expect(calls).toEqual(['compile']);
    expect(collected.messages('ERROR')).toContain(
      "Terminating current pipeline run due to an error in 'Build [0]' " +
        "('stop_on_fail' is enabled for current action): compile failed"
    );
  });

  it('walks every stage on dry run even with failures, without calling the invoker', async () => {
    const { invoker, calls } = recordingInvoker();
    const runner = new PipelineRunner({ invoker, injectParameters: vi.fn() });

    const result = await runner.run({ settings, activeParameters: activeFor(settings), dryRun: true });

    expect(result).toMatchObject({ status: 'failed', reasons: ['required-parameters'] });
    if (result.status !== 'failed') return;
    expect(calls).toEqual([]);
    expect(result.report['Build[0]']?.link).toBe("dry run: 'compile' skipped");
    expect(Object.keys(result.report)).toHaveLength(3);
  });

  it('reads dry run from the DRY_RUN parameter', async () => {
    const { invoker, calls } = recordingInvoker();
    const runner = new PipelineRunner({ invoker, injectParameters: vi.fn() });

    const result = await runner.run({
      settings,
      activeParameters: activeFor(settings, { DRY_RUN: true }),
      environment: { DEFAULT_VERSION: '1.2.3' },
    });

    expect(result).toMatchObject({ status: 'completed', dryRun: true });
    expect(calls).toEqual([]);
  });
});

// ═══════════════════════════════════════════════════════════════════
// 4. Integration
// ═══════════════════════════════════════════════════════════════════

describe('EventBus Integration', () => {
  it('publishes action outcomes, diagnostics and completion with the run id', async () => {
    const runner = new PipelineRunner({ invoker: recordingInvoker().invoker, injectParameters: vi.fn(), bus });
    const result = await runner.run({
      settings,
      activeParameters: activeFor(settings),
      environment: { DEFAULT_VERSION: '1.2.3' },
    });

    const completed = bus.getHistory('pipeline.action_completed');
    expect(completed).toHaveLength(3);
    expect(completed.every(event => event.runId === result.runId)).toBe(true);
    expect(bus.getHistory('pipeline.completed')).toHaveLength(1);
    expect(bus.getHistory('pipeline.failed')).toHaveLength(0);
    expect(bus.getHistory('pipeline.diagnostic').length).toBeGreaterThan(0);
  });

  it('publishes a failure event with its reasons', async () => {
    const runner = new PipelineRunner({ invoker: recordingInvoker(['compile']).invoker, injectParameters: vi.fn(), bus });
    await runner.run({
      settings,
      activeParameters: activeFor(settings),
      environment: { DEFAULT_VERSION: '1.2.3' },
    });

    const failed = bus.getHistory('pipeline.failed');
    expect(failed).toHaveLength(1);
    expect(failed[0]?.payload).toEqual({
      reasons: ['stages'],
      message: 'Stage execution finished with failure.\nPlease fix then re-run.',
    });
  });

  it('delivers outcomes and diagnostics to slow subscribers before completion', async () => {
    const delivered: string[] = [];
    const later = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));
    bus.on('pipeline.action_completed', async () => {
      await later(5);
      delivered.push('action');
    });
    bus.on('pipeline.diagnostic', async () => {
      await later(1);
      delivered.push('diagnostic');
    });
    bus.on('pipeline.completed', () => {
      delivered.push('completed');
    });

    const runner = new PipelineRunner({ invoker: recordingInvoker().invoker, injectParameters: vi.fn(), bus });
    await runner.run({
      settings,
      activeParameters: activeFor(settings),
      environment: { DEFAULT_VERSION: '1.2.3' },
    });

    expect(delivered.filter(entry => entry === 'action')).toHaveLength(3);
    const diagnostics = bus.getHistory('pipeline.diagnostic', 1000);
    expect(delivered.filter(entry => entry === 'diagnostic')).toHaveLength(diagnostics.length);
    expect(delivered.indexOf('completed')).toBe(delivered.length - 1);
  });
});
