/**
 * Pipeline Runner — one full run of a settings document.
 *
 *   1. reconcile declared parameters with the active set; an update halts
 *   2. validate declarations, read them into strict declarations, then
 *      enforce required values and regex rules
 *   3. check every stage and action
 *   4. execute the stages (no failures so far, or dry run)
 *   5. publish the outcome and return it
 *
 * Integration:
 * - EventBus: pipeline.parameters_injected, pipeline.halted,
 *   pipeline.action_completed, pipeline.completed, pipeline.failed, and
 *   pipeline.diagnostic for every diagnostic of the run. Each lifecycle
 *   event waits until earlier diagnostics have been delivered.
 */

import { randomUUID } from 'crypto';
import type { EventBus, EventChannel } from '@pipewright/shared';
import { createEvent } from '@pipewright/shared';
import type {
  ActionInvoker,
  ActiveParameters,
  FailureReason,
  NodeSelector,
  ParameterInjector,
  PipelineRunResult,
  ResolvedEnvironment,
  SettingsMap,
  StatusReport,
} from './types.js';
import type { DiagnosticSink } from './diagnostics.js';
import { busSink, silentSink, teeSink } from './diagnostics.js';
import type { RunnerConfig } from './config.js';
import { DEFAULT_CONFIG, DRY_RUN, UPDATE_PARAMETERS, builtinParameters } from './config.js';
import { TerminalAbortError } from './errors.js';
import { extractParameterDeclarations } from './settings-loader.js';
import { applyParameterUpdate, reconcileParameters } from './schema-reconciler.js';
import { validateParameters } from './parameter-validator.js';
import { parseParameterDeclarations } from './parameter-schema.js';
import { enforceRequiredParameters } from './required-enforcer.js';
import { applyRegexRules } from './regex-rules.js';
import { execute, validate } from './stage-walker.js';
import { resolvePipelineNode } from './node-selector.js';

export interface PipelineRunnerOptions {
  invoker: ActionInvoker;
  injectParameters: ParameterInjector;
  sink?: DiagnosticSink;
  bus?: EventBus;
  config?: RunnerConfig;
}

export interface RunRequest {
  settings: SettingsMap;
  /** Parameters the host currently exposes, with their values for this run. */
  activeParameters: ActiveParameters;
  /** Extra variables; they win over active parameter values. */
  environment?: ResolvedEnvironment;
  /** Overrides the DRY_RUN parameter when set. */
  dryRun?: boolean;
}

type LifecycleChannel = Exclude<EventChannel, 'pipeline.diagnostic'>;

/** Delivers pending diagnostics first, then the lifecycle event. */
type Publisher = (channel: LifecycleChannel, payload: unknown) => Promise<void>;

const FAILURE_MESSAGES: Record<FailureReason, string> = {
  parameters: 'Pipeline settings contain error(s).',
  settings: 'Pipeline settings contain error(s).',
  'required-parameters': 'Required parameter(s) not specified or incorrect.',
  stages: 'Stage execution finished with failure.',
};

/**
 * One sentence per distinct failure cause, then the call to action.
 */
export function composeFailureMessage(reasons: FailureReason[]): string {
  const sentences = [...new Set(reasons.map(reason => FAILURE_MESSAGES[reason]))];
  return `${sentences.join(' ')}\nPlease fix then re-run.`;
}

export function toEnvironment(parameters: ActiveParameters): ResolvedEnvironment {
  const environment: ResolvedEnvironment = {};
  for (const [name, value] of Object.entries(parameters)) {
    environment[name] = String(value);
  }
  return environment;
}

export class PipelineRunner {
  private invoker: ActionInvoker;
  private injectParameters: ParameterInjector;
  private sink: DiagnosticSink;
  private bus: EventBus | null;
  private config: RunnerConfig;

  constructor(opts: PipelineRunnerOptions) {
    this.invoker = opts.invoker;
    this.injectParameters = opts.injectParameters;
    this.sink = opts.sink ?? silentSink;
    this.bus = opts.bus ?? null;
    this.config = opts.config ?? DEFAULT_CONFIG;
  }

  async run(request: RunRequest): Promise<PipelineRunResult> {
    const runId = randomUUID();
    const bus = this.bus;
    const diagnostics = bus ? busSink(bus, 'core', runId) : null;
    const sink = diagnostics ? teeSink(this.sink, diagnostics) : this.sink;
    const publish: Publisher = async (channel, payload) => {
      if (!bus || !diagnostics) return;
      await diagnostics.settled();
      await bus.emit(createEvent(channel, 'core', payload, { runId }));
    };
    const environment: ResolvedEnvironment = {
      ...toEnvironment(request.activeParameters),
      ...request.environment,
    };
    const dryRun = request.dryRun ?? environment[DRY_RUN] === 'true';
    const sections = extractParameterDeclarations(request.settings, builtinParameters(this.config));
    const reasons: FailureReason[] = [];

    // ─── Parameter Update ──────────────────────────────────────

    const reconciled = reconcileParameters(sections.all, request.activeParameters, sink);
    const forceUpdate = environment[UPDATE_PARAMETERS] === 'true';
    if (reconciled.updateRequired || forceUpdate) {
      const update = await applyParameterUpdate(
        sections.all,
        { allValid: reconciled.allValid, dryRun },
        this.injectParameters,
        sink
      );
      const node = resolvePipelineNode(environment, this.config.nodeParameter, this.config.nodeTagParameter);

      if (update.status === 'failed') {
        sink({ severity: 'ERROR', category: 'parameter', message: update.reason });
        return this.fail(runId, {}, environment, node, ['parameters'], sink, publish);
      }

      if (update.injected) {
        await publish('pipeline.parameters_injected', { parameters: update.parameters });
      }
      await publish('pipeline.halted', { injected: update.injected });
      return {
        status: 'halted',
        runId,
        injected: update.injected,
        parameters: update.parameters,
        environment,
        node,
      };
    }

    // ─── Parameter Checks ──────────────────────────────────────

    const parametersValid = validateParameters(sections.all, sink);
    if (!parametersValid) reasons.push('parameters');

    if (parametersValid || dryRun) {
      const required = parseParameterDeclarations(sections.required, sink);
      const others = parseParameterDeclarations(sections.all.slice(sections.required.length), sink);
      const enforced = enforceRequiredParameters(required.declarations, environment, sink);
      const regexChecked = applyRegexRules([...required.declarations, ...others.declarations], environment, sink);
      if (!required.allCorrect || !others.allCorrect || !enforced.allSet || !regexChecked.allCorrect) {
        reasons.push('required-parameters');
      }
    }

    // ─── Stages ────────────────────────────────────────────────

    if (!(await validate(request.settings, sink))) reasons.push('settings');

    const node = resolvePipelineNode(environment, this.config.nodeParameter, this.config.nodeTagParameter);
    let report: StatusReport = {};

    if (reasons.length === 0 || dryRun) {
      try {
        const walked = await execute(request.settings, environment, {
          invoker: this.invoker,
          dryRun,
          sink,
          onOutcome: outcome => publish('pipeline.action_completed', outcome),
        });
        report = walked.report;
        if (!walked.allPassed) reasons.push('stages');
      } catch (err) {
        if (!(err instanceof TerminalAbortError)) throw err;
        sink({ severity: 'ERROR', category: 'abort', message: err.message });
        report = err.report;
        reasons.push('stages');
      }
    }

    if (reasons.length > 0) {
      return this.fail(runId, report, environment, node, reasons, sink, publish);
    }

    await publish('pipeline.completed', { report, dryRun });
    return { status: 'completed', runId, report, environment, node, dryRun };
  }

  private async fail(
    runId: string,
    report: StatusReport,
    environment: ResolvedEnvironment,
    node: NodeSelector,
    reasons: FailureReason[],
    sink: DiagnosticSink,
    publish: Publisher
  ): Promise<PipelineRunResult> {
    const message = composeFailureMessage(reasons);
    sink({ severity: 'ERROR', category: 'run', message });
    await publish('pipeline.failed', { reasons, message });
    return { status: 'failed', runId, report, environment, node, reasons, message };
  }
}
