/**
 * Stage Walker — check or execute the stage/action tree.
 *
 * One traversal order, two visitors:
 * - CheckVisitor reports structure problems and has no side effects.
 * - ExecuteVisitor fires lifecycle messages, calls the action invoker and
 *   applies ignore_fail / stop_on_fail.
 *
 * Stages run one after another. A parallel stage dispatches all its actions
 * at once and joins them before the next stage starts; a stop_on_fail abort
 * raised inside it surfaces only after the join. A failed stage does not
 * stop later stages, only an abort does.
 */

import type {
  ActionDeclaration,
  ActionInvoker,
  ActionOutcome,
  ActionResult,
  ResolvedEnvironment,
  SettingsMap,
  StageDeclaration,
  StatusReport,
  WalkMode,
  WalkResult,
} from './types.js';
import type { DiagnosticSink } from './diagnostics.js';
import { report, silentSink } from './diagnostics.js';
import { TerminalAbortError, errorMessage } from './errors.js';
import { isBlank, readKey } from './type-predicates.js';
import { readStage } from './stage-reader.js';
import type { StageReading } from './stage-reader.js';
import { actionLabel, recordOutcome, statusKey } from './status-report.js';
import { describeNode } from './node-selector.js';

// ─── Visitors ────────────────────────────────────────────────────

export interface ActionVisit {
  stage: StageDeclaration;
  action: ActionDeclaration;
  label: string;
  structureOk: boolean;
  environment: ResolvedEnvironment;
}

export interface ActionVisitResult {
  ok: boolean;
  description: string;
  /** Set when the run must stop after this action. */
  abortReason?: string;
}

export interface PipelineVisitor {
  readonly mode: WalkMode;
  /** Where structural reads report in this mode. */
  readonly structureSink: DiagnosticSink;
  visitStage(reading: StageReading): boolean;
  visitAction(visit: ActionVisit): Promise<ActionVisitResult>;
}

export class CheckVisitor implements PipelineVisitor {
  readonly mode = 'check' as const;
  readonly structureSink: DiagnosticSink;

  constructor(sink: DiagnosticSink) {
    this.structureSink = sink;
  }

  visitStage(reading: StageReading): boolean {
    return reading.stageOk;
  }

  async visitAction(visit: ActionVisit): Promise<ActionVisitResult> {
    this.structureSink({
      severity: 'DEBUG',
      category: 'structure',
      message: `Checking action number ${visit.action.index} from '${visit.stage.name}' stage`,
    });
    return { ok: visit.structureOk, description: '' };
  }
}

export interface ExecuteVisitorOptions {
  invoker: ActionInvoker;
  sink: DiagnosticSink;
  dryRun?: boolean;
}

export class ExecuteVisitor implements PipelineVisitor {
  readonly mode = 'execute' as const;
  readonly structureSink: DiagnosticSink = silentSink;
  private invoker: ActionInvoker;
  private sink: DiagnosticSink;

  constructor(opts: ExecuteVisitorOptions) {
    this.sink = opts.sink;
    this.invoker = opts.dryRun ? dryRunInvoker : opts.invoker;
  }

  visitStage(reading: StageReading): boolean {
    this.sink({ severity: 'INFO', category: 'action', message: `Stage '${reading.stage.name}'` });
    return true;
  }

  async visitAction(visit: ActionVisit): Promise<ActionVisitResult> {
    const { stage, action, label } = visit;
    this.sink({
      severity: 'INFO',
      category: 'action',
      message: `Executing action number ${action.index} from '${stage.name}' stage on ${describeNode(action.node)}`,
    });

    if (action.action === undefined) {
      this.sink({
        severity: 'WARNING',
        category: 'action',
        message: `No 'action' key specified, nothing to perform at '${label}' action.`,
      });
      return { ok: true, description: 'skipped: no action' };
    }

    this.message(action.beforeMessage, 'INFO');
    const result = await this.invoke({
      action: action.action,
      node: action.node,
      stageName: stage.name,
      actionIndex: action.index,
      environment: visit.environment,
    }, label);
    this.message(action.afterMessage, 'INFO');
    if (result.ok) this.message(action.successMessage, 'INFO');
    else this.message(action.failMessage, 'ERROR');

    const visitResult: ActionVisitResult = {
      ok: action.ignoreFail ? true : result.ok,
      description: result.description,
    };
    if (!result.ok && action.stopOnFail) {
      visitResult.abortReason = result.description || 'action failed';
    }
    return visitResult;
  }

  private async invoke(request: Parameters<ActionInvoker>[0], label: string): Promise<ActionResult> {
    try {
      return await this.invoker(request);
    } catch (err) {
      const description = errorMessage(err);
      this.sink({ severity: 'ERROR', category: 'action', message: `Action '${label}' raised an error: ${description}` });
      return { ok: false, description };
    }
  }

  private message(text: string | undefined, severity: 'INFO' | 'ERROR'): void {
    if (text !== undefined) this.sink({ severity, category: 'action', message: text });
  }
}

export const dryRunInvoker: ActionInvoker = async request => ({
  ok: true,
  description: `dry run: '${request.action}' skipped`,
});

// ─── Traversal ───────────────────────────────────────────────────

export interface WalkOptions {
  /** Called after every action outcome is recorded; the walk waits for it. */
  onOutcome?: (outcome: ActionOutcome, mode: WalkMode) => void | Promise<void>;
}

/**
 * Walk every stage in declared order with the given visitor. Throws
 * TerminalAbortError when a stop_on_fail action fails.
 */
export async function walkStages(
  settings: SettingsMap,
  visitor: PipelineVisitor,
  environment: ResolvedEnvironment,
  sink: DiagnosticSink,
  opts?: WalkOptions
): Promise<WalkResult> {
  const statusReport: StatusReport = {};
  let allPassed = true;

  const stages = readKey(settings, 'stages');
  if (isBlank(stages) || (Array.isArray(stages) && stages.length === 0)) {
    sink({ severity: 'INFO', category: 'structure', message: `No stages to ${visitor.mode} in pipeline config.` });
    return { report: statusReport, allPassed, environment };
  }
  if (!Array.isArray(stages)) {
    allPassed = report(visitor.structureSink, 'ERROR', 'structure', "'stages' key should be a list of stages.");
    return { report: statusReport, allPassed, environment };
  }

  // Status keys drop whitespace, so 'Build app' and 'Buildapp' collide too.
  const seenKeys = new Map<string, string>();
  for (const [stageIndex, rawStage] of stages.entries()) {
    const reading = readStage(rawStage, stageIndex, visitor.structureSink);
    const name = reading.stage.name;
    const key = statusKey(name, 0);
    const earlier = seenKeys.get(key);
    if (earlier === name) {
      reading.stageOk = report(visitor.structureSink, 'ERROR', 'structure',
        `Duplicate stage name '${name}': stage names must be unique.`, reading.stageOk);
    } else if (earlier !== undefined) {
      reading.stageOk = report(visitor.structureSink, 'ERROR', 'structure',
        `Stage names '${earlier}' and '${name}' only differ in whitespace: stage names must be unique.`,
        reading.stageOk);
    } else {
      seenKeys.set(key, name);
    }

    allPassed = visitor.visitStage(reading) && allPassed;
    const actionsOk = await fanOut(reading, visitor, environment, statusReport, opts);
    allPassed = actionsOk && allPassed;
  }

  return { report: statusReport, allPassed, environment };
}

async function fanOut(
  reading: StageReading,
  visitor: PipelineVisitor,
  environment: ResolvedEnvironment,
  statusReport: StatusReport,
  opts?: WalkOptions
): Promise<boolean> {
  const { stage } = reading;

  const runAction = async (action: ActionDeclaration): Promise<boolean> => {
    const label = actionLabel(stage.name, action.index);
    const result = await visitor.visitAction({
      stage,
      action,
      label,
      structureOk: reading.actionOk[action.index] ?? false,
      environment,
    });
    const outcome = recordOutcome(statusReport, stage.name, action.index, result.ok, result.description);
    await opts?.onOutcome?.(outcome, visitor.mode);
    if (result.abortReason !== undefined) {
      throw new TerminalAbortError(label, result.abortReason, statusReport);
    }
    return result.ok;
  };

  if (stage.parallel) {
    const settled = await Promise.allSettled(stage.actions.map(runAction));
    const rejected = settled.find((s): s is PromiseRejectedResult => s.status === 'rejected');
    if (rejected) throw rejected.reason;
    return settled.every(s => s.status === 'fulfilled' && s.value);
  }

  let allOk = true;
  for (const action of stage.actions) {
    allOk = (await runAction(action)) && allOk;
  }
  return allOk;
}

// ─── Entry Points ────────────────────────────────────────────────

/**
 * Check-mode pass: structure only, no side effects.
 */
export async function validate(settings: SettingsMap, sink: DiagnosticSink): Promise<boolean> {
  const result = await walkStages(settings, new CheckVisitor(sink), {}, sink);
  return result.allPassed;
}

export interface ExecuteOptions extends ExecuteVisitorOptions, WalkOptions {}

/**
 * Execute-mode pass. With dryRun the invoker is never called and every
 * action reports as skipped-ok.
 */
export async function execute(
  settings: SettingsMap,
  environment: ResolvedEnvironment,
  opts: ExecuteOptions
): Promise<WalkResult> {
  return walkStages(settings, new ExecuteVisitor(opts), environment, opts.sink, opts);
}
