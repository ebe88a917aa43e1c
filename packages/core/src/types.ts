/**
 * Pipewright Types — Declarative Stage/Action Pipeline Executor
 *
 * "Declare the parameters, declare the stages, let the walker do the rest."
 *
 * These types cover the raw settings document (as decoded from YAML),
 * the strict declarations derived from it, and run results.
 */

// ─── Settings Document (decoded from YAML) ───────────────────────

export type SettingsValue = string | number | boolean | null | SettingsValue[] | SettingsMap;

export interface SettingsMap {
  [key: string]: SettingsValue;
}

// ─── Parameters ──────────────────────────────────────────────────

export type ParameterKind = 'string' | 'text' | 'password' | 'boolean' | 'choice';

export const PARAMETER_KINDS: readonly ParameterKind[] = ['string', 'text', 'password', 'boolean', 'choice'];

export interface OnEmptyPolicy {
  assign?: string;
  fail: boolean;  // default true
  warn: boolean;  // default false
}

export interface RegexReplaceRule {
  pattern: string;
  to: string;
}

export interface ParameterDeclaration {
  name: string;
  kind: ParameterKind | 'unset';
  default?: string | boolean;
  choices?: string[];
  description: string;
  trim: boolean;
  /** Full-match pattern; a list in settings is already concatenated. */
  regex?: string;
  regexReplace?: RegexReplaceRule;
  onEmpty?: OnEmptyPolicy;
}

/** Concrete parameter handed to the host's parameter store. */
export type ParameterDefinition =
  | { kind: 'string'; name: string; defaultValue: string; description: string; trim: boolean }
  | { kind: 'text' | 'password'; name: string; defaultValue: string; description: string }
  | { kind: 'boolean'; name: string; defaultValue: boolean; description: string }
  | { kind: 'choice'; name: string; choices: string[]; description: string };

/** Values the host currently exposes as parameters for this run. */
export type ActiveParameters = Record<string, string | boolean>;

/** Parameter name → current string value. Mutated in place during a run. */
export type ResolvedEnvironment = Record<string, string>;

// ─── Stages & Actions ────────────────────────────────────────────

export type NodeSelector =
  | { kind: 'name'; name: string }
  | { kind: 'label'; label: string; pattern: boolean }
  | { kind: 'any' };

export interface ActionDeclaration {
  index: number;
  action?: string;
  node: NodeSelector;
  beforeMessage?: string;
  afterMessage?: string;
  successMessage?: string;
  failMessage?: string;
  ignoreFail: boolean;
  stopOnFail: boolean;
}

export interface StageDeclaration {
  name: string;
  parallel: boolean;
  actions: ActionDeclaration[];
}

// ─── Action Invocation ───────────────────────────────────────────

export interface ActionRequest {
  action: string;
  node: NodeSelector;
  stageName: string;
  actionIndex: number;
  environment: ResolvedEnvironment;
}

export interface ActionResult {
  ok: boolean;
  description: string;
}

/** The only place real work happens; opaque to the walker. */
export type ActionInvoker = (request: ActionRequest) => Promise<ActionResult>;

/** Applies a parameter set to the host so future runs see it. */
export type ParameterInjector = (parameters: ParameterDefinition[]) => void | Promise<void>;

// ─── Status ──────────────────────────────────────────────────────

export type OutcomeState = 'ok' | 'fail';

export interface ActionOutcome {
  key: string;
  displayName: string;
  state: OutcomeState;
  link: string;
}

export type StatusReport = Record<string, ActionOutcome>;

export type WalkMode = 'check' | 'execute';

export interface WalkResult {
  report: StatusReport;
  allPassed: boolean;
  environment: ResolvedEnvironment;
}

// ─── Parameter Processing Results ────────────────────────────────

export interface ReconcileResult {
  updateRequired: boolean;
  allValid: boolean;
}

export type ParameterUpdateOutcome =
  | { status: 'halted'; injected: boolean; parameters: ParameterDefinition[] }
  | { status: 'failed'; reason: string; parameters: ParameterDefinition[] };

export interface EnforceResult {
  allSet: boolean;
  environment: ResolvedEnvironment;
}

export interface RegexRulesResult {
  allCorrect: boolean;
  environment: ResolvedEnvironment;
}

// ─── Run Results ─────────────────────────────────────────────────

export type FailureReason = 'parameters' | 'settings' | 'required-parameters' | 'stages';

export type PipelineRunResult =
  | {
      status: 'completed';
      runId: string;
      report: StatusReport;
      environment: ResolvedEnvironment;
      node: NodeSelector;
      dryRun: boolean;
    }
  | {
      status: 'halted';
      runId: string;
      injected: boolean;
      parameters: ParameterDefinition[];
      environment: ResolvedEnvironment;
      node: NodeSelector;
    }
  | {
      status: 'failed';
      runId: string;
      report: StatusReport;
      environment: ResolvedEnvironment;
      node: NodeSelector;
      reasons: FailureReason[];
      message: string;
    };
