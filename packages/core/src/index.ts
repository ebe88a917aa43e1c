/**
 * Pipewright Core — Declarative Stage/Action Pipeline Executor
 * "Declare the parameters, declare the stages, let the walker do the rest."
 *
 * YAML-defined parameters and stages. Check before execute.
 * Parallel stages. Aggregated diagnostics. Per-action status report.
 *
 * Integration: EventBus.
 */

export const VERSION = '0.1.0';

// ─── Type Predicates ─────────────────────────────────────────────
export {
  toSettingsValue,
  isSettingsMap,
  hasKey,
  readKey,
  isStringConvertible,
  isBooleanConvertible,
  toBooleanValue,
  toPrintable,
  isBlank,
  isPosixName,
  printableKey,
  describeValueType,
  impliesChoice,
  impliesBoolean,
  inferParameterKind,
} from './type-predicates.js';
export type { KindInference } from './type-predicates.js';

// ─── Parameters ──────────────────────────────────────────────────
export {
  isParameterKind,
  resolveParameterKind,
  buildParameter,
  buildParameters,
  parseParameterDeclarations,
  readOnEmptyPolicy,
} from './parameter-schema.js';
export type { ParsedDeclarations } from './parameter-schema.js';
export { validateParameter, validateParameters } from './parameter-validator.js';
export { reconcileParameters, applyParameterUpdate } from './schema-reconciler.js';
export {
  enforceRequiredParameters,
  isParameterDefined,
  isVariableReference,
  variableReferenceName,
  resolveAssignment,
} from './required-enforcer.js';
export { readRegexKeys, applyRegexRules, applyReplaceRegexItems, regexPatternOf, fullMatch } from './regex-rules.js';
export type { RegexKeys } from './regex-rules.js';

// ─── Stages ──────────────────────────────────────────────────────
export { readStage, readAction } from './stage-reader.js';
export type { StageReading, ActionReading } from './stage-reader.js';
export { ANY_NODE, readNodeSelector, resolvePipelineNode, describeNode } from './node-selector.js';
export {
  walkStages,
  validate,
  execute,
  CheckVisitor,
  ExecuteVisitor,
  dryRunInvoker,
} from './stage-walker.js';
export type {
  PipelineVisitor,
  ActionVisit,
  ActionVisitResult,
  ExecuteVisitorOptions,
  ExecuteOptions,
  WalkOptions,
} from './stage-walker.js';
export { actionLabel, statusKey, recordOutcome, countOutcomes, formatStatusReport } from './status-report.js';

// ─── Settings & Runner ───────────────────────────────────────────
export { parseSettings, loadSettingsFile, settingsPathFor, extractParameterDeclarations } from './settings-loader.js';
export type { ConfigurationLoader, ParameterSections } from './settings-loader.js';
export {
  DEFAULT_CONFIG,
  UPDATE_PARAMETERS,
  DRY_RUN,
  DEBUG_MODE,
  SETTINGS_BRANCH,
  loadRunnerConfig,
  builtinParameters,
} from './config.js';
export type { RunnerConfig } from './config.js';
export { PipelineRunner, composeFailureMessage, toEnvironment } from './pipeline-runner.js';
export type { PipelineRunnerOptions, RunRequest } from './pipeline-runner.js';

// ─── Diagnostics & Errors ────────────────────────────────────────
export { report, consoleSink, collectingSink, busSink, teeSink, silentSink } from './diagnostics.js';
export type { Severity, DiagnosticCategory, Diagnostic, DiagnosticSink, CollectingSink, BusSink } from './diagnostics.js';
export { PipewrightError, SettingsLoadError, TerminalAbortError, errorMessage } from './errors.js';

// ─── Types ───────────────────────────────────────────────────────
export { PARAMETER_KINDS } from './types.js';
export type {
  SettingsValue,
  SettingsMap,
  ParameterKind,
  OnEmptyPolicy,
  RegexReplaceRule,
  ParameterDeclaration,
  ParameterDefinition,
  ActiveParameters,
  ResolvedEnvironment,
  NodeSelector,
  ActionDeclaration,
  StageDeclaration,
  ActionRequest,
  ActionResult,
  ActionInvoker,
  ParameterInjector,
  OutcomeState,
  ActionOutcome,
  StatusReport,
  WalkMode,
  WalkResult,
  ReconcileResult,
  ParameterUpdateOutcome,
  EnforceResult,
  RegexRulesResult,
  FailureReason,
  PipelineRunResult,
} from './types.js';
