/**
 * Fatal errors. Everything that can be aggregated is reported through a
 * DiagnosticSink instead; only conditions that end a run are thrown.
 */

import type { DiagnosticCategory } from './diagnostics.js';
import type { StatusReport } from './types.js';

export class PipewrightError extends Error {
  readonly category: DiagnosticCategory;

  constructor(message: string, category: DiagnosticCategory) {
    super(message);
    this.name = 'PipewrightError';
    this.category = category;
  }
}

/**
 * The configuration loader failed or returned something that is not a mapping.
 */
export class SettingsLoadError extends PipewrightError {
  readonly locator: string;

  constructor(locator: string, message: string) {
    super(`Unable to load pipeline settings from '${locator}': ${message}`, 'run');
    this.name = 'SettingsLoadError';
    this.locator = locator;
  }
}

/**
 * An action with stop_on_fail failed. Carries the status gathered so far.
 */
export class TerminalAbortError extends PipewrightError {
  readonly actionLabel: string;
  readonly report: StatusReport;

  constructor(actionLabel: string, reason: string, report: StatusReport) {
    super(
      `Terminating current pipeline run due to an error in '${actionLabel}' ` +
        `('stop_on_fail' is enabled for current action): ${reason}`,
      'abort'
    );
    this.name = 'TerminalAbortError';
    this.actionLabel = actionLabel;
    this.report = report;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
