/**
 * Status Aggregator — one outcome per action, keyed by stage and index.
 */

import type { ActionOutcome, StatusReport } from './types.js';

export function actionLabel(stageName: string, actionIndex: number): string {
  return `${stageName} [${actionIndex}]`;
}

/** Stage name with whitespace cut, then the action index. */
export function statusKey(stageName: string, actionIndex: number): string {
  return `${stageName.replace(/\s+/g, '')}[${actionIndex}]`;
}

export function recordOutcome(
  report: StatusReport,
  stageName: string,
  actionIndex: number,
  ok: boolean,
  link: string
): ActionOutcome {
  const outcome: ActionOutcome = {
    key: statusKey(stageName, actionIndex),
    displayName: actionLabel(stageName, actionIndex),
    state: ok ? 'ok' : 'fail',
    link,
  };
  report[outcome.key] = outcome;
  return outcome;
}

export function countOutcomes(report: StatusReport): { ok: number; fail: number } {
  let ok = 0;
  let fail = 0;
  for (const outcome of Object.values(report)) {
    if (outcome.state === 'ok') ok++;
    else fail++;
  }
  return { ok, fail };
}

/**
 * Plain-text table: state, display name, link.
 */
export function formatStatusReport(report: StatusReport): string {
  const outcomes = Object.values(report);
  if (outcomes.length === 0) return 'No actions were run.';

  const width = Math.max(...outcomes.map(o => o.displayName.length));
  const lines = outcomes.map(o => {
    const state = o.state === 'ok' ? 'OK  ' : 'FAIL';
    const link = o.link ? `  ${o.link}` : '';
    return `${state}  ${o.displayName.padEnd(width)}${link}`;
  });
  const { ok, fail } = countOutcomes(report);
  lines.push(`${ok} passed, ${fail} failed`);
  return lines.join('\n');
}
