/**
 * Node Selector — which execution host an action asks for.
 *
 * `label` beats `name`; neither means any free host. Acquiring the host is
 * the invoker's business, the walker only passes the selector along.
 */

import type { NodeSelector, ResolvedEnvironment, SettingsMap } from './types.js';
import type { DiagnosticSink } from './diagnostics.js';
import { report } from './diagnostics.js';
import {
  hasKey,
  isBlank,
  isBooleanConvertible,
  isSettingsMap,
  isStringConvertible,
  readKey,
  toBooleanValue,
} from './type-predicates.js';

export const ANY_NODE: NodeSelector = { kind: 'any' };

export function readNodeSelector(
  action: SettingsMap,
  label: string,
  sink: DiagnosticSink
): { node: NodeSelector; ok: boolean } {
  if (!hasKey(action, 'node')) return { node: ANY_NODE, ok: true };

  const wrongFormat = (sub: string, key: string, tail: string): string =>
    `Wrong format of node ${sub}key '${key}' for '${label}' action. ${tail}`.trimEnd();
  const value = readKey(action, 'node');

  if (isBlank(value)) {
    sink({
      severity: 'INFO',
      category: 'structure',
      message: `'node' key in '${label}' action is null. This action will run on any free node.`,
    });
    return { node: ANY_NODE, ok: true };
  }

  if (isStringConvertible(value)) {
    return { node: { kind: 'name', name: String(value) }, ok: true };
  }

  if (!isSettingsMap(value)) {
    return { node: ANY_NODE, ok: report(sink, 'ERROR', 'structure', wrongFormat('', 'node', 'Key will be ignored.')) };
  }

  let ok = true;
  const name = readKey(value, 'name');
  const nodeLabel = readKey(value, 'label');
  if (hasKey(value, 'name') && hasKey(value, 'label')) {
    sink({
      severity: 'WARNING',
      category: 'structure',
      message: `Node sub-keys 'name' and 'label' are incompatible in '${label}' action. ` +
        "Please define only one of them ('label' takes priority).",
    });
  }
  if (hasKey(value, 'name') && !isStringConvertible(name)) {
    ok = report(sink, 'ERROR', 'structure', wrongFormat('sub-', 'name', 'Sub-key should be a string.'), ok);
  }
  if (hasKey(value, 'label') && !isStringConvertible(nodeLabel)) {
    ok = report(sink, 'ERROR', 'structure', wrongFormat('sub-', 'label', 'Sub-key should be a string.'), ok);
  }

  let pattern = false;
  if (hasKey(value, 'pattern')) {
    const rawPattern = readKey(value, 'pattern');
    if (isBooleanConvertible(rawPattern)) {
      pattern = toBooleanValue(rawPattern);
    } else {
      sink({
        severity: 'WARNING',
        category: 'structure',
        message: wrongFormat('sub-', 'pattern', 'Sub-key should be boolean and will be removed.'),
      });
    }
  }

  if (isStringConvertible(nodeLabel) && !isBlank(nodeLabel)) {
    return { node: { kind: 'label', label: String(nodeLabel), pattern }, ok };
  }
  if (isStringConvertible(name) && !isBlank(name)) {
    return { node: { kind: 'name', name: String(name) }, ok };
  }
  return { node: ANY_NODE, ok };
}

/**
 * Host for the whole run, from the node tag / node name parameters.
 * A non-blank tag wins over a name.
 */
export function resolvePipelineNode(
  environment: ResolvedEnvironment,
  nodeParameter: string,
  nodeTagParameter: string
): NodeSelector {
  const tag = environment[nodeTagParameter];
  if (tag !== undefined && tag.trim() !== '') return { kind: 'label', label: tag, pattern: false };
  const name = environment[nodeParameter];
  if (name !== undefined && name.trim() !== '') return { kind: 'name', name };
  return ANY_NODE;
}

export function describeNode(node: NodeSelector): string {
  switch (node.kind) {
    case 'name':
      return `node '${node.name}'`;
    case 'label':
      return `${node.pattern ? 'label pattern' : 'label'} '${node.label}'`;
    case 'any':
      return 'any node';
  }
}
