/**
 * Diagnostics — where the core reports what it finds.
 *
 * The core never looks at what a sink does with a diagnostic. Verdicts are
 * returned separately, so a sink that drops everything changes no result.
 */

import type { EventBus, EventSource } from '@pipewright/shared';
import { createEvent } from '@pipewright/shared';

export type Severity = 'DEBUG' | 'INFO' | 'WARNING' | 'ERROR';

export type DiagnosticCategory =
  | 'structure'
  | 'parameter'
  | 'required-parameter'
  | 'regex'
  | 'action'
  | 'abort'
  | 'run';

export interface Diagnostic {
  severity: Severity;
  category: DiagnosticCategory;
  message: string;
}

export type DiagnosticSink = (diagnostic: Diagnostic) => void;

/**
 * Report through a sink and fold the severity into a running verdict:
 * ERROR turns it false, anything else leaves it as is.
 */
export function report(
  sink: DiagnosticSink,
  severity: Severity,
  category: DiagnosticCategory,
  message: string,
  verdict = true
): boolean {
  sink({ severity, category, message });
  return severity === 'ERROR' ? false : verdict;
}

// ─── Sinks ───────────────────────────────────────────────────────

export function consoleSink(opts?: { debug?: boolean }): DiagnosticSink {
  const debug = opts?.debug ?? false;
  return ({ severity, message }) => {
    const line = `[pipewright] ${severity} ${message}`;
    switch (severity) {
      case 'DEBUG':
        if (debug) console.log(line);
        break;
      case 'INFO':
        console.log(line);
        break;
      case 'WARNING':
        console.warn(line);
        break;
      case 'ERROR':
        console.error(line);
        break;
    }
  };
}

export interface CollectingSink {
  sink: DiagnosticSink;
  diagnostics: Diagnostic[];
  /** Messages of the given severity, in report order. */
  messages(severity: Severity): string[];
  clear(): void;
}

export function collectingSink(): CollectingSink {
  const diagnostics: Diagnostic[] = [];
  return {
    sink: diagnostic => {
      diagnostics.push(diagnostic);
    },
    diagnostics,
    messages: severity => diagnostics.filter(d => d.severity === severity).map(d => d.message),
    clear: () => {
      diagnostics.length = 0;
    },
  };
}

export interface BusSink extends DiagnosticSink {
  /** Resolves once every diagnostic published so far has been delivered. */
  settled(): Promise<void>;
}

/**
 * Publish diagnostics as 'pipeline.diagnostic' events. A sink cannot wait,
 * so deliveries queue up until settled() is awaited.
 */
export function busSink(bus: EventBus, source: EventSource, runId?: string): BusSink {
  let pending: Promise<void>[] = [];
  const sink: DiagnosticSink = diagnostic => {
    pending.push(bus.emit(createEvent('pipeline.diagnostic', source, diagnostic, { runId })));
  };
  return Object.assign(sink, {
    async settled(): Promise<void> {
      const deliveries = pending;
      pending = [];
      await Promise.all(deliveries);
    },
  });
}

export function teeSink(...sinks: DiagnosticSink[]): DiagnosticSink {
  return diagnostic => {
    for (const sink of sinks) sink(diagnostic);
  };
}

/** Drops everything. Execute-mode reads use it to stay quiet. */
export const silentSink: DiagnosticSink = () => {};
