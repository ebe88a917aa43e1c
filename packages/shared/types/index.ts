/**
 * Pipewright Shared Types
 *
 * Event shapes published on the in-process bus while a pipeline runs.
 * The core publishes them, the CLI and any embedding host subscribe.
 */

// ─── Event Bus ────────────────────────────────────────────────────

export type EventChannel =
  | 'pipeline.diagnostic'
  | 'pipeline.parameters_injected'
  | 'pipeline.halted'
  | 'pipeline.action_completed'
  | 'pipeline.completed'
  | 'pipeline.failed';

export type EventSource = 'core' | 'cli' | 'system';

export interface BusEvent<T = unknown> {
  channel: EventChannel;
  timestamp: string; // ISO 8601
  source: EventSource;
  runId: string | null;
  payload: T;
}

export type EventHandler<T = unknown> = (event: BusEvent<T>) => void | Promise<void>;
