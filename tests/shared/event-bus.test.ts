/**
 * Event Bus Test Suite — in-process pub/sub for run lifecycle events.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { EventBus, createEvent } from '@pipewright/shared';
import type { BusEvent } from '@pipewright/shared';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('EventBus', () => {
  it('delivers to exact, prefix and wildcard subscribers in subscription order', async () => {
    const bus = new EventBus();
    const seen: string[] = [];
    bus.on('*', () => { seen.push('all'); });
    bus.on('pipeline.completed', () => { seen.push('exact'); });
    bus.on('pipeline.*', () => { seen.push('prefix'); });
    bus.on('pipeline.failed', () => { seen.push('other'); });

    await bus.emit(createEvent('pipeline.completed', 'core', { ok: true }));

    expect(seen).toEqual(['all', 'exact', 'prefix']);
  });

  it('passes the typed event to handlers', async () => {
    const bus = new EventBus();
    const received: BusEvent<{ reasons: string[] }>[] = [];
    bus.on<{ reasons: string[] }>('pipeline.failed', event => { received.push(event); });

    await bus.emit(createEvent('pipeline.failed', 'core', { reasons: ['stages'] }, { runId: 'run-1' }));

    expect(received).toHaveLength(1);
    expect(received[0]?.payload.reasons).toEqual(['stages']);
    expect(received[0]?.runId).toBe('run-1');
    expect(received[0]?.source).toBe('core');
  });

  it('delivers once-subscriptions a single time', async () => {
    const bus = new EventBus();
    const handler = vi.fn();
    bus.once('pipeline.halted', handler);

    await bus.emit(createEvent('pipeline.halted', 'core', {}));
    await bus.emit(createEvent('pipeline.halted', 'core', {}));

    expect(handler).toHaveBeenCalledTimes(1);
  });

  it('stops delivery after unsubscribe', async () => {
    const bus = new EventBus();
    const handler = vi.fn();
    const unsubscribe = bus.on('pipeline.completed', handler);
    unsubscribe();

    await bus.emit(createEvent('pipeline.completed', 'core', {}));

    expect(handler).not.toHaveBeenCalled();
  });

  it('keeps delivering when a handler throws', async () => {
    const errors = vi.spyOn(console, 'error').mockImplementation(() => {});
    const bus = new EventBus();
    const after = vi.fn();
    bus.on('pipeline.completed', () => {
      throw new Error('handler broke');
    });
    bus.on('pipeline.completed', after);

    await bus.emit(createEvent('pipeline.completed', 'core', {}));

    expect(after).toHaveBeenCalledTimes(1);
    expect(errors).toHaveBeenCalledTimes(1);
  });

  it('keeps a bounded, filterable history', async () => {
    const bus = new EventBus({ maxHistory: 2 });
    await bus.emit(createEvent('pipeline.halted', 'core', 1));
    await bus.emit(createEvent('pipeline.completed', 'core', 2));
    await bus.emit(createEvent('pipeline.completed', 'core', 3));

    expect(bus.getHistory().map(e => e.payload)).toEqual([2, 3]);
    expect(bus.getHistory('pipeline.halted')).toEqual([]);
    expect(bus.getHistory('pipeline.completed', 1).map(e => e.payload)).toEqual([3]);

    bus.clear();
    expect(bus.getHistory()).toEqual([]);
  });

  it('creates events with defaults', () => {
    const event = createEvent('pipeline.diagnostic', 'cli', { message: 'x' });
    expect(event.runId).toBeNull();
    expect(event.channel).toBe('pipeline.diagnostic');
    expect(Number.isNaN(Date.parse(event.timestamp))).toBe(false);
  });
});
