/**
 * Pipewright Event Bus — Run Lifecycle Notifications
 *
 * In-process pub/sub. No broker, local-first.
 * The core publishes diagnostics and run lifecycle events; hosts subscribe
 * to what they need (a CLI printing progress, a test asserting on outcomes).
 */

import type { EventChannel, EventSource, BusEvent, EventHandler } from '../types/index.js';

type WildcardChannel = EventChannel | 'pipeline.*' | '*';

interface Subscription {
  id: string;
  channel: WildcardChannel;
  handler: EventHandler;
  once: boolean;
}

export class EventBus {
  private subscriptions: Map<string, Subscription> = new Map();
  private channelIndex: Map<WildcardChannel, Set<string>> = new Map();
  private history: BusEvent[] = [];
  private maxHistory: number;
  private subCounter = 0;

  constructor(opts?: { maxHistory?: number }) {
    this.maxHistory = opts?.maxHistory ?? 1000;
  }

  /**
   * Subscribe to a channel. Returns unsubscribe function.
   */
  on<T = unknown>(channel: WildcardChannel, handler: EventHandler<T>): () => void {
    return this.subscribe(channel, handler, false);
  }

  /**
   * Subscribe to a channel for exactly one event.
   */
  once<T = unknown>(channel: WildcardChannel, handler: EventHandler<T>): () => void {
    return this.subscribe(channel, handler, true);
  }

  /**
   * Publish an event. Exact, prefix ('pipeline.*') and wildcard ('*')
   * subscribers are notified in subscription order.
   */
  async emit<T = unknown>(event: BusEvent<T>): Promise<void> {
    const stored: BusEvent = event;
    this.history.push(stored);
    if (this.history.length > this.maxHistory) {
      this.history.shift();
    }

    const matchingIds = new Set<string>();

    for (const [channel, subIds] of this.channelIndex) {
      const matches =
        channel === '*' ||
        channel === event.channel ||
        (channel.endsWith('.*') && event.channel.startsWith(channel.slice(0, -1)));
      if (matches) {
        for (const id of subIds) matchingIds.add(id);
      }
    }

    const ordered = [...matchingIds].sort((a, b) => this.sequenceOf(a) - this.sequenceOf(b));
    const toRemove: string[] = [];
    for (const id of ordered) {
      const sub = this.subscriptions.get(id);
      if (!sub) continue;

      try {
        await sub.handler(stored);
      } catch (err) {
        console.error(`[EventBus] Handler error on ${event.channel}:`, err);
      }

      if (sub.once) {
        toRemove.push(id);
      }
    }

    for (const id of toRemove) {
      this.unsubscribe(id);
    }
  }

  /**
   * Get recent event history, optionally filtered by channel.
   */
  getHistory(channel?: EventChannel, limit = 100): BusEvent[] {
    const events = channel
      ? this.history.filter(e => e.channel === channel)
      : this.history;
    return events.slice(-limit);
  }

  /**
   * Remove all subscriptions and history.
   */
  clear(): void {
    this.subscriptions.clear();
    this.channelIndex.clear();
    this.history = [];
  }

  private subscribe<T>(channel: WildcardChannel, handler: EventHandler<T>, once: boolean): () => void {
    const id = `sub_${++this.subCounter}`;
    // Handlers are stored untyped; payload typing is the subscriber's contract.
    const untyped = handler as EventHandler;
    this.subscriptions.set(id, { id, channel, handler: untyped, once });

    let ids = this.channelIndex.get(channel);
    if (!ids) {
      ids = new Set();
      this.channelIndex.set(channel, ids);
    }
    ids.add(id);

    return () => this.unsubscribe(id);
  }

  private sequenceOf(id: string): number {
    return Number(id.slice('sub_'.length));
  }

  private unsubscribe(id: string): void {
    const sub = this.subscriptions.get(id);
    if (!sub) return;

    this.subscriptions.delete(id);
    const channelSubs = this.channelIndex.get(sub.channel);
    if (channelSubs) {
      channelSubs.delete(id);
      if (channelSubs.size === 0) {
        this.channelIndex.delete(sub.channel);
      }
    }
  }
}

/**
 * Helper to create a typed event with defaults.
 */
export function createEvent<T>(
  channel: EventChannel,
  source: EventSource,
  payload: T,
  opts?: { runId?: string }
): BusEvent<T> {
  return {
    channel,
    timestamp: new Date().toISOString(),
    source,
    runId: opts?.runId ?? null,
    payload,
  };
}
