/**
 * docweave Event Bus — Lifecycle notifications
 *
 * In-process pub/sub. Each bus instance is owned by whoever constructs it:
 * the core never reaches for a process-wide bus.
 *
 * Planner publishes: workflow.compiled
 * Runner publishes: run.started, run.node_started, run.node_retry,
 *                   run.node_completed, run.node_output, run.completed
 */

import type {
  EventChannel,
  EventPayloads,
  EventSource,
  BusEvent,
  EventHandler,
} from '../types/index.js';

export type WildcardChannel = '*' | 'run.*' | 'workflow.*';
type SubscribableChannel = EventChannel | WildcardChannel;

interface Subscription {
  id: string;
  channel: SubscribableChannel;
  once: boolean;
  deliver(event: BusEvent): void | Promise<void>;
}

export class EventBus {
  private subscriptions: Map<string, Subscription> = new Map();
  private channelIndex: Map<SubscribableChannel, Set<string>> = new Map();
  private history: BusEvent[] = [];
  private maxHistory: number;
  private subCounter = 0;

  constructor(opts?: { maxHistory?: number }) {
    this.maxHistory = opts?.maxHistory ?? 1000;
  }

  /**
   * Subscribe to a channel. Returns unsubscribe function.
   */
  on<C extends EventChannel>(channel: C, handler: EventHandler<EventPayloads[C]>): () => void;
  on(channel: WildcardChannel, handler: EventHandler): () => void;
  on(channel: SubscribableChannel, handler: EventHandler<never>): () => void {
    return this.subscribe(channel, handler, false);
  }

  /**
   * Subscribe to a channel for exactly one event.
   */
  once<C extends EventChannel>(channel: C, handler: EventHandler<EventPayloads[C]>): () => void;
  once(channel: WildcardChannel, handler: EventHandler): () => void;
  once(channel: SubscribableChannel, handler: EventHandler<never>): () => void {
    return this.subscribe(channel, handler, true);
  }

  /**
   * Publish an event. Exact, prefix ('run.*') and wildcard ('*') subscribers
   * are notified in subscription order. Handler errors are logged, not rethrown.
   */
  async emit(event: BusEvent): Promise<void> {
    this.history.push(event);
    if (this.history.length > this.maxHistory) {
      this.history.shift();
    }

    const matchingIds = new Set<string>();

    for (const [channel, subIds] of this.channelIndex) {
      if (!channelMatches(channel, event.channel)) continue;
      for (const id of subIds) matchingIds.add(id);
    }

    const ordered = [...matchingIds].sort((a, b) => subNumber(a) - subNumber(b));

    for (const id of ordered) {
      const sub = this.subscriptions.get(id);
      if (!sub) continue;

      if (sub.once) {
        this.unsubscribe(id);
      }

      try {
        await sub.deliver(event);
      } catch (err) {
        console.error(`[EventBus] Handler error on ${event.channel}:`, err);
      }
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
   * Get count of active subscriptions per channel.
   */
  getStats(): Record<string, number> {
    const stats: Record<string, number> = {};
    for (const [channel, ids] of this.channelIndex) {
      stats[channel] = ids.size;
    }
    return stats;
  }

  /**
   * Remove all subscriptions and history.
   */
  clear(): void {
    this.subscriptions.clear();
    this.channelIndex.clear();
    this.history = [];
  }

  private subscribe(channel: SubscribableChannel, handler: EventHandler<never>, once: boolean): () => void {
    const id = `sub_${++this.subCounter}`;
    this.subscriptions.set(id, { id, channel, once, deliver: handler });

    let ids = this.channelIndex.get(channel);
    if (!ids) {
      ids = new Set();
      this.channelIndex.set(channel, ids);
    }
    ids.add(id);

    return () => this.unsubscribe(id);
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

function channelMatches(subscribed: SubscribableChannel, channel: EventChannel): boolean {
  if (subscribed === '*') return true;
  if (subscribed.endsWith('.*')) {
    return channel.startsWith(subscribed.slice(0, -1));
  }
  return subscribed === channel;
}

function subNumber(id: string): number {
  return Number(id.slice('sub_'.length));
}

/**
 * Helper to create a typed event with defaults.
 */
export function createEvent<C extends EventChannel>(
  channel: C,
  source: EventSource,
  payload: EventPayloads[C],
  opts?: { runId?: string; workflowId?: string }
): BusEvent<EventPayloads[C]> {
  return {
    channel,
    timestamp: new Date().toISOString(),
    source,
    runId: opts?.runId ?? null,
    workflowId: opts?.workflowId ?? null,
    payload,
  };
}
