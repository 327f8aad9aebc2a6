/**
 * @module event-bus
 * In-process event bus carrying lifecycle progress and security events.
 *
 * Components publish on a {@link BusChannel}; the CLI subscribes and renders
 * each message as a log line.
 */

import type { Bus, BusChannel, BusMessage } from './types.js';

/**
 * In-process event bus implementing {@link Bus}.
 *
 * Usage:
 * ```ts
 * const bus = createEventBus();
 * const unsub = bus.subscribe('install', (msg) => console.log(msg.event));
 * bus.emit('install', { event: 'phase_start', data: { ordinal: 1 } });
 * unsub();
 * ```
 */
export class EventBus implements Bus {
  private listeners = new Map<string, Set<(msg: BusMessage) => void>>();

  /** Emit a message to all subscribers of a channel, stamping it if needed. */
  emit(channel: string, message: BusMessage): void {
    const subs = this.listeners.get(channel);
    if (!subs) return;
    const stamped = message.timestamp === undefined ? { ...message, timestamp: Date.now() } : message;
    for (const handler of subs) {
      handler(stamped);
    }
  }

  /**
   * Subscribe to a channel.
   *
   * @returns An unsubscribe function
   */
  subscribe(channel: string, handler: (msg: BusMessage) => void): () => void {
    let subs = this.listeners.get(channel);
    if (!subs) {
      subs = new Set();
      this.listeners.set(channel, subs);
    }
    subs.add(handler);

    return () => {
      subs.delete(handler);
      if (subs.size === 0) {
        this.listeners.delete(channel);
      }
    };
  }

  clear(): void {
    this.listeners.clear();
  }
}

export function createEventBus(): EventBus {
  return new EventBus();
}

/** Emit on an optional bus; a missing bus is a silent no-op. */
export function publish(bus: Bus | undefined, channel: BusChannel, event: string, data: unknown = {}): void {
  bus?.emit(channel, { event, data, timestamp: Date.now() });
}
