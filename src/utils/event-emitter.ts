/**
 * Type-safe event emitter
 *
 * Events are notifications: a throwing handler is logged and the remaining
 * handlers still run, so subscribers can never break the emitter's caller.
 */

import { getSimLogger } from './logger.js';

export type EventHandler<T = unknown> = (data: T) => void;

export interface EventEmitter<TEvents extends Record<string, unknown>> {
  on<K extends keyof TEvents>(event: K, handler: EventHandler<TEvents[K]>): void;
  off<K extends keyof TEvents>(event: K, handler: EventHandler<TEvents[K]>): void;
  emit<K extends keyof TEvents>(event: K, data: TEvents[K]): void;
  once<K extends keyof TEvents>(event: K, handler: EventHandler<TEvents[K]>): void;
  removeAllListeners(event?: keyof TEvents): void;
  listenerCount(event: keyof TEvents): number;
}

const logger = getSimLogger('events');

type HandlerSets<TEvents extends Record<string, unknown>> = {
  [K in keyof TEvents]?: Set<EventHandler<TEvents[K]>>;
};

export class TypedEventEmitter<TEvents extends Record<string, unknown>>
  implements EventEmitter<TEvents>
{
  private handlers: HandlerSets<TEvents> = {};

  on<K extends keyof TEvents>(event: K, handler: EventHandler<TEvents[K]>): void {
    const existing = this.handlers[event];
    if (existing) {
      existing.add(handler);
    } else {
      const created: Set<EventHandler<TEvents[K]>> = new Set([handler]);
      this.handlers[event] = created;
    }
  }

  off<K extends keyof TEvents>(event: K, handler: EventHandler<TEvents[K]>): void {
    const set = this.handlers[event];
    if (!set) return;
    set.delete(handler);
    if (set.size === 0) {
      delete this.handlers[event];
    }
  }

  /**
   * Emit an event to all registered handlers
   */
  emit<K extends keyof TEvents>(event: K, data: TEvents[K]): void {
    const set = this.handlers[event];
    if (!set) return;

    // Copy so handlers may unsubscribe while we iterate
    for (const handler of Array.from(set)) {
      try {
        handler(data);
      } catch (error) {
        logger.error('Handler for {event} threw: {error}', {
          event: String(event),
          error,
        });
      }
    }
  }

  once<K extends keyof TEvents>(event: K, handler: EventHandler<TEvents[K]>): void {
    const onceHandler: EventHandler<TEvents[K]> = (data) => {
      this.off(event, onceHandler);
      handler(data);
    };
    this.on(event, onceHandler);
  }

  removeAllListeners(event?: keyof TEvents): void {
    if (event !== undefined) {
      delete this.handlers[event];
    } else {
      this.handlers = {};
    }
  }

  listenerCount(event: keyof TEvents): number {
    return this.handlers[event]?.size ?? 0;
  }
}
