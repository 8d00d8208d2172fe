import type { Unsubscribe } from '../types.js';

export interface EventBusOptions {
  /** Receives errors thrown by subscribers. They are never rethrown to emitters. */
  onError?: (err: unknown) => void;
}

/**
 * Minimal synchronous event bus.
 *
 * - Never throws to callers (subscriber errors go to `onError`)
 * - Preserves emission order for each subscriber
 * - Iterates a copy, so subscribing or unsubscribing from inside a callback
 *   only affects later emissions
 */
export class EventBus<TEvent> {
  private subscribers: Set<(event: TEvent) => void> = new Set();
  private readonly onError?: (err: unknown) => void;

  constructor(options: EventBusOptions = {}) {
    this.onError = options.onError;
  }

  get size(): number {
    return this.subscribers.size;
  }

  subscribe(cb: (event: TEvent) => void): Unsubscribe {
    this.subscribers.add(cb);
    return () => {
      this.subscribers.delete(cb);
    };
  }

  emit(event: TEvent): void {
    for (const sub of Array.from(this.subscribers)) {
      try {
        sub(event);
      } catch (err) {
        // Never let a diagnostics subscriber crash a round.
        this.onError?.(err);
      }
    }
  }
}
