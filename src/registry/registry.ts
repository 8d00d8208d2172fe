import { RegistrationExhaustedError } from '../errors.js';
import type { Capability, RegisterOptions, SubscriberEntry, SubscriberId, Unsubscribe } from '../types.js';

export interface RegistryOptions {
  /** Number of ids the registry may hand out over its lifetime. */
  idSpace?: number;
}

/**
 * Owns the subscriber id -> capability mapping.
 *
 * Every method body runs to completion on the event loop, so each call is its
 * own critical section: a snapshot can never observe a half-applied register
 * or unregister, and no capability ever runs while the map is being read.
 */
export class SubscriberRegistry<TEvent> {
  private readonly entries = new Map<SubscriberId, SubscriberEntry<TEvent>>();
  private readonly idSpace: number;
  private issued = 0;

  constructor(options: RegistryOptions = {}) {
    const idSpace = options.idSpace ?? Number.MAX_SAFE_INTEGER;
    if (!Number.isSafeInteger(idSpace) || idSpace < 1) {
      throw new RangeError(`idSpace must be a positive safe integer (got ${idSpace})`);
    }
    this.idSpace = idSpace;
  }

  get size(): number {
    return this.entries.size;
  }

  register(capability: Capability<TEvent>, options: RegisterOptions = {}): SubscriberId {
    if (this.issued >= this.idSpace) {
      throw new RegistrationExhaustedError(this.idSpace);
    }
    this.issued++;
    const id: SubscriberId = `sub-${this.issued}`;
    const entry: SubscriberEntry<TEvent> = Object.freeze({
      id,
      capability,
      label: options.label,
      registeredAt: Date.now(),
    });
    this.entries.set(id, entry);
    return id;
  }

  /**
   * Registers `capability` and returns a closure that removes it again.
   * Calling the closure more than once is harmless.
   */
  subscribe(capability: Capability<TEvent>, options: RegisterOptions = {}): Unsubscribe {
    const id = this.register(capability, options);
    return () => {
      this.unregister(id);
    };
  }

  /** Returns whether `id` was present. Unknown or already removed ids are a no-op. */
  unregister(id: SubscriberId): boolean {
    return this.entries.delete(id);
  }

  has(id: SubscriberId): boolean {
    return this.entries.has(id);
  }

  get(id: SubscriberId): SubscriberEntry<TEvent> | undefined {
    return this.entries.get(id);
  }

  /**
   * Point-in-time copy in registration order. Later changes to the registry
   * never show up in (or disappear from) a snapshot that was already taken.
   */
  snapshot(): readonly SubscriberEntry<TEvent>[] {
    return Object.freeze(Array.from(this.entries.values()));
  }
}
