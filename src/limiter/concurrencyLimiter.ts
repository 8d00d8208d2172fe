import { RoundCancelledError } from '../errors.js';

export interface Permit {
  /** Returns the slot to the limiter. Idempotent. */
  release(): void;
}

interface Waiter {
  grant: (permit: Permit) => void;
  settled: boolean;
}

/**
 * Counting semaphore bounding how many subscriber invocations hold a slot.
 *
 * Waiters are granted in arrival order, but fairness is not promised: a
 * waiter that is cancelled leaves the queue, and under sustained load one
 * round can keep waiting while slots go to another. Callers that need a
 * bound on waiting pass an AbortSignal.
 */
export class ConcurrencyLimiter {
  readonly limit: number;
  private inUse = 0;
  private readonly waiters: Waiter[] = [];

  constructor(limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`Concurrency limit must be an integer >= 1 (got ${limit})`);
    }
    this.limit = limit;
  }

  get active(): number {
    return this.inUse;
  }

  get pending(): number {
    return this.waiters.length;
  }

  acquire(signal?: AbortSignal): Promise<Permit> {
    if (signal?.aborted) {
      return Promise.reject(toCancelledError(signal.reason));
    }

    if (this.inUse < this.limit) {
      this.inUse++;
      return Promise.resolve(this.createPermit());
    }

    return new Promise<Permit>((resolve, reject) => {
      const onAbort = () => {
        if (waiter.settled) return;
        waiter.settled = true;
        const idx = this.waiters.indexOf(waiter);
        if (idx >= 0) this.waiters.splice(idx, 1);
        reject(toCancelledError(signal?.reason));
      };

      const waiter: Waiter = {
        grant: permit => {
          signal?.removeEventListener('abort', onAbort);
          resolve(permit);
        },
        settled: false,
      };

      this.waiters.push(waiter);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  private createPermit(): Permit {
    let released = false;
    return {
      release: () => {
        if (released) return;
        released = true;
        this.handOff();
      },
    };
  }

  private handOff(): void {
    // The slot moves straight to the next waiter; `inUse` only drops when nobody is queued.
    const next = this.waiters.shift();
    if (!next) {
      this.inUse--;
      return;
    }
    next.settled = true;
    next.grant(this.createPermit());
  }
}

function toCancelledError(reason: unknown): RoundCancelledError {
  if (reason instanceof RoundCancelledError) return reason;
  return new RoundCancelledError('cancelled');
}
