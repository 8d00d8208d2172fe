import { performance } from 'perf_hooks';
import { RoundCancelledError, SubscriberFaultError, SubscriberTimeoutError } from '../errors.js';
import { MAX_TIMER_DELAY_MS, type Capability, type Outcome, type SubscriberId, type TimeoutReason } from '../types.js';
import { elapsedSince } from '../utils.js';

export interface InvokeOptions {
  /** Non-finite or <= 0 disables the per-call timeout. Clamped to MAX_TIMER_DELAY_MS. */
  timeoutMs: number;
  /** Round-level cancellation; aborting resolves the call as `timed_out`. */
  signal?: AbortSignal;
  /** Used to label faults. */
  subscriber?: SubscriberId;
  /**
   * Called when a call that was already abandoned (timed out or cancelled)
   * later rejects with something other than the abort reason it was handed.
   * Without it the rejection is dropped after being observed. If the hook
   * itself throws, that error is written to stderr.
   */
  onDetachedError?: (err: SubscriberFaultError) => void;
}

export function reasonFromSignal(signal: AbortSignal | undefined): Exclude<TimeoutReason, 'call_timeout'> {
  const reason: unknown = signal?.reason;
  return reason instanceof RoundCancelledError ? reason.reason : 'cancelled';
}

function delivered(startMs: number): Outcome {
  return Object.freeze({ status: 'delivered', elapsedMs: elapsedSince(startMs) });
}

function failed(error: SubscriberFaultError, startMs: number): Outcome {
  return Object.freeze({ status: 'failed', error, elapsedMs: elapsedSince(startMs) });
}

export function timedOut(reason: TimeoutReason, startMs: number): Outcome {
  return Object.freeze({ status: 'timed_out', reason, elapsedMs: elapsedSince(startMs) });
}

/**
 * Runs one subscriber call and converts whatever happens into an Outcome.
 * Never rejects.
 *
 * The capability starts on a fresh microtask, so a synchronous throw is
 * handled exactly like a rejected promise. The timeout is best effort:
 * JavaScript cannot preempt a running function. An abandoned call gets its
 * context signal aborted; if it ignores that it keeps running detached and
 * only its settlement is ignored (or, for a rejection, reported through
 * `onDetachedError`).
 *
 * If `signal` is already aborted the capability is not invoked at all.
 */
export function invoke<TEvent>(
  capability: Capability<TEvent>,
  event: TEvent,
  options: InvokeOptions
): Promise<Outcome> {
  const startMs = performance.now();
  const { signal, subscriber, onDetachedError } = options;

  if (signal?.aborted) {
    return Promise.resolve(timedOut(reasonFromSignal(signal), startMs));
  }

  return new Promise<Outcome>(resolve => {
    const call = new AbortController();
    let settled = false;
    let timer: NodeJS.Timeout | undefined;

    const finish = (outcome: Outcome, abortReason?: unknown) => {
      if (settled) return;
      settled = true;
      if (timer) clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
      if (abortReason !== undefined) call.abort(abortReason);
      resolve(outcome);
    };

    const onAbort = () => {
      finish(timedOut(reasonFromSignal(signal), startMs), signal?.reason);
    };

    const { timeoutMs } = options;
    if (Number.isFinite(timeoutMs) && timeoutMs > 0) {
      timer = setTimeout(() => {
        finish(timedOut('call_timeout', startMs), new SubscriberTimeoutError(timeoutMs));
      }, Math.min(timeoutMs, MAX_TIMER_DELAY_MS));
    }
    signal?.addEventListener('abort', onAbort, { once: true });

    void Promise.resolve()
      .then(() => capability(event, { signal: call.signal, subscriber }))
      .then(
        () => finish(delivered(startMs)),
        (err: unknown) => {
          if (settled) {
            // Rejecting with the abort reason is the expected response to being abandoned.
            if (err === call.signal.reason || !onDetachedError) return;
            try {
              onDetachedError(new SubscriberFaultError(err, subscriber));
            } catch (hookErr) {
              console.error('onDetachedError hook failed:', hookErr);
            }
            return;
          }
          finish(failed(new SubscriberFaultError(err, subscriber), startMs));
        }
      );
  });
}
