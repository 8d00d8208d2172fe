import { performance } from 'perf_hooks';
import { resolveConfig, parseWith } from '../config.js';
import { RoundCancelledError, describeCause } from '../errors.js';
import { EventBus } from '../events/eventBus.js';
import { invoke, reasonFromSignal, timedOut } from '../invoker/invoker.js';
import { ConcurrencyLimiter, type Permit } from '../limiter/concurrencyLimiter.js';
import type { DispatchLogger } from '../logger.js';
import { SubscriberRegistry } from '../registry/registry.js';
import {
  RoundOverridesSchema,
  type AggregateResult,
  type Capability,
  type DiagnosticEvent,
  type DispatcherConfig,
  type DispatcherConfigInput,
  type NotifyOptions,
  type Outcome,
  type RegisterOptions,
  type RoundHandle,
  type RoundPhase,
  type SubscriberEntry,
  type SubscriberId,
  type Unsubscribe,
} from '../types.js';
import { elapsedSince } from '../utils.js';
import { formatSummary, summarizeOutcomes } from './aggregate.js';
import { deepFreeze } from './freeze.js';

export interface DispatcherOptions<TEvent> {
  /** Defaults to a registry owned by this dispatcher. */
  registry?: SubscriberRegistry<TEvent>;
  config?: Partial<DispatcherConfigInput>;
  /** When set, the logger is attached to `events` for the dispatcher's lifetime. */
  logger?: DispatchLogger;
}

interface RoundSettings {
  concurrencyLimit?: number;
  perCallTimeoutMs: number;
  roundDeadlineMs: number;
  signal?: AbortSignal;
}

/**
 * Notifies every registered subscriber of an event, concurrently.
 *
 * Each round works on a registry snapshot taken when it starts: subscribers
 * registered later are not included, and subscribers unregistered mid-round
 * are still attempted. A subscriber's fault or timeout only ever shows up as
 * its own Outcome; `notify` resolves with an outcome for every subscriber in
 * the snapshot.
 *
 * At most `config.concurrencyLimit` invocations hold a permit at once across
 * all rounds of one dispatcher. A call abandoned on timeout gives its permit
 * back even though the function itself may still be running.
 */
export class Dispatcher<TEvent> {
  readonly registry: SubscriberRegistry<TEvent>;
  readonly config: DispatcherConfig;
  readonly events = new EventBus<DiagnosticEvent>();

  private readonly limiter: ConcurrencyLimiter;
  private roundSeq = 0;
  private openRounds = 0;

  constructor(options: DispatcherOptions<TEvent> = {}) {
    this.config = resolveConfig(options.config ?? {});
    this.registry = options.registry ?? new SubscriberRegistry<TEvent>();
    this.limiter = new ConcurrencyLimiter(this.config.concurrencyLimit);
    options.logger?.attach(this.events);
  }

  get activeRounds(): number {
    return this.openRounds;
  }

  get inFlight(): number {
    return this.limiter.active;
  }

  register(capability: Capability<TEvent>, options: RegisterOptions = {}): SubscriberId {
    const id = this.registry.register(capability, options);
    this.events.emit({
      type: 'REGISTRY',
      content: 'registered',
      metadata: { subscriber: id, label: options.label },
    });
    return id;
  }

  subscribe(capability: Capability<TEvent>, options: RegisterOptions = {}): Unsubscribe {
    const id = this.register(capability, options);
    return () => {
      this.unregister(id);
    };
  }

  unregister(id: SubscriberId): boolean {
    const label = this.registry.get(id)?.label;
    const removed = this.registry.unregister(id);
    if (removed) {
      this.events.emit({ type: 'REGISTRY', content: 'unregistered', metadata: { subscriber: id, label } });
    }
    return removed;
  }

  /**
   * Runs one round and resolves when every subscriber in the snapshot has an
   * outcome. Never rejects because of a subscriber; rejects only on invalid
   * options or an event that cannot be frozen.
   *
   * With `freezeEvents` on (the default) the event is deep-frozen in place and
   * stays frozen after the round: later writes to it throw in strict mode.
   * Pass a copy if the caller needs to keep mutating it.
   */
  async notify(event: TEvent, options: NotifyOptions = {}): Promise<AggregateResult> {
    return this.dispatch(event, options).result;
  }

  /**
   * Starts a round without waiting for it. The returned handle exposes the
   * eventual result and lets the caller cancel the round. Throws synchronously
   * on invalid options.
   */
  dispatch(event: TEvent, options: NotifyOptions = {}): RoundHandle {
    const settings = this.resolveRoundSettings(options);
    const roundId = `round-${++this.roundSeq}`;
    const controller = new AbortController();

    const result = this.runRound(roundId, event, settings, controller);

    return {
      roundId,
      result,
      cancel: () => {
        if (!controller.signal.aborted) controller.abort(new RoundCancelledError('cancelled'));
      },
    };
  }

  private resolveRoundSettings(options: NotifyOptions): RoundSettings {
    const overrides = parseWith(
      RoundOverridesSchema,
      {
        concurrencyLimit: options.concurrencyLimit,
        perCallTimeoutMs: options.perCallTimeoutMs,
        roundDeadlineMs: options.roundDeadlineMs,
      },
      'notify options'
    );
    return {
      concurrencyLimit: overrides.concurrencyLimit,
      perCallTimeoutMs: overrides.perCallTimeoutMs ?? this.config.perCallTimeoutMs,
      roundDeadlineMs: overrides.roundDeadlineMs ?? this.config.roundDeadlineMs,
      signal: options.signal,
    };
  }

  private async runRound(
    roundId: string,
    event: TEvent,
    settings: RoundSettings,
    controller: AbortController
  ): Promise<AggregateResult> {
    const startMs = performance.now();
    const startedAt = new Date().toISOString();
    const { signal } = controller;

    // --- started ---
    const snapshot = this.registry.snapshot();
    this.phase(roundId, 'started', `round started for ${snapshot.length} subscriber(s)`);
    const recorded = new Map<SubscriberId, Outcome>();

    if (snapshot.length === 0) {
      return this.complete(roundId, snapshot, recorded, startMs, startedAt, signal);
    }

    const payload = this.config.freezeEvents ? deepFreeze(event) : event;
    this.openRounds++;
    const unlink = linkSignal(settings.signal, controller);
    const deadline =
      settings.roundDeadlineMs > 0
        ? setTimeout(() => controller.abort(new RoundCancelledError('round_deadline')), settings.roundDeadlineMs)
        : undefined;
    // A tighter per-round cap is enforced by a round-local limiter acquired before the shared one.
    const roundLimiter =
      settings.concurrencyLimit !== undefined && settings.concurrencyLimit < this.limiter.limit
        ? new ConcurrencyLimiter(settings.concurrencyLimit)
        : undefined;

    try {
      // --- fanning_out ---
      this.phase(roundId, 'fanning_out', 'fanning out');
      const started: Promise<void>[] = [];

      for (const [index, entry] of snapshot.entries()) {
        let permits: Permit[];
        try {
          permits = await this.acquirePermits(roundLimiter, signal);
        } catch (err) {
          if (!(err instanceof RoundCancelledError)) throw err;
          // Everything not yet started is abandoned with the round.
          for (const rest of snapshot.slice(index)) {
            this.record(roundId, rest, timedOut(err.reason, performance.now()), recorded);
          }
          break;
        }

        started.push(
          invoke(entry.capability, payload, {
            timeoutMs: settings.perCallTimeoutMs,
            signal,
            subscriber: entry.id,
            onDetachedError: fault => {
              this.events.emit({
                type: 'FAILED',
                content: `abandoned call failed later: ${describeCause(fault.cause)}`,
                metadata: { roundId, subscriber: entry.id, label: entry.label, detached: true },
              });
            },
          }).then(outcome => {
            for (const permit of permits) permit.release();
            this.record(roundId, entry, outcome, recorded);
          })
        );
      }

      // --- aggregating ---
      this.phase(roundId, 'aggregating', `waiting for ${started.length} invocation(s)`);
      await Promise.all(started);
    } finally {
      if (deadline) clearTimeout(deadline);
      unlink();
      this.openRounds--;
    }

    return this.complete(roundId, snapshot, recorded, startMs, startedAt, signal);
  }

  private async acquirePermits(roundLimiter: ConcurrencyLimiter | undefined, signal: AbortSignal): Promise<Permit[]> {
    const roundPermit = roundLimiter ? await roundLimiter.acquire(signal) : undefined;
    try {
      const shared = await this.limiter.acquire(signal);
      return roundPermit ? [shared, roundPermit] : [shared];
    } catch (err) {
      roundPermit?.release();
      throw err;
    }
  }

  private record(
    roundId: string,
    entry: SubscriberEntry<TEvent>,
    outcome: Outcome,
    recorded: Map<SubscriberId, Outcome>
  ): void {
    recorded.set(entry.id, outcome);
    const metadata = { roundId, subscriber: entry.id, label: entry.label, elapsedMs: outcome.elapsedMs };

    if (outcome.status === 'delivered') {
      this.events.emit({ type: 'DELIVERED', content: `delivered in ${outcome.elapsedMs}ms`, metadata });
    } else if (outcome.status === 'failed') {
      this.events.emit({
        type: 'FAILED',
        content: describeCause(outcome.error.cause),
        metadata: { ...metadata, error: outcome.error },
      });
    } else {
      this.events.emit({
        type: 'TIMED_OUT',
        content: `timed out (${outcome.reason}) after ${outcome.elapsedMs}ms`,
        metadata: { ...metadata, reason: outcome.reason },
      });
    }
  }

  private complete(
    roundId: string,
    snapshot: readonly SubscriberEntry<TEvent>[],
    recorded: ReadonlyMap<SubscriberId, Outcome>,
    startMs: number,
    startedAt: string,
    signal: AbortSignal
  ): AggregateResult {
    // Re-key in snapshot order; completion order is meaningless to callers.
    const outcomes = new Map<SubscriberId, Outcome>();
    for (const entry of snapshot) {
      const outcome = recorded.get(entry.id);
      if (outcome) outcomes.set(entry.id, outcome);
    }

    const result: AggregateResult = Object.freeze({
      roundId,
      outcomes,
      startedAt,
      elapsedMs: elapsedSince(startMs),
      cancelled: signal.aborted,
      cancelReason: signal.aborted ? reasonFromSignal(signal) : undefined,
    });

    this.phase(roundId, 'complete', `round complete: ${formatSummary(summarizeOutcomes(result))}`, {
      elapsedMs: result.elapsedMs,
      cancelled: result.cancelled,
    });
    return result;
  }

  private phase(roundId: string, phase: RoundPhase, content: string, extra: Record<string, unknown> = {}): void {
    this.events.emit({ type: 'ROUND', content, metadata: { ...extra, roundId, phase } });
  }
}

/**
 * Forwards an external abort into the round's controller. Returns the cleanup.
 */
function linkSignal(external: AbortSignal | undefined, controller: AbortController): () => void {
  if (!external) return () => {};
  const forward = () => {
    if (!controller.signal.aborted) controller.abort(new RoundCancelledError('cancelled'));
  };
  if (external.aborted) {
    forward();
    return () => {};
  }
  external.addEventListener('abort', forward, { once: true });
  return () => external.removeEventListener('abort', forward);
}
