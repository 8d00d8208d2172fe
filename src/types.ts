import { availableParallelism } from 'os';
import { z } from 'zod';
import type { SubscriberFaultError } from './errors.js';

// --- Configuration Types ---

/** Longest delay Node's timers honour; larger values fire after 1ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export const DispatcherConfigSchema = z.object({
  // Upper bound on invocations holding a permit at once, per Dispatcher instance.
  concurrencyLimit: z.number().int().min(1).default(() => availableParallelism()),
  // 0 disables the per-call timeout.
  perCallTimeoutMs: z.number().int().nonnegative().max(MAX_TIMER_DELAY_MS).default(5_000),
  // 0 means the round waits for every invocation (bounded only by perCallTimeoutMs).
  roundDeadlineMs: z.number().int().nonnegative().max(MAX_TIMER_DELAY_MS).default(0),
  freezeEvents: z.boolean().default(true),
});
export type DispatcherConfig = z.infer<typeof DispatcherConfigSchema>;
export type DispatcherConfigInput = z.input<typeof DispatcherConfigSchema>;

export const RoundOverridesSchema = z.object({
  concurrencyLimit: z.number().int().min(1).optional(),
  perCallTimeoutMs: z.number().int().nonnegative().max(MAX_TIMER_DELAY_MS).optional(),
  roundDeadlineMs: z.number().int().nonnegative().max(MAX_TIMER_DELAY_MS).optional(),
});

export interface NotifyOptions {
  /**
   * Per-round cap. It can only tighten the dispatcher-wide limit: a value at
   * or above `config.concurrencyLimit` has no effect.
   */
  concurrencyLimit?: number;
  perCallTimeoutMs?: number;
  roundDeadlineMs?: number;
  /** External cancellation for the round. */
  signal?: AbortSignal;
}

// --- Subscriber Types ---

export type SubscriberId = `sub-${number}`;

export interface InvocationContext {
  /**
   * Aborted when the call is abandoned: with a SubscriberTimeoutError on
   * per-call timeout, or a RoundCancelledError when the round is cancelled.
   * Capabilities that honour it stop work instead of running on detached.
   */
  readonly signal: AbortSignal;
  readonly subscriber?: SubscriberId;
}

export type Capability<TEvent> = (event: TEvent, context: InvocationContext) => void | Promise<void>;

export interface SubscriberEntry<TEvent> {
  readonly id: SubscriberId;
  readonly capability: Capability<TEvent>;
  readonly label?: string;
  readonly registeredAt: number;
}

export interface RegisterOptions {
  label?: string;
}

export type Unsubscribe = () => void;

// --- Outcome Types ---

export type TimeoutReason = 'call_timeout' | 'round_deadline' | 'cancelled';

export type Outcome =
  | { readonly status: 'delivered'; readonly elapsedMs: number }
  | { readonly status: 'failed'; readonly error: SubscriberFaultError; readonly elapsedMs: number }
  | { readonly status: 'timed_out'; readonly reason: TimeoutReason; readonly elapsedMs: number };

export type OutcomeStatus = Outcome['status'];

export type RoundPhase = 'started' | 'fanning_out' | 'aggregating' | 'complete';

export interface AggregateResult {
  readonly roundId: string;
  /** Iteration order matches the snapshot the round was started from. */
  readonly outcomes: ReadonlyMap<SubscriberId, Outcome>;
  readonly startedAt: string;
  readonly elapsedMs: number;
  readonly cancelled: boolean;
  readonly cancelReason?: Exclude<TimeoutReason, 'call_timeout'>;
}

export interface RoundHandle {
  readonly roundId: string;
  readonly result: Promise<AggregateResult>;
  /** Abandons the round; subscribers not yet resolved are recorded as timed out. */
  cancel(): void;
}

// --- Diagnostics Types ---

export type LogType = 'SYSTEM' | 'ROUND' | 'DELIVERED' | 'FAILED' | 'TIMED_OUT' | 'REGISTRY';

export interface DispatchLogMetadata {
  roundId?: string;
  subscriber?: SubscriberId;
  label?: string;
  phase?: RoundPhase;
  elapsedMs?: number;
  reason?: string;

  // Allow additional structured fields without `any`
  [key: string]: unknown;
}

export interface DispatchLogEntry {
  id: string;
  timestamp: string;
  type: LogType;
  content: string;
  metadata?: DispatchLogMetadata;
}

export type DiagnosticEvent = Omit<DispatchLogEntry, 'id' | 'timestamp'>;
