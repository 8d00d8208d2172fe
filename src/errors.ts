import type { SubscriberId } from './types.js';

export type DispatchErrorCode =
  | 'REGISTRATION_EXHAUSTED'
  | 'SUBSCRIBER_FAULT'
  | 'SUBSCRIBER_TIMEOUT'
  | 'ROUND_CANCELLED'
  | 'CONFIG_INVALID';

/**
 * Base class for every error raised or recorded by the dispatcher.
 *
 * `code` is stable and safe to switch on; messages are for humans.
 */
export class DispatchError extends Error {
  readonly code: DispatchErrorCode;

  constructor(code: DispatchErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DispatchError';
    this.code = code;
  }
}

/** The registry ran out of ids. Fatal for the registry that raised it. */
export class RegistrationExhaustedError extends DispatchError {
  readonly limit: number;

  constructor(limit: number) {
    super('REGISTRATION_EXHAUSTED', `Subscriber id space exhausted after ${limit} registrations`);
    this.name = 'RegistrationExhaustedError';
    this.limit = limit;
  }
}

/** A capability threw or rejected. Only ever surfaced inside a `failed` outcome. */
export class SubscriberFaultError extends DispatchError {
  readonly subscriber?: SubscriberId;

  constructor(cause: unknown, subscriber?: SubscriberId) {
    super('SUBSCRIBER_FAULT', `Subscriber ${subscriber ?? '(anonymous)'} failed: ${describeCause(cause)}`, { cause });
    this.name = 'SubscriberFaultError';
    this.subscriber = subscriber;
  }
}

export class SubscriberTimeoutError extends DispatchError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super('SUBSCRIBER_TIMEOUT', `Timeout after ${timeoutMs}ms`);
    this.name = 'SubscriberTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class RoundCancelledError extends DispatchError {
  readonly reason: 'round_deadline' | 'cancelled';

  constructor(reason: 'round_deadline' | 'cancelled', message?: string) {
    super('ROUND_CANCELLED', message ?? (reason === 'round_deadline' ? 'Round deadline expired' : 'Round cancelled'));
    this.name = 'RoundCancelledError';
    this.reason = reason;
  }
}

export class ConfigError extends DispatchError {
  readonly source?: string;

  constructor(message: string, options?: { source?: string; cause?: unknown }) {
    super('CONFIG_INVALID', options?.source ? `${options.source}: ${message}` : message, { cause: options?.cause });
    this.name = 'ConfigError';
    this.source = options?.source;
  }
}

export function isDispatchError(value: unknown): value is DispatchError {
  return value instanceof DispatchError;
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  if (typeof cause === 'string') return cause;
  try {
    return JSON.stringify(cause) ?? String(cause);
  } catch {
    return String(cause);
  }
}
