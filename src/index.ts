export { Dispatcher, type DispatcherOptions } from './dispatcher/dispatcher.js';
export { failedSubscribers, formatSummary, summarizeOutcomes, type OutcomeSummary } from './dispatcher/aggregate.js';
export { deepFreeze } from './dispatcher/freeze.js';
export { SubscriberRegistry, type RegistryOptions } from './registry/registry.js';
export { ConcurrencyLimiter, type Permit } from './limiter/concurrencyLimiter.js';
export { invoke, type InvokeOptions } from './invoker/invoker.js';
export { EventBus, type EventBusOptions } from './events/eventBus.js';
export { DispatchLogger, logger, type DispatchLoggerOptions } from './logger.js';
export { configFromEnv, loadConfig, parseWith, readYamlFile, resolveConfig } from './config.js';
export {
  ConfigError,
  DispatchError,
  RegistrationExhaustedError,
  RoundCancelledError,
  SubscriberFaultError,
  SubscriberTimeoutError,
  isDispatchError,
  type DispatchErrorCode,
} from './errors.js';
export { DispatcherConfigSchema, MAX_TIMER_DELAY_MS, RoundOverridesSchema } from './types.js';
export type {
  AggregateResult,
  Capability,
  DiagnosticEvent,
  DispatchLogEntry,
  DispatchLogMetadata,
  DispatcherConfig,
  DispatcherConfigInput,
  InvocationContext,
  LogType,
  NotifyOptions,
  Outcome,
  OutcomeStatus,
  RegisterOptions,
  RoundHandle,
  RoundPhase,
  SubscriberEntry,
  SubscriberId,
  TimeoutReason,
  Unsubscribe,
} from './types.js';
