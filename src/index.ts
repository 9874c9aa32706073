/**
 * Resilience core: failure taxonomy, exception dispatch, circuit breakers
 * and recovery.
 */

export * from './types/failure';
export * from './types/recovery';
export * from './types/circuitBreaker';
export * from './types/config';

export * from './errors';

export type { ResilienceEvent, ResilienceEventKind, ResilienceEventSink } from './events/eventSink';
export { WinstonEventSink, MemoryEventSink, CompositeEventSink, createEvent } from './events/eventSink';

export { initializeLogger, getLogger, logger } from './utils/logger';

export { ConfigLoader } from './config/productionConfig';
export { loadConfig } from './config';
export { validateCircuitBreakerSettings, validateRecoveryConfig } from './config/validation';

export type {
  ExceptionDispatcherOptions,
  DispatchRecord,
  DispatcherStatistics,
  FaultHandler
} from './resilience/exceptionDispatcher';
export { ExceptionDispatcher, resolveFaultKind } from './resilience/exceptionDispatcher';
export type { CircuitBreakerOptions } from './resilience/circuitBreaker';
export { CircuitBreaker } from './resilience/circuitBreaker';
export type { CircuitBreakerRegistryOptions } from './resilience/circuitBreakerRegistry';
export { CircuitBreakerRegistry } from './resilience/circuitBreakerRegistry';
export type { RecoveryManagerOptions } from './resilience/recoveryManager';
export { RecoveryManager } from './resilience/recoveryManager';
export type { RetryOutcome } from './resilience/backoff';
export { getRetryDelay, retryWithBackoff } from './resilience/backoff';
export {
  createNetworkRecoveryHandler,
  createSyncRecoveryHandler,
  createConfigRecoveryHandler
} from './resilience/defaultRecoveryHandlers';

export type { ResilienceCoreOptions, ExecuteOptions, HealthReport } from './core/resilienceCore';
export { ResilienceCore, createResilienceCore } from './core/resilienceCore';
