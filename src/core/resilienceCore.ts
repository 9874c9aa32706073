/**
 * Resilience Core
 *
 * Composition root for the dispatcher, breaker registry and recovery
 * manager. The application builds one of these and passes it where it is
 * needed; nothing here is a module-level singleton.
 */

import { initializeLogger, logger } from '../utils/logger';
import { CircuitOpenError } from '../errors/circuitOpenError';
import { ClassifiedFailure, ClassifiedFailureOptions, classifyError } from '../errors/classifiedFailure';
import { ResilienceEventSink, WinstonEventSink } from '../events/eventSink';
import { ExceptionDispatcher, DispatcherStatistics } from '../resilience/exceptionDispatcher';
import { CircuitBreakerRegistry } from '../resilience/circuitBreakerRegistry';
import { RecoveryManager } from '../resilience/recoveryManager';
import { ConfigLoader } from '../config/productionConfig';
import { ResilienceConfig } from '../types/config';
import { CircuitBreakerConfig, CircuitStateObserver } from '../types/circuitBreaker';
import { FailureContextInit } from '../types/failure';
import {
  HealthStatus,
  RecoveryConfig,
  RecoveryHooks,
  RecoveryResult,
  RecoveryStatistics
} from '../types/recovery';

const log = logger.component('resilience-core');

export interface ResilienceCoreOptions {
  config?: ResilienceConfig;
  sink?: ResilienceEventSink;
  hooks?: RecoveryHooks;
  observers?: readonly CircuitStateObserver[];
  /** Error types breakers count; defaults to every Error */
  expectedErrorTypes?: CircuitBreakerConfig['expectedErrorTypes'];
  registerDefaultHandlers?: boolean;
}

export interface ExecuteOptions {
  /** Breaker config used if the breaker does not exist yet */
  breakerConfig?: Partial<CircuitBreakerConfig>;
  /** Context for failures raised by this call */
  context?: FailureContextInit;
  /** Classification overrides for raw errors */
  classification?: Omit<ClassifiedFailureOptions, 'context' | 'cause'>;
  /** Attempt recovery after a failure (default true) */
  recover?: boolean;
  recoveryConfig?: Partial<RecoveryConfig>;
  /** Receives the recovery outcome before the original fault is re-raised */
  onRecovery?: (result: RecoveryResult, failure: ClassifiedFailure) => void;
}

export interface HealthReport {
  status: HealthStatus;
  unhealthyBreakers: string[];
  recoveryHealthy: boolean;
  dispatcher: DispatcherStatistics;
  recovery: RecoveryStatistics;
  timestamp: Date;
}

export class ResilienceCore {
  readonly config: ResilienceConfig;
  readonly dispatcher: ExceptionDispatcher;
  readonly breakers: CircuitBreakerRegistry;
  readonly recovery: RecoveryManager;

  constructor(options: ResilienceCoreOptions = {}) {
    this.config = options.config ?? ConfigLoader.getDefaultConfig('development');
    const sink = options.sink ?? new WinstonEventSink();

    this.dispatcher = new ExceptionDispatcher({
      maxHistory: this.config.dispatcher.maxHistory,
      sink
    });

    this.breakers = new CircuitBreakerRegistry({
      defaults: options.expectedErrorTypes
        ? { ...this.config.circuitBreaker, expectedErrorTypes: options.expectedErrorTypes }
        : { ...this.config.circuitBreaker },
      sink,
      observers: options.observers
    });

    const { maxHistory, ...recoveryConfig } = this.config.recovery;
    this.recovery = new RecoveryManager({
      config: recoveryConfig,
      maxHistory,
      sink,
      hooks: options.hooks,
      registerDefaultHandlers: options.registerDefaultHandlers
    });

    log.info('Resilience core initialized', { environment: this.config.environment });
  }

  /**
   * Run an operation through the named breaker
   *
   * A fault from the operation is classified, dispatched and (by default)
   * handed to the recovery manager, then re-raised unchanged. Admission
   * rejections are re-raised without dispatch or recovery.
   */
  async execute<T>(
    breakerName: string,
    operation: () => Promise<T> | T,
    options: ExecuteOptions = {}
  ): Promise<T> {
    const breaker = this.breakers.getOrCreate(breakerName, options.breakerConfig);

    try {
      return await breaker.guard(operation);
    } catch (error) {
      if (error instanceof CircuitOpenError) {
        throw error;
      }

      try {
        await this.instrument(error, breakerName, options);
      } catch (instrumentError) {
        log.error('Failure handling failed', instrumentError, { breaker: breakerName });
      }

      throw error;
    }
  }

  private async instrument(error: unknown, breakerName: string, options: ExecuteOptions): Promise<void> {
    const failure = classifyError(error, {
      ...options.classification,
      context: { component: breakerName, ...options.context }
    });

    this.dispatcher.handle(failure);

    if (options.recover ?? true) {
      const result = await this.recovery.attemptRecovery(failure, options.recoveryConfig);
      options.onRecovery?.(result, failure);
    }
  }

  getHealthReport(): HealthReport {
    const unhealthyBreakers = this.breakers.getUnhealthy();
    const recoveryHealthy = this.recovery.isHealthy();

    let status = HealthStatus.HEALTHY;
    if (!recoveryHealthy) {
      status = HealthStatus.UNHEALTHY;
    } else if (unhealthyBreakers.length > 0) {
      status = HealthStatus.DEGRADED;
    }

    return {
      status,
      unhealthyBreakers,
      recoveryHealthy,
      dispatcher: this.dispatcher.getStatistics(),
      recovery: this.recovery.getRecoveryStatistics(),
      timestamp: new Date()
    };
  }

  /**
   * Reset every breaker and flush the logger's transports
   */
  async close(): Promise<void> {
    this.breakers.resetAll();
    log.info('Resilience core shutting down');
    await logger.shutdown();
  }
}

/**
 * Build a core from configuration, initializing the logger with it
 */
export function createResilienceCore(
  config: ResilienceConfig = ConfigLoader.getDefaultConfig('development'),
  options: Omit<ResilienceCoreOptions, 'config'> = {}
): ResilienceCore {
  initializeLogger(config.logging);
  return new ResilienceCore({ ...options, config });
}
