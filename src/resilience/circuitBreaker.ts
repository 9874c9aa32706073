/**
 * Circuit Breaker
 *
 * Gates calls to one guarded operation based on its recent outcomes.
 * CLOSED admits everything, OPEN rejects until the open timeout elapses,
 * HALF_OPEN admits a bounded number of probes.
 *
 * Every "record outcome, evaluate transition" step runs as one synchronous
 * section, so concurrent callers on the event loop never interleave inside
 * it. The breaker never retries; that is the recovery manager's job.
 */

import { logger } from '../utils/logger';
import { CircuitOpenError } from '../errors/circuitOpenError';
import { validateCircuitBreakerSettings } from '../config/validation';
import { ResilienceEventSink, WinstonEventSink, createEvent } from '../events/eventSink';
import {
  CircuitBreakerConfig,
  CircuitBreakerMetrics,
  CircuitBreakerState,
  CircuitBreakerStatus,
  CircuitStateObserver,
  DEFAULT_CIRCUIT_BREAKER_SETTINGS,
  RequestHistoryEntry,
  StateTransition
} from '../types/circuitBreaker';

export interface CircuitBreakerOptions {
  config?: Partial<CircuitBreakerConfig>;
  sink?: ResilienceEventSink;
  observers?: readonly CircuitStateObserver[];
}

/**
 * Handle for one admitted call; release() runs on every exit path
 */
interface RequestScope {
  readonly startedAt: number;
  release(): void;
}

function createMetrics(): CircuitBreakerMetrics {
  return {
    totalRequests: 0,
    successfulRequests: 0,
    failedRequests: 0,
    rejectedRequests: 0,
    stateTransitions: 0,
    currentConsecutiveFailures: 0,
    currentConsecutiveSuccesses: 0
  };
}

function percent(part: number, total: number): number {
  return total === 0 ? 0 : (part / total) * 100;
}

export class CircuitBreaker {
  readonly name: string;
  readonly config: Readonly<CircuitBreakerConfig>;

  private state: CircuitBreakerState;
  private metrics: CircuitBreakerMetrics;
  private nextAttemptTime?: number;
  private history: RequestHistoryEntry[];
  private observers: CircuitStateObserver[];
  private sink: ResilienceEventSink;
  private inFlightProbes: number;
  /** Bumped on every entry into HALF_OPEN so stale probes release nothing */
  private probeEpoch: number;

  constructor(name: string, options: CircuitBreakerOptions = {}) {
    const config: CircuitBreakerConfig = {
      ...DEFAULT_CIRCUIT_BREAKER_SETTINGS,
      expectedErrorTypes: [Error],
      ...options.config
    };
    validateCircuitBreakerSettings(config, `circuitBreaker[${name}]`);

    this.name = name;
    this.config = Object.freeze({
      ...config,
      expectedErrorTypes: Object.freeze([...config.expectedErrorTypes])
    });
    this.state = CircuitBreakerState.CLOSED;
    this.metrics = createMetrics();
    this.history = [];
    this.observers = [...(options.observers ?? [])];
    this.sink = options.sink ?? new WinstonEventSink();
    this.inFlightProbes = 0;
    this.probeEpoch = 0;

    logger.info(`Circuit breaker '${name}' initialized in ${this.state} state`);
  }

  addObserver(observer: CircuitStateObserver): void {
    this.observers.push(observer);
  }

  removeObserver(observer: CircuitStateObserver): boolean {
    const index = this.observers.indexOf(observer);
    if (index === -1) {
      return false;
    }
    this.observers.splice(index, 1);
    return true;
  }

  getState(): CircuitBreakerState {
    return this.state;
  }

  /**
   * Execute an operation through the breaker
   *
   * Rejects with CircuitOpenError without calling the operation when the
   * breaker is not admitting calls. Faults raised by the operation are
   * re-raised unchanged.
   */
  async guard<T>(operation: () => Promise<T> | T): Promise<T> {
    const scope = this.admit();

    try {
      const result = await operation();
      this.onSuccess(scope);
      return result;
    } catch (error) {
      this.onFailure(error, scope);
      throw error;
    } finally {
      scope.release();
    }
  }

  /**
   * Synchronous variant of guard()
   */
  guardSync<T>(operation: () => T): T {
    const scope = this.admit();

    try {
      const result = operation();
      this.onSuccess(scope);
      return result;
    } catch (error) {
      this.onFailure(error, scope);
      throw error;
    } finally {
      scope.release();
    }
  }

  /**
   * Whether a call would be admitted right now
   *
   * An OPEN breaker whose timeout has elapsed moves to HALF_OPEN here.
   */
  canExecute(): boolean {
    switch (this.state) {
      case CircuitBreakerState.CLOSED:
        return true;

      case CircuitBreakerState.OPEN:
        if (this.nextAttemptTime !== undefined && Date.now() >= this.nextAttemptTime) {
          this.transition(CircuitBreakerState.HALF_OPEN, 'open timeout elapsed');
          return this.inFlightProbes < this.config.halfOpenMaxProbes;
        }
        return false;

      case CircuitBreakerState.HALF_OPEN:
        return this.inFlightProbes < this.config.halfOpenMaxProbes;
    }
  }

  private admit(): RequestScope {
    if (!this.canExecute()) {
      this.metrics.rejectedRequests++;
      const retryAfterMs = this.nextAttemptTime !== undefined
        ? Math.max(0, this.nextAttemptTime - Date.now())
        : undefined;
      throw new CircuitOpenError(this.name, this.state, retryAfterMs);
    }

    const isProbe = this.state === CircuitBreakerState.HALF_OPEN;
    const epoch = this.probeEpoch;
    let released = false;

    if (isProbe) {
      this.inFlightProbes++;
    }

    return {
      startedAt: Date.now(),
      release: () => {
        if (released) {
          return;
        }
        released = true;
        if (isProbe && epoch === this.probeEpoch) {
          this.inFlightProbes--;
        }
      }
    };
  }

  private isExpected(error: unknown): boolean {
    return this.config.expectedErrorTypes.some(type => error instanceof type);
  }

  private onSuccess(scope: RequestScope): void {
    const now = Date.now();
    const durationMs = now - scope.startedAt;

    this.metrics.totalRequests++;
    this.metrics.successfulRequests++;
    this.metrics.currentConsecutiveSuccesses++;
    this.metrics.currentConsecutiveFailures = 0;
    this.metrics.lastSuccessTime = new Date(now);

    this.addHistory({ timestamp: now, success: true, durationMs, state: this.state });

    if (
      this.state === CircuitBreakerState.HALF_OPEN &&
      this.metrics.currentConsecutiveSuccesses >= this.config.successThreshold
    ) {
      this.transition(CircuitBreakerState.CLOSED, 'success threshold reached');
    }

    logger.debug(`Circuit breaker '${this.name}': success recorded`, { durationMs });
  }

  private onFailure(error: unknown, scope: RequestScope): void {
    if (!this.isExpected(error)) {
      logger.debug(`Circuit breaker '${this.name}': ignoring unexpected error`, {
        errorType: error instanceof Error ? error.name : typeof error
      });
      return;
    }

    const now = Date.now();
    const durationMs = now - scope.startedAt;
    const errorType = error instanceof Error ? error.name : typeof error;
    const errorMessage = error instanceof Error ? error.message : String(error);

    this.metrics.totalRequests++;
    this.metrics.failedRequests++;
    this.metrics.currentConsecutiveFailures++;
    this.metrics.currentConsecutiveSuccesses = 0;
    this.metrics.lastFailureTime = new Date(now);

    this.addHistory({
      timestamp: now,
      success: false,
      durationMs,
      state: this.state,
      errorType,
      errorMessage
    });

    if (
      this.state === CircuitBreakerState.CLOSED &&
      this.metrics.currentConsecutiveFailures >= this.config.failureThreshold
    ) {
      this.transition(CircuitBreakerState.OPEN, 'failure threshold reached');
    } else if (this.state === CircuitBreakerState.HALF_OPEN) {
      this.transition(CircuitBreakerState.OPEN, 'probe failed');
    }

    logger.warn(`Circuit breaker '${this.name}': failure recorded`, { errorType, errorMessage });
  }

  private addHistory(entry: RequestHistoryEntry): void {
    const cutoff = entry.timestamp - this.config.monitoringWindowMs;
    this.history = this.history.filter(e => e.timestamp >= cutoff);
    this.history.push(Object.freeze(entry));
  }

  private windowEntries(now: number = Date.now()): RequestHistoryEntry[] {
    const cutoff = now - this.config.monitoringWindowMs;
    return this.history.filter(e => e.timestamp >= cutoff);
  }

  private transition(to: CircuitBreakerState, reason: string): void {
    const from = this.state;
    if (from === to) {
      return;
    }

    this.state = to;
    this.metrics.stateTransitions++;

    switch (to) {
      case CircuitBreakerState.OPEN:
        this.nextAttemptTime = Date.now() + this.config.openTimeoutMs;
        break;
      case CircuitBreakerState.HALF_OPEN:
        this.nextAttemptTime = undefined;
        this.metrics.currentConsecutiveSuccesses = 0;
        this.probeEpoch++;
        this.inFlightProbes = 0;
        break;
      case CircuitBreakerState.CLOSED:
        this.nextAttemptTime = undefined;
        this.metrics.currentConsecutiveFailures = 0;
        this.metrics.currentConsecutiveSuccesses = 0;
        break;
    }

    this.announce(from, to, reason);
  }

  private announce(from: CircuitBreakerState, to: CircuitBreakerState, reason: string): void {
    const transition: StateTransition = Object.freeze({
      breakerName: this.name,
      from,
      to,
      timestamp: new Date(),
      reason
    });

    logger.info(`Circuit breaker '${this.name}': state changed from ${from} to ${to}`, { reason });

    try {
      this.sink.emit(createEvent({
        kind: 'breaker_transitioned',
        timestamp: transition.timestamp,
        component: this.name,
        level: to === CircuitBreakerState.OPEN ? 'warning' : 'info',
        message: `Circuit breaker '${this.name}' ${from} -> ${to}`,
        metadata: { from, to, reason }
      }));
    } catch (error) {
      logger.error('Event sink failed', error, { breaker: this.name });
    }

    for (const observer of this.observers) {
      try {
        observer.onTransition(transition);
      } catch (error) {
        logger.error('Error in state change observer', error, { breaker: this.name });
      }
    }
  }

  forceOpen(): void {
    this.transition(CircuitBreakerState.OPEN, 'forced');
    logger.warn(`Circuit breaker '${this.name}': forced to ${CircuitBreakerState.OPEN}`);
  }

  forceClose(): void {
    this.transition(CircuitBreakerState.CLOSED, 'forced');
    logger.warn(`Circuit breaker '${this.name}': forced to ${CircuitBreakerState.CLOSED}`);
  }

  forceHalfOpen(): void {
    this.transition(CircuitBreakerState.HALF_OPEN, 'forced');
    logger.warn(`Circuit breaker '${this.name}': forced to ${CircuitBreakerState.HALF_OPEN}`);
  }

  /**
   * Back to CLOSED with zeroed metrics and empty history
   */
  reset(): void {
    const previous = this.state;

    this.state = CircuitBreakerState.CLOSED;
    this.metrics = createMetrics();
    this.nextAttemptTime = undefined;
    this.history = [];
    this.inFlightProbes = 0;
    this.probeEpoch++;

    if (previous !== CircuitBreakerState.CLOSED) {
      this.announce(previous, CircuitBreakerState.CLOSED, 'reset');
    }

    logger.info(`Circuit breaker '${this.name}': reset to initial state`);
  }

  /**
   * Point-in-time snapshot
   */
  status(): CircuitBreakerStatus {
    const now = Date.now();
    const window = this.windowEntries(now);
    const windowFailures = window.filter(e => !e.success).length;

    const status: CircuitBreakerStatus = {
      name: this.name,
      state: this.state,
      metrics: {
        ...this.metrics,
        failureRate: percent(this.metrics.failedRequests, this.metrics.totalRequests),
        successRate: percent(this.metrics.successfulRequests, this.metrics.totalRequests)
      },
      config: {
        failureThreshold: this.config.failureThreshold,
        successThreshold: this.config.successThreshold,
        openTimeoutMs: this.config.openTimeoutMs,
        monitoringWindowMs: this.config.monitoringWindowMs,
        halfOpenMaxProbes: this.config.halfOpenMaxProbes
      },
      windowFailureRate: percent(windowFailures, window.length),
      inFlightProbes: this.inFlightProbes
    };

    if (this.nextAttemptTime !== undefined) {
      status.nextAttemptTime = new Date(this.nextAttemptTime);
      status.timeUntilNextAttemptMs = Math.max(0, this.nextAttemptTime - now);
    }

    return status;
  }

  getMetrics(): CircuitBreakerMetrics {
    return { ...this.metrics };
  }

  /**
   * Recent requests within the monitoring window, newest first
   */
  getRecentHistory(limit: number = 50): RequestHistoryEntry[] {
    if (limit <= 0) {
      return [];
    }
    return this.windowEntries().slice(-limit).reverse();
  }

  isHealthy(): boolean {
    if (this.state === CircuitBreakerState.OPEN) {
      return false;
    }

    const window = this.windowEntries();
    const failures = window.filter(e => !e.success).length;
    return percent(failures, window.length) <= 50;
  }
}
