/**
 * Circuit Breaker Type Definitions
 */

export enum CircuitBreakerState {
  /** Requests pass through */
  CLOSED = 'closed',

  /** Requests are rejected */
  OPEN = 'open',

  /** Limited probing */
  HALF_OPEN = 'half_open'
}

/**
 * Constructor of an error type the breaker counts
 */
export type ErrorType = abstract new (...args: never[]) => Error;

/**
 * Serializable breaker settings (config files, environment)
 */
export interface CircuitBreakerSettings {
  /** Consecutive failures that trip a closed breaker */
  failureThreshold: number;

  /** Consecutive half-open successes that close the breaker */
  successThreshold: number;

  /** Time spent open before probing resumes (ms) */
  openTimeoutMs: number;

  /** Trailing window for request history and rates (ms) */
  monitoringWindowMs: number;

  /** Probes allowed in flight while half-open */
  halfOpenMaxProbes: number;
}

export interface CircuitBreakerConfig extends CircuitBreakerSettings {
  /** Errors counted toward trip decisions; anything else passes through uncounted */
  expectedErrorTypes: readonly ErrorType[];
}

export const DEFAULT_CIRCUIT_BREAKER_SETTINGS: Readonly<CircuitBreakerSettings> = Object.freeze({
  failureThreshold: 5,
  successThreshold: 3,
  openTimeoutMs: 60000,
  monitoringWindowMs: 300000,
  halfOpenMaxProbes: 1
});

export interface CircuitBreakerMetrics {
  totalRequests: number;
  successfulRequests: number;
  failedRequests: number;
  rejectedRequests: number;
  stateTransitions: number;
  currentConsecutiveFailures: number;
  currentConsecutiveSuccesses: number;
  lastFailureTime?: Date;
  lastSuccessTime?: Date;
}

export interface RequestHistoryEntry {
  /** Epoch ms */
  readonly timestamp: number;
  readonly success: boolean;
  readonly durationMs: number;
  readonly state: CircuitBreakerState;
  readonly errorType?: string;
  readonly errorMessage?: string;
}

export interface StateTransition {
  readonly breakerName: string;
  readonly from: CircuitBreakerState;
  readonly to: CircuitBreakerState;
  readonly timestamp: Date;
  readonly reason: string;
}

/**
 * Notified synchronously on every state transition
 */
export interface CircuitStateObserver {
  onTransition(transition: StateTransition): void;
}

export interface CircuitBreakerStatus {
  name: string;
  state: CircuitBreakerState;
  metrics: CircuitBreakerMetrics & {
    /** Percent, all-time */
    failureRate: number;
    /** Percent, all-time */
    successRate: number;
  };
  config: CircuitBreakerSettings;
  nextAttemptTime?: Date;
  timeUntilNextAttemptMs?: number;
  /** Percent over the monitoring window */
  windowFailureRate: number;
  inFlightProbes: number;
}
