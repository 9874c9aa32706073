import { CircuitBreakerState } from '../types/circuitBreaker';

/**
 * Raised when a breaker refuses to admit a call
 */
export class CircuitOpenError extends Error {
  readonly breakerName: string;
  readonly state: CircuitBreakerState;
  /** Time until the breaker starts probing, when known */
  readonly retryAfterMs?: number;

  constructor(breakerName: string, state: CircuitBreakerState, retryAfterMs?: number) {
    super(`Circuit breaker '${breakerName}' is ${state}`);
    this.name = 'CircuitOpenError';
    this.breakerName = breakerName;
    this.state = state;
    this.retryAfterMs = retryAfterMs;
  }
}
