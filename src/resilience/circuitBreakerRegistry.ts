/**
 * Circuit Breaker Registry
 *
 * Owns named breaker instances for one application.
 */

import { logger } from '../utils/logger';
import { CircuitBreaker } from './circuitBreaker';
import { ResilienceEventSink, WinstonEventSink } from '../events/eventSink';
import {
  CircuitBreakerConfig,
  CircuitBreakerStatus,
  CircuitStateObserver
} from '../types/circuitBreaker';

export interface CircuitBreakerRegistryOptions {
  /** Applied to every breaker, under its own config */
  defaults?: Partial<CircuitBreakerConfig>;
  sink?: ResilienceEventSink;
  /** Attached to every breaker the registry creates */
  observers?: readonly CircuitStateObserver[];
}

export class CircuitBreakerRegistry {
  private breakers: Map<string, CircuitBreaker>;
  private readonly defaults: Partial<CircuitBreakerConfig>;
  private readonly sink: ResilienceEventSink;
  private readonly observers: readonly CircuitStateObserver[];

  constructor(options: CircuitBreakerRegistryOptions = {}) {
    this.breakers = new Map();
    this.defaults = { ...options.defaults };
    this.sink = options.sink ?? new WinstonEventSink();
    this.observers = [...(options.observers ?? [])];

    logger.debug('Circuit breaker registry initialized');
  }

  /**
   * Create and register a breaker; names are unique
   */
  create(name: string, config?: Partial<CircuitBreakerConfig>): CircuitBreaker {
    if (this.breakers.has(name)) {
      throw new Error(`Circuit breaker '${name}' already exists`);
    }

    const breaker = new CircuitBreaker(name, {
      config: { ...this.defaults, ...config },
      sink: this.sink,
      observers: this.observers
    });
    this.breakers.set(name, breaker);

    logger.info(`Circuit breaker '${name}' created and registered`);
    return breaker;
  }

  get(name: string): CircuitBreaker | undefined {
    return this.breakers.get(name);
  }

  getOrCreate(name: string, config?: Partial<CircuitBreakerConfig>): CircuitBreaker {
    return this.breakers.get(name) ?? this.create(name, config);
  }

  remove(name: string): boolean {
    const removed = this.breakers.delete(name);
    if (removed) {
      logger.info(`Circuit breaker '${name}' removed`);
    }
    return removed;
  }

  names(): string[] {
    return Array.from(this.breakers.keys());
  }

  getAllStatus(): Record<string, CircuitBreakerStatus> {
    const statuses: Record<string, CircuitBreakerStatus> = {};
    for (const [name, breaker] of this.breakers) {
      statuses[name] = breaker.status();
    }
    return statuses;
  }

  /**
   * Names of breakers reporting unhealthy
   */
  getUnhealthy(): string[] {
    return Array.from(this.breakers.values())
      .filter(b => !b.isHealthy())
      .map(b => b.name);
  }

  resetAll(): void {
    for (const breaker of this.breakers.values()) {
      breaker.reset();
    }
    logger.info('All circuit breakers reset');
  }
}
