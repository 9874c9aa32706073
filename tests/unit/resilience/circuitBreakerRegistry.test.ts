import { describe, it, expect, beforeEach, vi } from 'vitest';
import { CircuitBreakerRegistry } from '../../../src/resilience/circuitBreakerRegistry';
import { MemoryEventSink } from '../../../src/events/eventSink';
import { CircuitBreakerState } from '../../../src/types/circuitBreaker';

describe('CircuitBreakerRegistry', () => {
  let sink: MemoryEventSink;
  let registry: CircuitBreakerRegistry;

  beforeEach(() => {
    sink = new MemoryEventSink();
    registry = new CircuitBreakerRegistry({
      defaults: { failureThreshold: 2, openTimeoutMs: 5000 },
      sink
    });
  });

  it('should create breakers with registry defaults', () => {
    const breaker = registry.create('inventory');

    expect(breaker.name).toBe('inventory');
    expect(breaker.config.failureThreshold).toBe(2);
    expect(breaker.config.openTimeoutMs).toBe(5000);
    expect(breaker.config.successThreshold).toBe(3);
  });

  it('should let per-breaker config override defaults', () => {
    const breaker = registry.create('inventory', { failureThreshold: 7 });

    expect(breaker.config.failureThreshold).toBe(7);
    expect(breaker.config.openTimeoutMs).toBe(5000);
  });

  it('should reject duplicate names', () => {
    registry.create('inventory');

    expect(() => registry.create('inventory')).toThrow("Circuit breaker 'inventory' already exists");
  });

  it('should return the existing breaker from getOrCreate', () => {
    const first = registry.getOrCreate('inventory');
    const second = registry.getOrCreate('inventory', { failureThreshold: 9 });

    expect(second).toBe(first);
    expect(second.config.failureThreshold).toBe(2);
  });

  it('should look up and remove breakers', () => {
    registry.create('a');
    registry.create('b');

    expect(registry.get('a')?.name).toBe('a');
    expect(registry.get('missing')).toBeUndefined();
    expect(registry.names()).toEqual(['a', 'b']);

    expect(registry.remove('a')).toBe(true);
    expect(registry.remove('a')).toBe(false);
    expect(registry.names()).toEqual(['b']);
  });

  it('should report status for every breaker', () => {
    registry.create('a');
    registry.create('b').forceOpen();

    const statuses = registry.getAllStatus();

    expect(Object.keys(statuses)).toEqual(['a', 'b']);
    expect(statuses.a.state).toBe(CircuitBreakerState.CLOSED);
    expect(statuses.b.state).toBe(CircuitBreakerState.OPEN);
  });

  it('should list unhealthy breakers', () => {
    registry.create('a');
    registry.create('b').forceOpen();

    expect(registry.getUnhealthy()).toEqual(['b']);
  });

  it('should reset every breaker', () => {
    registry.create('a').forceOpen();
    registry.create('b').forceHalfOpen();

    registry.resetAll();

    expect(registry.get('a')?.getState()).toBe(CircuitBreakerState.CLOSED);
    expect(registry.get('b')?.getState()).toBe(CircuitBreakerState.CLOSED);
  });

  it('should attach shared observers and sink to created breakers', () => {
    const observer = { onTransition: vi.fn() };
    const observed = new CircuitBreakerRegistry({ sink, observers: [observer] });

    observed.create('x').forceOpen();

    expect(observer.onTransition).toHaveBeenCalledTimes(1);
    expect(sink.ofKind('breaker_transitioned')).toHaveLength(1);
  });
});
