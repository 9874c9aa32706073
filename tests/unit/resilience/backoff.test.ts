import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { getRetryDelay, retryWithBackoff } from '../../../src/resilience/backoff';
import {
  DEFAULT_RECOVERY_CONFIG,
  RecoveryAction,
  RecoveryConfig,
  RecoveryStrategy
} from '../../../src/types/recovery';

const outcome = {
  strategy: RecoveryStrategy.RETRY,
  action: RecoveryAction.RECONNECT,
  label: 'Test recovery'
};

describe('getRetryDelay', () => {
  it('should not wait before the first attempt', () => {
    expect(getRetryDelay(1, DEFAULT_RECOVERY_CONFIG)).toBe(0);
  });

  it('should grow exponentially up to the cap', () => {
    expect(getRetryDelay(2, DEFAULT_RECOVERY_CONFIG)).toBe(2000);
    expect(getRetryDelay(3, DEFAULT_RECOVERY_CONFIG)).toBe(4000);
    expect(getRetryDelay(5, DEFAULT_RECOVERY_CONFIG)).toBe(16000);
    expect(getRetryDelay(6, DEFAULT_RECOVERY_CONFIG)).toBe(30000);
  });
});

describe('retryWithBackoff', () => {
  const config: RecoveryConfig = {
    ...DEFAULT_RECOVERY_CONFIG,
    maxRetries: 3,
    retryDelayMs: 100,
    backoffMultiplier: 2,
    maxDelayMs: 1000,
    timeoutMs: 10000
  };

  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should succeed on the first attempt without waiting', async () => {
    const task = vi.fn().mockResolvedValue(undefined);

    const result = await retryWithBackoff(task, config, outcome);

    expect(result.success).toBe(true);
    expect(result.attempts).toBe(1);
    expect(result.message).toBe('Test recovery successful after 1 attempts');
    expect(result.durationMs).toBe(0);
    expect(task).toHaveBeenCalledWith(1);
  });

  it('should back off between attempts', async () => {
    const task = vi.fn()
      .mockRejectedValueOnce(new Error('first'))
      .mockRejectedValueOnce(new Error('second'))
      .mockResolvedValue(undefined);

    const pending = retryWithBackoff(task, config, outcome);
    await vi.advanceTimersByTimeAsync(199);
    expect(task).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(1);
    expect(task).toHaveBeenCalledTimes(2);

    await vi.advanceTimersByTimeAsync(400);
    const result = await pending;

    expect(task).toHaveBeenCalledTimes(3);
    expect(result.success).toBe(true);
    expect(result.attempts).toBe(3);
    expect(result.durationMs).toBe(600);
    expect(result.strategy).toBe(RecoveryStrategy.RETRY);
    expect(result.action).toBe(RecoveryAction.RECONNECT);
    expect(result.metadata).toEqual({ lastError: 'second' });
  });

  it('should report exhaustion with the last error', async () => {
    const task = vi.fn().mockRejectedValue(new Error('still down'));

    const pending = retryWithBackoff(task, config, outcome);
    await vi.advanceTimersByTimeAsync(600);
    const result = await pending;

    expect(result.success).toBe(false);
    expect(result.attempts).toBe(3);
    expect(result.message).toBe('Test recovery failed after all 3 attempts');
    expect(result.metadata).toEqual({ lastError: 'still down' });
  });

  it('should stop when the next wait would overrun the timeout', async () => {
    const task = vi.fn().mockRejectedValue(new Error('down'));

    const pending = retryWithBackoff(task, { ...config, timeoutMs: 300 }, outcome);
    await vi.advanceTimersByTimeAsync(200);
    const result = await pending;

    expect(task).toHaveBeenCalledTimes(2);
    expect(result.success).toBe(false);
    expect(result.attempts).toBe(2);
    expect(result.message).toBe('Test recovery timed out after 2 attempts');
  });

  it('should stop when an attempt itself runs past the timeout', async () => {
    const task = vi.fn(() => new Promise<void>((_, reject) => {
      setTimeout(() => reject(new Error('slow')), 500);
    }));

    const pending = retryWithBackoff(task, { ...config, timeoutMs: 400 }, outcome);
    await vi.advanceTimersByTimeAsync(500);
    const result = await pending;

    expect(task).toHaveBeenCalledTimes(1);
    expect(result.message).toBe('Test recovery timed out after 1 attempts');
  });

  it('should not report success for an attempt that finishes after the budget', async () => {
    const task = vi.fn(() => new Promise<void>(resolve => {
      setTimeout(resolve, 5000);
    }));

    const pending = retryWithBackoff(task, { ...config, timeoutMs: 1000 }, outcome);
    await vi.advanceTimersByTimeAsync(1000);
    const result = await pending;

    expect(result.success).toBe(false);
    expect(result.attempts).toBe(1);
    expect(result.durationMs).toBe(1000);
    expect(result.message).toBe('Test recovery timed out after 1 attempts');
  });

  it('should give up on an attempt that never settles', async () => {
    const task = vi.fn(() => new Promise<void>(() => undefined));

    const pending = retryWithBackoff(task, { ...config, timeoutMs: 1000 }, outcome);
    await vi.advanceTimersByTimeAsync(1000);
    const result = await pending;

    expect(task).toHaveBeenCalledTimes(1);
    expect(result.success).toBe(false);
    expect(result.message).toBe('Test recovery timed out after 1 attempts');
    expect(vi.getTimerCount()).toBe(0);
  });
});
