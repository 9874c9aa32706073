/**
 * Retry with exponential backoff
 */

import { logger } from '../utils/logger';
import {
  RecoveryAction,
  RecoveryConfig,
  RecoveryResult,
  RecoveryStrategy,
  createRecoveryResult
} from '../types/recovery';

/**
 * Wait before attempt `attempt` (1-indexed); the first attempt runs immediately
 */
export function getRetryDelay(
  attempt: number,
  config: Pick<RecoveryConfig, 'retryDelayMs' | 'backoffMultiplier' | 'maxDelayMs'>
): number {
  if (attempt <= 1) {
    return 0;
  }
  const delay = config.retryDelayMs * Math.pow(config.backoffMultiplier, attempt - 1);
  return Math.min(delay, config.maxDelayMs);
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

const DEADLINE = Symbol('deadline');

/**
 * Settle with `work`, or with DEADLINE once `ms` have passed
 */
function withinBudget<T>(work: Promise<T>, ms: number): Promise<T | typeof DEADLINE> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<typeof DEADLINE>(resolve => {
    timer = setTimeout(() => resolve(DEADLINE), ms);
  });

  return Promise.race([work, deadline]).finally(() => clearTimeout(timer));
}

export interface RetryOutcome {
  strategy: RecoveryStrategy;
  action: RecoveryAction;
  /** Used in result messages, e.g. "Network recovery" */
  label: string;
}

/**
 * Run `task` until it resolves, `maxRetries` attempts are spent, or
 * `timeoutMs` runs out. An attempt still pending when the budget ends is
 * abandoned. Never throws.
 */
export async function retryWithBackoff(
  task: (attempt: number) => Promise<void>,
  config: RecoveryConfig,
  outcome: RetryOutcome
): Promise<RecoveryResult> {
  const startedAt = Date.now();
  let attempts = 0;
  let lastError: string | undefined;

  const finish = (success: boolean, message: string): RecoveryResult =>
    createRecoveryResult({
      success,
      strategy: outcome.strategy,
      action: outcome.action,
      attempts,
      durationMs: Date.now() - startedAt,
      message,
      metadata: lastError === undefined ? {} : { lastError }
    });

  for (let attempt = 1; attempt <= config.maxRetries; attempt++) {
    const delay = getRetryDelay(attempt, config);

    if (delay > 0) {
      if (Date.now() - startedAt + delay > config.timeoutMs) {
        return finish(false, `${outcome.label} timed out after ${attempts} attempts`);
      }
      await sleep(delay);
    }

    const remaining = config.timeoutMs - (Date.now() - startedAt);
    if (remaining <= 0) {
      return finish(false, `${outcome.label} timed out after ${attempts} attempts`);
    }

    attempts = attempt;
    logger.info(`${outcome.label} attempt ${attempt}/${config.maxRetries}`);

    try {
      const settled = await withinBudget(task(attempt), remaining);
      if (settled === DEADLINE) {
        return finish(false, `${outcome.label} timed out after ${attempts} attempts`);
      }
      return finish(true, `${outcome.label} successful after ${attempt} attempts`);
    } catch (error) {
      lastError = error instanceof Error ? error.message : String(error);
      logger.warn(`${outcome.label} attempt ${attempt} failed`, { error: lastError });
    }

    if (Date.now() - startedAt >= config.timeoutMs) {
      return finish(false, `${outcome.label} timed out after ${attempts} attempts`);
    }
  }

  return finish(false, `${outcome.label} failed after all ${attempts} attempts`);
}
