/**
 * Built-in recovery handlers for network, synchronization and
 * configuration failures. Each one drives a hook supplied by the
 * embedding application.
 */

import { logger } from '../utils/logger';
import { ClassifiedFailure } from '../errors/classifiedFailure';
import { retryWithBackoff } from './backoff';
import {
  RecoveryAction,
  RecoveryHandler,
  RecoveryStrategy,
  createRecoveryResult
} from '../types/recovery';

type Hook = (failure: ClassifiedFailure) => Promise<void>;

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Reconnect with exponential backoff
 */
export function createNetworkRecoveryHandler(reconnect: Hook): RecoveryHandler {
  return (failure, config) =>
    retryWithBackoff(() => reconnect(failure), config, {
      strategy: RecoveryStrategy.RETRY,
      action: RecoveryAction.RECONNECT,
      label: 'Network recovery'
    });
}

/**
 * Reset synchronization state once
 */
export function createSyncRecoveryHandler(resetState: Hook): RecoveryHandler {
  return async (failure) => {
    const startedAt = Date.now();
    logger.info('Attempting sync failure recovery', { kind: failure.kind });

    try {
      await resetState(failure);
      return createRecoveryResult({
        success: true,
        strategy: RecoveryStrategy.RESET,
        action: RecoveryAction.RESET_STATE,
        attempts: 1,
        durationMs: Date.now() - startedAt,
        message: 'Sync state reset successful'
      });
    } catch (error) {
      return createRecoveryResult({
        success: false,
        strategy: RecoveryStrategy.RESET,
        action: RecoveryAction.RESET_STATE,
        attempts: 1,
        durationMs: Date.now() - startedAt,
        message: `Sync recovery failed: ${messageOf(error)}`
      });
    }
  };
}

/**
 * Reload configuration as a fallback
 */
export function createConfigRecoveryHandler(reloadConfiguration: Hook): RecoveryHandler {
  return async (failure, config) => {
    const startedAt = Date.now();

    if (!config.enableFallback) {
      return createRecoveryResult({
        success: false,
        strategy: RecoveryStrategy.FALLBACK,
        action: RecoveryAction.RELOAD_CONFIG,
        attempts: 0,
        durationMs: 0,
        message: 'Configuration fallback disabled'
      });
    }

    logger.info('Attempting config failure recovery', { kind: failure.kind });

    try {
      await reloadConfiguration(failure);
      return createRecoveryResult({
        success: true,
        strategy: RecoveryStrategy.FALLBACK,
        action: RecoveryAction.RELOAD_CONFIG,
        attempts: 1,
        durationMs: Date.now() - startedAt,
        message: 'Configuration reloaded successfully'
      });
    } catch (error) {
      return createRecoveryResult({
        success: false,
        strategy: RecoveryStrategy.FALLBACK,
        action: RecoveryAction.RELOAD_CONFIG,
        attempts: 1,
        durationMs: Date.now() - startedAt,
        message: `Config recovery failed: ${messageOf(error)}`
      });
    }
  };
}
