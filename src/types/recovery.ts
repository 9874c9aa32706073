/**
 * Recovery Type Definitions
 */

import type { ClassifiedFailure } from '../errors/classifiedFailure';
import { FailureCategory, FailureSeverity } from './failure';

export enum RecoveryStrategy {
  /** Retry the operation with exponential backoff */
  RETRY = 'retry',

  /** Use cached/fallback data or configuration */
  FALLBACK = 'fallback',

  /** Restart the component */
  RESTART = 'restart',

  /** Reset the component's state */
  RESET = 'reset',

  /** Manual intervention required */
  MANUAL = 'manual',

  /** Nothing to do */
  IGNORE = 'ignore'
}

export enum RecoveryAction {
  RECONNECT = 'reconnect',
  RELOAD_CONFIG = 'reload_config',
  CLEAR_CACHE = 'clear_cache',
  RESET_STATE = 'reset_state',
  RESTART_SERVICE = 'restart_service',
  SWITCH_ENDPOINT = 'switch_endpoint',
  CUSTOM = 'custom'
}

export enum HealthStatus {
  HEALTHY = 'healthy',
  DEGRADED = 'degraded',
  UNHEALTHY = 'unhealthy'
}

export interface RecoveryResult {
  /** Whether recovery was successful */
  readonly success: boolean;

  readonly strategy: RecoveryStrategy;
  readonly action: RecoveryAction;

  /** Number of attempts made */
  readonly attempts: number;

  readonly durationMs: number;

  /** Message describing the outcome */
  readonly message: string;

  readonly timestamp: Date;

  readonly metadata: Readonly<Record<string, unknown>>;
}

export interface RecoveryConfig {
  /** Maximum attempts in a retry loop */
  maxRetries: number;

  /** Base delay before the second attempt (ms) */
  retryDelayMs: number;

  backoffMultiplier: number;

  /** Upper bound for a single backoff wait (ms) */
  maxDelayMs: number;

  /** Overall budget for one retry loop (ms) */
  timeoutMs: number;

  /** Allow fallback strategies (configuration reload) */
  enableFallback: boolean;

  /** Allow restart strategies to run their hook */
  enableAutoRestart: boolean;
}

export type RecoveryHandler = (
  failure: ClassifiedFailure,
  config: RecoveryConfig
) => Promise<RecoveryResult>;

export type CustomRecoveryHandler = (
  context: unknown,
  config: RecoveryConfig
) => Promise<RecoveryResult>;

export interface RecoveryStatistics {
  totalAttempts: number;
  successfulRecoveries: number;
  failedRecoveries: number;
  successRatePercent: number;
  byStrategy: Partial<Record<RecoveryStrategy, number>>;
  byCategory: Partial<Record<FailureCategory, number>>;
  recentRecoveries: RecoveryResult[];
}

/**
 * Remediation hooks the built-in handlers call
 */
export interface RecoveryHooks {
  /** Re-establish a connection; throw to signal failure */
  reconnect?: (failure: ClassifiedFailure) => Promise<void>;

  /** Reset synchronization state */
  resetState?: (failure: ClassifiedFailure) => Promise<void>;

  /** Reload configuration */
  reloadConfiguration?: (failure: ClassifiedFailure) => Promise<void>;

  /** Restart a service (critical failures, only with enableAutoRestart) */
  restartService?: (failure: ClassifiedFailure) => Promise<void>;
}

export const DEFAULT_RECOVERY_CONFIG: Readonly<RecoveryConfig> = Object.freeze({
  maxRetries: 3,
  retryDelayMs: 1000,
  backoffMultiplier: 2,
  maxDelayMs: 30000,
  timeoutMs: 60000,
  enableFallback: true,
  enableAutoRestart: false
});

/**
 * Default (strategy, action) per severity when no category handler exists
 */
export const SEVERITY_RECOVERY: Readonly<
  Record<FailureSeverity, { strategy: RecoveryStrategy; action: RecoveryAction }>
> = Object.freeze({
  [FailureSeverity.CRITICAL]: {
    strategy: RecoveryStrategy.RESTART,
    action: RecoveryAction.RESTART_SERVICE
  },
  [FailureSeverity.HIGH]: {
    strategy: RecoveryStrategy.RESET,
    action: RecoveryAction.RESET_STATE
  },
  [FailureSeverity.MEDIUM]: {
    strategy: RecoveryStrategy.RETRY,
    action: RecoveryAction.CUSTOM
  },
  [FailureSeverity.LOW]: {
    strategy: RecoveryStrategy.RETRY,
    action: RecoveryAction.CUSTOM
  }
});

/**
 * Build a frozen recovery result
 */
export function createRecoveryResult(fields: {
  success: boolean;
  strategy: RecoveryStrategy;
  action: RecoveryAction;
  attempts: number;
  durationMs: number;
  message: string;
  timestamp?: Date;
  metadata?: Record<string, unknown>;
}): RecoveryResult {
  return Object.freeze({
    success: fields.success,
    strategy: fields.strategy,
    action: fields.action,
    attempts: fields.attempts,
    durationMs: fields.durationMs,
    message: fields.message,
    timestamp: fields.timestamp ?? new Date(),
    metadata: Object.freeze({ ...fields.metadata })
  });
}
