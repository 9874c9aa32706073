/**
 * Recovery Manager
 *
 * Given a classified failure, selects a remediation strategy (the handler
 * registered for its category, or a severity-based default), runs it and
 * records the outcome. Outcomes are always returned as data; handler
 * faults become failed results.
 *
 * Handlers run without holding any bookkeeping: history and counters are
 * only touched in synchronous sections after a handler settles.
 */

import { EventEmitter } from 'events';
import { logger } from '../utils/logger';
import { ClassifiedFailure } from '../errors/classifiedFailure';
import { validateRecoveryConfig } from '../config/validation';
import { ResilienceEventSink, WinstonEventSink, createEvent } from '../events/eventSink';
import { FailureCategory } from '../types/failure';
import {
  CustomRecoveryHandler,
  DEFAULT_RECOVERY_CONFIG,
  RecoveryAction,
  RecoveryConfig,
  RecoveryHandler,
  RecoveryHooks,
  RecoveryResult,
  RecoveryStatistics,
  RecoveryStrategy,
  SEVERITY_RECOVERY,
  createRecoveryResult
} from '../types/recovery';
import {
  createConfigRecoveryHandler,
  createNetworkRecoveryHandler,
  createSyncRecoveryHandler
} from './defaultRecoveryHandlers';

export interface RecoveryManagerOptions {
  config?: Partial<RecoveryConfig>;
  maxHistory?: number;
  sink?: ResilienceEventSink;
  hooks?: RecoveryHooks;
  /** Register the network, synchronization and configuration handlers */
  registerDefaultHandlers?: boolean;
}

interface RecoveryCounters {
  totalAttempts: number;
  successfulRecoveries: number;
  failedRecoveries: number;
  byStrategy: Partial<Record<RecoveryStrategy, number>>;
  byCategory: Partial<Record<FailureCategory, number>>;
}

const HOUR_MS = 60 * 60 * 1000;

function emptyCounters(): RecoveryCounters {
  return {
    totalAttempts: 0,
    successfulRecoveries: 0,
    failedRecoveries: 0,
    byStrategy: {},
    byCategory: {}
  };
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function noop(): Promise<void> {
  // nothing to do
}

export class RecoveryManager extends EventEmitter {
  readonly config: Readonly<RecoveryConfig>;

  private handlers: Map<FailureCategory, RecoveryHandler>;
  private customHandlers: Map<string, CustomRecoveryHandler>;
  private history: RecoveryResult[];
  private counters: RecoveryCounters;
  private readonly maxHistory: number;
  private readonly sink: ResilienceEventSink;
  private readonly hooks: RecoveryHooks;

  constructor(options: RecoveryManagerOptions = {}) {
    super();
    const config: RecoveryConfig = { ...DEFAULT_RECOVERY_CONFIG, ...options.config };
    validateRecoveryConfig(config);

    this.config = Object.freeze(config);
    this.handlers = new Map();
    this.customHandlers = new Map();
    this.history = [];
    this.counters = emptyCounters();
    this.maxHistory = options.maxHistory ?? 1000;
    this.sink = options.sink ?? new WinstonEventSink();
    this.hooks = { ...options.hooks };

    if (options.registerDefaultHandlers ?? true) {
      this.registerDefaultHandlers();
    }

    logger.info('Recovery manager initialized', {
      maxRetries: this.config.maxRetries,
      handlers: Array.from(this.handlers.keys())
    });
  }

  /**
   * Bind a handler to a failure category (last registration wins)
   */
  registerHandler(category: FailureCategory, handler: RecoveryHandler): void {
    this.handlers.set(category, handler);
    logger.info(`Recovery handler registered for: ${category}`);
  }

  /**
   * Register a named handler for operator-triggered remediation
   */
  registerCustomHandler(name: string, handler: CustomRecoveryHandler): void {
    this.customHandlers.set(name, handler);
    logger.info(`Custom recovery handler registered: ${name}`);
  }

  hasHandler(category: FailureCategory): boolean {
    return this.handlers.has(category);
  }

  private registerDefaultHandlers(): void {
    this.registerHandler(
      FailureCategory.NETWORK,
      createNetworkRecoveryHandler(this.hooks.reconnect ?? noop)
    );
    this.registerHandler(
      FailureCategory.SYNCHRONIZATION,
      createSyncRecoveryHandler(this.hooks.resetState ?? noop)
    );
    this.registerHandler(
      FailureCategory.CONFIGURATION,
      createConfigRecoveryHandler(this.hooks.reloadConfiguration ?? noop)
    );
  }

  /**
   * Attempt recovery for a classified failure
   */
  async attemptRecovery(
    failure: ClassifiedFailure,
    config?: Partial<RecoveryConfig>
  ): Promise<RecoveryResult> {
    const effectiveConfig: RecoveryConfig = { ...this.config, ...config };
    const startedAt = Date.now();

    this.counters.byCategory[failure.category] = (this.counters.byCategory[failure.category] ?? 0) + 1;

    logger.info(`Attempting recovery for: ${failure.category} - ${failure.message}`, {
      severity: failure.severity,
      kind: failure.kind
    });

    const handler = this.handlers.get(failure.category);
    let result: RecoveryResult;

    if (handler) {
      try {
        result = await handler(failure, effectiveConfig);
      } catch (handlerError) {
        logger.error('Recovery handler failed', handlerError, { category: failure.category });
        result = createRecoveryResult({
          success: false,
          strategy: RecoveryStrategy.MANUAL,
          action: RecoveryAction.CUSTOM,
          attempts: 1,
          durationMs: Date.now() - startedAt,
          message: `Recovery handler error: ${messageOf(handlerError)}`
        });
      }
    } else {
      result = await this.defaultRecovery(failure, effectiveConfig);
    }

    this.record(result, failure.category);
    return result;
  }

  /**
   * Run a named custom handler directly
   */
  async executeCustomRecovery(
    name: string,
    context: unknown,
    config?: Partial<RecoveryConfig>
  ): Promise<RecoveryResult> {
    const handler = this.customHandlers.get(name);

    if (!handler) {
      return createRecoveryResult({
        success: false,
        strategy: RecoveryStrategy.MANUAL,
        action: RecoveryAction.CUSTOM,
        attempts: 1,
        durationMs: 0,
        message: `Custom handler not found: ${name}`
      });
    }

    const startedAt = Date.now();
    let result: RecoveryResult;

    try {
      result = await handler(context, { ...this.config, ...config });
    } catch (error) {
      logger.error(`Custom recovery '${name}' failed`, error);
      result = createRecoveryResult({
        success: false,
        strategy: RecoveryStrategy.MANUAL,
        action: RecoveryAction.CUSTOM,
        attempts: 1,
        durationMs: Date.now() - startedAt,
        message: `Custom recovery failed: ${messageOf(error)}`,
        metadata: { handler: name }
      });
    }

    this.record(result);
    return result;
  }

  /**
   * Strategy and action come from the failure's severity alone
   */
  private async defaultRecovery(
    failure: ClassifiedFailure,
    config: RecoveryConfig
  ): Promise<RecoveryResult> {
    const startedAt = Date.now();
    const { strategy, action } = SEVERITY_RECOVERY[failure.severity];

    logger.info(`Executing default recovery for: ${failure.category}`, { strategy, action });

    const finish = (success: boolean, message: string): RecoveryResult =>
      createRecoveryResult({
        success,
        strategy,
        action,
        attempts: 1,
        durationMs: Date.now() - startedAt,
        message,
        metadata: { category: failure.category, severity: failure.severity }
      });

    try {
      if (strategy === RecoveryStrategy.RESTART) {
        if (!config.enableAutoRestart) {
          return finish(false, `Automatic restart disabled; manual restart required for ${failure.category}`);
        }
        await (this.hooks.restartService ?? noop)(failure);
      } else if (strategy === RecoveryStrategy.RESET) {
        await (this.hooks.resetState ?? noop)(failure);
      }

      return finish(true, `Default recovery completed for ${failure.category}`);
    } catch (error) {
      return finish(false, `Default recovery failed: ${messageOf(error)}`);
    }
  }

  private record(result: RecoveryResult, category?: FailureCategory): void {
    this.history.push(result);
    if (this.history.length > this.maxHistory) {
      this.history.shift();
    }

    this.counters.totalAttempts++;
    if (result.success) {
      this.counters.successfulRecoveries++;
    } else {
      this.counters.failedRecoveries++;
    }
    this.counters.byStrategy[result.strategy] = (this.counters.byStrategy[result.strategy] ?? 0) + 1;

    logger.info(`Recovery result recorded: ${result.success} - ${result.message}`);

    try {
      this.sink.emit(createEvent({
        kind: 'recovery_attempted',
        timestamp: result.timestamp,
        component: 'recovery-manager',
        level: result.success ? 'info' : 'warning',
        category,
        message: result.message,
        metadata: {
          success: result.success,
          strategy: result.strategy,
          action: result.action,
          attempts: result.attempts,
          durationMs: result.durationMs
        }
      }));
    } catch (error) {
      logger.error('Event sink failed', error, { category });
    }

    // Listener faults never reach the caller
    try {
      this.emit(result.success ? 'recovery_succeeded' : 'recovery_failed', { category, result });
    } catch (error) {
      logger.error('Error in recovery listener', error, { category });
    }
  }

  getRecoveryStatistics(): RecoveryStatistics {
    const { totalAttempts, successfulRecoveries } = this.counters;
    const successRate = totalAttempts > 0 ? (successfulRecoveries / totalAttempts) * 100 : 0;

    return {
      totalAttempts,
      successfulRecoveries,
      failedRecoveries: this.counters.failedRecoveries,
      successRatePercent: Math.round(successRate * 100) / 100,
      byStrategy: { ...this.counters.byStrategy },
      byCategory: { ...this.counters.byCategory },
      recentRecoveries: this.history.slice(-10)
    };
  }

  getHistory(): readonly RecoveryResult[] {
    return [...this.history];
  }

  clearRecoveryHistory(): void {
    this.history = [];
    this.counters = emptyCounters();
    logger.info('Recovery history and statistics cleared');
  }

  /**
   * Failed recoveries within the trailing window
   */
  getRecentFailures(hours: number = 24): RecoveryResult[] {
    const cutoff = Date.now() - hours * HOUR_MS;
    return this.history.filter(r => !r.success && r.timestamp.getTime() >= cutoff);
  }

  /**
   * Unhealthy after 10+ failed recoveries in the last hour, or when fewer
   * than half of all recoveries succeeded
   */
  isHealthy(): boolean {
    if (this.getRecentFailures(1).length >= 10) {
      return false;
    }

    const stats = this.getRecoveryStatistics();
    if (stats.totalAttempts > 0 && stats.successRatePercent < 50) {
      return false;
    }

    return true;
  }
}
