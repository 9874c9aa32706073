import dotenv from 'dotenv';
import { ResilienceConfig } from '../types/config';
import { ConfigLoader, isLogLevel } from './productionConfig';

// Load environment variables
dotenv.config();

function intFromEnv(value: string | undefined, fallback: number): number {
  return value === undefined || value === '' ? fallback : parseInt(value, 10);
}

function floatFromEnv(value: string | undefined, fallback: number): number {
  return value === undefined || value === '' ? fallback : parseFloat(value);
}

/**
 * Load configuration: file (or environment defaults), then environment
 * variable overrides, then validation
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  configPath?: string
): ResilienceConfig {
  const base = ConfigLoader.load(configPath, env);

  const config: ResilienceConfig = {
    ...base,
    logging: {
      ...base.logging,
      level: isLogLevel(env.LOG_LEVEL) ? env.LOG_LEVEL : base.logging.level,
      console: {
        ...base.logging.console,
        colorize: env.LOG_CONSOLE_COLORIZE === undefined
          ? base.logging.console.colorize
          : env.LOG_CONSOLE_COLORIZE !== 'false'
      },
      file: env.LOG_FILE
        ? { enabled: true, path: env.LOG_FILE }
        : base.logging.file
    },
    circuitBreaker: {
      failureThreshold: intFromEnv(env.BREAKER_FAILURE_THRESHOLD, base.circuitBreaker.failureThreshold),
      successThreshold: intFromEnv(env.BREAKER_SUCCESS_THRESHOLD, base.circuitBreaker.successThreshold),
      openTimeoutMs: intFromEnv(env.BREAKER_OPEN_TIMEOUT_MS, base.circuitBreaker.openTimeoutMs),
      monitoringWindowMs: intFromEnv(env.BREAKER_MONITORING_WINDOW_MS, base.circuitBreaker.monitoringWindowMs),
      halfOpenMaxProbes: intFromEnv(env.BREAKER_HALF_OPEN_MAX_PROBES, base.circuitBreaker.halfOpenMaxProbes)
    },
    recovery: {
      ...base.recovery,
      maxRetries: intFromEnv(env.RECOVERY_MAX_RETRIES, base.recovery.maxRetries),
      retryDelayMs: intFromEnv(env.RECOVERY_RETRY_DELAY_MS, base.recovery.retryDelayMs),
      backoffMultiplier: floatFromEnv(env.RECOVERY_BACKOFF_MULTIPLIER, base.recovery.backoffMultiplier),
      maxDelayMs: intFromEnv(env.RECOVERY_MAX_DELAY_MS, base.recovery.maxDelayMs),
      timeoutMs: intFromEnv(env.RECOVERY_TIMEOUT_MS, base.recovery.timeoutMs),
      maxHistory: intFromEnv(env.RECOVERY_MAX_HISTORY, base.recovery.maxHistory)
    },
    dispatcher: {
      maxHistory: intFromEnv(env.DISPATCHER_MAX_HISTORY, base.dispatcher.maxHistory)
    }
  };

  ConfigLoader.validate(config);

  return config;
}
