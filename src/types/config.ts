/**
 * Configuration Type Definitions
 */

import { CircuitBreakerSettings } from './circuitBreaker';
import { RecoveryConfig } from './recovery';

export type LogLevel = 'critical' | 'error' | 'warning' | 'info' | 'debug';

export type Environment = 'development' | 'production' | 'test';

export interface LoggingConfig {
  level: LogLevel;
  console: {
    enabled: boolean;
    colorize: boolean;
  };
  file?: {
    enabled: boolean;
    path: string;
  };
}

export interface DispatcherConfig {
  /** Rolling history size for dispatched faults */
  maxHistory: number;
}

export interface ResilienceConfig {
  version: string;
  environment: Environment;
  logging: LoggingConfig;
  circuitBreaker: CircuitBreakerSettings;
  recovery: RecoveryConfig & {
    /** Bounded recovery history size */
    maxHistory: number;
  };
  dispatcher: DispatcherConfig;
}
