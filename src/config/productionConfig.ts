/**
 * Production Configuration System
 *
 * Loads and validates resilience configuration from JSON files.
 * Supports environment-specific defaults and runtime validation.
 */

import * as fs from 'fs';
import * as path from 'path';
import { ConfigValidationError } from '../errors/configValidationError';
import { DEFAULT_CIRCUIT_BREAKER_SETTINGS } from '../types/circuitBreaker';
import { DEFAULT_RECOVERY_CONFIG } from '../types/recovery';
import { Environment, LogLevel, ResilienceConfig } from '../types/config';
import { validateCircuitBreakerSettings, validateRecoveryConfig } from './validation';

const ENVIRONMENTS: readonly Environment[] = ['development', 'production', 'test'];
const LOG_LEVEL_NAMES: readonly LogLevel[] = ['critical', 'error', 'warning', 'info', 'debug'];

export const DEFAULT_CONFIG_PATHS: readonly string[] = [
  './config/resilience.json',
  './resilience.config.json'
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isEnvironment(value: unknown): value is Environment {
  return typeof value === 'string' && (ENVIRONMENTS as readonly string[]).includes(value);
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && (LOG_LEVEL_NAMES as readonly string[]).includes(value);
}

/**
 * Configuration loader and validator
 */
export class ConfigLoader {
  /**
   * Load configuration from a JSON file, layered over environment defaults
   */
  static loadFromFile(filePath: string): ResilienceConfig {
    if (!fs.existsSync(filePath)) {
      throw new Error(`Configuration file not found: ${filePath}`);
    }

    const ext = path.extname(filePath).toLowerCase();
    if (ext !== '.json') {
      throw new Error(`Unsupported configuration file format: ${ext}`);
    }

    const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    if (!isRecord(parsed)) {
      throw new ConfigValidationError('Configuration file must contain a JSON object');
    }

    const environment = parsed.environment ?? 'development';
    if (!isEnvironment(environment)) {
      throw new ConfigValidationError(
        `Environment must be one of: ${ENVIRONMENTS.join(', ')}`,
        'environment',
        environment
      );
    }

    const config = this.merge(this.getDefaultConfig(environment), parsed);
    this.validate(config);

    return config;
  }

  /**
   * Overlay a parsed file onto a base configuration, section by section
   */
  static merge(base: ResilienceConfig, file: Record<string, unknown>): ResilienceConfig {
    const section = <T extends object>(current: T, key: string): T => {
      const override = file[key];
      if (override === undefined) {
        return current;
      }
      if (!isRecord(override)) {
        throw new ConfigValidationError(`${key} must be an object`, key, override);
      }
      return { ...current, ...override };
    };

    const logging = section(base.logging, 'logging');

    return {
      version: typeof file.version === 'string' ? file.version : base.version,
      environment: isEnvironment(file.environment) ? file.environment : base.environment,
      logging: {
        ...logging,
        console: { ...base.logging.console, ...logging.console },
        file: logging.file ? { ...base.logging.file, ...logging.file } : base.logging.file
      },
      circuitBreaker: section(base.circuitBreaker, 'circuitBreaker'),
      recovery: section(base.recovery, 'recovery'),
      dispatcher: section(base.dispatcher, 'dispatcher')
    };
  }

  /**
   * Validate configuration structure
   */
  static validate(config: ResilienceConfig): void {
    if (!config.version) {
      throw new ConfigValidationError('Configuration version is required', 'version');
    }

    if (!isEnvironment(config.environment)) {
      throw new ConfigValidationError(
        `Environment must be one of: ${ENVIRONMENTS.join(', ')}`,
        'environment',
        config.environment
      );
    }

    if (!isLogLevel(config.logging.level)) {
      throw new ConfigValidationError(
        `Log level must be one of: ${LOG_LEVEL_NAMES.join(', ')}`,
        'logging.level',
        config.logging.level
      );
    }

    if (config.logging.file?.enabled && !config.logging.file.path) {
      throw new ConfigValidationError('Log file path is required when file logging is enabled', 'logging.file.path');
    }

    validateCircuitBreakerSettings(config.circuitBreaker);
    validateRecoveryConfig(config.recovery);

    if (!Number.isInteger(config.recovery.maxHistory) || config.recovery.maxHistory < 1) {
      throw new ConfigValidationError(
        'Recovery history size must be a positive integer',
        'recovery.maxHistory',
        config.recovery.maxHistory
      );
    }

    if (!Number.isInteger(config.dispatcher.maxHistory) || config.dispatcher.maxHistory < 1) {
      throw new ConfigValidationError(
        'Dispatcher history size must be a positive integer',
        'dispatcher.maxHistory',
        config.dispatcher.maxHistory
      );
    }
  }

  /**
   * Default configuration for an environment
   */
  static getDefaultConfig(environment: Environment): ResilienceConfig {
    return {
      version: '1.0.0',
      environment,
      logging: {
        level: environment === 'production' ? 'info' : 'debug',
        console: {
          enabled: environment !== 'test',
          colorize: environment !== 'production'
        },
        file: {
          enabled: environment === 'production',
          path: './logs/resilience.log'
        }
      },
      circuitBreaker: { ...DEFAULT_CIRCUIT_BREAKER_SETTINGS },
      recovery: {
        ...DEFAULT_RECOVERY_CONFIG,
        maxHistory: 1000
      },
      dispatcher: {
        maxHistory: 1000
      }
    };
  }

  /**
   * Load configuration with environment fallback
   */
  static load(configPath?: string, env: NodeJS.ProcessEnv = process.env): ResilienceConfig {
    if (configPath) {
      return this.loadFromFile(configPath);
    }

    const envConfigPath = env.RESILIENCE_CONFIG;
    if (envConfigPath) {
      return this.loadFromFile(envConfigPath);
    }

    for (const defaultPath of DEFAULT_CONFIG_PATHS) {
      if (fs.existsSync(defaultPath)) {
        return this.loadFromFile(defaultPath);
      }
    }

    return this.getDefaultConfig(isEnvironment(env.NODE_ENV) ? env.NODE_ENV : 'development');
  }
}
