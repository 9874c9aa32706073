/**
 * Setting validators shared by the config loader and the components
 */

import { ConfigValidationError } from '../errors/configValidationError';
import { CircuitBreakerSettings } from '../types/circuitBreaker';
import { RecoveryConfig } from '../types/recovery';

function requireInteger(value: number, field: string, min: number): void {
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigValidationError(`${field} must be an integer >= ${min}`, field, value);
  }
}

function requirePositive(value: number, field: string): void {
  if (typeof value !== 'number' || Number.isNaN(value) || value <= 0) {
    throw new ConfigValidationError(`${field} must be positive`, field, value);
  }
}

export function validateCircuitBreakerSettings(
  settings: CircuitBreakerSettings,
  prefix: string = 'circuitBreaker'
): void {
  requireInteger(settings.failureThreshold, `${prefix}.failureThreshold`, 1);
  requireInteger(settings.successThreshold, `${prefix}.successThreshold`, 1);
  requirePositive(settings.openTimeoutMs, `${prefix}.openTimeoutMs`);
  requirePositive(settings.monitoringWindowMs, `${prefix}.monitoringWindowMs`);

  // Infinity lifts the half-open probe limit
  if (settings.halfOpenMaxProbes !== Infinity) {
    requireInteger(settings.halfOpenMaxProbes, `${prefix}.halfOpenMaxProbes`, 1);
  }
}

export function validateRecoveryConfig(config: RecoveryConfig, prefix: string = 'recovery'): void {
  requireInteger(config.maxRetries, `${prefix}.maxRetries`, 1);
  requireInteger(config.retryDelayMs, `${prefix}.retryDelayMs`, 0);
  requirePositive(config.timeoutMs, `${prefix}.timeoutMs`);

  if (typeof config.backoffMultiplier !== 'number' || !(config.backoffMultiplier >= 1)) {
    throw new ConfigValidationError(
      `${prefix}.backoffMultiplier must be >= 1`,
      `${prefix}.backoffMultiplier`,
      config.backoffMultiplier
    );
  }

  if (!(config.maxDelayMs >= config.retryDelayMs)) {
    throw new ConfigValidationError(
      `${prefix}.maxDelayMs must be >= ${prefix}.retryDelayMs`,
      `${prefix}.maxDelayMs`,
      config.maxDelayMs
    );
  }
}
