/**
 * Failure Taxonomy Type Definitions
 */

import type { LogLevel } from './config';

export enum FailureCategory {
  BRIDGE = 'bridge',
  SYNCHRONIZATION = 'synchronization',
  NETWORK = 'network',
  FILESYSTEM = 'filesystem',
  CONFIGURATION = 'configuration',
  VALIDATION = 'validation',
  AUTHENTICATION = 'authentication',
  PERMISSION = 'permission',
  TIMEOUT = 'timeout',
  EXTERNAL_API = 'external_api',
  UNKNOWN = 'unknown'
}

export enum FailureSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical'
}

const SEVERITY_RANK: Record<FailureSeverity, number> = {
  [FailureSeverity.LOW]: 1,
  [FailureSeverity.MEDIUM]: 2,
  [FailureSeverity.HIGH]: 3,
  [FailureSeverity.CRITICAL]: 4
};

/**
 * Negative when `a` is less severe than `b`, zero when equal
 */
export function compareSeverity(a: FailureSeverity, b: FailureSeverity): number {
  return SEVERITY_RANK[a] - SEVERITY_RANK[b];
}

/**
 * Log level a failure of each severity is reported at
 */
export const SEVERITY_LOG_LEVEL: Readonly<Record<FailureSeverity, LogLevel>> = Object.freeze({
  [FailureSeverity.LOW]: 'info',
  [FailureSeverity.MEDIUM]: 'warning',
  [FailureSeverity.HIGH]: 'error',
  [FailureSeverity.CRITICAL]: 'critical'
});

export interface FailureContext {
  /** When the failure occurred */
  readonly timestamp: Date;

  readonly sessionId?: string;
  readonly userId?: string;
  readonly requestId?: string;

  /** Component the failure originated in */
  readonly component: string;

  /** Operation being performed, if known */
  readonly operation?: string;

  /** Free-form metadata */
  readonly metadata: Readonly<Record<string, unknown>>;
}

export type FailureContextInit = Partial<Omit<FailureContext, 'metadata'>> & {
  metadata?: Record<string, unknown>;
};

export const DEFAULT_COMPONENT = 'resilience-core';

/**
 * Create a frozen failure context
 */
export function createFailureContext(init: FailureContextInit = {}): FailureContext {
  const context: FailureContext = {
    timestamp: init.timestamp ?? new Date(),
    sessionId: init.sessionId,
    userId: init.userId,
    requestId: init.requestId,
    component: init.component ?? DEFAULT_COMPONENT,
    operation: init.operation,
    metadata: Object.freeze({ ...init.metadata })
  };

  return Object.freeze(context);
}

/**
 * Serializable form of a failure context
 */
export function failureContextToJSON(context: FailureContext): Record<string, unknown> {
  return {
    timestamp: context.timestamp.toISOString(),
    sessionId: context.sessionId,
    userId: context.userId,
    requestId: context.requestId,
    component: context.component,
    operation: context.operation,
    metadata: { ...context.metadata }
  };
}
