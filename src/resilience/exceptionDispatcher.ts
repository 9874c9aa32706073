/**
 * Exception Dispatcher
 *
 * Records fault occurrences and routes each fault to the handler registered
 * for its kind and to every global handler. Keeps a bounded history and
 * aggregate statistics for health endpoints.
 */

import { logger } from '../utils/logger';
import {
  ClassifiedFailure,
  FaultShape,
  detectFaultShape,
  errorCode
} from '../errors/classifiedFailure';
import {
  FailureCategory,
  FailureContext,
  FailureSeverity,
  SEVERITY_LOG_LEVEL,
  createFailureContext,
  failureContextToJSON
} from '../types/failure';
import { ResilienceEvent, ResilienceEventSink, WinstonEventSink, createEvent } from '../events/eventSink';

export type FaultHandler = (fault: unknown, context: FailureContext) => void;

export interface DispatchRecord {
  readonly timestamp: Date;
  /** Resolved fault kind */
  readonly faultType: string;
  readonly message: string;
  readonly context: FailureContext;
  readonly category?: FailureCategory;
  readonly severity?: FailureSeverity;
  readonly recoverySuggestions?: readonly string[];
}

export interface DispatcherStatistics {
  totalErrors: number;
  byType: Record<string, number>;
  byCategory: Partial<Record<FailureCategory, number>>;
  bySeverity: Partial<Record<FailureSeverity, number>>;
  recentErrors: DispatchRecord[];
}

export interface ExceptionDispatcherOptions {
  maxHistory?: number;
  sink?: ResilienceEventSink;
}

const SHAPE_SUGGESTIONS: Record<FaultShape, readonly string[]> = {
  connection: [
    'Check network connectivity',
    'Check proxy settings',
    'Wait a moment and retry'
  ],
  missing_resource: [
    'Check that the path is correct',
    'Check that the resource exists',
    'Check that permissions are set correctly'
  ],
  permission: [
    'Check file and directory permissions',
    'Run with the required privileges',
    'Check whether another process holds the resource'
  ],
  timeout: [
    'Increase the timeout',
    'Split the work into smaller operations',
    'Check system load'
  ]
};

/**
 * Most specific classification available for a fault
 */
export function resolveFaultKind(fault: unknown): string {
  if (fault instanceof ClassifiedFailure) {
    return fault.kind;
  }
  const code = errorCode(fault);
  if (code) {
    return code;
  }
  if (fault instanceof Error) {
    return fault.name;
  }
  return 'unknown';
}

function faultMessage(fault: unknown): string {
  return fault instanceof Error ? fault.message : String(fault);
}

function increment<K extends string>(counts: Partial<Record<K, number>>, key: K): void {
  counts[key] = (counts[key] ?? 0) + 1;
}

export class ExceptionDispatcher {
  private handlers: Map<string, FaultHandler>;
  private globalHandlers: FaultHandler[];
  private history: DispatchRecord[];
  private readonly maxHistory: number;
  private readonly sink: ResilienceEventSink;

  constructor(options: ExceptionDispatcherOptions = {}) {
    this.handlers = new Map();
    this.globalHandlers = [];
    this.history = [];
    this.maxHistory = options.maxHistory ?? 1000;
    this.sink = options.sink ?? new WinstonEventSink();

    logger.debug('Exception dispatcher initialized', { maxHistory: this.maxHistory });
  }

  /**
   * Bind a handler to one fault kind (last registration wins)
   */
  registerHandler(kind: string, handler: FaultHandler): void {
    this.handlers.set(kind, handler);
    logger.debug(`Fault handler registered for: ${kind}`);
  }

  /**
   * Add a handler invoked for every fault
   */
  registerGlobalHandler(handler: FaultHandler): void {
    this.globalHandlers.push(handler);
    logger.debug('Global fault handler registered');
  }

  /**
   * Record a fault and route it to its handlers
   */
  handle(fault: unknown, context?: FailureContext): void {
    const effectiveContext = fault instanceof ClassifiedFailure
      ? fault.context
      : context ?? createFailureContext();
    const kind = resolveFaultKind(fault);

    const record: DispatchRecord = fault instanceof ClassifiedFailure
      ? {
          timestamp: effectiveContext.timestamp,
          faultType: kind,
          message: fault.message,
          context: effectiveContext,
          category: fault.category,
          severity: fault.severity,
          recoverySuggestions: fault.recoverySuggestions
        }
      : {
          timestamp: effectiveContext.timestamp,
          faultType: kind,
          message: faultMessage(fault),
          context: effectiveContext
        };

    this.history.push(Object.freeze(record));
    if (this.history.length > this.maxHistory) {
      this.history = this.history.slice(-this.maxHistory);
    }

    const handler = this.handlers.get(kind);
    if (handler) {
      this.invoke(handler, fault, effectiveContext, 'Error in fault handler');
    }

    for (const globalHandler of this.globalHandlers) {
      this.invoke(globalHandler, fault, effectiveContext, 'Error in global fault handler');
    }

    this.emitRecord(fault, record);
  }

  private invoke(
    handler: FaultHandler,
    fault: unknown,
    context: FailureContext,
    label: string
  ): void {
    try {
      handler(fault, context);
    } catch (handlerError) {
      logger.error(label, handlerError, { faultType: resolveFaultKind(fault) });
    }
  }

  private emitRecord(fault: unknown, record: DispatchRecord): void {
    try {
      this.sink.emit(this.recordEvent(fault, record));
    } catch (error) {
      logger.error('Event sink failed', error, { faultType: record.faultType });
    }
  }

  private recordEvent(fault: unknown, record: DispatchRecord): ResilienceEvent {
    if (fault instanceof ClassifiedFailure) {
      return createEvent({
        kind: 'failure_recorded',
        component: record.context.component,
        level: SEVERITY_LOG_LEVEL[fault.severity],
        category: fault.category,
        message: `Failure [${fault.category}]: ${fault.message}`,
        metadata: {
          context: failureContextToJSON(record.context),
          failure: fault.toJSON()
        }
      });
    }

    return createEvent({
      kind: 'failure_recorded',
      component: record.context.component,
      level: 'error',
      message: `Unhandled fault: ${record.faultType}: ${record.message}`,
      metadata: {
        context: failureContextToJSON(record.context),
        stack: fault instanceof Error ? fault.stack : undefined
      }
    });
  }

  /**
   * Counts by type, category and severity plus the 10 newest records
   */
  getStatistics(): DispatcherStatistics {
    const byType: Record<string, number> = {};
    const byCategory: Partial<Record<FailureCategory, number>> = {};
    const bySeverity: Partial<Record<FailureSeverity, number>> = {};

    for (const record of this.history) {
      byType[record.faultType] = (byType[record.faultType] ?? 0) + 1;
      if (record.category) {
        increment(byCategory, record.category);
      }
      if (record.severity) {
        increment(bySeverity, record.severity);
      }
    }

    return {
      totalErrors: this.history.length,
      byType,
      byCategory,
      bySeverity,
      recentErrors: this.history.slice(-10)
    };
  }

  getHistory(): readonly DispatchRecord[] {
    return [...this.history];
  }

  clearHistory(): void {
    this.history = [];
    logger.info('Fault history cleared');
  }

  /**
   * Suggestions carried by the fault, or generic ones for well-known shapes
   */
  getRecoverySuggestions(fault: unknown): string[] {
    if (fault instanceof ClassifiedFailure) {
      return [...fault.recoverySuggestions];
    }

    const shape = detectFaultShape(fault);
    return shape ? [...SHAPE_SUGGESTIONS[shape]] : [];
  }
}
