/**
 * Resilience Event Sink
 *
 * Structured events emitted by the dispatcher, breakers and recovery
 * manager. Storage and rotation belong to whoever implements the sink.
 */

import { LogLevel } from '../types/config';
import { FailureCategory } from '../types/failure';
import { logger } from '../utils/logger';

export type ResilienceEventKind =
  | 'failure_recorded'
  | 'recovery_attempted'
  | 'breaker_transitioned';

export interface ResilienceEvent {
  readonly kind: ResilienceEventKind;
  readonly timestamp: Date;
  readonly component: string;
  readonly level: LogLevel;
  readonly category?: FailureCategory;
  readonly message: string;
  readonly metadata: Readonly<Record<string, unknown>>;
}

export interface ResilienceEventSink {
  emit(event: ResilienceEvent): void;
}

/**
 * Writes events through the winston logger
 */
export class WinstonEventSink implements ResilienceEventSink {
  emit(event: ResilienceEvent): void {
    logger.log(event.level, event.message, {
      event: event.kind,
      component: event.component,
      category: event.category,
      eventTimestamp: event.timestamp.toISOString(),
      ...event.metadata
    });
  }
}

/**
 * Keeps events in memory, newest last
 */
export class MemoryEventSink implements ResilienceEventSink {
  readonly events: ResilienceEvent[] = [];

  constructor(private readonly maxEvents: number = 1000) {}

  emit(event: ResilienceEvent): void {
    this.events.push(event);
    if (this.events.length > this.maxEvents) {
      this.events.splice(0, this.events.length - this.maxEvents);
    }
  }

  ofKind(kind: ResilienceEventKind): ResilienceEvent[] {
    return this.events.filter(e => e.kind === kind);
  }

  clear(): void {
    this.events.length = 0;
  }
}

/**
 * Fan an event out to several sinks
 */
export class CompositeEventSink implements ResilienceEventSink {
  constructor(private readonly sinks: readonly ResilienceEventSink[]) {}

  emit(event: ResilienceEvent): void {
    for (const sink of this.sinks) {
      try {
        sink.emit(event);
      } catch (error) {
        logger.error('Event sink failed', error, { event: event.kind });
      }
    }
  }
}

export function createEvent(
  fields: Omit<ResilienceEvent, 'timestamp' | 'metadata'> & {
    timestamp?: Date;
    metadata?: Record<string, unknown>;
  }
): ResilienceEvent {
  return Object.freeze({
    ...fields,
    timestamp: fields.timestamp ?? new Date(),
    metadata: Object.freeze({ ...fields.metadata })
  });
}
