/**
 * Classified Failure
 *
 * The single failure type of the resilience core. Category and severity
 * travel as data; the helper constructors below cover the common cases.
 */

import {
  FailureCategory,
  FailureSeverity,
  FailureContext,
  FailureContextInit,
  createFailureContext,
  failureContextToJSON
} from '../types/failure';

export interface ClassifiedFailureOptions {
  category?: FailureCategory;
  severity?: FailureSeverity;
  /** Most specific classification, e.g. "connection_refused" */
  kind?: string;
  context?: FailureContext | FailureContextInit;
  cause?: unknown;
  recoverySuggestions?: readonly string[];
}

function isFailureContext(value: FailureContext | FailureContextInit): value is FailureContext {
  return Object.isFrozen(value) && value.timestamp instanceof Date && typeof value.component === 'string';
}

function captureStack(): string[] {
  const holder: { stack?: string } = {};
  Error.captureStackTrace(holder, captureStack);
  return (holder.stack ?? '')
    .split('\n')
    .slice(1)
    .map(line => line.trim())
    .filter(line => line.length > 0);
}

export class ClassifiedFailure extends Error {
  readonly kind: string;
  readonly category: FailureCategory;
  readonly severity: FailureSeverity;
  readonly context: FailureContext;
  readonly recoverySuggestions: readonly string[];
  /** Call stack at the failure site */
  readonly stackSnapshot: readonly string[];

  constructor(message: string, options: ClassifiedFailureOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ClassifiedFailure';
    this.category = options.category ?? FailureCategory.UNKNOWN;
    this.severity = options.severity ?? FailureSeverity.MEDIUM;
    this.kind = options.kind ?? this.category;
    this.context = options.context && isFailureContext(options.context)
      ? options.context
      : createFailureContext(options.context);
    this.recoverySuggestions = Object.freeze([...(options.recoverySuggestions ?? [])]);
    this.stackSnapshot = Object.freeze(captureStack());
  }

  toJSON(): Record<string, unknown> {
    const json: Record<string, unknown> = {
      message: this.message,
      kind: this.kind,
      category: this.category,
      severity: this.severity,
      context: failureContextToJSON(this.context),
      recoverySuggestions: [...this.recoverySuggestions],
      stackSnapshot: [...this.stackSnapshot]
    };

    if (this.cause !== undefined) {
      json.cause = this.cause instanceof Error
        ? { type: this.cause.name, message: this.cause.message }
        : { type: typeof this.cause, message: String(this.cause) };
    }

    return json;
  }
}

type CaseOptions = Omit<ClassifiedFailureOptions, 'category'>;

function caseConstructor(category: FailureCategory, severity: FailureSeverity) {
  return (message: string, options: CaseOptions = {}): ClassifiedFailure =>
    new ClassifiedFailure(message, { severity, ...options, category });
}

export const synchronizationFailure = caseConstructor(FailureCategory.SYNCHRONIZATION, FailureSeverity.HIGH);
export const networkFailure = caseConstructor(FailureCategory.NETWORK, FailureSeverity.MEDIUM);
export const configurationFailure = caseConstructor(FailureCategory.CONFIGURATION, FailureSeverity.HIGH);
export const validationFailure = caseConstructor(FailureCategory.VALIDATION, FailureSeverity.MEDIUM);
export const timeoutFailure = caseConstructor(FailureCategory.TIMEOUT, FailureSeverity.MEDIUM);
export const authenticationFailure = caseConstructor(FailureCategory.AUTHENTICATION, FailureSeverity.HIGH);
export const filesystemFailure = caseConstructor(FailureCategory.FILESYSTEM, FailureSeverity.MEDIUM);
export const permissionFailure = caseConstructor(FailureCategory.PERMISSION, FailureSeverity.HIGH);

const CONNECTION_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ECONNABORTED',
  'EPIPE',
  'ENOTFOUND',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EAI_AGAIN'
]);

/**
 * Node-style `code` of an error, if any
 */
export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export type FaultShape = 'connection' | 'missing_resource' | 'permission' | 'timeout';

/**
 * Recognize the well-known fault shapes of Node and fetch errors
 */
export function detectFaultShape(error: unknown): FaultShape | undefined {
  if (!(error instanceof Error)) {
    return undefined;
  }

  const code = errorCode(error);

  if ((code && CONNECTION_CODES.has(code)) || /connection/i.test(error.name)) {
    return 'connection';
  }
  if (code === 'ENOENT') {
    return 'missing_resource';
  }
  if (code === 'EACCES' || code === 'EPERM') {
    return 'permission';
  }
  if (code === 'ETIMEDOUT' || error.name === 'TimeoutError' || error.name === 'AbortError') {
    return 'timeout';
  }

  return undefined;
}

const SHAPE_CATEGORY: Record<FaultShape, { category: FailureCategory; severity: FailureSeverity }> = {
  connection: { category: FailureCategory.NETWORK, severity: FailureSeverity.MEDIUM },
  missing_resource: { category: FailureCategory.FILESYSTEM, severity: FailureSeverity.MEDIUM },
  permission: { category: FailureCategory.PERMISSION, severity: FailureSeverity.HIGH },
  timeout: { category: FailureCategory.TIMEOUT, severity: FailureSeverity.MEDIUM }
};

/**
 * Wrap any thrown value as a ClassifiedFailure
 *
 * Values that already are one are returned unchanged. Explicit options win
 * over the detected shape.
 */
export function classifyError(error: unknown, options: ClassifiedFailureOptions = {}): ClassifiedFailure {
  if (error instanceof ClassifiedFailure) {
    return error;
  }

  const shape = detectFaultShape(error);
  const detected = shape
    ? SHAPE_CATEGORY[shape]
    : { category: FailureCategory.UNKNOWN, severity: FailureSeverity.MEDIUM };
  const message = error instanceof Error ? error.message : String(error);

  return new ClassifiedFailure(message, {
    kind: errorCode(error) ?? shape,
    ...options,
    category: options.category ?? detected.category,
    severity: options.severity ?? detected.severity,
    cause: error
  });
}
