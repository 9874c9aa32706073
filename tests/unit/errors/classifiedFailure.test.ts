/**
 * Failure taxonomy tests
 */

import { describe, it, expect } from 'vitest';
import {
  ClassifiedFailure,
  classifyError,
  configurationFailure,
  detectFaultShape,
  errorCode,
  networkFailure,
  permissionFailure,
  synchronizationFailure
} from '../../../src/errors/classifiedFailure';
import {
  FailureCategory,
  FailureSeverity,
  compareSeverity,
  createFailureContext
} from '../../../src/types/failure';

function nodeError(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

describe('ClassifiedFailure', () => {
  it('should default to unknown category and medium severity', () => {
    const failure = new ClassifiedFailure('boom');

    expect(failure.category).toBe(FailureCategory.UNKNOWN);
    expect(failure.severity).toBe(FailureSeverity.MEDIUM);
    expect(failure.kind).toBe('unknown');
    expect(failure.context.component).toBe('resilience-core');
    expect(failure.recoverySuggestions).toEqual([]);
    expect(failure).toBeInstanceOf(Error);
  });

  it('should capture a stack snapshot at construction', () => {
    const failure = new ClassifiedFailure('boom');

    expect(failure.stackSnapshot.length).toBeGreaterThan(0);
    expect(Object.isFrozen(failure.stackSnapshot)).toBe(true);
  });

  it('should keep a given failure context', () => {
    const context = createFailureContext({ component: 'sync', requestId: 'req-1' });
    const failure = new ClassifiedFailure('boom', { context });

    expect(failure.context).toBe(context);
  });

  it('should build a context from init fields', () => {
    const failure = new ClassifiedFailure('boom', {
      context: { component: 'bridge', metadata: { attempt: 2 } }
    });

    expect(failure.context.component).toBe('bridge');
    expect(failure.context.metadata).toEqual({ attempt: 2 });
    expect(Object.isFrozen(failure.context)).toBe(true);
  });

  it('should serialize to JSON with cause', () => {
    const cause = new TypeError('bad input');
    const failure = new ClassifiedFailure('wrapped', {
      category: FailureCategory.VALIDATION,
      severity: FailureSeverity.LOW,
      kind: 'schema_mismatch',
      cause,
      recoverySuggestions: ['Check the payload']
    });

    const json = failure.toJSON();

    expect(json.message).toBe('wrapped');
    expect(json.kind).toBe('schema_mismatch');
    expect(json.category).toBe('validation');
    expect(json.severity).toBe('low');
    expect(json.recoverySuggestions).toEqual(['Check the payload']);
    expect(json.cause).toEqual({ type: 'TypeError', message: 'bad input' });
  });

  it('should omit cause from JSON when there is none', () => {
    expect(new ClassifiedFailure('boom').toJSON()).not.toHaveProperty('cause');
  });
});

describe('case constructors', () => {
  it('should apply category and default severity', () => {
    expect(synchronizationFailure('x').category).toBe(FailureCategory.SYNCHRONIZATION);
    expect(synchronizationFailure('x').severity).toBe(FailureSeverity.HIGH);
    expect(networkFailure('x').severity).toBe(FailureSeverity.MEDIUM);
    expect(configurationFailure('x').severity).toBe(FailureSeverity.HIGH);
    expect(permissionFailure('x').category).toBe(FailureCategory.PERMISSION);
  });

  it('should allow overriding severity but not category', () => {
    const failure = networkFailure('down', { severity: FailureSeverity.CRITICAL });

    expect(failure.category).toBe(FailureCategory.NETWORK);
    expect(failure.severity).toBe(FailureSeverity.CRITICAL);
  });
});

describe('compareSeverity', () => {
  it('should order severities from low to critical', () => {
    expect(compareSeverity(FailureSeverity.LOW, FailureSeverity.CRITICAL)).toBeLessThan(0);
    expect(compareSeverity(FailureSeverity.HIGH, FailureSeverity.MEDIUM)).toBeGreaterThan(0);
    expect(compareSeverity(FailureSeverity.MEDIUM, FailureSeverity.MEDIUM)).toBe(0);
  });
});

describe('detectFaultShape', () => {
  it('should recognize connection codes', () => {
    expect(detectFaultShape(nodeError('refused', 'ECONNREFUSED'))).toBe('connection');
    expect(detectFaultShape(nodeError('reset', 'ECONNRESET'))).toBe('connection');
  });

  it('should recognize connection error names', () => {
    const error = new Error('lost');
    error.name = 'ConnectionError';

    expect(detectFaultShape(error)).toBe('connection');
  });

  it('should recognize filesystem and permission codes', () => {
    expect(detectFaultShape(nodeError('missing', 'ENOENT'))).toBe('missing_resource');
    expect(detectFaultShape(nodeError('denied', 'EACCES'))).toBe('permission');
    expect(detectFaultShape(nodeError('denied', 'EPERM'))).toBe('permission');
  });

  it('should recognize timeouts', () => {
    const abort = new Error('aborted');
    abort.name = 'AbortError';

    expect(detectFaultShape(nodeError('slow', 'ETIMEDOUT'))).toBe('timeout');
    expect(detectFaultShape(abort)).toBe('timeout');
  });

  it('should return undefined for plain errors and non-errors', () => {
    expect(detectFaultShape(new Error('plain'))).toBeUndefined();
    expect(detectFaultShape('string fault')).toBeUndefined();
  });
});

describe('errorCode', () => {
  it('should read string codes only', () => {
    expect(errorCode(nodeError('x', 'ENOENT'))).toBe('ENOENT');
    expect(errorCode(Object.assign(new Error('x'), { code: 42 }))).toBeUndefined();
    expect(errorCode({ code: 'ENOENT' })).toBeUndefined();
  });
});

describe('classifyError', () => {
  it('should return classified failures unchanged', () => {
    const failure = networkFailure('down');

    expect(classifyError(failure)).toBe(failure);
  });

  it('should classify connection errors as network', () => {
    const error = nodeError('connect ECONNREFUSED', 'ECONNREFUSED');
    const failure = classifyError(error);

    expect(failure.category).toBe(FailureCategory.NETWORK);
    expect(failure.severity).toBe(FailureSeverity.MEDIUM);
    expect(failure.kind).toBe('ECONNREFUSED');
    expect(failure.message).toBe('connect ECONNREFUSED');
    expect(failure.cause).toBe(error);
  });

  it('should classify permission errors as high severity', () => {
    const failure = classifyError(nodeError('denied', 'EACCES'));

    expect(failure.category).toBe(FailureCategory.PERMISSION);
    expect(failure.severity).toBe(FailureSeverity.HIGH);
  });

  it('should use the shape as kind when there is no code', () => {
    const error = new Error('took too long');
    error.name = 'TimeoutError';

    expect(classifyError(error).kind).toBe('timeout');
  });

  it('should fall back to unknown for unrecognized faults', () => {
    const failure = classifyError('just a string');

    expect(failure.category).toBe(FailureCategory.UNKNOWN);
    expect(failure.kind).toBe('unknown');
    expect(failure.message).toBe('just a string');
  });

  it('should let explicit options win over detection', () => {
    const failure = classifyError(nodeError('refused', 'ECONNREFUSED'), {
      category: FailureCategory.EXTERNAL_API,
      severity: FailureSeverity.CRITICAL,
      context: { component: 'billing' }
    });

    expect(failure.category).toBe(FailureCategory.EXTERNAL_API);
    expect(failure.severity).toBe(FailureSeverity.CRITICAL);
    expect(failure.context.component).toBe('billing');
  });
});
