import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { classifyError, describeError } from '../../src/policy/error-classifier';
import {
  NoEligibleReviewerError,
  PermanentActivityError,
  TransientActivityError,
} from '../../src/errors';

describe('classifyError', () => {
  it('should honour explicit transient and permanent errors', () => {
    expect(classifyError(new TransientActivityError('rate limited'))).toBe('transient');
    expect(classifyError(new PermanentActivityError('bad payload'))).toBe('permanent');
  });

  it('should treat schema violations as permanent', () => {
    const result = z.object({ score: z.number() }).safeParse({ score: 'high' });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(classifyError(result.error)).toBe('permanent');
    }
  });

  it('should treat domain policy errors as permanent', () => {
    expect(classifyError(new NoEligibleReviewerError('col-1', 2))).toBe('permanent');
  });

  it('should treat network error codes as transient', () => {
    const error = Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' });
    expect(classifyError(error)).toBe('transient');
  });

  it('should classify HTTP statuses', () => {
    expect(classifyError(Object.assign(new Error('slow down'), { status: 429 }))).toBe(
      'transient'
    );
    expect(classifyError(Object.assign(new Error('upstream'), { status: 503 }))).toBe(
      'transient'
    );
    expect(classifyError(Object.assign(new Error('forbidden'), { statusCode: 403 }))).toBe(
      'permanent'
    );
  });

  it('should treat not-found messages as permanent', () => {
    expect(classifyError(new Error('Document not found'))).toBe('permanent');
  });

  it('should default unknown failures to transient', () => {
    expect(classifyError(new Error('something odd'))).toBe('transient');
    expect(classifyError('plain string')).toBe('transient');
  });
});

describe('describeError', () => {
  it('should keep name and message of errors', () => {
    expect(describeError(new TransientActivityError('boom'))).toEqual({
      name: 'TransientActivityError',
      message: 'boom',
    });
  });

  it('should stringify non-errors', () => {
    expect(describeError(42)).toEqual({ name: 'Error', message: '42' });
  });
});
