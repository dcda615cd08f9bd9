import { ZodError } from 'zod';
import { FailureKind, PermanentActivityError, TransientActivityError } from '../errors';

const TRANSIENT_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EPIPE',
  'EAI_AGAIN',
  'ENOTFOUND',
  '57P01',
  '08006',
  '08001',
  '40001',
  '40P01',
]);

const PERMANENT_NAMES = new Set([
  'ConfigError',
  'NoEligibleReviewerError',
  'InvalidTransitionError',
  'TerminalDecisionConflictError',
  'InstanceNotFoundError',
  'InvalidScoreError',
]);

function statusOf(error: object): number | undefined {
  if ('status' in error && typeof error.status === 'number') {
    return error.status;
  }
  if ('statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  return undefined;
}

export function classifyError(error: unknown): FailureKind {
  if (error instanceof TransientActivityError) {
    return 'transient';
  }
  if (error instanceof PermanentActivityError || error instanceof ZodError) {
    return 'permanent';
  }
  if (typeof error !== 'object' || error === null) {
    return 'transient';
  }

  if ('name' in error && typeof error.name === 'string' && PERMANENT_NAMES.has(error.name)) {
    return 'permanent';
  }

  if ('code' in error && typeof error.code === 'string' && TRANSIENT_CODES.has(error.code)) {
    return 'transient';
  }

  const status = statusOf(error);
  if (status !== undefined) {
    if (status === 408 || status === 429 || status >= 500) {
      return 'transient';
    }
    if (status >= 400) {
      return 'permanent';
    }
  }

  if (
    'message' in error &&
    typeof error.message === 'string' &&
    /not found|invalid|validation/i.test(error.message)
  ) {
    return 'permanent';
  }

  return 'transient';
}

export function describeError(error: unknown): { name: string; message: string } {
  if (error instanceof Error) {
    return { name: error.name, message: error.message };
  }
  return { name: 'Error', message: String(error) };
}
