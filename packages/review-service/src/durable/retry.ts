import {
  ActivityFailure,
  RetryPolicy,
  TaskType,
  TransientActivityError,
  classifyError,
  computeBackoffDelay,
  describeError,
} from '@contentreview/core';
import type { Clock } from './clock';
import type { WorkerPool } from './worker-pool';
import type { Logger } from '../utils/logger';

export type ActivityOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; failure: ActivityFailure };

export interface RetryOptions {
  taskType: TaskType;
  policy: RetryPolicy;
  clock: Clock;
  pool: WorkerPool;
  logger: Logger;
}

export const ACTIVITY_TIMEOUT_CODE = 'ACTIVITY_TIMEOUT';

function withTimeout<T>(work: Promise<T>, ms: number, clock: Clock, taskType: TaskType): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const cancel = clock.schedule(ms, () => {
      reject(new TransientActivityError(`${taskType} timed out after ${ms}ms`, ACTIVITY_TIMEOUT_CODE));
    });
    work.then(
      (value) => {
        cancel();
        resolve(value);
      },
      (error: unknown) => {
        cancel();
        reject(error);
      }
    );
  });
}

/**
 * Runs one activity under its policy: each attempt holds a slot of the
 * queue-class pool and is bounded by `timeoutMs`; transient failures back off
 * and retry until `maxAttempts`, permanent failures stop at once. Never throws.
 */
export async function executeWithRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<ActivityOutcome<T>> {
  const { taskType, policy, clock, pool, logger } = options;

  for (let attempt = 1; ; attempt++) {
    try {
      const value = await pool.run(() =>
        withTimeout(fn(attempt), policy.timeoutMs, clock, taskType)
      );
      return { ok: true, value, attempts: attempt };
    } catch (error) {
      const kind = classifyError(error);
      const { name, message } = describeError(error);

      if (kind === 'permanent' || attempt >= policy.maxAttempts) {
        logger.warn(
          { taskType, attempt, kind, error: message },
          kind === 'permanent' ? 'Activity failed permanently' : 'Activity retries exhausted'
        );
        return { ok: false, failure: new ActivityFailure(kind, taskType, attempt, message, name) };
      }

      const delayMs = computeBackoffDelay(policy, attempt);
      logger.info({ taskType, attempt, delayMs, error: message }, 'Retrying activity');
      await clock.sleep(delayMs);
    }
  }
}
