import { QueueClass, TaskType } from '../domain/enums';

const SECOND_MS = 1000;
const MINUTE_MS = 60 * SECOND_MS;

export interface RetryPolicy {
  queueClass: QueueClass;
  timeoutMs: number;
  maxAttempts: number;
  initialIntervalMs: number;
  backoffCoefficient: number;
  maxIntervalMs: number;
}

export type PolicyTable = Readonly<Record<TaskType, RetryPolicy>>;

export type PolicyOverrides = Partial<Record<TaskType, Partial<RetryPolicy>>>;

const AI_BOUND: RetryPolicy = {
  queueClass: QueueClass.AI_BOUND,
  timeoutMs: 5 * MINUTE_MS,
  maxAttempts: 3,
  initialIntervalMs: 2 * SECOND_MS,
  backoffCoefficient: 2,
  maxIntervalMs: 30 * SECOND_MS,
};

const IO_BOUND: RetryPolicy = {
  queueClass: QueueClass.IO_BOUND,
  timeoutMs: 2 * MINUTE_MS,
  maxAttempts: 3,
  initialIntervalMs: 2 * SECOND_MS,
  backoffCoefficient: 2,
  maxIntervalMs: 30 * SECOND_MS,
};

const LIGHTWEIGHT: RetryPolicy = {
  queueClass: QueueClass.LIGHTWEIGHT,
  timeoutMs: 1 * MINUTE_MS,
  maxAttempts: 3,
  initialIntervalMs: 1 * SECOND_MS,
  backoffCoefficient: 2,
  maxIntervalMs: 10 * SECOND_MS,
};

export const DEFAULT_POLICY_TABLE: PolicyTable = Object.freeze({
  [TaskType.SCORE]: { ...AI_BOUND },
  [TaskType.CONTROLLER_REVIEW]: { ...AI_BOUND },
  [TaskType.SUMMARIZE]: { ...AI_BOUND, maxAttempts: 2 },
  [TaskType.ASSIGN]: { ...LIGHTWEIGHT },
  [TaskType.INDEX_SEARCH]: { ...IO_BOUND },
  [TaskType.INDEX_GRAPH]: { ...IO_BOUND },
  [TaskType.ARCHIVE]: { ...IO_BOUND },
  [TaskType.PERSIST]: { ...IO_BOUND, maxAttempts: 5 },
  [TaskType.NOTIFY]: { ...LIGHTWEIGHT, maxAttempts: 5 },
});

export function buildPolicyTable(
  overrides: PolicyOverrides = {},
  base: PolicyTable = DEFAULT_POLICY_TABLE
): PolicyTable {
  const merge = (taskType: TaskType): RetryPolicy => ({
    ...base[taskType],
    ...overrides[taskType],
  });

  return Object.freeze({
    [TaskType.SCORE]: merge(TaskType.SCORE),
    [TaskType.CONTROLLER_REVIEW]: merge(TaskType.CONTROLLER_REVIEW),
    [TaskType.SUMMARIZE]: merge(TaskType.SUMMARIZE),
    [TaskType.ASSIGN]: merge(TaskType.ASSIGN),
    [TaskType.INDEX_SEARCH]: merge(TaskType.INDEX_SEARCH),
    [TaskType.INDEX_GRAPH]: merge(TaskType.INDEX_GRAPH),
    [TaskType.ARCHIVE]: merge(TaskType.ARCHIVE),
    [TaskType.PERSIST]: merge(TaskType.PERSIST),
    [TaskType.NOTIFY]: merge(TaskType.NOTIFY),
  });
}

export function resolvePolicy(
  taskType: TaskType,
  table: PolicyTable = DEFAULT_POLICY_TABLE
): RetryPolicy {
  return table[taskType];
}

/**
 * Delay before the retry that follows the `failedAttempts`-th failure:
 * initialInterval × coefficient^(failedAttempts - 1), capped at maxInterval.
 */
export function computeBackoffDelay(policy: RetryPolicy, failedAttempts: number): number {
  if (failedAttempts < 1) {
    return 0;
  }
  const delay = policy.initialIntervalMs * Math.pow(policy.backoffCoefficient, failedAttempts - 1);
  return Math.min(Math.round(delay), policy.maxIntervalMs);
}

export function validatePolicy(policy: RetryPolicy): string[] {
  const problems: string[] = [];
  if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1) {
    problems.push('maxAttempts must be a positive integer');
  }
  if (policy.timeoutMs <= 0) {
    problems.push('timeoutMs must be positive');
  }
  if (policy.initialIntervalMs < 0) {
    problems.push('initialIntervalMs must not be negative');
  }
  if (policy.backoffCoefficient < 1) {
    problems.push('backoffCoefficient must be at least 1');
  }
  if (policy.maxIntervalMs < policy.initialIntervalMs) {
    problems.push('maxIntervalMs must not be below initialIntervalMs');
  }
  return problems;
}
