import { z } from 'zod';
import {
  ControllerMode,
  NoReviewerFallback,
  QueueClass,
  TaskType,
  TimeoutPolicy,
} from '../domain/enums';
import { ConfigError, ConfigIssue } from '../errors';
import { PolicyOverrides, buildPolicyTable, validatePolicy } from '../policy/retry-policy';

export const DEFAULT_REVIEW_SLA_MS = 7 * 24 * 60 * 60 * 1000;

export const MIN_SCORE = 0;
export const MAX_SCORE = 10;

const ScoreBoundSchema = z.number().min(MIN_SCORE).max(MAX_SCORE);

export const ThresholdsSchema = z
  .object({
    rejectBelow: ScoreBoundSchema.default(4.0),
    reviewBelow: ScoreBoundSchema.default(7.0),
    approveAtOrAbove: ScoreBoundSchema.default(8.5),
  })
  .strict();

export type Thresholds = z.infer<typeof ThresholdsSchema>;

const RetryPolicyOverrideSchema = z
  .object({
    queueClass: z.nativeEnum(QueueClass),
    timeoutMs: z.number().int().positive(),
    maxAttempts: z.number().int().min(1).max(20),
    initialIntervalMs: z.number().int().nonnegative(),
    backoffCoefficient: z.number().min(1),
    maxIntervalMs: z.number().int().nonnegative(),
  })
  .partial()
  .strict();

const PolicyOverridesSchema = z.record(z.nativeEnum(TaskType), RetryPolicyOverrideSchema);

export const ReviewWorkflowConfigSchema = z
  .object({
    thresholds: ThresholdsSchema.default({}),
    reviewSlaMs: z.number().int().positive().default(DEFAULT_REVIEW_SLA_MS),
    timeoutPolicy: z.nativeEnum(TimeoutPolicy).default(TimeoutPolicy.REJECT),
    maxReassignments: z.number().int().min(0).max(10).default(1),
    maxConcurrentAssignments: z.number().int().positive().default(10),
    controllerMode: z.nativeEnum(ControllerMode).default(ControllerMode.HUMAN),
    noReviewerFallback: z
      .object({
        lowerBand: z.nativeEnum(NoReviewerFallback).default(NoReviewerFallback.AUTO_REJECT),
        upperBand: z.nativeEnum(NoReviewerFallback).default(NoReviewerFallback.AUTO_REJECT),
      })
      .strict()
      .default({}),
    policyOverrides: PolicyOverridesSchema.default({}),
    generateSummary: z.boolean().default(true),
  })
  .strict();

export type ReviewWorkflowConfig = z.infer<typeof ReviewWorkflowConfigSchema>;

export type ReviewWorkflowConfigInput = z.input<typeof ReviewWorkflowConfigSchema>;

export function validateThresholds(thresholds: Thresholds): ConfigIssue[] {
  const issues: ConfigIssue[] = [];
  if (thresholds.rejectBelow > thresholds.reviewBelow) {
    issues.push({
      path: 'thresholds.rejectBelow',
      message: `rejectBelow (${thresholds.rejectBelow}) must not exceed reviewBelow (${thresholds.reviewBelow})`,
    });
  }
  if (thresholds.reviewBelow > thresholds.approveAtOrAbove) {
    issues.push({
      path: 'thresholds.reviewBelow',
      message: `reviewBelow (${thresholds.reviewBelow}) must not exceed approveAtOrAbove (${thresholds.approveAtOrAbove})`,
    });
  }
  return issues;
}

/** Overrides are checked against the merged policy, so a lone field is compared with the defaults. */
function validateOverrides(overrides: PolicyOverrides): ConfigIssue[] {
  const table = buildPolicyTable(overrides);
  return Object.values(TaskType)
    .filter((taskType) => overrides[taskType] !== undefined)
    .flatMap((taskType) =>
      validatePolicy(table[taskType]).map((message) => ({
        path: `policyOverrides.${taskType}`,
        message,
      }))
    );
}

/**
 * Parses and validates a per-instance configuration. Any problem raises
 * ConfigError; the instance must not be created in that case.
 */
export function parseWorkflowConfig(input: unknown = {}): ReviewWorkflowConfig {
  const result = ReviewWorkflowConfigSchema.safeParse(input ?? {});

  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      }))
    );
  }

  const issues = [
    ...validateThresholds(result.data.thresholds),
    ...validateOverrides(result.data.policyOverrides),
  ];
  if (issues.length > 0) {
    throw new ConfigError(issues);
  }

  return result.data;
}

export function defaultWorkflowConfig(): ReviewWorkflowConfig {
  return parseWorkflowConfig({});
}
