import type { ReviewState, TaskType, SideEffectSide } from '../domain/enums';

export type FailureKind = 'transient' | 'permanent';

export interface ConfigIssue {
  path: string;
  message: string;
}

export class ConfigError extends Error {
  constructor(public readonly issues: ConfigIssue[]) {
    super(
      `Invalid review workflow configuration: ${issues
        .map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message))
        .join('; ')}`
    );
    this.name = 'ConfigError';
  }
}

export class TransientActivityError extends Error {
  constructor(
    message: string,
    public readonly code?: string
  ) {
    super(message);
    this.name = 'TransientActivityError';
  }
}

export class PermanentActivityError extends Error {
  constructor(
    message: string,
    public readonly code?: string
  ) {
    super(message);
    this.name = 'PermanentActivityError';
  }
}

/**
 * Final outcome of an activity that exhausted its retry policy or failed permanently.
 * Delivered to the orchestrator as a value, never thrown across the workflow boundary.
 */
export class ActivityFailure extends Error {
  constructor(
    public readonly kind: FailureKind,
    public readonly taskType: TaskType,
    public readonly attempts: number,
    public readonly causeMessage: string,
    public readonly causeName: string = 'Error'
  ) {
    super(`${taskType} failed (${kind}) after ${attempts} attempt(s): ${causeMessage}`);
    this.name = 'ActivityFailure';
  }
}

export class NoEligibleReviewerError extends Error {
  constructor(
    public readonly collectionId: string,
    public readonly poolSize: number
  ) {
    super(`No eligible reviewer in collection ${collectionId} (pool size ${poolSize})`);
    this.name = 'NoEligibleReviewerError';
  }
}

export class TimeoutExpiredError extends Error {
  constructor(
    public readonly contentItemId: string,
    public readonly slaMs: number
  ) {
    super(`Review of ${contentItemId} not decided within ${slaMs}ms`);
    this.name = 'TimeoutExpiredError';
  }
}

export class PartialSideEffectFailureError extends Error {
  constructor(
    public readonly contentItemId: string,
    public readonly failedSides: SideEffectSide[]
  ) {
    super(`Side effects partially failed for ${contentItemId}: ${failedSides.join(', ')}`);
    this.name = 'PartialSideEffectFailureError';
  }
}

export class TotalSideEffectFailureError extends Error {
  constructor(public readonly contentItemId: string) {
    super(`All side effects failed for ${contentItemId}`);
    this.name = 'TotalSideEffectFailureError';
  }
}

export class InvalidTransitionError extends Error {
  constructor(
    public readonly fromState: ReviewState,
    public readonly toState: ReviewState
  ) {
    super(`Invalid transition from ${fromState} to ${toState}`);
    this.name = 'InvalidTransitionError';
  }
}

export class TerminalDecisionConflictError extends Error {
  constructor(
    public readonly contentItemId: string,
    public readonly existingKind: string,
    public readonly attemptedKind: string
  ) {
    super(
      `Content item ${contentItemId} already has terminal decision ${existingKind}; refusing ${attemptedKind}`
    );
    this.name = 'TerminalDecisionConflictError';
  }
}

export class InstanceNotFoundError extends Error {
  constructor(public readonly reference: string) {
    super(`Review workflow not found: ${reference}`);
    this.name = 'InstanceNotFoundError';
  }
}

export class InvalidScoreError extends Error {
  constructor(public readonly score: number) {
    super(`Relevance score ${score} is outside [0, 10]`);
    this.name = 'InvalidScoreError';
  }
}
