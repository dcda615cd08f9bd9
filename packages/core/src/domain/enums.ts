export enum ReviewState {
  CREATED = 'Created',
  SCORING = 'Scoring',
  AUTO_DECIDED = 'AutoDecided',
  AWAITING_ASSIGNMENT = 'AwaitingAssignment',
  AWAITING_SIGNAL = 'AwaitingSignal',
  DECIDING = 'Deciding',
  FANNING_OUT = 'FanningOut',
  COMPLETED = 'Completed',
  REJECTED = 'Rejected',
  NEEDS_OPERATOR_ATTENTION = 'NeedsOperatorAttention',
}

export enum DecisionKind {
  AUTO_APPROVE = 'AutoApprove',
  AUTO_REJECT = 'AutoReject',
  ESCALATED = 'Escalated',
  HUMAN_APPROVE = 'HumanApprove',
  HUMAN_REJECT = 'HumanReject',
  TIMEOUT_REJECT = 'TimeoutReject',
}

export enum ScoreBand {
  LOWER = 'lower',
  UPPER = 'upper',
}

export enum ControllerType {
  HUMAN = 'human',
  AI = 'ai',
}

export enum QueueClass {
  AI_BOUND = 'AIBound',
  IO_BOUND = 'IOBound',
  LIGHTWEIGHT = 'Lightweight',
}

export enum TaskType {
  SCORE = 'Score',
  ASSIGN = 'Assign',
  INDEX_SEARCH = 'IndexSearch',
  INDEX_GRAPH = 'IndexGraph',
  NOTIFY = 'Notify',
  CONTROLLER_REVIEW = 'ControllerReview',
  SUMMARIZE = 'Summarize',
  ARCHIVE = 'Archive',
  PERSIST = 'Persist',
}

export enum SideEffectSide {
  SEARCH = 'search',
  GRAPH = 'graph',
}

export enum NotificationOutcome {
  APPROVED = 'approved',
  REJECTED = 'rejected',
  NEEDS_ATTENTION = 'needs_attention',
  ASSIGNED = 'assigned',
}

export enum TimeoutPolicy {
  REJECT = 'reject',
  ESCALATE_TO_NEXT_REVIEWER = 'escalate-to-next-reviewer',
}

export enum NoReviewerFallback {
  AI_CONTROLLER = 'ai-controller',
  AUTO_REJECT = 'auto-reject',
  AUTO_APPROVE = 'auto-approve',
}

export enum ControllerMode {
  HUMAN = 'human',
  AI = 'ai',
}

export enum ContentItemStatus {
  SUBMITTED = 'submitted',
  UNDER_REVIEW = 'under_review',
  APPROVED = 'approved',
  REJECTED = 'rejected',
  ARCHIVED = 'archived',
  NEEDS_ATTENTION = 'needs_attention',
}

export enum AlertSeverity {
  WARNING = 'warning',
  CRITICAL = 'critical',
}
