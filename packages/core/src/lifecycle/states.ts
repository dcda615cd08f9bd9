import { ReviewState } from '../domain/enums';

export const VALID_TRANSITIONS: Record<ReviewState, ReviewState[]> = {
  [ReviewState.CREATED]: [ReviewState.SCORING, ReviewState.NEEDS_OPERATOR_ATTENTION],
  [ReviewState.SCORING]: [
    ReviewState.AUTO_DECIDED,
    ReviewState.AWAITING_ASSIGNMENT,
    ReviewState.NEEDS_OPERATOR_ATTENTION,
  ],
  [ReviewState.AUTO_DECIDED]: [ReviewState.FANNING_OUT, ReviewState.REJECTED],
  [ReviewState.AWAITING_ASSIGNMENT]: [
    ReviewState.AWAITING_SIGNAL,
    ReviewState.DECIDING,
    ReviewState.NEEDS_OPERATOR_ATTENTION,
  ],
  [ReviewState.AWAITING_SIGNAL]: [
    ReviewState.DECIDING,
    ReviewState.AWAITING_ASSIGNMENT,
    ReviewState.NEEDS_OPERATOR_ATTENTION,
  ],
  [ReviewState.DECIDING]: [
    ReviewState.FANNING_OUT,
    ReviewState.REJECTED,
    ReviewState.NEEDS_OPERATOR_ATTENTION,
  ],
  [ReviewState.FANNING_OUT]: [ReviewState.COMPLETED, ReviewState.NEEDS_OPERATOR_ATTENTION],
  [ReviewState.COMPLETED]: [],
  [ReviewState.REJECTED]: [],
  [ReviewState.NEEDS_OPERATOR_ATTENTION]: [],
};

export interface TransitionRecord {
  from: ReviewState;
  to: ReviewState;
  at: string;
}
