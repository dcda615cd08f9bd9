import { ReviewState } from '../domain/enums';
import { InvalidTransitionError } from '../errors';
import { VALID_TRANSITIONS } from './states';

export function isValidTransition(from: ReviewState, to: ReviewState): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

export function assertValidTransition(from: ReviewState, to: ReviewState): void {
  if (!isValidTransition(from, to)) {
    throw new InvalidTransitionError(from, to);
  }
}

export function getNextValidStates(current: ReviewState): ReviewState[] {
  return VALID_TRANSITIONS[current];
}

export function isTerminalState(state: ReviewState): boolean {
  return VALID_TRANSITIONS[state].length === 0;
}

export function canTransition(from: ReviewState): boolean {
  return !isTerminalState(from);
}

// States from which a reviewer decision can still change the outcome.
export function acceptsReviewSignal(state: ReviewState): boolean {
  return state === ReviewState.AWAITING_ASSIGNMENT || state === ReviewState.AWAITING_SIGNAL;
}
