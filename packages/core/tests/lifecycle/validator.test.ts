import { describe, it, expect } from 'vitest';
import { ReviewState } from '../../src/domain/enums';
import { InvalidTransitionError } from '../../src/errors';
import {
  isValidTransition,
  assertValidTransition,
  getNextValidStates,
  isTerminalState,
  canTransition,
  acceptsReviewSignal,
} from '../../src/lifecycle/validator';

describe('Lifecycle Validator', () => {
  describe('isValidTransition', () => {
    it('should allow Created → Scoring', () => {
      expect(isValidTransition(ReviewState.CREATED, ReviewState.SCORING)).toBe(true);
    });

    it('should allow Scoring → AutoDecided', () => {
      expect(isValidTransition(ReviewState.SCORING, ReviewState.AUTO_DECIDED)).toBe(true);
    });

    it('should allow AwaitingSignal → AwaitingAssignment for reassignment', () => {
      expect(
        isValidTransition(ReviewState.AWAITING_SIGNAL, ReviewState.AWAITING_ASSIGNMENT)
      ).toBe(true);
    });

    it('should deny Scoring → FanningOut (skip states)', () => {
      expect(isValidTransition(ReviewState.SCORING, ReviewState.FANNING_OUT)).toBe(false);
    });

    it('should deny AutoDecided → AwaitingSignal', () => {
      expect(isValidTransition(ReviewState.AUTO_DECIDED, ReviewState.AWAITING_SIGNAL)).toBe(
        false
      );
    });

    it('should deny any transition out of a terminal state', () => {
      for (const to of Object.values(ReviewState)) {
        expect(isValidTransition(ReviewState.COMPLETED, to)).toBe(false);
        expect(isValidTransition(ReviewState.REJECTED, to)).toBe(false);
      }
    });

    it('should deny self transition', () => {
      expect(isValidTransition(ReviewState.SCORING, ReviewState.SCORING)).toBe(false);
    });
  });

  describe('assertValidTransition', () => {
    it('should not throw for valid transition', () => {
      expect(() =>
        assertValidTransition(ReviewState.FANNING_OUT, ReviewState.COMPLETED)
      ).not.toThrow();
    });

    it('should throw InvalidTransitionError for invalid transition', () => {
      expect(() => assertValidTransition(ReviewState.REJECTED, ReviewState.COMPLETED)).toThrow(
        InvalidTransitionError
      );
    });

    it('should name both states in the error message', () => {
      expect(() => assertValidTransition(ReviewState.CREATED, ReviewState.COMPLETED)).toThrow(
        'Invalid transition from Created to Completed'
      );
    });
  });

  describe('getNextValidStates', () => {
    it('should list the branches out of Scoring', () => {
      expect(getNextValidStates(ReviewState.SCORING)).toEqual([
        ReviewState.AUTO_DECIDED,
        ReviewState.AWAITING_ASSIGNMENT,
        ReviewState.NEEDS_OPERATOR_ATTENTION,
      ]);
    });

    it('should return empty array for terminal states', () => {
      expect(getNextValidStates(ReviewState.NEEDS_OPERATOR_ATTENTION)).toEqual([]);
    });
  });

  describe('isTerminalState', () => {
    it('should treat Completed, Rejected and NeedsOperatorAttention as terminal', () => {
      expect(isTerminalState(ReviewState.COMPLETED)).toBe(true);
      expect(isTerminalState(ReviewState.REJECTED)).toBe(true);
      expect(isTerminalState(ReviewState.NEEDS_OPERATOR_ATTENTION)).toBe(true);
    });

    it('should not treat in-flight states as terminal', () => {
      expect(isTerminalState(ReviewState.AWAITING_SIGNAL)).toBe(false);
      expect(isTerminalState(ReviewState.FANNING_OUT)).toBe(false);
    });
  });

  describe('canTransition', () => {
    it('should mirror isTerminalState', () => {
      expect(canTransition(ReviewState.DECIDING)).toBe(true);
      expect(canTransition(ReviewState.COMPLETED)).toBe(false);
    });
  });

  describe('acceptsReviewSignal', () => {
    it('should accept signals only while waiting on a reviewer', () => {
      const accepting = Object.values(ReviewState).filter(acceptsReviewSignal);
      expect(accepting).toEqual([ReviewState.AWAITING_ASSIGNMENT, ReviewState.AWAITING_SIGNAL]);
    });
  });
});
