import { describe, it, expect } from 'vitest';
import { evaluateScore, verdictToDecision } from '../../src/decision/decision-engine';
import { DecisionKind, ScoreBand } from '../../src/domain/enums';
import { InvalidScoreError } from '../../src/errors';

const thresholds = { rejectBelow: 4.0, reviewBelow: 7.0, approveAtOrAbove: 8.5 };

describe('Decision Engine', () => {
  describe('evaluateScore', () => {
    it('should auto-approve at exactly approveAtOrAbove', () => {
      expect(evaluateScore(8.5, thresholds)).toEqual({
        ok: true,
        verdict: { kind: DecisionKind.AUTO_APPROVE },
      });
    });

    it('should auto-approve every score from approveAtOrAbove up to 10', () => {
      for (const score of [8.5, 8.51, 9, 9.2, 9.99, 10]) {
        const result = evaluateScore(score, thresholds);
        expect(result.ok && result.verdict.kind).toBe(DecisionKind.AUTO_APPROVE);
      }
    });

    it('should auto-reject every score below rejectBelow', () => {
      for (const score of [0, 0.1, 2, 3.99]) {
        const result = evaluateScore(score, thresholds);
        expect(result.ok && result.verdict.kind).toBe(DecisionKind.AUTO_REJECT);
      }
    });

    it('should escalate rejectBelow itself in the lower band', () => {
      expect(evaluateScore(4.0, thresholds)).toEqual({
        ok: true,
        verdict: { kind: DecisionKind.ESCALATED, band: ScoreBand.LOWER },
      });
    });

    it('should escalate scores from reviewBelow in the upper band', () => {
      expect(evaluateScore(7.0, thresholds)).toEqual({
        ok: true,
        verdict: { kind: DecisionKind.ESCALATED, band: ScoreBand.UPPER },
      });
      expect(evaluateScore(8.49, thresholds)).toEqual({
        ok: true,
        verdict: { kind: DecisionKind.ESCALATED, band: ScoreBand.UPPER },
      });
    });

    it('should escalate 6.0 in the lower band', () => {
      expect(evaluateScore(6.0, thresholds)).toEqual({
        ok: true,
        verdict: { kind: DecisionKind.ESCALATED, band: ScoreBand.LOWER },
      });
    });

    it('should never escalate when all thresholds coincide', () => {
      const collapsed = { rejectBelow: 5, reviewBelow: 5, approveAtOrAbove: 5 };
      const below = evaluateScore(4.99, collapsed);
      const at = evaluateScore(5, collapsed);
      expect(below.ok && below.verdict.kind).toBe(DecisionKind.AUTO_REJECT);
      expect(at.ok && at.verdict.kind).toBe(DecisionKind.AUTO_APPROVE);
    });

    it('should return an error result for scores outside [0, 10]', () => {
      for (const score of [-0.1, 10.01, Number.NaN, Number.POSITIVE_INFINITY]) {
        const result = evaluateScore(score, thresholds);
        expect(result.ok).toBe(false);
        if (!result.ok) {
          expect(result.error).toBeInstanceOf(InvalidScoreError);
        }
      }
    });

    it('should be deterministic for identical inputs', () => {
      const first = evaluateScore(6.3, thresholds);
      const second = evaluateScore(6.3, thresholds);
      expect(second).toEqual(first);
    });
  });

  describe('verdictToDecision', () => {
    const timestamp = '2026-01-01T00:00:00.000Z';

    it('should build an AutoApprove decision with a reason', () => {
      expect(
        verdictToDecision({ kind: DecisionKind.AUTO_APPROVE }, 9.2, thresholds, timestamp)
      ).toEqual({
        kind: DecisionKind.AUTO_APPROVE,
        score: 9.2,
        timestamp,
        reason: 'Relevance score 9.2 at or above 8.5',
      });
    });

    it('should build an AutoReject decision naming the threshold', () => {
      expect(
        verdictToDecision({ kind: DecisionKind.AUTO_REJECT }, 1.5, thresholds, timestamp)
      ).toEqual({
        kind: DecisionKind.AUTO_REJECT,
        score: 1.5,
        timestamp,
        reason: 'Relevance score 1.5 below threshold 4',
      });
    });

    it('should carry the band on an Escalated decision', () => {
      expect(
        verdictToDecision(
          { kind: DecisionKind.ESCALATED, band: ScoreBand.UPPER },
          7.5,
          thresholds,
          timestamp
        )
      ).toEqual({ kind: DecisionKind.ESCALATED, score: 7.5, timestamp, band: ScoreBand.UPPER });
    });
  });
});
