import { DecisionKind, ScoreBand } from '../domain/enums';
import type { Decision } from '../domain/decision';
import { InvalidScoreError } from '../errors';
import { MAX_SCORE, MIN_SCORE, Thresholds } from '../config/workflow-config';

export type DecisionVerdict =
  | { kind: DecisionKind.AUTO_APPROVE }
  | { kind: DecisionKind.AUTO_REJECT }
  | { kind: DecisionKind.ESCALATED; band: ScoreBand };

export type EvaluationResult =
  | { ok: true; verdict: DecisionVerdict }
  | { ok: false; error: InvalidScoreError };

/**
 * Maps a relevance score onto a verdict. Pure: the orchestrator re-runs it
 * during replay and relies on getting the same answer.
 *
 * - score ≥ approveAtOrAbove → AutoApprove
 * - score < rejectBelow → AutoReject
 * - otherwise Escalated, in the lower band below reviewBelow and the upper band from it
 */
export function evaluateScore(score: number, thresholds: Thresholds): EvaluationResult {
  if (!Number.isFinite(score) || score < MIN_SCORE || score > MAX_SCORE) {
    return { ok: false, error: new InvalidScoreError(score) };
  }

  if (score >= thresholds.approveAtOrAbove) {
    return { ok: true, verdict: { kind: DecisionKind.AUTO_APPROVE } };
  }

  if (score < thresholds.rejectBelow) {
    return { ok: true, verdict: { kind: DecisionKind.AUTO_REJECT } };
  }

  const band = score < thresholds.reviewBelow ? ScoreBand.LOWER : ScoreBand.UPPER;
  return { ok: true, verdict: { kind: DecisionKind.ESCALATED, band } };
}

export function verdictToDecision(
  verdict: DecisionVerdict,
  score: number,
  thresholds: Thresholds,
  timestamp: string
): Decision {
  switch (verdict.kind) {
    case DecisionKind.AUTO_APPROVE:
      return {
        kind: DecisionKind.AUTO_APPROVE,
        score,
        timestamp,
        reason: `Relevance score ${score} at or above ${thresholds.approveAtOrAbove}`,
      };
    case DecisionKind.AUTO_REJECT:
      return {
        kind: DecisionKind.AUTO_REJECT,
        score,
        timestamp,
        reason: `Relevance score ${score} below threshold ${thresholds.rejectBelow}`,
      };
    case DecisionKind.ESCALATED:
      return { kind: DecisionKind.ESCALATED, score, timestamp, band: verdict.band };
  }
}
