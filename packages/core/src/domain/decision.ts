import { z } from 'zod';
import { ControllerType, DecisionKind, ScoreBand } from './enums';

const DecisionBase = {
  score: z.number(),
  timestamp: z.string(),
};

export const AutoApproveDecisionSchema = z.object({
  kind: z.literal(DecisionKind.AUTO_APPROVE),
  ...DecisionBase,
  reason: z.string().optional(),
});

export const AutoRejectDecisionSchema = z.object({
  kind: z.literal(DecisionKind.AUTO_REJECT),
  ...DecisionBase,
  reason: z.string(),
});

export const EscalatedDecisionSchema = z.object({
  kind: z.literal(DecisionKind.ESCALATED),
  ...DecisionBase,
  band: z.nativeEnum(ScoreBand),
});

export const HumanApproveDecisionSchema = z.object({
  kind: z.literal(DecisionKind.HUMAN_APPROVE),
  ...DecisionBase,
  controllerId: z.string(),
  controller: z.nativeEnum(ControllerType),
  notes: z.string().optional(),
});

export const HumanRejectDecisionSchema = z.object({
  kind: z.literal(DecisionKind.HUMAN_REJECT),
  ...DecisionBase,
  controllerId: z.string(),
  controller: z.nativeEnum(ControllerType),
  reason: z.string(),
});

export const TimeoutRejectDecisionSchema = z.object({
  kind: z.literal(DecisionKind.TIMEOUT_REJECT),
  ...DecisionBase,
  controllerId: z.string().optional(),
  reason: z.string(),
});

export const DecisionSchema = z.discriminatedUnion('kind', [
  AutoApproveDecisionSchema,
  AutoRejectDecisionSchema,
  EscalatedDecisionSchema,
  HumanApproveDecisionSchema,
  HumanRejectDecisionSchema,
  TimeoutRejectDecisionSchema,
]);

export type Decision = z.infer<typeof DecisionSchema>;

export type TerminalDecision = Exclude<Decision, { kind: DecisionKind.ESCALATED }>;

export type ApprovalDecision = Extract<
  Decision,
  { kind: DecisionKind.AUTO_APPROVE | DecisionKind.HUMAN_APPROVE }
>;

export function isTerminalDecision(decision: Decision): decision is TerminalDecision {
  return decision.kind !== DecisionKind.ESCALATED;
}

export function isApproval(decision: Decision): decision is ApprovalDecision {
  return (
    decision.kind === DecisionKind.AUTO_APPROVE || decision.kind === DecisionKind.HUMAN_APPROVE
  );
}

export function decisionControllerId(decision: Decision): string | undefined {
  switch (decision.kind) {
    case DecisionKind.HUMAN_APPROVE:
    case DecisionKind.HUMAN_REJECT:
    case DecisionKind.TIMEOUT_REJECT:
      return decision.controllerId;
    default:
      return undefined;
  }
}

/**
 * Payload of `submitDecision`. Unknown keys are rejected so that free-form
 * payloads never reach the wait gate.
 */
export const ReviewSignalSchema = z
  .object({
    approved: z.boolean(),
    reviewerId: z.string().min(1).max(100),
    notes: z.string().max(5000).optional(),
  })
  .strict();

export type ReviewSignal = z.infer<typeof ReviewSignalSchema>;
