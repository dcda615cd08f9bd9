import { z } from 'zod';
import { DecisionSchema } from './decision';
import { DecisionKind, ReviewState, SideEffectSide } from './enums';

export const ReviewAssignmentSchema = z.object({
  contentItemId: z.string(),
  reviewerId: z.string(),
  assignedAt: z.string(),
  poolSnapshot: z.array(z.string()),
  round: z.number().int().nonnegative(),
});

export type ReviewAssignment = z.infer<typeof ReviewAssignmentSchema>;

export const SideEffectFailureSchema = z.object({
  side: z.nativeEnum(SideEffectSide),
  kind: z.enum(['transient', 'permanent']),
  message: z.string(),
  attempts: z.number().int().nonnegative(),
});

export type SideEffectFailure = z.infer<typeof SideEffectFailureSchema>;

export const SideEffectResultSchema = z.object({
  searchIndexed: z.boolean(),
  graphUpdated: z.boolean(),
  partialFailures: z.array(SideEffectFailureSchema),
  repairsScheduled: z.array(z.nativeEnum(SideEffectSide)),
  externalUrl: z.string().nullable(),
});

export type SideEffectResult = z.infer<typeof SideEffectResultSchema>;

export type SideEffectOutcome = 'complete' | 'partial' | 'failed';

export function sideEffectOutcome(result: SideEffectResult): SideEffectOutcome {
  if (result.searchIndexed && result.graphUpdated) {
    return 'complete';
  }
  if (result.searchIndexed || result.graphUpdated) {
    return 'partial';
  }
  return 'failed';
}

export const TransitionRecordSchema = z.object({
  from: z.nativeEnum(ReviewState),
  to: z.nativeEnum(ReviewState),
  at: z.string(),
});

export const ReviewProjectionSchema = z.object({
  score: z.number().nullable(),
  assignment: ReviewAssignmentSchema.nullable(),
  decision: DecisionSchema.nullable(),
  sideEffectResult: SideEffectResultSchema.nullable(),
  transitions: z.array(TransitionRecordSchema),
  failureReason: z.string().nullable(),
});

export type ReviewProjection = z.infer<typeof ReviewProjectionSchema>;

export function emptyProjection(): ReviewProjection {
  return {
    score: null,
    assignment: null,
    decision: null,
    sideEffectResult: null,
    transitions: [],
    failureReason: null,
  };
}

export interface ReviewStatus extends ReviewProjection {
  instanceId: string;
  contentItemId: string;
  state: ReviewState;
  currentStep: string;
  archived: boolean;
}

export interface AuditRecord {
  contentItemId: string;
  instanceId: string;
  finalState: ReviewState;
  finalDecisionKind: DecisionKind | null;
  score: number | null;
  reviewerId: string | null;
  transitions: z.infer<typeof TransitionRecordSchema>[];
  sideEffectResult: SideEffectResult | null;
  recordedAt: string;
}
