import {
  AlertSeverity,
  ContentItem,
  ContentItemStatus,
  ControllerMode,
  ControllerType,
  Decision,
  DecisionKind,
  NoEligibleReviewerError,
  NoReviewerFallback,
  NotificationOutcome,
  ReviewProjection,
  ReviewSignal,
  ReviewState,
  ReviewWorkflowConfig,
  ScoreBand,
  TaskType,
  TerminalDecision,
  TerminalDecisionConflictError,
  TimeoutPolicy,
  TotalSideEffectFailureError,
  TransitionRecordSchema,
  WorkflowInstanceRecord,
  assertValidTransition,
  emptyProjection,
  evaluateScore,
  InvalidScoreError,
  isApproval,
  isTerminalDecision,
  sideEffectOutcome,
  verdictToDecision,
} from '@contentreview/core';
import type { DurableContext, ActivitySpec } from '../durable/context';
import type { ActivityOutcome } from '../durable/retry';
import type { WorkflowRunner } from '../durable/runtime';
import type { ReviewerAssignmentService } from '../services/reviewer-assignment.service';
import {
  AI_CONTROLLER_ID,
  ArchivedSchema,
  AssignResult,
  AssignResultSchema,
  ControllerReviewSchema,
  ReviewCollaborators,
  ReviewStores,
  ScoredAssessment,
  ScoredAssessmentSchema,
  SummarySchema,
} from './types';
import { SideEffectFanOutCoordinator } from './steps/fan-out';
import { ReviewNotifier } from './steps/notification.step';
import { persistStep } from './steps/persist';
import { ReviewWaitGate } from './steps/wait-gate';

export interface ReviewOrchestratorDeps {
  stores: ReviewStores;
  collaborators: ReviewCollaborators;
  assignment: ReviewerAssignmentService;
}

type DecisionOutcome =
  | { kind: 'decided'; decision: TerminalDecision }
  | { kind: 'failed'; reason: string };

function decided(decision: TerminalDecision): DecisionOutcome {
  return { kind: 'decided', decision };
}

function failed(reason: string): DecisionOutcome {
  return { kind: 'failed', reason };
}

function asTerminal(decision: Decision): TerminalDecision {
  if (!isTerminalDecision(decision)) {
    throw new Error(`Expected a terminal decision, got ${decision.kind}`);
  }
  return decision;
}

function rejectionReason(decision: TerminalDecision): string {
  switch (decision.kind) {
    case DecisionKind.AUTO_REJECT:
    case DecisionKind.HUMAN_REJECT:
    case DecisionKind.TIMEOUT_REJECT:
      return decision.reason;
    default:
      return decision.kind;
  }
}

/**
 * Drives one content item from submission to its terminal state. Every
 * effect goes through the DurableContext, so `run` is re-entered from the
 * top after a restart and fast-forwards through journaled steps.
 */
export class ContentReviewOrchestrator implements WorkflowRunner {
  private readonly gate = new ReviewWaitGate();
  private readonly fanOut: SideEffectFanOutCoordinator;
  private readonly notifier: ReviewNotifier;

  constructor(private readonly deps: ReviewOrchestratorDeps) {
    const { collaborators, stores } = deps;
    this.fanOut = new SideEffectFanOutCoordinator(
      collaborators.searchIndexer,
      collaborators.graphIndexer,
      stores.sideEffects
    );
    this.notifier = new ReviewNotifier(
      collaborators.notifier,
      collaborators.directory,
      collaborators.alerter
    );
  }

  async run(ctx: DurableContext, record: WorkflowInstanceRecord): Promise<void> {
    const run = new ReviewRun(ctx, record, this.deps, {
      gate: this.gate,
      fanOut: this.fanOut,
      notifier: this.notifier,
    });
    await run.execute();
  }
}

interface ReviewSteps {
  gate: ReviewWaitGate;
  fanOut: SideEffectFanOutCoordinator;
  notifier: ReviewNotifier;
}

class ReviewRun {
  private state = ReviewState.CREATED;
  private currentStep = 'created';
  private readonly projection: ReviewProjection = emptyProjection();
  private readonly retryCounters: Record<string, number> = {};
  private assessment: ScoredAssessment | null = null;
  private readonly item: ContentItem;
  private readonly config: ReviewWorkflowConfig;

  constructor(
    private readonly ctx: DurableContext,
    private readonly record: WorkflowInstanceRecord,
    private readonly deps: ReviewOrchestratorDeps,
    private readonly steps: ReviewSteps
  ) {
    this.item = record.contentItem;
    this.config = record.config;
  }

  async execute(): Promise<void> {
    const outcome = await this.decide();

    if (outcome.kind === 'failed') {
      await this.fail(outcome.reason);
    } else {
      this.setDecision(outcome.decision);
      if (isApproval(outcome.decision)) {
        await this.approve();
      } else {
        await this.reject(outcome.decision);
      }
    }

    await this.finish();
  }

  private async decide(): Promise<DecisionOutcome> {
    await this.transition(ReviewState.SCORING, 'score');

    const scored = await this.activity(
      { key: 'score', taskType: TaskType.SCORE, schema: ScoredAssessmentSchema },
      async () => {
        const assessment = await this.deps.collaborators.scorer.assess(
          this.item.id,
          this.item.payloadRef,
          this.item.criteria
        );
        if (!Number.isFinite(assessment.score)) {
          throw new InvalidScoreError(assessment.score);
        }
        return assessment;
      }
    );
    if (!scored.ok) {
      return failed(`Scoring failed: ${scored.failure.causeMessage}`);
    }

    const { score } = scored.value;
    this.assessment = scored.value;
    this.projection.score = score;

    const evaluation = evaluateScore(score, this.config.thresholds);
    if (!evaluation.ok) {
      return failed(evaluation.error.message);
    }

    const { verdict } = evaluation;
    if (verdict.kind !== DecisionKind.ESCALATED) {
      const timestamp = await this.ctx.now('decision:auto');
      const decision = asTerminal(
        verdictToDecision(verdict, score, this.config.thresholds, timestamp)
      );
      this.setDecision(decision);
      await this.transition(ReviewState.AUTO_DECIDED, 'auto-decided');
      return decided(decision);
    }

    const timestamp = await this.ctx.now('decision:escalated');
    this.projection.decision = verdictToDecision(verdict, score, this.config.thresholds, timestamp);
    await this.transition(ReviewState.AWAITING_ASSIGNMENT, 'assign-reviewer');
    await persistStep(this.ctx, 'status:under-review', () =>
      this.deps.stores.contentItems.updateStatus(this.item.id, ContentItemStatus.UNDER_REVIEW)
    );

    return this.escalate(verdict.band, scored.value);
  }

  private async escalate(band: ScoreBand, assessment: ScoredAssessment): Promise<DecisionOutcome> {
    const excludedReviewerIds: string[] = [];

    for (let round = 0; ; round++) {
      if (this.config.controllerMode === ControllerMode.AI) {
        await this.transition(ReviewState.DECIDING, 'controller-review');
        return this.aiDecide(assessment.score);
      }

      const assigned = await this.activity<AssignResult>(
        { key: `assign:${round}`, taskType: TaskType.ASSIGN, schema: AssignResultSchema },
        async () => {
          try {
            const assignment = await this.deps.assignment.assign({
              contentItem: this.item,
              round,
              excludedReviewerIds,
              maxConcurrentAssignments: this.config.maxConcurrentAssignments,
            });
            return { status: 'assigned', assignment };
          } catch (error) {
            if (error instanceof NoEligibleReviewerError) {
              return { status: 'no_eligible_reviewer', poolSize: error.poolSize };
            }
            throw error;
          }
        }
      );
      if (!assigned.ok) {
        return failed(`Reviewer assignment failed: ${assigned.failure.causeMessage}`);
      }

      if (assigned.value.status === 'no_eligible_reviewer') {
        this.ctx.logger.warn(
          { collectionId: this.item.collectionId, poolSize: assigned.value.poolSize, band },
          'No eligible reviewer, applying fallback'
        );
        await this.transition(ReviewState.DECIDING, 'no-reviewer-fallback');
        return this.fallback(band, assessment.score, assigned.value.poolSize);
      }

      const { assignment } = assigned.value;
      this.projection.assignment = assignment;
      await this.transition(ReviewState.AWAITING_SIGNAL, 'await-review');

      const deadline = await this.steps.gate.open(this.ctx, round, this.config.reviewSlaMs);
      await this.steps.notifier.notifyReviewer(this.ctx, this.item, assignment, deadline);

      // Signals journaled after the assignment count, even if they beat the gate opening.
      const sinceSeq = this.ctx.seqOfActivity(`assign:${round}`) ?? 0;
      const gateOutcome = await this.steps.gate.await(this.ctx, {
        round,
        reviewerId: assignment.reviewerId,
        sinceSeq,
      });

      const resolvedAt = await this.ctx.now(`review-resolved:${round}`);

      if (gateOutcome.status === 'decided') {
        await persistStep(this.ctx, `resolve-assignment:${round}`, () =>
          this.deps.stores.assignments.resolve(this.item.id, 'decided', new Date(resolvedAt))
        );
        await this.transition(ReviewState.DECIDING, 'apply-review');
        return decided(
          this.signalToDecision(gateOutcome.signal, assignment.reviewerId, assessment.score, resolvedAt)
        );
      }

      await persistStep(this.ctx, `resolve-assignment:${round}`, () =>
        this.deps.stores.assignments.resolve(this.item.id, 'timed_out', new Date(resolvedAt))
      );

      if (
        this.config.timeoutPolicy === TimeoutPolicy.ESCALATE_TO_NEXT_REVIEWER &&
        round < this.config.maxReassignments
      ) {
        excludedReviewerIds.push(assignment.reviewerId);
        this.ctx.logger.info(
          { reviewerId: assignment.reviewerId, round },
          'Review SLA expired, reassigning'
        );
        await this.transition(ReviewState.AWAITING_ASSIGNMENT, 'reassign-reviewer');
        continue;
      }

      await this.transition(ReviewState.DECIDING, 'timeout-reject');
      return decided({
        kind: DecisionKind.TIMEOUT_REJECT,
        score: assessment.score,
        timestamp: resolvedAt,
        controllerId: assignment.reviewerId,
        reason: `Review SLA of ${this.config.reviewSlaMs}ms expired`,
      });
    }
  }

  private signalToDecision(
    signal: ReviewSignal,
    reviewerId: string,
    score: number,
    timestamp: string
  ): TerminalDecision {
    if (signal.approved) {
      return {
        kind: DecisionKind.HUMAN_APPROVE,
        score,
        timestamp,
        controllerId: reviewerId,
        controller: ControllerType.HUMAN,
        notes: signal.notes,
      };
    }
    return {
      kind: DecisionKind.HUMAN_REJECT,
      score,
      timestamp,
      controllerId: reviewerId,
      controller: ControllerType.HUMAN,
      reason: signal.notes ?? 'Rejected by reviewer',
    };
  }

  private async aiDecide(score: number): Promise<DecisionOutcome> {
    const review = await this.activity(
      { key: 'controller-review', taskType: TaskType.CONTROLLER_REVIEW, schema: ControllerReviewSchema },
      () =>
        this.deps.collaborators.aiController.review(
          this.item.id,
          this.item.payloadRef,
          score,
          this.item.criteria
        )
    );
    if (!review.ok) {
      return failed(`AI controller review failed: ${review.failure.causeMessage}`);
    }

    const timestamp = await this.ctx.now('decision:controller');
    if (review.value.approved) {
      return decided({
        kind: DecisionKind.HUMAN_APPROVE,
        score,
        timestamp,
        controllerId: AI_CONTROLLER_ID,
        controller: ControllerType.AI,
        notes: review.value.rationale,
      });
    }
    return decided({
      kind: DecisionKind.HUMAN_REJECT,
      score,
      timestamp,
      controllerId: AI_CONTROLLER_ID,
      controller: ControllerType.AI,
      reason: review.value.rationale || 'Rejected by AI controller',
    });
  }

  private async fallback(band: ScoreBand, score: number, poolSize: number): Promise<DecisionOutcome> {
    const fallback =
      band === ScoreBand.LOWER
        ? this.config.noReviewerFallback.lowerBand
        : this.config.noReviewerFallback.upperBand;
    const reason = `No eligible reviewer in collection ${this.item.collectionId} (pool size ${poolSize})`;

    switch (fallback) {
      case NoReviewerFallback.AI_CONTROLLER:
        return this.aiDecide(score);
      case NoReviewerFallback.AUTO_APPROVE:
        return decided({
          kind: DecisionKind.AUTO_APPROVE,
          score,
          timestamp: await this.ctx.now('decision:fallback'),
          reason,
        });
      case NoReviewerFallback.AUTO_REJECT:
        return decided({
          kind: DecisionKind.AUTO_REJECT,
          score,
          timestamp: await this.ctx.now('decision:fallback'),
          reason,
        });
    }
  }

  private async approve(): Promise<void> {
    await this.transition(ReviewState.FANNING_OUT, 'fan-out');

    const result = await this.steps.fanOut.run(this.ctx, this.item, {
      topics: this.assessment?.topics ?? [],
      entities: this.assessment?.entities ?? [],
    });
    this.projection.sideEffectResult = result;

    const outcome = sideEffectOutcome(result);
    if (outcome === 'failed') {
      await this.fail(new TotalSideEffectFailureError(this.item.id).message);
      return;
    }

    await this.transition(ReviewState.COMPLETED, 'completed');
    await persistStep(this.ctx, 'status:approved', () =>
      this.deps.stores.contentItems.updateStatus(this.item.id, ContentItemStatus.APPROVED)
    );

    const summary = this.config.generateSummary ? await this.summarize() : null;
    const lines = [
      `${this.item.id} was approved.`,
      summary,
      result.externalUrl ? `Search: ${result.externalUrl}` : null,
      outcome === 'partial' ? `Pending repairs: ${result.repairsScheduled.join(', ')}` : null,
    ];

    await this.steps.notifier.notifyOutcome(this.ctx, this.item, NotificationOutcome.APPROVED, {
      subject: `Approved: ${this.item.id}`,
      body: lines.filter((line): line is string => line !== null).join('\n'),
      externalUrl: result.externalUrl,
    });
  }

  private async reject(decision: TerminalDecision): Promise<void> {
    await this.transition(ReviewState.REJECTED, 'rejected');

    const reason = rejectionReason(decision);
    await persistStep(this.ctx, 'status:rejected', () =>
      this.deps.stores.contentItems.updateStatus(this.item.id, ContentItemStatus.REJECTED, reason)
    );

    const archived = await this.activity(
      { key: 'archive', taskType: TaskType.ARCHIVE, schema: ArchivedSchema },
      () => this.deps.collaborators.archiver.archive(this.item.id, reason)
    );
    if (!archived.ok) {
      await this.alert(
        'alert:archive',
        AlertSeverity.WARNING,
        'archive_failed',
        `Rejected item ${this.item.id} could not be archived: ${archived.failure.causeMessage}`
      );
    }

    await this.steps.notifier.notifyOutcome(this.ctx, this.item, NotificationOutcome.REJECTED, {
      subject: `Rejected: ${this.item.id}`,
      body: `${this.item.id} was rejected (${decision.kind}): ${reason}`,
    });
  }

  private async fail(reason: string): Promise<void> {
    this.projection.failureReason = reason;
    await this.transition(ReviewState.NEEDS_OPERATOR_ATTENTION, 'operator-attention');

    await persistStep(this.ctx, 'status:needs-attention', () =>
      this.deps.stores.contentItems.updateStatus(
        this.item.id,
        ContentItemStatus.NEEDS_ATTENTION,
        reason
      )
    );
    await this.alert('alert:needs-attention', AlertSeverity.CRITICAL, 'needs_operator_attention', reason);

    await this.steps.notifier.notifyOutcome(
      this.ctx,
      this.item,
      NotificationOutcome.NEEDS_ATTENTION,
      {
        subject: `Needs attention: ${this.item.id}`,
        body: `Review of ${this.item.id} stopped and was handed to an operator: ${reason}`,
      }
    );
  }

  private async finish(): Promise<void> {
    const recordedAt = await this.ctx.now('audit');
    await persistStep(this.ctx, 'audit', () =>
      this.deps.stores.audit.record({
        contentItemId: this.item.id,
        instanceId: this.record.id,
        finalState: this.state,
        finalDecisionKind: this.projection.decision?.kind ?? null,
        score: this.projection.score,
        reviewerId: this.projection.assignment?.reviewerId ?? null,
        transitions: this.projection.transitions,
        sideEffectResult: this.projection.sideEffectResult,
        recordedAt,
      })
    );

    const archivedAt = await this.ctx.now('archived-at');
    await persistStep(this.ctx, 'archive-instance', () =>
      this.deps.stores.instances.archive(this.record.id, new Date(archivedAt))
    );
    this.ctx.logger.info({ state: this.state }, 'Review workflow finished');
  }

  private async summarize(): Promise<string> {
    const summary = await this.activity(
      { key: 'summarize', taskType: TaskType.SUMMARIZE, schema: SummarySchema },
      () => this.deps.collaborators.summarizer.summarize(this.item.id, this.item.payloadRef)
    );
    if (summary.ok) {
      return summary.value.summary;
    }
    this.ctx.logger.warn({ error: summary.failure.causeMessage }, 'Summary generation failed');
    return `Relevance score ${this.projection.score ?? 'n/a'}.`;
  }

  private async alert(
    key: string,
    severity: AlertSeverity,
    kind: string,
    message: string
  ): Promise<void> {
    await persistStep(this.ctx, key, () =>
      this.deps.collaborators.alerter.raise({
        severity,
        kind,
        contentItemId: this.item.id,
        message,
        details: { instanceId: this.record.id },
      })
    );
  }

  private setDecision(decision: TerminalDecision): void {
    const existing = this.projection.decision;
    if (existing && isTerminalDecision(existing) && existing.kind !== decision.kind) {
      throw new TerminalDecisionConflictError(this.item.id, existing.kind, decision.kind);
    }
    this.projection.decision = decision;
  }

  /**
   * State change: validated, journaled, then checkpointed. Replays read the
   * journaled record back, so a checkpoint never moves backwards.
   */
  private async transition(to: ReviewState, step: string): Promise<void> {
    const from = this.state;
    assertValidTransition(from, to);

    const index = this.projection.transitions.length;
    const entry = await this.ctx.recordTransition(index, TransitionRecordSchema, (now) => ({
      from,
      to,
      at: now.toISOString(),
    }));
    if (entry.from !== from || entry.to !== to) {
      throw new Error(
        `Journal diverged at transition ${index}: recorded ${entry.from} -> ${entry.to}, replayed ${from} -> ${to}`
      );
    }

    this.state = to;
    this.currentStep = step;
    this.projection.transitions.push(entry);

    const snapshot = {
      state: this.state,
      currentStep: this.currentStep,
      retryCounters: { ...this.retryCounters },
      projection: structuredClone(this.projection),
      checkpointAt: new Date(entry.at),
    };
    await persistStep(this.ctx, `checkpoint:${index}`, () =>
      this.deps.stores.instances.saveCheckpoint(this.record.id, snapshot)
    );

    this.ctx.logger.info({ from, to, step }, 'Review state changed');
  }

  private async activity<T>(
    spec: ActivitySpec<T>,
    fn: (attempt: number) => Promise<T>
  ): Promise<ActivityOutcome<T>> {
    const outcome = await this.ctx.executeActivity(spec, fn);
    const attempts = outcome.ok ? outcome.attempts : outcome.failure.attempts;
    if (attempts > 1) {
      this.retryCounters[spec.key] = attempts;
    }
    return outcome;
  }
}
