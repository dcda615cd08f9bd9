import {
  ContentItem,
  JournalRepository,
  ReviewerCursorRepository,
  WorkflowInstanceRecord,
  registerReview,
} from '@contentreview/core';
import { Clock, systemClock } from './durable/clock';
import { DEFAULT_POOL_SIZES, WorkerPools, createWorkerPools } from './durable/worker-pool';
import { CrashSink, DurableRuntime } from './durable/runtime';
import { ReviewerAssignmentService } from './services/reviewer-assignment.service';
import { withAlertLogging } from './services/alerting';
import { ContentReviewOrchestrator } from './workflow/review-orchestrator';
import type { ReviewCollaborators, ReviewStores } from './workflow/types';
import { Logger, logger as rootLogger } from './utils/logger';

export interface ReviewServiceStores extends ReviewStores {
  journal: JournalRepository;
  cursors: ReviewerCursorRepository;
}

export interface ReviewServiceOptions {
  stores: ReviewServiceStores;
  collaborators: ReviewCollaborators;
  clock?: Clock;
  pools?: WorkerPools;
  logger?: Logger;
  onCrash?: CrashSink;
}

export interface ReviewService {
  runtime: DurableRuntime;
  orchestrator: ContentReviewOrchestrator;
  assignment: ReviewerAssignmentService;
  pools: WorkerPools;
  clock: Clock;
  /** Registers an item and starts its instance in this process. */
  submit(
    contentItem: ContentItem,
    config?: unknown
  ): Promise<{ record: WorkflowInstanceRecord; created: boolean }>;
}

export function createReviewService(options: ReviewServiceOptions): ReviewService {
  const logger = options.logger ?? rootLogger;
  const clock = options.clock ?? systemClock;
  const pools = options.pools ?? createWorkerPools(DEFAULT_POOL_SIZES);
  const { stores } = options;
  const collaborators: ReviewCollaborators = {
    ...options.collaborators,
    alerter: withAlertLogging(options.collaborators.alerter, logger),
  };

  const assignment = new ReviewerAssignmentService(
    collaborators.directory,
    stores.cursors,
    stores.assignments,
    clock,
    logger.child({ component: 'reviewer-assignment' })
  );

  const orchestrator = new ContentReviewOrchestrator({ stores, collaborators, assignment });

  const runtime = new DurableRuntime({
    journal: stores.journal,
    instances: stores.instances,
    clock,
    pools,
    runner: orchestrator,
    alerter: collaborators.alerter,
    logger,
    onCrash: options.onCrash,
  });

  return {
    runtime,
    orchestrator,
    assignment,
    pools,
    clock,
    async submit(contentItem, config) {
      const registered = await registerReview(
        { contentItems: stores.contentItems, instances: stores.instances, alerter: collaborators.alerter },
        contentItem,
        config
      );
      runtime.start(registered.record);
      return registered;
    },
  };
}
