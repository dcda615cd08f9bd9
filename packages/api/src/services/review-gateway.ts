import type { Pool, PoolClient } from 'pg';
import { v5 as uuidv5 } from 'uuid';
import {
  ContentItem,
  InstanceNotFoundError,
  JournalEventType,
  OperatorAlertRecord,
  RepairTask,
  ReviewSignal,
  ReviewStatus,
  WorkflowInstanceRecord,
  WorkflowInstanceRepository,
  registerReview,
  reviewStatusOf,
  signalEventKey,
} from '@contentreview/core';
import {
  OperatorAlertRepository,
  REVIEW_SIGNALS_CHANNEL,
  REVIEW_WORKFLOWS_CHANNEL,
  announce,
  createContentItemRepository,
  createJournalRepository,
  createOperatorAlertRepository,
  createSideEffectRepository,
  createWorkflowInstanceRepository,
  withTransaction,
} from '@contentreview/db';

const SIGNAL_NAMESPACE = '3f5e2b1c-8d4a-4e6f-9b7c-2a1d0e9f8c6b';

/**
 * Signal id used when the caller sends no idempotency key: the same decision
 * for the same item always maps to the same id.
 */
export function signalIdFor(contentItemId: string, signal: ReviewSignal): string {
  return uuidv5(
    JSON.stringify([contentItemId, signal.approved, signal.reviewerId, signal.notes ?? null]),
    SIGNAL_NAMESPACE
  );
}

export interface StartedReview {
  status: ReviewStatus;
  created: boolean;
}

export interface DecisionReceipt {
  signalId: string;
  duplicate: boolean;
}

export interface AlertPage {
  items: OperatorAlertRecord[];
  total: number;
}

/** What the HTTP layer needs from the review store; the workflows themselves run in the review service. */
export interface ReviewGateway {
  startReview(contentItem: ContentItem, config?: unknown): Promise<StartedReview>;
  submitDecision(
    contentItemId: string,
    signal: ReviewSignal,
    signalId?: string
  ): Promise<DecisionReceipt>;
  getStatus(contentItemId: string): Promise<ReviewStatus>;
  listOpenAlerts(limit: number, offset: number): Promise<AlertPage>;
  acknowledgeAlert(id: string): Promise<boolean>;
  listPendingRepairs(limit: number): Promise<RepairTask[]>;
  ping(): Promise<void>;
}

export class PgReviewGateway implements ReviewGateway {
  private readonly alerts: OperatorAlertRepository;
  private readonly instances: WorkflowInstanceRepository;

  constructor(private readonly pool: Pool) {
    this.alerts = createOperatorAlertRepository(pool);
    this.instances = createWorkflowInstanceRepository(pool);
  }

  async startReview(contentItem: ContentItem, config?: unknown): Promise<StartedReview> {
    const { record, created } = await withTransaction(this.pool, async (client) => {
      const registered = await registerReview(
        {
          contentItems: createContentItemRepository(client),
          instances: createWorkflowInstanceRepository(client),
          alerter: this.alerts,
        },
        contentItem,
        config
      );
      if (registered.created) {
        // delivered on commit
        await announce(client, REVIEW_WORKFLOWS_CHANNEL, registered.record.id);
      }
      return registered;
    });

    return { status: reviewStatusOf(record), created };
  }

  async submitDecision(
    contentItemId: string,
    signal: ReviewSignal,
    signalId = signalIdFor(contentItemId, signal)
  ): Promise<DecisionReceipt> {
    const record = await this.requireInstance(contentItemId);
    const eventKey = signalEventKey(signalId);

    const duplicate = await withTransaction(this.pool, async (client: PoolClient) => {
      const journal = createJournalRepository(client);
      const known = await journal.list(record.id);
      if (known.some((event) => event.eventKey === eventKey)) {
        return true;
      }

      await journal.append(record.id, {
        eventKey,
        type: JournalEventType.SIGNAL_RECEIVED,
        payload: { ...signal },
      });
      await announce(client, REVIEW_SIGNALS_CHANNEL, record.id);
      return false;
    });

    return { signalId, duplicate };
  }

  async getStatus(contentItemId: string): Promise<ReviewStatus> {
    return reviewStatusOf(await this.requireInstance(contentItemId));
  }

  async listOpenAlerts(limit: number, offset: number): Promise<AlertPage> {
    const [items, total] = await Promise.all([
      this.alerts.listOpen(limit, offset),
      this.alerts.countOpen(),
    ]);
    return { items, total };
  }

  acknowledgeAlert(id: string): Promise<boolean> {
    return this.alerts.acknowledge(id);
  }

  listPendingRepairs(limit: number): Promise<RepairTask[]> {
    return createSideEffectRepository(this.pool).listPendingRepairs(limit);
  }

  async ping(): Promise<void> {
    await this.pool.query('SELECT 1');
  }

  private async requireInstance(contentItemId: string): Promise<WorkflowInstanceRecord> {
    const record = await this.instances.findByContentItemId(contentItemId);
    if (!record) {
      throw new InstanceNotFoundError(contentItemId);
    }
    return record;
  }
}
