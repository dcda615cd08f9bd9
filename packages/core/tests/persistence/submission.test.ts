import { describe, it, expect, vi } from 'vitest';
import { registerReview } from '../../src/persistence/submission';
import type { ContentItemRepository } from '../../src/persistence/content-items';
import type {
  NewWorkflowInstance,
  WorkflowInstanceRecord,
  WorkflowInstanceRepository,
} from '../../src/persistence/workflow-instances';
import type { ContentItem } from '../../src/domain/content';
import type { OperatorAlert } from '../../src/collaborators';
import { AlertSeverity, ContentItemStatus, ReviewState } from '../../src/domain/enums';
import { emptyProjection } from '../../src/domain/workflow';
import { ConfigError } from '../../src/errors';
import { defaultWorkflowConfig } from '../../src/config/workflow-config';

const contentItem: ContentItem = {
  id: 'item-1',
  submitterId: 'alice',
  collectionId: 'col-1',
  criteria: { topic: 'durable execution' },
  payloadRef: 'submissions/item-1.md',
};

const now = new Date('2026-03-02T09:00:00.000Z');

function recordFor(instance: NewWorkflowInstance): WorkflowInstanceRecord {
  return {
    id: instance.id,
    contentItemId: instance.contentItem.id,
    contentItem: instance.contentItem,
    config: instance.config,
    state: ReviewState.CREATED,
    currentStep: 'created',
    retryCounters: {},
    projection: emptyProjection(),
    createdAt: now,
    lastCheckpointAt: now,
    archivedAt: null,
  };
}

function createStores(existing: WorkflowInstanceRecord | null = null) {
  const insert = vi.fn<ContentItemRepository['insert']>(async (item) => ({
    record: {
      ...item,
      status: ContentItemStatus.SUBMITTED,
      statusReason: null,
      createdAt: now,
      updatedAt: now,
    },
    created: true,
  }));
  const create = vi.fn<WorkflowInstanceRepository['create']>(async (instance) => ({
    record: recordFor(instance),
    created: true,
  }));
  const raise = vi.fn<(alert: OperatorAlert) => Promise<void>>(async () => undefined);

  const contentItems: ContentItemRepository = {
    insert,
    findById: async () => null,
    updateStatus: async () => undefined,
  };
  const instances: WorkflowInstanceRepository = {
    create,
    findById: async () => existing,
    findByContentItemId: async () => existing,
    saveCheckpoint: async () => undefined,
    listResumable: async () => [],
    archive: async () => undefined,
  };

  return { contentItems, instances, alerter: { raise }, insert, create, raise };
}

describe('registerReview', () => {
  it('should store the item and create its instance', async () => {
    const stores = createStores();

    const { record, created } = await registerReview(stores, contentItem, {
      thresholds: { approveAtOrAbove: 9 },
    });

    expect(created).toBe(true);
    expect(record.id).toBe('review-item-1');
    expect(record.config.thresholds).toEqual({
      rejectBelow: 4,
      reviewBelow: 7,
      approveAtOrAbove: 9,
    });
    expect(stores.insert).toHaveBeenCalledWith(contentItem);
  });

  it('should return the existing instance for a repeated submission', async () => {
    const existing = recordFor({
      id: 'review-item-1',
      contentItem,
      config: defaultWorkflowConfig(),
    });
    const stores = createStores(existing);

    const result = await registerReview(stores, contentItem);

    expect(result).toEqual({ record: existing, created: false });
    expect(stores.insert).not.toHaveBeenCalled();
    expect(stores.create).not.toHaveBeenCalled();
  });

  it('should raise an alert and create nothing for an invalid configuration', async () => {
    const stores = createStores();

    await expect(
      registerReview(stores, contentItem, { thresholds: { rejectBelow: 8 } })
    ).rejects.toBeInstanceOf(ConfigError);

    expect(stores.raise).toHaveBeenCalledWith({
      severity: AlertSeverity.WARNING,
      kind: 'invalid_config',
      contentItemId: 'item-1',
      message:
        'Invalid review workflow configuration: thresholds.rejectBelow: rejectBelow (8) must not exceed reviewBelow (7)',
      details: {
        issues: [
          {
            path: 'thresholds.rejectBelow',
            message: 'rejectBelow (8) must not exceed reviewBelow (7)',
          },
        ],
      },
    });
    expect(stores.insert).not.toHaveBeenCalled();
    expect(stores.create).not.toHaveBeenCalled();
  });
});
