import type { ContentItem } from '../domain/content';
import type { ReviewState } from '../domain/enums';
import type { ReviewProjection, ReviewStatus } from '../domain/workflow';
import type { ReviewWorkflowConfig } from '../config/workflow-config';

export interface WorkflowInstanceRecord {
  id: string;
  contentItemId: string;
  contentItem: ContentItem;
  config: ReviewWorkflowConfig;
  state: ReviewState;
  currentStep: string;
  retryCounters: Record<string, number>;
  projection: ReviewProjection;
  createdAt: Date;
  lastCheckpointAt: Date;
  archivedAt: Date | null;
}

export interface NewWorkflowInstance {
  id: string;
  contentItem: ContentItem;
  config: ReviewWorkflowConfig;
}

export interface WorkflowCheckpoint {
  state: ReviewState;
  currentStep: string;
  retryCounters: Record<string, number>;
  projection: ReviewProjection;
  checkpointAt: Date;
}

export interface WorkflowInstanceRepository {
  /** Idempotent on `id`: a second create returns the existing record with `created: false`. */
  create(
    instance: NewWorkflowInstance
  ): Promise<{ record: WorkflowInstanceRecord; created: boolean }>;
  findById(id: string): Promise<WorkflowInstanceRecord | null>;
  findByContentItemId(contentItemId: string): Promise<WorkflowInstanceRecord | null>;
  saveCheckpoint(id: string, checkpoint: WorkflowCheckpoint): Promise<void>;
  listResumable(): Promise<WorkflowInstanceRecord[]>;
  archive(id: string, archivedAt: Date): Promise<void>;
}

export function instanceIdFor(contentItemId: string): string {
  return `review-${contentItemId}`;
}

/** The `GetStatus` view of an instance: read from the last checkpoint, never from the running instance. */
export function reviewStatusOf(record: WorkflowInstanceRecord): ReviewStatus {
  return {
    instanceId: record.id,
    contentItemId: record.contentItemId,
    state: record.state,
    currentStep: record.currentStep,
    archived: record.archivedAt !== null,
    ...record.projection,
  };
}
