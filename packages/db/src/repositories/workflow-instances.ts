import { z } from 'zod';
import type {
  NewWorkflowInstance,
  WorkflowCheckpoint,
  WorkflowInstanceRecord,
  WorkflowInstanceRepository,
} from '@contentreview/core';
import {
  ContentItemSchema,
  InstanceNotFoundError,
  ReviewProjectionSchema,
  ReviewState,
  ReviewWorkflowConfigSchema,
  emptyProjection,
} from '@contentreview/core';
import type { Queryable } from '../connection';

interface WorkflowInstanceRow {
  id: string;
  content_item_id: string;
  content_item: unknown;
  config: unknown;
  state: string;
  current_step: string;
  retry_counters: unknown;
  projection: unknown;
  created_at: Date;
  last_checkpoint_at: Date;
  archived_at: Date | null;
}

const COLUMNS = `id, content_item_id, content_item, config, state, current_step, retry_counters,
  projection, created_at, last_checkpoint_at, archived_at`;

const RetryCountersSchema = z.record(z.string(), z.number().int());

function mapRow(row: WorkflowInstanceRow): WorkflowInstanceRecord {
  return {
    id: row.id,
    contentItemId: row.content_item_id,
    contentItem: ContentItemSchema.parse(row.content_item),
    config: ReviewWorkflowConfigSchema.parse(row.config),
    state: z.nativeEnum(ReviewState).parse(row.state),
    currentStep: row.current_step,
    retryCounters: RetryCountersSchema.parse(row.retry_counters),
    projection: ReviewProjectionSchema.parse(row.projection),
    createdAt: row.created_at,
    lastCheckpointAt: row.last_checkpoint_at,
    archivedAt: row.archived_at,
  };
}

export function createWorkflowInstanceRepository(pool: Queryable): WorkflowInstanceRepository {
  async function findById(id: string): Promise<WorkflowInstanceRecord | null> {
    const result = await pool.query<WorkflowInstanceRow>(
      `SELECT ${COLUMNS} FROM workflow_instances WHERE id = $1`,
      [id]
    );
    const row = result.rows[0];
    return row ? mapRow(row) : null;
  }

  return {
    async create(
      instance: NewWorkflowInstance
    ): Promise<{ record: WorkflowInstanceRecord; created: boolean }> {
      const result = await pool.query<WorkflowInstanceRow>(
        `INSERT INTO workflow_instances (id, content_item_id, content_item, config, state, current_step, projection)
         VALUES ($1, $2, $3, $4, $5, $6, $7)
         ON CONFLICT (id) DO NOTHING
         RETURNING ${COLUMNS}`,
        [
          instance.id,
          instance.contentItem.id,
          JSON.stringify(instance.contentItem),
          JSON.stringify(instance.config),
          ReviewState.CREATED,
          'created',
          JSON.stringify(emptyProjection()),
        ]
      );

      const inserted = result.rows[0];
      if (inserted) {
        return { record: mapRow(inserted), created: true };
      }

      const existing = await findById(instance.id);
      if (!existing) {
        throw new InstanceNotFoundError(instance.id);
      }
      return { record: existing, created: false };
    },

    findById,

    async findByContentItemId(contentItemId: string): Promise<WorkflowInstanceRecord | null> {
      const result = await pool.query<WorkflowInstanceRow>(
        `SELECT ${COLUMNS} FROM workflow_instances WHERE content_item_id = $1`,
        [contentItemId]
      );
      const row = result.rows[0];
      return row ? mapRow(row) : null;
    },

    async saveCheckpoint(id: string, checkpoint: WorkflowCheckpoint): Promise<void> {
      const result = await pool.query(
        `UPDATE workflow_instances
         SET state = $2, current_step = $3, retry_counters = $4, projection = $5, last_checkpoint_at = $6
         WHERE id = $1`,
        [
          id,
          checkpoint.state,
          checkpoint.currentStep,
          JSON.stringify(checkpoint.retryCounters),
          JSON.stringify(checkpoint.projection),
          checkpoint.checkpointAt,
        ]
      );

      if ((result.rowCount ?? 0) === 0) {
        throw new InstanceNotFoundError(id);
      }
    },

    async listResumable(): Promise<WorkflowInstanceRecord[]> {
      const result = await pool.query<WorkflowInstanceRow>(
        `SELECT ${COLUMNS} FROM workflow_instances
         WHERE archived_at IS NULL
         ORDER BY created_at ASC`
      );
      return result.rows.map(mapRow);
    },

    async archive(id: string, archivedAt: Date): Promise<void> {
      await pool.query(
        `UPDATE workflow_instances SET archived_at = COALESCE(archived_at, $2) WHERE id = $1`,
        [id, archivedAt]
      );
    },
  };
}
