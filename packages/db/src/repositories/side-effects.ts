import { z } from 'zod';
import type {
  IndexRequest,
  RepairStatus,
  RepairTask,
  SideEffectRepository,
  SideEffectResult,
} from '@contentreview/core';
import { SideEffectFailureSchema, SideEffectSide } from '@contentreview/core';
import type { Queryable } from '../connection';

interface SideEffectResultRow {
  search_indexed: boolean;
  graph_updated: boolean;
  partial_failures: unknown;
  repairs_scheduled: unknown;
  external_url: string | null;
}

interface RepairTaskRow {
  id: string;
  content_item_id: string;
  side: string;
  request: unknown;
  attempts: number;
  status: string;
  last_error: string | null;
  created_at: Date;
  updated_at: Date;
}

const REPAIR_COLUMNS =
  'id, content_item_id, side, request, attempts, status, last_error, created_at, updated_at';

const IndexRequestSchema = z.object({
  contentItemId: z.string(),
  collectionId: z.string(),
  topics: z.array(z.string()),
  entities: z.array(z.string()),
});

const RepairStatusSchema = z.enum(['pending', 'completed', 'abandoned']);

function mapResultRow(row: SideEffectResultRow): SideEffectResult {
  return {
    searchIndexed: row.search_indexed,
    graphUpdated: row.graph_updated,
    partialFailures: z.array(SideEffectFailureSchema).parse(row.partial_failures),
    repairsScheduled: z.array(z.nativeEnum(SideEffectSide)).parse(row.repairs_scheduled),
    externalUrl: row.external_url,
  };
}

function mapRepairRow(row: RepairTaskRow): RepairTask {
  const request: IndexRequest = IndexRequestSchema.parse(row.request);
  const status: RepairStatus = RepairStatusSchema.parse(row.status);
  return {
    id: row.id,
    contentItemId: row.content_item_id,
    side: z.nativeEnum(SideEffectSide).parse(row.side),
    request,
    attempts: row.attempts,
    status,
    lastError: row.last_error,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export function createSideEffectRepository(pool: Queryable): SideEffectRepository {
  return {
    async saveResult(contentItemId: string, result: SideEffectResult): Promise<void> {
      await pool.query(
        `INSERT INTO side_effect_results
           (content_item_id, search_indexed, graph_updated, partial_failures, repairs_scheduled, external_url)
         VALUES ($1, $2, $3, $4, $5, $6)
         ON CONFLICT (content_item_id) DO UPDATE
         SET search_indexed = side_effect_results.search_indexed OR EXCLUDED.search_indexed,
             graph_updated = side_effect_results.graph_updated OR EXCLUDED.graph_updated,
             partial_failures = EXCLUDED.partial_failures,
             repairs_scheduled = EXCLUDED.repairs_scheduled,
             external_url = COALESCE(EXCLUDED.external_url, side_effect_results.external_url),
             updated_at = NOW()`,
        [
          contentItemId,
          result.searchIndexed,
          result.graphUpdated,
          JSON.stringify(result.partialFailures),
          JSON.stringify(result.repairsScheduled),
          result.externalUrl,
        ]
      );
    },

    async findResult(contentItemId: string): Promise<SideEffectResult | null> {
      const result = await pool.query<SideEffectResultRow>(
        `SELECT search_indexed, graph_updated, partial_failures, repairs_scheduled, external_url
         FROM side_effect_results
         WHERE content_item_id = $1`,
        [contentItemId]
      );
      const row = result.rows[0];
      return row ? mapResultRow(row) : null;
    },

    async markSideIndexed(
      contentItemId: string,
      side: SideEffectSide,
      externalUrl: string | null = null
    ): Promise<void> {
      await pool.query(
        `UPDATE side_effect_results
         SET search_indexed = search_indexed OR $2 = 'search',
             graph_updated = graph_updated OR $2 = 'graph',
             external_url = COALESCE($3, external_url),
             partial_failures = COALESCE(
               (SELECT jsonb_agg(failure) FROM jsonb_array_elements(partial_failures) AS failure
                WHERE failure->>'side' <> $2),
               '[]'::jsonb
             ),
             updated_at = NOW()
         WHERE content_item_id = $1`,
        [contentItemId, side, externalUrl]
      );
    },

    async scheduleRepair(
      contentItemId: string,
      side: SideEffectSide,
      request: IndexRequest
    ): Promise<RepairTask> {
      const result = await pool.query<RepairTaskRow>(
        `INSERT INTO repair_tasks (content_item_id, side, request)
         VALUES ($1, $2, $3)
         ON CONFLICT (content_item_id, side) DO UPDATE SET updated_at = repair_tasks.updated_at
         RETURNING ${REPAIR_COLUMNS}`,
        [contentItemId, side, JSON.stringify(request)]
      );

      const row = result.rows[0];
      if (!row) {
        throw new Error(`Failed to schedule ${side} repair for ${contentItemId}`);
      }
      return mapRepairRow(row);
    },

    async listPendingRepairs(limit: number): Promise<RepairTask[]> {
      const result = await pool.query<RepairTaskRow>(
        `SELECT ${REPAIR_COLUMNS} FROM repair_tasks
         WHERE status = 'pending'
         ORDER BY updated_at ASC
         LIMIT $1`,
        [limit]
      );
      return result.rows.map(mapRepairRow);
    },

    async recordRepairFailure(taskId: string, error: string): Promise<number> {
      const result = await pool.query<{ attempts: number }>(
        `UPDATE repair_tasks
         SET attempts = attempts + 1, last_error = $2, updated_at = NOW()
         WHERE id = $1
         RETURNING attempts`,
        [taskId, error]
      );
      const row = result.rows[0];
      if (!row) {
        throw new Error(`Repair task ${taskId} not found`);
      }
      return row.attempts;
    },

    async completeRepair(taskId: string): Promise<void> {
      await pool.query(
        `UPDATE repair_tasks SET status = 'completed', updated_at = NOW() WHERE id = $1`,
        [taskId]
      );
    },

    async abandonRepair(taskId: string, error: string): Promise<void> {
      await pool.query(
        `UPDATE repair_tasks
         SET status = 'abandoned', last_error = $2, updated_at = NOW()
         WHERE id = $1`,
        [taskId, error]
      );
    },
  };
}
