import { z } from 'zod';
import type {
  AssignmentRepository,
  AssignmentResolution,
  ReviewAssignment,
} from '@contentreview/core';
import type { Queryable } from '../connection';

interface ReviewAssignmentRow {
  content_item_id: string;
  reviewer_id: string;
  assigned_at: Date;
  pool_snapshot: unknown;
  round: number;
}

const COLUMNS = 'content_item_id, reviewer_id, assigned_at, pool_snapshot, round';

function mapRow(row: ReviewAssignmentRow): ReviewAssignment {
  return {
    contentItemId: row.content_item_id,
    reviewerId: row.reviewer_id,
    assignedAt: row.assigned_at.toISOString(),
    poolSnapshot: z.array(z.string()).parse(row.pool_snapshot),
    round: row.round,
  };
}

export function createAssignmentRepository(pool: Queryable): AssignmentRepository {
  return {
    async upsert(assignment: ReviewAssignment): Promise<ReviewAssignment> {
      const result = await pool.query<ReviewAssignmentRow>(
        `INSERT INTO review_assignments (content_item_id, reviewer_id, assigned_at, pool_snapshot, round)
         VALUES ($1, $2, $3, $4, $5)
         ON CONFLICT (content_item_id) DO UPDATE
         SET reviewer_id = EXCLUDED.reviewer_id,
             assigned_at = EXCLUDED.assigned_at,
             pool_snapshot = EXCLUDED.pool_snapshot,
             round = EXCLUDED.round,
             resolution = NULL,
             resolved_at = NULL
         WHERE review_assignments.round < EXCLUDED.round
         RETURNING ${COLUMNS}`,
        [
          assignment.contentItemId,
          assignment.reviewerId,
          assignment.assignedAt,
          JSON.stringify(assignment.poolSnapshot),
          assignment.round,
        ]
      );

      const row = result.rows[0];
      if (row) {
        return mapRow(row);
      }

      // Same or later round already stored: keep what is there.
      const existing = await pool.query<ReviewAssignmentRow>(
        `SELECT ${COLUMNS} FROM review_assignments WHERE content_item_id = $1`,
        [assignment.contentItemId]
      );
      const existingRow = existing.rows[0];
      if (!existingRow) {
        throw new Error(`Failed to upsert assignment for ${assignment.contentItemId}`);
      }
      return mapRow(existingRow);
    },

    async findByContentItem(contentItemId: string): Promise<ReviewAssignment | null> {
      const result = await pool.query<ReviewAssignmentRow>(
        `SELECT ${COLUMNS} FROM review_assignments WHERE content_item_id = $1`,
        [contentItemId]
      );
      const row = result.rows[0];
      return row ? mapRow(row) : null;
    },

    async countActive(reviewerId: string): Promise<number> {
      const result = await pool.query<{ count: number }>(
        `SELECT COUNT(*)::int AS count
         FROM review_assignments
         WHERE reviewer_id = $1 AND resolution IS NULL`,
        [reviewerId]
      );
      return result.rows[0]?.count ?? 0;
    },

    async resolve(
      contentItemId: string,
      resolution: AssignmentResolution,
      resolvedAt: Date
    ): Promise<void> {
      await pool.query(
        `UPDATE review_assignments
         SET resolution = $2, resolved_at = $3
         WHERE content_item_id = $1 AND resolution IS NULL`,
        [contentItemId, resolution, resolvedAt]
      );
    },
  };
}
