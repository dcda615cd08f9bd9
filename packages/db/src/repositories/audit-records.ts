import { z } from 'zod';
import type { AuditRecord, AuditRepository } from '@contentreview/core';
import {
  DecisionKind,
  ReviewState,
  SideEffectResultSchema,
  TransitionRecordSchema,
} from '@contentreview/core';
import type { Queryable } from '../connection';

interface AuditRecordRow {
  content_item_id: string;
  instance_id: string;
  final_state: string;
  final_decision_kind: string | null;
  score: number | null;
  reviewer_id: string | null;
  transitions: unknown;
  side_effect_result: unknown;
  recorded_at: Date;
}

function mapRow(row: AuditRecordRow): AuditRecord {
  return {
    contentItemId: row.content_item_id,
    instanceId: row.instance_id,
    finalState: z.nativeEnum(ReviewState).parse(row.final_state),
    finalDecisionKind: z.nativeEnum(DecisionKind).nullable().parse(row.final_decision_kind),
    score: row.score,
    reviewerId: row.reviewer_id,
    transitions: z.array(TransitionRecordSchema).parse(row.transitions),
    sideEffectResult: SideEffectResultSchema.nullable().parse(row.side_effect_result),
    recordedAt: row.recorded_at.toISOString(),
  };
}

export function createAuditRepository(pool: Queryable): AuditRepository {
  return {
    async record(audit: AuditRecord): Promise<void> {
      await pool.query(
        `INSERT INTO review_audit_records
           (content_item_id, instance_id, final_state, final_decision_kind, score, reviewer_id,
            transitions, side_effect_result, recorded_at)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
         ON CONFLICT (content_item_id) DO NOTHING`,
        [
          audit.contentItemId,
          audit.instanceId,
          audit.finalState,
          audit.finalDecisionKind,
          audit.score,
          audit.reviewerId,
          JSON.stringify(audit.transitions),
          audit.sideEffectResult ? JSON.stringify(audit.sideEffectResult) : null,
          audit.recordedAt,
        ]
      );
    },

    async findByContentItem(contentItemId: string): Promise<AuditRecord | null> {
      const result = await pool.query<AuditRecordRow>(
        `SELECT content_item_id, instance_id, final_state, final_decision_kind, score, reviewer_id,
                transitions, side_effect_result, recorded_at
         FROM review_audit_records
         WHERE content_item_id = $1`,
        [contentItemId]
      );
      const row = result.rows[0];
      return row ? mapRow(row) : null;
    },
  };
}
