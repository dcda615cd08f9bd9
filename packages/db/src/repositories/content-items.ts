import type { ContentItem, ContentItemRecord, ContentItemRepository } from '@contentreview/core';
import { ContentItemRecordSchema, ContentItemStatus } from '@contentreview/core';
import type { Queryable } from '../connection';

interface ContentItemRow {
  id: string;
  submitter_id: string;
  collection_id: string;
  criteria: unknown;
  payload_ref: string;
  status: string;
  status_reason: string | null;
  created_at: Date;
  updated_at: Date;
}

const COLUMNS =
  'id, submitter_id, collection_id, criteria, payload_ref, status, status_reason, created_at, updated_at';

function mapRow(row: ContentItemRow): ContentItemRecord {
  return ContentItemRecordSchema.parse({
    id: row.id,
    submitterId: row.submitter_id,
    collectionId: row.collection_id,
    criteria: row.criteria,
    payloadRef: row.payload_ref,
    status: row.status,
    statusReason: row.status_reason,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  });
}

export function createContentItemRepository(pool: Queryable): ContentItemRepository {
  async function findById(id: string): Promise<ContentItemRecord | null> {
    const result = await pool.query<ContentItemRow>(
      `SELECT ${COLUMNS} FROM content_items WHERE id = $1`,
      [id]
    );
    const row = result.rows[0];
    return row ? mapRow(row) : null;
  }

  return {
    async insert(item: ContentItem): Promise<{ record: ContentItemRecord; created: boolean }> {
      const result = await pool.query<ContentItemRow>(
        `INSERT INTO content_items (id, submitter_id, collection_id, criteria, payload_ref, status)
         VALUES ($1, $2, $3, $4, $5, $6)
         ON CONFLICT (id) DO NOTHING
         RETURNING ${COLUMNS}`,
        [
          item.id,
          item.submitterId,
          item.collectionId,
          JSON.stringify(item.criteria),
          item.payloadRef,
          ContentItemStatus.SUBMITTED,
        ]
      );

      const inserted = result.rows[0];
      if (inserted) {
        return { record: mapRow(inserted), created: true };
      }

      const existing = await findById(item.id);
      if (!existing) {
        throw new Error(`Content item ${item.id} vanished during insert`);
      }
      return { record: existing, created: false };
    },

    findById,

    async updateStatus(
      id: string,
      status: ContentItemStatus,
      reason: string | null = null
    ): Promise<void> {
      await pool.query(
        `UPDATE content_items
         SET status = $2, status_reason = $3, updated_at = NOW()
         WHERE id = $1`,
        [id, status, reason]
      );
    },
  };
}
