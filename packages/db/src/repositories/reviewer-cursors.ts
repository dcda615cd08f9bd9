import type { ReviewerCursor, ReviewerCursorRepository } from '@contentreview/core';
import type { Queryable } from '../connection';

interface ReviewerCursorRow {
  collection_id: string;
  position: number;
  version: number;
}

export function createReviewerCursorRepository(pool: Queryable): ReviewerCursorRepository {
  return {
    async get(collectionId: string): Promise<ReviewerCursor> {
      // The no-op update makes RETURNING yield the existing row as well as a fresh one.
      const result = await pool.query<ReviewerCursorRow>(
        `INSERT INTO reviewer_cursors (collection_id)
         VALUES ($1)
         ON CONFLICT (collection_id) DO UPDATE SET collection_id = EXCLUDED.collection_id
         RETURNING collection_id, position, version`,
        [collectionId]
      );

      const row = result.rows[0];
      if (!row) {
        throw new Error(`Failed to load reviewer cursor for ${collectionId}`);
      }

      return {
        collectionId: row.collection_id,
        position: row.position,
        version: row.version,
      };
    },

    async compareAndSwap(
      collectionId: string,
      expectedVersion: number,
      nextPosition: number
    ): Promise<boolean> {
      const result = await pool.query(
        `UPDATE reviewer_cursors
         SET position = $3, version = version + 1, updated_at = NOW()
         WHERE collection_id = $1 AND version = $2`,
        [collectionId, expectedVersion, nextPosition]
      );
      return result.rowCount === 1;
    },
  };
}
