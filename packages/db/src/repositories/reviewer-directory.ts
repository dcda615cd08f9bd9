import type { ReviewerDirectory } from '@contentreview/core';
import type { Queryable } from '../connection';

export function createReviewerDirectory(pool: Queryable): ReviewerDirectory {
  return {
    async poolFor(collectionId: string): Promise<string[]> {
      const result = await pool.query<{ reviewer_id: string }>(
        `SELECT reviewer_id
         FROM collection_reviewers
         WHERE collection_id = $1 AND active = true
         ORDER BY position ASC, reviewer_id ASC`,
        [collectionId]
      );
      return result.rows.map((row) => row.reviewer_id);
    },

    async ownerOf(collectionId: string): Promise<string | null> {
      const result = await pool.query<{ owner_id: string | null }>(
        `SELECT owner_id FROM review_collections WHERE id = $1`,
        [collectionId]
      );
      return result.rows[0]?.owner_id ?? null;
    },
  };
}
