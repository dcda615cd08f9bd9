import type { ContentArchiver } from '@contentreview/core';
import { ContentItemStatus } from '@contentreview/core';
import type { Queryable } from '../connection';

/** Archives rejected content and withdraws it from the search store. */
export function createContentArchiver(pool: Queryable): ContentArchiver {
  return {
    async archive(contentItemId: string, reason: string): Promise<{ archived: boolean }> {
      const result = await pool.query(
        `UPDATE content_items
         SET status = $2, status_reason = $3, updated_at = NOW()
         WHERE id = $1`,
        [contentItemId, ContentItemStatus.ARCHIVED, reason]
      );

      await pool.query(`DELETE FROM search_documents WHERE content_item_id = $1`, [contentItemId]);

      return { archived: result.rowCount === 1 };
    },
  };
}
