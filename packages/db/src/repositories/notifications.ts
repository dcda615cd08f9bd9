import type { NotificationDispatcher, NotificationMetadata } from '@contentreview/core';
import type { Queryable } from '../connection';

/**
 * Delivers notifications into the `notifications` inbox table. A repeated
 * delivery of the same outcome to the same user for the same item is a no-op.
 */
export function createNotificationDispatcher(pool: Queryable): NotificationDispatcher {
  return {
    async send(
      userId: string,
      subject: string,
      body: string,
      metadata?: NotificationMetadata
    ): Promise<{ success: boolean }> {
      await pool.query(
        `INSERT INTO notifications (user_id, content_item_id, outcome, subject, body, metadata)
         VALUES ($1, $2, $3, $4, $5, $6)
         ON CONFLICT (user_id, content_item_id, outcome) WHERE content_item_id IS NOT NULL
         DO NOTHING`,
        [
          userId,
          metadata?.contentItemId ?? null,
          metadata?.outcome ?? null,
          subject,
          body,
          JSON.stringify(metadata ?? {}),
        ]
      );
      return { success: true };
    },
  };
}
