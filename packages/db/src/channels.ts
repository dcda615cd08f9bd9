import type { Queryable } from './connection';

export const REVIEW_WORKFLOWS_CHANNEL = 'review_workflows';
export const REVIEW_SIGNALS_CHANNEL = 'review_signals';

export type ReviewChannel = typeof REVIEW_WORKFLOWS_CHANNEL | typeof REVIEW_SIGNALS_CHANNEL;

export async function announce(db: Queryable, channel: ReviewChannel, instanceId: string): Promise<void> {
  await db.query('SELECT pg_notify($1, $2)', [channel, instanceId]);
}
