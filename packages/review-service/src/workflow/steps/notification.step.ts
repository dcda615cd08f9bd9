import {
  AlertSeverity,
  ContentItem,
  NotificationDispatcher,
  NotificationOutcome,
  OperatorAlerter,
  ReviewAssignment,
  ReviewerDirectory,
  TaskType,
  TransientActivityError,
  z,
} from '@contentreview/core';
import type { DurableContext } from '../../durable/context';
import { SuccessSchema } from '../types';
import { persistStep } from './persist';

export interface OutcomeMessage {
  subject: string;
  body: string;
  externalUrl?: string | null;
}

const OwnerSchema = z.object({ ownerId: z.string().nullable() });

/**
 * Sends the workflow's notifications. Each recipient is a separate activity,
 * so a retried or replayed workflow never notifies the same person twice for
 * the same outcome.
 */
export class ReviewNotifier {
  constructor(
    private readonly dispatcher: NotificationDispatcher,
    private readonly directory: ReviewerDirectory,
    private readonly alerter: OperatorAlerter
  ) {}

  async notifyReviewer(
    ctx: DurableContext,
    contentItem: ContentItem,
    assignment: ReviewAssignment,
    deadline: Date
  ): Promise<void> {
    await this.send(ctx, contentItem, {
      key: `notify:${NotificationOutcome.ASSIGNED}:${assignment.round}`,
      userId: assignment.reviewerId,
      outcome: NotificationOutcome.ASSIGNED,
      message: {
        subject: `Review requested: ${contentItem.id}`,
        body: `You have been assigned to review ${contentItem.id}. Submit a decision before ${deadline.toISOString()}.`,
      },
    });
  }

  /** Notifies the submitter and, when different, the collection owner. */
  async notifyOutcome(
    ctx: DurableContext,
    contentItem: ContentItem,
    outcome: NotificationOutcome,
    message: OutcomeMessage
  ): Promise<void> {
    const recipients = [contentItem.submitterId];

    const owner = await ctx.executeActivity(
      { key: 'directory:owner', taskType: TaskType.PERSIST, schema: OwnerSchema },
      async () => ({ ownerId: await this.directory.ownerOf(contentItem.collectionId) })
    );
    if (!owner.ok) {
      ctx.logger.warn({ error: owner.failure.causeMessage }, 'Collection owner lookup failed');
    } else if (owner.value.ownerId !== null && owner.value.ownerId !== contentItem.submitterId) {
      recipients.push(owner.value.ownerId);
    }

    for (const userId of recipients) {
      await this.send(ctx, contentItem, { key: `notify:${outcome}:${userId}`, userId, outcome, message });
    }
  }

  private async send(
    ctx: DurableContext,
    contentItem: ContentItem,
    delivery: { key: string; userId: string; outcome: NotificationOutcome; message: OutcomeMessage }
  ): Promise<void> {
    const { key, userId, outcome, message } = delivery;
    const sent = await ctx.executeActivity(
      { key, taskType: TaskType.NOTIFY, schema: SuccessSchema },
      async () => {
        const result = await this.dispatcher.send(userId, message.subject, message.body, {
          contentItemId: contentItem.id,
          outcome,
          externalUrl: message.externalUrl ?? null,
        });
        if (!result.success) {
          throw new TransientActivityError(`Notification to ${userId} was not accepted`);
        }
        return result;
      }
    );

    if (sent.ok) {
      return;
    }

    ctx.logger.warn({ userId, outcome, error: sent.failure.causeMessage }, 'Notification failed');
    await persistStep(ctx, `alert:${key}`, () =>
      this.alerter.raise({
        severity: AlertSeverity.WARNING,
        kind: 'notification_failed',
        contentItemId: contentItem.id,
        message: `Could not notify ${userId} (${outcome}): ${sent.failure.causeMessage}`,
        details: { userId, outcome, attempts: sent.failure.attempts },
      })
    );
  }
}
