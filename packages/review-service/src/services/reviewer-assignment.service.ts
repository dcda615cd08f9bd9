import {
  AssignmentRepository,
  ContentItem,
  NoEligibleReviewerError,
  ReviewAssignment,
  ReviewerCursorRepository,
  ReviewerDirectory,
  TransientActivityError,
} from '@contentreview/core';
import type { Clock } from '../durable/clock';
import type { Logger } from '../utils/logger';

const MAX_CURSOR_CONFLICTS = 10;

export const CURSOR_CONTENTION_CODE = 'CURSOR_CONTENTION';

export interface AssignmentRequest {
  contentItem: ContentItem;
  round: number;
  /** Reviewers that already let an earlier round of this item time out. */
  excludedReviewerIds: string[];
  maxConcurrentAssignments: number;
}

/**
 * Round-robin reviewer selection over the collection's ordered pool. The
 * shared cursor is advanced with compare-and-swap so that concurrent
 * assignments in one collection never pick from the same position twice.
 *
 * The cursor swap and the assignment write are separate statements. When the
 * write fails after a successful swap, the retried activity picks from the
 * advanced cursor, so that one slot of the rotation is skipped. The
 * alternative order would let a failed swap leave a stale assignment behind.
 */
export class ReviewerAssignmentService {
  constructor(
    private readonly directory: ReviewerDirectory,
    private readonly cursors: ReviewerCursorRepository,
    private readonly assignments: AssignmentRepository,
    private readonly clock: Clock,
    private readonly logger: Logger
  ) {}

  async assign(request: AssignmentRequest): Promise<ReviewAssignment> {
    const { contentItem, round } = request;

    const existing = await this.assignments.findByContentItem(contentItem.id);
    if (existing && existing.round === round) {
      return existing;
    }

    const pool = await this.directory.poolFor(contentItem.collectionId);

    for (let conflicts = 0; conflicts < MAX_CURSOR_CONFLICTS; conflicts++) {
      const cursor = await this.cursors.get(contentItem.collectionId);
      const picked = await this.pickFrom(pool, cursor.position, request);

      if (picked === null) {
        throw new NoEligibleReviewerError(contentItem.collectionId, pool.length);
      }

      const swapped = await this.cursors.compareAndSwap(
        contentItem.collectionId,
        cursor.version,
        (picked.index + 1) % pool.length
      );
      if (!swapped) {
        this.logger.debug(
          { collectionId: contentItem.collectionId, conflicts: conflicts + 1 },
          'Reviewer cursor moved concurrently, retrying'
        );
        continue;
      }

      const assignment = await this.assignments.upsert({
        contentItemId: contentItem.id,
        reviewerId: picked.reviewerId,
        assignedAt: this.clock.now().toISOString(),
        poolSnapshot: [...pool],
        round,
      });

      this.logger.info(
        { contentItemId: contentItem.id, reviewerId: assignment.reviewerId, round },
        'Reviewer assigned'
      );
      return assignment;
    }

    throw new TransientActivityError(
      `Reviewer cursor of ${contentItem.collectionId} kept changing after ${MAX_CURSOR_CONFLICTS} attempts`,
      CURSOR_CONTENTION_CODE
    );
  }

  private async pickFrom(
    pool: string[],
    position: number,
    request: AssignmentRequest
  ): Promise<{ reviewerId: string; index: number } | null> {
    const size = pool.length;
    if (size === 0) {
      return null;
    }

    const excluded = new Set(request.excludedReviewerIds);
    const start = ((position % size) + size) % size;

    for (let offset = 0; offset < size; offset++) {
      const index = (start + offset) % size;
      const reviewerId = pool[index];

      if (
        reviewerId === undefined ||
        reviewerId === request.contentItem.submitterId ||
        excluded.has(reviewerId)
      ) {
        continue;
      }

      const active = await this.assignments.countActive(reviewerId);
      if (active >= request.maxConcurrentAssignments) {
        continue;
      }

      return { reviewerId, index };
    }

    return null;
  }
}
